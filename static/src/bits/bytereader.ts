/**
 * ByteReader - position tracking reader over a byte view.
 * Sfnt data is big-endian, which is the default here.
 */
export class ByteReader {
    /** DataView over exactly the bytes this reader may access */
    private dataView: DataView;

    /** Current read position in bytes, relative to the start of the view */
    private position: number = 0;

    /** Whether the data is little-endian (false = big-endian) */
    private dataLittleEndian: boolean;

    /**
     * @param bytes - data to read; the reader never looks outside this view
     * @param dataLittleEndian - whether multi-byte values are little-endian
     */
    constructor(bytes: Uint8Array, dataLittleEndian: boolean = false) {
        this.dataView = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
        this.dataLittleEndian = dataLittleEndian;
    }

    /**
     * Reader over `length` bytes starting at `offset` (default: to the end)
     */
    subReader(offset: number, length?: number): ByteReader {
        const size = length ?? this.dataView.byteLength - offset;
        if (offset < 0 || size < 0 || offset + size > this.dataView.byteLength) {
            throw new Error(`Range out of bounds: offset=${offset}, length=${size}, buffer size=${this.dataView.byteLength}`);
        }
        return new ByteReader(
            new Uint8Array(this.dataView.buffer, this.dataView.byteOffset + offset, size),
            this.dataLittleEndian,
        );
    }

    /**
     * Skip ahead by n bytes
     * @returns This ByteReader for chaining
     */
    skip(bytes: number): ByteReader {
        this.checkBounds(bytes);
        this.position += bytes;
        return this;
    }

    getPosition(): number {
        return this.position;
    }

    seek(position: number): ByteReader {
        if (position < 0 || position > this.dataView.byteLength) {
            throw new Error(`Invalid seek position: ${position}`);
        }
        this.position = position;
        return this;
    }

    getSize(): number {
        return this.dataView.byteLength;
    }

    getRemainingBytes(): number {
        return this.dataView.byteLength - this.position;
    }

    private checkBounds(bytesNeeded: number): void {
        if (bytesNeeded > this.getRemainingBytes()) {
            throw new Error(
                `Not enough bytes: need ${bytesNeeded} at position ${this.position}, ` +
                `but only ${this.getRemainingBytes()} bytes remaining`,
            );
        }
    }

    readUint8(): number {
        this.checkBounds(1);
        const value = this.dataView.getUint8(this.position);
        this.position += 1;
        return value;
    }

    readUint16(): number {
        this.checkBounds(2);
        const value = this.dataView.getUint16(this.position, this.dataLittleEndian);
        this.position += 2;
        return value;
    }

    readUint32(): number {
        this.checkBounds(4);
        const value = this.dataView.getUint32(this.position, this.dataLittleEndian);
        this.position += 4;
        return value;
    }

    readInt16(): number {
        this.checkBounds(2);
        const value = this.dataView.getInt16(this.position, this.dataLittleEndian);
        this.position += 2;
        return value;
    }

    /**
     * Read `count` consecutive 16-bit unsigned integers
     */
    readUint16Array(count: number): number[] {
        this.checkBounds(count * 2);
        const values: number[] = [];
        for (let i = 0; i < count; i++) {
            values.push(this.readUint16());
        }
        return values;
    }

    /**
     * Read a fixed-length string (table tags)
     */
    readFixedString(length: number, encoding: string = "ascii"): string {
        this.checkBounds(length);
        const bytes = new Uint8Array(this.dataView.buffer, this.dataView.byteOffset + this.position, length);
        this.position += length;
        return new TextDecoder(encoding).decode(bytes);
    }
}

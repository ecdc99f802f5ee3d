import { readFile } from "fs/promises";
import { ByteReader } from "./bytereader";
import type { CodeTable, FontSource, GlyphDescription, GlyphIndex, GlyphTable } from "../font/types";

/**
 * format reference:
 * https://developer.apple.com/fonts/TrueType-Reference-Manual/
 */

/**
 * Error thrown for font data that cannot be read as a TrueType font
 */
export class TrueTypeParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "TrueTypeParseError";
    }
}

/** sfnt version of fonts with TrueType outlines */
export const SFNT_VERSION_TRUETYPE = 0x00010000;
/** 'true', used by some Apple fonts */
export const SFNT_VERSION_APPLE = 0x74727565;

/**
 * TTF Table Directory Entry
 */
export interface TTFTableEntry {
    tag: string;        // 4-byte table identifier (e.g., 'head', 'cmap', 'glyf')
    checkSum: number;   // checksum for this table
    offset: number;     // offset from beginning of file
    length: number;     // length of table in bytes
}

/**
 * TTF Font Header (Offset Table)
 */
export interface TTFHeader {
    sfntVersion: number;
    numTables: number;
}

/**
 * Fields of the 'head' table that outline extraction uses
 */
export interface TTFHeadTable {
    unitsPerEm: number;         // Units per EM (typically 1000 or 2048)
    xMin: number;
    yMin: number;
    xMax: number;
    yMax: number;
    indexToLocFormat: number;   // 0 for short offsets, 1 for long offsets
}

export interface TTFMaxpTable {
    version: number;            // 0x00005000 for v0.5, 0x00010000 for v1.0
    numGlyphs: number;
}

export interface CmapFormat0 {
    format: 0;
    glyphIdArray: number[];     // 256 entries
}

export interface CmapFormat4 {
    format: 4;
    endCode: number[];          // End character code for each segment
    startCode: number[];        // Start character code for each segment
    idDelta: number[];          // Delta for all character codes in segment
    idRangeOffset: number[];    // Offsets into glyphIdArray or 0
    glyphIdArray: number[];
}

export interface CmapFormat6 {
    format: 6;
    firstCode: number;
    glyphIdArray: number[];
}

export interface CmapGroup {
    startCharCode: number;
    endCharCode: number;
    startGlyphId: number;
}

export interface CmapFormat12 {
    format: 12;
    groups: CmapGroup[];
}

export type CmapSubtableData = CmapFormat0 | CmapFormat4 | CmapFormat6 | CmapFormat12;

export interface TTFCmapSubtable {
    platformID: number;
    encodingID: number;
    offset: number;             // Byte offset from beginning of table
    format: number;
    data: CmapSubtableData | null;  // null for formats that are not read
}

export interface TTFCmapTable {
    version: number;
    subtables: TTFCmapSubtable[];
}

export interface TTFFont {
    header: TTFHeader;
    tables: Map<string, TTFTableEntry>;
    rawData: Uint8Array;
}

/**
 * Read a TrueType font from disk
 */
export async function loadTrueTypeFont(path: string): Promise<TTFFont> {
    let data: Uint8Array;
    try {
        data = await readFile(path);
    } catch (error) {
        throw new TrueTypeParseError(`Failed to read TTF file from ${path}: ${describeError(error)}`, { cause: error });
    }
    return parseTrueTypeFont(data);
}

/**
 * Read the offset table and table directory of a TrueType font
 */
export function parseTrueTypeFont(data: Uint8Array | ArrayBufferLike): TTFFont {
    const rawData = data instanceof Uint8Array ? data : new Uint8Array(data);
    const reader = new ByteReader(rawData);

    if (reader.getSize() < 12) {
        throw new TrueTypeParseError("TTF file too small - missing header");
    }

    const sfntVersion = reader.readUint32();
    const numTables = reader.readUint16();
    reader.skip(6); // searchRange, entrySelector, rangeShift

    if (sfntVersion !== SFNT_VERSION_TRUETYPE && sfntVersion !== SFNT_VERSION_APPLE) {
        throw new TrueTypeParseError(
            `Invalid TTF magic number: 0x${sfntVersion.toString(16).padStart(8, "0")} (expected 0x00010000)`,
        );
    }

    const expectedSize = 12 + (numTables * 16);
    if (reader.getSize() < expectedSize) {
        throw new TrueTypeParseError(
            `TTF file too small - expected at least ${expectedSize} bytes for ${numTables} tables, got ${reader.getSize()}`,
        );
    }

    const tables = new Map<string, TTFTableEntry>();
    for (let i = 0; i < numTables; i++) {
        const tag = reader.readFixedString(4, "ascii");
        const checkSum = reader.readUint32();
        const offset = reader.readUint32();
        const length = reader.readUint32();

        if (offset + length > rawData.byteLength) {
            throw new TrueTypeParseError(`Table '${tag}' extends past the end of the file`);
        }
        tables.set(tag, { tag, checkSum, offset, length });
    }

    return {
        header: { sfntVersion, numTables },
        tables,
        rawData,
    };
}

/**
 * Get a table's raw data from the font
 * @returns Uint8Array of table data, or null if table not found
 */
export function getTableData(font: TTFFont, tableTag: string): Uint8Array | null {
    const tableEntry = font.tables.get(tableTag);
    if (!tableEntry) {
        return null;
    }
    return font.rawData.subarray(tableEntry.offset, tableEntry.offset + tableEntry.length);
}

function tableReader(font: TTFFont, tableTag: string): ByteReader | null {
    const tableData = getTableData(font, tableTag);
    return tableData ? new ByteReader(tableData) : null;
}

/**
 * Parse TTF 'head' table
 * @returns Parsed head table or null if not found
 */
export function parseHeadTable(font: TTFFont): TTFHeadTable | null {
    const reader = tableReader(font, "head");
    if (!reader) {
        return null;
    }

    return wrapParse("head", () => {
        reader.skip(18); // version, fontRevision, checksumAdjustment, magicNumber, flags
        const unitsPerEm = reader.readUint16();
        reader.skip(16); // created, modified
        const xMin = reader.readInt16();
        const yMin = reader.readInt16();
        const xMax = reader.readInt16();
        const yMax = reader.readInt16();
        reader.skip(6); // macStyle, lowestRecPPEM, fontDirectionHint
        const indexToLocFormat = reader.readInt16();
        return { unitsPerEm, xMin, yMin, xMax, yMax, indexToLocFormat };
    });
}

/**
 * Parse TTF 'maxp' table
 * @returns Parsed maxp table or null if not found
 */
export function parseMaxpTable(font: TTFFont): TTFMaxpTable | null {
    const reader = tableReader(font, "maxp");
    if (!reader) {
        return null;
    }
    return wrapParse("maxp", () => ({
        version: reader.readUint32(),
        numGlyphs: reader.readUint16(),
    }));
}

/**
 * Parse TTF 'cmap' table: encoding records plus subtables of format 0, 4, 6 and 12
 * @returns Parsed cmap table or null if not found
 */
export function parseCmapTable(font: TTFFont): TTFCmapTable | null {
    const reader = tableReader(font, "cmap");
    if (!reader) {
        return null;
    }

    const { version, subtables } = wrapParse("cmap", () => {
        const version = reader.readUint16();
        const numTables = reader.readUint16();
        const subtables: TTFCmapSubtable[] = [];
        for (let i = 0; i < numTables; i++) {
            subtables.push({
                platformID: reader.readUint16(),
                encodingID: reader.readUint16(),
                offset: reader.readUint32(),
                format: -1,
                data: null,
            });
        }
        return { version, subtables };
    });

    for (const subtable of subtables) {
        try {
            const subtableReader = reader.subReader(subtable.offset);
            subtable.format = subtableReader.readUint16();
            subtable.data = parseCmapSubtable(subtable.format, subtableReader);
            if (!subtable.data) {
                console.warn(
                    `Skipping cmap subtable (${subtable.platformID}, ${subtable.encodingID}): format ${subtable.format} not supported`,
                );
            }
        } catch (error) {
            // Skip subtables that fail to parse
            console.warn(`Failed to parse cmap subtable (${subtable.platformID}, ${subtable.encodingID}): ${describeError(error)}`);
        }
    }

    return { version, subtables };
}

/**
 * Read the body of a cmap subtable; `reader` is positioned just after the format field
 */
function parseCmapSubtable(format: number, reader: ByteReader): CmapSubtableData | null {
    switch (format) {
    case 0: {
        reader.skip(4); // length, language
        const glyphIdArray: number[] = [];
        for (let i = 0; i < 256; i++) {
            glyphIdArray.push(reader.readUint8());
        }
        return { format: 0, glyphIdArray };
    }
    case 4: {
        const length = reader.readUint16();
        reader.skip(2); // language
        const segCount = reader.readUint16() / 2;
        reader.skip(6); // searchRange, entrySelector, rangeShift

        const endCode = reader.readUint16Array(segCount);
        reader.skip(2); // Reserved pad
        const startCode = reader.readUint16Array(segCount);
        const idDelta: number[] = [];
        for (let i = 0; i < segCount; i++) {
            idDelta.push(reader.readInt16());
        }
        const idRangeOffset = reader.readUint16Array(segCount);

        // glyph index array runs to the end of the subtable
        const glyphIdCount = Math.max(0, Math.floor((length - reader.getPosition()) / 2));
        const glyphIdArray = reader.readUint16Array(Math.min(glyphIdCount, Math.floor(reader.getRemainingBytes() / 2)));

        return { format: 4, endCode, startCode, idDelta, idRangeOffset, glyphIdArray };
    }
    case 6: {
        reader.skip(4); // length, language
        const firstCode = reader.readUint16();
        const entryCount = reader.readUint16();
        return { format: 6, firstCode, glyphIdArray: reader.readUint16Array(entryCount) };
    }
    case 12: {
        reader.skip(10); // reserved, length, language
        const numGroups = reader.readUint32();
        const groups: CmapGroup[] = [];
        for (let i = 0; i < numGroups; i++) {
            groups.push({
                startCharCode: reader.readUint32(),
                endCharCode: reader.readUint32(),
                startGlyphId: reader.readUint32(),
            });
        }
        return { format: 12, groups };
    }
    default:
        return null;
    }
}

/**
 * Glyph ID for a character code in one cmap subtable
 * @returns Glyph ID or 0 if not found
 */
export function lookupCmapSubtable(data: CmapSubtableData, charCode: number): GlyphIndex {
    switch (data.format) {
    case 0:
        return charCode >= 0 && charCode < data.glyphIdArray.length ? data.glyphIdArray[charCode] : 0;

    case 4: {
        const segCount = data.endCode.length;
        for (let i = 0; i < segCount; i++) {
            if (charCode > data.endCode[i]) {
                continue;
            }
            if (charCode < data.startCode[i]) {
                return 0;
            }
            if (data.idRangeOffset[i] === 0) {
                // Simple delta mapping
                return (charCode + data.idDelta[i]) & 0xFFFF;
            }
            // Glyph index array lookup
            const index = data.idRangeOffset[i] / 2 + (charCode - data.startCode[i]) - (segCount - i);
            if (index >= 0 && index < data.glyphIdArray.length) {
                const glyphId = data.glyphIdArray[index];
                if (glyphId !== 0) {
                    return (glyphId + data.idDelta[i]) & 0xFFFF;
                }
            }
            return 0;
        }
        return 0;
    }

    case 6: {
        const index = charCode - data.firstCode;
        return index >= 0 && index < data.glyphIdArray.length ? data.glyphIdArray[index] : 0;
    }

    case 12:
        for (const group of data.groups) {
            if (charCode >= group.startCharCode && charCode <= group.endCharCode) {
                return group.startGlyphId + (charCode - group.startCharCode);
            }
        }
        return 0;
    }
}

/**
 * Points of a simple glyph as stored in the 'glyf' table
 */
export class TrueTypeGlyphDescription implements GlyphDescription {
    private xCoords: number[];
    private yCoords: number[];
    private flags: number[];
    private contourEnds: Set<number>;

    constructor(xCoords: number[], yCoords: number[], flags: number[], endPtsOfContours: number[]) {
        this.xCoords = xCoords;
        this.yCoords = yCoords;
        this.flags = flags;
        this.contourEnds = new Set(endPtsOfContours);
    }

    static empty(): TrueTypeGlyphDescription {
        return new TrueTypeGlyphDescription([], [], [], []);
    }

    get pointCount(): number {
        return this.flags.length;
    }

    xAt(index: number): number {
        return this.xCoords[index];
    }

    yAt(index: number): number {
        return this.yCoords[index];
    }

    isOnCurve(index: number): boolean {
        return (this.flags[index] & 0x01) !== 0; // ON_CURVE_POINT
    }

    isEndOfContour(index: number): boolean {
        return this.contourEnds.has(index);
    }
}

/**
 * Parse a simple glyph from the glyf table.
 * Empty glyphs yield an empty description; composite glyphs yield null.
 */
export function parseGlyphDescription(
    glyf: ByteReader,
    glyphOffset: number,
    nextGlyphOffset: number,
    glyphId: GlyphIndex,
): TrueTypeGlyphDescription | null {
    if (glyphOffset === nextGlyphOffset) {
        // Empty glyph (legitimate case like space character)
        return TrueTypeGlyphDescription.empty();
    }

    const glyphReader = glyf.subReader(glyphOffset, nextGlyphOffset - glyphOffset);
    const numberOfContours = glyphReader.readInt16();
    glyphReader.skip(8); // xMin, yMin, xMax, yMax

    if (numberOfContours < 0) {
        console.warn(`Composite glyph (glyph ID: ${glyphId}) not supported`);
        return null;
    }
    if (numberOfContours === 0) {
        return TrueTypeGlyphDescription.empty();
    }

    const contourEndPts = glyphReader.readUint16Array(numberOfContours);
    const numPoints = contourEndPts[contourEndPts.length - 1] + 1;

    // Skip instruction length and instructions
    const instructionLength = glyphReader.readUint16();
    glyphReader.skip(instructionLength);

    const flags: number[] = [];
    while (flags.length < numPoints) {
        const flag = glyphReader.readUint8();
        flags.push(flag);

        if (flag & 0x08) { // REPEAT_FLAG
            const repeatCount = glyphReader.readUint8();
            for (let j = 0; j < repeatCount && flags.length < numPoints; j++) {
                flags.push(flag);
            }
        }
    }

    const xCoords: number[] = [];
    let currentX = 0;
    for (let i = 0; i < numPoints; i++) {
        const flag = flags[i];
        if (flag & 0x02) { // X_SHORT_VECTOR
            const delta = glyphReader.readUint8();
            currentX += (flag & 0x10) ? delta : -delta; // POSITIVE_X_SHORT_VECTOR
        } else if (!(flag & 0x10)) { // Not SAME_X
            currentX += glyphReader.readInt16();
        }
        xCoords.push(currentX);
    }

    const yCoords: number[] = [];
    let currentY = 0;
    for (let i = 0; i < numPoints; i++) {
        const flag = flags[i];
        if (flag & 0x04) { // Y_SHORT_VECTOR
            const delta = glyphReader.readUint8();
            currentY += (flag & 0x20) ? delta : -delta; // POSITIVE_Y_SHORT_VECTOR
        } else if (!(flag & 0x20)) { // Not SAME_Y
            currentY += glyphReader.readInt16();
        }
        yCoords.push(currentY);
    }

    return new TrueTypeGlyphDescription(xCoords, yCoords, flags, contourEndPts);
}

/**
 * One cmap subtable exposed as a code table
 */
class CmapCodeTable implements CodeTable {
    readonly platformId: number;
    readonly encodingId: number;
    private data: CmapSubtableData;

    constructor(subtable: TTFCmapSubtable, data: CmapSubtableData) {
        this.platformId = subtable.platformID;
        this.encodingId = subtable.encodingID;
        this.data = data;
    }

    glyphIndexForCode(code: number): GlyphIndex {
        return lookupCmapSubtable(this.data, code);
    }
}

/**
 * 'loca' + 'glyf' pair, parsing glyphs on demand
 */
class GlyfGlyphTable implements GlyphTable {
    readonly glyphCount: number;
    private font: TTFFont;
    private indexToLocFormat: number;

    constructor(font: TTFFont, glyphCount: number, indexToLocFormat: number) {
        this.font = font;
        this.glyphCount = glyphCount;
        this.indexToLocFormat = indexToLocFormat;
    }

    descriptionAt(glyphId: GlyphIndex): GlyphDescription | null {
        if (glyphId < 0 || glyphId >= this.glyphCount) {
            return null;
        }
        const loca = tableReader(this.font, "loca");
        const glyf = tableReader(this.font, "glyf");
        if (!loca || !glyf) {
            return null;
        }

        try {
            let glyphOffset: number;
            let nextGlyphOffset: number;
            if (this.indexToLocFormat === 0) {
                // Short format: offsets are divided by 2
                loca.skip(glyphId * 2);
                glyphOffset = loca.readUint16() * 2;
                nextGlyphOffset = loca.readUint16() * 2;
            } else {
                loca.skip(glyphId * 4);
                glyphOffset = loca.readUint32();
                nextGlyphOffset = loca.readUint32();
            }
            return parseGlyphDescription(glyf, glyphOffset, nextGlyphOffset, glyphId);
        } catch (error) {
            console.warn(`Failed to read glyph ${glyphId}: ${describeError(error)}`);
            return null;
        }
    }
}

/**
 * A parsed TrueType font as a source of code tables and glyph outlines
 */
export class TrueTypeFontSource implements FontSource {
    readonly unitsPerEm?: number;
    readonly codeTables: readonly CodeTable[];
    readonly glyphTable: GlyphTable;

    constructor(font: TTFFont) {
        const head = parseHeadTable(font);
        const maxp = parseMaxpTable(font);
        const cmap = parseCmapTable(font);

        if (head) {
            this.unitsPerEm = head.unitsPerEm;
        }

        const codeTables: CodeTable[] = [];
        for (const subtable of cmap?.subtables ?? []) {
            if (subtable.data) {
                codeTables.push(new CmapCodeTable(subtable, subtable.data));
            }
        }
        this.codeTables = codeTables;
        this.glyphTable = new GlyfGlyphTable(font, maxp?.numGlyphs ?? 0, head?.indexToLocFormat ?? 0);
    }
}

function wrapParse<T>(tableTag: string, parse: () => T): T {
    try {
        return parse();
    } catch (error) {
        throw new TrueTypeParseError(`Malformed '${tableTag}' table: ${describeError(error)}`, { cause: error });
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

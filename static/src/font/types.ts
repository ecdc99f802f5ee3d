/**
 * Collaborator interfaces consumed by the glyph outline code.
 *
 * Binary font parsing, encodings and CID mappings live behind these so that a
 * TrueType file parsed by `bits/ttf`, a font embedded in a document or a test
 * fixture can all feed the same outline builder.
 */

/** Glyph index into the font's glyph table; 0 means "no glyph" */
export type GlyphIndex = number;

/**
 * One cmap subtable, tagged with its platform and encoding ids
 */
export interface CodeTable {
    readonly platformId: number;
    readonly encodingId: number;
    /** Returns 0 when the code has no mapping */
    glyphIndexForCode(code: number): GlyphIndex;
}

/**
 * Raw outline of one simple glyph, in font units with y growing upwards
 */
export interface GlyphDescription {
    readonly pointCount: number;
    xAt(index: number): number;
    yAt(index: number): number;
    isOnCurve(index: number): boolean;
    /** True when `index` is the last point of some contour */
    isEndOfContour(index: number): boolean;
}

export interface GlyphTable {
    readonly glyphCount: number;
    /** Null when the glyph is absent from the table */
    descriptionAt(glyphId: GlyphIndex): GlyphDescription | null;
}

export interface FontSource {
    /** Absent when the font carries no 'head' table */
    readonly unitsPerEm?: number;
    readonly codeTables: readonly CodeTable[];
    readonly glyphTable: GlyphTable;
}

/**
 * Code to glyph name mapping of a simple (single byte) font
 */
export interface Encoding {
    glyphNameForCode(code: number): string | undefined;
}

export interface FontDescriptor {
    /** Display name, used in log messages */
    readonly baseFont: string;
    readonly symbolic: boolean;
    readonly encoding?: Encoding;
}

/**
 * Glyph name to Unicode lookup. Implementations may throw for names that
 * encode an invalid code point.
 */
export interface GlyphNameTable {
    unicodeForName(name: string): string | undefined;
}

export interface MacRomanTable {
    codeForName(name: string): number | undefined;
}

export type CodeByteWidth = 1 | 2;

/**
 * CMap attached to a CID-keyed font
 */
export interface CIDCMap {
    lookup(code: number, byteWidth: CodeByteWidth): string | undefined;
    hasTwoByteMappings(): boolean;
}

export interface CIDFontDescriptor {
    readonly hasIdentityCidToGidMap: boolean;
    readonly hasCidToGidMap: boolean;
    mapCidToGid(cid: number): GlyphIndex;
    readonly cmap?: CIDCMap;
}

export type {
    CIDCMap,
    CIDFontDescriptor,
    CodeByteWidth,
    CodeTable,
    Encoding,
    FontDescriptor,
    FontSource,
    GlyphDescription,
    GlyphIndex,
    GlyphNameTable,
    GlyphTable,
    MacRomanTable,
} from "./font/types";
export { classifyPoint, describeGlyph, midValue, type GlyphPoint } from "./font/glyph_point";
export {
    PathBuilder,
    clonePath,
    scalingTransform,
    toSvgPathData,
    transformPath,
    type PathCommand,
    type VectorPath,
} from "./font/vector_path";
export { PointPattern, buildOutline, classifyPattern, type OutlineBuildOptions } from "./font/outline_builder";
export { GlyphCache } from "./font/glyph_cache";
export { selectCodeTables, type SelectedCodeTables } from "./font/cmap_selector";
export { CidToGidMode, DEFAULT_SCALING, createFontContext, type FontContext } from "./font/font_context";
export { CodeResolver, SYMBOL_RANGE_STARTS } from "./font/code_resolver";
export { TrueTypeGlyph2D, type Glyph2D, type Glyph2DOptions } from "./font/glyph2d";
export { GlyphList, GlyphNameError } from "./encoding/glyph_list";
export { MacRomanEncoding } from "./encoding/mac_roman";
export { SimpleEncoding } from "./encoding/simple_encoding";
export {
    TrueTypeFontSource,
    TrueTypeParseError,
    loadTrueTypeFont,
    lookupCmapSubtable,
    parseCmapTable,
    parseHeadTable,
    parseMaxpTable,
    parseTrueTypeFont,
    type TTFFont,
} from "./bits/ttf";

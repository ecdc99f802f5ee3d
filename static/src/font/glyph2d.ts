/**
 * Glyph outline access for TrueType fonts.
 *
 * `TrueTypeGlyph2D` turns character codes (or CIDs of CID-keyed fonts) into glyph
 * indices and glyph indices into vector paths scaled to a 1 unit em square. Paths
 * are built on first request and cached per glyph; every call hands out a fresh
 * copy.
 *
 * ### Usage Example
 * ```typescript
 * const font = await loadTrueTypeFont("./fonts/Example-Regular.ttf");
 * const glyphs = new TrueTypeGlyph2D(new TrueTypeFontSource(font), {
 *     baseFont: "Example-Regular",
 *     symbolic: false,
 *     encoding: SimpleEncoding.macRoman(),
 * });
 * const path = glyphs.pathForCharacterCode(0x41);
 * ```
 *
 * Instances are not safe for concurrent use: callers sharing one between workers
 * must serialize access themselves.
 */

import { CodeResolver } from "./code_resolver";
import { createFontContext, DEFAULT_SCALING, type FontContext } from "./font_context";
import { GlyphCache } from "./glyph_cache";
import { describeGlyph } from "./glyph_point";
import { buildOutline } from "./outline_builder";
import { scalingTransform, transformPath, type VectorPath } from "./vector_path";
import type {
    CIDFontDescriptor,
    FontDescriptor,
    FontSource,
    GlyphIndex,
    GlyphNameTable,
    MacRomanTable,
} from "./types";
import { GlyphList } from "../encoding/glyph_list";
import { MacRomanEncoding } from "../encoding/mac_roman";

/**
 * Glyph outline capability of a loaded font
 */
export interface Glyph2D {
    /** Null when the glyph does not exist; a glyph without contours yields an empty path */
    pathForGlyphId(glyphId: GlyphIndex): VectorPath | null;
    pathForCharacterCode(code: number): VectorPath | null;
    numberOfGlyphs(): number;
    dispose(): void;
}

export interface Glyph2DOptions {
    /** CID-keyed fonts: the descendant CID font */
    cidFont?: CIDFontDescriptor;
    /** Scale used when the font has no units per em (default 0.001) */
    defaultScale?: number;
    /** Glyph name to Unicode lookup (default: bundled glyph list) */
    glyphNames?: GlyphNameTable;
    /** Glyph name to Mac Roman code lookup (default: bundled Mac Roman table) */
    macRoman?: MacRomanTable;
}

interface LoadedFont {
    source: FontSource;
    context: FontContext;
    resolver: CodeResolver;
}

export class TrueTypeGlyph2D implements Glyph2D {
    private font: LoadedFont | null;
    private cache = new GlyphCache();

    constructor(source: FontSource, descriptor: FontDescriptor, options: Glyph2DOptions = {}) {
        const context = createFontContext(
            source,
            descriptor,
            options.cidFont ?? null,
            options.defaultScale ?? DEFAULT_SCALING,
        );
        const resolver = new CodeResolver(
            context,
            options.glyphNames ?? GlyphList.shared(),
            options.macRoman ?? MacRomanEncoding.shared(),
        );
        this.font = { source, context, resolver };
    }

    /**
     * Snapshot of the font settings in use, or null once disposed
     */
    get context(): FontContext | null {
        return this.font?.context ?? null;
    }

    pathForGlyphId(glyphId: GlyphIndex): VectorPath | null {
        const cached = this.cache.get(glyphId);
        if (cached) {
            return cached;
        }

        const font = this.font;
        if (!font) {
            console.debug(`Glyph ${glyphId} requested after dispose`);
            return null;
        }

        const glyphTable = font.source.glyphTable;
        const description = Number.isInteger(glyphId) && glyphId >= 0 && glyphId < glyphTable.glyphCount
            ? glyphTable.descriptionAt(glyphId)
            : null;
        if (!description) {
            console.debug(`${font.context.fontName}: Glyph not found: ${glyphId}`);
            return null;
        }

        const outline = buildOutline(describeGlyph(description), {
            fontName: font.context.fontName,
            glyphId,
        });
        const path = transformPath(outline, scalingTransform(font.context.scale));
        this.cache.set(glyphId, path);
        return path;
    }

    pathForCharacterCode(code: number): VectorPath | null {
        const font = this.font;
        if (!font) {
            return null;
        }
        return this.pathForGlyphId(font.resolver.resolveWithFallback(code));
    }

    numberOfGlyphs(): number {
        return this.font ? this.font.source.glyphTable.glyphCount : 0;
    }

    /**
     * Drop the font and every cached path. Safe to call more than once.
     */
    dispose(): void {
        this.font = null;
        this.cache.clear();
    }
}

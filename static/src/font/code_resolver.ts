import { CidToGidMode, type FontContext } from "./font_context";
import type { GlyphIndex, GlyphNameTable, MacRomanTable } from "./types";

/**
 * Private use area blocks symbol fonts place their glyphs in, probed in this order
 * for single byte codes the Windows-Symbol table does not map directly.
 */
export const SYMBOL_RANGE_STARTS = [0xF000, 0xF100, 0xF200] as const;

/**
 * Maps character codes and CIDs to glyph indices of one font
 */
export class CodeResolver {
    private context: FontContext;
    private glyphNames: GlyphNameTable;
    private macRoman: MacRomanTable;

    constructor(context: FontContext, glyphNames: GlyphNameTable, macRoman: MacRomanTable) {
        this.context = context;
        this.glyphNames = glyphNames;
        this.macRoman = macRoman;
    }

    /**
     * Glyph index for a character code, or 0 when no code table maps it.
     * CID-keyed fonts treat the code as a CID.
     */
    resolveSimple(code: number): GlyphIndex {
        const context = this.context;
        if (context.cidKeyed) {
            return this.getGID(code);
        }

        const { windowsUnicode, windowsSymbol, macintoshSymbol } = context.codeTables;

        if (context.encoding && !context.symbolic) {
            const glyphName = context.encoding.glyphNameForCode(code);
            if (glyphName === undefined) {
                return 0;
            }
            if (windowsUnicode) {
                const unicode = this.unicodeForName(glyphName);
                return unicode === undefined ? 0 : windowsUnicode.glyphIndexForCode(unicode);
            }
            if (macintoshSymbol) {
                const macCode = this.macCodeForName(glyphName);
                return macCode === undefined ? 0 : macintoshSymbol.glyphIndexForCode(macCode);
            }
            return 0;
        }

        if (windowsSymbol) {
            let glyphId = windowsSymbol.glyphIndexForCode(code);
            if (code >= 0 && code <= 0xFF) {
                for (const rangeStart of SYMBOL_RANGE_STARTS) {
                    if (glyphId !== 0) {
                        break;
                    }
                    glyphId = windowsSymbol.glyphIndexForCode(code + rangeStart);
                }
            }
            return glyphId;
        }
        if (macintoshSymbol) {
            return macintoshSymbol.glyphIndexForCode(code);
        }
        return 0;
    }

    /**
     * Glyph index for a CID
     */
    getGID(code: number): GlyphIndex {
        const context = this.context;
        switch (context.cidToGidMode) {
        case CidToGidMode.Identity:
            return code;
        case CidToGidMode.ExplicitTable:
            return context.cidFont ? context.cidFont.mapCidToGid(code) : code;
        case CidToGidMode.CMapDerived:
        case CidToGidMode.None:
            return this.lookupCidCMap(code) ?? code;
        }
    }

    /**
     * Like {@link resolveSimple}, but when nothing maps the code the code itself is taken
     * as the glyph index, after consulting the CID CMap if the font has one.
     */
    resolveWithFallback(code: number): GlyphIndex {
        const glyphId = this.resolveSimple(code);
        if (glyphId > 0) {
            return glyphId;
        }
        return this.lookupCidCMap(code) ?? code;
    }

    private lookupCidCMap(code: number): number | null {
        const cmap = this.context.cidCMap;
        if (!cmap) {
            return null;
        }
        const mapped = cmap.lookup(code, this.context.twoByteCodes ? 2 : 1);
        const codePoint = mapped?.codePointAt(0);
        return codePoint ?? null;
    }

    private unicodeForName(glyphName: string): number | undefined {
        try {
            return this.glyphNames.unicodeForName(glyphName)?.codePointAt(0);
        } catch (error) {
            console.error(`${this.context.fontName}: cannot map glyph name "${glyphName}" to unicode: ${describeError(error)}`);
            return undefined;
        }
    }

    private macCodeForName(glyphName: string): number | undefined {
        try {
            return this.macRoman.codeForName(glyphName);
        } catch (error) {
            console.error(`${this.context.fontName}: cannot map glyph name "${glyphName}" to a Mac Roman code: ${describeError(error)}`);
            return undefined;
        }
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

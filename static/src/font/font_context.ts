import { selectCodeTables, type SelectedCodeTables } from "./cmap_selector";
import type { CIDCMap, CIDFontDescriptor, Encoding, FontDescriptor, FontSource } from "./types";

/** Scale applied when the font does not state its units per em */
export const DEFAULT_SCALING = 0.001;

/**
 * How a CID-keyed font turns CIDs into glyph indices
 */
export enum CidToGidMode {
    /** Not a CID-keyed font, or no mapping information at all */
    None = "none",
    Identity = "identity",
    ExplicitTable = "explicit-table",
    CMapDerived = "cmap-derived",
}

/**
 * Everything glyph lookup needs to know about a font, captured once at construction
 */
export interface FontContext {
    readonly fontName: string;
    /** Font units to path units */
    readonly scale: number;
    readonly symbolic: boolean;
    readonly encoding: Encoding | null;
    readonly cidKeyed: boolean;
    readonly cidToGidMode: CidToGidMode;
    readonly cidFont: CIDFontDescriptor | null;
    readonly cidCMap: CIDCMap | null;
    /** True when the CID CMap maps two-byte codes */
    readonly twoByteCodes: boolean;
    readonly codeTables: Readonly<SelectedCodeTables>;
}

export function cidToGidModeOf(cidFont: CIDFontDescriptor | null): CidToGidMode {
    if (!cidFont) {
        return CidToGidMode.None;
    }
    if (cidFont.hasIdentityCidToGidMap) {
        return CidToGidMode.Identity;
    }
    if (cidFont.hasCidToGidMap) {
        return CidToGidMode.ExplicitTable;
    }
    return cidFont.cmap ? CidToGidMode.CMapDerived : CidToGidMode.None;
}

export function createFontContext(
    source: FontSource,
    descriptor: FontDescriptor,
    cidFont: CIDFontDescriptor | null,
    defaultScale: number = DEFAULT_SCALING,
): FontContext {
    const unitsPerEm = source.unitsPerEm;
    const cidCMap = cidFont?.cmap ?? null;

    return Object.freeze({
        fontName: descriptor.baseFont,
        scale: unitsPerEm !== undefined && unitsPerEm > 0 ? 1 / unitsPerEm : defaultScale,
        symbolic: descriptor.symbolic,
        encoding: descriptor.encoding ?? null,
        cidKeyed: cidFont !== null,
        cidToGidMode: cidToGidModeOf(cidFont),
        cidFont,
        cidCMap,
        twoByteCodes: cidCMap ? cidCMap.hasTwoByteMappings() : false,
        codeTables: Object.freeze(selectCodeTables(source.codeTables)),
    });
}

import glyphListData from "./data/glyph_list.json";
import type { GlyphNameTable } from "../font/types";

/**
 * Error thrown for glyph names that spell out an invalid code point
 */
export class GlyphNameError extends Error {
    constructor(glyphName: string, reason: string) {
        super(`Invalid glyph name "${glyphName}": ${reason}`);
        this.name = "GlyphNameError";
    }
}

const UNI_NAME = /^uni((?:[0-9A-F]{4})+)$/;
const U_NAME = /^u([0-9A-F]{4,6})$/;

function isSurrogate(value: number): boolean {
    return value >= 0xD800 && value <= 0xDFFF;
}

/**
 * Glyph name to Unicode mapping.
 *
 * Resolves names from the bundled list, then the `uniXXXX[XXXX...]` and
 * `uXXXX[XX]` spellings, then retries with any `.suffix` variant marker removed
 * (`a.sc` resolves like `a`).
 */
export class GlyphList implements GlyphNameTable {
    private static instance: GlyphList | null = null;

    private unicodeByName = new Map<string, string>();

    /**
     * @param entries - glyph name to hexadecimal code point
     */
    constructor(entries: Readonly<Record<string, string>> = glyphListData) {
        for (const [name, hex] of Object.entries(entries)) {
            this.unicodeByName.set(name, String.fromCodePoint(parseInt(hex, 16)));
        }
    }

    /**
     * Instance over the bundled list, created on first use
     */
    static shared(): GlyphList {
        if (!GlyphList.instance) {
            GlyphList.instance = new GlyphList();
        }
        return GlyphList.instance;
    }

    get size(): number {
        return this.unicodeByName.size;
    }

    unicodeForName(glyphName: string): string | undefined {
        const listed = this.unicodeByName.get(glyphName);
        if (listed !== undefined) {
            return listed;
        }

        const uni = UNI_NAME.exec(glyphName);
        if (uni) {
            const values: number[] = [];
            for (let i = 0; i < uni[1].length; i += 4) {
                const value = parseInt(uni[1].substring(i, i + 4), 16);
                if (isSurrogate(value)) {
                    throw new GlyphNameError(glyphName, `surrogate code unit ${uni[1].substring(i, i + 4)}`);
                }
                values.push(value);
            }
            return String.fromCodePoint(...values);
        }

        const u = U_NAME.exec(glyphName);
        if (u) {
            const value = parseInt(u[1], 16);
            if (value > 0x10FFFF || isSurrogate(value)) {
                throw new GlyphNameError(glyphName, `code point ${u[1]} is outside the Unicode range`);
            }
            return String.fromCodePoint(value);
        }

        const dot = glyphName.indexOf(".");
        if (dot > 0) {
            return this.unicodeForName(glyphName.substring(0, dot));
        }
        return undefined;
    }
}

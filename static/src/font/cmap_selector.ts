import type { CodeTable } from "./types";

export const PLATFORM_MACINTOSH = 1;
export const PLATFORM_WINDOWS = 3;

export const ENCODING_SYMBOL = 0;
export const ENCODING_UNICODE = 1;

/**
 * The code tables glyph lookup works with, by role
 */
export interface SelectedCodeTables {
    windowsUnicode: CodeTable | null;
    windowsSymbol: CodeTable | null;
    macintoshSymbol: CodeTable | null;
}

/**
 * Sort a font's code tables into the Windows-Unicode (3,1), Windows-Symbol (3,0) and
 * Macintosh-Symbol (1,0) roles. Tables on other platforms or encodings are ignored;
 * a repeated (platform, encoding) pair keeps the last table listed.
 */
export function selectCodeTables(tables: readonly CodeTable[]): SelectedCodeTables {
    const selected: SelectedCodeTables = {
        windowsUnicode: null,
        windowsSymbol: null,
        macintoshSymbol: null,
    };

    for (const table of tables) {
        if (table.platformId === PLATFORM_WINDOWS) {
            if (table.encodingId === ENCODING_UNICODE) {
                selected.windowsUnicode = table;
            } else if (table.encodingId === ENCODING_SYMBOL) {
                selected.windowsSymbol = table;
            }
        } else if (table.platformId === PLATFORM_MACINTOSH && table.encodingId === ENCODING_SYMBOL) {
            selected.macintoshSymbol = table;
        }
    }

    return selected;
}

import macRomanData from "./data/mac_roman.json";
import type { Encoding, MacRomanTable } from "../font/types";

/**
 * Mac OS Roman character set: single byte code to glyph name and back.
 * Names listed under several codes map back to the lowest one.
 */
export class MacRomanEncoding implements Encoding, MacRomanTable {
    private static instance: MacRomanEncoding | null = null;

    private nameByCode = new Map<number, string>();
    private codeByName = new Map<string, number>();

    constructor(entries: Readonly<Record<string, string>> = macRomanData) {
        const codes = Object.keys(entries).map(Number).sort((a, b) => a - b);
        for (const code of codes) {
            const name = entries[String(code)];
            this.nameByCode.set(code, name);
            if (!this.codeByName.has(name)) {
                this.codeByName.set(name, code);
            }
        }
    }

    static shared(): MacRomanEncoding {
        if (!MacRomanEncoding.instance) {
            MacRomanEncoding.instance = new MacRomanEncoding();
        }
        return MacRomanEncoding.instance;
    }

    glyphNameForCode(code: number): string | undefined {
        return this.nameByCode.get(code);
    }

    codeForName(glyphName: string): number | undefined {
        return this.codeByName.get(glyphName);
    }

    /**
     * All code to name pairs, in code order
     */
    entries(): [number, string][] {
        return Array.from(this.nameByCode.entries());
    }
}

import { MacRomanEncoding } from "./mac_roman";
import type { Encoding } from "../font/types";

/**
 * Code to glyph name table of a simple font: a base encoding with optional
 * per-code overrides.
 */
export class SimpleEncoding implements Encoding {
    private names: Map<number, string>;

    constructor(names: Iterable<[number, string]> = []) {
        this.names = new Map(names);
    }

    /**
     * Mac OS Roman as a simple font encoding
     */
    static macRoman(): SimpleEncoding {
        return new SimpleEncoding(MacRomanEncoding.shared().entries());
    }

    /**
     * Apply a differences array: a code followed by the names of consecutive codes
     * starting there, e.g. `[65, "Alpha", "Beta", 128, "Euro"]`.
     */
    static withDifferences(base: SimpleEncoding, differences: readonly (number | string)[]): SimpleEncoding {
        const encoding = new SimpleEncoding(base.names);
        let code = 0;
        for (const item of differences) {
            if (typeof item === "number") {
                code = item;
            } else {
                encoding.names.set(code, item);
                code++;
            }
        }
        return encoding;
    }

    glyphNameForCode(code: number): string | undefined {
        return this.names.get(code);
    }
}

import { clonePath, type VectorPath } from "./vector_path";
import type { GlyphIndex } from "./types";

/**
 * Glyph path memo keyed by glyph index.
 * Paths are copied on the way in and on the way out, so an entry never changes
 * once written no matter what callers do with the paths they receive.
 */
export class GlyphCache {
    private paths = new Map<GlyphIndex, VectorPath>();

    get(glyphId: GlyphIndex): VectorPath | null {
        const cached = this.paths.get(glyphId);
        return cached ? clonePath(cached) : null;
    }

    set(glyphId: GlyphIndex, path: VectorPath): void {
        this.paths.set(glyphId, clonePath(path));
    }

    has(glyphId: GlyphIndex): boolean {
        return this.paths.has(glyphId);
    }

    clear(): void {
        this.paths.clear();
    }

    get size(): number {
        return this.paths.size;
    }
}

import type { GlyphDescription } from "./types";

/**
 * Classified outline point in path space (y grows downwards)
 */
export interface GlyphPoint {
    readonly x: number;
    readonly y: number;
    /** True for points on the outline, false for quadratic control points */
    readonly onCurve: boolean;
    /** True for the last point of a contour */
    readonly endOfContour: boolean;
}

/**
 * Build a point from raw font-unit values, flipping y into path space
 */
export function classifyPoint(x: number, y: number, onCurve: boolean, endOfContour: boolean): GlyphPoint {
    return Object.freeze({
        x,
        // + 0 keeps a source y of 0 from turning into -0
        y: -y + 0,
        onCurve,
        endOfContour,
    });
}

/**
 * Classify every point of a glyph description, in order
 */
export function describeGlyph(description: GlyphDescription): GlyphPoint[] {
    const points: GlyphPoint[] = [];
    for (let i = 0; i < description.pointCount; i++) {
        points.push(classifyPoint(
            description.xAt(i),
            description.yAt(i),
            description.isOnCurve(i),
            description.isEndOfContour(i),
        ));
    }
    return points;
}

/**
 * Integer midpoint, truncating the half step towards `a`
 */
export function midValue(a: number, b: number): number {
    return a + Math.trunc((b - a) / 2);
}

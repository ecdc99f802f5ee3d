/**
 * TrueType contour points to quadratic path reconstruction.
 *
 * TrueType outlines consist of on-curve points and off-curve control points. Two
 * consecutive off-curve points imply an on-curve point halfway between them, and a
 * contour closes back to its first point. The walk below consumes the points of all
 * contours of a glyph in one pass; contours are delimited only by the
 * `endOfContour` flag baked into each point, and lookahead past the last point
 * wraps around to the first.
 */

import { midValue, type GlyphPoint } from "./glyph_point";
import { PathBuilder, type VectorPath } from "./vector_path";

/**
 * On/off-curve pattern of the current point and the one or two points after it
 */
export enum PointPattern {
    /** on, on */
    Line = "line",
    /** on, off, on */
    Quad = "quad",
    /** on, off, off: the curve ends on the implied midpoint of the two controls */
    QuadToImpliedPoint = "quad-to-implied-point",
    /** off, off: both the control and the end point of the segment are synthesized */
    ImpliedControl = "implied-control",
    /** off, on */
    OffOn = "off-on",
}

export function classifyPattern(point: GlyphPoint, next1: GlyphPoint, next2: GlyphPoint): PointPattern {
    if (point.onCurve) {
        if (next1.onCurve) {
            return PointPattern.Line;
        }
        return next2.onCurve ? PointPattern.Quad : PointPattern.QuadToImpliedPoint;
    }
    return next1.onCurve ? PointPattern.OffOn : PointPattern.ImpliedControl;
}

type WalkState =
    | { kind: "awaiting-contour-start" }
    | { kind: "in-contour"; start: GlyphPoint; lastControlPoint: ControlPoint | null };

interface ControlPoint {
    x: number;
    y: number;
}

export interface OutlineBuildOptions {
    /** Name used in log messages */
    fontName?: string;
    glyphId?: number;
}

/**
 * Reconstruct the path of one glyph from its classified points.
 * A point sequence that matches no reconstruction rule is logged and the path built
 * up to that point is returned.
 */
export function buildOutline(points: readonly GlyphPoint[], options: OutlineBuildOptions = {}): VectorPath {
    const path = new PathBuilder();
    const count = points.length;
    let state: WalkState = { kind: "awaiting-contour-start" };
    let i = 0;

    while (i < count) {
        const point = points[i];
        const next1 = points[(i + 1) % count];
        const next2 = points[(i + 2) % count];

        if (state.kind === "awaiting-contour-start") {
            // a lone end marker is the closing point of the previous contour
            if (point.endOfContour) {
                i++;
                continue;
            }
            path.moveTo(point.x, point.y);
            state = { kind: "in-contour", start: point, lastControlPoint: null };
        }

        const start: GlyphPoint = state.start;
        let closes = false;

        switch (classifyPattern(point, next1, next2)) {
        case PointPattern.Line:
            path.lineTo(next1.x, next1.y);
            closes = point.endOfContour || next1.endOfContour;
            i += 1;
            break;

        case PointPattern.Quad:
            if (next1.endOfContour) {
                path.quadTo(next1.x, next1.y, start.x, start.y);
            } else {
                path.quadTo(next1.x, next1.y, next2.x, next2.y);
            }
            closes = point.endOfContour || next1.endOfContour || next2.endOfContour;
            state.lastControlPoint = next1;
            i += 2;
            break;

        case PointPattern.QuadToImpliedPoint:
            path.quadTo(next1.x, next1.y, midValue(next1.x, next2.x), midValue(next1.y, next2.y));
            closes = point.endOfContour || next1.endOfContour || next2.endOfContour;
            if (closes) {
                path.quadTo(next2.x, next2.y, start.x, start.y);
            }
            state.lastControlPoint = next1;
            i += 2;
            break;

        case PointPattern.ImpliedControl: {
            const lastControl = state.lastControlPoint;
            const current = path.currentPoint();
            if (lastControl === null || current === null) {
                console.error(
                    `${options.fontName ?? "font"}: glyph ${options.glyphId ?? "?"} has consecutive off-curve points ` +
                    `at index ${i} with no preceding control point, outline truncated`,
                );
                return path.build();
            }
            const endX = Math.trunc(current[0]);
            const endY = Math.trunc(current[1]);
            const control = { x: midValue(lastControl.x, endX), y: midValue(lastControl.y, endY) };
            path.quadTo(control.x, control.y, midValue(endX, next1.x), midValue(endY, next1.y));
            closes = point.endOfContour || next1.endOfContour;
            state.lastControlPoint = control;
            i += 1;
            break;
        }

        case PointPattern.OffOn:
            path.quadTo(point.x, point.y, next1.x, next1.y);
            closes = point.endOfContour || next1.endOfContour;
            state.lastControlPoint = point;
            i += 1;
            break;
        }

        if (closes) {
            path.closePath();
            state = { kind: "awaiting-contour-start" };
        }
    }

    return path.build();
}

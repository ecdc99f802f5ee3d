import { mat2d, vec2, type ReadonlyMat2d } from "gl-matrix";

export interface MoveToCommand {
    type: "moveTo";
    x: number;
    y: number;
}

export interface LineToCommand {
    type: "lineTo";
    x: number;
    y: number;
}

/**
 * Quadratic Bézier segment from the current point through control (cx, cy) to (x, y)
 */
export interface QuadToCommand {
    type: "quadTo";
    cx: number;
    cy: number;
    x: number;
    y: number;
}

export interface ClosePathCommand {
    type: "closePath";
}

export type PathCommand = MoveToCommand | LineToCommand | QuadToCommand | ClosePathCommand;

/**
 * Resolution independent outline of one glyph
 */
export interface VectorPath {
    commands: PathCommand[];
}

/**
 * Accumulates path commands and tracks the current point the way a 2D canvas path does:
 * closing a subpath moves the current point back to the subpath's start.
 */
export class PathBuilder {
    private commands: PathCommand[] = [];
    private current: [number, number] | null = null;
    private subpathStart: [number, number] | null = null;

    moveTo(x: number, y: number): void {
        this.commands.push({ type: "moveTo", x, y });
        this.current = [x, y];
        this.subpathStart = [x, y];
    }

    lineTo(x: number, y: number): void {
        this.commands.push({ type: "lineTo", x, y });
        this.current = [x, y];
    }

    quadTo(cx: number, cy: number, x: number, y: number): void {
        this.commands.push({ type: "quadTo", cx, cy, x, y });
        this.current = [x, y];
    }

    closePath(): void {
        this.commands.push({ type: "closePath" });
        this.current = this.subpathStart;
    }

    /**
     * End point of the last command, or null before the first moveTo
     */
    currentPoint(): readonly [number, number] | null {
        return this.current;
    }

    build(): VectorPath {
        return { commands: this.commands.slice() };
    }
}

/**
 * Deep copy; the copy shares no objects with the original
 */
export function clonePath(path: VectorPath): VectorPath {
    return { commands: path.commands.map((command) => ({ ...command })) };
}

/**
 * Uniform scale as a 2D affine matrix.
 * Plain arrays keep full double precision (gl-matrix's own constructors allocate Float32Arrays).
 */
export function scalingTransform(scale: number): mat2d {
    const out: mat2d = [1, 0, 0, 1, 0, 0];
    return mat2d.fromScaling(out, [scale, scale]);
}

function transformPoint(m: ReadonlyMat2d, x: number, y: number): [number, number] {
    const out: [number, number] = [0, 0];
    vec2.transformMat2d(out, [x, y], m);
    return out;
}

/**
 * Apply an affine transform to every coordinate, returning a new path
 */
export function transformPath(path: VectorPath, m: ReadonlyMat2d): VectorPath {
    const commands = path.commands.map((command): PathCommand => {
        switch (command.type) {
        case "moveTo":
        case "lineTo": {
            const [x, y] = transformPoint(m, command.x, command.y);
            return { type: command.type, x, y };
        }
        case "quadTo": {
            const [cx, cy] = transformPoint(m, command.cx, command.cy);
            const [x, y] = transformPoint(m, command.x, command.y);
            return { type: "quadTo", cx, cy, x, y };
        }
        case "closePath":
            return { type: "closePath" };
        }
    });
    return { commands };
}

/**
 * Serialize as SVG path data, e.g. `M0 0 L0 -1 Q1 -1 1 0 Z`
 */
export function toSvgPathData(path: VectorPath): string {
    return path.commands.map((command) => {
        switch (command.type) {
        case "moveTo":
            return `M${command.x} ${command.y}`;
        case "lineTo":
            return `L${command.x} ${command.y}`;
        case "quadTo":
            return `Q${command.cx} ${command.cy} ${command.x} ${command.y}`;
        case "closePath":
            return "Z";
        }
    }).join(" ");
}

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import {
    getTableData,
    loadTrueTypeFont,
    lookupCmapSubtable,
    parseCmapTable,
    parseHeadTable,
    parseMaxpTable,
    parseTrueTypeFont,
    TrueTypeFontSource,
    TrueTypeParseError,
    type TTFFont,
} from "../../../../static/src/bits/ttf";
import { TrueTypeGlyph2D } from "../../../../static/src/font/glyph2d";
import type { PathCommand } from "../../../../static/src/font/vector_path";
import { SimpleEncoding } from "../../../../static/src/encoding/simple_encoding";
import { off, on } from "../fixtures/fake_font";
import {
    buildTrueTypeFont,
    ByteWriter,
    cmapFormat0,
    cmapFormat4,
    cmapFormat6,
    type FontSpec,
} from "../fixtures/font_builder";

const M = (x: number, y: number): PathCommand => ({ type: "moveTo", x, y });
const L = (x: number, y: number): PathCommand => ({ type: "lineTo", x, y });
const Q = (cx: number, cy: number, x: number, y: number): PathCommand => ({ type: "quadTo", cx, cy, x, y });
const Z: PathCommand = { type: "closePath" };

const cmapFormat12 = new ByteWriter()
    .u16(12).u16(0).u32(28).u32(0).u32(1)
    .u32(0x1F600).u32(0x1F601).u32(2)
    .bytes;

function testFont(longLoca: boolean = false): FontSpec {
    return {
        unitsPerEm: 2048,
        longLoca,
        glyphs: [
            [],
            [[on(0, 0), on(0, 1024), on(1024, 1024), on(1024, 0)]],
            [[on(0, 0), off(512, 2048), on(1024, 0)]],
            [[on(10, 20), on(110, 20), on(60, 220)]],
            [[on(1, 1), on(2, 2), on(3, 3), on(4, 1)]],
            "composite",
        ],
        cmaps: [
            {
                platformId: 3,
                encodingId: 1,
                subtable: cmapFormat4([
                    { start: 0x41, end: 0x41, delta: 1 - 0x41 },
                    { start: 0x42, end: 0x43, glyphIds: [2, 3] },
                ]),
            },
            { platformId: 1, encodingId: 0, subtable: cmapFormat0({ 65: 4 }) },
            { platformId: 3, encodingId: 0, subtable: cmapFormat6(0xF041, [2]) },
            { platformId: 0, encodingId: 3, subtable: [0, 2, 0, 6, 0, 0] },
            { platformId: 3, encodingId: 10, subtable: cmapFormat12 },
        ],
    };
}

describe("parseTrueTypeFont", () => {
    let font: TTFFont;

    beforeAll(() => {
        font = parseTrueTypeFont(buildTrueTypeFont(testFont()));
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    test("reads the table directory", () => {
        expect(font.header).toEqual({ sfntVersion: 0x00010000, numTables: 5 });
        expect(Array.from(font.tables.keys())).toEqual(["cmap", "glyf", "head", "loca", "maxp"]);
        expect(getTableData(font, "head")?.byteLength).toBe(54);
        expect(getTableData(font, "kern")).toBeNull();
    });

    test("accepts an ArrayBuffer", () => {
        const bytes = buildTrueTypeFont(testFont());
        expect(parseTrueTypeFont(bytes.buffer).tables.size).toBe(5);
    });

    test("head and maxp", () => {
        expect(parseHeadTable(font)).toEqual({
            unitsPerEm: 2048,
            xMin: 0,
            yMin: 0,
            xMax: 0,
            yMax: 0,
            indexToLocFormat: 0,
        });
        expect(parseMaxpTable(font)).toEqual({ version: 0x00005000, numGlyphs: 6 });
    });

    test("cmap subtables of every supported format", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const cmap = parseCmapTable(font);

        expect(cmap?.subtables.map((subtable) => subtable.format)).toEqual([4, 0, 6, 2, 12]);
        expect(warn).toHaveBeenCalledWith("Skipping cmap subtable (0, 3): format 2 not supported");

        const [format4, format0, format6, format2, format12] = cmap?.subtables ?? [];
        expect(format2.data).toBeNull();
        if (!format4.data || !format0.data || !format6.data || !format12.data) {
            throw new Error("expected parsed subtables");
        }
        expect(lookupCmapSubtable(format4.data, 0x41)).toBe(1);
        expect(lookupCmapSubtable(format4.data, 0x42)).toBe(2);
        expect(lookupCmapSubtable(format4.data, 0x43)).toBe(3);
        expect(lookupCmapSubtable(format4.data, 0x44)).toBe(0);
        expect(lookupCmapSubtable(format4.data, 0xFFFF)).toBe(0);
        expect(lookupCmapSubtable(format0.data, 65)).toBe(4);
        expect(lookupCmapSubtable(format0.data, 300)).toBe(0);
        expect(lookupCmapSubtable(format6.data, 0xF041)).toBe(2);
        expect(lookupCmapSubtable(format6.data, 0x41)).toBe(0);
        expect(lookupCmapSubtable(format12.data, 0x1F601)).toBe(3);
        expect(lookupCmapSubtable(format12.data, 0x1F602)).toBe(0);
    });
});

describe("parseTrueTypeFont errors", () => {
    test("files shorter than the offset table", () => {
        expect(() => parseTrueTypeFont(new Uint8Array(8))).toThrow("TTF file too small - missing header");
    });

    test("unknown sfnt version", () => {
        const bytes = new ByteWriter().tag("OTTO").u16(0).u16(0).u16(0).u16(0).bytes;
        expect(() => parseTrueTypeFont(new Uint8Array(bytes))).toThrow(
            "Invalid TTF magic number: 0x4f54544f (expected 0x00010000)",
        );
    });

    test("table directory cut short", () => {
        const bytes = new ByteWriter().u32(0x00010000).u16(2).u16(0).u16(0).u16(0).bytes;
        expect(() => parseTrueTypeFont(new Uint8Array(bytes))).toThrow(
            "TTF file too small - expected at least 44 bytes for 2 tables, got 12",
        );
    });

    test("table running past the end of the file", () => {
        const bytes = new ByteWriter()
            .u32(0x00010000).u16(1).u16(0).u16(0).u16(0)
            .tag("head").u32(0).u32(28).u32(100)
            .bytes;
        expect(() => parseTrueTypeFont(new Uint8Array(bytes))).toThrow(TrueTypeParseError);
        expect(() => parseTrueTypeFont(new Uint8Array(bytes))).toThrow("Table 'head' extends past the end of the file");
    });

    test("truncated head table", () => {
        const bytes = new ByteWriter()
            .u32(0x00010000).u16(1).u16(0).u16(0).u16(0)
            .tag("head").u32(0).u32(28).u32(10)
            .append(new Array<number>(10).fill(0))
            .bytes;
        const font = parseTrueTypeFont(new Uint8Array(bytes));

        expect(() => parseHeadTable(font)).toThrow(/^Malformed 'head' table: Not enough bytes/);
    });
});

describe("loadTrueTypeFont", () => {
    test("reads a font file from disk", async () => {
        const directory = await mkdtemp(join(tmpdir(), "ttf-"));
        try {
            const path = join(directory, "test.ttf");
            await writeFile(path, buildTrueTypeFont(testFont()));

            const font = await loadTrueTypeFont(path);
            expect(font.header.numTables).toBe(5);
        } finally {
            await rm(directory, { recursive: true, force: true });
        }
    });

    test("missing files are reported as parse errors", async () => {
        await expect(loadTrueTypeFont(join(tmpdir(), "no-such-font.ttf"))).rejects.toThrow(/^Failed to read TTF file from /);
        await expect(loadTrueTypeFont(join(tmpdir(), "no-such-font.ttf"))).rejects.toBeInstanceOf(TrueTypeParseError);
    });
});

describe("TrueTypeFontSource", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    function sourceOf(longLoca: boolean = false): TrueTypeFontSource {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        return new TrueTypeFontSource(parseTrueTypeFont(buildTrueTypeFont(testFont(longLoca))));
    }

    test("exposes units per em, glyph count and readable code tables", () => {
        const source = sourceOf();

        expect(source.unitsPerEm).toBe(2048);
        expect(source.glyphTable.glyphCount).toBe(6);
        expect(source.codeTables.map((table) => [table.platformId, table.encodingId])).toEqual([
            [3, 1], [1, 0], [3, 0], [3, 10],
        ]);
        expect(source.codeTables[0].glyphIndexForCode(0x42)).toBe(2);
    });

    test("decodes flag repeats and short vectors", () => {
        const glyph = sourceOf().glyphTable.descriptionAt(4);

        expect(glyph?.pointCount).toBe(4);
        expect([0, 1, 2, 3].map((i) => [glyph?.xAt(i), glyph?.yAt(i)])).toEqual([[1, 1], [2, 2], [3, 3], [4, 1]]);
        expect([0, 1, 2, 3].map((i) => glyph?.isOnCurve(i))).toEqual([true, true, true, true]);
        expect([0, 1, 2, 3].map((i) => glyph?.isEndOfContour(i))).toEqual([false, false, false, true]);
    });

    test("decodes long coordinates and off-curve flags", () => {
        const glyph = sourceOf().glyphTable.descriptionAt(2);

        expect([0, 1, 2].map((i) => [glyph?.xAt(i), glyph?.yAt(i)])).toEqual([[0, 0], [512, 2048], [1024, 0]]);
        expect([0, 1, 2].map((i) => glyph?.isOnCurve(i))).toEqual([true, false, true]);
    });

    test("empty glyphs have no points", () => {
        expect(sourceOf().glyphTable.descriptionAt(0)?.pointCount).toBe(0);
    });

    test("composite glyphs are not read", () => {
        const source = sourceOf();
        expect(source.glyphTable.descriptionAt(5)).toBeNull();
        expect(console.warn).toHaveBeenCalledWith("Composite glyph (glyph ID: 5) not supported");
    });

    test("glyphs outside the table are absent", () => {
        expect(sourceOf().glyphTable.descriptionAt(6)).toBeNull();
    });

    test("long loca offsets read the same glyphs", () => {
        const glyph = sourceOf(true).glyphTable.descriptionAt(3);
        expect([0, 1, 2].map((i) => [glyph?.xAt(i), glyph?.yAt(i)])).toEqual([[10, 20], [110, 20], [60, 220]]);
    });

    test("a font without tables has no glyphs", () => {
        const bytes = new ByteWriter().u32(0x00010000).u16(0).u16(0).u16(0).u16(0).bytes;
        const source = new TrueTypeFontSource(parseTrueTypeFont(new Uint8Array(bytes)));

        expect(source.unitsPerEm).toBeUndefined();
        expect(source.codeTables).toEqual([]);
        expect(source.glyphTable.glyphCount).toBe(0);
    });
});

describe("TrueTypeGlyph2D over a parsed font", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    function glyphsOf(symbolic: boolean): TrueTypeGlyph2D {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        vi.spyOn(console, "debug").mockImplementation(() => {});
        const source = new TrueTypeFontSource(parseTrueTypeFont(buildTrueTypeFont(testFont())));
        return new TrueTypeGlyph2D(
            source,
            symbolic
                ? { baseFont: "Fixture", symbolic: true }
                : { baseFont: "Fixture", symbolic: false, encoding: SimpleEncoding.macRoman() },
        );
    }

    test("glyph outlines scaled by units per em", () => {
        const glyphs = glyphsOf(true);

        expect(glyphs.numberOfGlyphs()).toBe(6);
        expect(glyphs.pathForGlyphId(0)?.commands).toEqual([]);
        expect(glyphs.pathForGlyphId(1)?.commands).toEqual([M(0, 0), L(0, -0.5), L(0.5, -0.5), L(0.5, 0), Z]);
        expect(glyphs.pathForGlyphId(2)?.commands).toEqual([M(0, 0), Q(0.25, -1, 0.5, 0), Z]);
        expect(glyphs.pathForGlyphId(3)?.commands).toEqual([
            M(10 / 2048, -20 / 2048),
            L(110 / 2048, -20 / 2048),
            L(60 / 2048, -220 / 2048),
            Z,
        ]);
        expect(glyphs.pathForGlyphId(5)).toBeNull();
    });

    test("symbolic codes find glyphs in the private use area", () => {
        expect(glyphsOf(true).pathForCharacterCode(0x41)?.commands).toEqual([M(0, 0), Q(0.25, -1, 0.5, 0), Z]);
    });

    test("encoded codes go through glyph names", () => {
        expect(glyphsOf(false).pathForCharacterCode(0x43)?.commands).toEqual([
            M(10 / 2048, -20 / 2048),
            L(110 / 2048, -20 / 2048),
            L(60 / 2048, -220 / 2048),
            Z,
        ]);
    });
});

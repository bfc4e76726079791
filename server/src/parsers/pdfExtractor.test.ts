import fs from "fs/promises";
import path from "path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { DocumentReadError } from "../errors";
import { makeTempDir, makeTextPdf } from "../testing/fixtures";
import {
    buildPageText,
    detectTablesFromItems,
    extractDocument,
    isScannedPage,
    type PageRenderer,
} from "./pdfExtractor";

describe("buildPageText", () => {
    it("orders lines top-down and items left-to-right", () => {
        const text = buildPageText([
            { text: "DOB:", x: 50, y: 700 },
            { text: "Patient:", x: 50, y: 720 },
            { text: "Jane Doe", x: 120, y: 720.5 },
            { text: "01/02/1980", x: 100, y: 700 },
        ]);
        expect(text).toBe("Patient: Jane Doe\nDOB: 01/02/1980");
    });

    it("returns an empty string for a page without items", () => {
        expect(buildPageText([])).toBe("");
    });
});

describe("isScannedPage", () => {
    it("flags pages below the character threshold", () => {
        expect(isScannedPage("   page 1   ", 50)).toBe(true);
        expect(isScannedPage("x".repeat(50), 50)).toBe(false);
    });
});

describe("detectTablesFromItems", () => {
    it("groups consecutive aligned rows into a table", () => {
        const row = (y: number, cells: string[]) => cells.map((text, i) => ({ text, x: 50 + i * 150, y }));
        const items = [
            ...row(700, ["Code", "Description", "Units"]),
            ...row(680, ["99213", "Office visit", "1"]),
            ...row(660, ["97110", "Therapeutic exercise", "8"]),
            ...row(640, ["Signed by the referring provider"]),
        ];

        expect(detectTablesFromItems(items, 1)).toEqual([
            {
                pageNumber: 1,
                rows: [
                    ["Code", "Description", "Units"],
                    ["99213", "Office visit", "1"],
                    ["97110", "Therapeutic exercise", "8"],
                ],
            },
        ]);
    });

    it("ignores a single multi-cell line", () => {
        const items = [
            { text: "Name:", x: 50, y: 700 },
            { text: "Jane Doe", x: 120, y: 700 },
            { text: "Referral for physical therapy", x: 50, y: 600 },
        ];
        expect(detectTablesFromItems(items, 1)).toEqual([]);
    });
});

describe("extractDocument", () => {
    let dir: string;

    beforeAll(async () => {
        dir = await makeTempDir("pa-extract-");
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    const options = { minPageChars: 10, renderScannedPages: false, dpi: 72 };

    it("reads page text and flags pages without text as scanned", async () => {
        const filePath = path.join(dir, "referral_package.pdf");
        await fs.writeFile(filePath, await makeTextPdf([["Patient: Jane Doe, DOB: 01/02/1980"], []]));

        const content = await extractDocument(filePath, options);

        expect(content.pageCount).toBe(2);
        expect(content.pages[0].text).toContain("Jane Doe");
        expect(content.pages[0].scanned).toBe(false);
        expect(content.pages[1].text).toBe("");
        expect(content.pages[1].scanned).toBe(true);
        expect(content.pages[1].image).toBeNull();
        expect(content.fullText).toContain("DOB: 01/02/1980");
        expect(content.contentHash).toMatch(/^[0-9a-f]{16}$/);
        expect(content.warnings).toEqual([]);
    });

    it("attaches rendered images to scanned pages only", async () => {
        const filePath = path.join(dir, "mixed.pdf");
        await fs.writeFile(filePath, await makeTextPdf([["Patient: Jane Doe, DOB: 01/02/1980"], []]));
        const requested: number[][] = [];
        const renderer: PageRenderer = async (_data, pageNumbers) => {
            requested.push(Array.from(pageNumbers));
            return new Map([[2, new Uint8Array([0x89, 0x50, 0x4e, 0x47])]]);
        };

        const content = await extractDocument(filePath, { ...options, renderScannedPages: true }, renderer);

        expect(requested).toEqual([[2]]);
        expect(content.pages[0].image).toBeNull();
        expect(content.pages[1].image).toEqual(new Uint8Array([0x89, 0x50, 0x4e, 0x47]));
        expect(content.warnings).toEqual([]);
    });

    it("records a warning when scanned pages cannot be rendered", async () => {
        const filePath = path.join(dir, "scanned.pdf");
        await fs.writeFile(filePath, await makeTextPdf([[], []]));
        const failing: PageRenderer = async () => {
            throw new Error("canvas unavailable");
        };

        const content = await extractDocument(filePath, { ...options, renderScannedPages: true }, failing);

        expect(content.pages.map(p => p.image)).toEqual([null, null]);
        expect(content.warnings).toEqual([
            "Page rendering failed: canvas unavailable",
            "No image for low-text page(s) 1, 2 of scanned.pdf",
        ]);
    });

    it("fails with DocumentReadError for a missing file", async () => {
        await expect(extractDocument(path.join(dir, "absent.pdf"), options)).rejects.toBeInstanceOf(DocumentReadError);
    });

    it("fails with DocumentReadError for a file that is not a PDF", async () => {
        const filePath = path.join(dir, "notes.pdf");
        await fs.writeFile(filePath, "Patient notes, plain text");
        await expect(extractDocument(filePath, options)).rejects.toBeInstanceOf(DocumentReadError);
    });
});

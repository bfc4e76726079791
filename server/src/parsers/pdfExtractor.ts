/**
 * PDF Document Extractor
 *
 * Two-pass extraction:
 * 1. Native text extraction via pdfjs-dist, rebuilt line by line
 * 2. Pages with a low text yield are treated as scanned and rendered to PNG
 *    with pdfjs-dist on @napi-rs/canvas, for downstream vision extraction
 *
 * @module pdfExtractor
 */

import type { Canvas, SKRSContext2D } from "@napi-rs/canvas";
import { createHash } from "crypto";
import { readFile } from "fs/promises";
import path from "path";
import type { DocumentContent, PageContent, PageTable } from "@shared/schema";
import { DocumentReadError, errorMessage } from "../errors";
import { createLogger } from "../logger";

const logger = createLogger("pdfExtractor");

type PdfJs = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
type NapiCanvas = typeof import("@napi-rs/canvas");

let pdfjsLib: PdfJs | null = null;
let napiCanvas: NapiCanvas | null = null;

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExtractOptions {
    /** Pages whose trimmed text is shorter than this count as scanned */
    minPageChars: number;
    /** Render scanned pages to PNG for vision extraction */
    renderScannedPages: boolean;
    dpi: number;
}

/** Renders the given 1-based pages to PNG. Throws when rendering is unavailable. */
export type PageRenderer = (data: Uint8Array, pageNumbers: ReadonlySet<number>, dpi: number) => Promise<Map<number, Uint8Array>>;

export interface DocumentExtractor {
    extract(filePath: string, options: ExtractOptions): Promise<DocumentContent>;
}

export interface PDFTextItem {
    text: string;
    x: number;
    y: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

async function loadPdfJs(): Promise<PdfJs> {
    if (!pdfjsLib) {
        pdfjsLib = await import("pdfjs-dist/legacy/build/pdf.mjs");
        logger.debug("PDF.js initialized");
    }
    return pdfjsLib;
}

async function loadCanvas(): Promise<NapiCanvas> {
    if (!napiCanvas) {
        napiCanvas = await import("@napi-rs/canvas");
        logger.debug("@napi-rs/canvas initialized");
    }
    return napiCanvas;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extracts per-page text, tables and (for scanned pages) rendered images.
 * Pages that could not be rendered keep `image: null` and are listed in
 * `warnings`.
 *
 * @throws DocumentReadError if the file cannot be read or is not a valid PDF
 */
export async function extractDocument(
    filePath: string,
    options: ExtractOptions,
    renderer: PageRenderer = renderPagesWithCanvas
): Promise<DocumentContent> {
    let buffer: Buffer;
    try {
        buffer = await readFile(filePath);
    } catch (error) {
        throw new DocumentReadError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
    }

    if (buffer.subarray(0, 5).toString("latin1") !== "%PDF-") {
        throw new DocumentReadError(`${filePath} is not a PDF file`, filePath);
    }

    const contentHash = createHash("sha256").update(buffer).digest("hex").slice(0, 16);
    const pdfjs = await loadPdfJs();

    let pages: PageContent[];
    try {
        const pdfDoc = await pdfjs.getDocument({
            data: new Uint8Array(buffer),
            useSystemFonts: true,
            disableFontFace: true,
            isEvalSupported: false,
            verbosity: 0,
        }).promise;

        try {
            pages = [];
            for (let pageNum = 1; pageNum <= pdfDoc.numPages; pageNum++) {
                const page = await pdfDoc.getPage(pageNum);
                const textContent = await page.getTextContent();

                const items: PDFTextItem[] = [];
                for (const item of textContent.items) {
                    if (!("str" in item) || item.str.trim() === "") continue;
                    const transform: number[] = item.transform;
                    items.push({ text: item.str, x: transform[4] ?? 0, y: transform[5] ?? 0 });
                }

                const text = buildPageText(items);
                pages.push({
                    pageNumber: pageNum,
                    text,
                    tables: detectTablesFromItems(items, pageNum),
                    scanned: isScannedPage(text, options.minPageChars),
                    image: null,
                });
            }
        } finally {
            await pdfDoc.destroy();
        }
    } catch (error) {
        throw new DocumentReadError(`Invalid PDF ${filePath}: ${errorMessage(error)}`, filePath, { cause: error });
    }

    const warnings: string[] = [];
    const scannedPages = pages.filter(p => p.scanned);
    if (options.renderScannedPages && scannedPages.length > 0) {
        logger.info(`${scannedPages.length}/${pages.length} low-text pages in ${filePath}, rendering at ${options.dpi} DPI`);
        let images = new Map<number, Uint8Array>();
        try {
            images = await renderer(new Uint8Array(buffer), new Set(scannedPages.map(p => p.pageNumber)), options.dpi);
        } catch (error) {
            logger.warn(`Page rendering failed for ${filePath}: ${errorMessage(error)}`);
            warnings.push(`Page rendering failed: ${errorMessage(error)}`);
        }
        for (const page of pages) {
            page.image = images.get(page.pageNumber) ?? null;
        }

        const unrendered = scannedPages.filter(p => p.image === null).map(p => p.pageNumber);
        if (unrendered.length > 0) {
            warnings.push(`No image for low-text page(s) ${unrendered.join(", ")} of ${path.basename(filePath)}`);
        }
    }

    const fullText = pages.map(p => p.text).filter(t => t.length > 0).join("\n\n");
    logger.debug(`Parsed ${filePath}: ${pages.length} pages, ${fullText.length} chars`);

    return {
        filePath,
        contentHash,
        pageCount: pages.length,
        pages,
        fullText,
        warnings,
    };
}

export function createPdfDocumentExtractor(renderer: PageRenderer = renderPagesWithCanvas): DocumentExtractor {
    return {
        extract: (filePath, options) => extractDocument(filePath, options, renderer),
    };
}

export const pdfDocumentExtractor: DocumentExtractor = createPdfDocumentExtractor();

// ═══════════════════════════════════════════════════════════════════════════════
// TEXT RECONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

const LINE_Y_TOLERANCE = 3;

/**
 * Groups text items into lines by rounded baseline, top to bottom, each line
 * ordered left to right.
 */
export function buildPageText(items: PDFTextItem[]): string {
    const lineGroups = new Map<number, PDFTextItem[]>();
    for (const item of items) {
        const y = Math.round(item.y / LINE_Y_TOLERANCE) * LINE_Y_TOLERANCE;
        const group = lineGroups.get(y);
        if (group) {
            group.push(item);
        } else {
            lineGroups.set(y, [item]);
        }
    }

    return Array.from(lineGroups.entries())
        .sort(([a], [b]) => b - a)
        .map(([, line]) => line
            .sort((a, b) => a.x - b.x)
            .map(i => i.text.trim())
            .join(" "))
        .join("\n");
}

export function isScannedPage(text: string, minPageChars: number): boolean {
    return text.trim().length < minPageChars;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TABLE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

const TABLE_Y_TOLERANCE = 5;

/**
 * Finds runs of at least two consecutive lines with 2-10 cells and a similar
 * cell count. Each run becomes a table of cell strings.
 */
export function detectTablesFromItems(items: PDFTextItem[], pageNum: number): PageTable[] {
    const rows = new Map<number, PDFTextItem[]>();
    for (const item of items) {
        const y = Math.round(item.y / TABLE_Y_TOLERANCE) * TABLE_Y_TOLERANCE;
        const row = rows.get(y);
        if (row) {
            row.push(item);
        } else {
            rows.set(y, [item]);
        }
    }

    const sortedRows = Array.from(rows.entries())
        .sort(([a], [b]) => b - a)
        .map(([, cells]) => cells.sort((a, b) => a.x - b.x).map(c => c.text.trim()));

    const tables: PageTable[] = [];
    let run: string[][] = [];
    let prevColCount = 0;

    const flush = () => {
        if (run.length >= 2) {
            tables.push({ pageNumber: pageNum, rows: run });
        }
        run = [];
    };

    for (const row of sortedRows) {
        const colCount = row.length;
        const tabular = colCount >= 2 && colCount <= 10;

        if (tabular && (run.length === 0 || Math.abs(colCount - prevColCount) <= 1)) {
            run.push(row);
            prevColCount = colCount;
        } else {
            flush();
            if (tabular) {
                run.push(row);
                prevColCount = colCount;
            }
        }
    }
    flush();

    return tables;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

interface CanvasAndContext {
    canvas: Canvas | null;
    context: SKRSContext2D | null;
}

/** Scratch canvases pdf.js allocates while painting images and patterns. */
function canvasFactoryFor(lib: NapiCanvas) {
    return class NapiCanvasFactory {
        create(width: number, height: number): CanvasAndContext {
            const canvas = lib.createCanvas(width, height);
            return { canvas, context: canvas.getContext("2d") };
        }

        reset(target: CanvasAndContext, width: number, height: number): void {
            if (!target.canvas) throw new Error("Canvas is not specified");
            target.canvas.width = width;
            target.canvas.height = height;
        }

        destroy(target: CanvasAndContext): void {
            if (target.canvas) {
                target.canvas.width = 0;
                target.canvas.height = 0;
            }
            target.canvas = null;
            target.context = null;
        }
    };
}

/**
 * Renders the selected pages to PNG with pdf.js painting onto @napi-rs/canvas.
 */
export async function renderPagesWithCanvas(
    data: Uint8Array,
    pageNumbers: ReadonlySet<number>,
    dpi: number
): Promise<Map<number, Uint8Array>> {
    const pdfjs = await loadPdfJs();
    const canvasLib = await loadCanvas();

    const pdfDoc = await pdfjs.getDocument({
        data,
        CanvasFactory: canvasFactoryFor(canvasLib),
        useSystemFonts: true,
        disableFontFace: true,
        isEvalSupported: false,
        verbosity: 0,
    }).promise;

    const images = new Map<number, Uint8Array>();
    try {
        const wanted = Array.from(pageNumbers).filter(n => n >= 1 && n <= pdfDoc.numPages).sort((a, b) => a - b);
        for (const pageNum of wanted) {
            const page = await pdfDoc.getPage(pageNum);
            const viewport = page.getViewport({ scale: dpi / 72 });
            const canvas = canvasLib.createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));

            await page.render({ canvasContext: canvas.getContext("2d"), viewport }).promise;
            images.set(pageNum, new Uint8Array(await canvas.encode("png")));
            page.cleanup();
        }
    } finally {
        await pdfDoc.destroy();
    }

    return images;
}

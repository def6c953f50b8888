import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { CorruptDocumentError, NotFoundError, errorMessage } from "../errors";
import { getLogger } from "../logger";
import type { ExtractedText } from "../types";

export const PAGE_SEPARATOR = "\n\n";

export type PdfTextItem = {
  str: string;
  transform: number[];
  width?: number;
};

type PositionedItem = PdfTextItem & { x: number; y: number };

function isTextItem(item: object): item is PdfTextItem {
  return "str" in item && typeof item.str === "string" && "transform" in item && Array.isArray(item.transform);
}

function clusterItemsIntoLines(items: PdfTextItem[]) {
  const lineTolerance = 3; // points
  const lines: Array<{ y: number; items: PositionedItem[] }> = [];
  for (const raw of items) {
    if (!raw.str) continue;
    const x = Number(raw.transform[4] || 0);
    const y = Number(raw.transform[5] || 0);
    let line = lines.find((ln) => Math.abs(ln.y - y) <= lineTolerance);
    if (!line) {
      line = { y, items: [] };
      lines.push(line);
    }
    line.items.push({ ...raw, x, y });
  }

  // PDF origin is bottom-left
  lines.sort((a, b) => b.y - a.y);

  return lines;
}

function itemWidth(item: PdfTextItem, text: string): number {
  const rawWidth = Number(item.width ?? Math.abs(item.transform[0] || 0));
  return rawWidth || text.length * 4;
}

// Keeps table columns apart: tabs for wide jumps, spaces for word gaps.
export function renderPageText(items: PdfTextItem[]): string {
  const defaultWordGap = 2.5;
  const defaultColumnGap = 12;
  let buffer = "";

  for (const line of clusterItemsIntoLines(items)) {
    if (buffer.length && !buffer.endsWith("\n")) buffer += "\n";
    const sorted = line.items.slice().sort((a, b) => a.x - b.x);
    let totalWidth = 0;
    let totalChars = 0;
    for (const item of sorted) {
      const normalized = item.str.replace(/\u00A0/g, " ");
      totalWidth += itemWidth(item, normalized);
      totalChars += normalized.replace(/\s+/g, "").length || normalized.length;
    }
    const avgCharWidth = totalChars ? totalWidth / totalChars : 0;
    const wordGapThreshold = Math.max(defaultWordGap, avgCharWidth * 0.6);
    const columnGapThreshold = Math.max(defaultColumnGap, avgCharWidth * 3.5);

    let prevRight: number | null = null;
    for (const item of sorted) {
      const text = item.str.replace(/\u00A0/g, " ");
      if (prevRight !== null) {
        const gap = item.x - prevRight;
        if (gap > columnGapThreshold) {
          buffer += "\t";
        } else if (gap > wordGapThreshold) {
          buffer += " ";
        }
      }
      buffer += text;
      prevRight = item.x + itemWidth(item, text);
    }
  }

  return buffer;
}

export async function extractTextFromBuffer(buf: Uint8Array, source = "<buffer>"): Promise<ExtractedText> {
  const log = getLogger("core").child({ source });
  // pdfjs detaches the buffer it is given
  const data = new Uint8Array(buf);

  const doc = await getDocument({ data, isEvalSupported: false, verbosity: 0 }).promise.catch((e: unknown) => {
    throw new CorruptDocumentError(`Cannot parse PDF ${source}: ${errorMessage(e)}`, { cause: e });
  });

  try {
    const pageTexts: string[] = [];
    const warnings: string[] = [];
    for (let p = 1; p <= doc.numPages; p++) {
      try {
        const page = await doc.getPage(p);
        const content = await page.getTextContent();
        const items: PdfTextItem[] = [];
        for (const item of content.items) {
          if (isTextItem(item)) items.push(item);
        }
        pageTexts.push(renderPageText(items));
      } catch (e) {
        // a single unreadable page does not sink the document
        warnings.push(`page ${p}: ${errorMessage(e)}`);
        log.warn("extract.page_failed", { page: p, error: errorMessage(e) });
        pageTexts.push("");
      }
    }

    const text = pageTexts.join(PAGE_SEPARATOR).trim();
    if (!text) warnings.push("No selectable text found; OCR is not supported.");
    log.debug("extract.done", { pages: doc.numPages, chars: text.length, warnings: warnings.length });
    return { text, pages: doc.numPages, warnings };
  } finally {
    await doc.destroy();
  }
}

const MISSING_FILE_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export async function extractText(path: string): Promise<ExtractedText> {
  let buf: Buffer;
  try {
    buf = await readFile(path);
  } catch (e) {
    const code = errnoCode(e);
    if (code && MISSING_FILE_CODES.has(code)) throw new NotFoundError(path, { cause: e });
    throw new CorruptDocumentError(`Cannot read ${path}: ${errorMessage(e)}`, { cause: e });
  }
  return extractTextFromBuffer(buf, path);
}

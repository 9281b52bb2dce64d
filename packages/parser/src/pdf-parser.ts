import type { Page, ParseResult } from "@contract-qa/types";
import { AppError, LoadError } from "@contract-qa/errors";
import type { IParser } from "./parser.interface.js";
import { assemblePages } from "./page-assembly.js";

const PDF_MIME_TYPES = ["application/pdf"];

export interface PdfPageLike {
  getTextContent(): Promise<{ items: readonly unknown[] }>;
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
}

export type PdfOpener = (data: Uint8Array) => Promise<PdfDocumentLike>;

async function openWithPdfjs(data: Uint8Array): Promise<PdfDocumentLike> {
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const loadingTask = getDocument({
    data,
    useWorkerFetch: false,
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  });
  return loadingTask.promise;
}

/**
 * Text-layer PDF extraction via pdfjs-dist. One page of output per PDF page;
 * no OCR.
 */
export class PdfParser implements IParser {
  readonly supportedMimeTypes = PDF_MIME_TYPES;
  private open: PdfOpener;

  constructor(open: PdfOpener = openWithPdfjs) {
    this.open = open;
  }

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    // pdfjs may transfer (detach) the buffer it is given, so hand it a copy.
    const data =
      typeof input === "string" ? new TextEncoder().encode(input) : new Uint8Array(input);

    let pdf: PdfDocumentLike;
    try {
      pdf = await this.open(data);
    } catch (err: unknown) {
      throw new LoadError(`Unable to read PDF: ${errorMessage(err)}`, "DOCUMENT_UNREADABLE", {
        cause: err,
      });
    }

    try {
      const pages: Page[] = [];
      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        pages.push({ index: pageNumber, text: textFromItems(content.items) });
      }
      return assemblePages(pages, { mimeType });
    } catch (err: unknown) {
      if (AppError.isAppError(err)) throw err;
      throw new LoadError(`Unable to extract PDF text: ${errorMessage(err)}`, "DOCUMENT_UNREADABLE", {
        cause: err,
      });
    } finally {
      await pdf.destroy();
    }
  }
}

/**
 * Join pdfjs text items with single spaces, breaking lines where an item ends
 * one, then tidy whitespace so paragraph breaks survive for the chunker.
 */
export function textFromItems(items: readonly unknown[]): string {
  let text = "";
  for (const item of items) {
    if (typeof item !== "object" || item === null || !("str" in item)) continue;
    if (typeof item.str !== "string") continue;
    text += item.str;
    text += "hasEOL" in item && item.hasEOL === true ? "\n" : " ";
  }

  return text
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

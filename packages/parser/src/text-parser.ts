import type { ParseResult } from "@contract-qa/types";
import type { IParser } from "./parser.interface.js";
import { assemblePages } from "./page-assembly.js";

const TEXT_MIME_TYPES = ["text/plain", "text/markdown"];

/**
 * Plain text and markdown contracts. Form feeds mark page breaks.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const raw = typeof input === "string" ? input : new TextDecoder().decode(input);
    const normalized = raw.replace(/\r\n?/g, "\n");

    const pages = normalized.split("\f").map((text, i) => ({ index: i + 1, text: text.trim() }));

    return assemblePages(pages, { mimeType });
  }
}

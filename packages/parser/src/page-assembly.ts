import type { Page, ParseResult } from "@contract-qa/types";
import { LoadError } from "@contract-qa/errors";

export const PAGE_SEPARATOR = "\n\n";

/**
 * Join extracted pages in order. A document whose pages carry no text at all
 * (typically a scan without a text layer) is rejected rather than producing
 * an empty index.
 */
export function assemblePages(
  pages: Page[],
  metadata: Record<string, unknown>,
): ParseResult {
  if (pages.length === 0) {
    throw new LoadError("The document has no pages", "NO_PAGES");
  }

  if (pages.every((page) => page.text.trim().length === 0)) {
    throw new LoadError(
      "No extractable text found. The document may be a scanned image (OCR is not supported).",
      "NO_EXTRACTABLE_TEXT",
      { details: { pageCount: pages.length } },
    );
  }

  const text = pages.map((page) => page.text).join(PAGE_SEPARATOR);

  return {
    pages,
    text,
    pageCount: pages.length,
    metadata: {
      ...metadata,
      charCount: text.length,
      wordCount: text.split(/\s+/).filter((w) => w.length > 0).length,
    },
  };
}

import type { SupportedMimeType } from "@contract-qa/types";
import { LoadError } from "@contract-qa/errors";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { PdfParser } from "./pdf-parser.js";

const textParser = new TextParser();
const pdfParser = new PdfParser();

const allParsers: IParser[] = [pdfParser, textParser];

const EXTENSION_MIME_TYPES: Record<string, SupportedMimeType> = {
  pdf: "application/pdf",
  txt: "text/plain",
  text: "text/plain",
  md: "text/markdown",
  markdown: "text/markdown",
};

/**
 * Select the appropriate parser based on mimeType.
 */
export function getParser(mimeType: string): IParser {
  const parser = allParsers.find((p) => p.supportedMimeTypes.includes(mimeType));

  if (!parser) {
    throw new LoadError(`Unsupported document type: ${mimeType}`, "UNSUPPORTED_DOCUMENT_TYPE", {
      details: { mimeType },
    });
  }

  return parser;
}

/**
 * Map a file name to the MIME type of a supported document format.
 */
export function detectMimeType(fileName: string): SupportedMimeType {
  const dot = fileName.lastIndexOf(".");
  const extension = dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : "";
  const mimeType = EXTENSION_MIME_TYPES[extension];

  if (!mimeType) {
    throw new LoadError(
      `Unsupported file extension: "${extension || fileName}". Use a PDF, .txt or .md file.`,
      "UNSUPPORTED_DOCUMENT_TYPE",
      { details: { fileName } },
    );
  }

  return mimeType;
}

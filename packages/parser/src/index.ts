export type { IParser } from "./parser.interface.js";
export { TextParser } from "./text-parser.js";
export { PdfParser, textFromItems } from "./pdf-parser.js";
export type { PdfDocumentLike, PdfPageLike, PdfOpener } from "./pdf-parser.js";
export { assemblePages, PAGE_SEPARATOR } from "./page-assembly.js";
export { getParser, detectMimeType } from "./factory.js";

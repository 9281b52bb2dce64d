export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker } from "./recursive-chunker.js";
export { FixedChunker } from "./fixed-chunker.js";
export { createChunker } from "./factory.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { InMemoryVectorStore } from "./in-memory-store.js";
export { cosineSimilarity } from "./similarity.js";

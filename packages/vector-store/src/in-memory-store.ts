import type { VectorRecord } from "@contract-qa/types";
import { ValidationError } from "@contract-qa/errors";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { cosineSimilarity } from "./similarity.js";

interface StoredRecord {
  record: VectorRecord;
  /** Insertion sequence, used to break score ties. */
  seq: number;
}

/**
 * Exhaustive cosine-similarity index held in process memory. Sized for one
 * contract at a time, so a linear scan per query is enough.
 */
export class InMemoryVectorStore implements IVectorStore {
  private records = new Map<string, StoredRecord>();
  private seq = 0;
  private dims: number | undefined;

  get size(): number {
    return this.records.size;
  }

  get dimensions(): number | undefined {
    return this.dims;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    const expected = this.dims ?? records[0]?.vector.length;
    for (const record of records) {
      if (record.vector.length === 0 || record.vector.length !== expected) {
        throw new ValidationError("Vector dimensionality does not match the index", {
          id: `expected ${String(expected)} dimensions, got ${record.vector.length} for ${record.id}`,
        });
      }
    }

    for (const record of records) {
      const existing = this.records.get(record.id);
      const stored: VectorRecord = {
        id: record.id,
        vector: [...record.vector],
        chunk: { ...record.chunk },
      };
      this.records.set(record.id, { record: stored, seq: existing?.seq ?? this.seq++ });
    }
    this.dims = expected;
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const { vector, topK } = params;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError("topK must be a positive integer", { topK: String(topK) });
    }
    if (this.dims !== undefined && vector.length !== this.dims) {
      throw new ValidationError("Query vector dimensionality does not match the index", {
        vector: `expected ${this.dims} dimensions, got ${vector.length}`,
      });
    }

    const scored = [...this.records.values()].map(({ record, seq }) => ({
      seq,
      result: { id: record.id, score: cosineSimilarity(vector, record.vector), chunk: record.chunk },
    }));
    scored.sort((a, b) => b.result.score - a.result.score || a.seq - b.seq);

    return scored.slice(0, topK).map(({ result }) => ({ ...result, chunk: { ...result.chunk } }));
  }
}

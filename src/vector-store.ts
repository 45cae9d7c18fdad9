/**
 * In-memory word vector store
 */

import { VECTOR_DIM } from './config.js';

export interface VectorStoreConfig {
  /**
   * Components per word vector
   * @default 100
   */
  dimension?: number;
}

export interface WordVector {
  word: string;
  vector: Float32Array;
}

/**
 * Word → vector map with a fixed dimension.
 *
 * Iteration follows insertion order, which for a reduced corpus is frequency
 * rank. Re-adding a word replaces its vector but keeps its original position.
 *
 * @example
 * ```typescript
 * const store = new VectorStore({ dimension: 3 });
 *
 * store.add('git', [0.1, 0.4, -0.2]);
 * store.add('commit', [0.3, 0.1, 0.0]);
 *
 * store.get('git'); // [0.1, 0.4, -0.2] in single precision
 * store.keys(); // ['git', 'commit']
 * ```
 */
export class VectorStore {
  private vectors = new Map<string, Float32Array>();
  private config: Required<VectorStoreConfig>;

  constructor(config: VectorStoreConfig = {}) {
    this.config = {
      dimension: config.dimension ?? VECTOR_DIM,
    };

    if (!Number.isInteger(this.config.dimension) || this.config.dimension <= 0) {
      throw new Error(`Invalid vector dimension: ${this.config.dimension}`);
    }
  }

  get dimension(): number {
    return this.config.dimension;
  }

  /** Values are copied into single precision. */
  add(word: string, vector: ArrayLike<number>): void {
    if (vector.length !== this.config.dimension) {
      throw new Error(
        `Vector dimension mismatch for "${word}": ${vector.length} vs ${this.config.dimension}`
      );
    }

    this.vectors.set(word, Float32Array.from(vector));
  }

  addBatch(entries: Iterable<WordVector>): void {
    for (const entry of entries) {
      this.add(entry.word, entry.vector);
    }
  }

  /**
   * Exact-match lookup; callers normalize case before asking.
   * The returned view is the stored vector and must not be written to.
   */
  get(word: string): Readonly<ArrayLike<number>> | undefined {
    return this.vectors.get(word);
  }

  has(word: string): boolean {
    return this.vectors.has(word);
  }

  size(): number {
    return this.vectors.size;
  }

  keys(): string[] {
    return Array.from(this.vectors.keys());
  }

  /** Yields copies; the stored vectors never leave the store. */
  *entries(): IterableIterator<WordVector> {
    for (const [word, vector] of this.vectors) {
      yield { word, vector: Float32Array.from(vector) };
    }
  }

  /** For persistence */
  export(): WordVector[] {
    return Array.from(this.entries());
  }

  /** From persistence */
  import(entries: WordVector[]): void {
    this.addBatch(entries);
  }
}

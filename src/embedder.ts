/**
 * Command embeddings by averaging word vectors
 */

import { EMBEDDER_PROGRESS_INTERVAL } from './config.js';
import type { EmbeddableRecord } from './command-record.js';
import type { EmbeddingTable } from './embedding-table.js';
import { tokenize } from './tokenizer.js';
import type { VectorStore } from './vector-store.js';

export interface CommandEmbedderConfig {
  /**
   * Log progress while embedding a batch
   * @default false
   */
  progressLogging?: boolean;
}

export interface EmbeddingRun {
  /** One embedding per input record, same order */
  table: EmbeddingTable;
  /** Records none of whose tokens are in the vocabulary */
  zeroMatchCount: number;
  zeroMatchIndices: number[];
}

/**
 * Tokens of `command`, then `description`, then each keyword in order.
 */
export function recordTokens(record: EmbeddableRecord): string[] {
  const tokens = [...tokenize(record.command), ...tokenize(record.description ?? '')];
  for (const keyword of record.keywords ?? []) {
    tokens.push(...tokenize(keyword));
  }
  return tokens;
}

/**
 * Embeds command records against a read-only word vector store.
 *
 * An embedding is the component-wise mean of the vectors of every token
 * found in the store, summed in token order in single precision, so the
 * same record and store always give bit-identical output. A record with no
 * known token gets the all-zero vector.
 *
 * @example
 * ```typescript
 * const store = await readVectorStoreFile('assets/glove.bin');
 * const embedder = new CommandEmbedder(store);
 *
 * const vector = embedder.embedRecord({
 *   command: 'git log --oneline',
 *   description: 'Show commit history',
 *   keywords: ['history', 'commits'],
 * });
 * console.log(vector.length); // 100
 * ```
 */
export class CommandEmbedder {
  private store: VectorStore;
  private config: Required<CommandEmbedderConfig>;

  constructor(store: VectorStore, config: CommandEmbedderConfig = {}) {
    this.store = store;
    this.config = {
      progressLogging: config.progressLogging ?? false,
    };
  }

  getDimension(): number {
    return this.store.dimension;
  }

  getConfig(): Readonly<Required<CommandEmbedderConfig>> {
    return { ...this.config };
  }

  /**
   * Embedding of a single record; the all-zero vector when nothing matches
   */
  embedRecord(record: EmbeddableRecord): Float32Array {
    return this.average(recordTokens(record)) ?? new Float32Array(this.store.dimension);
  }

  /**
   * Embedding of free text, e.g. a lookup query.
   * Returns null when no token is in the vocabulary.
   */
  embedText(text: string): Float32Array | null {
    return this.average(tokenize(text));
  }

  /**
   * Embed every record into its own positional slot.
   * Entry i of the resulting table always belongs to record i.
   */
  embedRecords(records: readonly EmbeddableRecord[]): EmbeddingRun {
    const embeddings = new Array<Float32Array>(records.length);
    const zeroMatchIndices: number[] = [];

    if (this.config.progressLogging) {
      console.log(`[CommandEmbedder] Embedding ${records.length.toLocaleString('en-US')} commands...`);
    }

    records.forEach((record, index) => {
      const vector = this.average(recordTokens(record));
      if (vector === null) {
        zeroMatchIndices.push(index);
        embeddings[index] = new Float32Array(this.store.dimension);
      } else {
        embeddings[index] = vector;
      }

      const done = index + 1;
      if (this.config.progressLogging && done % EMBEDDER_PROGRESS_INTERVAL === 0) {
        console.log(
          `[CommandEmbedder] Processed ${done.toLocaleString('en-US')} / ${records.length.toLocaleString('en-US')} commands...`
        );
      }
    });

    if (this.config.progressLogging) {
      console.log(
        `[CommandEmbedder] Computed ${records.length.toLocaleString('en-US')} embeddings ` +
          `(${zeroMatchIndices.length} with no matching words in vocabulary)`
      );
    }

    return {
      table: { dimension: this.store.dimension, embeddings },
      zeroMatchCount: zeroMatchIndices.length,
      zeroMatchIndices,
    };
  }

  private average(tokens: readonly string[]): Float32Array | null {
    const sum = new Float32Array(this.store.dimension);
    let count = 0;

    for (const token of tokens) {
      const vector = this.store.get(token);
      if (!vector) {
        continue;
      }
      for (let i = 0; i < sum.length; i++) {
        sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
      }
      count++;
    }

    if (count === 0) {
      return null;
    }

    for (let i = 0; i < sum.length; i++) {
      sum[i] = (sum[i] ?? 0) / count;
    }
    return sum;
  }
}

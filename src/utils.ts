import type { EmbeddingTable } from './embedding-table.js';
import type { VectorStore } from './vector-store.js';

export interface WordSample {
  word: string;
  /** First components of the vector */
  head: number[];
}

export interface EmbeddingSample {
  index: number;
  norm: number;
  head: number[];
}

/** Euclidean length */
export function vectorNorm(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    const value = vector[i] ?? 0;
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export function isZeroVector(vector: ArrayLike<number>): boolean {
  for (let i = 0; i < vector.length; i++) {
    if (vector[i] !== 0) {
      return false;
    }
  }
  return true;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function sampleWords(store: VectorStore, count: number, width = 3): WordSample[] {
  const samples: WordSample[] = [];
  for (const { word, vector } of store.entries()) {
    if (samples.length >= count) {
      break;
    }
    samples.push({ word, head: Array.from(vector.subarray(0, width)) });
  }
  return samples;
}

export function sampleEmbeddings(table: EmbeddingTable, count: number, width = 3): EmbeddingSample[] {
  return table.embeddings.slice(0, count).map((embedding, index) => ({
    index,
    norm: vectorNorm(embedding),
    head: Array.from(embedding.subarray(0, width)),
  }));
}

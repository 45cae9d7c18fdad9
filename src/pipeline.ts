/**
 * End-to-end runs that produce the two binary assets
 */

import { existsSync } from 'fs';

import { loadCommandCatalog } from './command-record.js';
import {
  DEFAULT_COMMANDS_PATH,
  DEFAULT_EMBEDDINGS_PATH,
  DEFAULT_SOURCE_PATH,
  DEFAULT_TOP_K,
  DEFAULT_VECTORS_PATH,
  VECTOR_DIM,
  VERIFY_SAMPLE_SIZE,
} from './config.js';
import { CommandEmbedder } from './embedder.js';
import { readEmbeddingTableFile, writeEmbeddingTableFile } from './embedding-table.js';
import { MissingInputError } from './errors.js';
import { reduceVectorSourceFile, type ReductionReport } from './reducer.js';
import { readVectorStoreFile, writeVectorStoreFile } from './vector-store-codec.js';
import {
  formatBytes,
  isZeroVector,
  sampleEmbeddings,
  sampleWords,
  type EmbeddingSample,
  type WordSample,
} from './utils.js';

export interface PrepareVectorsConfig {
  /**
   * Frequency-ordered `word f1 ... fN` text corpus
   * @default 'glove.6B.100d.txt'
   */
  sourcePath?: string;

  /**
   * Where the binary vector store is written
   * @default 'assets/glove.bin'
   */
  outputPath?: string;

  /**
   * Words to keep
   * @default 100000
   */
  topK?: number;

  /** @default 100 */
  dimension?: number;

  /** @default false */
  progressLogging?: boolean;
}

export interface PrepareVectorsReport {
  sourcePath: string;
  outputPath: string;
  reduction: ReductionReport;
  bytesWritten: number;
  /** First words of the re-read store */
  samples: WordSample[];
}

export interface GenerateEmbeddingsConfig {
  /**
   * Binary vector store written by {@link prepareVectors}
   * @default 'assets/glove.bin'
   */
  vectorsPath?: string;

  /**
   * YAML command catalog
   * @default 'assets/commands.yml'
   */
  commandsPath?: string;

  /**
   * Where the embedding table is written
   * @default 'assets/cmd_embeddings.bin'
   */
  outputPath?: string;

  /** @default 100 */
  dimension?: number;

  /** @default false */
  progressLogging?: boolean;
}

export interface GenerateEmbeddingsReport {
  vectorsPath: string;
  commandsPath: string;
  outputPath: string;
  vocabSize: number;
  commandCount: number;
  dimension: number;
  /** Commands that got the all-zero vector */
  zeroMatchCount: number;
  zeroMatchIndices: number[];
  bytesWritten: number;
  samples: EmbeddingSample[];
}

/**
 * Reduce the text corpus to its top K words and write the binary store.
 *
 * @throws MissingInputError before writing anything if the corpus is absent
 */
export async function prepareVectors(config: PrepareVectorsConfig = {}): Promise<PrepareVectorsReport> {
  const sourcePath = config.sourcePath ?? DEFAULT_SOURCE_PATH;
  const outputPath = config.outputPath ?? DEFAULT_VECTORS_PATH;
  const dimension = config.dimension ?? VECTOR_DIM;
  const progressLogging = config.progressLogging ?? false;

  const { store, report } = await reduceVectorSourceFile(sourcePath, {
    topK: config.topK ?? DEFAULT_TOP_K,
    dimension,
    progressLogging,
  });

  const bytesWritten = await writeVectorStoreFile(outputPath, store);
  if (progressLogging) {
    console.log(`[Pipeline] Saved ${outputPath} (${formatBytes(bytesWritten)})`);
  }

  const reloaded = await readVectorStoreFile(outputPath, { dimension });
  if (reloaded.size() !== store.size()) {
    throw new Error(
      `Verification of ${outputPath} failed: wrote ${store.size()} words, read back ${reloaded.size()}`
    );
  }

  const samples = sampleWords(reloaded, VERIFY_SAMPLE_SIZE);
  if (progressLogging) {
    console.log(`[Pipeline] Verified ${outputPath}: ${reloaded.size().toLocaleString('en-US')} words`);
    for (const sample of samples) {
      console.log(`[Pipeline]   '${sample.word}': ${sample.head.map((v) => v.toFixed(4)).join(', ')}`);
    }
  }

  return { sourcePath, outputPath, reduction: report, bytesWritten, samples };
}

/**
 * Embed every catalog command and write the embedding table.
 * Entry i of the table is the embedding of catalog record i.
 *
 * @throws MissingInputError before writing anything if the vector store or
 * catalog is absent
 */
export async function generateCommandEmbeddings(
  config: GenerateEmbeddingsConfig = {}
): Promise<GenerateEmbeddingsReport> {
  const vectorsPath = config.vectorsPath ?? DEFAULT_VECTORS_PATH;
  const commandsPath = config.commandsPath ?? DEFAULT_COMMANDS_PATH;
  const outputPath = config.outputPath ?? DEFAULT_EMBEDDINGS_PATH;
  const dimension = config.dimension ?? VECTOR_DIM;
  const progressLogging = config.progressLogging ?? false;

  if (!existsSync(vectorsPath)) {
    throw new MissingInputError(vectorsPath, 'vector store');
  }
  if (!existsSync(commandsPath)) {
    throw new MissingInputError(commandsPath, 'command catalog');
  }

  const store = await readVectorStoreFile(vectorsPath, { dimension });
  if (progressLogging) {
    console.log(`[Pipeline] Loaded ${store.size().toLocaleString('en-US')} word vectors from ${vectorsPath}`);
  }

  const records = await loadCommandCatalog(commandsPath);
  if (progressLogging) {
    console.log(`[Pipeline] Loaded ${records.length.toLocaleString('en-US')} commands from ${commandsPath}`);
  }

  const embedder = new CommandEmbedder(store, { progressLogging });
  const run = embedder.embedRecords(records);

  const bytesWritten = await writeEmbeddingTableFile(outputPath, run.table);
  if (progressLogging) {
    console.log(`[Pipeline] Saved ${outputPath} (${formatBytes(bytesWritten)})`);
  }

  const reloaded = await readEmbeddingTableFile(outputPath, { expectedDimension: dimension });
  if (reloaded.embeddings.length !== records.length) {
    throw new Error(
      `Verification of ${outputPath} failed: ${records.length} commands, ${reloaded.embeddings.length} embeddings`
    );
  }
  const misplaced = run.zeroMatchIndices.find((index) => !isZeroVector(reloaded.embeddings[index] ?? []));
  if (misplaced !== undefined) {
    throw new Error(`Verification of ${outputPath} failed: entry ${misplaced} should be the zero vector`);
  }

  const samples = sampleEmbeddings(reloaded, VERIFY_SAMPLE_SIZE);
  if (progressLogging) {
    console.log(
      `[Pipeline] Verified ${outputPath}: ${reloaded.embeddings.length.toLocaleString('en-US')} commands, dimension ${reloaded.dimension}`
    );
    for (const sample of samples) {
      console.log(
        `[Pipeline]   #${sample.index}: norm=${sample.norm.toFixed(4)}, ${sample.head.map((v) => v.toFixed(4)).join(', ')}`
      );
    }
  }

  return {
    vectorsPath,
    commandsPath,
    outputPath,
    vocabSize: store.size(),
    commandCount: records.length,
    dimension: reloaded.dimension,
    zeroMatchCount: run.zeroMatchCount,
    zeroMatchIndices: run.zeroMatchIndices,
    bytesWritten,
    samples,
  };
}

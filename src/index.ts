/**
 * cmd-embeddings - word-vector and command-embedding assets for shell command lookup
 *
 * Reduces a frequency-ordered GloVe-style corpus to a compact binary word
 * vector store, then embeds every command of a catalog as the average of its
 * words' vectors and writes the result as a positional binary table.
 *
 * @example
 * ```typescript
 * import { prepareVectors, generateCommandEmbeddings } from 'cmd-embeddings';
 *
 * await prepareVectors({ sourcePath: 'glove.6B.100d.txt', outputPath: 'assets/glove.bin' });
 *
 * const report = await generateCommandEmbeddings({
 *   vectorsPath: 'assets/glove.bin',
 *   commandsPath: 'assets/commands.yml',
 *   outputPath: 'assets/cmd_embeddings.bin',
 * });
 * console.log(report.zeroMatchCount); // commands with no known word
 * ```
 */

// High-level API
export {
  prepareVectors,
  generateCommandEmbeddings,
  type PrepareVectorsConfig,
  type PrepareVectorsReport,
  type GenerateEmbeddingsConfig,
  type GenerateEmbeddingsReport,
} from './pipeline.js';

// Low-level building blocks
export { CommandEmbedder, recordTokens, type CommandEmbedderConfig, type EmbeddingRun } from './embedder.js';

export { tokenize, MIN_TOKEN_LENGTH } from './tokenizer.js';

export { VectorStore, type VectorStoreConfig, type WordVector } from './vector-store.js';

export {
  serializeVectorStore,
  deserializeVectorStore,
  readVectorStoreFile,
  writeVectorStoreFile,
  type VectorStoreCodecOptions,
} from './vector-store-codec.js';

export {
  serializeEmbeddingTable,
  deserializeEmbeddingTable,
  readEmbeddingTableFile,
  writeEmbeddingTableFile,
  type EmbeddingTable,
  type EmbeddingTableCodecOptions,
} from './embedding-table.js';

export {
  parseVectorLine,
  reduceVectorLines,
  reduceVectorSourceFile,
  type ReducerConfig,
  type ReductionReport,
  type ReductionResult,
} from './reducer.js';

export {
  CommandRecordSchema,
  parseCommandCatalog,
  loadCommandCatalog,
  type CommandRecord,
  type EmbeddableRecord,
} from './command-record.js';

export {
  MissingInputError,
  MalformedLineError,
  FormatError,
  TruncatedStreamError,
  EncodingError,
  DimensionMismatchError,
  CatalogFormatError,
} from './errors.js';

export { VECTOR_DIM, DEFAULT_TOP_K, MAX_WORD_BYTES } from './config.js';

export { vectorNorm, isZeroVector, formatBytes } from './utils.js';

/**
 * Shared constants for both binary assets.
 *
 * The vector dimension is not stored in the vector store header, so every
 * reader and writer of these files must agree on it out of band.
 */

/** Components per word vector and per command embedding (GloVe 100d). */
export const VECTOR_DIM = 100;

/** Words kept from the frequency-ordered corpus. */
export const DEFAULT_TOP_K = 100_000;

/** Word byte length is written as a u16. */
export const MAX_WORD_BYTES = 0xffff;

export const BYTES_PER_FLOAT = 4;

export const DEFAULT_SOURCE_PATH = 'glove.6B.100d.txt';
export const DEFAULT_VECTORS_PATH = 'assets/glove.bin';
export const DEFAULT_COMMANDS_PATH = 'assets/commands.yml';
export const DEFAULT_EMBEDDINGS_PATH = 'assets/cmd_embeddings.bin';

/** Progress is logged every this many accepted corpus words */
export const REDUCER_PROGRESS_INTERVAL = 10_000;

/** Progress is logged every this many embedded commands */
export const EMBEDDER_PROGRESS_INTERVAL = 500;

/** Number of entries shown when verifying a written asset */
export const VERIFY_SAMPLE_SIZE = 5;

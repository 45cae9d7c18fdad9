/**
 * Reduce a frequency-ordered text corpus of word vectors to its top K words
 */

import { createReadStream, existsSync } from 'fs';
import { createInterface } from 'readline';

import { DEFAULT_TOP_K, MAX_WORD_BYTES, REDUCER_PROGRESS_INTERVAL, VECTOR_DIM } from './config.js';
import { MalformedLineError, MissingInputError } from './errors.js';
import { VectorStore, type WordVector } from './vector-store.js';

export interface ReducerConfig {
  /**
   * Number of valid lines to keep
   * @default 100000
   */
  topK?: number;

  /**
   * Components expected after each word
   * @default 100
   */
  dimension?: number;

  /**
   * Log progress while reading
   * @default false
   */
  progressLogging?: boolean;
}

export interface ReductionReport {
  /** Lines consumed from the source, malformed ones included */
  linesRead: number;
  /** Valid lines taken, counting toward topK */
  accepted: number;
  malformed: number;
  /** Accepted lines whose word was already present (last one wins) */
  duplicates: number;
  vocabSize: number;
}

export interface ReductionResult {
  store: VectorStore;
  report: ReductionReport;
}

const NUMBER_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse one `word f1 f2 ... fN` corpus line.
 *
 * @throws MalformedLineError when the line is blank, a component is not a
 * number or overflows a 32-bit float, the component count is not
 * `dimension`, or the word is too long for the store's length field
 */
export function parseVectorLine(line: string, dimension: number, lineNumber?: number): WordVector {
  const parts = line.trim().split(/\s+/);
  const word = parts[0];

  if (!word) {
    throw new MalformedLineError('blank line', lineNumber);
  }

  const components = parts.length - 1;
  if (components !== dimension) {
    throw new MalformedLineError(
      `expected ${dimension} components for "${word}", got ${components}`,
      lineNumber
    );
  }

  if (Buffer.byteLength(word, 'utf-8') > MAX_WORD_BYTES) {
    throw new MalformedLineError(`word exceeds ${MAX_WORD_BYTES} bytes`, lineNumber);
  }

  const vector = new Float32Array(dimension);
  for (let i = 0; i < dimension; i++) {
    const token = parts[i + 1] ?? '';
    if (!NUMBER_TOKEN.test(token)) {
      throw new MalformedLineError(`non-numeric component "${token}" for "${word}"`, lineNumber);
    }
    vector[i] = Number(token);
    if (!Number.isFinite(vector[i])) {
      throw new MalformedLineError(
        `component "${token}" out of single-precision range for "${word}"`,
        lineNumber
      );
    }
  }

  return { word, vector };
}

/**
 * Keep the first `topK` valid lines of a corpus.
 *
 * Malformed lines are skipped and do not count toward `topK`. Reading stops
 * as soon as the cap is reached, so the rest of a large corpus is never
 * parsed. The corpus is assumed to be sorted by descending frequency.
 */
export async function reduceVectorLines(
  lines: Iterable<string> | AsyncIterable<string>,
  config: ReducerConfig = {}
): Promise<ReductionResult> {
  const topK = config.topK ?? DEFAULT_TOP_K;
  const dimension = config.dimension ?? VECTOR_DIM;
  const progressLogging = config.progressLogging ?? false;

  if (!Number.isInteger(topK) || topK < 0) {
    throw new Error(`topK must be a non-negative integer, got ${topK}`);
  }

  const store = new VectorStore({ dimension });
  const report: ReductionReport = {
    linesRead: 0,
    accepted: 0,
    malformed: 0,
    duplicates: 0,
    vocabSize: 0,
  };

  for await (const line of lines) {
    if (report.accepted >= topK) {
      break;
    }
    report.linesRead++;

    let entry: WordVector;
    try {
      entry = parseVectorLine(line, dimension, report.linesRead);
    } catch (err) {
      if (!(err instanceof MalformedLineError)) {
        throw err;
      }
      report.malformed++;
      continue;
    }

    if (store.has(entry.word)) {
      report.duplicates++;
    }
    store.add(entry.word, entry.vector);
    report.accepted++;

    if (progressLogging && report.accepted % REDUCER_PROGRESS_INTERVAL === 0) {
      console.log(`[Reducer] Loaded ${report.accepted.toLocaleString('en-US')} words...`);
    }
  }

  report.vocabSize = store.size();

  if (progressLogging) {
    console.log(
      `[Reducer] Kept ${report.vocabSize.toLocaleString('en-US')} word vectors ` +
        `(${report.malformed} malformed lines skipped, ${report.duplicates} duplicates)`
    );
  }

  return { store, report };
}

/**
 * Stream a corpus file line by line into {@link reduceVectorLines}.
 *
 * @throws MissingInputError if the file does not exist
 */
export async function reduceVectorSourceFile(
  path: string,
  config: ReducerConfig = {}
): Promise<ReductionResult> {
  if (!existsSync(path)) {
    throw new MissingInputError(path, 'vector corpus');
  }

  if (config.progressLogging) {
    console.log(
      `[Reducer] Reading ${path} (keeping top ${(config.topK ?? DEFAULT_TOP_K).toLocaleString('en-US')} words)`
    );
  }

  const input = createReadStream(path, { encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  try {
    return await reduceVectorLines(lines, config);
  } finally {
    // Leaving the loop early closes the line reader but not the file stream
    input.destroy();
  }
}

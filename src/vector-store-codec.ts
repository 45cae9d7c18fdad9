/**
 * Binary codec for the reduced word vector store (glove.bin)
 *
 * Layout, all integers little-endian:
 *
 * ```
 * u32 vocab_size
 * repeat vocab_size times:
 *   u16 word_byte_length
 *   word_byte_length bytes of UTF-8 word text
 *   dimension × f32
 * ```
 *
 * The dimension is not part of the header; readers pass it in.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';

import { BinaryReader, BinaryWriter } from './binary.js';
import { BYTES_PER_FLOAT, MAX_WORD_BYTES, VECTOR_DIM } from './config.js';
import { FormatError, MissingInputError } from './errors.js';
import { VectorStore } from './vector-store.js';

export interface VectorStoreCodecOptions {
  /**
   * Components per vector, known out of band
   * @default 100
   */
  dimension?: number;
}

export function serializeVectorStore(store: VectorStore): Buffer {
  const dimension = store.dimension;
  const encoded: Array<{ bytes: Buffer; vector: Float32Array }> = [];
  let size = 4;

  for (const { word, vector } of store.entries()) {
    const bytes = Buffer.from(word, 'utf-8');
    if (bytes.length > MAX_WORD_BYTES) {
      throw new FormatError(
        `Word of ${bytes.length} bytes exceeds the ${MAX_WORD_BYTES}-byte length field`,
        size
      );
    }
    encoded.push({ bytes, vector });
    size += 2 + bytes.length + dimension * BYTES_PER_FLOAT;
  }

  const writer = new BinaryWriter(size);
  writer.writeU32(encoded.length);
  for (const { bytes, vector } of encoded) {
    writer.writeU16(bytes.length);
    writer.writeBytes(bytes);
    writer.writeF32Array(vector);
  }

  return writer.finish();
}

/**
 * @throws TruncatedStreamError if a record is cut short
 * @throws EncodingError if a word is not valid UTF-8
 * @throws FormatError on duplicate words or trailing bytes
 */
export function deserializeVectorStore(
  bytes: Uint8Array,
  options: VectorStoreCodecOptions = {}
): VectorStore {
  const dimension = options.dimension ?? VECTOR_DIM;
  const reader = new BinaryReader(bytes);
  const store = new VectorStore({ dimension });

  const vocabSize = reader.readU32('vocab size');
  for (let i = 0; i < vocabSize; i++) {
    const recordOffset = reader.offset;
    const wordLength = reader.readU16(`word length of entry ${i}`);
    const word = reader.readUtf8(`word of entry ${i}`, wordLength);
    const vector = reader.readF32Array(`vector of entry ${i}`, dimension);

    if (store.has(word)) {
      throw new FormatError(`Duplicate word "${word}" in entry ${i}`, recordOffset);
    }
    store.add(word, vector);
  }

  reader.expectEnd();
  return store;
}

export async function readVectorStoreFile(
  path: string,
  options: VectorStoreCodecOptions = {}
): Promise<VectorStore> {
  if (!existsSync(path)) {
    throw new MissingInputError(path, 'vector store');
  }
  return deserializeVectorStore(await readFile(path), options);
}

/** Returns the number of bytes written. */
export async function writeVectorStoreFile(path: string, store: VectorStore): Promise<number> {
  const bytes = serializeVectorStore(store);
  const dir = dirname(path);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(path, bytes);
  return bytes.length;
}

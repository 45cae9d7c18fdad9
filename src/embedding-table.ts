/**
 * Binary codec for the command embedding table (cmd_embeddings.bin)
 *
 * Layout, all integers little-endian:
 *
 * ```
 * u32 command_count
 * u32 dimension
 * repeat command_count times:
 *   dimension × f32
 * ```
 *
 * Entry i is the embedding of record i of the catalog it was built from.
 * The codec cannot check that pairing; writers must emit exactly one entry
 * per record.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname } from 'path';

import { BinaryReader, BinaryWriter } from './binary.js';
import { BYTES_PER_FLOAT } from './config.js';
import { DimensionMismatchError, FormatError, MissingInputError } from './errors.js';

export interface EmbeddingTable {
  dimension: number;
  embeddings: Float32Array[];
}

export interface EmbeddingTableCodecOptions {
  /** Reject tables whose header declares another dimension */
  expectedDimension?: number;
}

const HEADER_BYTES = 8;

export function serializeEmbeddingTable(table: EmbeddingTable): Buffer {
  const { dimension, embeddings } = table;

  if (!Number.isInteger(dimension) || dimension <= 0) {
    throw new FormatError(`Dimension must be a positive integer, got ${dimension}`, 4);
  }

  embeddings.forEach((embedding, index) => {
    if (embedding.length !== dimension) {
      throw new DimensionMismatchError(
        dimension,
        embedding.length,
        HEADER_BYTES + index * dimension * BYTES_PER_FLOAT
      );
    }
  });

  const writer = new BinaryWriter(HEADER_BYTES + embeddings.length * dimension * BYTES_PER_FLOAT);
  writer.writeU32(embeddings.length);
  writer.writeU32(dimension);
  for (const embedding of embeddings) {
    writer.writeF32Array(embedding);
  }
  return writer.finish();
}

/**
 * @throws TruncatedStreamError if the header or an entry is cut short
 * @throws DimensionMismatchError if `expectedDimension` differs from the header
 * @throws FormatError on trailing bytes
 */
export function deserializeEmbeddingTable(
  bytes: Uint8Array,
  options: EmbeddingTableCodecOptions = {}
): EmbeddingTable {
  const reader = new BinaryReader(bytes);

  const count = reader.readU32('command count');
  const dimensionOffset = reader.offset;
  const dimension = reader.readU32('dimension');

  if (dimension === 0) {
    throw new FormatError('Dimension must be positive', dimensionOffset);
  }
  if (options.expectedDimension !== undefined && dimension !== options.expectedDimension) {
    throw new DimensionMismatchError(options.expectedDimension, dimension, dimensionOffset);
  }

  const embeddings: Float32Array[] = [];
  for (let i = 0; i < count; i++) {
    embeddings.push(reader.readF32Array(`embedding ${i}`, dimension));
  }

  reader.expectEnd();
  return { dimension, embeddings };
}

export async function readEmbeddingTableFile(
  path: string,
  options: EmbeddingTableCodecOptions = {}
): Promise<EmbeddingTable> {
  if (!existsSync(path)) {
    throw new MissingInputError(path, 'embedding table');
  }
  return deserializeEmbeddingTable(await readFile(path), options);
}

/** Returns the number of bytes written. */
export async function writeEmbeddingTableFile(path: string, table: EmbeddingTable): Promise<number> {
  const bytes = serializeEmbeddingTable(table);
  const dir = dirname(path);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }
  await writeFile(path, bytes);
  return bytes.length;
}

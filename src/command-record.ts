/**
 * Command catalog records and the YAML catalog loader
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse, YAMLError } from 'yaml';
import { z } from 'zod';

import { CatalogFormatError, MissingInputError } from './errors.js';

// YAML turns bare `2024` or `true` into scalars; the catalog means text.
const TextSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const TextListSchema = z.array(TextSchema).nullish().transform((v) => v ?? []);

export const CommandRecordSchema = z.object({
  command: TextSchema,
  description: TextSchema.nullish().transform((v) => v ?? ''),
  keywords: TextListSchema,

  // Carried through for the lookup tool, never read here
  niche: z.string().nullish().transform((v) => v ?? ''),
  platform: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform((v) => (v == null ? [] : Array.isArray(v) ? v : [v])),
  pipeline: z.boolean().nullish().transform((v) => v ?? false),
  tags: TextListSchema,
});

export type CommandRecord = z.output<typeof CommandRecordSchema>;

/** The fields an embedding is built from. */
export interface EmbeddableRecord {
  command: string;
  description?: string;
  keywords?: readonly string[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a command catalog: either a top-level list of records or a mapping
 * with a `commands` list. Record order is preserved; it is the order of the
 * embedding table built from it.
 *
 * @throws CatalogFormatError if the YAML is invalid or a record fails validation
 */
export function parseCommandCatalog(yamlText: string): CommandRecord[] {
  let data: unknown;
  try {
    data = parse(yamlText);
  } catch (err) {
    if (err instanceof YAMLError) {
      throw new CatalogFormatError(`Invalid catalog YAML: ${err.message}`);
    }
    throw err;
  }

  const commands = isPlainObject(data) ? data['commands'] : undefined;

  let entries: unknown[];
  if (data == null) {
    entries = [];
  } else if (Array.isArray(data)) {
    entries = data;
  } else if (Array.isArray(commands)) {
    entries = commands;
  } else {
    throw new CatalogFormatError('Catalog must be a list of commands or a mapping with a "commands" list');
  }

  return entries.map((entry, index) => {
    const result = CommandRecordSchema.safeParse(entry);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
        .join('; ');
      throw new CatalogFormatError(`Invalid command record at index ${index}: ${issues}`);
    }
    return result.data;
  });
}

/**
 * @throws MissingInputError if the catalog file does not exist
 */
export async function loadCommandCatalog(path: string): Promise<CommandRecord[]> {
  if (!existsSync(path)) {
    throw new MissingInputError(path, 'command catalog');
  }
  return parseCommandCatalog(await readFile(path, 'utf-8'));
}

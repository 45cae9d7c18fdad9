/**
 * Command definitions for the cmd-embed CLI
 */

import { Command, InvalidArgumentError, type OutputConfiguration } from 'commander';

import {
  DEFAULT_COMMANDS_PATH,
  DEFAULT_EMBEDDINGS_PATH,
  DEFAULT_SOURCE_PATH,
  DEFAULT_TOP_K,
  DEFAULT_VECTORS_PATH,
} from './config.js';
import { generateCommandEmbeddings, prepareVectors } from './pipeline.js';
import { formatBytes } from './utils.js';

interface PrepareOptions {
  source: string;
  out: string;
  topK: number;
  quiet?: boolean;
}

interface EmbedOptions {
  vectors: string;
  commands: string;
  out: string;
  quiet?: boolean;
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Build the CLI. Parse errors, help and version throw a `CommanderError`
 * instead of exiting, so callers decide the exit code.
 */
export function createProgram(output: OutputConfiguration = {}): Command {
  const program = new Command();

  // Set before adding subcommands, which copy these settings
  program.exitOverride().configureOutput(output);

  program
    .name('cmd-embed')
    .description('Build word-vector and command-embedding assets for shell command lookup')
    .version('0.1.0');

  program
    .command('prepare-vectors')
    .description('Reduce a frequency-ordered word vector corpus to its top K words and write the binary store')
    .option('-s, --source <path>', 'Text corpus, one "word f1 ... f100" per line', DEFAULT_SOURCE_PATH)
    .option('-o, --out <path>', 'Binary vector store to write', DEFAULT_VECTORS_PATH)
    .option('-k, --top-k <count>', 'Number of valid lines to keep', parseCount, DEFAULT_TOP_K)
    .option('-q, --quiet', 'Only print the final summary')
    .action(async (options: PrepareOptions) => {
      const report = await prepareVectors({
        sourcePath: options.source,
        outputPath: options.out,
        topK: options.topK,
        progressLogging: !options.quiet,
      });

      const { reduction } = report;
      console.log(
        `Wrote ${report.outputPath}: ${reduction.vocabSize.toLocaleString('en-US')} words, ` +
          `${formatBytes(report.bytesWritten)} ` +
          `(${reduction.linesRead.toLocaleString('en-US')} lines read, ${reduction.malformed} malformed skipped)`
      );
    });

  program
    .command('embed-commands')
    .description('Average word vectors over each catalog command and write the embedding table')
    .option('-v, --vectors <path>', 'Binary vector store from prepare-vectors', DEFAULT_VECTORS_PATH)
    .option('-c, --commands <path>', 'YAML command catalog', DEFAULT_COMMANDS_PATH)
    .option('-o, --out <path>', 'Embedding table to write', DEFAULT_EMBEDDINGS_PATH)
    .option('-q, --quiet', 'Only print the final summary')
    .action(async (options: EmbedOptions) => {
      const report = await generateCommandEmbeddings({
        vectorsPath: options.vectors,
        commandsPath: options.commands,
        outputPath: options.out,
        progressLogging: !options.quiet,
      });

      console.log(
        `Wrote ${report.outputPath}: ${report.commandCount.toLocaleString('en-US')} commands × ${report.dimension}, ` +
          `${formatBytes(report.bytesWritten)}`
      );
      if (report.zeroMatchCount > 0) {
        console.log(`Note: ${report.zeroMatchCount} commands had no matching words in the vocabulary`);
      }
    });

  return program;
}

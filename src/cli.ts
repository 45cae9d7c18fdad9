#!/usr/bin/env node
/**
 * CLI for building the word-vector store and the command embedding table
 */

import { CommanderError } from 'commander';

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    // Commander has already printed its own message
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(`[cmd-embed] ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { parseVectorLine, reduceVectorLines, reduceVectorSourceFile } from '../src/reducer.js';
import { MalformedLineError, MissingInputError } from '../src/errors.js';

function line(word: string, dimension: number, value = 0.25): string {
  return [word, ...new Array<string>(dimension).fill(String(value))].join(' ');
}

describe('parseVectorLine', () => {
  it('parses a word and its components', () => {
    const entry = parseVectorLine('the 0.5 -1.25', 2);
    expect(entry.word).toBe('the');
    expect(entry.vector).toEqual(new Float32Array([0.5, -1.25]));
  });

  it('accepts exponent notation and surrounding whitespace', () => {
    const entry = parseVectorLine('  of\t1e-3 +2E2  \n', 2);
    expect(entry.vector).toEqual(new Float32Array([1e-3, 200]));
  });

  it('rejects the wrong component count', () => {
    expect(() => parseVectorLine('the 1 2 3', 2)).toThrow(MalformedLineError);
    expect(() => parseVectorLine('the 1', 2)).toThrow('expected 2 components for "the", got 1');
  });

  it('rejects non-numeric components', () => {
    expect(() => parseVectorLine('the 1 abc', 2)).toThrow('non-numeric component "abc"');
    expect(() => parseVectorLine('the 1 NaN', 2)).toThrow(MalformedLineError);
    expect(() => parseVectorLine('the 1 0x10', 2)).toThrow(MalformedLineError);
  });

  it('rejects components beyond single-precision range', () => {
    expect(() => parseVectorLine('aa 1e39 0', 2)).toThrow('component "1e39" out of single-precision range for "aa"');
    expect(() => parseVectorLine('aa 0 -1e39', 2)).toThrow(MalformedLineError);
  });

  it('rejects blank lines', () => {
    expect(() => parseVectorLine('   ', 2)).toThrow('blank line');
  });

  it('includes the line number when given', () => {
    expect(() => parseVectorLine('the 1', 2, 7)).toThrow('Malformed line 7:');
  });
});

describe('reduceVectorLines', () => {
  it('keeps valid lines in source order', async () => {
    const { store, report } = await reduceVectorLines(['aa 1 0', 'bb 0 1'], { dimension: 2 });
    expect(store.keys()).toEqual(['aa', 'bb']);
    expect(store.get('bb')).toEqual(new Float32Array([0, 1]));
    expect(report).toEqual({ linesRead: 2, accepted: 2, malformed: 0, duplicates: 0, vocabSize: 2 });
  });

  it('skips malformed lines without counting them toward topK', async () => {
    const lines = ['aa 1 0', 'bad 1', 'bb x 1', 'cc 0 1', 'dd 1 1'];
    const { store, report } = await reduceVectorLines(lines, { dimension: 2, topK: 2 });
    expect(store.keys()).toEqual(['aa', 'cc']);
    expect(report).toEqual({ linesRead: 4, accepted: 2, malformed: 2, duplicates: 0, vocabSize: 2 });
  });

  it('skips lines whose components overflow single precision', async () => {
    const { store, report } = await reduceVectorLines(['aa 1e39 0', 'bb -1e39 1', 'cc 3e38 1'], { dimension: 2 });
    expect(store.keys()).toEqual(['cc']);
    expect(store.get('cc')).toEqual(new Float32Array([3e38, 1]));
    expect(report).toEqual({ linesRead: 3, accepted: 1, malformed: 2, duplicates: 0, vocabSize: 1 });
  });

  it('lets the last duplicate win', async () => {
    const { store, report } = await reduceVectorLines(['aa 1 0', 'bb 0 1', 'aa 2 2'], { dimension: 2 });
    expect(store.keys()).toEqual(['aa', 'bb']);
    expect(store.get('aa')).toEqual(new Float32Array([2, 2]));
    expect(report.duplicates).toBe(1);
    expect(report.accepted).toBe(3);
    expect(report.vocabSize).toBe(2);
  });

  it('reads nothing when topK is 0', async () => {
    const { store, report } = await reduceVectorLines(['aa 1 0'], { dimension: 2, topK: 0 });
    expect(store.size()).toBe(0);
    expect(report.linesRead).toBe(0);
  });

  it('rejects a negative topK', async () => {
    await expect(reduceVectorLines([], { topK: -1 })).rejects.toThrow('topK must be a non-negative integer');
  });

  it('accepts async line sources', async () => {
    async function* lines(): AsyncGenerator<string> {
      yield 'aa 1 0';
      yield 'bb 0 1';
    }
    const { store } = await reduceVectorLines(lines(), { dimension: 2 });
    expect(store.keys()).toEqual(['aa', 'bb']);
  });

  it('caps 150,000 valid lines at the first 100,000', async () => {
    function* corpus(): Generator<string> {
      for (let i = 0; i < 150_000; i++) {
        yield `w${i} ${i} 1`;
      }
    }

    const { store, report } = await reduceVectorLines(corpus(), { dimension: 2, topK: 100_000 });
    expect(store.size()).toBe(100_000);
    expect(report.linesRead).toBe(100_000);
    const keys = store.keys();
    expect(keys[0]).toBe('w0');
    expect(keys[99_999]).toBe('w99999');
    expect(store.has('w100000')).toBe(false);
    expect(store.get('w99999')).toEqual(new Float32Array([99_999, 1]));
  });

  it('uses 100 dimensions and a 100,000 word cap by default', async () => {
    const { store } = await reduceVectorLines([line('the', 100), line('short', 50)]);
    expect(store.keys()).toEqual(['the']);
    expect(store.dimension).toBe(100);
  });

  it('logs a summary when progress logging is enabled', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await reduceVectorLines(['aa 1 0', 'bad'], { dimension: 2, progressLogging: true });
    expect(log).toHaveBeenCalledWith('[Reducer] Kept 1 word vectors (1 malformed lines skipped, 0 duplicates)');
    log.mockRestore();
  });
});

describe('reduceVectorSourceFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reducer-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('streams a corpus file', async () => {
    const path = join(dir, 'vectors.txt');
    await writeFile(path, [line('the', 100), 'broken 1 2', line('of', 100), line('and', 100)].join('\n') + '\n');

    const { store, report } = await reduceVectorSourceFile(path, { topK: 2 });
    expect(store.keys()).toEqual(['the', 'of']);
    expect(report.malformed).toBe(1);
  });

  it('handles CRLF line endings', async () => {
    const path = join(dir, 'vectors.txt');
    await writeFile(path, `aa 1 0\r\nbb 0 1\r\n`);

    const { store } = await reduceVectorSourceFile(path, { dimension: 2 });
    expect(store.get('bb')).toEqual(new Float32Array([0, 1]));
  });

  it('throws MissingInputError for an absent corpus', async () => {
    await expect(reduceVectorSourceFile(join(dir, 'none.txt'))).rejects.toThrow(MissingInputError);
  });
});

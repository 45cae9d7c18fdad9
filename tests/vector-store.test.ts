import { describe, it, expect, beforeEach } from 'vitest';
import { VectorStore } from '../src/vector-store.js';

describe('VectorStore', () => {
  let store: VectorStore;

  beforeEach(() => {
    store = new VectorStore({ dimension: 3 });
  });

  it('defaults to 100 dimensions', () => {
    expect(new VectorStore().dimension).toBe(100);
  });

  it('rejects a non-positive dimension', () => {
    expect(() => new VectorStore({ dimension: 0 })).toThrow('Invalid vector dimension');
  });

  it('adds and retrieves vectors', () => {
    store.add('git', [1, 0, 0]);
    expect(store.get('git')).toEqual(new Float32Array([1, 0, 0]));
    expect(store.has('git')).toBe(true);
    expect(store.get('svn')).toBeUndefined();
  });

  it('stores values in single precision', () => {
    store.add('git', [0.1, 0.2, 0.3]);
    expect(store.get('git')![0]).toBe(Math.fround(0.1));
  });

  it('looks words up by exact key', () => {
    store.add('git', [1, 0, 0]);
    expect(store.get('Git')).toBeUndefined();
  });

  it('throws on dimension mismatch', () => {
    expect(() => store.add('git', [1, 2])).toThrow('dimension mismatch');
  });

  it('reports correct size', () => {
    expect(store.size()).toBe(0);
    store.add('a1', [1, 0, 0]);
    store.add('a2', [0, 1, 0]);
    expect(store.size()).toBe(2);
  });

  it('keeps insertion order', () => {
    store.add('the', [1, 0, 0]);
    store.add('of', [0, 1, 0]);
    store.add('and', [0, 0, 1]);
    expect(store.keys()).toEqual(['the', 'of', 'and']);
  });

  it('replaces a re-added word in its original position', () => {
    store.add('the', [1, 0, 0]);
    store.add('of', [0, 1, 0]);
    store.add('the', [2, 2, 2]);
    expect(store.keys()).toEqual(['the', 'of']);
    expect(store.get('the')).toEqual(new Float32Array([2, 2, 2]));
  });

  it('hands out copies from export and entries', () => {
    store.add('git', [1, 0, 0]);

    store.export()[0]!.vector[0] = 99;
    for (const entry of store.entries()) {
      entry.vector[1] = 99;
    }

    expect(store.get('git')).toEqual(new Float32Array([1, 0, 0]));
  });

  it('copies vectors on add', () => {
    const source = new Float32Array([1, 0, 0]);
    store.add('git', source);
    source[0] = 99;
    expect(store.get('git')).toEqual(new Float32Array([1, 0, 0]));
  });

  describe('addBatch', () => {
    it('adds multiple vectors at once', () => {
      store.addBatch([
        { word: 'a1', vector: new Float32Array([1, 0, 0]) },
        { word: 'b1', vector: new Float32Array([0, 1, 0]) },
      ]);
      expect(store.size()).toBe(2);
    });
  });

  describe('export / import', () => {
    it('round-trips data', () => {
      store.add('git', [1, 0, 0]);
      store.add('log', [0, 1, 0]);

      const exported = store.export();
      expect(exported).toHaveLength(2);
      expect(exported[0]!.word).toBe('git');

      const newStore = new VectorStore({ dimension: 3 });
      newStore.import(exported);
      expect(newStore.keys()).toEqual(['git', 'log']);
      expect(newStore.get('log')).toEqual(new Float32Array([0, 1, 0]));
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MemoryStore } from './store.js';

let dir: string;
let path: string;
let clock: number;
let errors: Error[];

function makeStore(): MemoryStore {
  return new MemoryStore(path, { now: () => clock, onError: err => errors.push(err) });
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'starsift-memory-'));
  path = join(dir, 'nested', 'memory.json');
  clock = 1_700_000_000;
  errors = [];
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('MemoryStore', () => {
  it('init creates the directory and an empty array file', () => {
    makeStore().init();
    expect(readFileSync(path, 'utf-8')).toBe('[]');
  });

  it('init leaves an existing file alone', () => {
    const store = makeStore();
    store.init();
    store.store('a', { summary: 'kept' });
    store.init();
    expect(store.list()).toHaveLength(1);
  });

  it('returns an empty list for a missing file', () => {
    expect(makeStore().list()).toEqual([]);
    expect(errors).toEqual([]);
  });

  it('stores and replaces records by key', () => {
    const store = makeStore();

    expect(store.store('a', { summary: 'first' })).toEqual({ updated: false });
    clock += 10;
    expect(store.store('b', { summary: 'other' })).toEqual({ updated: false });
    clock += 10;
    expect(store.store('a', { summary: 'second' })).toEqual({ updated: true });

    expect(store.list().map(r => r.key)).toEqual(['a', 'b']);
    expect(store.get('a')).toEqual({ key: 'a', timestamp: 1_700_000_020, data: { summary: 'second' } });
    expect(store.get('missing')).toBeUndefined();
  });

  it('reports invalid JSON and loads nothing', () => {
    makeStore().init();
    writeFileSync(path, '{ not json', 'utf-8');

    expect(makeStore().load()).toEqual([]);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toContain('Failed to read memory file');
  });

  it('reports records that fail validation', () => {
    makeStore().init();
    writeFileSync(path, JSON.stringify([{ key: 1, timestamp: 'now', data: {} }]), 'utf-8');

    expect(makeStore().load()).toEqual([]);
    expect(errors[0].message).toContain('Invalid memory file');
    expect(errors[0].message).toContain('0.key');
  });

  it('keeps unknown data fields', () => {
    const store = makeStore();
    store.store('a', { summary: 's', extra: 42 });
    expect(store.get('a')?.data).toEqual({ summary: 's', extra: 42 });
  });

  it('finds records by case-insensitive summary substring', () => {
    const store = makeStore();
    store.store('a', { summary: 'A temperate EXOPLANET transit' });
    store.store('b', { summary: 'Solar flare activity' });
    store.store('c', { title: 'no summary' });

    expect(store.querySimilar('exoplanet').map(r => r.key)).toEqual(['a']);
    expect(store.querySimilar('').map(r => r.key)).toEqual(['a', 'b']);
    expect(store.querySimilar('nebula')).toEqual([]);
  });

  it('compacts by removing raw text', () => {
    const store = makeStore();
    store.store('a', { summary: 's', raw: 'long raw text' });
    store.store('b', { summary: 't' });

    expect(store.compact()).toBe(1);
    expect(store.get('a')?.data).toEqual({ summary: 's' });
    expect(store.compact()).toBe(0);
  });

  it('does not write when there is nothing to compact', () => {
    const store = makeStore();
    expect(store.compact()).toBe(0);
    expect(existsSync(path)).toBe(false);
  });
});

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExtractionCache, GRANT_CACHE_FILENAME } from '../extraction-cache.js';

const URL_A = 'https://grants.example/a';
const URL_B = 'https://grants.example/b';

describe('ExtractionCache', () => {
  let dir: string;
  let path: string;
  const now = () => new Date('2026-02-01T12:00:00.000Z');

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'grant-cache-test-'));
    path = join(dir, GRANT_CACHE_FILENAME);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('should serve buffered entries and persist them on flush', async () => {
    const cache = new ExtractionCache({ path, now });
    await cache.load();

    expect(cache.get(URL_A)).toBeNull();
    cache.put(URL_A, { title: 'Ocean call', deadline: '2026-05-01' });
    expect(cache.get(URL_A)?.title).toBe('Ocean call');
    expect(await cache.flush()).toBe(1);

    const reloaded = new ExtractionCache({ path, now });
    await reloaded.load();
    expect(reloaded.get(URL_A)).toEqual({
      title: 'Ocean call',
      organization: null,
      abstract: null,
      deadline: '2026-05-01',
      fundingAmount: null,
      cachedAt: '2026-02-01T12:00:00.000Z'
    });
  });

  test('should count hits, misses and distinct cached URLs', async () => {
    const cache = new ExtractionCache({ path, now });
    await cache.load();
    cache.put(URL_A, { title: 'A' });
    await cache.flush();
    cache.put(URL_A, { title: 'A again' });
    cache.put(URL_B, { title: 'B' });

    cache.get(URL_A);
    cache.get(URL_B);
    cache.get('https://grants.example/missing');

    expect(cache.stats()).toEqual({ hits: 2, misses: 1, itemCount: 2 });
  });

  test('should serve a cached page under any variant of its URL', async () => {
    const cache = new ExtractionCache({ path, now });
    await cache.load();
    cache.put(`${URL_A}/`, { title: 'Ocean call' });
    await cache.flush();

    const reloaded = new ExtractionCache({ path, now });
    await reloaded.load();
    expect(reloaded.get(URL_A)?.title).toBe('Ocean call');
    expect(reloaded.get(`${URL_A}#details`)?.title).toBe('Ocean call');
    expect(reloaded.stats()).toEqual({ hits: 2, misses: 0, itemCount: 1 });
    expect(Object.keys(JSON.parse(await readFile(path, 'utf-8')).grants)).toEqual([URL_A]);
  });

  test('should skip the write when nothing is pending', async () => {
    const cache = new ExtractionCache({ path, now });
    await cache.load();

    expect(await cache.flush()).toBe(0);
    await expect(readFile(path, 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('should bypass an unreadable cache without overwriting it', async () => {
    await writeFile(path, 'not json');
    const cache = new ExtractionCache({ path, now });

    await cache.load();
    cache.put(URL_A, { title: 'A' });

    expect(cache.get(URL_A)).toBeNull();
    expect(await cache.flush()).toBe(0);
    expect(await readFile(path, 'utf-8')).toBe('not json');
  });
});

/**
 * Input File Loader Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigMissingError, DEFAULT_SOURCE_URL } from '../../src/lib/iptv';
import {
  loadCategoryTemplate,
  loadChannelMapping,
  loadSourceList,
  readTextFile,
} from './file-loader';

const missing = async (path: string): Promise<string> => {
  throw new ConfigMissingError(path);
};

describe('FileLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'channel-sorter-loader-'));
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('readTextFile', () => {
    it('reads UTF-8 content', async () => {
      const path = join(dir, 'moban.txt');
      await writeFile(path, '央视频道,#genre#\nCCTV1\n', 'utf-8');

      await expect(readTextFile(path)).resolves.toBe('央视频道,#genre#\nCCTV1\n');
    });

    it('throws ConfigMissingError for a missing file', async () => {
      const path = join(dir, 'absent.txt');

      await expect(readTextFile(path)).rejects.toBeInstanceOf(ConfigMissingError);
      await expect(readTextFile(path)).rejects.toThrow(`Config file not found: ${path}`);
    });
  });

  describe('loadSourceList', () => {
    it('parses the source file', async () => {
      const read = vi.fn().mockResolvedValue('https://a.example.com/1.m3u\n# off\n');

      await expect(loadSourceList('sources.txt', read)).resolves.toEqual(['https://a.example.com/1.m3u']);
      expect(read).toHaveBeenCalledWith('sources.txt');
    });

    it('falls back to the default source when the file is missing', async () => {
      await expect(loadSourceList('sources.txt', missing)).resolves.toEqual([DEFAULT_SOURCE_URL]);
    });

    it('falls back to the default source for an empty file on disk', async () => {
      const path = join(dir, 'sources.txt');
      await writeFile(path, '', 'utf-8');

      await expect(loadSourceList(path)).resolves.toEqual([DEFAULT_SOURCE_URL]);
    });
  });

  describe('loadChannelMapping', () => {
    it('parses the mapping file', async () => {
      const mapping = await loadChannelMapping('m.txt', async () => 'CCTV-1,CCTV1');

      expect(mapping.get('CCTV-1')).toBe('CCTV1');
    });

    it('returns an empty mapping when the file is missing', async () => {
      const mapping = await loadChannelMapping('m.txt', missing);

      expect(mapping.size).toBe(0);
    });
  });

  describe('loadCategoryTemplate', () => {
    it('parses the template file', async () => {
      const template = await loadCategoryTemplate('t.txt', async () => 'News,#genre#\nCNN');

      expect(template).toEqual([{ category: 'News', expectedNames: ['CNN'] }]);
    });

    it('returns an empty template when the file is missing', async () => {
      await expect(loadCategoryTemplate('t.txt', missing)).resolves.toEqual([]);
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });
});

/**
 * Playlist Fetcher Tests
 *
 * Tests for the worker's M3U playlist download.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Mock undici
const { mockFetch } = vi.hoisted(() => ({
  mockFetch: vi.fn(),
}));

vi.mock('undici', () => ({
  Agent: vi.fn(),
  fetch: (...args: unknown[]) => mockFetch(...args),
}));

import { extractSourceUrl, fetchPlaylist } from './playlist-fetcher';

const fastOptions = { timeout: 1000, maxRetries: 3, retryBaseDelay: 1 };

describe('PlaylistFetcher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockFetch.mockReset();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('extractSourceUrl', () => {
    it('finds the URL inside a source line', () => {
      expect(extractSourceUrl('https://example.com/a.m3u')).toBe('https://example.com/a.m3u');
      expect(extractSourceUrl('http://example.com/a.m3u backup')).toBe('http://example.com/a.m3u');
    });

    it('returns null when there is no URL', () => {
      expect(extractSourceUrl('httpish')).toBeNull();
    });
  });

  describe('fetchPlaylist', () => {
    it('returns the playlist text', async () => {
      const m3uContent = '#EXTM3U\n#EXTINF:-1,CNN\nhttp://example.com/cnn.m3u8';
      mockFetch.mockResolvedValueOnce({
        ok: true,
        text: vi.fn().mockResolvedValue(m3uContent),
      });

      const result = await fetchPlaylist('http://example.com/playlist.m3u', fastOptions);

      expect(result.success).toBe(true);
      expect(result.content).toBe(m3uContent);
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
      expect(mockFetch).toHaveBeenCalledWith(
        'http://example.com/playlist.m3u',
        expect.objectContaining({ headers: expect.objectContaining({ Accept: '*/*' }) })
      );
    });

    it('rejects sources without a URL without fetching', async () => {
      const result = await fetchPlaylist('not a url', fastOptions);

      expect(result).toEqual({ success: false, error: 'Invalid source URL', durationMs: expect.any(Number) });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('returns an error on HTTP failure after all retries', async () => {
      mockFetch.mockResolvedValue({
        ok: false,
        status: 404,
        statusText: 'Not Found',
      });

      const result = await fetchPlaylist('http://example.com/missing.m3u', fastOptions);

      expect(result.success).toBe(false);
      expect(result.error).toBe('HTTP 404: Not Found');
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('retries on failure then succeeds', async () => {
      mockFetch
        .mockRejectedValueOnce(new Error('Network error'))
        .mockResolvedValueOnce({
          ok: true,
          text: vi.fn().mockResolvedValue('#EXTM3U'),
        });

      const result = await fetchPlaylist('http://example.com/retry.m3u', fastOptions);

      expect(result.success).toBe(true);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('times out when the body stalls after the headers arrive', async () => {
      mockFetch.mockImplementation((_url: string, init: { signal: AbortSignal }) =>
        Promise.resolve({
          ok: true,
          text: () =>
            new Promise<string>((_resolve, reject) => {
              init.signal.addEventListener('abort', () =>
                reject(new Error('This operation was aborted'))
              );
            }),
        })
      );

      const result = await fetchPlaylist('http://example.com/slow.m3u', {
        timeout: 20,
        maxRetries: 1,
        retryBaseDelay: 1,
      });

      expect(result).toEqual({
        success: false,
        error: 'This operation was aborted',
        durationMs: expect.any(Number),
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('reports transport errors', async () => {
      mockFetch.mockRejectedValue(new Error('getaddrinfo ENOTFOUND example.invalid'));

      const result = await fetchPlaylist('http://example.invalid/a.m3u', { ...fastOptions, maxRetries: 1 });

      expect(result).toEqual({
        success: false,
        error: 'getaddrinfo ENOTFOUND example.invalid',
        durationMs: expect.any(Number),
      });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });
});

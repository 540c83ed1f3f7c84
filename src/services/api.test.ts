import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { api } from './api';
import { DecodeError, FetchError } from './errors';
import { TEST_URL, jsonResponse, rawRecords, textResponse } from '../test/fixtures';

const mockFetch = vi.fn();

describe('API Service', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('fetchJson', () => {
    it('should make a single GET request to the given URL', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(rawRecords));

      const result = await api.fetchJson(TEST_URL);

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(mockFetch).toHaveBeenCalledWith(TEST_URL, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
        },
      });
      expect(result).toEqual(rawRecords);
    });

    it('should reject a relative URL without making a request', async () => {
      await expect(api.fetchJson('/data.json')).rejects.toThrow(FetchError);
      await expect(api.fetchJson('/data.json')).rejects.toThrow('Invalid absolute URL: /data.json');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should throw FetchError with status for non-2xx responses', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('Not here', 404, 'Not Found'));

      const error = await api.fetchJson(TEST_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        name: 'FetchError',
        status: 404,
        statusText: 'Not Found',
        url: TEST_URL,
        message: 'Not here',
      });
    });

    it('should fall back to status text for an empty error body', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('', 500, 'Internal Server Error'));

      await expect(api.fetchJson(TEST_URL)).rejects.toThrow('Internal Server Error');
    });

    it('should wrap network errors in FetchError with status 0', async () => {
      mockFetch.mockRejectedValueOnce(new Error('connection refused'));

      const error = await api.fetchJson(TEST_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({ status: 0, message: 'Network error: connection refused' });
    });

    it('should throw DecodeError for a truncated body', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('[{"name": "Nora'));

      const error = await api.fetchJson(TEST_URL).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ name: 'DecodeError', url: TEST_URL });
    });

    it('should not retry after a failure', async () => {
      mockFetch.mockResolvedValueOnce(textResponse('busy', 503, 'Service Unavailable'));

      await expect(api.fetchJson(TEST_URL)).rejects.toThrow(FetchError);
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('Error classes', () => {
    it('should expose structured fields', () => {
      const error = new FetchError(400, TEST_URL, 'Bad Request', 'Bad Request');

      expect(error.name).toBe('FetchError');
      expect(error.status).toBe(400);
      expect(error.url).toBe(TEST_URL);
      expect(error).toBeInstanceOf(Error);
    });
  });
});

import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import axios from 'axios';
import { HttpClient, HttpStatusError } from './http-client.js';

vi.mock('axios', async () => {
  return {
    default: {
      create: vi.fn(),
    },
  };
});

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('HttpClient', () => {
  let client: HttpClient;
  let mockGet: Mock;

  beforeEach(() => {
    vi.clearAllMocks();

    mockGet = vi.fn();
    (axios.create as Mock).mockReturnValue({ get: mockGet });

    client = new HttpClient({ maxRetries: 3, retryDelayMs: 0, timeoutMs: 5000 });
  });

  describe('constructor', () => {
    it('should never let axios throw on status codes', () => {
      const options = (axios.create as Mock).mock.calls[0]?.[0];

      expect(options.timeout).toBe(5000);
      expect(options.validateStatus(503)).toBe(true);
      expect(options.headers['Accept-Language']).toBe('en-US,en;q=0.9');
    });
  });

  describe('getText', () => {
    it('should return the body of a 2xx response', async () => {
      mockGet.mockResolvedValue({ status: 200, data: '<html>ok</html>' });

      await expect(client.getText('https://directory.example/results')).resolves.toBe('<html>ok</html>');
      expect(mockGet).toHaveBeenCalledWith('https://directory.example/results', { responseType: 'text' });
    });

    it('should retry transient statuses', async () => {
      mockGet
        .mockResolvedValueOnce({ status: 503, data: '' })
        .mockResolvedValueOnce({ status: 429, data: '' })
        .mockResolvedValueOnce({ status: 200, data: 'third time' });

      await expect(client.getText('https://directory.example/a')).resolves.toBe('third time');
      expect(mockGet).toHaveBeenCalledTimes(3);
    });

    it('should fail at once on a non-transient status', async () => {
      mockGet.mockResolvedValue({ status: 404, data: 'missing' });

      const error = await client.getText('https://directory.example/gone').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({ status: 404, url: 'https://directory.example/gone' });
      expect(mockGet).toHaveBeenCalledTimes(1);
    });

    it('should give up after maxRetries network errors with the last error', async () => {
      mockGet
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockRejectedValueOnce(new Error('ETIMEDOUT'));

      await expect(client.getText('https://directory.example/slow')).rejects.toThrow('ETIMEDOUT');
      expect(mockGet).toHaveBeenCalledTimes(3);
    });

    it('should surface the transient status once retries run out', async () => {
      mockGet.mockResolvedValue({ status: 502, data: '' });

      await expect(client.getText('https://directory.example/bad')).rejects.toThrow(
        'Request to https://directory.example/bad failed with status 502'
      );
      expect(mockGet).toHaveBeenCalledTimes(3);
    });
  });

  describe('request', () => {
    it('should pass params and headers and return status with data', async () => {
      mockGet.mockResolvedValue({ status: 403, data: { error: 'forbidden' } });

      const response = await client.request('https://api.example/search', {
        params: { q: 'dentist' },
        headers: { Accept: 'application/json' },
      });

      expect(response).toEqual({ status: 403, data: { error: 'forbidden' } });
      expect(mockGet).toHaveBeenCalledWith('https://api.example/search', {
        params: { q: 'dentist' },
        headers: { Accept: 'application/json' },
      });
    });
  });
});

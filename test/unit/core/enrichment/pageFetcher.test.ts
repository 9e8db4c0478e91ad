import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { gzipSync } from 'zlib';
import { fetchPage } from '../../../../src/core/enrichment/pageFetcher';
import { NetworkError, TimeoutError } from '../../../../src/core/errors';

interface FakeResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: { arrayBuffer: () => Promise<ArrayBuffer> };
}

const mockRequest = jest.fn<(options: unknown) => Promise<FakeResponse>>();
const mockClose = jest.fn<() => Promise<void>>();
const mockRedirect = jest.fn<(options: unknown) => unknown>();

jest.mock('undici', () => ({
  Agent: class {
    compose() {
      return {
        request: (options: unknown) => mockRequest(options),
        close: () => mockClose(),
      };
    }
  },
  interceptors: {
    redirect: (options: unknown) => mockRedirect(options),
  },
}));

function respond(statusCode: number, body: Buffer, headers: Record<string, string> = {}): FakeResponse {
  return {
    statusCode,
    headers,
    body: { arrayBuffer: () => Promise.resolve(new Uint8Array(body).buffer) },
  };
}

describe('fetchPage', () => {
  beforeEach(() => {
    mockRequest.mockReset();
    mockClose.mockReset();
    mockClose.mockResolvedValue(undefined);
    mockRedirect.mockReset();
  });

  test('fetches and decodes a compressed page', async () => {
    mockRequest.mockResolvedValue(
      respond(200, gzipSync('<html>Acme</html>'), {
        'content-encoding': 'gzip',
        'content-type': 'text/html; charset=utf-8',
      })
    );

    const result = await fetchPage('https://acme.io/about?x=1', { timeoutMs: 1000, userAgent: 'test-agent' });

    expect(result).toEqual({
      statusCode: 200,
      bodyText: '<html>Acme</html>',
      contentType: 'text/html; charset=utf-8',
    });
    expect(mockRedirect).toHaveBeenCalledWith({ maxRedirections: 3 });
    expect(mockRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        origin: 'https://acme.io',
        path: '/about?x=1',
        method: 'GET',
        headers: expect.objectContaining({ 'user-agent': 'test-agent' }),
      })
    );
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('raises HTTP errors with their status', async () => {
    mockRequest.mockResolvedValue(respond(404, Buffer.from('missing')));

    const failure = fetchPage('https://acme.io/gone', { timeoutMs: 1000 });
    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toThrow('Network error: HTTP error (status: 404)');
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('raises a redirect that was not followed', async () => {
    mockRequest.mockResolvedValue(respond(301, Buffer.alloc(0), { location: 'https://www.acme.io/' }));

    await expect(fetchPage('https://acme.io', { timeoutMs: 1000 })).rejects.toThrow(
      'Network error: Redirect not followed (status: 301)'
    );
  });

  test('times out a request that never answers', async () => {
    mockRequest.mockReturnValue(new Promise<FakeResponse>(() => undefined));

    await expect(fetchPage('https://acme.io/slow', { timeoutMs: 20 })).rejects.toBeInstanceOf(TimeoutError);
  });

  test('wraps connection failures as network errors', async () => {
    mockRequest.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:443'));

    await expect(fetchPage('https://acme.io', { timeoutMs: 1000 })).rejects.toThrow(
      'Network error: connect ECONNREFUSED 127.0.0.1:443'
    );
  });

  test('rejects non-http(s) URLs before connecting', async () => {
    await expect(fetchPage('file:///etc/passwd', { timeoutMs: 1000 })).rejects.toThrow(
      'Only http(s) schemes are allowed'
    );
    expect(mockRequest).not.toHaveBeenCalled();
  });
});

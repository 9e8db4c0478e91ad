import { Agent, interceptors, type Dispatcher } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import { SCRAPE_LIMITS, USER_AGENT } from '../../config/constants';
import { withTiming, createChildLogger, generateCorrelationId } from '../../utils/logger';
import { TimeoutError, NetworkError } from '../errors';
const { redirect } = interceptors;

export interface FetchOptions {
  timeoutMs: number;
  userAgent?: string;
}

export interface FetchResult {
  statusCode: number;
  bodyText: string;
  contentType?: string;
}

export type PageFetcher = (url: string, options: FetchOptions) => Promise<FetchResult>;

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function decodeBody(buf: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buf);
  if (encoding.includes('gzip')) return gunzipSync(buf);
  if (encoding.includes('deflate')) return inflateSync(buf);
  return buf;
}

/**
 * One GET with a hard deadline, a few redirects and compressed bodies decoded.
 * Redirects may cross origins (apex to www, http to https). HTTP errors
 * (>= 400) and redirects left over after the limit are raised as NetworkError.
 */
export async function fetchPage(url: string, options: FetchOptions): Promise<FetchResult> {
  const { timeoutMs } = options;

  if (!/^https?:\/\//i.test(url)) {
    throw new NetworkError('Only http(s) schemes are allowed');
  }

  const log = createChildLogger(generateCorrelationId());
  const controller = new AbortController();
  let dispatcher: Dispatcher | null = null;
  let promiseTimeoutId: NodeJS.Timeout | null = null;

  const headers: Record<string, string> = {
    'user-agent': options.userAgent ?? USER_AGENT,
    accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'accept-language': 'en-US,en;q=0.9',
    'accept-encoding': 'gzip, br, deflate',
  };

  try {
    const urlObj = new URL(url);
    const path = urlObj.pathname + urlObj.search;

    dispatcher = new Agent().compose(redirect({ maxRedirections: SCRAPE_LIMITS.MAX_REDIRECTS }));

    const requestPromise = dispatcher.request({
      origin: urlObj.origin,
      path,
      method: 'GET',
      signal: controller.signal,
      headers,
    });

    const timeoutPromise = new Promise<never>((_, reject) => {
      promiseTimeoutId = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError('Request timed out', timeoutMs));
      }, timeoutMs);
    });

    const res = await withTiming(log, 'http.fetch', () => Promise.race([requestPromise, timeoutPromise]), {
      url,
    });

    const ab = await res.body.arrayBuffer();
    if (promiseTimeoutId) clearTimeout(promiseTimeoutId);

    const encoding = (headerValue(res.headers['content-encoding']) ?? '').toLowerCase();
    const bodyText = decodeBody(Buffer.from(ab), encoding).toString('utf8');

    log.debug({ statusCode: res.statusCode, encoding, textLength: bodyText.length }, 'Page fetched');

    if (res.statusCode >= 400) {
      throw new NetworkError('HTTP error', res.statusCode);
    }
    if (res.statusCode >= 300) {
      throw new NetworkError('Redirect not followed', res.statusCode);
    }

    return {
      statusCode: res.statusCode,
      bodyText,
      contentType: headerValue(res.headers['content-type']),
    };
  } catch (err) {
    if (err instanceof TimeoutError || err instanceof NetworkError) {
      throw err;
    }
    if (err instanceof Error && err.name === 'AbortError') {
      throw new TimeoutError('Request timed out', timeoutMs);
    }
    throw new NetworkError(err instanceof Error ? err.message : 'Unknown network error');
  } finally {
    if (promiseTimeoutId) clearTimeout(promiseTimeoutId);
    if (dispatcher) {
      try {
        await dispatcher.close();
      } catch (closeError) {
        log.debug({ error: closeError }, 'Dispatcher close failed');
      }
    }
  }
}

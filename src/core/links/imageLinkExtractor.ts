import type pino from 'pino';
import { IMAGE_LINK_EXTRACTION } from '../../config/constants';
import { describeError, isTransientFailure } from '../errors';
import { ImagePreparer, toImageContentPart, type SourceImage } from '../images/imagePreparer';
import type { ChatCompletionProvider, ContentPart } from '../llm/types';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';

const URL_IN_TEXT_PATTERN = /https?:\/\/[^\s<>"'`{}|\\^[\]]+/gi;

export const IMAGE_LINK_INSTRUCTION = `Please carefully examine all the images and extract any URLs, website addresses, social media handles, email addresses, or company links that you can see in the visual content.

Return ONLY a JSON list of URLs in this exact format:
["url1", "url2", "url3"]

Include:
- Complete website URLs (http/https)
- Social media profiles (LinkedIn, Twitter, Facebook, Instagram, etc.)
- Company websites
- Email addresses
- Any other web links visible in the images

If no URLs are found, return an empty list: []`;

export interface ImageLinkExtractorOptions {
  provider: ChatCompletionProvider;
  model: string;
  imagePreparer?: Pick<ImagePreparer, 'prepare'>;
  maxImages?: number;
  maxAttempts?: number;
  initialBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ImageLinkFinder {
  extractUrls(images: readonly SourceImage[]): Promise<string[]>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) return trimmed;
  return trimmed
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/```\s*$/, '')
    .trim();
}

/**
 * Read the model's answer: a JSON array when it followed instructions,
 * otherwise whatever URLs appear in the raw text.
 */
export function parseUrlListResponse(content: string): string[] {
  const cleaned = stripCodeFences(content);

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    return Array.from(cleaned.matchAll(URL_IN_TEXT_PATTERN), match => match[0].replace(/[.,;:!?)]+$/, ''));
  }

  if (!Array.isArray(parsed)) return [];
  return parsed
    .filter((item): item is string => typeof item === 'string')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Asks a vision model for links printed inside slide images. Used when a
 * deck's text yields none. Every failure degrades to an empty list.
 */
export class ImageLinkExtractor implements ImageLinkFinder {
  private readonly provider: ChatCompletionProvider;
  private readonly model: string;
  private readonly imagePreparer: Pick<ImagePreparer, 'prepare'>;
  private readonly maxImages: number;
  private readonly maxAttempts: number;
  private readonly initialBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ImageLinkExtractorOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.imagePreparer = options.imagePreparer ?? new ImagePreparer();
    this.maxImages = options.maxImages ?? IMAGE_LINK_EXTRACTION.MAX_IMAGES;
    this.maxAttempts = options.maxAttempts ?? IMAGE_LINK_EXTRACTION.MAX_ATTEMPTS;
    this.initialBackoffMs = options.initialBackoffMs ?? IMAGE_LINK_EXTRACTION.INITIAL_BACKOFF_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async extractUrls(images: readonly SourceImage[]): Promise<string[]> {
    if (images.length === 0) return [];

    const log = createChildLogger(generateCorrelationId());

    let content: ContentPart[];
    try {
      const prepared = await this.imagePreparer.prepare(images, this.maxImages);
      if (prepared.length === 0) {
        log.warn({ imageCount: images.length }, 'No images could be prepared for link extraction');
        return [];
      }
      content = [{ type: 'text', text: IMAGE_LINK_INSTRUCTION }, ...prepared.map(toImageContentPart)];
    } catch (error) {
      log.warn({ error }, 'Image preparation for link extraction failed');
      return [];
    }

    return this.requestWithRetry(content, log);
  }

  private async requestWithRetry(content: ContentPart[], log: pino.Logger): Promise<string[]> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const completion = await this.provider.complete(
          {
            model: this.model,
            messages: [{ role: 'user', content }],
            max_tokens: IMAGE_LINK_EXTRACTION.MAX_TOKENS,
            temperature: IMAGE_LINK_EXTRACTION.TEMPERATURE,
          },
          { timeoutMs: IMAGE_LINK_EXTRACTION.TIMEOUT_MS }
        );

        const urls = parseUrlListResponse(completion.content);
        log.info({ attempt, urlCount: urls.length }, 'Extracted URLs from images');
        return urls;
      } catch (error) {
        const transient = isTransientFailure(error);
        if (!transient) {
          log.warn({ attempt, error: describeError(error) }, 'Image link extraction failed');
          return [];
        }
        if (attempt >= this.maxAttempts) {
          log.warn(
            { attempt, error: describeError(error) },
            'Image link extraction gave up after transient failures'
          );
          return [];
        }

        const backoffMs = this.initialBackoffMs * 2 ** (attempt - 1);
        log.warn(
          { attempt, backoffMs, error: describeError(error) },
          'Transient failure during image link extraction, retrying'
        );
        await this.sleep(backoffMs);
      }
    }

    return [];
  }
}

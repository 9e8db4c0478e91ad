import { stat } from 'fs/promises';
import { IMAGE_ONLY_PLACEHOLDER } from '../config/constants';
import { getEnvironment, resolveApiKey, type Environment } from '../config/environment';
import { AnalysisClient, type AnalysisService } from '../core/analysis/analysisClient';
import { formatEnrichmentForPrompt } from '../core/enrichment/enrichmentFormatter';
import type { EnrichmentResults } from '../core/enrichment/types';
import { WebEnricher, type Enricher } from '../core/enrichment/webEnricher';
import { InputFileNotFoundError, UnsupportedFileTypeError, describeError } from '../core/errors';
import { createDefaultExtractorRegistry } from '../core/extraction/extractorRegistry';
import { unitCount, type DocumentExtractor, type DocumentFileType } from '../core/extraction/types';
import { ImagePreparer } from '../core/images/imagePreparer';
import { ImageLinkExtractor, type ImageLinkFinder } from '../core/links/imageLinkExtractor';
import {
  categorizeUrls,
  countLinks,
  extractEmails,
  extractLinks,
  flattenLinks,
  formatLinksForPrompt,
  type CategorizedLinks,
} from '../core/links/linkExtractor';
import { ChatCompletionClient } from '../core/llm/chatCompletionClient';
import { ReportRenderer, type ReportWriter } from '../core/report/reportRenderer';
import { createChildLogger, generateCorrelationId, withTiming } from '../utils/logger';

export interface ExtractorResolver {
  resolve(filePath: string): DocumentExtractor;
}

export interface PitchDeckAnalyzerDeps {
  extractors: ExtractorResolver;
  imageLinkFinder: ImageLinkFinder;
  enricher: Enricher;
  imagePreparer: Pick<ImagePreparer, 'prepare'>;
  analysis: AnalysisService;
  report: ReportWriter;
  maxScrapeUrls: number;
  maxAnalysisImages?: number;
}

export interface RunSummary {
  fileType: DocumentFileType;
  contentLength: number;
  unitCount?: number;
  linksFound: number;
  pagesEnriched: number;
  imagesSent: number;
  modelUsed?: string;
}

export type PipelineOutcome =
  | { kind: 'completed'; reportPath: string; summary: RunSummary }
  | { kind: 'analysis_failed'; reportPath: string; error: string; summary: RunSummary }
  | { kind: 'aborted'; stage: 'input' | 'extraction'; error: string };

export const IMAGE_ONLY_HINT = [
  'No text content or images found in the pitch deck. Please try:',
  '   • A PDF with selectable text content',
  '   • A PDF that contains the slide images',
  '   • Using the original PowerPoint file instead',
].join('\n');

const URL_SCHEME_PATTERN = /^https?:\/\//i;

/**
 * Split the vision model's answer into links and email addresses, since it
 * is asked to report both.
 */
function partitionImageFindings(found: readonly string[]): { urls: string[]; emails: string[] } {
  const urls: string[] = [];
  const emails: string[] = [];
  for (const item of found) {
    const address = URL_SCHEME_PATTERN.test(item) ? [] : extractEmails(item.replace(/^mailto:/i, ''));
    if (address.length > 0) emails.push(...address);
    else urls.push(item);
  }
  return { urls, emails };
}

/**
 * Runs one deck through extraction, link discovery, web enrichment, image
 * preparation, analysis and report rendering, in that order.
 */
export class PitchDeckAnalyzer {
  constructor(private readonly deps: PitchDeckAnalyzerDeps) {}

  async analyze(filePath: string, outputPath?: string): Promise<PipelineOutcome> {
    const log = createChildLogger(generateCorrelationId());

    const inputError = await this.checkInput(filePath);
    if (inputError) {
      log.warn({ filePath, error: inputError }, 'Input rejected');
      return { kind: 'aborted', stage: 'input', error: inputError };
    }

    let extractor: DocumentExtractor;
    try {
      extractor = this.deps.extractors.resolve(filePath);
    } catch (error) {
      if (error instanceof UnsupportedFileTypeError) {
        return { kind: 'aborted', stage: 'input', error: error.message };
      }
      throw error;
    }

    const extraction = await withTiming(log, 'pipeline.extract', () => extractor.extract(filePath), {
      fileType: extractor.fileType,
    });
    if (!extraction.success) {
      return {
        kind: 'aborted',
        stage: 'extraction',
        error: `Content extraction failed: ${extraction.error}`,
      };
    }

    const text = extraction.fullText.trim();
    if (!text && extraction.images.length === 0) {
      return { kind: 'aborted', stage: 'extraction', error: IMAGE_ONLY_HINT };
    }
    const promptText = text || IMAGE_ONLY_PLACEHOLDER;

    log.info(
      { contentLength: text.length, imageCount: extraction.images.length },
      'Content extracted'
    );

    const { links, emails } = await this.discoverLinks(text, extraction.images);
    const linksFound = countLinks(links);

    const urlsToScrape = flattenLinks(links).slice(0, this.deps.maxScrapeUrls);
    const enrichment: EnrichmentResults =
      urlsToScrape.length > 0 ? await this.deps.enricher.enrich(urlsToScrape) : new Map();
    const pagesEnriched = Array.from(enrichment.values()).filter(result => result.status === 'success').length;

    const images = await this.deps.imagePreparer.prepare(extraction.images, this.deps.maxAnalysisImages);

    const analysis = await withTiming(
      log,
      'pipeline.analyze',
      () =>
        this.deps.analysis.analyze({
          text: promptText,
          images,
          linksSummary: formatLinksForPrompt(links, emails),
          enrichmentText: formatEnrichmentForPrompt(enrichment),
        }),
      { imageCount: images.length, linksFound }
    );

    const reportPath = await this.deps.report.render(analysis, extraction, outputPath);

    const summary: RunSummary = {
      fileType: extraction.metadata.fileType,
      contentLength: text.length,
      unitCount: unitCount(extraction.metadata),
      linksFound,
      pagesEnriched,
      imagesSent: images.length,
      modelUsed: analysis.modelUsed,
    };

    if (!analysis.success) {
      return { kind: 'analysis_failed', reportPath, error: analysis.error, summary };
    }
    return { kind: 'completed', reportPath, summary };
  }

  private async checkInput(filePath: string): Promise<string | undefined> {
    try {
      const info = await stat(filePath);
      return info.isFile() ? undefined : new InputFileNotFoundError(filePath).message;
    } catch (error) {
      createChildLogger(generateCorrelationId()).debug(
        { filePath, error: describeError(error) },
        'Input stat failed'
      );
      return new InputFileNotFoundError(filePath).message;
    }
  }

  private async discoverLinks(
    text: string,
    images: Parameters<ImageLinkFinder['extractUrls']>[0]
  ): Promise<{ links: CategorizedLinks; emails: string[] }> {
    const links = extractLinks(text);
    const emails = extractEmails(text);

    if (countLinks(links) > 0 || images.length === 0) {
      return { links, emails };
    }

    const found = partitionImageFindings(await this.deps.imageLinkFinder.extractUrls(images));
    return {
      links: categorizeUrls(found.urls),
      emails: Array.from(new Set([...emails, ...found.emails])),
    };
  }
}

export interface CreateAnalyzerOptions {
  apiKey?: string;
  env?: Environment;
}

/**
 * Wire the default stages from configuration. The credential is resolved
 * first so a missing key fails before any file or network work.
 */
export function createPitchDeckAnalyzer(options: CreateAnalyzerOptions = {}): PitchDeckAnalyzer {
  const env = options.env ?? getEnvironment();
  const apiKey = resolveApiKey(options.apiKey, env);

  const provider = new ChatCompletionClient({
    baseUrl: env.OPENROUTER_BASE_URL,
    apiKey,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
  });
  const imagePreparer = new ImagePreparer();

  return new PitchDeckAnalyzer({
    extractors: createDefaultExtractorRegistry(),
    imageLinkFinder: new ImageLinkExtractor({ provider, model: env.VISION_MODEL, imagePreparer }),
    enricher: new WebEnricher({ timeoutMs: env.SCRAPE_TIMEOUT_MS, delayMs: env.SCRAPE_DELAY_MS }),
    imagePreparer,
    analysis: new AnalysisClient({
      provider,
      textModel: env.TEXT_MODEL,
      visionModel: env.VISION_MODEL,
      maxTokens: env.ANALYSIS_MAX_TOKENS,
      temperature: env.ANALYSIS_TEMPERATURE,
    }),
    report: new ReportRenderer({ outputDir: env.OUTPUT_DIR }),
    maxScrapeUrls: env.MAX_SCRAPE_URLS,
    maxAnalysisImages: env.MAX_ANALYSIS_IMAGES,
  });
}

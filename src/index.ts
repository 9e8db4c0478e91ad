export {
  PitchDeckAnalyzer,
  createPitchDeckAnalyzer,
  type PipelineOutcome,
  type PitchDeckAnalyzerDeps,
  type RunSummary,
} from './pipeline/pitchDeckAnalyzer';

export { ExtractorRegistry, createDefaultExtractorRegistry } from './core/extraction/extractorRegistry';
export { PdfExtractor } from './core/extraction/pdfExtractor';
export { SlideDeckExtractor } from './core/extraction/slideDeckExtractor';
export type {
  DocumentExtractor,
  ExtractedImage,
  ExtractionResult,
  TextSegment,
} from './core/extraction/types';

export {
  categorizeUrl,
  categorizeUrls,
  extractEmails,
  extractLinks,
  flattenLinks,
  formatLinksForPrompt,
  type CategorizedLinks,
  type LinkCategory,
} from './core/links/linkExtractor';
export { ImageLinkExtractor, parseUrlListResponse } from './core/links/imageLinkExtractor';

export { WebEnricher } from './core/enrichment/webEnricher';
export { formatEnrichmentForPrompt } from './core/enrichment/enrichmentFormatter';
export type { ScrapeResult } from './core/enrichment/types';

export { ImagePreparer, toImageContentPart, type PreparedImage } from './core/images/imagePreparer';
export { LargestAreaFirst, type ImageSelectionStrategy } from './core/images/selectionStrategy';

export { ChatCompletionClient } from './core/llm/chatCompletionClient';
export { AnalysisClient, type AnalysisResult } from './core/analysis/analysisClient';
export { ReportRenderer } from './core/report/reportRenderer';

export { resolveApiKey, getEnvironment, type Environment } from './config/environment';
export * from './core/errors';

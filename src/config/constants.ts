import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'pitch-deck-analyzer';
export const APP_TITLE = 'Pitch Deck Analyzer';
export const APP_VERSION = PACKAGE_VERSION;

export const USER_AGENT = `${APP_NAME}/${APP_VERSION} (+startup due-diligence research)`;

// Sent to OpenRouter for attribution
export const OPENROUTER_REFERER = 'https://github.com/pitch-deck-analyzer';

// Images at or below this size on either side are treated as icons or decorations
export const MIN_IMAGE_DIMENSION = 50;

export const SEGMENT_SEPARATOR = '\n\n';

export const IMAGE_ONLY_PLACEHOLDER =
  '[This pitch deck contains only images and no extractable text. Please analyze the visual content provided in the attached slide images.]';

export const IMAGE_PREPARATION = {
  MAX_WIDTH: 1024,
  MAX_HEIGHT: 1024,
  JPEG_QUALITY: 85,
  DETAIL: 'high',
} as const;

export const IMAGE_LINK_EXTRACTION = {
  MAX_IMAGES: 8,
  MAX_ATTEMPTS: 3,
  INITIAL_BACKOFF_MS: 1000,
  MAX_TOKENS: 1000,
  TEMPERATURE: 0.1,
  TIMEOUT_MS: 30000,
} as const;

export const SCRAPE_LIMITS = {
  DESCRIPTION_CHARS: 200,
  MAIN_CONTENT_CHARS: 1000,
  ABOUT_CHARS: 500,
  FALLBACK_PARAGRAPHS: 5,
  MAX_REDIRECTS: 3,
} as const;

export const REPORT = {
  VERSION: '1.0',
  PREVIEW_CHARS: 1000,
  COMPANY_SCAN_LINES: 10,
  COMPANY_MAX_LENGTH: 50,
  GENERIC_LEADING_WORDS: ['pitch', 'deck', 'presentation'],
} as const;

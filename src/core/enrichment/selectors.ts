// CSS selectors used when mining a company page, in priority order

export const MAIN_CONTENT_SELECTORS = [
  'main',
  'article',
  '.content',
  '#content',
  '.main-content',
  '.post-content',
  '.entry-content',
] as const;

export const COMPANY_NAME_SELECTORS = [
  '.company-name',
  '.brand-name',
  '.logo-text',
  'h1',
  '.site-title',
  '.navbar-brand',
] as const;

export const ABOUT_SELECTORS = ['.about', '#about', '.company-info', '.about-us'] as const;

export const DESCRIPTION_META_SELECTORS = [
  'meta[name="description"]',
  'meta[property="og:description"]',
] as const;

export const SCRIPT_AND_STYLE_SELECTORS = 'script, style, noscript';

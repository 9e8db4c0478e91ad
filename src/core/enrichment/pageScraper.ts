import * as cheerio from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import { SCRAPE_LIMITS } from '../../config/constants';
import { collapseWhitespace, truncateText } from '../../utils/text';
import { hostMatches } from '../../utils/urlValidator';
import { SOCIAL_DOMAINS, extractEmails } from '../links/linkExtractor';
import {
  ABOUT_SELECTORS,
  COMPANY_NAME_SELECTORS,
  DESCRIPTION_META_SELECTORS,
  MAIN_CONTENT_SELECTORS,
  SCRIPT_AND_STYLE_SELECTORS,
} from './selectors';
import type { CompanyInfo, ContactInfo, ScrapeSuccess } from './types';

export const NO_TITLE = 'No title found';
export const NO_DESCRIPTION = 'No description found';
export const NO_MAIN_CONTENT = 'No main content found';

const SOCIAL_PROFILE_DOMAINS: readonly string[] = [...SOCIAL_DOMAINS, 'linkedin.com', 'github.com'];

const PHONE_PATTERN = /\+?\(?\d[\d ().-]{7,}\d/g;
const MIN_PHONE_DIGITS = 9;
const MAX_PHONE_DIGITS = 15;

/**
 * Visible text of a node with a space between every text node, so block
 * elements do not run together.
 */
function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, parts);
  }
}

function textOf<T extends AnyNode>(nodes: cheerio.Cheerio<T>): string {
  const parts: string[] = [];
  nodes.each((_, node) => collectText(node, parts));
  return collapseWhitespace(parts.join(' '));
}

function firstMatchingText($: cheerio.CheerioAPI, selectors: readonly string[]): string | undefined {
  for (const selector of selectors) {
    const element = $(selector).first();
    if (element.length === 0) continue;
    const text = textOf(element);
    if (text) return text;
  }
  return undefined;
}

export function extractTitle($: cheerio.CheerioAPI): string {
  const title = collapseWhitespace($('title').first().text());
  if (title) return title;

  return firstMatchingText($, ['h1']) ?? NO_TITLE;
}

export function extractDescription($: cheerio.CheerioAPI): string {
  for (const selector of DESCRIPTION_META_SELECTORS) {
    const content = $(selector).first().attr('content')?.trim();
    if (content) return content;
  }

  const firstParagraph = firstMatchingText($, ['p']);
  if (firstParagraph) return truncateText(firstParagraph, SCRAPE_LIMITS.DESCRIPTION_CHARS);

  return NO_DESCRIPTION;
}

/**
 * Removes script and style elements from the document as a side effect.
 */
export function extractMainContent($: cheerio.CheerioAPI): string {
  $(SCRIPT_AND_STYLE_SELECTORS).remove();

  const main = firstMatchingText($, MAIN_CONTENT_SELECTORS);
  if (main) return truncateText(main, SCRAPE_LIMITS.MAIN_CONTENT_CHARS);

  const paragraphs = $('p').slice(0, SCRAPE_LIMITS.FALLBACK_PARAGRAPHS);
  const text = textOf(paragraphs);
  if (text) return truncateText(text, SCRAPE_LIMITS.MAIN_CONTENT_CHARS);

  return NO_MAIN_CONTENT;
}

export function extractCompanyInfo($: cheerio.CheerioAPI): CompanyInfo {
  const info: CompanyInfo = {};

  const name = firstMatchingText($, COMPANY_NAME_SELECTORS);
  if (name) info.name = name;

  const about = firstMatchingText($, ABOUT_SELECTORS);
  if (about) info.about = truncateText(about, SCRAPE_LIMITS.ABOUT_CHARS);

  return info;
}

export function extractPhones(text: string): string[] {
  const phones = Array.from(text.matchAll(PHONE_PATTERN), match => match[0].trim()).filter(
    candidate => {
      const digits = candidate.replace(/\D/g, '').length;
      return digits >= MIN_PHONE_DIGITS && digits <= MAX_PHONE_DIGITS;
    }
  );
  return Array.from(new Set(phones));
}

export function extractContactInfo($: cheerio.CheerioAPI): ContactInfo {
  const body = $('body');
  const pageText = body.length > 0 ? textOf(body) : textOf($.root());
  return {
    emails: extractEmails(pageText),
    phones: extractPhones(pageText),
  };
}

export function extractSocialLinks($: cheerio.CheerioAPI, baseUrl: string): string[] {
  const links: string[] = [];

  $('a[href]').each((_, anchor) => {
    const href = $(anchor).attr('href')?.trim();
    if (!href) return;

    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      return;
    }
    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return;

    const host = resolved.hostname.toLowerCase().replace(/^www\./, '');
    if (SOCIAL_PROFILE_DOMAINS.some(domain => hostMatches(host, domain))) {
      links.push(resolved.toString());
    }
  });

  return Array.from(new Set(links));
}

/**
 * Pull the company-relevant facts out of one HTML page.
 */
export function scrapeHtml(html: string, url: string): ScrapeSuccess {
  const $ = cheerio.load(html);

  const title = extractTitle($);
  const description = extractDescription($);
  const mainContent = extractMainContent($);

  return {
    url,
    status: 'success',
    title,
    description,
    mainContent,
    companyInfo: extractCompanyInfo($),
    contactInfo: extractContactInfo($),
    socialLinks: extractSocialLinks($, url),
  };
}

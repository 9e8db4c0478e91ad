import { canonicalizeLink, ensureScheme, hostMatches, hostOf } from '../../utils/urlValidator';

export const LINK_CATEGORIES = [
  'websites',
  'social_media',
  'professional',
  'repositories',
  'other',
] as const;

export type LinkCategory = (typeof LINK_CATEGORIES)[number];

export type CategorizedLinks = Partial<Record<LinkCategory, string[]>>;

export const SOCIAL_DOMAINS = [
  'twitter.com',
  'x.com',
  'facebook.com',
  'instagram.com',
  'youtube.com',
  'tiktok.com',
] as const;

export const PROFESSIONAL_DOMAINS = [
  'linkedin.com',
  'crunchbase.com',
  'angellist.com',
  'angel.co',
  'pitchbook.com',
] as const;

export const REPOSITORY_DOMAINS = ['github.com', 'gitlab.com', 'bitbucket.org'] as const;

const ABSOLUTE_URL_PATTERN = /https?:\/\/[^\s<>"'`{}|\\^[\]]+/gi;
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
const WEBSITE_PATTERN =
  /\b(?:www\.)?((?:[A-Za-z0-9-]+\.)*[A-Za-z0-9-]+\.(?:com|org|net|io|co|ai|tech|app))(?![A-Za-z0-9-])/gi;

interface PlatformPattern {
  pattern: RegExp;
  build: (match: RegExpMatchArray) => string;
}

const trimDots = (value: string): string => value.replace(/\.+$/, '');

// Checked before the generic website pattern so a profile keeps its path
const PLATFORM_PATTERNS: readonly PlatformPattern[] = [
  {
    pattern: /\b(?:www\.)?linkedin\.com\/(in|company)\/([A-Za-z0-9-]+)/gi,
    build: m => `https://linkedin.com/${m[1].toLowerCase()}/${m[2]}`,
  },
  {
    pattern: /\b(?:www\.)?(?:twitter|x)\.com\/([A-Za-z0-9_]+)/gi,
    build: m => `https://twitter.com/${m[1]}`,
  },
  {
    pattern: /\b(?:www\.)?facebook\.com\/([A-Za-z0-9.]+)/gi,
    build: m => `https://facebook.com/${trimDots(m[1])}`,
  },
  {
    pattern: /\b(?:www\.)?instagram\.com\/([A-Za-z0-9_.]+)/gi,
    build: m => `https://instagram.com/${trimDots(m[1])}`,
  },
  {
    pattern: /\b(?:www\.)?github\.com\/([A-Za-z0-9-]+)/gi,
    build: m => `https://github.com/${m[1]}`,
  },
  {
    pattern: /\b(?:www\.)?youtube\.com\/(c\/|channel\/|user\/|@)?([A-Za-z0-9_-]+)/gi,
    build: m => `https://youtube.com/${m[1] ?? 'c/'}${m[2]}`,
  },
  {
    pattern: /\b(?:www\.)?crunchbase\.com\/organization\/([A-Za-z0-9-]+)/gi,
    build: m => `https://crunchbase.com/organization/${m[1]}`,
  },
];

/**
 * Collect every match and blank it out so later, looser patterns do not
 * re-read the same characters.
 */
function consumeMatches(text: string, pattern: RegExp): { matches: RegExpMatchArray[]; rest: string } {
  const matches = Array.from(text.matchAll(new RegExp(pattern.source, pattern.flags)));
  let rest = text;
  for (const match of matches) {
    const start = match.index ?? 0;
    rest = rest.slice(0, start) + ' '.repeat(match[0].length) + rest.slice(start + match[0].length);
  }
  return { matches, rest };
}

function trimTrailingPunctuation(url: string): string {
  let trimmed = url.replace(/[.,;:!?]+$/, '');
  while (trimmed.endsWith(')') && !trimmed.includes('(')) {
    trimmed = trimmed.slice(0, -1).replace(/[.,;:!?]+$/, '');
  }
  return trimmed;
}

interface LinkCandidate {
  index: number;
  url: string;
}

/**
 * Dedup key plus the link to keep. Unparseable input is kept as it is and
 * keyed by itself.
 */
function linkIdentity(url: string): { key: string; link: string } {
  try {
    return { key: canonicalizeLink(url), link: ensureScheme(url) };
  } catch {
    return { key: url, link: url };
  }
}

/**
 * Raw link candidates in the order they appear in the text. Absolute URLs
 * are read first, then platform handles, then bare domains, each pass
 * skipping what an earlier one took. Email addresses are never read as
 * domains.
 */
export function findLinkCandidates(text: string): string[] {
  if (!text) return [];

  const candidates: LinkCandidate[] = [];

  const absolute = consumeMatches(text, ABSOLUTE_URL_PATTERN);
  candidates.push(
    ...absolute.matches.map(match => ({ index: match.index ?? 0, url: trimTrailingPunctuation(match[0]) }))
  );

  let rest = consumeMatches(absolute.rest, EMAIL_PATTERN).rest;

  for (const { pattern, build } of PLATFORM_PATTERNS) {
    const platform = consumeMatches(rest, pattern);
    candidates.push(...platform.matches.map(match => ({ index: match.index ?? 0, url: build(match) })));
    rest = platform.rest;
  }

  for (const match of consumeMatches(rest, WEBSITE_PATTERN).matches) {
    candidates.push({ index: match.index ?? 0, url: `https://${match[0]}` });
  }

  return candidates.sort((a, b) => a.index - b.index).map(candidate => candidate.url);
}

/**
 * Drop links whose canonical form was already seen. The first occurrence is
 * kept as written, with a scheme added, since that is the address to fetch.
 */
export function dedupeLinks(urls: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const trimmed = url.trim();
    if (!trimmed) continue;
    const { key, link } = linkIdentity(trimmed);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(link);
  }
  return unique;
}

export function categorizeUrl(url: string): LinkCategory {
  const host = hostOf(url);
  if (!host) return 'other';

  if (SOCIAL_DOMAINS.some(domain => hostMatches(host, domain))) return 'social_media';
  if (PROFESSIONAL_DOMAINS.some(domain => hostMatches(host, domain))) return 'professional';
  if (REPOSITORY_DOMAINS.some(domain => hostMatches(host, domain))) return 'repositories';
  return 'websites';
}

export function categorizeUrls(urls: readonly string[]): CategorizedLinks {
  const grouped = new Map<LinkCategory, string[]>();
  for (const url of dedupeLinks(urls)) {
    const category = categorizeUrl(url);
    const bucket = grouped.get(category) ?? [];
    bucket.push(url);
    grouped.set(category, bucket);
  }

  const categorized: CategorizedLinks = {};
  for (const category of LINK_CATEGORIES) {
    const bucket = grouped.get(category);
    if (bucket && bucket.length > 0) categorized[category] = bucket;
  }
  return categorized;
}

export function extractLinks(text: string): CategorizedLinks {
  return categorizeUrls(findLinkCandidates(text));
}

export function extractEmails(text: string): string[] {
  if (!text) return [];
  const emails = Array.from(text.matchAll(EMAIL_PATTERN), match => match[0]);
  return Array.from(new Set(emails));
}

export function flattenLinks(links: CategorizedLinks): string[] {
  return LINK_CATEGORIES.flatMap(category => links[category] ?? []);
}

export function countLinks(links: CategorizedLinks): number {
  return flattenLinks(links).length;
}

function categoryLabel(category: LinkCategory): string {
  return category
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Markdown summary of discovered links for the analysis prompt.
 */
export function formatLinksForPrompt(links: CategorizedLinks, emails: readonly string[] = []): string {
  if (countLinks(links) === 0 && emails.length === 0) {
    return '';
  }

  let formatted = '\n**URLs and Links Found in Pitch Deck:**\n';

  for (const category of LINK_CATEGORIES) {
    const urls = links[category];
    if (!urls || urls.length === 0) continue;
    formatted += `\n${categoryLabel(category)}:\n`;
    for (const url of urls) {
      formatted += `- ${url}\n`;
    }
  }

  if (emails.length > 0) {
    formatted += '\nEmail Addresses:\n';
    for (const email of emails) {
      formatted += `- ${email}\n`;
    }
  }

  return formatted;
}

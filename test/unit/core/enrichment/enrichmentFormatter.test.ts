import { describe, test, expect } from '@jest/globals';
import { formatEnrichmentForPrompt } from '../../../../src/core/enrichment/enrichmentFormatter';
import type { EnrichmentResults, ScrapeResult, ScrapeSuccess } from '../../../../src/core/enrichment/types';

const success: ScrapeSuccess = {
  url: 'https://acme.io',
  status: 'success',
  title: 'Acme Robotics',
  description: 'Robots for warehouses.',
  mainContent: 'We sell products to business customers.',
  companyInfo: { name: 'Acme Robotics' },
  contactInfo: { emails: ['hello@acme.io'], phones: [] },
  socialLinks: ['https://twitter.com/acme'],
};

describe('formatEnrichmentForPrompt', () => {
  test('is empty when nothing was scraped', () => {
    expect(formatEnrichmentForPrompt(new Map())).toBe('');
  });

  test('renders a failed page with its error and impact', () => {
    const results: EnrichmentResults = new Map<string, ScrapeResult>([
      ['https://down.io', { url: 'https://down.io', status: 'error', error: 'Network error: HTTP error (status: 503)' }],
    ]);

    expect(formatEnrichmentForPrompt(results)).toBe(
      [
        '',
        '**Detailed Information Extracted from Web Scraping:**',
        '',
        '**URL: https://down.io**',
        '❌ **Scraping Status**: Failed',
        '🚫 **Error Details**: Network error: HTTP error (status: 503)',
        '📝 **Impact**: Unable to gather additional information from this source',
        '',
        '---',
        '',
      ].join('\n')
    );
  });

  test('renders the facts and business signals of a scraped page', () => {
    const formatted = formatEnrichmentForPrompt(new Map<string, ScrapeResult>([[success.url, success]]));
    const lines = formatted.split('\n');

    expect(lines).toContain('📄 **Page Title**: Acme Robotics');
    expect(lines).toContain('📝 **Meta Description**: Robots for warehouses.');
    expect(lines).toContain('- **Company Name**: Acme Robotics');
    expect(lines).toContain('We sell products to business customers.');
    expect(lines).toContain('- **Email Addresses**: hello@acme.io');
    expect(lines).toContain('- https://twitter.com/acme');
    expect(lines).toContain('- **Website Type**: Corporate/Business');
    expect(lines).toContain('- **Content Focus**: Commercial/Business');
    expect(lines).toContain('- **Professional Level**: High');
    expect(lines.some(line => line.startsWith('- **Phone Numbers**'))).toBe(false);
    expect(lines.some(line => line.startsWith('- **About Company**'))).toBe(false);
  });

  test('keeps the order the pages were visited in', () => {
    const results: EnrichmentResults = new Map<string, ScrapeResult>();
    results.set('https://b.io', { ...success, url: 'https://b.io' });
    results.set('https://a.io', { url: 'https://a.io', status: 'error', error: 'boom' });

    const formatted = formatEnrichmentForPrompt(results);
    expect(formatted.indexOf('**URL: https://b.io**')).toBeLessThan(formatted.indexOf('**URL: https://a.io**'));
  });
});

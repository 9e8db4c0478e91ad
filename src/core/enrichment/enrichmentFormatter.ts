import type { EnrichmentResults, ScrapeFailure, ScrapeSuccess } from './types';

const CORPORATE_KEYWORDS = ['business', 'company', 'services', 'products'];
const EDUCATIONAL_KEYWORDS = ['guide', 'tutorial', 'example', 'template'];

function mentionsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword));
}

function formatFailure(result: ScrapeFailure): string[] {
  return [
    `**URL: ${result.url}**`,
    '❌ **Scraping Status**: Failed',
    `🚫 **Error Details**: ${result.error}`,
    '📝 **Impact**: Unable to gather additional information from this source',
    '',
    '---',
    '',
  ];
}

function formatSuccess(result: ScrapeSuccess): string[] {
  const lines = [
    `**URL: ${result.url}**`,
    '✅ **Scraping Status**: Successfully scraped',
    '',
    `📄 **Page Title**: ${result.title}`,
    `📝 **Meta Description**: ${result.description}`,
    '',
  ];

  const { name, about } = result.companyInfo;
  if (name || about) {
    lines.push('**🏢 Company Information:**');
    if (name) lines.push(`- **Company Name**: ${name}`);
    if (about) lines.push(`- **About Company**: ${about}`);
    lines.push('');
  }

  lines.push('**📖 Main Content Extracted:**', result.mainContent, '');

  const { emails, phones } = result.contactInfo;
  if (emails.length > 0 || phones.length > 0) {
    lines.push('**📞 Contact Information:**');
    if (emails.length > 0) lines.push(`- **Email Addresses**: ${emails.join(', ')}`);
    if (phones.length > 0) lines.push(`- **Phone Numbers**: ${phones.join(', ')}`);
    lines.push('');
  }

  if (result.socialLinks.length > 0) {
    lines.push('**🔗 Social Media & External Links:**');
    for (const link of result.socialLinks) lines.push(`- ${link}`);
    lines.push('');
  }

  const websiteType = mentionsAny(result.mainContent, CORPORATE_KEYWORDS)
    ? 'Corporate/Business'
    : 'Information/Resource';
  const contentFocus = mentionsAny(result.mainContent, EDUCATIONAL_KEYWORDS)
    ? 'Educational/Resource'
    : 'Commercial/Business';
  const professionalLevel = result.socialLinks.length > 0 || emails.length > 0 ? 'High' : 'Medium';

  lines.push(
    `**🧠 Key Business Insights from ${result.url}:**`,
    `- **Website Type**: ${websiteType}`,
    `- **Content Focus**: ${contentFocus}`,
    `- **Professional Level**: ${professionalLevel}`,
    '',
    '---',
    ''
  );

  return lines;
}

/**
 * Render scraped pages as Markdown for the analysis prompt, one block per
 * URL in the order they were visited. Empty results render as ''.
 */
export function formatEnrichmentForPrompt(results: EnrichmentResults): string {
  if (results.size === 0) return '';

  const lines = ['', '**Detailed Information Extracted from Web Scraping:**', ''];
  for (const result of results.values()) {
    lines.push(...(result.status === 'error' ? formatFailure(result) : formatSuccess(result)));
  }
  return lines.join('\n');
}

import { writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { APP_TITLE, REPORT } from '../../config/constants';
import { titleCase } from '../../utils/text';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import type { AnalysisResult } from '../analysis/analysisClient';
import { ReportWriteError } from '../errors';
import { unitCount, type ExtractionResult } from '../extraction/types';

const DEFAULT_MODEL_LABEL = 'Unknown model';

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYY-MM-DD_HH-mm-ss` in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * e.g. "March 05, 2025 at 02:30 PM", local time.
 */
export function formatGeneratedAt(date: Date): string {
  const hours = date.getHours() % 12 === 0 ? 12 : date.getHours() % 12;
  const meridiem = date.getHours() < 12 ? 'AM' : 'PM';
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()} at ${pad(hours)}:${pad(date.getMinutes())} ${meridiem}`;
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes <= 0) return '0 B';

  let size = sizeBytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

function labelFromFileName(fileName: string): string {
  const stem = basename(fileName, extname(fileName));
  return titleCase(stem.replace(/[_-]/g, ' ')).trim();
}

/**
 * Best guess at the company name: a short opening line of the deck that is
 * not a generic title, otherwise the file name.
 */
export function deriveCompanyLabel(fullText: string, fileName: string): string {
  const lines = fullText
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .slice(0, REPORT.COMPANY_SCAN_LINES);

  for (const line of lines) {
    const lower = line.toLowerCase();
    const generic = REPORT.GENERIC_LEADING_WORDS.some(word => lower.startsWith(word));
    if (line.length < REPORT.COMPANY_MAX_LENGTH && !generic) {
      return line;
    }
  }

  return labelFromFileName(fileName) || 'Unknown Company';
}

export function buildReportFileName(companyLabel: string, date: Date): string {
  const safeLabel = companyLabel
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trimEnd()
    .replace(/ /g, '_');
  return `analysis_${safeLabel}_${formatTimestamp(date)}.md`;
}

export interface ReportContentInput {
  analysis: AnalysisResult;
  extraction: ExtractionResult;
  companyLabel: string;
  generatedAt: Date;
}

export function buildReportContent(input: ReportContentInput): string {
  const { analysis, extraction, companyLabel, generatedAt } = input;
  const { metadata } = extraction;
  const fileSize = 'fileSize' in metadata ? formatFileSize(metadata.fileSize) : 'N/A';
  const units = unitCount(metadata);

  const header = `# Investment Analysis Report: ${companyLabel}

**Generated:** ${formatGeneratedAt(generatedAt)}
**Analyst:** AI-Powered ${APP_TITLE}
**Document Type:** ${metadata.fileType}
**Source File:** ${metadata.fileName}

---

## Executive Summary

This report provides a comprehensive investment analysis of ${companyLabel} based on their pitch deck presentation. The analysis covers business model evaluation, market assessment, team analysis, financial projections, and investment recommendations tailored for early-stage startup evaluation.

---

## Document Information

- **File Name:** ${metadata.fileName}
- **File Type:** ${metadata.fileType}
- **File Size:** ${fileSize}
- **Pages/Slides:** ${units ?? 'N/A'}
- **Extraction Status:** ${extraction.success ? '✅ Successful' : '❌ Failed'}

---

`;

  const body = analysis.success
    ? analysis.analysisText
    : `
## Analysis Status: ❌ Failed

**Error:** ${analysis.error}

The pitch deck content could not be analyzed due to the error above. Please check your OpenRouter API key and try again.

### Extracted Content Preview

Below is the raw content that was extracted from the pitch deck:

\`\`\`
${extraction.fullText ? extraction.fullText.slice(0, REPORT.PREVIEW_CHARS) : 'No content extracted'}...
\`\`\`
`;

  const footer = `

---

## Report Metadata

- **Analysis Model:** ${analysis.modelUsed ?? DEFAULT_MODEL_LABEL}
- **Generation Time:** ${formatTimestamp(generatedAt)}
- **Report Version:** ${REPORT.VERSION}
- **Tool:** ${APP_TITLE}

---

*This report was generated using AI analysis and should be used as a starting point for investment evaluation. Always conduct additional due diligence and consult with domain experts before making investment decisions.*
`;

  return header + body + footer;
}

export interface ReportRendererOptions {
  outputDir?: string;
  now?: () => Date;
}

export interface ReportWriter {
  render(analysis: AnalysisResult, extraction: ExtractionResult, outputPath?: string): Promise<string>;
}

export class ReportRenderer implements ReportWriter {
  private readonly outputDir?: string;
  private readonly now: () => Date;

  constructor(options: ReportRendererOptions = {}) {
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Write the report and return the path it was written to.
   */
  async render(analysis: AnalysisResult, extraction: ExtractionResult, outputPath?: string): Promise<string> {
    const log = createChildLogger(generateCorrelationId());
    const generatedAt = this.now();
    const companyLabel = deriveCompanyLabel(extraction.fullText, extraction.metadata.fileName);

    const target = outputPath ?? this.defaultPath(companyLabel, generatedAt);
    const content = buildReportContent({ analysis, extraction, companyLabel, generatedAt });

    try {
      await writeFile(target, content, 'utf8');
    } catch (error) {
      throw new ReportWriteError(target, error);
    }

    log.info({ reportPath: target, bytes: Buffer.byteLength(content) }, 'Report written');
    return target;
  }

  private defaultPath(companyLabel: string, generatedAt: Date): string {
    const fileName = buildReportFileName(companyLabel, generatedAt);
    return this.outputDir ? join(this.outputDir, fileName) : fileName;
  }
}

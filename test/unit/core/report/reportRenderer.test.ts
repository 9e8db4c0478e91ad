import { describe, test, expect, beforeAll, afterAll } from '@jest/globals';
import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  ReportRenderer,
  buildReportContent,
  buildReportFileName,
  deriveCompanyLabel,
  formatFileSize,
  formatGeneratedAt,
  formatTimestamp,
} from '../../../../src/core/report/reportRenderer';
import { ReportWriteError } from '../../../../src/core/errors';
import type { ExtractionSuccess } from '../../../../src/core/extraction/types';
import { createTempDir, removeTempDir } from '../../../helpers/fixtures';

const generatedAt = new Date(2025, 2, 5, 14, 30, 9);

const extraction: ExtractionSuccess = {
  success: true,
  metadata: { fileName: 'acme_deck.pdf', fileType: 'PDF', pageCount: 3, fileSize: 1536 },
  segments: [{ index: 1, text: 'Pitch Deck 2025\nAcme Robotics\nWarehouse automation' }],
  fullText: 'Pitch Deck 2025\nAcme Robotics\nWarehouse automation',
  images: [],
};

describe('report helpers', () => {
  test('formats timestamps in local time', () => {
    expect(formatTimestamp(generatedAt)).toBe('2025-03-05_14-30-09');
    expect(formatGeneratedAt(generatedAt)).toBe('March 05, 2025 at 02:30 PM');
    expect(formatGeneratedAt(new Date(2025, 0, 1, 0, 5))).toBe('January 01, 2025 at 12:05 AM');
  });

  test('formats file sizes', () => {
    expect(formatFileSize(0)).toBe('0 B');
    expect(formatFileSize(512)).toBe('512.0 B');
    expect(formatFileSize(1536)).toBe('1.5 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.0 MB');
  });

  describe('deriveCompanyLabel', () => {
    test('takes the first short line that is not a generic title', () => {
      expect(deriveCompanyLabel(extraction.fullText, 'acme_deck.pdf')).toBe('Acme Robotics');
    });

    test('falls back to the file name', () => {
      expect(deriveCompanyLabel('Presentation\nDeck overview', 'acme_robotics-deck.pdf')).toBe('Acme Robotics Deck');
      expect(deriveCompanyLabel('', 'beta-labs.pptx')).toBe('Beta Labs');
    });

    test('only scans the first ten non-empty lines', () => {
      const text = [...Array.from({ length: 10 }, (_, i) => `Pitch slide ${i}`), 'Acme'].join('\n\n');
      expect(deriveCompanyLabel(text, 'fallback.pdf')).toBe('Fallback');
    });

    test('skips lines of fifty characters or more', () => {
      expect(deriveCompanyLabel(`${'x'.repeat(50)}\nAcme`, 'deck.pdf')).toBe('Acme');
    });
  });

  test('builds a safe file name from the label and time', () => {
    expect(buildReportFileName('Acme Robotics, Inc.', generatedAt)).toBe(
      'analysis_Acme_Robotics_Inc_2025-03-05_14-30-09.md'
    );
    expect(buildReportFileName('Café 🚀 ', generatedAt)).toBe('analysis_Café_2025-03-05_14-30-09.md');
  });

  test('renders the analysis verbatim between header and footer', () => {
    const content = buildReportContent({
      analysis: { success: true, analysisText: '## 1. Company Overview\nAcme builds robots.', modelUsed: 'text/served' },
      extraction,
      companyLabel: 'Acme Robotics',
      generatedAt,
    });

    expect(content.startsWith('# Investment Analysis Report: Acme Robotics\n')).toBe(true);
    const lines = content.split('\n');
    expect(lines).toContain('**Generated:** March 05, 2025 at 02:30 PM');
    expect(lines).toContain('**Document Type:** PDF');
    expect(lines).toContain('- **File Size:** 1.5 KB');
    expect(lines).toContain('- **Pages/Slides:** 3');
    expect(lines).toContain('- **Extraction Status:** ✅ Successful');
    expect(content).toContain('---\n\n## 1. Company Overview\nAcme builds robots.\n\n---\n\n## Report Metadata');
    expect(lines).toContain('- **Analysis Model:** text/served');
    expect(lines).toContain('- **Generation Time:** 2025-03-05_14-30-09');
    expect(lines).toContain('- **Report Version:** 1.0');
    expect(lines).toContain('- **Tool:** Pitch Deck Analyzer');
  });

  test('renders the error and a preview of the first 1000 characters on failure', () => {
    const longText = 'A'.repeat(1500);
    const content = buildReportContent({
      analysis: { success: false, error: 'boom' },
      extraction: { ...extraction, fullText: longText },
      companyLabel: 'Acme',
      generatedAt,
    });

    expect(content).toContain('## Analysis Status: ❌ Failed');
    expect(content).toContain('**Error:** boom');
    expect(content).toContain(`\`\`\`\n${'A'.repeat(1000)}...\n\`\`\``);
    expect(content).not.toContain('A'.repeat(1001));
    expect(content).toContain('- **Analysis Model:** Unknown model');
  });
});

describe('ReportRenderer', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await createTempDir();
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  test('writes to a generated file name in the output directory', async () => {
    const renderer = new ReportRenderer({ outputDir: dir, now: () => generatedAt });

    const path = await renderer.render(
      { success: true, analysisText: 'Looks promising.', modelUsed: 'text/served' },
      extraction
    );

    expect(path).toBe(join(dir, 'analysis_Acme_Robotics_2025-03-05_14-30-09.md'));
    const written = await readFile(path, 'utf8');
    expect(written).toContain('\nLooks promising.\n');
  });

  test('honours an explicit output path', async () => {
    const target = join(dir, 'custom.md');
    const renderer = new ReportRenderer({ outputDir: '/ignored', now: () => generatedAt });

    await expect(renderer.render({ success: false, error: 'boom' }, extraction, target)).resolves.toBe(target);
    expect(await readFile(target, 'utf8')).toContain('**Error:** boom');
  });

  test('surfaces write failures', async () => {
    const renderer = new ReportRenderer({ now: () => generatedAt });
    const target = join(dir, 'missing-dir', 'report.md');

    const failure = renderer.render({ success: false, error: 'boom' }, extraction, target);
    await expect(failure).rejects.toBeInstanceOf(ReportWriteError);
    await expect(failure).rejects.toThrow(`Failed to write report to ${target}`);
  });
});

import { describe, test, expect } from '@jest/globals';
import {
  ExtractorRegistry,
  createDefaultExtractorRegistry,
  normalizeExtension,
} from '../../../../src/core/extraction/extractorRegistry';
import { PdfExtractor } from '../../../../src/core/extraction/pdfExtractor';
import { SlideDeckExtractor } from '../../../../src/core/extraction/slideDeckExtractor';
import { UnsupportedFileTypeError } from '../../../../src/core/errors';
import type { DocumentExtractor } from '../../../../src/core/extraction/types';

describe('ExtractorRegistry', () => {
  const registry = createDefaultExtractorRegistry();

  test('dispatches on the lower-cased extension', () => {
    expect(registry.resolve('/decks/Acme.PDF')).toBeInstanceOf(PdfExtractor);
    expect(registry.resolve('deck.pptx')).toBeInstanceOf(SlideDeckExtractor);
    expect(registry.resolve('old-deck.ppt')).toBeInstanceOf(SlideDeckExtractor);
  });

  test('lists the supported extensions', () => {
    expect(registry.supportedExtensions()).toEqual(['.pdf', '.ppt', '.pptx']);
  });

  test('rejects unsupported files before parsing', () => {
    expect(() => registry.resolve('notes.txt')).toThrow(UnsupportedFileTypeError);
    expect(() => registry.resolve('notes.txt')).toThrow(
      'Unsupported file type: .txt. Supported formats: .pdf, .ppt, .pptx'
    );
    expect(() => registry.resolve('README')).toThrow('Unsupported file type: (none).');
  });

  test('accepts any extractor variant', () => {
    const keynote: DocumentExtractor = {
      fileType: 'PowerPoint',
      extensions: ['KEY'],
      extract: async () => {
        throw new Error('not used');
      },
    };

    expect(new ExtractorRegistry([keynote]).resolve('deck.key')).toBe(keynote);
  });

  test('normalizeExtension adds the dot and lower-cases', () => {
    expect(normalizeExtension('PDF')).toBe('.pdf');
    expect(normalizeExtension('.PptX')).toBe('.pptx');
    expect(normalizeExtension('')).toBe('');
  });
});

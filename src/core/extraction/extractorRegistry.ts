import { extname } from 'path';
import { UnsupportedFileTypeError } from '../errors';
import { PdfExtractor } from './pdfExtractor';
import { SlideDeckExtractor } from './slideDeckExtractor';
import type { DocumentExtractor } from './types';

/**
 * Maps normalized file extensions to the extractor variant that handles them.
 */
export class ExtractorRegistry {
  private readonly byExtension = new Map<string, DocumentExtractor>();

  constructor(extractors: readonly DocumentExtractor[]) {
    for (const extractor of extractors) {
      for (const extension of extractor.extensions) {
        this.byExtension.set(normalizeExtension(extension), extractor);
      }
    }
  }

  supportedExtensions(): string[] {
    return Array.from(this.byExtension.keys());
  }

  /**
   * @throws UnsupportedFileTypeError before any parsing is attempted
   */
  resolve(filePath: string): DocumentExtractor {
    const extension = normalizeExtension(extname(filePath));
    const extractor = this.byExtension.get(extension);
    if (!extractor) {
      throw new UnsupportedFileTypeError(extension, this.supportedExtensions());
    }
    return extractor;
  }
}

export function normalizeExtension(extension: string): string {
  const lowered = extension.trim().toLowerCase();
  if (!lowered) return '';
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
}

export function createDefaultExtractorRegistry(): ExtractorRegistry {
  return new ExtractorRegistry([new PdfExtractor(), new SlideDeckExtractor()]);
}

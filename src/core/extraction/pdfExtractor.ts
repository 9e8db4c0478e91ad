import { readFile, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type pino from 'pino';
import sharp from 'sharp';
import { getDocument, OPS } from 'pdfjs-dist/legacy/build/pdf';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { buildSegments, extractionFailure, isSignificantImage, joinSegments } from './segments';
import type { DocumentExtractor, ExtractedImage, ExtractionResult } from './types';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;
type PdfPage = Awaited<ReturnType<PdfDocument['getPage']>>;
type PdfTextContent = Awaited<ReturnType<PdfPage['getTextContent']>>;

// pdf.js ImageKind values for decoded raster data
const IMAGE_KIND_RGB_24BPP = 2;
const IMAGE_KIND_RGBA_32BPP = 3;

interface DecodedPdfImage {
  width: number;
  height: number;
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

function isDecodedPdfImage(value: unknown): value is DecodedPdfImage {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'width' in value &&
    typeof value.width === 'number' &&
    'height' in value &&
    typeof value.height === 'number' &&
    'kind' in value &&
    typeof value.kind === 'number' &&
    'data' in value &&
    (value.data instanceof Uint8Array || value.data instanceof Uint8ClampedArray)
  );
}

function standardFontDataUrl(): string {
  return join(dirname(require.resolve('pdfjs-dist/package.json')), 'standard_fonts') + '/';
}

export function pageTextFromContent(content: PdfTextContent): string {
  let text = '';
  for (const item of content.items) {
    if (!('str' in item)) continue;
    text += item.str;
    if (item.hasEOL) text += '\n';
  }
  return text;
}

function resolvePageObject(page: PdfPage, objId: string): Promise<unknown> {
  const store = objId.startsWith('g_') ? page.commonObjs : page.objs;
  return new Promise(resolve => {
    store.get(objId, (data: unknown) => resolve(data));
  });
}

async function encodeDecodedImage(image: DecodedPdfImage): Promise<Buffer | null> {
  let channels: 3 | 4;
  if (image.kind === IMAGE_KIND_RGB_24BPP) {
    channels = 3;
  } else if (image.kind === IMAGE_KIND_RGBA_32BPP) {
    channels = 4;
  } else {
    return null;
  }

  if (image.data.length !== image.width * image.height * channels) {
    return null;
  }

  const pixels = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
  return sharp(pixels, {
    raw: { width: image.width, height: image.height, channels },
  })
    .png()
    .toBuffer();
}

/**
 * Text and raster images from PDF decks, one segment per page.
 */
export class PdfExtractor implements DocumentExtractor {
  readonly fileType = 'PDF' as const;
  readonly extensions = ['.pdf'] as const;

  async extract(filePath: string): Promise<ExtractionResult> {
    const log = createChildLogger(generateCorrelationId());

    try {
      return await withTiming(log, 'extract.pdf', () => this.extractDocument(filePath, log), {
        file: basename(filePath),
      });
    } catch (error) {
      return extractionFailure(filePath, this.fileType, error);
    }
  }

  private async extractDocument(
    filePath: string,
    log: pino.Logger
  ): Promise<ExtractionResult> {
    const [buffer, fileStat] = await Promise.all([readFile(filePath), stat(filePath)]);

    const loadingTask = getDocument({
      data: new Uint8Array(buffer),
      standardFontDataUrl: standardFontDataUrl(),
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    });

    const pdf = await loadingTask.promise;
    try {
      const units: { index: number; text: string }[] = [];
      const images: ExtractedImage[] = [];

      for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
        const page = await pdf.getPage(pageNumber);
        try {
          const content = await page.getTextContent();
          units.push({ index: pageNumber, text: pageTextFromContent(content) });
        } catch (error) {
          log.warn({ pageNumber, error }, 'Could not extract text from page');
        }

        try {
          images.push(...(await this.extractPageImages(page, pageNumber)));
        } catch (error) {
          log.warn({ pageNumber, error }, 'Could not extract images from page');
        }
        page.cleanup();
      }

      const segments = buildSegments(units);

      log.debug(
        { pageCount: pdf.numPages, segmentCount: segments.length, imageCount: images.length },
        'PDF extraction completed'
      );

      return {
        success: true,
        metadata: {
          fileName: basename(filePath),
          fileType: 'PDF',
          pageCount: pdf.numPages,
          fileSize: fileStat.size,
        },
        segments,
        fullText: joinSegments(segments),
        images,
      };
    } finally {
      await loadingTask.destroy();
    }
  }

  private async extractPageImages(page: PdfPage, pageNumber: number): Promise<ExtractedImage[]> {
    const operatorList = await page.getOperatorList();
    const images: ExtractedImage[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < operatorList.fnArray.length; i++) {
      const fn = operatorList.fnArray[i];
      const args: unknown[] = operatorList.argsArray[i] ?? [];

      let decoded: unknown;
      if (fn === OPS.paintImageXObject) {
        const objId = args[0];
        if (typeof objId !== 'string' || seen.has(objId)) continue;
        seen.add(objId);
        decoded = await resolvePageObject(page, objId);
      } else if (fn === OPS.paintInlineImageXObject) {
        decoded = args[0];
      } else {
        continue;
      }

      if (!isDecodedPdfImage(decoded) || !isSignificantImage(decoded)) continue;

      const data = await encodeDecodedImage(decoded);
      if (!data) continue;

      images.push({ data, width: decoded.width, height: decoded.height, segmentIndex: pageNumber });
    }

    return images;
  }
}

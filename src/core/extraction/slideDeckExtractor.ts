import { readFile, stat } from 'fs/promises';
import { basename, posix } from 'path';
import type pino from 'pino';
import * as cheerio from 'cheerio';
import JSZip from 'jszip';
import sharp from 'sharp';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { buildSegments, extractionFailure, isSignificantImage, joinSegments } from './segments';
import type { DocumentExtractor, ExtractedImage, ExtractionResult } from './types';

const SLIDE_PATH_PATTERN = /^ppt\/slides\/slide(\d+)\.xml$/;
const SLIDE_RELATIONSHIP_TYPE = /\/relationships\/slide$/;

// Office Open XML element names carry a namespace prefix that must be escaped in selectors
const SELECTORS = {
  shape: 'p\\:sp',
  paragraph: 'a\\:p',
  run: 'a\\:t',
  picture: 'p\\:pic',
  blip: 'a\\:blip',
  slideId: 'p\\:sldId',
  relationship: 'Relationship',
} as const;

interface Relationship {
  type: string;
  path: string;
}

type Relationships = Map<string, Relationship>;

function relationshipsPath(partPath: string): string {
  return posix.join(posix.dirname(partPath), '_rels', `${posix.basename(partPath)}.rels`);
}

async function readXml(zip: JSZip, path: string): Promise<cheerio.CheerioAPI | null> {
  const file = zip.file(path);
  if (!file) return null;
  return cheerio.load(await file.async('string'), { xml: true });
}

async function readRelationships(zip: JSZip, partPath: string): Promise<Relationships> {
  const relationships: Relationships = new Map();
  const $ = await readXml(zip, relationshipsPath(partPath));
  if (!$) return relationships;

  $(SELECTORS.relationship).each((_, element) => {
    const id = $(element).attr('Id');
    const target = $(element).attr('Target');
    const type = $(element).attr('Type') ?? '';
    if (!id || !target || $(element).attr('TargetMode') === 'External') return;
    const path = target.startsWith('/')
      ? target.slice(1)
      : posix.normalize(posix.join(posix.dirname(partPath), target));
    relationships.set(id, { type, path });
  });

  return relationships;
}

/**
 * Slide parts in presentation order, falling back to slideN numbering
 * when presentation.xml is missing or lists nothing usable.
 */
export async function orderedSlidePaths(zip: JSZip): Promise<string[]> {
  const presentationPath = 'ppt/presentation.xml';
  const $ = await readXml(zip, presentationPath);

  if ($) {
    const relationships = await readRelationships(zip, presentationPath);
    const ordered: string[] = [];
    $(SELECTORS.slideId).each((_, element) => {
      const target = relationships.get($(element).attr('r:id') ?? '');
      if (target && SLIDE_RELATIONSHIP_TYPE.test(target.type) && zip.file(target.path)) {
        ordered.push(target.path);
      }
    });
    if (ordered.length > 0) return ordered;
  }

  return Object.keys(zip.files)
    .map(path => ({ path, match: SLIDE_PATH_PATTERN.exec(path) }))
    .filter((entry): entry is { path: string; match: RegExpExecArray } => entry.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map(entry => entry.path);
}

/**
 * Text of every shape on a slide: paragraphs joined by newlines,
 * shapes joined by newlines, empty shapes skipped.
 */
export function slideText($: cheerio.CheerioAPI): string {
  const shapeTexts: string[] = [];

  $(SELECTORS.shape).each((_, shape) => {
    const paragraphs = $(shape)
      .find(SELECTORS.paragraph)
      .map((__, paragraph) =>
        $(paragraph)
          .find(SELECTORS.run)
          .map((___, run) => $(run).text())
          .get()
          .join('')
      )
      .get();

    const text = paragraphs.join('\n').trim();
    if (text) shapeTexts.push(text);
  });

  return shapeTexts.join('\n');
}

/**
 * Office Open XML slide decks (.pptx). Legacy binary .ppt files are routed
 * here too and fail closed because they are not zip containers.
 */
export class SlideDeckExtractor implements DocumentExtractor {
  readonly fileType = 'PowerPoint' as const;
  readonly extensions = ['.ppt', '.pptx'] as const;

  async extract(filePath: string): Promise<ExtractionResult> {
    const log = createChildLogger(generateCorrelationId());

    try {
      return await withTiming(log, 'extract.slides', () => this.extractDeck(filePath, log), {
        file: basename(filePath),
      });
    } catch (error) {
      return extractionFailure(filePath, this.fileType, error);
    }
  }

  private async extractDeck(filePath: string, log: pino.Logger): Promise<ExtractionResult> {
    const [buffer, fileStat] = await Promise.all([readFile(filePath), stat(filePath)]);
    const zip = await JSZip.loadAsync(buffer);
    const slidePaths = await orderedSlidePaths(zip);

    const units: { index: number; text: string }[] = [];
    const images: ExtractedImage[] = [];

    for (const [position, slidePath] of slidePaths.entries()) {
      const slideNumber = position + 1;
      const $ = await readXml(zip, slidePath);
      if (!$) continue;

      units.push({ index: slideNumber, text: slideText($) });
      images.push(...(await this.extractSlideImages(zip, slidePath, $, slideNumber, log)));
    }

    const segments = buildSegments(units);

    log.debug(
      { slideCount: slidePaths.length, segmentCount: segments.length, imageCount: images.length },
      'Slide deck extraction completed'
    );

    return {
      success: true,
      metadata: {
        fileName: basename(filePath),
        fileType: 'PowerPoint',
        slideCount: slidePaths.length,
        fileSize: fileStat.size,
      },
      segments,
      fullText: joinSegments(segments),
      images,
    };
  }

  private async extractSlideImages(
    zip: JSZip,
    slidePath: string,
    $: cheerio.CheerioAPI,
    slideNumber: number,
    log: pino.Logger
  ): Promise<ExtractedImage[]> {
    const relationships = await readRelationships(zip, slidePath);
    const images: ExtractedImage[] = [];

    const embedIds = $(SELECTORS.picture)
      .find(SELECTORS.blip)
      .map((_, blip) => $(blip).attr('r:embed'))
      .get();

    for (const embedId of embedIds) {
      const target = relationships.get(embedId);
      const file = target ? zip.file(target.path) : null;
      if (!target || !file) continue;

      try {
        const data = await file.async('nodebuffer');
        const { width, height } = await sharp(data).metadata();
        if (!width || !height) continue;

        const image = { data, width, height, segmentIndex: slideNumber };
        if (isSignificantImage(image)) images.push(image);
      } catch (error) {
        log.warn({ slideNumber, media: target.path, error }, 'Could not read slide image');
      }
    }

    return images;
  }
}

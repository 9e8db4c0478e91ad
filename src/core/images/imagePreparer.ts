import sharp from 'sharp';
import { IMAGE_PREPARATION } from '../../config/constants';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import type { ImageContentPart } from '../llm/types';
import { defaultSelectionStrategy, type ImageSelectionStrategy, type SizedImage } from './selectionStrategy';

export interface SourceImage extends SizedImage {
  readonly data: Buffer;
}

export interface PreparedImage {
  encodedPayload: string;
  mimeType: 'image/jpeg';
  detail: 'high';
  width: number;
  height: number;
}

export interface ImagePreparerOptions {
  strategy?: ImageSelectionStrategy;
  maxWidth?: number;
  maxHeight?: number;
  quality?: number;
}

/**
 * Turns raw deck images into base64 payloads the vision model accepts.
 */
export class ImagePreparer {
  private readonly strategy: ImageSelectionStrategy;
  private readonly maxWidth: number;
  private readonly maxHeight: number;
  private readonly quality: number;

  constructor(options: ImagePreparerOptions = {}) {
    this.strategy = options.strategy ?? defaultSelectionStrategy;
    this.maxWidth = options.maxWidth ?? IMAGE_PREPARATION.MAX_WIDTH;
    this.maxHeight = options.maxHeight ?? IMAGE_PREPARATION.MAX_HEIGHT;
    this.quality = options.quality ?? IMAGE_PREPARATION.JPEG_QUALITY;
  }

  select<T extends SourceImage>(images: readonly T[], maxImages?: number): T[] {
    return this.strategy.select(images, maxImages);
  }

  async prepare(images: readonly SourceImage[], maxImages?: number): Promise<PreparedImage[]> {
    const log = createChildLogger(generateCorrelationId());
    const selected = this.select(images, maxImages);
    const prepared: PreparedImage[] = [];

    for (const [position, image] of selected.entries()) {
      try {
        prepared.push(await this.prepareOne(image));
      } catch (error) {
        log.warn({ imageNumber: position + 1, error }, 'Failed to prepare image, skipping');
      }
    }

    log.debug(
      {
        available: images.length,
        selected: selected.length,
        prepared: prepared.length,
        strategy: this.strategy.name,
      },
      'Images prepared for analysis'
    );

    return prepared;
  }

  private async prepareOne(image: SourceImage): Promise<PreparedImage> {
    const { data, info } = await sharp(image.data)
      .rotate()
      .resize(this.maxWidth, this.maxHeight, {
        fit: 'inside',
        withoutEnlargement: true,
        kernel: sharp.kernel.lanczos3,
      })
      .flatten({ background: '#ffffff' })
      .jpeg({ quality: this.quality, mozjpeg: true })
      .toBuffer({ resolveWithObject: true });

    return {
      encodedPayload: data.toString('base64'),
      mimeType: 'image/jpeg',
      detail: IMAGE_PREPARATION.DETAIL,
      width: info.width,
      height: info.height,
    };
  }
}

export function toImageContentPart(image: PreparedImage): ImageContentPart {
  return {
    type: 'image_url',
    image_url: {
      url: `data:${image.mimeType};base64,${image.encodedPayload}`,
      detail: image.detail,
    },
  };
}

import { basename } from 'path';
import { MIN_IMAGE_DIMENSION, SEGMENT_SEPARATOR } from '../../config/constants';
import { describeError } from '../errors';
import type {
  DocumentFileType,
  ExtractedImage,
  ExtractionFailure,
  TextSegment,
} from './types';

/**
 * Keep units that carry text, trimmed, in source order.
 */
export function buildSegments(units: readonly { index: number; text: string }[]): TextSegment[] {
  return units
    .map(unit => ({ index: unit.index, text: unit.text.trim() }))
    .filter(unit => unit.text.length > 0);
}

export function joinSegments(segments: readonly TextSegment[]): string {
  return segments.map(segment => segment.text).join(SEGMENT_SEPARATOR);
}

export function isSignificantImage(image: Pick<ExtractedImage, 'width' | 'height'>): boolean {
  return image.width > MIN_IMAGE_DIMENSION && image.height > MIN_IMAGE_DIMENSION;
}

export function extractionFailure(
  filePath: string,
  fileType: DocumentFileType,
  error: unknown
): ExtractionFailure {
  return {
    success: false,
    metadata: { fileName: basename(filePath), fileType },
    segments: [],
    fullText: '',
    images: [],
    error: describeError(error),
  };
}

export type DocumentFileType = 'PDF' | 'PowerPoint';

interface BaseMetadata {
  fileName: string;
  fileSize: number;
}

export interface PdfMetadata extends BaseMetadata {
  fileType: 'PDF';
  pageCount: number;
}

export interface SlideDeckMetadata extends BaseMetadata {
  fileType: 'PowerPoint';
  slideCount: number;
}

export type DocumentMetadata = PdfMetadata | SlideDeckMetadata;

export interface TextSegment {
  /** 1-based page or slide number in source order */
  readonly index: number;
  readonly text: string;
}

export interface ExtractedImage {
  readonly data: Buffer;
  readonly width: number;
  readonly height: number;
  /** Page or slide the image was found on */
  readonly segmentIndex: number;
}

export interface ExtractionSuccess {
  readonly success: true;
  readonly metadata: Readonly<DocumentMetadata>;
  readonly segments: readonly TextSegment[];
  readonly fullText: string;
  readonly images: readonly ExtractedImage[];
}

export interface ExtractionFailure {
  readonly success: false;
  readonly metadata: Readonly<{ fileName: string; fileType: DocumentFileType }>;
  readonly segments: readonly [];
  readonly fullText: '';
  readonly images: readonly [];
  readonly error: string;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

export interface DocumentExtractor {
  readonly fileType: DocumentFileType;
  readonly extensions: readonly string[];
  extract(filePath: string): Promise<ExtractionResult>;
}

export function unitCount(metadata: ExtractionResult['metadata']): number | undefined {
  if ('pageCount' in metadata) return metadata.pageCount;
  if ('slideCount' in metadata) return metadata.slideCount;
  return undefined;
}

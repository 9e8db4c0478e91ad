export interface SizedImage {
  readonly width: number;
  readonly height: number;
}

/**
 * Chooses which images are worth sending when there is a budget.
 */
export interface ImageSelectionStrategy {
  readonly name: string;
  select<T extends SizedImage>(images: readonly T[], budget?: number): T[];
}

/**
 * Largest pixel area first; equal areas keep their original order.
 * Charts and screenshots tend to be larger than logos and icons.
 */
export class LargestAreaFirst implements ImageSelectionStrategy {
  readonly name = 'largest-area-first';

  select<T extends SizedImage>(images: readonly T[], budget?: number): T[] {
    if (budget === undefined || images.length <= budget) {
      return [...images];
    }

    return images
      .map((image, position) => ({ image, position, area: image.width * image.height }))
      .sort((a, b) => b.area - a.area || a.position - b.position)
      .slice(0, Math.max(0, budget))
      .map(entry => entry.image);
  }
}

export const defaultSelectionStrategy: ImageSelectionStrategy = new LargestAreaFirst();

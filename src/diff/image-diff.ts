/**
 * Image diff engine
 *
 * One pass per matched image pair: dimension check, anchor check, then SSIM
 * on luminance after both rasters are reduced to the common size.
 */

import type { ImageBlock } from '../model/document';
import type { ImageChange, ImageChangeDetail, ImageSnapshot, ResolvedSettings } from '../types';
import { assertDecodable, resizeArea, toLuminance } from '../image/raster';
import { structuralSimilarity } from '../image/ssim';

/**
 * SSIM of two images, resized to (min width, min height) when they differ
 */
export function imageSimilarity(image1: ImageBlock, image2: ImageBlock): number {
  const width = Math.min(image1.width, image2.width);
  const height = Math.min(image1.height, image2.height);
  const luma1 = resizeArea(toLuminance(image1), width, height);
  const luma2 = resizeArea(toLuminance(image2), width, height);
  return structuralSimilarity(luma1, luma2);
}

export function imageSnapshot(image: ImageBlock): ImageSnapshot {
  return image.anchor
    ? { width: image.width, height: image.height, anchor: { ...image.anchor } }
    : { width: image.width, height: image.height };
}

/**
 * Compare a matched image pair.
 *
 * @returns one record combining every difference found, or null
 * @throws CorruptDocumentError if either image cannot be compared
 */
export function compareImages(
  image1: ImageBlock,
  image2: ImageBlock,
  location: string,
  settings: Pick<ResolvedSettings, 'imageSimilarityThreshold' | 'dimensionTolerance'>
): ImageChange | null {
  assertDecodable(image1, location);
  assertDecodable(image2, location);

  const similarity = imageSimilarity(image1, image2);
  const detail: ImageChangeDetail = { similarity };
  let changed = false;

  const dw = image2.width - image1.width;
  const dh = image2.height - image1.height;
  if (Math.abs(dw) > settings.dimensionTolerance || Math.abs(dh) > settings.dimensionTolerance) {
    detail.dimensionDelta = { width: dw, height: dh };
    changed = true;
  }

  if (
    image1.anchor &&
    image2.anchor &&
    (image1.anchor.x !== image2.anchor.x || image1.anchor.y !== image2.anchor.y)
  ) {
    detail.moved = true;
    changed = true;
  }

  if (similarity < settings.imageSimilarityThreshold) {
    detail.contentChanged = true;
    changed = true;
  }

  if (!changed) return null;

  return {
    category: 'image',
    changeType: 'modified',
    location,
    before: imageSnapshot(image1),
    after: imageSnapshot(image2),
    detail,
  };
}

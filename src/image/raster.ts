/**
 * Raster helpers for image comparison: validation, luminance and resizing
 */

import { CorruptDocumentError } from '../core/errors';
import type { ImageBlock } from '../model/document';

/**
 * Single-channel raster of luminance values in [0, 255], row-major
 */
export interface LumaRaster {
  width: number;
  height: number;
  data: Float64Array;
}

/**
 * @throws CorruptDocumentError if the image was not decoded or its pixel
 * buffer does not match its dimensions
 */
export function assertDecodable(image: ImageBlock, location: string): void {
  if (image.decodeError !== undefined) {
    throw new CorruptDocumentError(`${location} could not be decoded: ${image.decodeError}`, {
      location,
    });
  }

  const { width, height, channels, pixels } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new CorruptDocumentError(`${location} has invalid dimensions ${width}x${height}`, {
      location,
    });
  }
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new CorruptDocumentError(`${location} has unsupported channel count ${String(channels)}`, {
      location,
    });
  }
  if (!(pixels instanceof Uint8Array) || pixels.length !== width * height * channels) {
    throw new CorruptDocumentError(
      `${location} pixel buffer does not match ${width}x${height}x${channels}`,
      { location }
    );
  }
}

/**
 * Luminance with Rec. 601 weights. Alpha is ignored.
 */
export function toLuminance(image: ImageBlock): LumaRaster {
  const { width, height, channels, pixels } = image;
  const data = new Float64Array(width * height);

  for (let i = 0; i < data.length; i++) {
    const base = i * channels;
    data[i] =
      channels === 1
        ? pixels[base]
        : 0.299 * pixels[base] + 0.587 * pixels[base + 1] + 0.114 * pixels[base + 2];
  }

  return { width, height, data };
}

type AxisWeights = Array<Array<{ index: number; weight: number }>>;

/**
 * Overlap of every target cell with the source cells along one axis. Each
 * target cell averages the source interval it covers.
 */
function areaWeights(sourceLength: number, targetLength: number): AxisWeights {
  const weights: AxisWeights = [];

  for (let t = 0; t < targetLength; t++) {
    const start = (t * sourceLength) / targetLength;
    const end = ((t + 1) * sourceLength) / targetLength;
    const span = end - start;
    const cell: Array<{ index: number; weight: number }> = [];

    for (let s = Math.floor(start); s < Math.ceil(end); s++) {
      const overlap = Math.min(end, s + 1) - Math.max(start, s);
      if (overlap > 0) {
        cell.push({ index: s, weight: overlap / span });
      }
    }
    weights.push(cell);
  }

  return weights;
}

/**
 * Resize by exact area averaging, rows first then columns
 */
export function resizeArea(raster: LumaRaster, width: number, height: number): LumaRaster {
  if (raster.width === width && raster.height === height) {
    return raster;
  }

  const horizontal = areaWeights(raster.width, width);
  const vertical = areaWeights(raster.height, height);

  const rows = new Float64Array(width * raster.height);
  for (let y = 0; y < raster.height; y++) {
    const rowOffset = y * raster.width;
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (const { index, weight } of horizontal[x]) {
        sum += raster.data[rowOffset + index] * weight;
      }
      rows[y * width + x] = sum;
    }
  }

  const data = new Float64Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (const { index, weight } of vertical[y]) {
        sum += rows[index * width + x] * weight;
      }
      data[y * width + x] = sum;
    }
  }

  return { width, height, data };
}

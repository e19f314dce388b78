/**
 * Image comparison tests: raster helpers, SSIM and the image diff engine
 */

import { describe, it, expect } from 'vitest';
import { CorruptDocumentError } from '../src/core/errors';
import { compareImages, imageSimilarity } from '../src/diff/image-diff';
import { resizeArea, toLuminance, type LumaRaster } from '../src/image/raster';
import { structuralSimilarity } from '../src/image/ssim';
import { imageBlock, type ImageAnchor, type ImageBlock } from '../src/model/document';

const SETTINGS = { imageSimilarityThreshold: 0.95, dimensionTolerance: 0 };

function gray(width: number, height: number, value: number, anchor?: ImageAnchor): ImageBlock {
  const pixels = new Uint8Array(width * height).fill(value);
  return { ...imageBlock(width, height, 1, pixels, anchor ? { anchor } : {}), position: 0 };
}

function gradient(width: number, height: number): ImageBlock {
  const pixels = new Uint8Array(width * height);
  for (let i = 0; i < pixels.length; i++) {
    pixels[i] = (i * 37) % 256;
  }
  return { ...imageBlock(width, height, 1, pixels), position: 0 };
}

function raster(width: number, height: number, values: number[]): LumaRaster {
  return { width, height, data: Float64Array.from(values) };
}

describe('toLuminance', () => {
  it('weights colour channels', () => {
    const red = { ...imageBlock(1, 1, 3, new Uint8Array([255, 0, 0])), position: 0 };

    expect(toLuminance(red).data[0]).toBeCloseTo(76.245, 6);
  });

  it('passes grayscale through', () => {
    expect(Array.from(toLuminance(gray(2, 1, 90)).data)).toEqual([90, 90]);
  });
});

describe('resizeArea', () => {
  it('averages the covered source area', () => {
    const resized = resizeArea(raster(3, 1, [0, 30, 60]), 2, 1);

    expect(resized.width).toBe(2);
    expect(resized.height).toBe(1);
    expect(resized.data[0]).toBeCloseTo(10, 9);
    expect(resized.data[1]).toBeCloseTo(50, 9);
  });

  it('returns the raster unchanged at the same size', () => {
    const source = raster(2, 2, [1, 2, 3, 4]);

    expect(resizeArea(source, 2, 2)).toBe(source);
  });
});

describe('structuralSimilarity', () => {
  it('is 1 for identical rasters', () => {
    const luma = toLuminance(gradient(9, 8));

    expect(structuralSimilarity(luma, luma)).toBeCloseTo(1, 10);
  });

  it('is near 0 for black against white', () => {
    const black = toLuminance(gray(8, 8, 0));
    const white = toLuminance(gray(8, 8, 255));

    expect(structuralSimilarity(black, white)).toBeLessThan(0.01);
  });

  it('works on images smaller than the window', () => {
    const luma = toLuminance(gray(1, 1, 40));

    expect(structuralSimilarity(luma, luma)).toBeCloseTo(1, 10);
  });

  it('rejects rasters of different sizes', () => {
    expect(() => structuralSimilarity(raster(1, 1, [0]), raster(2, 1, [0, 0]))).toThrow(RangeError);
  });
});

describe('compareImages', () => {
  it('reports nothing for identical images', () => {
    expect(compareImages(gradient(8, 8), gradient(8, 8), 'image 1', SETTINGS)).toBeNull();
  });

  it('reports changed content', () => {
    const change = compareImages(gray(4, 4, 0), gray(4, 4, 255), 'image 1', SETTINGS);

    expect(change).toMatchObject({
      category: 'image',
      changeType: 'modified',
      location: 'image 1',
      before: { width: 4, height: 4 },
      after: { width: 4, height: 4 },
      detail: { contentChanged: true },
    });
    expect(change?.detail?.similarity).toBeLessThan(0.01);
    expect(change?.detail?.dimensionDelta).toBeUndefined();
    expect(change?.detail?.moved).toBeUndefined();
  });

  it('reports a resize beyond the tolerance', () => {
    const change = compareImages(gray(4, 4, 128), gray(6, 4, 128), 'image 2', SETTINGS);

    expect(change?.detail?.dimensionDelta).toEqual({ width: 2, height: 0 });
    expect(change?.detail?.contentChanged).toBeUndefined();
    expect(change?.after).toEqual({ width: 6, height: 4 });
  });

  it('ignores a resize within the tolerance', () => {
    const settings = { imageSimilarityThreshold: 0.95, dimensionTolerance: 2 };

    expect(compareImages(gray(4, 4, 128), gray(6, 4, 128), 'image 2', settings)).toBeNull();
  });

  it('reports a move when both images are anchored', () => {
    const change = compareImages(
      gray(2, 2, 10, { x: 0, y: 0 }),
      gray(2, 2, 10, { x: 100, y: 0 }),
      'image 1',
      SETTINGS
    );

    expect(change?.detail).toEqual({ similarity: 1, moved: true });
    expect(change?.before).toEqual({ width: 2, height: 2, anchor: { x: 0, y: 0 } });
  });

  it('does not report a move when only one image is anchored', () => {
    expect(compareImages(gray(2, 2, 10), gray(2, 2, 10, { x: 5, y: 5 }), 'image 1', SETTINGS)).toBeNull();
  });

  it('rejects an image that could not be decoded', () => {
    const failed = { ...imageBlock(0, 0, 3, new Uint8Array(0), { decodeError: 'bad data' }), position: 0 };

    expect(() => compareImages(gray(2, 2, 0), failed, 'image 3', SETTINGS)).toThrow(
      'image 3 could not be decoded: bad data'
    );
  });

  it('rejects a pixel buffer that does not match the dimensions', () => {
    const short = { ...imageBlock(2, 2, 3, new Uint8Array(5)), position: 0 };

    expect(() => compareImages(short, gray(2, 2, 0), 'image 1', SETTINGS)).toThrow(CorruptDocumentError);
  });
});

describe('imageSimilarity', () => {
  it('compares images of different sizes at the smaller size', () => {
    expect(imageSimilarity(gray(4, 4, 200), gray(8, 8, 200))).toBeCloseTo(1, 6);
  });
});

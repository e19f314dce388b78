/**
 * Structural similarity (SSIM) of two equally sized luminance rasters.
 *
 * Statistics are taken over every square window that fits inside the
 * image, using summed-area tables so each window costs O(1). The score is
 * the mean over windows.
 */

import type { LumaRaster } from './raster';

const K1 = 0.01;
const K2 = 0.03;
const DYNAMIC_RANGE = 255;
const C1 = (K1 * DYNAMIC_RANGE) ** 2;
const C2 = (K2 * DYNAMIC_RANGE) ** 2;

export const MAX_WINDOW_SIZE = 7;

/**
 * Summed-area table with a zero first row and column
 */
function integral(width: number, height: number, value: (i: number) => number): Float64Array {
  const stride = width + 1;
  const table = new Float64Array(stride * (height + 1));

  for (let y = 0; y < height; y++) {
    let rowSum = 0;
    for (let x = 0; x < width; x++) {
      rowSum += value(y * width + x);
      table[(y + 1) * stride + x + 1] = table[y * stride + x + 1] + rowSum;
    }
  }

  return table;
}

function windowSum(table: Float64Array, stride: number, x: number, y: number, size: number): number {
  return (
    table[(y + size) * stride + x + size] -
    table[y * stride + x + size] -
    table[(y + size) * stride + x] +
    table[y * stride + x]
  );
}

/**
 * @returns similarity in [-1, 1]; 1 for identical rasters
 */
export function structuralSimilarity(a: LumaRaster, b: LumaRaster): number {
  if (a.width !== b.width || a.height !== b.height) {
    throw new RangeError(
      `SSIM needs rasters of equal size, got ${a.width}x${a.height} and ${b.width}x${b.height}`
    );
  }

  const { width, height } = a;
  const size = Math.min(MAX_WINDOW_SIZE, width, height);
  const n = size * size;
  // A single-pixel window has no spread
  const dof = n > 1 ? n - 1 : 1;
  const stride = width + 1;

  const sumA = integral(width, height, (i) => a.data[i]);
  const sumB = integral(width, height, (i) => b.data[i]);
  const sumAA = integral(width, height, (i) => a.data[i] * a.data[i]);
  const sumBB = integral(width, height, (i) => b.data[i] * b.data[i]);
  const sumAB = integral(width, height, (i) => a.data[i] * b.data[i]);

  let total = 0;
  let windows = 0;

  for (let y = 0; y + size <= height; y++) {
    for (let x = 0; x + size <= width; x++) {
      const meanA = windowSum(sumA, stride, x, y, size) / n;
      const meanB = windowSum(sumB, stride, x, y, size) / n;
      const varA = (windowSum(sumAA, stride, x, y, size) - n * meanA * meanA) / dof;
      const varB = (windowSum(sumBB, stride, x, y, size) - n * meanB * meanB) / dof;
      const cov = (windowSum(sumAB, stride, x, y, size) - n * meanA * meanB) / dof;

      const numerator = (2 * meanA * meanB + C1) * (2 * cov + C2);
      const denominator = (meanA * meanA + meanB * meanB + C1) * (varA + varB + C2);
      total += numerator / denominator;
      windows++;
    }
  }

  return total / windows;
}

/**
 * Raster decoding for embedded pictures
 */

import sharp from 'sharp';
import type { ChannelCount } from '../model/document';

export interface DecodedRaster {
  width: number;
  height: number;
  channels: ChannelCount;
  pixels: Uint8Array;
}

/**
 * Decode PNG, JPEG, GIF, WebP or TIFF bytes to 8-bit sRGB without alpha
 */
export async function decodeImage(bytes: Uint8Array): Promise<DecodedRaster> {
  const { data, info } = await sharp(bytes)
    .toColourspace('srgb')
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const channels = info.channels;
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new Error(`Unexpected channel count ${channels} after decoding`);
  }

  return {
    width: info.width,
    height: info.height,
    channels,
    pixels: new Uint8Array(data),
  };
}

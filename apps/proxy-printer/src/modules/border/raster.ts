/**
 * Decoded pixel buffers and the sharp calls that move between them and
 * encoded image files.
 */

import sharp from "sharp";

import { DecodeError } from "../../lib/errors.js";

export type Channels = 1 | 2 | 3 | 4;

export interface RasterImage {
  /** Interleaved pixel bytes, row-major, `channels` bytes per pixel */
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

export type OutputFormat = "png" | "jpg";

const JPEG_QUALITY = 95;

function toChannels(value: number): Channels {
  if (value === 1 || value === 2 || value === 3 || value === 4) {
    return value;
  }
  throw new DecodeError(`Unsupported channel count: ${value}`);
}

/** Throws DecodeError when the buffer does not hold width × height × channels bytes */
export function assertRaster(image: RasterImage): void {
  const valid =
    Number.isInteger(image.width) &&
    Number.isInteger(image.height) &&
    image.width > 0 &&
    image.height > 0 &&
    image.data.length === image.width * image.height * image.channels;

  if (!valid) {
    throw new DecodeError(
      `Raster buffer of ${image.data.length} bytes does not match ${image.width}x${image.height}x${image.channels}`
    );
  }
}

export function rasterInput(image: RasterImage): sharp.Sharp {
  assertRaster(image);
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function toRaster(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return { data, width: info.width, height: info.height, channels: toChannels(info.channels) };
}

/** Decode PNG/JPEG bytes into raw pixels */
export async function decodeRaster(bytes: Buffer): Promise<RasterImage> {
  try {
    return await toRaster(sharp(bytes));
  } catch (error) {
    if (error instanceof DecodeError) {
      throw error;
    }
    throw new DecodeError("Image could not be decoded", { cause: error });
  }
}

/** Encode raw pixels; JPEG output drops the alpha channel */
export async function encodeRaster(image: RasterImage, format: OutputFormat): Promise<Buffer> {
  const pipeline = rasterInput(image);

  if (format === "png") {
    return pipeline.png().toBuffer();
  }

  return pipeline.removeAlpha().jpeg({ quality: JPEG_QUALITY }).toBuffer();
}

/**
 * Split a meld result into its top and bottom halves, each turned 90°
 * counter-clockwise so it prints upright on a portrait card.
 */
export async function splitMeldResult(image: RasterImage): Promise<{ top: RasterImage; bottom: RasterImage }> {
  assertRaster(image);
  const half = Math.floor(image.height / 2);

  if (half === 0) {
    throw new DecodeError(`Meld result ${image.width}x${image.height} is too small to split`);
  }

  const top = await toRaster(
    rasterInput(image).extract({ left: 0, top: 0, width: image.width, height: half }).rotate(270)
  );
  const bottom = await toRaster(
    rasterInput(image)
      .extract({ left: 0, top: half, width: image.width, height: image.height - half })
      .rotate(270)
  );

  return { top, bottom };
}

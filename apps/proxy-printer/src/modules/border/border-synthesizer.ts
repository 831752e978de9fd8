/**
 * Print bleed around a card image.
 *
 * The bleed is 1/8 inch. A card's short side is 2.5 inches, so the margin is
 * 0.05 of the image's short side in pixels: larger catalog sizes get more
 * pixels for the same physical width. The card itself is pasted unscaled.
 */

import { createLogger } from "../../lib/logger.js";
import { assertRaster, rasterInput, toRaster } from "./raster.js";
import type { RasterImage } from "./raster.js";

const logger = createLogger("BorderSynthesizer");

export const CARD_WIDTH_INCHES = 2.5;
export const BLEED_INCHES = 0.125;

export const DEFAULT_BLEED_FRACTION = BLEED_INCHES / CARD_WIDTH_INCHES;

export const BORDER_COLORS = ["black", "white", "transparent"] as const;

export type BorderColor = (typeof BORDER_COLORS)[number];

export interface BorderSpec {
  enabled: boolean;
  color: BorderColor;
  /** Margin as a share of the image's short side (default: 1/8 in of a 2.5 in side) */
  bleedFraction?: number;
}

const BORDER_BACKGROUNDS: Record<BorderColor, { r: number; g: number; b: number; alpha: number }> = {
  black: { r: 0, g: 0, b: 0, alpha: 1 },
  white: { r: 255, g: 255, b: 255, alpha: 1 },
  transparent: { r: 0, g: 0, b: 0, alpha: 0 },
};

export function computeBleedMargin(
  width: number,
  height: number,
  bleedFraction: number = DEFAULT_BLEED_FRACTION
): number {
  return Math.round(Math.min(width, height) * bleedFraction);
}

export async function applyBorder(image: RasterImage, spec: BorderSpec): Promise<RasterImage> {
  if (!spec.enabled) {
    return image;
  }

  assertRaster(image);
  const margin = computeBleedMargin(image.width, image.height, spec.bleedFraction);

  if (margin === 0) {
    logger.debug("Bleed margin rounds to zero, keeping image as is", {
      width: image.width,
      height: image.height,
    });
    return { ...image, data: Buffer.from(image.data) };
  }

  let pipeline = rasterInput(image);
  if (spec.color === "transparent") {
    pipeline = pipeline.ensureAlpha();
  }

  const bordered = await toRaster(
    pipeline.extend({
      top: margin,
      bottom: margin,
      left: margin,
      right: margin,
      background: BORDER_BACKGROUNDS[spec.color],
    })
  );

  logger.debug("Applied bleed border", { margin, color: spec.color, width: bordered.width, height: bordered.height });
  return bordered;
}

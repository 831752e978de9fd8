export {
  BLEED_INCHES,
  BORDER_COLORS,
  CARD_WIDTH_INCHES,
  DEFAULT_BLEED_FRACTION,
  applyBorder,
  computeBleedMargin,
} from "./border-synthesizer.js";
export type { BorderColor, BorderSpec } from "./border-synthesizer.js";

export { assertRaster, decodeRaster, encodeRaster, splitMeldResult } from "./raster.js";
export type { Channels, OutputFormat, RasterImage } from "./raster.js";

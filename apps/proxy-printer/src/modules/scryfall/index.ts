export { ScryfallClient } from "./client.js";
export type { CatalogClient, ImageSource, ScryfallClientOptions } from "./client.js";

export { RateLimiter } from "./rate-limiter.js";
export type { RateLimiterOptions } from "./rate-limiter.js";

export {
  DOUBLE_IMAGE_LAYOUTS,
  IMAGE_SIZES,
  MELD_LAYOUT,
  SINGLE_IMAGE_LAYOUTS,
  scryfallCardSchema,
} from "./types.js";

export type {
  CatalogRecord,
  ImageSize,
  ImageUris,
} from "./types.js";

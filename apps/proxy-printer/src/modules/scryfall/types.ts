/**
 * Scryfall API response schemas and the closed catalog model built from them.
 * Based on https://scryfall.com/docs/api
 *
 * Only the fields the downloader reads are declared; zod strips the rest, so
 * nothing downstream ever sees the raw response.
 */

import { z } from "zod";

// --- Image sizes ---

export const IMAGE_SIZES = ["small", "normal", "large", "png", "art_crop", "border_crop"] as const;

export type ImageSize = (typeof IMAGE_SIZES)[number];

export type ImageUris = Partial<Record<ImageSize, string>>;

export const imageUrisSchema = z.object({
  small: z.string().url().optional(),
  normal: z.string().url().optional(),
  large: z.string().url().optional(),
  png: z.string().url().optional(),
  art_crop: z.string().url().optional(),
  border_crop: z.string().url().optional(),
});

// --- Layouts ---

/** Layouts printed from the card's own top-level image */
export const SINGLE_IMAGE_LAYOUTS: ReadonlySet<string> = new Set([
  "normal",
  "split",
  "flip",
  "leveler",
  "class",
  "case",
  "saga",
  "adventure",
  "mutate",
  "prototype",
  "planar",
  "scheme",
  "vanguard",
  "token",
  "emblem",
  "augment",
  "host",
]);

/** Layouts with one image per card face */
export const DOUBLE_IMAGE_LAYOUTS: ReadonlySet<string> = new Set([
  "transform",
  "modal_dfc",
  "double_faced_token",
  "art_series",
  "reversible_card",
  "battle",
]);

export const MELD_LAYOUT = "meld";

// --- Card Object ---

const relatedCardComponentSchema = z.enum(["combo_piece", "meld_part", "meld_result", "token"]);

const cardFaceSchema = z
  .object({
    name: z.string(),
    image_uris: imageUrisSchema.optional(),
  })
  .transform((face) => ({
    name: face.name,
    imageUris: face.image_uris ?? {},
  }));

const relatedCardSchema = z.object({
  id: z.string(),
  component: relatedCardComponentSchema,
  name: z.string(),
  uri: z.string().url(),
});

export const scryfallCardSchema = z
  .object({
    object: z.literal("card"),
    id: z.string(),
    name: z.string(),
    layout: z.string(),
    set: z.string(),
    collector_number: z.string(),
    flavor_name: z.string().optional(),
    image_uris: imageUrisSchema.optional(),
    card_faces: z.array(cardFaceSchema).optional(),
    all_parts: z.array(relatedCardSchema).optional(),
  })
  .transform((card) => ({
    id: card.id,
    name: card.name,
    layout: card.layout,
    setCode: card.set,
    collectorNumber: card.collector_number,
    flavorName: card.flavor_name,
    imageUris: card.image_uris ?? {},
    faces: card.card_faces ?? [],
    parts: card.all_parts ?? [],
  }));

/** Validated catalog card; faces and parts are empty when the card has none */
export type CatalogRecord = z.output<typeof scryfallCardSchema>;

// --- Search ---

export const scryfallSearchResponseSchema = z.object({
  object: z.literal("list"),
  total_cards: z.number().optional(),
  has_more: z.boolean(),
  next_page: z.string().optional(),
  data: z.array(scryfallCardSchema),
});

export type ScryfallSearchResponse = z.output<typeof scryfallSearchResponseSchema>;

export interface ScryfallSearchOptions {
  unique?: "cards" | "art" | "prints";
  order?: "name" | "set" | "released" | "rarity" | "color";
  page?: number;
}

// --- Error ---

export const scryfallErrorResponseSchema = z.object({
  object: z.literal("error"),
  code: z.string(),
  status: z.number(),
  details: z.string(),
  type: z.string().optional(),
  warnings: z.array(z.string()).optional(),
});

export type ScryfallErrorResponse = z.infer<typeof scryfallErrorResponseSchema>;

import type { z } from "zod";

import { AmbiguousCardError, CardNotFoundError, ScryfallApiError } from "../lib/errors.js";
import type { RasterImage } from "../modules/border/index.js";
import type { FileWriter } from "../modules/download/index.js";
import { scryfallCardSchema } from "../modules/scryfall/index.js";
import type { CatalogClient, CatalogRecord, ImageSource } from "../modules/scryfall/index.js";

export type RawCard = z.input<typeof scryfallCardSchema>;

export function imageUrisFor(key: string) {
  return {
    small: `https://cards.scryfall.io/small/front/${key}.jpg`,
    normal: `https://cards.scryfall.io/normal/front/${key}.jpg`,
    large: `https://cards.scryfall.io/large/front/${key}.jpg`,
    png: `https://cards.scryfall.io/png/front/${key}.png`,
    art_crop: `https://cards.scryfall.io/art_crop/front/${key}.jpg`,
    border_crop: `https://cards.scryfall.io/border_crop/front/${key}.jpg`,
  };
}

export const solRing: RawCard = {
  object: "card",
  id: "sol-ring-ltc",
  name: "Sol Ring",
  layout: "normal",
  set: "ltc",
  collector_number: "280",
  image_uris: imageUrisFor("sol-ring-ltc"),
};

export const counterspell: RawCard = {
  object: "card",
  id: "counterspell-mh2",
  name: "Counterspell",
  layout: "normal",
  set: "mh2",
  collector_number: "267",
  image_uris: imageUrisFor("counterspell-mh2"),
};

export const delver: RawCard = {
  object: "card",
  id: "delver-isd",
  name: "Delver of Secrets // Insectile Aberration",
  layout: "transform",
  set: "isd",
  collector_number: "51",
  card_faces: [
    { name: "Delver of Secrets", image_uris: imageUrisFor("delver-isd-front") },
    { name: "Insectile Aberration", image_uris: imageUrisFor("delver-isd-back") },
  ],
};

const meldParts: NonNullable<RawCard["all_parts"]> = [
  {
    id: "bruna-emn",
    component: "meld_part",
    name: "Bruna, the Fading Light",
    uri: "https://api.scryfall.com/cards/bruna-emn",
  },
  {
    id: "gisela-emn",
    component: "meld_part",
    name: "Gisela, the Broken Blade",
    uri: "https://api.scryfall.com/cards/gisela-emn",
  },
  {
    id: "brisela-emn",
    component: "meld_result",
    name: "Brisela, Voice of Nightmares",
    uri: "https://api.scryfall.com/cards/brisela-emn",
  },
];

export const bruna: RawCard = {
  object: "card",
  id: "bruna-emn",
  name: "Bruna, the Fading Light",
  layout: "meld",
  set: "emn",
  collector_number: "15a",
  image_uris: imageUrisFor("bruna-emn"),
  all_parts: meldParts,
};

export const gisela: RawCard = {
  object: "card",
  id: "gisela-emn",
  name: "Gisela, the Broken Blade",
  layout: "meld",
  set: "emn",
  collector_number: "28a",
  image_uris: imageUrisFor("gisela-emn"),
  all_parts: meldParts,
};

export const brisela: RawCard = {
  object: "card",
  id: "brisela-emn",
  name: "Brisela, Voice of Nightmares",
  layout: "meld",
  set: "emn",
  collector_number: "15b",
  image_uris: imageUrisFor("brisela-emn"),
  all_parts: meldParts,
};

export const ALL_CARDS: RawCard[] = [solRing, counterspell, delver, bruna, gisela, brisela];

export function toRecord(raw: RawCard): CatalogRecord {
  return scryfallCardSchema.parse(raw);
}

/** In-memory catalog; name lookups match card or face names case-insensitively */
export class FakeCatalogClient implements CatalogClient {
  readonly calls: string[] = [];
  private readonly cards: CatalogRecord[];

  constructor(
    cards: RawCard[] = ALL_CARDS,
    private readonly ambiguousNames: string[] = []
  ) {
    this.cards = cards.map(toRecord);
  }

  async getCardBySetNumber(setCode: string, collectorNumber: string): Promise<CatalogRecord> {
    this.calls.push(`set-number:${setCode}/${collectorNumber}`);
    const card = this.cards.find(
      (c) => c.setCode === setCode.toLowerCase() && c.collectorNumber === collectorNumber
    );
    if (!card) throw new CardNotFoundError(`No card found with the given ID or set code and collector number.`);
    return card;
  }

  async getCardByFuzzyName(name: string): Promise<CatalogRecord> {
    this.calls.push(`fuzzy:${name}`);
    const wanted = name.toLowerCase();
    if (this.ambiguousNames.includes(wanted)) {
      throw new AmbiguousCardError(`Too many cards match ambiguous name “${name}”.`);
    }
    const card = this.cards.find(
      (c) => c.name.toLowerCase() === wanted || c.faces.some((face) => face.name.toLowerCase() === wanted)
    );
    if (!card) throw new CardNotFoundError(`No cards found matching “${name}”`);
    return card;
  }

  async getCard(id: string): Promise<CatalogRecord> {
    this.calls.push(`id:${id}`);
    const card = this.cards.find((c) => c.id === id);
    if (!card) throw new CardNotFoundError(`No card found with the given ID.`);
    return card;
  }

  async listSetCards(setCode: string): Promise<CatalogRecord[]> {
    this.calls.push(`set:${setCode}`);
    const cards = this.cards.filter((c) => c.setCode === setCode.toLowerCase());
    if (cards.length === 0) throw new CardNotFoundError(`No cards found for set '${setCode}'`);
    return cards;
  }
}

export class FakeImageSource implements ImageSource {
  readonly downloads: string[] = [];

  constructor(private readonly images: Map<string, Buffer> = new Map()) {}

  set(uri: string, bytes: Buffer): this {
    this.images.set(uri, bytes);
    return this;
  }

  async downloadImage(uri: string): Promise<Buffer> {
    this.downloads.push(uri);
    const bytes = this.images.get(uri);
    if (!bytes) throw new ScryfallApiError(`Scryfall API error: HTTP 404`);
    return bytes;
  }
}

export class MemoryFileWriter implements FileWriter {
  readonly files = new Map<string, Buffer>();

  async write(bytes: Buffer, destinationPath: string): Promise<void> {
    this.files.set(destinationPath, bytes);
  }
}

/** Deterministic test pattern; 4-channel images are fully opaque */
export function makeRaster(width: number, height: number, channels: 3 | 4): RasterImage {
  const data = Buffer.alloc(width * height * channels);
  for (let i = 0; i < data.length; i++) {
    data[i] = channels === 4 && i % 4 === 3 ? 255 : (i * 7 + 13) % 251;
  }
  return { data, width, height, channels };
}

export function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const offset = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(offset, offset + image.channels));
}

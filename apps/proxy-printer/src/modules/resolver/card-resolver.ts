/**
 * Card requests → the physical images to print.
 *
 * Lookup policy: an exact set/number request is only ever answered by that
 * printing; a name-only request takes whatever printing Scryfall treats as
 * the default. Printings are never ranked here.
 *
 * Layout expansion follows the catalog's own data shape:
 *   - single-image layouts: one image from the card itself
 *   - double-faced layouts: one image per face, all under the card's id
 *   - meld: every meld part and the meld result, each its own catalog card
 */

import { createLogger } from "../../lib/logger.js";
import { CatalogDataError } from "../../lib/errors.js";
import type { CardRequest } from "../decklist/index.js";
import {
  DOUBLE_IMAGE_LAYOUTS,
  MELD_LAYOUT,
  SINGLE_IMAGE_LAYOUTS,
} from "../scryfall/index.js";
import type { CatalogClient, CatalogRecord, ImageUris } from "../scryfall/index.js";
import type { CardIdentifier } from "./card-url.js";

const logger = createLogger("CardResolver");

export type PartRole = "card" | "face" | "meld_part";

export interface ResolvedFace {
  catalogId: string;
  /** Position within a multi-face card, 0 for single-faced cards and meld parts */
  faceIndex: number;
  partRole: PartRole;
  imageUris: ImageUris;
  /** Face name for double-faced cards, card name otherwise */
  name: string;
  setCode: string;
  collectorNumber: string;
  flavorName?: string;
  meldComponent?: "meld_part" | "meld_result";
}

type LayoutKind = "single" | "double" | "meld";

function classifyLayout(record: CatalogRecord): LayoutKind {
  if (record.layout === MELD_LAYOUT) return "meld";
  if (DOUBLE_IMAGE_LAYOUTS.has(record.layout)) return "double";
  if (SINGLE_IMAGE_LAYOUTS.has(record.layout)) return "single";

  // Layout Scryfall added after this list was written: go by data shape
  const facesCarryImages =
    record.faces.length > 1 && record.faces.every((face) => Object.keys(face.imageUris).length > 0);
  const kind: LayoutKind = facesCarryImages ? "double" : "single";
  logger.warn("Unknown layout, classified by data shape", { layout: record.layout, name: record.name, kind });
  return kind;
}

export class CardResolver {
  constructor(private readonly client: CatalogClient) {}

  async resolve(request: CardRequest): Promise<ResolvedFace[]> {
    const record = await this.lookup(request);
    return this.expand(record);
  }

  async resolveIdentifier(identifier: CardIdentifier): Promise<ResolvedFace[]> {
    const record =
      identifier.kind === "id"
        ? await this.client.getCard(identifier.id)
        : await this.client.getCardBySetNumber(identifier.setCode, identifier.collectorNumber);
    return this.expand(record);
  }

  /**
   * Expand every card of a set, in catalog order. Each card is expanded only
   * when the caller asks for it, so a meld part's extra lookups wait until
   * the cards before it are done.
   */
  async *resolveSet(setCode: string): AsyncGenerator<ResolvedFace[]> {
    const records = await this.client.listSetCards(setCode);
    logger.debug("Set listed", { setCode, cards: records.length });

    for (const record of records) {
      yield await this.expand(record);
    }
  }

  async expand(record: CatalogRecord): Promise<ResolvedFace[]> {
    switch (classifyLayout(record)) {
      case "single":
        return [
          {
            ...this.identity(record),
            faceIndex: 0,
            partRole: "card",
            imageUris: record.imageUris,
            name: record.name,
          },
        ];

      case "double":
        if (record.faces.length === 0) {
          throw new CatalogDataError(`Layout is '${record.layout}' but no card faces found for ${record.name}`);
        }
        return record.faces.map((face, index) => ({
          ...this.identity(record),
          faceIndex: index,
          partRole: "face" as const,
          imageUris: face.imageUris,
          name: face.name,
        }));

      case "meld":
        return this.expandMeld(record);
    }
  }

  private async lookup(request: CardRequest): Promise<CatalogRecord> {
    if (request.setCode && request.collectorNumber) {
      logger.debug("Exact lookup", { setCode: request.setCode, collectorNumber: request.collectorNumber });
      return this.client.getCardBySetNumber(request.setCode, request.collectorNumber);
    }

    logger.debug("Fuzzy lookup", { name: request.name });
    return this.client.getCardByFuzzyName(request.name);
  }

  private async expandMeld(record: CatalogRecord): Promise<ResolvedFace[]> {
    const meldParts = record.parts.filter(
      (part) => part.component === "meld_part" || part.component === "meld_result"
    );

    if (meldParts.length === 0) {
      throw new CatalogDataError(`Layout is 'meld' but no meld parts found for ${record.name}`);
    }

    logger.info("Expanding meld card", { name: record.name, parts: meldParts.length });

    const faces: ResolvedFace[] = [];
    for (const part of meldParts) {
      const partRecord = part.id === record.id ? record : await this.client.getCard(part.id);
      const component = part.component === "meld_result" ? "meld_result" : "meld_part";

      faces.push({
        ...this.identity(partRecord),
        faceIndex: 0,
        partRole: "meld_part",
        imageUris: partRecord.imageUris,
        name: partRecord.name,
        meldComponent: component,
      });
    }

    return faces;
  }

  private identity(record: CatalogRecord): Pick<ResolvedFace, "catalogId" | "setCode" | "collectorNumber" | "flavorName"> {
    const identity: Pick<ResolvedFace, "catalogId" | "setCode" | "collectorNumber" | "flavorName"> = {
      catalogId: record.id,
      setCode: record.setCode,
      collectorNumber: record.collectorNumber,
    };
    if (record.flavorName) {
      identity.flavorName = record.flavorName;
    }
    return identity;
  }
}

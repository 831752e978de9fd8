import type { OutputFormat } from "../border/index.js";
import type { ResolvedFace } from "../resolver/index.js";

export const DEFAULT_DECK_FOLDER = "pasted-deck";
export const SINGLES_FOLDER = "singles";

/** Strips characters that are invalid in file names; "//" between split-card halves becomes "-" */
export function sanitizeFilename(name: string): string {
  return name.replace(/\/\//g, "-").replace(/[\\/*?:"<>|]/g, "");
}

/**
 * <set>-<number>[-<flavor name>]-<name>[-top|-bottom].<ext>
 *
 * Flavor names only prefix single-faced cards; faces and meld parts use their
 * own names.
 */
export function buildFileName(face: ResolvedFace, format: OutputFormat, half?: "top" | "bottom"): string {
  const segments = [face.setCode, face.collectorNumber];

  if (face.partRole === "card" && face.flavorName) {
    segments.push(face.flavorName);
  }
  segments.push(face.name);
  if (half) {
    segments.push(half);
  }

  return `${segments.map(sanitizeFilename).join("-")}.${format}`;
}

export function deckFolderName(input: string): string {
  return sanitizeFilename(input.trim()) || DEFAULT_DECK_FOLDER;
}

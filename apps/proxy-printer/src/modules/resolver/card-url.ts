import { InvalidCardUrlError } from "../../lib/errors.js";

/** What a pasted card URL points at */
export type CardIdentifier =
  | { kind: "id"; id: string }
  | { kind: "set-number"; setCode: string; collectorNumber: string };

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Accepts card pages (https://scryfall.com/card/<set>/<number>/<slug>) and
 * API card URLs (https://api.scryfall.com/cards/<id>).
 */
export function parseCardUrl(input: string): CardIdentifier {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch (error) {
    throw new InvalidCardUrlError(`Not a URL: '${input.trim()}'`, { cause: error });
  }

  const host = url.hostname.replace(/^www\./, "");
  let segments: string[];
  try {
    segments = url.pathname
      .split("/")
      .filter((segment) => segment !== "")
      .map((segment) => decodeURIComponent(segment));
  } catch (error) {
    throw new InvalidCardUrlError(`Malformed escape in card URL: '${input.trim()}'`, { cause: error });
  }

  if (host === "scryfall.com" && segments[0] === "card" && segments.length >= 3) {
    return { kind: "set-number", setCode: segments[1].toLowerCase(), collectorNumber: segments[2] };
  }

  if (host === "api.scryfall.com" && segments[0] === "cards") {
    if (segments.length === 2 && UUID_PATTERN.test(segments[1])) {
      return { kind: "id", id: segments[1].toLowerCase() };
    }
    if (segments.length === 3) {
      return { kind: "set-number", setCode: segments[1].toLowerCase(), collectorNumber: segments[2] };
    }
  }

  throw new InvalidCardUrlError(`Unrecognized Scryfall card URL: '${input.trim()}'`);
}

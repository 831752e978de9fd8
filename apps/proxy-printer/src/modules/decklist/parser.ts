/**
 * Decklist text → ordered card requests.
 *
 * Two line shapes are accepted, detected per line:
 *   1 Sol Ring (LTC) 280
 *   4 Counterspell
 *
 * Parsing stops at the first blank line. A line without a leading quantity is
 * reported as malformed and skipped; the lines after it still parse.
 */

import { MalformedLineError } from "../../lib/errors.js";

export interface CardRequest {
  /** Copies asked for; informational, output count does not depend on it */
  quantity: number;
  name: string;
  setCode?: string;
  /** Present exactly when setCode is */
  collectorNumber?: string;
  /** 1-based line in the pasted text */
  lineNumber: number;
}

export interface MalformedLine {
  lineNumber: number;
  line: string;
  error: InstanceType<typeof MalformedLineError>;
}

export interface ParsedDecklist {
  requests: CardRequest[];
  malformed: MalformedLine[];
}

const QUANTITY_PATTERN = /^\s*(\d+)x?\s+(.+)$/i;
const SET_SUFFIX_PATTERN = /^(.+?)\s+\(([A-Za-z0-9]{2,5})\)\s+(\S+)\s*$/;

/**
 * Build a request; set code and collector number are kept only as a pair.
 */
export function createCardRequest(fields: CardRequest): CardRequest {
  const request: CardRequest = {
    quantity: fields.quantity,
    name: fields.name.trim(),
    lineNumber: fields.lineNumber,
  };

  if (fields.setCode && fields.collectorNumber) {
    request.setCode = fields.setCode;
    request.collectorNumber = fields.collectorNumber;
  }

  return request;
}

/** Parse one non-blank line; throws MalformedLineError */
export function parseDecklistLine(line: string, lineNumber: number): CardRequest {
  const quantityMatch = QUANTITY_PATTERN.exec(line);
  if (!quantityMatch) {
    throw new MalformedLineError(`Line ${lineNumber} does not start with a quantity: '${line.trim()}'`);
  }

  const [, quantityText, rest] = quantityMatch;
  const quantity = Number.parseInt(quantityText, 10);
  if (quantity < 1) {
    throw new MalformedLineError(`Line ${lineNumber} has a quantity below 1: '${line.trim()}'`);
  }

  const setMatch = SET_SUFFIX_PATTERN.exec(rest);
  if (setMatch) {
    const [, name, setCode, collectorNumber] = setMatch;
    return createCardRequest({ quantity, name, setCode, collectorNumber, lineNumber });
  }

  const name = rest.trim();
  if (!name) {
    throw new MalformedLineError(`Line ${lineNumber} has no card name: '${line.trim()}'`);
  }

  return createCardRequest({ quantity, name, lineNumber });
}

export function parseDecklist(text: string): ParsedDecklist {
  const requests: CardRequest[] = [];
  const malformed: MalformedLine[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line.trim() === "") {
      break;
    }

    const lineNumber = i + 1;
    try {
      requests.push(parseDecklistLine(line, lineNumber));
    } catch (error) {
      if (!(error instanceof MalformedLineError)) {
        throw error;
      }
      malformed.push({ lineNumber, line, error });
    }
  }

  return { requests, malformed };
}

/** Two requests with the same key resolve to the same catalog entry */
export function requestKey(request: CardRequest): string {
  if (request.setCode && request.collectorNumber) {
    return `${request.setCode.toLowerCase()}-${request.collectorNumber}`;
  }
  return request.name.toLowerCase();
}

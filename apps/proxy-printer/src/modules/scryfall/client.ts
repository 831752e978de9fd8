/**
 * Scryfall API client with rate limiting, retry logic, and proper headers.
 *
 * Handles:
 * - Rate limiting (minimum gap between calls via token bucket)
 * - Retry with exponential backoff for 429/503 and network failures
 * - Proper User-Agent per Scryfall TOS
 * - Exact, fuzzy and id card lookups
 * - Full-set listing with pagination
 * - Image downloads, paced like API calls
 *
 * Every JSON body is validated before it leaves this module.
 */

import type { z } from "zod";

import { createLogger } from "../../lib/logger.js";
import {
  AmbiguousCardError,
  CardNotFoundError,
  CatalogDataError,
  ScryfallApiError,
} from "../../lib/errors.js";
import { RateLimiter } from "./rate-limiter.js";
import {
  scryfallCardSchema,
  scryfallErrorResponseSchema,
  scryfallSearchResponseSchema,
} from "./types.js";
import type {
  CatalogRecord,
  ScryfallErrorResponse,
  ScryfallSearchOptions,
  ScryfallSearchResponse,
} from "./types.js";

const logger = createLogger("ScryfallClient");

const SCRYFALL_API_BASE = "https://api.scryfall.com";
const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;

/** Retry-After as delay-seconds or an HTTP date; null when absent or unparsable */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (header === null) {
    return null;
  }

  const value = header.trim();
  if (/^\d+$/.test(value)) {
    return Number(value) * 1000;
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/**
 * Card lookups the resolver depends on. The resolver never ranks printings:
 * whatever the catalog returns for a query is the canonical answer.
 */
export interface CatalogClient {
  getCardBySetNumber(setCode: string, collectorNumber: string): Promise<CatalogRecord>;
  getCardByFuzzyName(name: string): Promise<CatalogRecord>;
  getCard(id: string): Promise<CatalogRecord>;
  listSetCards(setCode: string): Promise<CatalogRecord[]>;
}

export interface ImageSource {
  downloadImage(uri: string): Promise<Buffer>;
}

export interface ScryfallClientOptions {
  /** API base URL (default: https://api.scryfall.com) */
  baseUrl?: string;
  /** Contact email for User-Agent header (requested by Scryfall TOS) */
  contactEmail?: string;
  /** App name for User-Agent (default: ProxyPrinter) */
  appName?: string;
  /** App version for User-Agent (default: 1.0) */
  appVersion?: string;
  /** Custom rate limiter (default: 10 req/sec, 100ms apart) */
  rateLimiter?: RateLimiter;
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** First backoff delay, doubled per retry (default: 1000) */
  initialBackoffMs?: number;
}

export class ScryfallClient implements CatalogClient, ImageSource {
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly userAgent: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;

  constructor(options: ScryfallClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? SCRYFALL_API_BASE).replace(/\/+$/, "");
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.maxRetries = options.maxRetries ?? MAX_RETRIES;
    this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;

    const appName = options.appName ?? "ProxyPrinter";
    const appVersion = options.appVersion ?? "1.0";
    const contact = options.contactEmail ? ` (${options.contactEmail})` : "";
    this.userAgent = `${appName}/${appVersion}${contact}`;
  }

  // --- Public API ---

  /** Search for cards using Scryfall search syntax */
  async search(query: string, options: ScryfallSearchOptions = {}): Promise<ScryfallSearchResponse> {
    const params = new URLSearchParams({ q: query });

    if (options.unique) params.set("unique", options.unique);
    if (options.order) params.set("order", options.order);
    if (options.page) params.set("page", String(options.page));

    return this.getJson(`/cards/search?${params}`, scryfallSearchResponseSchema);
  }

  /** Iterate all pages of a search query */
  async *searchAll(query: string, options: Omit<ScryfallSearchOptions, "page"> = {}): AsyncGenerator<CatalogRecord> {
    let page = 1;
    let hasMore = true;

    while (hasMore) {
      const response = await this.search(query, { ...options, page });

      for (const card of response.data) {
        yield card;
      }

      hasMore = response.has_more;
      page += 1;
    }
  }

  /** Get a single card by Scryfall ID */
  async getCard(id: string): Promise<CatalogRecord> {
    return this.getJson(`/cards/${encodeURIComponent(id)}`, scryfallCardSchema);
  }

  /** Get a card by set code and collector number */
  async getCardBySetNumber(setCode: string, collectorNumber: string): Promise<CatalogRecord> {
    return this.getJson(
      `/cards/${encodeURIComponent(setCode.toLowerCase())}/${encodeURIComponent(collectorNumber)}`,
      scryfallCardSchema
    );
  }

  /** Get a card by fuzzy name; Scryfall answers with its default printing */
  async getCardByFuzzyName(name: string): Promise<CatalogRecord> {
    const params = new URLSearchParams({ fuzzy: name });
    return this.getJson(`/cards/named?${params}`, scryfallCardSchema);
  }

  /** Every card of a set, one printing per card, in Scryfall's set order */
  async listSetCards(setCode: string): Promise<CatalogRecord[]> {
    const code = setCode.trim().toLowerCase();
    const cards: CatalogRecord[] = [];

    for await (const card of this.searchAll(`set:${code}`, { unique: "cards", order: "set" })) {
      cards.push(card);
    }

    if (cards.length === 0) {
      throw new CardNotFoundError(`No cards found for set '${code}'`);
    }

    logger.info("Listed set", { setCode: code, cards: cards.length });
    return cards;
  }

  /** Download image bytes from a Scryfall image URI */
  async downloadImage(uri: string): Promise<Buffer> {
    const response = await this.request(uri, "*/*");
    return Buffer.from(await response.arrayBuffer());
  }

  // --- Internal ---

  private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    const url = `${this.baseUrl}${path}`;
    const response = await this.request(url, "application/json");
    const parsed = schema.safeParse(await response.json());

    if (!parsed.success) {
      throw new CatalogDataError(`Unexpected Scryfall response from ${url}`, {
        cause: parsed.error,
      });
    }

    return parsed.data;
  }

  private async request(url: string, accept: string): Promise<Response> {
    await this.rateLimiter.acquire();

    let lastError: Error | null = null;
    // Wait before the next attempt; set by whichever failure ended the previous one
    let retryDelayMs = 0;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        logger.info(`Retry ${attempt}/${this.maxRetries} after ${retryDelayMs}ms`, { url });
        await this.sleep(retryDelayMs);
        await this.rateLimiter.acquire();
      }

      let response: Response;
      try {
        response = await fetch(url, {
          headers: {
            "User-Agent": this.userAgent,
            Accept: accept,
          },
        });
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        logger.warn("Fetch failed", { url, attempt, error: lastError.message });
        retryDelayMs = this.backoffMs(attempt);
        continue;
      }

      if (response.ok) {
        return response;
      }

      const errorBody = await this.tryParseError(response);

      // Retryable: 429 Too Many Requests
      if (response.status === 429) {
        retryDelayMs = parseRetryAfter(response.headers.get("Retry-After")) ?? this.backoffMs(attempt);
        logger.warn("Rate limited (429)", { url, waitMs: retryDelayMs, attempt });
        lastError = new Error("HTTP 429");
        continue;
      }

      // Retryable: 503 Service Unavailable
      if (response.status === 503) {
        logger.warn("Service unavailable (503)", { url, attempt });
        lastError = new Error("HTTP 503");
        retryDelayMs = this.backoffMs(attempt);
        continue;
      }

      const detail = errorBody?.details ?? `HTTP ${response.status}`;

      if (response.status === 404) {
        if (errorBody?.type === "ambiguous") {
          throw new AmbiguousCardError(detail);
        }
        throw new CardNotFoundError(detail);
      }

      throw new ScryfallApiError(`Scryfall API error: ${detail}`, {
        props: {
          status: response.status,
          code: errorBody?.code,
          url,
        },
      });
    }

    throw new ScryfallApiError(
      `Scryfall API request failed after ${this.maxRetries + 1} attempts: ${lastError?.message ?? "unknown error"}`,
      { props: { url } }
    );
  }

  private async tryParseError(response: Response): Promise<ScryfallErrorResponse | null> {
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      // Response body wasn't valid JSON
      return null;
    }
    const parsed = scryfallErrorResponseSchema.safeParse(body);
    return parsed.success ? parsed.data : null;
  }

  /** Exponential backoff after the given failed attempt (0-based) */
  private backoffMs(attempt: number): number {
    return this.initialBackoffMs * Math.pow(2, attempt);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

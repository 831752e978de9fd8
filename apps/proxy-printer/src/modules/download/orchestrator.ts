/**
 * Download orchestrator: resolve → fetch → border → encode → write.
 *
 * Work is strictly sequential; each face is written before the next card is
 * looked up, so the client's rate limiter is the only pacing.
 *
 * Failure policy:
 *   - decklist mode: a card that cannot be resolved is recorded and skipped
 *   - set / URL mode: resolution failures abort, there is nothing else to do
 *   - any mode: a face whose image cannot be fetched, decoded or bordered is
 *     recorded and nothing is written for it
 *   - strict mode: every failure aborts
 */

import path from "node:path";

import { createLogger } from "../../lib/logger.js";
import { BaseError, CatalogDataError, isCardFailure, serializeError } from "../../lib/errors.js";
import { applyBorder, decodeRaster, encodeRaster, splitMeldResult } from "../border/index.js";
import type { BorderSpec, OutputFormat, RasterImage } from "../border/index.js";
import { parseDecklist, requestKey } from "../decklist/index.js";
import type { CardRequest, MalformedLine } from "../decklist/index.js";
import { parseCardUrl } from "../resolver/index.js";
import type { CardResolver, ResolvedFace } from "../resolver/index.js";
import type { ImageSize, ImageSource } from "../scryfall/index.js";
import { buildFileName } from "./file-names.js";
import type { FileWriter } from "./file-writer.js";

const logger = createLogger("DownloadOrchestrator");

export interface DownloadOptions {
  /** Folder the image files are written to */
  outputDir: string;
  imageSize: ImageSize;
  border: BorderSpec;
  /** Abort on the first failure of any kind (default: false) */
  strict?: boolean;
  /** Write a meld result as two rotated halves instead of one image (default: true) */
  splitMeldResult?: boolean;
}

export interface DownloadDependencies {
  resolver: CardResolver;
  images: ImageSource;
  writer: FileWriter;
}

export interface DownloadFailure {
  /** Card or face the failure belongs to */
  label: string;
  error: Error;
}

export interface DownloadReport {
  outputDir: string;
  written: string[];
  failures: DownloadFailure[];
  malformed: MalformedLine[];
  /** Decklist lines naming a card an earlier line already asked for */
  skippedDuplicates: number;
}

/** Per-call bookkeeping; nothing carries over between downloads */
interface RunState {
  report: DownloadReport;
  writtenFaces: Set<string>;
}

export function outputFormatFor(imageSize: ImageSize, border: BorderSpec): OutputFormat {
  return imageSize === "png" || (border.enabled && border.color === "transparent") ? "png" : "jpg";
}

function faceLabel(face: ResolvedFace): string {
  return `${face.name} (${face.setCode.toUpperCase()} #${face.collectorNumber})`;
}

function requestLabel(request: CardRequest): string {
  if (request.setCode && request.collectorNumber) {
    return `${request.name} (${request.setCode.toUpperCase()} #${request.collectorNumber})`;
  }
  return request.name;
}

export class DownloadOrchestrator {
  private readonly strict: boolean;
  private readonly splitMeld: boolean;
  private readonly format: OutputFormat;

  constructor(
    private readonly deps: DownloadDependencies,
    private readonly options: DownloadOptions
  ) {
    this.strict = options.strict ?? false;
    this.splitMeld = options.splitMeldResult ?? true;
    this.format = outputFormatFor(options.imageSize, options.border);
  }

  async downloadSet(setCode: string): Promise<DownloadReport> {
    const run = this.startRun();
    logger.info("Fetching card list for set", { setCode: setCode.toUpperCase() });

    for await (const faces of this.deps.resolver.resolveSet(setCode)) {
      for (const face of faces) {
        await this.processFace(face, run);
      }
    }

    return this.finish(run);
  }

  async downloadFromUrl(cardUrl: string): Promise<DownloadReport> {
    const run = this.startRun();
    const identifier = parseCardUrl(cardUrl);
    logger.info("Fetching card from URL", { identifier });

    const faces = await this.deps.resolver.resolveIdentifier(identifier);
    for (const face of faces) {
      await this.processFace(face, run);
    }

    return this.finish(run);
  }

  async downloadDecklist(text: string): Promise<DownloadReport> {
    const run = this.startRun();
    const { requests, malformed } = parseDecklist(text);
    run.report.malformed = malformed;

    for (const entry of malformed) {
      logger.warn("Could not parse decklist line, skipping", { lineNumber: entry.lineNumber, line: entry.line });
    }

    logger.info("Decklist parsed", { requests: requests.length, malformed: malformed.length });

    const seen = new Set<string>();
    for (const request of requests) {
      const key = requestKey(request);
      if (seen.has(key)) {
        run.report.skippedDuplicates += 1;
        logger.debug("Duplicate decklist entry, skipping", { lineNumber: request.lineNumber, key });
        continue;
      }
      seen.add(key);

      let faces: ResolvedFace[];
      try {
        faces = await this.deps.resolver.resolve(request);
      } catch (error) {
        if (this.strict || !isCardFailure(error)) {
          throw error;
        }
        this.recordFailure(run, requestLabel(request), error);
        continue;
      }

      logger.info("Found card", { name: request.name, faces: faces.length });
      for (const face of faces) {
        await this.processFace(face, run);
      }
    }

    return this.finish(run);
  }

  private startRun(): RunState {
    return {
      report: {
        outputDir: this.options.outputDir,
        written: [],
        failures: [],
        malformed: [],
        skippedDuplicates: 0,
      },
      writtenFaces: new Set(),
    };
  }

  private finish(run: RunState): DownloadReport {
    logger.info("Download finished", {
      outputDir: run.report.outputDir,
      written: run.report.written.length,
      failures: run.report.failures.length,
      malformed: run.report.malformed.length,
    });
    return run.report;
  }

  private async processFace(face: ResolvedFace, run: RunState): Promise<void> {
    const faceKey = `${face.catalogId}:${face.faceIndex}`;
    if (run.writtenFaces.has(faceKey)) {
      logger.debug("Face already written in this run", { name: face.name, catalogId: face.catalogId });
      return;
    }
    run.writtenFaces.add(faceKey);

    try {
      await this.writeFace(face, run);
    } catch (error) {
      if (this.strict) {
        throw error;
      }
      this.recordFailure(run, faceLabel(face), error);
    }
  }

  private async writeFace(face: ResolvedFace, run: RunState): Promise<void> {
    const { imageSize, border } = this.options;
    const uri = face.imageUris[imageSize];

    if (!uri) {
      throw new CatalogDataError(`No '${imageSize}' image for ${faceLabel(face)}`);
    }

    const bytes = await this.deps.images.downloadImage(uri);

    if (face.meldComponent === "meld_result" && this.splitMeld) {
      const { top, bottom } = await splitMeldResult(await decodeRaster(bytes));
      await this.writeRaster(top, buildFileName(face, this.format, "top"), run);
      await this.writeRaster(bottom, buildFileName(face, this.format, "bottom"), run);
      return;
    }

    const fileName = buildFileName(face, this.format);

    if (!border.enabled) {
      await this.writeFile(bytes, fileName, run);
      return;
    }

    await this.writeRaster(await decodeRaster(bytes), fileName, run);
  }

  private async writeRaster(image: RasterImage, fileName: string, run: RunState): Promise<void> {
    const bordered = await applyBorder(image, this.options.border);
    await this.writeFile(await encodeRaster(bordered, this.format), fileName, run);
  }

  private async writeFile(bytes: Buffer, fileName: string, run: RunState): Promise<void> {
    const destination = path.join(this.options.outputDir, fileName);
    await this.deps.writer.write(bytes, destination);
    run.report.written.push(destination);
    logger.info("Saved image", { file: fileName });
  }

  private recordFailure(run: RunState, label: string, error: unknown): void {
    const normalized = BaseError.normalize(error);
    run.report.failures.push({ label, error: normalized });
    logger.error("Card failed", { label, error: serializeError(normalized) });
  }
}

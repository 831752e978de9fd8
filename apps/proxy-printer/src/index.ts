#!/usr/bin/env node
/**
 * Proxy Printer
 *
 * Interactive CLI that downloads Scryfall card images as print-ready files,
 * optionally with a 1/8 inch bleed border.
 *
 * Modes:
 *   [1] Full set by set code
 *   [2] Single card by Scryfall URL
 *   [3] Pasted decklist ("1 Sol Ring (LTC) 280" or "4 Counterspell")
 *
 * Environment:
 *   SCRYFALL_API_BASE_URL  - API base URL (default: https://api.scryfall.com)
 *   SCRYFALL_RATE_LIMIT_MS - Delay between API calls (default: 100)
 *   SCRYFALL_CONTACT_EMAIL - Contact address sent in the User-Agent
 *   OUTPUT_DIR             - Default folder the card folder is created in (default: .)
 *   STRICT_MODE            - true to stop at the first failed card (default: false)
 *   SPLIT_MELD_RESULT      - false to keep meld results as one image (default: true)
 *   LOG_LEVEL              - fatal|error|warn|info|debug|trace (default: info)
 */

import "dotenv/config";

import path from "node:path";

import { getEnv } from "./lib/env.js";
import type { Env } from "./lib/env.js";
import { InputClosedError, serializeError } from "./lib/errors.js";
import { createLogger } from "./lib/logger.js";
import { collectDownloadPlan, confirmRestart, createTerminalIO } from "./modules/cli/index.js";
import type { DownloadPlan, MenuIO } from "./modules/cli/index.js";
import { DownloadOrchestrator, FsFileWriter } from "./modules/download/index.js";
import type { DownloadReport } from "./modules/download/index.js";
import { CardResolver } from "./modules/resolver/index.js";
import { RateLimiter, ScryfallClient } from "./modules/scryfall/index.js";

const logger = createLogger("cli");

function createOrchestrator(env: Env, plan: DownloadPlan): DownloadOrchestrator {
  const client = new ScryfallClient({
    baseUrl: env.SCRYFALL_API_BASE_URL,
    contactEmail: env.SCRYFALL_CONTACT_EMAIL,
    rateLimiter: new RateLimiter({ minIntervalMs: env.SCRYFALL_RATE_LIMIT_MS }),
  });

  return new DownloadOrchestrator(
    { resolver: new CardResolver(client), images: client, writer: new FsFileWriter() },
    {
      outputDir: path.resolve(plan.baseDir, plan.folderName),
      imageSize: plan.imageSize,
      border: plan.border,
      strict: env.STRICT_MODE,
      splitMeldResult: env.SPLIT_MELD_RESULT,
    }
  );
}

function runPlan(orchestrator: DownloadOrchestrator, plan: DownloadPlan): Promise<DownloadReport> {
  switch (plan.mode) {
    case "set":
      return orchestrator.downloadSet(plan.setCode);
    case "url":
      return orchestrator.downloadFromUrl(plan.cardUrl);
    case "decklist":
      return orchestrator.downloadDecklist(plan.decklist);
  }
}

function printReport(io: MenuIO, report: DownloadReport): void {
  io.print("\n=========================================");
  io.print(`Saved ${report.written.length} file(s) to ${report.outputDir}`);

  for (const entry of report.malformed) {
    io.print(`  Skipped line ${entry.lineNumber}: '${entry.line}'`);
  }
  if (report.skippedDuplicates > 0) {
    io.print(`  Skipped ${report.skippedDuplicates} duplicate decklist line(s)`);
  }
  for (const failure of report.failures) {
    io.print(`  Failed: ${failure.label}: ${failure.error.message}`);
  }

  io.print("=========================================");
}

async function main(): Promise<void> {
  const env = getEnv();
  const io = createTerminalIO();

  io.print("=========================================");
  io.print(" Scryfall Magic: The Gathering Downloader");
  io.print("=========================================");

  try {
    let again = true;
    while (again) {
      try {
        const plan = await collectDownloadPlan(io, env.OUTPUT_DIR);
        const report = await runPlan(createOrchestrator(env, plan), plan);
        printReport(io, report);
      } catch (error) {
        if (error instanceof InputClosedError) {
          throw error;
        }
        logger.error("Download run failed", { error: serializeError(error) });
        io.print(`\nThe download stopped: ${error instanceof Error ? error.message : String(error)}`);
      }

      again = await confirmRestart(io);
    }
  } finally {
    io.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof InputClosedError) {
    return;
  }
  logger.fatal("Fatal error", { error: serializeError(error) });
  process.exitCode = 1;
});

/**
 * Numbered console menu that gathers everything one download run needs.
 */

import { BORDER_COLORS } from "../border/index.js";
import type { BorderSpec } from "../border/index.js";
import { DEFAULT_DECK_FOLDER, SINGLES_FOLDER, deckFolderName } from "../download/index.js";
import { IMAGE_SIZES } from "../scryfall/index.js";
import type { ImageSize } from "../scryfall/index.js";

export interface MenuIO {
  /** Show a prompt and wait for one line of input */
  ask(question: string): Promise<string>;
  print(line: string): void;
}

export type DownloadMode = "set" | "url" | "decklist";

export type DownloadPlan =
  | { mode: "set"; setCode: string; folderName: string; imageSize: ImageSize; border: BorderSpec; baseDir: string }
  | { mode: "url"; cardUrl: string; folderName: string; imageSize: ImageSize; border: BorderSpec; baseDir: string }
  | { mode: "decklist"; decklist: string; folderName: string; imageSize: ImageSize; border: BorderSpec; baseDir: string };

export interface MenuOption<T> {
  label: string;
  value: T;
}

const MODE_OPTIONS: MenuOption<DownloadMode>[] = [
  { label: "Download a full Set", value: "set" },
  { label: "Download a single card by URL", value: "url" },
  { label: "Download from Pasted Decklist", value: "decklist" },
];

const YES_NO_OPTIONS: MenuOption<boolean>[] = [
  { label: "Yes", value: true },
  { label: "No", value: false },
];

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Print numbered options and ask until the answer is one of their numbers */
export async function chooseOption<T>(io: MenuIO, title: string, options: readonly MenuOption<T>[]): Promise<T> {
  io.print(`\n${title}`);
  options.forEach((option, index) => io.print(`[${index + 1}] ${option.label}`));

  for (;;) {
    const answer = (await io.ask(`Enter your choice (1-${options.length}): `)).trim();
    const index = Number(answer) - 1;
    if (/^\d+$/.test(answer) && index >= 0 && index < options.length) {
      return options[index].value;
    }
    io.print(`Invalid choice. Please enter a number from 1 to ${options.length}.`);
  }
}

/** Read lines until the first empty one */
export async function readDecklist(io: MenuIO): Promise<string> {
  io.print("\nPaste your decklist below (one card per line, e.g. '1 Sol Ring (LTC) 280'). Enter a blank line to finish.");
  const lines: string[] = [];

  for (;;) {
    const line = await io.ask("");
    if (line.trim() === "") {
      return lines.join("\n");
    }
    lines.push(line);
  }
}

async function askNonEmpty(io: MenuIO, question: string): Promise<string> {
  for (;;) {
    const answer = (await io.ask(question)).trim();
    if (answer) {
      return answer;
    }
    io.print("A value is required.");
  }
}

export async function collectDownloadPlan(io: MenuIO, defaultBaseDir: string): Promise<DownloadPlan> {
  const mode = await chooseOption(io, "Select download mode:", MODE_OPTIONS);

  const imageSize = await chooseOption(
    io,
    "Available image sizes:",
    IMAGE_SIZES.map((size) => ({ label: size, value: size }))
  );

  const enabled = await chooseOption(io, "Add a 1/8 inch border for print bleed?", YES_NO_OPTIONS);
  const border: BorderSpec = { enabled, color: "black" };
  if (enabled) {
    border.color = await chooseOption(
      io,
      "Enter border color:",
      BORDER_COLORS.map((color) => ({ label: capitalize(color), value: color }))
    );
    io.print(`A 1/8 inch (${border.color}) border will be added. Pixel size is calculated per image.`);
  }

  const baseDirAnswer = (await io.ask(`\nSave the card folder under [${defaultBaseDir}]: `)).trim();
  const baseDir = baseDirAnswer || defaultBaseDir;

  switch (mode) {
    case "set": {
      const setCode = (await askNonEmpty(io, "\nEnter the set code (e.g., BRO, DSK): ")).toLowerCase();
      return { mode, setCode, folderName: setCode, imageSize, border, baseDir };
    }
    case "url": {
      const cardUrl = await askNonEmpty(io, "\nPaste the full Scryfall card URL: ");
      return { mode, cardUrl, folderName: SINGLES_FOLDER, imageSize, border, baseDir };
    }
    case "decklist": {
      const folderAnswer = await io.ask(`\nEnter a name for the deck folder [${DEFAULT_DECK_FOLDER}]: `);
      const decklist = await readDecklist(io);
      return { mode, decklist, folderName: deckFolderName(folderAnswer), imageSize, border, baseDir };
    }
  }
}

export async function confirmRestart(io: MenuIO): Promise<boolean> {
  for (;;) {
    const answer = (await io.ask("\nWould you like to restart the program? (y/n): ")).trim().toLowerCase();
    if (answer === "y" || answer === "yes") return true;
    if (answer === "n" || answer === "no") return false;
  }
}

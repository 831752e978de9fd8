import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { createLogger } from "../../lib/logger.js";

const logger = createLogger("FileWriter");

export interface FileWriter {
  /** Write bytes to a path, replacing any existing file */
  write(bytes: Buffer, destinationPath: string): Promise<void>;
}

export class FsFileWriter implements FileWriter {
  async write(bytes: Buffer, destinationPath: string): Promise<void> {
    await mkdir(path.dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, bytes);
    logger.debug("File written", { path: destinationPath, sizeBytes: bytes.length });
  }
}

export { DownloadOrchestrator, outputFormatFor } from "./orchestrator.js";
export type { DownloadDependencies, DownloadFailure, DownloadOptions, DownloadReport } from "./orchestrator.js";

export { FsFileWriter } from "./file-writer.js";
export type { FileWriter } from "./file-writer.js";

export {
  DEFAULT_DECK_FOLDER,
  SINGLES_FOLDER,
  buildFileName,
  deckFolderName,
  sanitizeFilename,
} from "./file-names.js";

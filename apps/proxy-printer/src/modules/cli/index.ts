export { chooseOption, collectDownloadPlan, confirmRestart, readDecklist } from "./menu.js";
export type { DownloadMode, DownloadPlan, MenuIO, MenuOption } from "./menu.js";

export { createTerminalIO } from "./terminal.js";
export type { TerminalIO } from "./terminal.js";

export { createCardRequest, parseDecklist, parseDecklistLine, requestKey } from "./parser.js";
export type { CardRequest, MalformedLine, ParsedDecklist } from "./parser.js";

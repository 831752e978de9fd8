export { CardResolver } from "./card-resolver.js";
export type { PartRole, ResolvedFace } from "./card-resolver.js";

export { parseCardUrl } from "./card-url.js";
export type { CardIdentifier } from "./card-url.js";

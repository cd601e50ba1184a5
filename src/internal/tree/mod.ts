export { DocumentArena } from "./arena.js";
export { buildDocument, buildFragment } from "./build.js";
export { normalizeTree } from "./normalize.js";

export type { BuildResult, ParseWarning } from "./build.js";
export type {
  ArenaNode,
  Attribute,
  CommentNode,
  DocumentKind,
  ElementNode,
  NodeId,
  TextNode
} from "./types.js";

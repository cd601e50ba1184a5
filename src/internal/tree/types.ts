export type NodeId = number;

export interface Attribute {
  readonly name: string;
  readonly value: string;
}

export interface NodeLinks {
  readonly parent: NodeId | null;
  readonly children: readonly NodeId[];
  readonly prevSibling: NodeId | null;
  readonly nextSibling: NodeId | null;
}

export interface ElementData {
  readonly kind: "element";
  readonly name: string;
  readonly attributes: readonly Attribute[];
}

export interface TextData {
  readonly kind: "text";
  readonly value: string;
}

export interface CommentData {
  readonly kind: "comment";
  readonly value: string;
}

export type NodeData = ElementData | TextData | CommentData;

export type ElementNode = ElementData & NodeLinks;
export type TextNode = TextData & NodeLinks;
export type CommentNode = CommentData & NodeLinks;
export type ArenaNode = ElementNode | TextNode | CommentNode;

export type DocumentKind = "document" | "fragment";

import type { DocumentArena } from "../tree/arena.js";
import type { NodeId } from "../tree/types.js";

export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr"
]);

// Children of these are emitted verbatim so that re-parsing yields the same text.
const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set([
  "script",
  "style",
  "xmp",
  "iframe",
  "noembed",
  "noframes",
  "noscript",
  "plaintext"
]);

type SerializeStep =
  | { readonly kind: "node"; readonly id: NodeId; readonly rawText: boolean }
  | { readonly kind: "close"; readonly name: string };

export function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function pushChildren(steps: SerializeStep[], children: readonly NodeId[], rawText: boolean): void {
  for (let index = children.length - 1; index >= 0; index -= 1) {
    const child = children[index];
    if (child !== undefined) {
      steps.push({ kind: "node", id: child, rawText });
    }
  }
}

function writeSteps(document: DocumentArena, steps: SerializeStep[], out: string[]): void {
  for (;;) {
    const step = steps.pop();
    if (step === undefined) {
      return;
    }

    if (step.kind === "close") {
      out.push(`</${step.name}>`);
      continue;
    }

    const node = document.node(step.id);
    if (node.kind === "text") {
      out.push(step.rawText ? node.value : escapeText(node.value));
      continue;
    }

    if (node.kind === "comment") {
      out.push(`<!--${node.value}-->`);
      continue;
    }

    out.push(`<${node.name}`);
    for (const attribute of node.attributes) {
      out.push(` ${attribute.name}="${escapeAttribute(attribute.value)}"`);
    }
    out.push(">");

    if (VOID_ELEMENTS.has(node.name)) {
      continue;
    }

    steps.push({ kind: "close", name: node.name });
    pushChildren(steps, node.children, RAW_TEXT_ELEMENTS.has(node.name));
  }
}

function isRawTextContainer(document: DocumentArena, id: NodeId): boolean {
  const node = document.node(id);
  return node.kind === "element" && RAW_TEXT_ELEMENTS.has(node.name);
}

export function outerHtmlInto(document: DocumentArena, id: NodeId, out: string[]): void {
  const parent = document.node(id).parent;
  const rawText = parent !== null && isRawTextContainer(document, parent);
  writeSteps(document, [{ kind: "node", id, rawText }], out);
}

export function innerHtmlInto(document: DocumentArena, id: NodeId, out: string[]): void {
  const steps: SerializeStep[] = [];
  pushChildren(steps, document.node(id).children, isRawTextContainer(document, id));
  writeSteps(document, steps, out);
}

export function textInto(document: DocumentArena, id: NodeId, out: string[]): void {
  const stack: NodeId[] = [id];
  for (;;) {
    const current = stack.pop();
    if (current === undefined) {
      return;
    }

    const node = document.node(current);
    if (node.kind === "text") {
      out.push(node.value);
    } else if (node.kind === "element") {
      for (let index = node.children.length - 1; index >= 0; index -= 1) {
        const child = node.children[index];
        if (child !== undefined) {
          stack.push(child);
        }
      }
    }
  }
}

export function outerHtml(document: DocumentArena, id: NodeId): string {
  const out: string[] = [];
  outerHtmlInto(document, id, out);
  return out.join("");
}

export function innerHtml(document: DocumentArena, id: NodeId): string {
  const out: string[] = [];
  innerHtmlInto(document, id, out);
  return out.join("");
}

export function textContent(document: DocumentArena, id: NodeId): string {
  const out: string[] = [];
  textInto(document, id, out);
  return out.join("");
}

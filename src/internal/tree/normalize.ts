import type { DocumentArena } from "./arena.js";
import type { NodeId } from "./types.js";

function indent(level: number): string {
  return "  ".repeat(level);
}

function quoteRaw(value: string): string {
  return `"${value}"`;
}

/** Fixture-style outline of the arena, one node per line. */
export function normalizeTree(document: DocumentArena, from: NodeId | null = document.root): string {
  if (from === null) {
    return "";
  }

  const lines: string[] = [];
  const stack: { readonly id: NodeId; readonly level: number }[] = [{ id: from, level: 0 }];
  for (;;) {
    const entry = stack.pop();
    if (entry === undefined) {
      break;
    }

    const node = document.node(entry.id);
    if (node.kind === "text") {
      lines.push(`| ${indent(entry.level)}${quoteRaw(node.value)}`);
      continue;
    }

    if (node.kind === "comment") {
      lines.push(`| ${indent(entry.level)}<!-- ${node.value} -->`);
      continue;
    }

    lines.push(`| ${indent(entry.level)}<${node.name}>`);
    for (const attribute of node.attributes) {
      lines.push(`| ${indent(entry.level + 1)}${attribute.name}=${quoteRaw(attribute.value)}`);
    }
    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (child !== undefined) {
        stack.push({ id: child, level: entry.level + 1 });
      }
    }
  }
  return lines.join("\n");
}

import { describe, expect, it } from "vitest";

import { resolveSoupConfig } from "../config.js";
import { ParseError } from "../errors.js";
import { buildDocument, buildFragment } from "./build.js";
import { normalizeTree } from "./normalize.js";

import type { Logger } from "../logger.js";

class RecordingLogger implements Logger {
  readonly entries: { level: string; message: string; attributes: unknown[] }[] = [];

  clone(): RecordingLogger {
    return this;
  }

  setContext(): void {}

  trace(message: string, ...attributes: unknown[]): void {
    this.entries.push({ level: "trace", message, attributes });
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.entries.push({ level: "debug", message, attributes });
  }

  info(message: string, ...attributes: unknown[]): void {
    this.entries.push({ level: "info", message, attributes });
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.entries.push({ level: "warn", message, attributes });
  }

  error(message: string, ...attributes: unknown[]): void {
    this.entries.push({ level: "error", message, attributes });
  }
}

function captureParseError(work: () => unknown): ParseError {
  try {
    work();
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ParseError");
}

const DEFAULTS = resolveSoupConfig();

describe("buildDocument", () => {
  it("builds the implied html, head and body elements", () => {
    const { document } = buildDocument("<p>ok</p>", DEFAULTS);
    expect(document.kind).toBe("document");
    expect(normalizeTree(document)).toBe(
      ["| <html>", "|   <head>", "|   <body>", "|     <p>", '|       "ok"'].join("\n")
    );
  });

  it("records recovered parse errors as warnings", () => {
    const { warnings } = buildDocument("<p>ok</p>", DEFAULTS);
    expect(warnings[0]?.code).toBe("missing-doctype");
  });

  it("produces no warnings for a conforming document", () => {
    const { warnings } = buildDocument(
      "<!DOCTYPE html><html><head><title>t</title></head><body><p>ok</p></body></html>",
      DEFAULTS
    );
    expect(warnings).toEqual([]);
  });

  it("keeps attributes in source order", () => {
    const { document } = buildDocument('<!DOCTYPE html><a href="/x" class="nav" id="home">x</a>', DEFAULTS);
    expect(normalizeTree(document)).toContain(
      ["|     <a>", '|       href="/x"', '|       class="nav"', '|       id="home"', '|       "x"'].join("\n")
    );
  });

  it("writes prefixed foreign attributes as prefix:name", () => {
    const { document } = buildDocument('<!DOCTYPE html><svg><use xlink:href="#icon"></use></svg>', DEFAULTS);
    expect(normalizeTree(document)).toContain('|         xlink:href="#icon"');
  });

  it("drops whitespace-only text that contains a newline", () => {
    const { document } = buildDocument("<!DOCTYPE html><div>\n  <p>a</p> <b>b</b>\n</div>", DEFAULTS);
    expect(normalizeTree(document)).toBe(
      [
        "| <html>",
        "|   <head>",
        "|   <body>",
        "|     <div>",
        "|       <p>",
        '|         "a"',
        '|       " "',
        "|       <b>",
        '|         "b"'
      ].join("\n")
    );
  });

  it("keeps formatting whitespace when preserveWhitespace is set", () => {
    const { document } = buildDocument(
      "<!DOCTYPE html><div>\n<p>a</p></div>",
      resolveSoupConfig({ preserveWhitespace: true })
    );
    expect(normalizeTree(document)).toContain(['|     <div>', '|       "\n"', "|       <p>"].join("\n"));
  });

  it("keeps whitespace inside whitespace-sensitive elements", () => {
    const { document } = buildDocument("<!DOCTYPE html><textarea>\n\n</textarea>", DEFAULTS);
    expect(normalizeTree(document)).toContain(['|     <textarea>', '|       "\n"'].join("\n"));
  });

  it("drops comments unless includeComments is set", () => {
    const html = "<!DOCTYPE html><div><!--note--><p>x</p></div>";
    expect(normalizeTree(buildDocument(html, DEFAULTS).document)).not.toContain("<!--");
    expect(normalizeTree(buildDocument(html, resolveSoupConfig({ includeComments: true })).document)).toContain(
      ["|     <div>", "|       <!-- note -->", "|       <p>"].join("\n")
    );
  });

  it("takes template children from the template content", () => {
    const { document } = buildDocument("<!DOCTYPE html><body><template><span>t</span></template></body>", DEFAULTS);
    expect(normalizeTree(document)).toContain(["|     <template>", "|       <span>", '|         "t"'].join("\n"));
  });

  it("rejects empty and whitespace-only input", () => {
    for (const input of ["", "   \n\t"]) {
      const error = captureParseError(() => buildDocument(input, DEFAULTS));
      expect(error.payload).toEqual({ code: "EMPTY_INPUT" });
      expect(error.message).toBe("empty or whitespace-only input");
    }
  });

  it("fails on the first recovered error in strict mode", () => {
    const error = captureParseError(() => buildDocument("<p>ok</p>", resolveSoupConfig({ strictMode: true })));
    expect(error.payload.code).toBe("MALFORMED_HTML");
    expect(error.message.startsWith("malformed HTML: missing-doctype")).toBe(true);
  });

  it("enforces maxDepth with the offending element's location", () => {
    const error = captureParseError(() =>
      buildDocument("<div><p>x</p></div>", resolveSoupConfig({ maxDepth: 3 }))
    );
    expect(error.payload.code).toBe("MAX_DEPTH_EXCEEDED");
    expect(error.message).toBe("maximum nesting depth of 3 exceeded at line 1, column 6");
    expect(error.span?.start.offset).toBe(5);
  });

  it("accepts nesting exactly at maxDepth", () => {
    const { document } = buildDocument("<div>x</div>", resolveSoupConfig({ maxDepth: 3 }));
    expect(document.size).toBe(5);
  });

  it("logs a debug summary", () => {
    const logger = new RecordingLogger();
    buildDocument("<p>ok</p>", resolveSoupConfig({ logger }));
    expect(logger.entries).toEqual([
      { level: "debug", message: "parsed document", attributes: [{ nodes: 5, recoveredErrors: 1 }] }
    ]);
  });
});

describe("buildFragment", () => {
  it("parses children under a synthetic context root", () => {
    const { document } = buildFragment("<li>a</li><li>b</li>", "ul", DEFAULTS);
    expect(document.kind).toBe("fragment");
    expect(normalizeTree(document)).toBe(
      ["| <ul>", "|   <li>", '|     "a"', "|   <li>", '|     "b"'].join("\n")
    );
  });

  it("follows the insertion rules of the context element", () => {
    const inTbody = buildFragment("<tr><td>a</td></tr>", "tbody", DEFAULTS).document;
    expect(normalizeTree(inTbody)).toBe(["| <tbody>", "|   <tr>", "|     <td>", '|       "a"'].join("\n"));

    const inTable = buildFragment("<tr><td>a</td></tr>", "TABLE", DEFAULTS).document;
    expect(normalizeTree(inTable)).toBe(
      ["| <table>", "|   <tbody>", "|     <tr>", "|       <td>", '|         "a"'].join("\n")
    );
  });

  it("returns an empty arena for empty input", () => {
    const { document, warnings } = buildFragment("  ", "div", DEFAULTS);
    expect(document.root).toBeNull();
    expect(document.size).toBe(0);
    expect(warnings).toEqual([]);
  });

  it("rejects a blank context name", () => {
    expect(() => buildFragment("<p>x</p>", " ", DEFAULTS)).toThrow(RangeError);
  });

  it("counts depth from the fragment's top level", () => {
    const error = captureParseError(() => buildFragment("<b><i>x</i></b>", "div", resolveSoupConfig({ maxDepth: 1 })));
    expect(error.payload.code).toBe("MAX_DEPTH_EXCEEDED");
  });
});

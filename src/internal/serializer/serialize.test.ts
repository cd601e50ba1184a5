import { describe, expect, it } from "vitest";

import { resolveSoupConfig } from "../config.js";
import { buildDocument } from "../tree/build.js";
import { DocumentArena } from "../tree/arena.js";
import {
  escapeAttribute,
  escapeText,
  innerHtml,
  innerHtmlInto,
  outerHtml,
  textContent,
  textInto
} from "./serialize.js";

function article(): { document: DocumentArena; root: number; script: number } {
  const document = new DocumentArena();
  const root = document.createElement("article", [
    { name: "class", value: "post" },
    { name: "title", value: 'a "quoted" <title> & more' }
  ]);
  document.setRoot(root);

  const heading = document.createElement("h1");
  document.appendChild(root, heading);
  document.appendChild(heading, document.createText("Fish & <Chips>"));
  document.appendChild(root, document.createComment(" note "));
  document.appendChild(root, document.createElement("br"));

  const script = document.createElement("script");
  document.appendChild(root, script);
  document.appendChild(script, document.createText("if (a < b && c) {}"));
  return { document, root, script };
}

describe("escaping", () => {
  it("escapes text content", () => {
    expect(escapeText("a < b & c > d \"e\"")).toBe("a &lt; b &amp; c &gt; d \"e\"");
  });

  it("escapes attribute values", () => {
    expect(escapeAttribute('say "hi" & <wave>')).toBe("say &quot;hi&quot; &amp; &lt;wave&gt;");
  });
});

describe("outerHtml", () => {
  it("serializes attributes, comments, void and raw-text elements", () => {
    const { document, root } = article();
    expect(outerHtml(document, root)).toBe(
      '<article class="post" title="a &quot;quoted&quot; &lt;title&gt; &amp; more">' +
        "<h1>Fish &amp; &lt;Chips&gt;</h1>" +
        "<!-- note -->" +
        "<br>" +
        "<script>if (a < b && c) {}</script>" +
        "</article>"
    );
  });

  it("emits a raw-text child verbatim when serialized on its own", () => {
    const { document, script } = article();
    const text = document.node(script).children[0];
    expect(text).toBeDefined();
    if (text !== undefined) {
      expect(outerHtml(document, text)).toBe("if (a < b && c) {}");
    }
  });

  it("round-trips parsed markup", () => {
    const { document, root } = buildDocument(
      '<!DOCTYPE html><body><ul id="list"><li>One</li><li class="x">Two &amp; three</li></ul></body>',
      resolveSoupConfig()
    );
    expect(outerHtml(document, root)).toBe(
      '<html><head></head><body><ul id="list"><li>One</li><li class="x">Two &amp; three</li></ul></body></html>'
    );
  });
});

describe("innerHtml", () => {
  it("serializes only the children", () => {
    const { document, script } = article();
    expect(innerHtml(document, script)).toBe("if (a < b && c) {}");
  });

  it("appends to an existing buffer", () => {
    const { document, root } = article();
    const heading = document.node(root).children[0];
    const out = ["prefix:"];
    if (heading !== undefined) {
      innerHtmlInto(document, heading, out);
    }
    expect(out.join("")).toBe("prefix:Fish &amp; &lt;Chips&gt;");
  });

  it("is empty for a void element", () => {
    const { document, root } = article();
    const br = document.node(root).children[2];
    expect(br === undefined ? null : innerHtml(document, br)).toBe("");
  });
});

describe("textContent", () => {
  it("concatenates descendant text and skips comments", () => {
    const { document, root } = article();
    expect(textContent(document, root)).toBe("Fish & <Chips>if (a < b && c) {}");
  });

  it("appends into a caller buffer", () => {
    const document = new DocumentArena();
    const root = document.createElement("p");
    document.setRoot(root);
    document.appendChild(root, document.createText("a"));
    const bold = document.createElement("b");
    document.appendChild(root, bold);
    document.appendChild(bold, document.createText("b"));
    document.appendChild(root, document.createText("c"));

    const out: string[] = [];
    textInto(document, root, out);
    expect(out).toEqual(["a", "b", "c"]);
  });
});

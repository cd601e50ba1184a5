import { describe, expect, it } from "vitest";

import { AttributeNotFoundError, InvariantError } from "../internal/errors.js";
import { parse } from "./mod.js";
import { Tag } from "./tag.js";

const soup = parse(
  [
    "<!DOCTYPE html><html><head><title>Sample Page</title></head><body>",
    '<div id="content" class="main wide" data-role="page">',
    '<p class="intro">Hello <b>world</b>!</p>',
    '<a href="/one" class="link">One</a>',
    '<a href="/two" class="link external">Two</a>',
    '<img src="logo.png" alt="Logo">',
    "</div>",
    "</body></html>"
  ].join("\n")
);

function must(tag: Tag | null): Tag {
  if (tag === null) {
    throw new Error("expected an element");
  }
  return tag;
}

function names(tags: Iterable<Tag>): string[] {
  return [...tags].map((tag) => tag.name);
}

const content = must(soup.find("#content"));
const intro = must(soup.find("p.intro"));
const bold = must(soup.find("b"));
const image = must(soup.find("img"));

describe("attributes", () => {
  it("reads attributes case-insensitively", () => {
    expect(content.name).toBe("div");
    expect(content.get("ID")).toBe("content");
    expect(content.attr("data-role")).toBe("page");
    expect(content.get("missing")).toBeNull();
    expect(content.hasAttr("class")).toBe(true);
    expect(content.hasAttr("href")).toBe(false);
  });

  it("throws for a required attribute that is missing", () => {
    expect(() => content.getOrThrow("missing")).toThrow(AttributeNotFoundError);
    expect(() => content.getOrThrow("missing")).toThrow("attribute 'missing' not found on element");
    expect(content.getOrThrow("class")).toBe("main wide");
  });

  it("lists attributes as a record and in source order", () => {
    expect(content.attrs()).toEqual({ id: "content", class: "main wide", "data-role": "page" });
    expect(content.attributes.map((attribute) => attribute.name)).toEqual(["id", "class", "data-role"]);
  });

  it("keeps an attribute named __proto__ as an ordinary key", () => {
    const div = must(parse('<div __proto__="x" id="a"></div>').find("div"));
    expect(div.get("__proto__")).toBe("x");
    expect(Object.entries(div.attrs())).toEqual([
      ["__proto__", "x"],
      ["id", "a"]
    ]);
    expect(Object.getPrototypeOf(div.attrs())).toBe(Object.prototype);
  });

  it("splits class names", () => {
    expect(content.classes()).toEqual(["main", "wide"]);
    expect(content.hasClass("wide")).toBe(true);
    expect(content.hasClass("wid")).toBe(false);
  });
});

describe("content", () => {
  it("serializes text and markup", () => {
    expect(intro.text()).toBe("Hello world!");
    expect(intro.innerHtml()).toBe("Hello <b>world</b>!");
    expect(intro.outerHtml()).toBe('<p class="intro">Hello <b>world</b>!</p>');
    expect(String(image)).toBe('<img src="logo.png" alt="Logo">');
  });

  it("appends into caller buffers", () => {
    const out: string[] = [];
    bold.outerHtmlInto(out);
    bold.innerHtmlInto(out);
    bold.textInto(out);
    expect(out.join("")).toBe("<b>world</b>worldworld");
  });

  it("returns direct text children", () => {
    expect(intro.textNodes()).toEqual(["Hello ", "!"]);
  });
});

describe("navigation", () => {
  it("moves between parents and children", () => {
    expect(bold.parent()?.equals(intro)).toBe(true);
    expect(names(content.children())).toEqual(["p", "a", "a", "img"]);
    expect(content.length).toBe(4);
    expect(image.length).toBe(0);
    expect(soup.root()?.parent()).toBeNull();
  });

  it("filters children", () => {
    expect(content.childrenByName("A").count()).toBe(2);
    expect(content.childrenByClass("external").toArray().map((tag) => tag.text())).toEqual(["Two"]);
  });

  it("moves between siblings", () => {
    expect(intro.prevSibling()).toBeNull();
    expect(intro.nextSibling()?.text()).toBe("One");
    expect(image.nextSibling()).toBeNull();
    expect(names(image.prevSiblings())).toEqual(["a", "a", "p"]);
    expect(names(intro.nextSiblings())).toEqual(["a", "a", "img"]);
    expect(names(must(soup.find(".external")).siblings())).toEqual(["p", "a", "img"]);
  });

  it("walks ancestors and descendants", () => {
    expect(names(bold.ancestors())).toEqual(["p", "div", "body", "html"]);
    expect(names(bold.parents())).toEqual(["p", "div", "body", "html"]);
    expect(names(content.descendants())).toEqual(["p", "b", "a", "a", "img"]);
  });

  it("finds the closest matching ancestor, excluding itself", () => {
    expect(bold.closest("p")?.equals(intro)).toBe(true);
    expect(intro.closest("p")).toBeNull();
    expect(intro.closest(".main")?.equals(content)).toBe(true);
    expect(bold.closest("table")).toBeNull();
  });
});

describe("scoped queries", () => {
  it("searches strict descendants only", () => {
    expect(content.find("a")?.text()).toBe("One");
    expect(content.findAll(".link")).toHaveLength(2);
    expect(content.select("div")).toEqual([]);
    expect(intro.find("a")).toBeNull();
  });

  it("extracts texts and attribute values", () => {
    expect(content.selectText("a")).toEqual(["One", "Two"]);
    expect(content.selectAttr("a", "HREF")).toEqual(["/one", "/two"]);
    expect(content.selectAttr("*", "alt")).toEqual(["Logo"]);
  });

  it("tests itself against a selector", () => {
    expect(intro.matches("div > p.intro")).toBe(true);
    expect(intro.matches("a")).toBe(false);
  });
});

describe("identity", () => {
  it("compares handles by document and id", () => {
    expect(must(soup.find("p")).equals(intro)).toBe(true);
    expect(intro.equals(bold)).toBe(false);
    const other = parse(soup.toHtml());
    expect(must(other.find("p.intro")).equals(intro)).toBe(false);
  });

  it("refuses to wrap a non-element node", () => {
    const text = soup.document.node(intro.id).children[0];
    expect(() => new Tag(soup.document, text ?? -1)).toThrow(InvariantError);
  });
});

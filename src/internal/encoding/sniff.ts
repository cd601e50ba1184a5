import { ParseError } from "../errors.js";

export interface EncodingSniffOptions {
  /** Label supplied by the caller (for example an HTTP charset); outranks the meta prescan. */
  readonly transportEncodingLabel?: string;
  readonly maxPrescanBytes?: number;
  readonly defaultEncoding?: string;
}

export type EncodingSource = "bom" | "transport" | "meta" | "default";

export interface EncodingSniffResult {
  readonly encoding: string;
  readonly source: EncodingSource;
}

export interface DecodedHtml {
  readonly text: string;
  readonly sniff: EncodingSniffResult;
}

interface ByteOrderMark {
  readonly bytes: readonly number[];
  readonly encoding: string;
}

const DEFAULT_PRESCAN_BYTES = 1024;

const BYTE_ORDER_MARKS: readonly ByteOrderMark[] = [
  { bytes: [0xef, 0xbb, 0xbf], encoding: "utf-8" },
  { bytes: [0xfe, 0xff], encoding: "utf-16be" },
  { bytes: [0xff, 0xfe], encoding: "utf-16le" }
];

// Latin-1 labels decode as windows-1252 in browsers.
const LATIN1_LABELS: ReadonlySet<string> = new Set(["iso-8859-1", "iso8859-1", "latin1", "latin-1", "us-ascii"]);

const SPACE = /[\t\n\f\r ]/;
const CHARSET_IN_CONTENT = /charset\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s;"'>]+))/i;

function detectBom(bytes: Uint8Array): string | null {
  const match = BYTE_ORDER_MARKS.find((mark) => mark.bytes.every((byte, index) => bytes[index] === byte));
  return match?.encoding ?? null;
}

function unquote(value: string): string {
  const trimmed = value.trim();
  const first = trimmed.charAt(0);
  if (trimmed.length >= 2 && (first === "\"" || first === "'") && trimmed.endsWith(first)) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

/**
 * Maps a label to the name TextDecoder reports for it, or null when the
 * label is unknown. A document cannot declare itself UTF-16 from inside
 * its own bytes, so such declarations fall back to UTF-8.
 */
function resolveLabel(label: string, source: EncodingSource): string | null {
  const normalized = unquote(label).toLowerCase();
  if (normalized.length === 0) {
    return null;
  }
  if (LATIN1_LABELS.has(normalized)) {
    return "windows-1252";
  }

  let encoding: string;
  try {
    encoding = new TextDecoder(normalized).encoding.toLowerCase();
  } catch {
    return null;
  }

  if (encoding === "iso-8859-1") {
    return "windows-1252";
  }
  if ((source === "meta" || source === "transport") && encoding.startsWith("utf-16")) {
    return "utf-8";
  }
  return encoding;
}

/**
 * Walks the first bytes of a document looking for `<meta charset>` or a
 * `http-equiv="content-type"` declaration. Bytes are read as Latin-1 so
 * that every byte maps to exactly one character.
 */
class MetaPrescanner {
  readonly #text: string;
  #position = 0;

  constructor(bytes: Uint8Array) {
    let text = "";
    for (const byte of bytes) {
      text += String.fromCharCode(byte);
    }
    this.#text = text;
  }

  scan(): string | null {
    for (;;) {
      const open = this.#text.indexOf("<", this.#position);
      if (open === -1) {
        return null;
      }
      this.#position = open;

      if (this.#text.startsWith("<!--", open)) {
        const close = this.#text.indexOf("-->", open + 4);
        if (close === -1) {
          return null;
        }
        this.#position = close + 3;
        continue;
      }

      const isMeta = /^<meta[\t\n\f\r /]/i.test(this.#text.slice(open, open + 6));
      this.#position = open + (isMeta ? 5 : 1);
      const attributes = this.#readAttributes();
      if (attributes === null) {
        return null;
      }
      if (isMeta) {
        const declared = this.#charsetOf(attributes);
        if (declared !== null) {
          return declared;
        }
      }
    }
  }

  #charsetOf(attributes: ReadonlyMap<string, string>): string | null {
    const charset = attributes.get("charset");
    if (charset !== undefined && charset.length > 0) {
      const resolved = resolveLabel(charset, "meta");
      if (resolved !== null) {
        return resolved;
      }
    }

    const content = attributes.get("content");
    if (attributes.get("http-equiv")?.toLowerCase() !== "content-type" || content === undefined) {
      return null;
    }
    const match = CHARSET_IN_CONTENT.exec(content);
    const label = match?.[1] ?? match?.[2] ?? match?.[3];
    return label === undefined ? null : resolveLabel(label, "meta");
  }

  // Reads up to the closing `>`; null when the input ends first.
  #readAttributes(): Map<string, string> | null {
    const attributes = new Map<string, string>();
    for (;;) {
      this.#skip(/[\t\n\f\r /]/);
      const char = this.#text.charAt(this.#position);
      if (char === "") {
        return null;
      }
      if (char === ">") {
        this.#position += 1;
        return attributes;
      }

      const name = this.#readUntil(/[\t\n\f\r />=]/).toLowerCase();
      this.#skip(SPACE);
      let value = "";
      if (this.#text.charAt(this.#position) === "=") {
        this.#position += 1;
        this.#skip(SPACE);
        const quote = this.#text.charAt(this.#position);
        if (quote === "\"" || quote === "'") {
          const close = this.#text.indexOf(quote, this.#position + 1);
          if (close === -1) {
            return null;
          }
          value = this.#text.slice(this.#position + 1, close);
          this.#position = close + 1;
        } else {
          value = this.#readUntil(/[\t\n\f\r >]/);
        }
      }

      if (name.length > 0 && !attributes.has(name)) {
        attributes.set(name, value);
      }
    }
  }

  #skip(pattern: RegExp): void {
    while (this.#position < this.#text.length && pattern.test(this.#text.charAt(this.#position))) {
      this.#position += 1;
    }
  }

  #readUntil(stop: RegExp): string {
    const start = this.#position;
    while (this.#position < this.#text.length && !stop.test(this.#text.charAt(this.#position))) {
      this.#position += 1;
    }
    return this.#text.slice(start, this.#position);
  }
}

/**
 * Picks the encoding for `bytes`: byte order mark, then the transport
 * label, then a `<meta>` prescan, then `defaultEncoding` (UTF-8).
 *
 * @throws ParseError with code ENCODING_ERROR for an unknown transport label.
 */
export function sniffHtmlEncoding(bytes: Uint8Array, options: EncodingSniffOptions = {}): EncodingSniffResult {
  const bom = detectBom(bytes);
  if (bom !== null) {
    return { encoding: bom, source: "bom" };
  }

  if (options.transportEncodingLabel !== undefined) {
    const transport = resolveLabel(options.transportEncodingLabel, "transport");
    if (transport === null) {
      throw new ParseError({
        code: "ENCODING_ERROR",
        message: `unsupported encoding label '${options.transportEncodingLabel}'`
      });
    }
    return { encoding: transport, source: "transport" };
  }

  const limit = options.maxPrescanBytes ?? DEFAULT_PRESCAN_BYTES;
  const declared = new MetaPrescanner(bytes.subarray(0, limit)).scan();
  if (declared !== null) {
    return { encoding: declared, source: "meta" };
  }

  const fallback = resolveLabel(options.defaultEncoding ?? "utf-8", "default");
  return { encoding: fallback ?? "utf-8", source: "default" };
}

/** Decodes strictly: malformed byte sequences raise ENCODING_ERROR instead of becoming U+FFFD. */
export function decodeHtmlBytes(bytes: Uint8Array, options: EncodingSniffOptions = {}): DecodedHtml {
  const sniff = sniffHtmlEncoding(bytes, options);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(sniff.encoding, { fatal: true });
  } catch {
    throw new ParseError({ code: "ENCODING_ERROR", message: `unsupported encoding '${sniff.encoding}'` });
  }

  try {
    return { text: decoder.decode(bytes), sniff };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError({ code: "ENCODING_ERROR", message: `invalid ${sniff.encoding} input: ${reason}` });
  }
}

import { describe, expect, it } from "vitest";

import { ParseError } from "../errors.js";
import { decodeHtmlBytes, sniffHtmlEncoding } from "./sniff.js";

function latin1Bytes(text: string): Uint8Array {
  return Uint8Array.from(text, (char) => char.charCodeAt(0));
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

describe("sniffHtmlEncoding", () => {
  it("prefers a byte order mark", () => {
    const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, ...latin1Bytes('<meta charset="windows-1252">')]);
    expect(sniffHtmlEncoding(bytes)).toEqual({ encoding: "utf-8", source: "bom" });
    expect(sniffHtmlEncoding(Uint8Array.from([0xff, 0xfe, 0x3c, 0x00]))).toEqual({
      encoding: "utf-16le",
      source: "bom"
    });
  });

  it("uses the transport label over a meta declaration", () => {
    const bytes = latin1Bytes('<meta charset="windows-1252">');
    expect(sniffHtmlEncoding(bytes, { transportEncodingLabel: "UTF-8" })).toEqual({
      encoding: "utf-8",
      source: "transport"
    });
  });

  it("rejects an unknown transport label", () => {
    const error = captureParseError(() => sniffHtmlEncoding(latin1Bytes("<p>"), { transportEncodingLabel: "bogus" }));
    expect(error.payload).toEqual({ code: "ENCODING_ERROR", message: "unsupported encoding label 'bogus'" });
    expect(error.message).toBe("encoding error: unsupported encoding label 'bogus'");
  });

  it("reads <meta charset>", () => {
    expect(sniffHtmlEncoding(latin1Bytes("<html><head><meta charset='latin1'>"))).toEqual({
      encoding: "windows-1252",
      source: "meta"
    });
  });

  it("reads http-equiv content-type declarations", () => {
    const bytes = latin1Bytes('<meta http-equiv="Content-Type" content="text/html; charset=ISO-8859-1">');
    expect(sniffHtmlEncoding(bytes)).toEqual({ encoding: "windows-1252", source: "meta" });
  });

  it("treats a declared utf-16 as utf-8", () => {
    expect(sniffHtmlEncoding(latin1Bytes('<meta charset="utf-16">'))).toEqual({ encoding: "utf-8", source: "meta" });
  });

  it("ignores declarations inside comments", () => {
    const bytes = latin1Bytes('<!-- <meta charset="windows-1252"> --><p>x</p>');
    expect(sniffHtmlEncoding(bytes)).toEqual({ encoding: "utf-8", source: "default" });
  });

  it("stops at maxPrescanBytes", () => {
    const bytes = latin1Bytes('<p>padding</p><meta charset="windows-1252">');
    expect(sniffHtmlEncoding(bytes, { maxPrescanBytes: 10 })).toEqual({ encoding: "utf-8", source: "default" });
  });

  it("falls back to the configured default", () => {
    expect(sniffHtmlEncoding(latin1Bytes("<p>x</p>"), { defaultEncoding: "latin1" })).toEqual({
      encoding: "windows-1252",
      source: "default"
    });
  });
});

describe("decodeHtmlBytes", () => {
  it("decodes with the sniffed encoding", () => {
    const decoded = decodeHtmlBytes(latin1Bytes('<meta charset="windows-1252"><p>café</p>'));
    expect(decoded.text).toBe('<meta charset="windows-1252"><p>café</p>');
    expect(decoded.sniff.source).toBe("meta");
  });

  it("drops the byte order mark from the text", () => {
    const decoded = decodeHtmlBytes(Uint8Array.from([0xef, 0xbb, 0xbf, 0x3c, 0x62, 0x3e]));
    expect(decoded.text).toBe("<b>");
  });

  it("rejects malformed utf-8", () => {
    const error = captureParseError(() => decodeHtmlBytes(Uint8Array.from([0x3c, 0x70, 0x3e, 0xff])));
    expect(error.payload.code).toBe("ENCODING_ERROR");
    expect(error.message.startsWith("encoding error: invalid utf-8 input:")).toBe(true);
  });
});

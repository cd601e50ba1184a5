export { decodeHtmlBytes, sniffHtmlEncoding } from "./sniff.js";

export type { DecodedHtml, EncodingSniffOptions, EncodingSniffResult, EncodingSource } from "./sniff.js";

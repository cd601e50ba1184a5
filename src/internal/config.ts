import { SilentLogger, type Logger } from "./logger.js";

export interface SoupConfig {
  readonly maxDepth?: number;
  readonly strictMode?: boolean;
  readonly preserveWhitespace?: boolean;
  readonly includeComments?: boolean;
  readonly logger?: Logger;
}

export type ResolvedSoupConfig = Required<SoupConfig>;

export const DEFAULT_SOUP_CONFIG: ResolvedSoupConfig = Object.freeze({
  maxDepth: 512,
  strictMode: false,
  preserveWhitespace: false,
  includeComments: false,
  logger: new SilentLogger()
});

export function resolveSoupConfig(config: SoupConfig = {}): ResolvedSoupConfig {
  const resolved: ResolvedSoupConfig = Object.freeze({ ...DEFAULT_SOUP_CONFIG, ...config });
  if (!Number.isInteger(resolved.maxDepth) || resolved.maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${String(resolved.maxDepth)}`);
  }
  return resolved;
}

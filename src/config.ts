import type { DelimiterKind } from "./ast/nodes.js";

/**
 * Optional lexical features. Paren groups are always on.
 */
export interface Config {
  readonly lineComments: boolean;
  readonly byteStrings: boolean;
  readonly braceGroups: boolean;
  readonly bracketGroups: boolean;
}

export const DEFAULT_CONFIG: Config = Object.freeze({
  lineComments: false,
  byteStrings: false,
  braceGroups: false,
  bracketGroups: false,
});

export const ALL_FEATURES: Config = Object.freeze({
  lineComments: true,
  byteStrings: true,
  braceGroups: true,
  bracketGroups: true,
});

export function createConfig(options: Partial<Config> = {}): Config {
  return Object.freeze({
    lineComments: options.lineComments ?? DEFAULT_CONFIG.lineComments,
    byteStrings: options.byteStrings ?? DEFAULT_CONFIG.byteStrings,
    braceGroups: options.braceGroups ?? DEFAULT_CONFIG.braceGroups,
    bracketGroups: options.bracketGroups ?? DEFAULT_CONFIG.bracketGroups,
  });
}

export function isGroupEnabled(config: Config, delimiter: DelimiterKind): boolean {
  switch (delimiter) {
    case "paren": return true;
    case "brace": return config.braceGroups;
    case "bracket": return config.bracketGroups;
  }
}

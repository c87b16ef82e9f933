import type { Span } from "../errors/diagnostic.js";

// ============================================================
// Shared literal metadata
// ============================================================

export type DelimiterKind = "paren" | "brace" | "bracket";

export const DELIMITERS: Record<DelimiterKind, { open: string; close: string }> = {
  paren: { open: "(", close: ")" },
  brace: { open: "{", close: "}" },
  bracket: { open: "[", close: "]" },
};

export type NumberBase = "binary" | "decimal" | "hexadecimal";

/** Integer, or decimal as `unscaled / 10^scale`. */
export type NumberValue =
  | { kind: "integer"; value: bigint }
  | { kind: "decimal"; unscaled: bigint; scale: number };

// ============================================================
// Nodes
// ============================================================

interface BaseNode {
  span: Span;
}

export interface AtomNode extends BaseNode {
  kind: "Atom";
  text: string;
}

export interface NumberNode extends BaseNode {
  kind: "Number";
  value: NumberValue;
  base: NumberBase;
  /** Literal as written, with prefix and separators. Absent on hand-built nodes. */
  raw?: string;
}

export interface StringNode extends BaseNode {
  kind: "String";
  value: string;
  /** Text between the quotes, escapes untouched. */
  raw?: string;
}

export interface BytesNode extends BaseNode {
  kind: "Bytes";
  bytes: Uint8Array;
}

export interface GroupNode extends BaseNode {
  kind: "Group";
  delimiter: DelimiterKind;
  children: Node[];
  /** False when the input ended before the closing delimiter. */
  terminated: boolean;
}

export type Node = AtomNode | NumberNode | StringNode | BytesNode | GroupNode;

export interface Comment {
  text: string;
  span: Span;
}

import type { Node, NumberValue } from "./nodes.js";

/**
 * Equality of trees as the printer promises to preserve it: spans, raw literal
 * text, numeric base and the `terminated` flag are ignored.
 */
export function structurallyEqual(a: Node, b: Node): boolean {
  switch (a.kind) {
    case "Atom":
      return b.kind === "Atom" && a.text === b.text;
    case "Number":
      return b.kind === "Number" && numberValuesEqual(a.value, b.value);
    case "String":
      return b.kind === "String" && a.value === b.value;
    case "Bytes":
      return b.kind === "Bytes" && bytesEqual(a.bytes, b.bytes);
    case "Group":
      return b.kind === "Group" && a.delimiter === b.delimiter && nodeListsEqual(a.children, b.children);
  }
}

export function nodeListsEqual(a: readonly Node[], b: readonly Node[]): boolean {
  return a.length === b.length && a.every((node, i) => structurallyEqual(node, b[i]));
}

function numberValuesEqual(a: NumberValue, b: NumberValue): boolean {
  if (a.kind === "integer") return b.kind === "integer" && a.value === b.value;
  return b.kind === "decimal" && a.unscaled === b.unscaled && a.scale === b.scale;
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

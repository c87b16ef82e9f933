import { describe, it, expect } from "vitest";
import { format, parse, print } from "../../src/sexpr.js";
import { Printer, PrinterError } from "../../src/printer/printer.js";
import { ALL_FEATURES, DEFAULT_CONFIG, createConfig } from "../../src/config.js";
import { makeSpan } from "../../src/errors/diagnostic.js";
import type { Node } from "../../src/ast/nodes.js";

const here = { offset: 0, line: 1, column: 1 };
const span = makeSpan(here, here, "test.sx");

function reprint(source: string, config = DEFAULT_CONFIG, preserveFormatting = true): string {
  return print(parse(source, { config }).nodes, config, { preserveFormatting });
}

describe("Printer", () => {
  it("prints groups with single spaces", () => {
    expect(reprint("(let x 1)")).toBe("(let x 1)");
    expect(reprint("(  a\n\n  b  (c ) )")).toBe("(a b (c))");
    expect(reprint("()")).toBe("()");
  });

  it("puts each top-level node on its own line", () => {
    expect(reprint("(a)   (b)\n\n c")).toBe("(a)\n(b)\nc");
  });

  it("uses each group's own delimiters", () => {
    expect(reprint("{a [b (c)]}", ALL_FEATURES)).toBe("{a [b (c)]}");
  });

  it("closes unterminated groups", () => {
    expect(reprint("(a (b")).toBe("(a (b))");
  });

  describe("numbers", () => {
    it("keeps base prefixes and separators", () => {
      expect(reprint("(0xFF_ff 1_000 0b1 1.50)")).toBe("(0xFF_ff 1_000 0b1 1.50)");
    });

    it("prints canonical decimal text when formatting is dropped", () => {
      expect(reprint("(0xFF_ff 1_000 0b1 1_0.5_0)", DEFAULT_CONFIG, false)).toBe("(65535 1000 1 10.50)");
    });

    it("prints hand-built numbers without raw text canonically", () => {
      const node: Node = { kind: "Number", value: { kind: "integer", value: 255n }, base: "hexadecimal", span };
      expect(print(node)).toBe("255");
    });

    it("refuses negative numbers", () => {
      const node: Node = { kind: "Number", value: { kind: "integer", value: -1n }, base: "decimal", span };
      expect(() => print(node)).toThrow("Negative numbers have no literal form");
    });

    it("refuses decimals without fractional digits", () => {
      const node: Node = { kind: "Number", value: { kind: "decimal", unscaled: 5n, scale: 0 }, base: "decimal", span };
      expect(() => print(node)).toThrow("A decimal needs at least one fractional digit, got scale 0");
    });
  });

  describe("strings and bytes", () => {
    it("keeps string escapes as written", () => {
      expect(reprint('"\\q"')).toBe('"\\q"');
    });

    it("re-escapes string values when formatting is dropped", () => {
      expect(reprint('"\\q"', DEFAULT_CONFIG, false)).toBe('"\\\\q"');
      const node: Node = { kind: "String", value: 'say "hi"\n', span };
      expect(print(node)).toBe('"say \\"hi\\"\\n"');
    });

    it("re-encodes byte strings as lower-case hex pairs", () => {
      expect(reprint("#01FF#", createConfig({ byteStrings: true }))).toBe("#01ff#");
    });
  });

  describe("configuration mismatches", () => {
    it("refuses groups whose delimiters are disabled", () => {
      const { nodes } = parse("{a}", { config: ALL_FEATURES });
      expect(() => print(nodes, DEFAULT_CONFIG)).toThrow(PrinterError);
      expect(() => print(nodes, DEFAULT_CONFIG)).toThrow("Cannot print a brace group: brace groups are disabled");
    });

    it("refuses byte strings when they are disabled", () => {
      const node: Node = { kind: "Bytes", bytes: new Uint8Array([1]), span };
      expect(() => print(node, DEFAULT_CONFIG)).toThrow("Cannot print a byte string: byte strings are disabled");
    });

    it("refuses atoms that would split into several tokens", () => {
      const { nodes } = parse("{a}");
      expect(() => print(nodes, createConfig({ braceGroups: true }))).toThrow(PrinterError);
      const spaced: Node = { kind: "Atom", text: "a b", span };
      expect(() => print(spaced)).toThrow(PrinterError);
    });

    it("refuses comments when line comments are disabled", () => {
      const comments = [{ text: " note", span }];
      expect(() => new Printer(DEFAULT_CONFIG, { comments })).toThrow("Cannot print comments: line comments are disabled");
    });

    it("sets the configuration-mismatch code", () => {
      try {
        print({ kind: "Bytes", bytes: new Uint8Array(), span });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(PrinterError);
        expect(e instanceof PrinterError && e.code).toBe("ConfigurationMismatch");
      }
    });
  });

  describe("options", () => {
    it("uses the configured separator", () => {
      const { nodes } = parse("(a b)");
      expect(print(nodes, DEFAULT_CONFIG, { separator: "\n  " })).toBe("(a\n  b)");
    });

    it("rejects separators that are not whitespace", () => {
      expect(() => new Printer(DEFAULT_CONFIG, { separator: "," })).toThrow(PrinterError);
    });

    it("writes comments back near their original positions", () => {
      const source = "; head\n(a ; trailing\n b) ; end";
      const { text, diagnostics } = format(source, { config: createConfig({ lineComments: true }), keepComments: true });
      expect(diagnostics).toHaveLength(0);
      expect(text).toBe("; head\n(a ; trailing\nb) ; end\n");
    });

    it("puts a comment from a later line on its own line", () => {
      const source = "(a)\n; between\n(b)";
      const { text } = format(source, { config: createConfig({ lineComments: true }), keepComments: true });
      expect(text).toBe("(a)\n; between\n(b)");
    });

    it("keeps a comment holding a lone \\r", () => {
      const source = "(a) ; x\ry\n(b)";
      const { text, diagnostics } = format(source, { config: createConfig({ lineComments: true }), keepComments: true });
      expect(diagnostics).toHaveLength(0);
      expect(text).toBe(source);
    });

    it("drops comments unless asked to keep them", () => {
      const { text } = format("(a) ; gone", { config: createConfig({ lineComments: true }) });
      expect(text).toBe("(a)");
    });
  });
});

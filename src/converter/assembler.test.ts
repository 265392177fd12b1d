import { describe, it, expect } from "vitest";
import { append } from "./assembler";

describe("append", () => {
  it("concatenates plain text", () => {
    expect(append("a", "b")).toBe("ab");
  });

  it("keeps the first fragment as is", () => {
    expect(append("", "[[top]]")).toBe("[[top]]");
    expect(append("", "|===\n")).toBe("|===\n");
  });

  // ==========================================================================
  // Attribute lists and anchors
  // ==========================================================================
  describe("bracketed additions", () => {
    it("separates an anchor from a preceding word", () => {
      expect(append("word", "[[a]]")).toBe("word [[a]]");
    });

    it("does not add a second space", () => {
      expect(append("word ", "[[a]]")).toBe("word [[a]]");
    });

    it("allows an opening parenthesis or newline before the bracket", () => {
      expect(append("(", "[.role]`x`")).toBe("([.role]`x`");
      expect(append("line\n", "[NOTE]")).toBe("line\n[NOTE]");
    });
  });

  // ==========================================================================
  // Block delimiters
  // ==========================================================================
  describe("block delimiters", () => {
    it("starts a table delimiter on its own line", () => {
      expect(append("text", "|===\n")).toBe("text\n|===\n");
    });

    it("starts a run of three or more delimiter characters on its own line", () => {
      expect(append("text", "====")).toBe("text\n====");
      expect(append("text", "----")).toBe("text\n----");
      expect(append("text", "////\nnote")).toBe("text\n////\nnote");
    });

    it("leaves short runs alone", () => {
      expect(append("text", "--")).toBe("text--");
      expect(append("text", "==")).toBe("text==");
    });

    it("does not add a newline after one", () => {
      expect(append("text\n", "====")).toBe("text\n====");
    });
  });
});

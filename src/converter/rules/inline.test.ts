import { describe, it, expect } from "vitest";
import { convertXml } from "../testing";

describe("inline rules", () => {
  it("converts strong and emphasis", () => {
    expect(convertXml("<p><b>bold</b> and <strong>strong</strong></p>").output).toBe(
      "*bold* and *strong*\n",
    );
    expect(convertXml("<p><i>a</i> <em>b</em></p>").output).toBe("_a_ _b_\n");
  });

  it("converts monospace", () => {
    expect(convertXml("<p><tt>x</tt> <q>y</q></p>").output).toBe("`x` `y`\n");
  });

  it("converts superscript and subscript", () => {
    expect(convertXml("<p>E=mc<sup>2</sup></p>").output).toBe("E=mc^2^\n");
    expect(convertXml("<p>H<sub>2</sub>O</p>").output).toBe("H~2~O\n");
  });

  it("converts role tags", () => {
    expect(convertXml("<p><code>ls</code></p>").output).toBe("[.code]`ls`\n");
    expect(convertXml("<p><small>fine</small></p>").output).toBe(
      "[.small]`fine`\n",
    );
    expect(convertXml("<p><u>under</u></p>").output).toBe(
      "[.underline]`under`\n",
    );
  });

  // ==========================================================================
  // Whitespace
  // ==========================================================================
  describe("whitespace", () => {
    it("keeps surrounding whitespace outside the delimiters", () => {
      expect(convertXml("<p>a<b> b </b>c</p>").output).toBe("a *b* c\n");
    });

    it("collapses blank lines inside inline markup", () => {
      expect(convertXml("<p><b>one\n\n\ntwo</b></p>").output).toBe(
        "*one\ntwo*\n",
      );
    });

    it("drops empty markup", () => {
      expect(convertXml("<p>x<b></b>y</p>").output).toBe("xy\n");
    });
  });

  // ==========================================================================
  // Spans
  // ==========================================================================
  describe("span", () => {
    it("passes a span without class through", () => {
      expect(convertXml("<p><span>plain</span></p>").output).toBe("plain\n");
    });

    it("turns classes into roles", () => {
      expect(
        convertXml('<p>Press <span class="key">Enter</span></p>').output,
      ).toBe("Press [.key]`Enter`\n");
      expect(convertXml('<p><span class="key big">X</span></p>').output).toBe(
        "[.key.big]`X`\n",
      );
    });

    it("separates the role from a preceding word", () => {
      expect(convertXml('<p>word<span class="x">y</span></p>').output).toBe(
        "word [.x]`y`\n",
      );
    });
  });
});

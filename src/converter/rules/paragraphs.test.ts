import { describe, it, expect } from "vitest";
import { convertXml } from "../testing";

describe("paragraph rules", () => {
  it("converts a plain paragraph", () => {
    expect(convertXml("<p>Hello</p>")).toEqual({ output: "Hello\n", warnings: [] });
  });

  // ==========================================================================
  // Classes
  // ==========================================================================
  describe("class attribute", () => {
    it("turns admonition classes into example blocks", () => {
      expect(convertXml('<p class="note">Careful</p>').output).toBe(
        "[NOTE]\n====\nCareful\n====\n",
      );
      expect(convertXml('<p class="Tip">Hint</p>').output).toBe(
        "[TIP]\n====\nHint\n====\n",
      );
      expect(convertXml('<p class="important">Must</p>').output).toBe(
        "[IMPORTANT]\n====\nMust\n====\n",
      );
    });

    it("turns other classes into roles", () => {
      expect(convertXml('<p class="intro">Hello</p>').output).toBe(
        "[.intro]\nHello\n",
      );
      expect(convertXml('<p class="intro wide">Hello</p>').output).toBe(
        "[.intro.wide]\nHello\n",
      );
    });
  });

  // ==========================================================================
  // Inline CSS
  // ==========================================================================
  describe("style attribute", () => {
    it("turns text alignment into a role", () => {
      expect(convertXml('<p style="text-align: center">Mid</p>').output).toBe(
        "[.text-center]\nMid\n",
      );
    });

    it("combines class and alignment roles", () => {
      expect(
        convertXml('<p class="intro" style="text-align:right">X</p>').output,
      ).toBe("[.intro.text-right]\nX\n");
    });

    it("wraps italic and bold paragraphs", () => {
      expect(convertXml('<p style="font-style: italic">Quiet</p>').output).toBe(
        "_Quiet_\n",
      );
      expect(
        convertXml('<p style="font-weight: bold; font-style: italic">Both</p>')
          .output,
      ).toBe("*_Both_*\n");
    });

    it("accepts font-style normal silently", () => {
      expect(convertXml('<p style="font-style: normal">Plain</p>')).toEqual({
        output: "Plain\n",
        warnings: [],
      });
    });

    it("warns about unsupported values and properties", () => {
      expect(convertXml('<p style="font-style: oblique">x</p>').warnings).toEqual([
        "unsupported font-style: oblique",
      ]);
      expect(convertXml('<p style="font-weight: 700">x</p>').warnings).toEqual([
        "unsupported font-weight: 700",
      ]);
      expect(convertXml('<p style="color: red">x</p>').warnings).toEqual([
        "unsupported CSS property on <p>: color",
      ]);
    });
  });

  // ==========================================================================
  // Other attributes
  // ==========================================================================
  describe("other attributes", () => {
    it("ignores ids, namespaces and namespaced attributes", () => {
      const { warnings } = convertXml(
        '<p id="a" xmlns="http://www.w3.org/1999/xhtml" MadCap:conditions="X">T</p>',
      );
      expect(warnings).toEqual([]);
    });

    it("warns about anything else", () => {
      expect(convertXml('<p dir="ltr">T</p>').warnings).toEqual([
        'unsupported <p> attribute dir="ltr"',
      ]);
    });
  });
});

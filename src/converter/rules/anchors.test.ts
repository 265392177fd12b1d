import { describe, it, expect } from "vitest";
import { convertXml } from "../testing";

describe("anchor rules", () => {
  // ==========================================================================
  // Links
  // ==========================================================================
  describe("links", () => {
    it("converts a link with text", () => {
      expect(convertXml('<p><a href="#sec1">See</a></p>').output).toBe(
        "link:#sec1[See]\n",
      );
    });

    it("uses the title of an empty link", () => {
      expect(
        convertXml('<p><a href="http://example.com" title="Example"/></p>').output,
      ).toBe("link:http://example.com[Example]\n");
      expect(convertXml('<p><a href="http://example.com"/></p>').output).toBe(
        "link:http://example.com[]\n",
      );
    });

    it("escapes closing brackets in the link text", () => {
      expect(convertXml('<p><a href="x">a]b</a></p>').output).toBe(
        "link:x[a\\]b]\n",
      );
      expect(convertXml('<p><a href="x" title="[1]"/></p>').output).toBe(
        "link:x[[1\\]]\n",
      );
    });
  });

  // ==========================================================================
  // Anchors
  // ==========================================================================
  describe("anchors", () => {
    it("converts a named anchor", () => {
      expect(convertXml('<p><a id="sec1" name="sec1"/>Start</p>')).toEqual({
        output: "[[sec1]]Start\n",
        warnings: [],
      });
    });

    it("separates an anchor from a preceding word", () => {
      expect(convertXml('<p>Word<a id="x" name="x"/></p>').output).toBe(
        "Word [[x]]\n",
      );
    });

    it("warns when name and id differ", () => {
      expect(convertXml('<p><a id="a" name="b"/></p>')).toEqual({
        output: "[[a]]\n",
        warnings: ['anchor name "b" does not match id "a"'],
      });
    });

    it("warns about a missing name", () => {
      expect(convertXml('<p><a id="a"/></p>')).toEqual({
        output: "[[a]]\n",
        warnings: ["<a> without href has no name"],
      });
    });

    it("drops an anchor without id", () => {
      expect(convertXml('<p><a name="b"/></p>')).toEqual({
        output: "\n",
        warnings: ["<a> without href has no id, anchor dropped"],
      });
    });

    it("drops the content of an anchor", () => {
      expect(convertXml('<p><a id="a" name="a">text</a></p>')).toEqual({
        output: "[[a]]\n",
        warnings: ["<a> without href has content, content dropped"],
      });
    });
  });
});

import { describe, it, expect } from "vitest";
import { convertXml } from "../testing";

describe("figure rules", () => {
  it("turns the caption into a block title", () => {
    expect(
      convertXml(
        '<figure><img src="img/f.png" alt="F"/><figcaption>Figure one</figcaption></figure>',
      ).output,
    ).toBe(".Figure one\nimage::f.png[F]\n");
  });

  it("passes a figure without caption through", () => {
    expect(convertXml("<figure><p>Body</p></figure>").output).toBe("Body\n");
  });

  it("drops a second caption", () => {
    expect(
      convertXml(
        "<figure><p>B</p><figcaption>One</figcaption><figcaption>Two</figcaption></figure>",
      ),
    ).toEqual({
      output: ".One\nB\n",
      warnings: ["second <figcaption> in a figure, dropped"],
    });
  });

  it("drops a caption outside of a figure", () => {
    expect(convertXml("<p><figcaption>x</figcaption></p>").warnings).toEqual([
      "<figcaption> outside of a figure, dropped",
    ]);
  });
});

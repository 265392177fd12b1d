import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { scan, process, snippets } from "./index";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import type { PipelineContext } from "../types";

const TOPIC = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<html xmlns:MadCap="http://www.madcapsoftware.com/Schemas/MadCap.xsd">',
  "<body>",
  "<h1>Intro</h1>",
  '<p>Made by <MadCap:snippetText src="../Resources/Snippets/Company.flsnp" />.</p>',
  "</body>",
  "</html>",
].join("\n");

const SNIPPET = [
  '<?xml version="1.0" encoding="utf-8"?>',
  '<html xmlns:MadCap="http://www.madcapsoftware.com/Schemas/MadCap.xsd">',
  "<body>",
  "<p><b>Acme</b> Corp</p>",
  "</body>",
  "</html>",
].join("\n");

async function writeSource(root: string, relativePath: string, content: string) {
  const file = join(root, relativePath);
  await mkdir(dirname(file), { recursive: true });
  await writeFile(file, content, "utf-8");
}

describe("pipeline", () => {
  let root: string;
  let ctx: PipelineContext;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "flare-"));
    const input = join(root, "Content");
    await writeSource(input, "Topics/Intro.htm", TOPIC);
    await writeSource(input, "Resources/Snippets/Company.flsnp", SNIPPET);
    await writeSource(input, "Output/Stale.htm", "<p>ignored</p>");

    const defaults = await loadDefaultConfig();
    ctx = {
      config: { ...defaults, input, output: join(root, "asciidoc") },
      tracker: new Tracker(),
      logger: new Logger("error"),
      knownSnippets: new Set(),
    };
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("finds topics and snippets outside ignored directories", async () => {
    await scan(ctx);

    expect(ctx.files?.map((file) => [file.relativePath, file.kind])).toEqual([
      [join("Resources", "Snippets", "Company.flsnp"), "snippet"],
      [join("Topics", "Intro.htm"), "topic"],
    ]);
    expect(ctx.files?.[1].outputPath).toBe(
      join(root, "asciidoc", "Topics", "Intro.adoc"),
    );
    expect(ctx.tracker.getStats().totalFiles).toBe(2);
  });

  it("converts every file and defines referenced snippets", async () => {
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    const output = join(root, "asciidoc");
    expect(await readFile(join(output, "Topics", "Intro.adoc"), "utf-8")).toBe(
      "== Intro\n\nMade by {Company}.\n",
    );
    expect(
      await readFile(join(output, "Resources", "Snippets", "Company.adoc"), "utf-8"),
    ).toBe("*Acme* Corp\n");
    expect(await readFile(join(output, "snippets.adoc"), "utf-8")).toBe(
      ":Company: pass:q[*Acme* Corp]\n",
    );

    expect(ctx.tracker.getStats()).toMatchObject({
      totalFiles: 2,
      successfulFiles: 2,
      failedFiles: 0,
      definedSnippets: 1,
      warnings: 0,
    });
  });

  it("skips known snippets", async () => {
    ctx.knownSnippets = new Set(["Company"]);
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    expect(ctx.snippets?.size).toBe(0);
    expect(ctx.tracker.getStats()).toMatchObject({
      definedSnippets: 0,
      knownSnippets: 1,
    });
  });

  it("writes nothing in a dry run", async () => {
    ctx.dryRun = true;
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    expect(ctx.files?.every((file) => !file.written)).toBe(true);
    await expect(readFile(join(root, "asciidoc", "snippets.adoc"), "utf-8")).rejects.toThrow();
    expect(ctx.tracker.getStats().definedSnippets).toBe(1);
  });

  it("keeps going when a file cannot be read", async () => {
    ctx.files = [
      {
        inputPath: join(root, "Content", "Missing.htm"),
        relativePath: "Missing.htm",
        outputPath: join(root, "asciidoc", "Missing.adoc"),
        kind: "topic",
      },
    ];
    await process(ctx);

    expect(ctx.tracker.getStats().failedFiles).toBe(1);
    expect(ctx.tracker.getFileIssues()).toMatchObject([
      { path: "Missing.htm", reason: "read-error" },
    ]);
  });

  it("reports a missing snippet file", async () => {
    await writeSource(
      join(root, "Content"),
      "Topics/Other.htm",
      '<p><MadCap:snippetText src="Gone.flsnp"/></p>',
    );
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    expect(ctx.tracker.getFileIssues()).toMatchObject([
      { path: join("Topics", "Gone.flsnp"), reason: "read-error" },
    ]);
    expect(ctx.tracker.getStats().definedSnippets).toBe(1);
  });

  it("converts a scanned snippet once", async () => {
    const input = join(root, "Content");
    await writeSource(input, "Resources/Snippets/Brand.flsnp", "<p>Acme<blink/></p>");
    await writeSource(
      input,
      "Topics/Brand.htm",
      '<p><MadCap:snippetText src="../Resources/Snippets/Brand.flsnp"/></p>',
    );
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    expect(ctx.tracker.getConversionIssues()).toEqual([
      {
        type: "conversion",
        path: join("Resources", "Snippets", "Brand.flsnp"),
        message: "unsupported tag <blink>",
      },
    ]);
    expect(ctx.tracker.getStats().warnings).toBe(1);
    expect(await readFile(join(root, "asciidoc", "snippets.adoc"), "utf-8")).toBe(
      ":Brand: pass:q[Acme]\n:Company: pass:q[*Acme* Corp]\n",
    );
  });

  it("keeps loading snippets after one fails to convert", async () => {
    const input = join(root, "Content");
    const depth = 30000;
    // Ignored by the scanner, so only the snippets module converts these
    await writeSource(
      input,
      "Output/Bad.flsnp",
      `<p>${"<b>".repeat(depth)}deep${"</b>".repeat(depth)}</p>`,
    );
    await writeSource(input, "Output/Good.flsnp", "<p>Good</p>");
    await writeSource(
      input,
      "Topics/Other.htm",
      [
        '<p><MadCap:snippetText src="../Output/Bad.flsnp"/></p>',
        '<p><MadCap:snippetText src="../Output/Good.flsnp"/></p>',
      ].join("\n"),
    );
    await scan(ctx);
    await process(ctx);
    await snippets(ctx);

    expect(ctx.tracker.getFileIssues()).toMatchObject([
      { path: join("Output", "Bad.flsnp"), reason: "parse-error" },
    ]);
    expect(await readFile(join(root, "asciidoc", "snippets.adoc"), "utf-8")).toBe(
      ":Company: pass:q[*Acme* Corp]\n:Good: pass:q[Good]\n",
    );
    expect(ctx.tracker.getStats()).toMatchObject({
      failedFiles: 0,
      definedSnippets: 2,
    });
  });

  it("requires the scanner before processing", async () => {
    await expect(process(ctx)).rejects.toThrow("Scanner must run before processor");
  });
});

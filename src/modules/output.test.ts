import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "fs/promises";
import { join } from "node:path";
import { prepareOutput } from "./output";
import { Logger, fileExists, loadDefaultConfig } from "../utils";
import { makeTempDir, removeDir } from "../testing/fakes";
import type { ConversionContext } from "../types";

describe("prepareOutput", () => {
  let dir: string;
  let ctx: ConversionContext;

  beforeEach(async () => {
    dir = await makeTempDir();
    const config = await loadDefaultConfig();
    config.output.directory = join(dir, "out");
    ctx = { config, logger: new Logger("error") };
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("adds the format extension and creates the directory", async () => {
    ctx.config.output.filename = "deck";
    ctx.config.output.format = "pptx";

    const outputPath = await prepareOutput(ctx);

    expect(outputPath).toBe(join(dir, "out", "deck.pptx"));
    expect(ctx.outputPath).toBe(outputPath);
    expect(await fileExists(join(dir, "out"))).toBe(true);
  });

  it("keeps an extension that is already present", async () => {
    ctx.config.output.filename = "report.PDF";

    expect(await prepareOutput(ctx)).toBe(join(dir, "out", "report.PDF"));
  });

  it("refuses to replace an existing file unless overwrite is set", async () => {
    await prepareOutput(ctx);
    await writeFile(join(dir, "out", "slides.pdf"), "old");

    await expect(prepareOutput(ctx)).rejects.toMatchObject({
      kind: "output-exists",
    });

    ctx.config.output.overwrite = true;
    expect(await prepareOutput(ctx)).toBe(join(dir, "out", "slides.pdf"));
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, writeFile } from "fs/promises";
import { join } from "node:path";
import { PDFDocument } from "pdf-lib";
import { PdfSink } from "./pdf-sink";
import { makeTempDir, removeDir } from "../testing/fakes";
import type { ArtifactHandle } from "../types";

describe("PdfSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function artifact(
    index: number,
    widths: number[],
  ): Promise<ArtifactHandle> {
    const pdf = await PDFDocument.create();
    for (const width of widths) pdf.addPage([width, 100]);
    const handle: ArtifactHandle = {
      id: `slide-${index + 1}`,
      index,
      kind: "pdf",
      path: join(dir, `slide-${index + 1}.pdf`),
    };
    await writeFile(handle.path, await pdf.save());
    return handle;
  }

  it("merges pages in append order", async () => {
    const sink = new PdfSink();
    await sink.append(await artifact(0, [300]));
    await sink.append(await artifact(1, [200]));
    await sink.append(await artifact(2, [100]));

    const output = join(dir, "out.pdf");
    await sink.finalize(output);

    const merged = await PDFDocument.load(await readFile(output));
    expect(merged.getPages().map((p) => p.getWidth())).toEqual([300, 200, 100]);
    expect(sink.pageCount).toBe(3);
  });

  it("keeps only the first page of an artifact", async () => {
    const sink = new PdfSink();
    await sink.append(await artifact(0, [400, 500]));

    expect(sink.pageCount).toBe(1);
  });

  it("rejects a corrupt artifact without counting it", async () => {
    const sink = new PdfSink();
    const handle: ArtifactHandle = {
      id: "bad",
      index: 0,
      kind: "pdf",
      path: join(dir, "bad.pdf"),
    };
    await writeFile(handle.path, "not a pdf");

    await expect(sink.append(handle)).rejects.toThrow();
    expect(sink.pageCount).toBe(0);
  });

  it("refuses to write an empty document", async () => {
    await expect(new PdfSink().finalize(join(dir, "empty.pdf"))).rejects.toThrow(
      "Cannot write a PDF without pages",
    );
  });
});

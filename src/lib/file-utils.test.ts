import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  appendLog,
  outputFileName,
  outputPathFor,
  readLogs,
  reserveOutputPath,
  resolveOutputLayout,
  resultsDirFor,
} from "./file-utils";
import type { LogEntry } from "@/types/log";

describe("resolveOutputLayout", () => {
  it("puts a single image's result in <stem>_results beside it", () => {
    expect(resolveOutputLayout(["/photos/site/a.jpg"])).toEqual({
      outputDir: "/photos/site/a_results",
      root: "/photos/site",
    });
  });

  it("uses a sibling <folder>_results for images of one folder", () => {
    expect(resolveOutputLayout(["/photos/site/a.jpg", "/photos/site/b.jpg"])).toEqual({
      outputDir: "/photos/site_results",
      root: "/photos/site",
    });
  });

  it("stays beside the common folder of images from subfolders", () => {
    expect(resolveOutputLayout(["/photos/site/a.jpg", "/photos/site/north/b.jpg"])).toEqual({
      outputDir: "/photos/site_results",
      root: "/photos/site",
    });
  });

  it("follows the scanned folder when there is one", () => {
    expect(resolveOutputLayout(["/photos/site/north/b.jpg"], "/photos/site")).toEqual({
      outputDir: "/photos/site_results",
      root: "/photos/site",
    });
  });

  it("refuses an empty list without a folder", () => {
    expect(() => resolveOutputLayout([])).toThrow("Cannot derive an output folder without images");
  });

  it("never climbs above a filesystem root", () => {
    expect(resultsDirFor("/")).toBe("/results");
  });
});

describe("output names", () => {
  it("keeps the source extension, lower-cased", () => {
    expect(outputFileName("/x/a.jpg", "_out")).toBe("a_out.jpg");
    expect(outputFileName("/x/IMG 01.TIFF", "_sky")).toBe("IMG 01_sky.tiff");
    expect(outputFileName("/x/scan.bmp", "_out")).toBe("scan_out.jpg");
  });

  it("mirrors subfolders below the root", () => {
    const layout = { outputDir: "/photos/site_results", root: "/photos/site" };
    expect(outputPathFor("/photos/site/north/b.PNG", layout, "_out")).toBe("/photos/site_results/north/b_out.png");
    expect(outputPathFor("/elsewhere/c.jpg", layout, "_out")).toBe("/photos/site_results/c_out.jpg");
  });
});

describe("with a temp directory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "file-utils-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reserveOutputPath appends -1, -2 when names are taken", async () => {
    expect(await reserveOutputPath(dir, "a_out.jpg")).toBe(path.join(dir, "a_out.jpg"));

    await fs.writeFile(path.join(dir, "a_out.jpg"), "x");
    expect(await reserveOutputPath(dir, "a_out.jpg")).toBe(path.join(dir, "a_out-1.jpg"));

    await fs.writeFile(path.join(dir, "a_out-1.jpg"), "x");
    expect(await reserveOutputPath(dir, "a_out.jpg")).toBe(path.join(dir, "a_out-2.jpg"));
  });

  it("appends log entries per day and filters by run", async () => {
    const base: LogEntry = {
      timestamp: "2025-03-04T10:00:00.000Z",
      runId: "run-1",
      taskIndex: 0,
      sourcePath: "/x/a.jpg",
      promptName: "default",
      model: "gemini-2.5-flash-image",
      status: "succeeded",
      durationMs: 1200,
      outputPath: "/x_results/a_out.jpg",
    };
    await appendLog(dir, base);
    await appendLog(dir, { ...base, runId: "run-2", taskIndex: 1, status: "failed", error: "boom", errorKind: "api" });
    await fs.appendFile(path.join(dir, "2025-03-04.jsonl"), "not json\n");

    const all = await readLogs(dir, "2025-03-04");
    expect(all.map((e) => e.runId)).toEqual(["run-1", "run-2"]);
    expect(await readLogs(dir, "2025-03-04", "run-2")).toEqual([
      { ...base, runId: "run-2", taskIndex: 1, status: "failed", error: "boom", errorKind: "api" },
    ]);
    expect(await readLogs(dir, "2025-03-05")).toEqual([]);
  });
});

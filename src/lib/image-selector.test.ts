import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SelectionError } from "./errors";
import { findExistingResult, isResultDirectory, isResultFile, scanFolder, selectFiles } from "./image-selector";

async function touch(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "");
}

describe("result detection", () => {
  it("recognises result folders and files", () => {
    expect(isResultDirectory("/p/site_results")).toBe(true);
    expect(isResultDirectory("/p/Results")).toBe(true);
    expect(isResultDirectory("/p/site")).toBe(false);
    expect(isResultFile("a_out.jpg", "_out")).toBe(true);
    expect(isResultFile("a_OUT-3.png", "_out")).toBe(true);
    expect(isResultFile("a_output.png", "_out")).toBe(false);
    expect(isResultFile("a.jpg", "_out")).toBe(false);
  });
});

describe("with a photo folder", () => {
  let root: string;
  let site: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "selector-"));
    site = path.join(root, "site");
    await touch(path.join(site, "b.JPG"));
    await touch(path.join(site, "a.png"));
    await touch(path.join(site, "notes.txt"));
    await touch(path.join(site, "north", "c.webp"));
    await touch(path.join(site, "north", "c_out.png"));
    await touch(path.join(site, "old_results", "x.jpg"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lists supported images recursively, sorted, skipping results", async () => {
    const selection = await scanFolder(site, { outputSuffix: "_out" });

    expect(selection.root).toBe(site);
    expect(selection.images).toEqual([path.join(site, "a.png"), path.join(site, "b.JPG")]);
    expect(selection.alreadyProcessed).toEqual([
      { sourcePath: path.join(site, "north", "c.webp"), outputPath: path.join(site, "north", "c_out.png") },
    ]);
    expect(selection.skippedDirectories).toBe(1);
    expect(selection.skippedFiles).toBe(1);
  });

  it("reports results stored in a sibling _results folder", async () => {
    await touch(path.join(root, "site_results", "a_out.jpg"));
    expect(await findExistingResult(path.join(site, "a.png"), "_out")).toBe(path.join(root, "site_results", "a_out.jpg"));

    const selection = await scanFolder(site, { outputSuffix: "_out" });
    expect(selection.images).toEqual([path.join(site, "b.JPG")]);
  });

  it("finds results a run wrote below the sibling folder for a subfolder image", async () => {
    await touch(path.join(root, "site_results", "north", "c_out.webp"));
    expect(await findExistingResult(path.join(site, "north", "c.webp"), "_out", site)).toBe(
      path.join(root, "site_results", "north", "c_out.webp")
    );
  });

  it("returns an empty selection for a blank path", async () => {
    expect(await scanFolder("  ", { outputSuffix: "_out" })).toEqual({
      images: [],
      alreadyProcessed: [],
      skippedDirectories: 0,
      skippedFiles: 0,
    });
  });

  it("rejects missing folders, files and results folders", async () => {
    await expect(scanFolder(path.join(root, "missing"), { outputSuffix: "_out" })).rejects.toThrow(SelectionError);
    await expect(scanFolder(path.join(site, "a.png"), { outputSuffix: "_out" })).rejects.toThrow("Not a folder");
    await expect(scanFolder(path.join(site, "old_results"), { outputSuffix: "_out" })).rejects.toThrow(
      "is a results folder"
    );
  });

  it("selectFiles keeps order and drops duplicates", async () => {
    const b = path.join(site, "b.JPG");
    const a = path.join(site, "a.png");
    const selection = await selectFiles([b, a, b, ""]);
    expect(selection.images).toEqual([b, a]);
  });

  it("selectFiles rejects unsupported and missing files", async () => {
    await expect(selectFiles([path.join(site, "notes.txt")])).rejects.toThrow("Unsupported image type: notes.txt");
    await expect(selectFiles([path.join(site, "gone.jpg")])).rejects.toThrow(SelectionError);
  });
});

import fs from "fs/promises";
import os from "os";
import path from "path";
import sharp from "sharp";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { BatchRunner, type BatchRunnerOptions } from "./batch-runner";
import { RateLimitError, SelectionError } from "./errors";
import { readLogs } from "./file-utils";
import { scanFolder } from "./image-selector";
import { detectImageMimeType } from "./image-utils";
import type { ImageTransformer, TransformInput, TransformResult } from "./providers";
import type { RunEvent } from "@/types/batch";

function solid(background: string) {
  return sharp({ create: { width: 4, height: 4, channels: 3, background } });
}

function transformer(handle: (input: TransformInput) => Promise<TransformResult>): ImageTransformer & {
  inputs: TransformInput[];
} {
  const inputs: TransformInput[] = [];
  return {
    inputs,
    transform(input) {
      inputs.push(input);
      return handle(input);
    },
  };
}

describe("BatchRunner", () => {
  let sourceA: Buffer;
  let sourceB: Buffer;
  let resultPng: Buffer;
  let dir: string;
  let a: string;
  let b: string;
  let outputDir: string;

  beforeAll(async () => {
    sourceA = await solid("#3366cc").jpeg().toBuffer();
    sourceB = await solid("#cc6633").jpeg().toBuffer();
    resultPng = await solid("#000000").png().toBuffer();
  });

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "batch-runner-"));
    a = path.join(dir, "a.jpg");
    b = path.join(dir, "b.jpg");
    outputDir = path.join(dir, "out");
    await fs.writeFile(a, sourceA);
    await fs.writeFile(b, sourceB);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function options(t: ImageTransformer, extra: Partial<BatchRunnerOptions> = {}): BatchRunnerOptions {
    return { transformer: t, model: "test-model", timeoutMs: 1000, outputSuffix: "_out", ...extra };
  }

  // Fails b.jpg with a rate limit, returns a PNG for everything else
  function rateLimitedOnB() {
    return transformer(async (input) => {
      if (input.image.equals(sourceB)) throw new RateLimitError("rate limit");
      return { image: resultPng, mimeType: "image/png" };
    });
  }

  it("validates its input", () => {
    const t = rateLimitedOnB();
    expect(() => new BatchRunner({ imagePaths: [" "], promptName: "p", promptText: "x" }, options(t))).toThrow(
      new SelectionError("No images selected")
    );
    expect(() => new BatchRunner({ imagePaths: [a], promptName: "p", promptText: "  " }, options(t))).toThrow(
      "Prompt text is empty"
    );
  });

  it("keeps going after a failed image", async () => {
    const t = rateLimitedOnB();
    const runner = new BatchRunner(
      { imagePaths: [a, b], promptName: "default", promptText: "Remove the sky.", outputDir },
      options(t)
    );
    const events: RunEvent[] = [];
    runner.subscribe((event) => events.push(event));

    const run = await runner.execute();

    expect(events.map((e) => (e.type === "task_update" ? `${e.index}:${e.task.status}` : e.type))).toEqual([
      "run_started",
      "0:running",
      "0:succeeded",
      "1:running",
      "1:failed",
      "run_complete",
    ]);
    expect(events[events.length - 1]).toEqual({
      type: "run_complete",
      status: "completed",
      summary: { total: 2, succeeded: 1, failed: 1, pending: 0 },
    });

    expect(run.status).toBe("completed");
    expect(run.tasks[0]).toMatchObject({ status: "succeeded", outputPath: path.join(outputDir, "a_out.jpg") });
    expect(run.tasks[1]).toMatchObject({ status: "failed", error: "rate limit", errorKind: "rate_limit" });
    expect(run.tasks[1].outputPath).toBeUndefined();
    expect(await fs.readdir(outputDir)).toEqual(["a_out.jpg"]);

    expect(t.inputs.map((i) => [i.mimeType, i.prompt, i.timeoutMs])).toEqual([
      ["image/jpeg", "Remove the sky.", 1000],
      ["image/jpeg", "Remove the sky.", 1000],
    ]);
  });

  it("re-encodes a returned PNG to match a .jpg source", async () => {
    const t = rateLimitedOnB();
    const runner = new BatchRunner({ imagePaths: [a], promptName: "p", promptText: "x", outputDir }, options(t));

    await runner.execute();

    const written = await fs.readFile(path.join(outputDir, "a_out.jpg"));
    expect(detectImageMimeType(written)).toBe("image/jpeg");
  });

  it("writes bytes that already match the source type unchanged", async () => {
    const resultJpeg = await solid("#111111").jpeg().toBuffer();
    const t = transformer(async () => ({ image: resultJpeg, mimeType: "image/jpeg" }));
    const runner = new BatchRunner({ imagePaths: [a], promptName: "p", promptText: "x", outputDir }, options(t));

    await runner.execute();

    expect((await fs.readFile(path.join(outputDir, "a_out.jpg"))).equals(resultJpeg)).toBe(true);
  });

  it("fails the image when the returned bytes cannot be converted", async () => {
    const t = transformer(async () => ({ image: Buffer.from("not an image"), mimeType: "image/png" }));
    const runner = new BatchRunner({ imagePaths: [a], promptName: "p", promptText: "x", outputDir }, options(t));

    const run = await runner.execute();

    expect(run.tasks[0].status).toBe("failed");
    expect(run.tasks[0].errorKind).toBe("invalid_response");
    expect(run.tasks[0].error).toMatch(/^Cannot convert the returned image\/png image to image\/jpeg: /);
    await expect(fs.readdir(outputDir)).rejects.toThrow();
  });

  it("never overwrites an earlier result", async () => {
    await fs.mkdir(outputDir);
    await fs.writeFile(path.join(outputDir, "a_out.jpg"), "old");
    const runner = new BatchRunner(
      { imagePaths: [a], promptName: "p", promptText: "x", outputDir },
      options(rateLimitedOnB())
    );

    const run = await runner.execute();

    expect(run.tasks[0].outputPath).toBe(path.join(outputDir, "a_out-1.jpg"));
    expect(await fs.readFile(path.join(outputDir, "a_out.jpg"), "utf-8")).toBe("old");
  });

  it("writes beside the scanned folder so a rescan finds every result", async () => {
    const site = path.join(dir, "site");
    await fs.mkdir(path.join(site, "north"), { recursive: true });
    await fs.writeFile(path.join(site, "a.jpg"), sourceA);
    await fs.writeFile(path.join(site, "north", "c.jpg"), sourceA);

    const selection = await scanFolder(site, { outputSuffix: "_out" });
    const runner = new BatchRunner(
      { imagePaths: selection.images, promptName: "p", promptText: "x", sourceRoot: selection.root },
      options(rateLimitedOnB())
    );

    const run = await runner.execute();

    expect(run.outputDir).toBe(path.join(dir, "site_results"));
    expect(run.tasks.map((task) => task.outputPath)).toEqual([
      path.join(dir, "site_results", "a_out.jpg"),
      path.join(dir, "site_results", "north", "c_out.jpg"),
    ]);

    const rescan = await scanFolder(site, { outputSuffix: "_out" });
    expect(rescan.images).toEqual([]);
    expect(rescan.alreadyProcessed.map((p) => p.outputPath)).toEqual([
      path.join(dir, "site_results", "a_out.jpg"),
      path.join(dir, "site_results", "north", "c_out.jpg"),
    ]);
  });

  it("records unreadable sources as io failures", async () => {
    const t = rateLimitedOnB();
    const missing = path.join(dir, "gone.jpg");
    const runner = new BatchRunner({ imagePaths: [missing], promptName: "p", promptText: "x", outputDir }, options(t));

    const run = await runner.execute();

    expect(run.tasks[0].status).toBe("failed");
    expect(run.tasks[0].errorKind).toBe("io");
    expect(run.tasks[0].error).toMatch(/^Cannot read /);
    expect(t.inputs).toHaveLength(0);
  });

  it("stops before the next image when cancelled", async () => {
    let runner: BatchRunner | null = null;
    const t = transformer(async () => {
      runner?.cancel();
      return { image: resultPng, mimeType: "image/png" };
    });
    runner = new BatchRunner({ imagePaths: [a, b], promptName: "p", promptText: "x", outputDir }, options(t));

    const run = await runner.execute();

    expect(run.status).toBe("cancelled");
    expect(run.tasks.map((task) => task.status)).toEqual(["succeeded", "pending"]);
    expect(t.inputs).toHaveLength(1);
  });

  it("waits between requests and can be cancelled while waiting", async () => {
    const runner = new BatchRunner(
      { imagePaths: [a, b], promptName: "p", promptText: "x", outputDir },
      options(rateLimitedOnB(), { requestIntervalMs: 10_000 })
    );
    const waits: number[] = [];
    runner.subscribe((event) => {
      if (event.type !== "throttle_wait") return;
      waits.push(event.waitMs);
      runner.cancel();
    });

    const run = await runner.execute();

    expect(waits).toHaveLength(1);
    expect(waits[0]).toBeGreaterThan(0);
    expect(waits[0]).toBeLessThanOrEqual(10_000);
    expect(run.status).toBe("cancelled");
    expect(run.tasks.map((task) => task.status)).toEqual(["succeeded", "pending"]);
  });

  it("runs only once", async () => {
    const runner = new BatchRunner(
      { imagePaths: [a], promptName: "p", promptText: "x", outputDir },
      options(rateLimitedOnB())
    );
    await runner.execute();
    await expect(runner.execute()).rejects.toThrow("has already been executed");
  });

  it("appends one log entry per processed image", async () => {
    const logsDir = path.join(dir, "logs");
    const runner = new BatchRunner(
      { imagePaths: [a, b], promptName: "default", promptText: "x", outputDir },
      options(rateLimitedOnB(), { logsDir })
    );

    await runner.execute();

    const entries = await readLogs(logsDir, undefined, runner.id);
    expect(entries.map((e) => [e.taskIndex, e.status, e.errorKind])).toEqual([
      [0, "succeeded", undefined],
      [1, "failed", "rate_limit"],
    ]);
    expect(entries[0]).toMatchObject({ promptName: "default", model: "test-model", sourcePath: a });
  });
});

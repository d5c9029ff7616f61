import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BatchRunner } from "./batch-runner";
import { RunInProgressError } from "./errors";
import { RunRegistry } from "./run-registry";

// Sources that do not exist fail on read, so runs finish without touching the disk.
function runner(): BatchRunner {
  const root = path.join(os.tmpdir(), "run-registry-missing");
  return new BatchRunner(
    { imagePaths: [path.join(root, "a.jpg")], promptName: "p", promptText: "x", outputDir: path.join(root, "out") },
    {
      transformer: { transform: () => Promise.reject(new Error("not reached")) },
      model: "test-model",
      timeoutMs: 1000,
      outputSuffix: "_out",
    }
  );
}

describe("RunRegistry", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("allows one active run at a time", async () => {
    const registry = new RunRegistry();
    const first = runner();

    const execution = registry.start(first);
    expect(registry.activeRun).toBe(first);
    expect(registry.current()?.status).toBe("running");
    expect(() => registry.start(runner())).toThrow(RunInProgressError);

    const finished = await execution;
    expect(finished.status).toBe("completed");
    expect(registry.activeRun).toBeNull();
    expect(registry.current()).toEqual(finished);

    await expect(registry.start(runner())).resolves.toMatchObject({ status: "completed" });
  });

  it("cancels the active run", async () => {
    const registry = new RunRegistry();
    expect(registry.cancel()).toBe(false);

    const execution = registry.start(runner());
    expect(registry.cancel()).toBe(true);

    const finished = await execution;
    expect(finished.status).toBe("cancelled");
    expect(finished.tasks[0].status).toBe("pending");
  });
});

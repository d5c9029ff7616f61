import fs from "fs/promises";
import path from "path";
import { setTimeout as sleep } from "timers/promises";
import { FileIOError, InvalidResponseError, SelectionError, errorKind, errorMessage } from "@/lib/errors";
import {
  appendLog,
  outputPathFor,
  reserveOutputPath,
  resolveOutputLayout,
  type OutputLayout,
} from "@/lib/file-utils";
import { generateRunId } from "@/lib/format-utils";
import { detectImageMimeType, encodeImage, mimeTypeForPath } from "@/lib/image-utils";
import type { ImageTransformer, TransformResult } from "@/lib/providers";
import { describeSummary, summarizeTasks } from "@/lib/run-summary";
import type { BatchRun, ImageTask, RunEvent } from "@/types/batch";
import type { LogEntry } from "@/types/log";

export interface BatchInput {
  imagePaths: string[];
  promptName: string;
  /** Final text sent with every image */
  promptText: string;
  outputDir?: string;
  /** Folder the images were scanned from; its subfolders are mirrored in the output */
  sourceRoot?: string;
  name?: string;
}

export interface BatchRunnerOptions {
  transformer: ImageTransformer;
  model: string;
  timeoutMs: number;
  outputSuffix: string;
  /** Minimum gap between request starts; 0 sends back to back */
  requestIntervalMs?: number;
  /** JSONL run log directory. Nothing is logged when omitted. */
  logsDir?: string;
}

export type RunListener = (event: RunEvent) => void;

type FinishedTask = Pick<ImageTask, "status" | "outputPath" | "error" | "errorKind">;

/**
 * Processes one selection sequentially: read → transform → write, one request
 * in flight at a time. Every task transition is published to subscribers.
 */
export class BatchRunner {
  private readonly run: BatchRun;
  private readonly layout: OutputLayout;
  private readonly listeners = new Set<RunListener>();
  private readonly abort = new AbortController();
  private lastRequestAt: number | null = null;
  private started = false;

  constructor(input: BatchInput, private readonly options: BatchRunnerOptions) {
    const imagePaths = input.imagePaths.map((p) => p.trim()).filter(Boolean).map((p) => path.resolve(p));
    if (imagePaths.length === 0) {
      throw new SelectionError("No images selected");
    }
    const promptText = input.promptText.trim();
    if (!promptText) {
      throw new SelectionError("Prompt text is empty");
    }

    const id = generateRunId();
    const layout = resolveOutputLayout(imagePaths, input.sourceRoot);
    if (input.outputDir?.trim()) layout.outputDir = path.resolve(input.outputDir.trim());
    this.layout = layout;

    this.run = {
      id,
      name: input.name?.trim() || `Run ${id}`,
      status: "idle",
      promptName: input.promptName,
      outputDir: layout.outputDir,
      sourceRoot: layout.root,
      createdAt: new Date().toISOString(),
      tasks: imagePaths.map((sourcePath, index) => ({
        id: `${id}-${index}`,
        index,
        sourcePath,
        promptText,
        status: "pending",
      })),
    };
  }

  get id(): string {
    return this.run.id;
  }

  get isActive(): boolean {
    return this.run.status === "running";
  }

  get cancelRequested(): boolean {
    return this.abort.signal.aborted;
  }

  snapshot(): BatchRun {
    return { ...this.run, tasks: this.run.tasks.map((t) => ({ ...t })) };
  }

  subscribe(listener: RunListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** The in-flight request is allowed to finish; tasks not yet started stay pending. */
  cancel(): void {
    if (this.cancelRequested) return;
    console.log(`[batch-runner] Run ${this.run.id}: cancellation requested`);
    this.abort.abort();
  }

  async execute(): Promise<BatchRun> {
    if (this.started) {
      throw new Error(`Run ${this.run.id} has already been executed`);
    }
    this.started = true;

    this.run.status = "running";
    this.run.startedAt = new Date().toISOString();
    console.log(`[batch-runner] Run ${this.run.id}: ${this.run.tasks.length} images → ${this.run.outputDir}`);
    this.emit({ type: "run_started", run: this.snapshot() });

    for (const task of this.run.tasks) {
      if (this.cancelRequested) break;
      await this.pace();
      if (this.cancelRequested) break;
      await this.processTask(task);
    }

    const summary = summarizeTasks(this.run.tasks);
    const status = this.cancelRequested && summary.pending > 0 ? "cancelled" : "completed";
    this.run.status = status;
    this.run.completedAt = new Date().toISOString();
    console.log(`[batch-runner] Run ${this.run.id} ${status}: ${describeSummary(summary)}`);
    this.emit({ type: "run_complete", status, summary });

    return this.snapshot();
  }

  private emit(event: RunEvent) {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.warn(`[batch-runner] Listener failed on ${event.type}:`, error);
      }
    }
  }

  private update(task: ImageTask, patch: Partial<ImageTask>) {
    Object.assign(task, patch);
    this.emit({ type: "task_update", index: task.index, task: { ...task } });
  }

  private async pace(): Promise<void> {
    const interval = this.options.requestIntervalMs ?? 0;
    if (interval <= 0 || this.lastRequestAt === null) return;

    const waitMs = this.lastRequestAt + interval - Date.now();
    if (waitMs <= 0) return;

    this.emit({ type: "throttle_wait", waitMs });
    try {
      await sleep(waitMs, undefined, { signal: this.abort.signal });
    } catch (error) {
      if (!this.cancelRequested) throw error;
    }
  }

  private async processTask(task: ImageTask): Promise<void> {
    const startTime = Date.now();
    this.lastRequestAt = startTime;
    this.update(task, { status: "running", startedAt: new Date(startTime).toISOString() });

    let result: FinishedTask;
    try {
      const image = await readSource(task.sourcePath);
      const output = await this.options.transformer.transform({
        image,
        mimeType: detectImageMimeType(image) ?? mimeTypeForPath(task.sourcePath),
        prompt: task.promptText,
        timeoutMs: this.options.timeoutMs,
      });
      const outputPath = await this.writeOutput(task.sourcePath, output);
      result = { status: "succeeded", outputPath };
    } catch (error) {
      result = {
        status: "failed",
        error: errorMessage(error, "Processing failed"),
        errorKind: errorKind(error) ?? "api",
      };
    }

    const durationMs = Date.now() - startTime;
    this.update(task, { ...result, completedAt: new Date().toISOString(), durationMs });
    console.log(
      `[batch-runner] ${task.index + 1}/${this.run.tasks.length} ${path.basename(task.sourcePath)}: ${
        result.status === "succeeded" ? `saved ${result.outputPath}` : `failed (${result.errorKind}) ${result.error}`
      }`
    );
    await this.log(task, durationMs);
  }

  private async writeOutput(sourcePath: string, output: TransformResult): Promise<string> {
    const target = outputPathFor(sourcePath, this.layout, this.options.outputSuffix);
    const targetType = mimeTypeForPath(target);
    let bytes = output.image;
    if (output.mimeType !== targetType) {
      try {
        bytes = await encodeImage(output.image, targetType);
      } catch (error) {
        throw new InvalidResponseError(
          `Cannot convert the returned ${output.mimeType} image to ${targetType}: ${errorMessage(error)}`
        );
      }
    }

    const dir = path.dirname(target);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new FileIOError(`Cannot create output folder ${dir}: ${errorMessage(error)}`, { cause: error });
    }

    const outputPath = await reserveOutputPath(dir, path.basename(target));
    try {
      await fs.writeFile(outputPath, bytes);
    } catch (error) {
      await fs.rm(outputPath, { force: true }).catch((rmError: unknown) => {
        console.warn(`[batch-runner] Could not remove partial output ${outputPath}:`, rmError);
      });
      throw new FileIOError(`Cannot write ${outputPath}: ${errorMessage(error)}`, { cause: error });
    }
    return outputPath;
  }

  private async log(task: ImageTask, durationMs: number): Promise<void> {
    if (!this.options.logsDir || (task.status !== "succeeded" && task.status !== "failed")) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      runId: this.run.id,
      taskIndex: task.index,
      sourcePath: task.sourcePath,
      promptName: this.run.promptName,
      model: this.options.model,
      status: task.status,
      durationMs,
      outputPath: task.outputPath,
      error: task.error,
      errorKind: task.errorKind,
    };
    try {
      await appendLog(this.options.logsDir, entry);
    } catch (error) {
      console.error(`[batch-runner] Failed to write run log:`, error);
    }
  }
}

async function readSource(sourcePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(sourcePath);
  } catch (error) {
    throw new FileIOError(`Cannot read ${sourcePath}: ${errorMessage(error)}`, { cause: error });
  }
}

export type TaskStatus = "pending" | "running" | "succeeded" | "failed";

export type RunStatus = "idle" | "running" | "completed" | "cancelled";

export type ErrorKind =
  | "configuration"
  | "selection"
  | "not_found"
  | "run_conflict"
  | "auth"
  | "rate_limit"
  | "network"
  | "invalid_response"
  | "api"
  | "io";

export interface ImageTask {
  /** Unique identifier for this task within the run */
  id: string;
  index: number;
  sourcePath: string;
  promptText: string;
  status: TaskStatus;
  error?: string;
  errorKind?: ErrorKind;
  outputPath?: string;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
}

export interface BatchRun {
  id: string;
  name: string;
  status: RunStatus;
  tasks: ImageTask[];
  promptName: string;
  outputDir: string;
  /** Folder whose subfolders are mirrored under outputDir */
  sourceRoot?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  pending: number;
}

export type RunEvent =
  | { type: "run_started"; run: BatchRun }
  | { type: "task_update"; index: number; task: ImageTask }
  | { type: "throttle_wait"; waitMs: number }
  | { type: "run_complete"; status: "completed" | "cancelled"; summary: RunSummary }
  | { type: "run_error"; error: string };

export interface RunRequest {
  imagePaths: string[];
  promptName: string;
  /** Edited text; when absent the stored prompt is rendered */
  promptText?: string;
  variables?: Record<string, string>;
  outputDir?: string;
  sourceRoot?: string;
  requestIntervalMs?: number;
  name?: string;
}

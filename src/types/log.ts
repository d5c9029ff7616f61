import type { ErrorKind } from "./batch";

export interface LogEntry {
  timestamp: string;
  runId: string;
  taskIndex: number;
  sourcePath: string;
  promptName: string;
  model: string;
  status: "succeeded" | "failed";
  durationMs: number;
  outputPath?: string;
  error?: string;
  errorKind?: ErrorKind;
}

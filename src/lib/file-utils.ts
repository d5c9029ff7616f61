import fs from "fs/promises";
import path from "path";
import { RESULTS_DIR_NAME, RESULTS_DIR_SUFFIX } from "@/lib/constants";
import type { LogEntry } from "@/types/log";

// --- Output locations ---

function stemOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/** Where a run writes, and the folder whose layout it mirrors below `outputDir`. */
export interface OutputLayout {
  outputDir: string;
  root: string;
}

function isInside(dir: string, root: string): boolean {
  const rel = path.relative(root, dir);
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

function commonDir(dirs: string[]): string {
  let root = dirs[0];
  while (!dirs.every((d) => isInside(d, root)) && path.dirname(root) !== root) {
    root = path.dirname(root);
  }
  return root;
}

/** `<parent>/<folder>_results`, or `<root>/results` for a filesystem root. */
export function resultsDirFor(root: string): string {
  const parent = path.dirname(root);
  if (parent === root) return path.join(root, RESULTS_DIR_NAME);
  return path.join(parent, `${path.basename(root)}${RESULTS_DIR_SUFFIX}`);
}

/**
 * Default output location of a run:
 * scanned folder → sibling `<folder>_results`, one image → `<dir>/<stem>_results`,
 * several files → sibling `_results` of their common folder.
 */
export function resolveOutputLayout(imagePaths: string[], sourceRoot?: string): OutputLayout {
  if (sourceRoot?.trim()) {
    const root = path.resolve(sourceRoot.trim());
    return { outputDir: resultsDirFor(root), root };
  }
  if (imagePaths.length === 0) {
    throw new Error("Cannot derive an output folder without images");
  }
  if (imagePaths.length === 1) {
    const dir = path.dirname(imagePaths[0]);
    return { outputDir: path.join(dir, `${stemOf(imagePaths[0])}${RESULTS_DIR_SUFFIX}`), root: dir };
  }
  const root = commonDir(imagePaths.map((p) => path.dirname(p)));
  return { outputDir: resultsDirFor(root), root };
}

/** Output extension follows the source; BMP, which we cannot encode, becomes JPEG. */
export function outputExtension(sourcePath: string): string {
  const ext = path.extname(sourcePath).toLowerCase();
  return ext === ".bmp" || !ext ? ".jpg" : ext;
}

export function outputFileName(sourcePath: string, suffix: string): string {
  return `${stemOf(sourcePath)}${suffix}${outputExtension(sourcePath)}`;
}

/** `<outputDir>/<subfolder of the source below root>/<stem><suffix><ext>` */
export function outputPathFor(sourcePath: string, layout: OutputLayout, suffix: string): string {
  const sourceDir = path.dirname(sourcePath);
  const subdir = isInside(sourceDir, layout.root) ? path.relative(layout.root, sourceDir) : "";
  return path.join(layout.outputDir, subdir, outputFileName(sourcePath, suffix));
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** First free path for `fileName` in `dir`: `a_out.jpg`, then `a_out-1.jpg`, `a_out-2.jpg`, ... */
export async function reserveOutputPath(dir: string, fileName: string): Promise<string> {
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  let candidate = path.join(dir, fileName);
  for (let n = 1; await exists(candidate); n++) {
    candidate = path.join(dir, `${base}-${n}${ext}`);
  }
  return candidate;
}

// --- Run logs (one JSONL file per day) ---

function getLogFilePath(logsDir: string, date?: string): string {
  const d = date ?? new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `${d}.jsonl`);
}

export async function appendLog(logsDir: string, entry: LogEntry): Promise<void> {
  await fs.mkdir(logsDir, { recursive: true });
  const filePath = getLogFilePath(logsDir, entry.timestamp.slice(0, 10));
  await fs.appendFile(filePath, JSON.stringify(entry) + "\n", "utf-8");
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "runId" in value &&
    typeof value.runId === "string" &&
    "taskIndex" in value &&
    typeof value.taskIndex === "number" &&
    "status" in value &&
    (value.status === "succeeded" || value.status === "failed")
  );
}

export async function readLogs(logsDir: string, date?: string, runId?: string): Promise<LogEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(getLogFilePath(logsDir, date), "utf-8");
  } catch {
    return [];
  }
  const entries: LogEntry[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isLogEntry(parsed)) entries.push(parsed);
    } catch {
      console.warn(`[logs] Skipping malformed line in ${date ?? "today"}'s log`);
    }
  }
  return runId ? entries.filter((e) => e.runId === runId) : entries;
}

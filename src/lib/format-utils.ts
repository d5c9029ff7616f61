export function padIndex(index: number, total: number): string {
  const digits = Math.max(3, String(total).length);
  return String(index + 1).padStart(digits, "0");
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}:${String(remainingSeconds).padStart(2, "0")}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/** Last two path segments, e.g. `photos/IMG_0001.jpg`. */
export function shortPath(filePath: string): string {
  const parts = filePath.split(/[\\/]/).filter(Boolean);
  return parts.slice(-2).join("/") || filePath;
}

export function fileNameOf(filePath: string): string {
  return filePath.split(/[\\/]/).pop() || filePath;
}

let _uidCounter = 0;
export function uid(): string {
  return `${Date.now()}-${++_uidCounter}`;
}

export function generateRunId(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** URL the preview route serves a local image from. */
export function imageFileUrl(filePath: string): string {
  return `/api/images/file?path=${encodeURIComponent(filePath)}`;
}

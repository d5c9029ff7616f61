import type { RunEvent } from "@/types/batch";

export function encodeEvent(event: RunEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

const EVENT_TYPES = new Set<string>(["run_started", "task_update", "throttle_wait", "run_complete", "run_error"]);

export function isRunEvent(value: unknown): value is RunEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string" &&
    EVENT_TYPES.has(value.type)
  );
}

/**
 * Splits a `text/event-stream` body into RunEvents. Feed it decoded chunks in
 * order; incomplete frames are held until the rest arrives.
 */
export class SSEParser {
  private buffer = "";

  push(chunk: string): RunEvent[] {
    this.buffer += chunk;
    const parts = this.buffer.split("\n\n");
    this.buffer = parts.pop() || "";

    const events: RunEvent[] = [];
    for (const part of parts) {
      const line = part.trim();
      if (!line.startsWith("data: ")) continue;
      try {
        const parsed: unknown = JSON.parse(line.slice(6));
        if (isRunEvent(parsed)) events.push(parsed);
      } catch {
        console.warn("[sse] Dropping malformed event:", line.slice(0, 120));
      }
    }
    return events;
  }
}

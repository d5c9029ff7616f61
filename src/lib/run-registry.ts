import type { BatchRunner } from "@/lib/batch-runner";
import { RunInProgressError } from "@/lib/errors";
import type { BatchRun } from "@/types/batch";

/** Holds the one run the server is allowed to execute at a time. */
export class RunRegistry {
  private active: BatchRunner | null = null;
  private last: BatchRun | null = null;

  get activeRun(): BatchRunner | null {
    return this.active;
  }

  /** Check-and-set happens before the first await, so two concurrent starts cannot both pass. */
  start(runner: BatchRunner): Promise<BatchRun> {
    if (this.active) {
      throw new RunInProgressError(this.active.id);
    }
    this.active = runner;

    return runner.execute().then(
      (finished) => {
        this.last = finished;
        this.active = null;
        return finished;
      },
      (error: unknown) => {
        this.last = runner.snapshot();
        this.active = null;
        throw error;
      }
    );
  }

  current(): BatchRun | null {
    return this.active?.snapshot() ?? this.last;
  }

  cancel(): boolean {
    if (!this.active) return false;
    this.active.cancel();
    return true;
  }
}

// Route modules can be evaluated more than once in dev, so the instance lives on globalThis.
declare global {
  var __runRegistry: RunRegistry | undefined;
}

export function getRunRegistry(): RunRegistry {
  if (!globalThis.__runRegistry) {
    globalThis.__runRegistry = new RunRegistry();
  }
  return globalThis.__runRegistry;
}

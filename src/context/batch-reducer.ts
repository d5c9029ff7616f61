import { API_TIERS, type ApiTier } from "@/lib/constants";
import { summarizeTasks } from "@/lib/run-summary";
import type { BatchRun, ErrorKind, ImageTask, RunEvent, RunSummary } from "@/types/batch";
import type { ConfigStatus, ImageSelection } from "@/types/selection";

export interface RunSettings {
  promptName: string;
  tier: ApiTier;
  /** Empty means "next to the images" */
  outputDir: string;
}

export interface BatchState {
  config: ConfigStatus | null;
  selection: ImageSelection;
  /** Folder or file the selection came from */
  selectionSource: string;
  settings: RunSettings;
  /** Editor contents for the selected prompt */
  promptText: string;
  currentRun: BatchRun | null;
  savedRun: BatchRun | null;
  viewingHistory: boolean;
  throttleWaitMs: number | null;
  runError: string | null;
}

export type BatchAction =
  | { type: "SET_CONFIG"; config: ConfigStatus }
  | { type: "SET_SELECTION"; selection: ImageSelection; source: string }
  | { type: "CLEAR_SELECTION" }
  | { type: "SET_SETTINGS"; settings: Partial<RunSettings> }
  | { type: "SET_PROMPT_TEXT"; text: string }
  | { type: "APPLY_EVENT"; event: RunEvent }
  | { type: "SET_RUN"; run: BatchRun | null }
  | { type: "RESET_RUN" }
  | { type: "VIEW_HISTORY_RUN"; run: BatchRun }
  | { type: "BACK_TO_CURRENT" }
  | { type: "HYDRATE"; currentRun: BatchRun | null; settings?: Partial<RunSettings> };

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  promptName: "default",
  tier: API_TIERS[0].id,
  outputDir: "",
};

export const initialBatchState: BatchState = {
  config: null,
  selection: { images: [], alreadyProcessed: [], skippedDirectories: 0, skippedFiles: 0 },
  selectionSource: "",
  settings: DEFAULT_RUN_SETTINGS,
  promptText: "",
  currentRun: null,
  savedRun: null,
  viewingHistory: false,
  throttleWaitMs: null,
  runError: null,
};

function applyEvent(state: BatchState, event: RunEvent): BatchState {
  switch (event.type) {
    case "run_started":
      return { ...state, currentRun: event.run, viewingHistory: false, savedRun: null, throttleWaitMs: null, runError: null };

    case "task_update": {
      if (!state.currentRun) return state;
      const tasks = [...state.currentRun.tasks];
      tasks[event.index] = event.task;
      return { ...state, currentRun: { ...state.currentRun, tasks }, throttleWaitMs: null };
    }

    case "throttle_wait":
      return { ...state, throttleWaitMs: event.waitMs };

    case "run_complete":
      if (!state.currentRun) return state;
      return {
        ...state,
        throttleWaitMs: null,
        currentRun: {
          ...state.currentRun,
          status: event.status,
          completedAt: state.currentRun.completedAt ?? new Date().toISOString(),
        },
      };

    case "run_error":
      return { ...state, throttleWaitMs: null, runError: event.error };
  }
}

export function batchReducer(state: BatchState, action: BatchAction): BatchState {
  switch (action.type) {
    case "SET_CONFIG":
      return { ...state, config: action.config };

    case "SET_SELECTION":
      return { ...state, selection: action.selection, selectionSource: action.source };

    case "CLEAR_SELECTION":
      return { ...state, selection: initialBatchState.selection, selectionSource: "" };

    case "SET_SETTINGS":
      return { ...state, settings: { ...state.settings, ...action.settings } };

    case "SET_PROMPT_TEXT":
      return { ...state, promptText: action.text };

    case "APPLY_EVENT":
      // History view is read-only; live events go to the run it hides
      if (state.viewingHistory && action.event.type !== "run_started") {
        const live = applyEvent({ ...state, currentRun: state.savedRun }, action.event);
        return { ...state, savedRun: live.currentRun, throttleWaitMs: live.throttleWaitMs, runError: live.runError };
      }
      return applyEvent(state, action.event);

    case "SET_RUN":
      return { ...state, currentRun: action.run, throttleWaitMs: null };

    case "RESET_RUN":
      return { ...state, currentRun: null, throttleWaitMs: null, runError: null };

    case "VIEW_HISTORY_RUN":
      return {
        ...state,
        savedRun: state.viewingHistory ? state.savedRun : state.currentRun,
        currentRun: action.run,
        viewingHistory: true,
      };

    case "BACK_TO_CURRENT":
      return { ...state, currentRun: state.savedRun, savedRun: null, viewingHistory: false };

    case "HYDRATE":
      return {
        ...state,
        currentRun: action.currentRun,
        ...(action.settings ? { settings: { ...state.settings, ...action.settings } } : {}),
      };
  }
}

// --- Derived state ---

export type StartCheck = { ok: true } | { ok: false; reason: string };

export function canStartRun(state: BatchState, imageCount = state.selection.images.length): StartCheck {
  if (!state.config?.configured) return { ok: false, reason: "API key not configured" };
  if (state.currentRun?.status === "running") return { ok: false, reason: "A run is already in progress" };
  if (state.viewingHistory) return { ok: false, reason: "Return to the current run first" };
  if (imageCount === 0) return { ok: false, reason: "Select a folder or an image first" };
  if (!state.settings.promptName) return { ok: false, reason: "Choose a prompt" };
  if (!state.promptText.trim()) return { ok: false, reason: "Prompt text is empty" };
  return { ok: true };
}

export function runSummary(run: BatchRun | null): RunSummary {
  return summarizeTasks(run?.tasks ?? []);
}

export function failedPaths(run: BatchRun | null): string[] {
  return (run?.tasks ?? []).filter((t) => t.status === "failed").map((t) => t.sourcePath);
}

export interface ErrorGroup {
  kind: ErrorKind | "unknown";
  message: string;
  count: number;
}

/** Failed tasks grouped by error message, most frequent first. */
export function groupErrors(tasks: ImageTask[]): ErrorGroup[] {
  const groups = new Map<string, ErrorGroup>();
  for (const task of tasks) {
    if (task.status !== "failed") continue;
    const message = task.error || "Unknown error";
    const group = groups.get(message);
    if (group) {
      group.count++;
    } else {
      groups.set(message, { kind: task.errorKind ?? "unknown", message, count: 1 });
    }
  }
  return [...groups.values()].sort((a, b) => b.count - a.count);
}

/** Average finished-task duration times the tasks left; null until one task finished. */
export function estimateRemainingMs(run: BatchRun | null): number | null {
  if (!run || run.status !== "running") return null;
  const durations = run.tasks.flatMap((t) => (t.durationMs !== undefined ? [t.durationMs] : []));
  if (durations.length === 0) return null;
  const average = durations.reduce((sum, d) => sum + d, 0) / durations.length;
  const remaining = run.tasks.filter((t) => t.status === "pending" || t.status === "running").length;
  return Math.round(average * remaining);
}

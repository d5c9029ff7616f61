"use client";

import { useCallback, useEffect, useState } from "react";
import { ChevronDown, ChevronUp, Trash2, Images, ArrowLeft } from "lucide-react";
import { useBatch } from "@/hooks/useBatch";
import { summarizeTasks } from "@/lib/run-summary";
import { loadRunHistory, deleteRunFromHistory } from "@/lib/persistence";
import type { BatchRun } from "@/types/batch";

export function BatchHistory() {
  const { state, dispatch, hydrated } = useBatch();
  const [runs, setRuns] = useState<BatchRun[]>([]);
  const [open, setOpen] = useState(false);

  const refreshHistory = useCallback(async () => {
    try {
      setRuns(await loadRunHistory());
    } catch (error) {
      console.warn("[history] Could not read run history:", error);
    }
  }, []);

  // Reload when the current run reaches a final status (it was just archived)
  const currentStatus = state.currentRun?.status;
  useEffect(() => {
    if (!hydrated) return;
    void refreshHistory();
  }, [hydrated, currentStatus, refreshHistory]);

  const handleDelete = useCallback(
    async (e: React.MouseEvent, runId: string) => {
      e.stopPropagation();
      await deleteRunFromHistory(runId);
      await refreshHistory();
    },
    [refreshHistory]
  );

  if (runs.length === 0) return null;

  return (
    <div>
      <button
        onClick={() => setOpen(!open)}
        className="flex w-full items-center justify-between text-sm font-semibold text-foreground"
      >
        <span>Run history ({runs.length})</span>
        {open ? <ChevronUp className="h-4 w-4 text-muted-foreground" /> : <ChevronDown className="h-4 w-4 text-muted-foreground" />}
      </button>

      {open && (
        <div className="mt-2 flex max-h-64 flex-col gap-1.5 overflow-y-auto">
          {state.viewingHistory && (
            <button
              onClick={() => dispatch({ type: "BACK_TO_CURRENT" })}
              className="flex items-center gap-2 rounded-md border border-primary bg-primary/10 px-2.5 py-2 text-left text-xs font-medium text-primary transition-colors hover:bg-primary/20"
            >
              <ArrowLeft className="h-3.5 w-3.5 shrink-0" />
              Back to the current run
            </button>
          )}
          {runs.map((run) => {
            const summary = summarizeTasks(run.tasks);
            const isActive = state.currentRun?.id === run.id;

            return (
              <div
                key={run.id}
                role="button"
                tabIndex={0}
                onClick={() => dispatch({ type: "VIEW_HISTORY_RUN", run })}
                onKeyDown={(e) => {
                  if (e.key === "Enter") dispatch({ type: "VIEW_HISTORY_RUN", run });
                }}
                className={`group flex cursor-pointer items-start gap-2 rounded-md border px-2.5 py-2 text-left transition-colors ${
                  isActive ? "border-primary bg-primary/5" : "border-border hover:border-primary/30 hover:bg-muted/50"
                }`}
              >
                <Images className="mt-0.5 h-3.5 w-3.5 shrink-0 text-muted-foreground" />
                <div className="min-w-0 flex-1">
                  <p className="truncate text-xs font-medium text-foreground">{run.name}</p>
                  <p className="text-[10px] text-muted-foreground">
                    {summary.succeeded}/{summary.total} images
                    {summary.failed > 0 && ` · ${summary.failed} failed`}
                    {" · "}
                    {run.status}
                    {" · "}
                    {new Date(run.createdAt).toLocaleString()}
                  </p>
                </div>
                <button
                  onClick={(e) => void handleDelete(e, run.id)}
                  className="shrink-0 rounded p-1 opacity-0 transition-opacity hover:bg-destructive/10 group-hover:opacity-100"
                  title="Remove from history"
                >
                  <Trash2 className="h-3 w-3 text-destructive" />
                </button>
              </div>
            );
          })}
        </div>
      )}
    </div>
  );
}

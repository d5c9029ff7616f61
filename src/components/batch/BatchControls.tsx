"use client";

import { useCallback, useEffect } from "react";
import { Play, Square, Plus, RefreshCw } from "lucide-react";
import { Tooltip } from "@/components/common/Tooltip";
import { useBatch } from "@/hooks/useBatch";
import { useBatchRun } from "@/hooks/useBatchRun";

export function BatchControls() {
  const { state, summary, startCheck } = useBatch();
  const { isRunning, startRun, cancelRun, retryFailed, newRun } = useBatchRun();
  const run = state.currentRun;
  const isFinished = !state.viewingHistory && (run?.status === "completed" || run?.status === "cancelled");

  const handleStart = useCallback(() => {
    void startRun();
  }, [startRun]);

  // Ctrl+Enter shortcut to start a run
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      if ((e.ctrlKey || e.metaKey) && e.key === "Enter" && startCheck.ok) {
        e.preventDefault();
        handleStart();
      }
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [handleStart, startCheck.ok]);

  if (isRunning && !state.viewingHistory) {
    return (
      <div className="flex items-center gap-3">
        <button
          onClick={() => void cancelRun()}
          className="flex items-center gap-2 rounded-lg border-2 border-amber-500 px-6 py-2.5 text-sm font-bold text-amber-600 transition-all hover:bg-amber-500 hover:text-white"
        >
          <Square className="h-4 w-4" />
          Cancel
        </button>
        <span className="text-xs text-muted-foreground">The image in progress finishes first.</span>
      </div>
    );
  }

  return (
    <div className="flex flex-wrap items-center gap-3">
      <Tooltip content={startCheck.ok ? undefined : startCheck.reason}>
        <button
          onClick={handleStart}
          disabled={!startCheck.ok}
          className="flex items-center gap-2.5 rounded-lg bg-primary px-8 py-3 text-base font-bold text-primary-foreground shadow-md transition-all hover:bg-indigo-600 hover:shadow-lg disabled:cursor-not-allowed disabled:opacity-50 disabled:shadow-none"
        >
          <Play className="h-5 w-5" />
          Start
          <kbd className="ml-1 rounded bg-white/20 px-1.5 py-0.5 font-mono text-[10px]">Ctrl+Enter</kbd>
        </button>
      </Tooltip>
      {isFinished && summary.failed > 0 && (
        <button
          onClick={() => void retryFailed()}
          className="flex items-center gap-2 rounded-lg bg-amber-500 px-5 py-2.5 text-sm font-bold text-white shadow-md transition-all hover:bg-amber-600"
        >
          <RefreshCw className="h-4 w-4" />
          Retry failed ({summary.failed})
        </button>
      )}
      {isFinished && (
        <button
          onClick={newRun}
          className="flex items-center gap-2 rounded-lg bg-muted px-4 py-2.5 text-sm font-medium text-muted-foreground transition-colors hover:bg-gray-200"
        >
          <Plus className="h-4 w-4" />
          New run
        </button>
      )}
      {!startCheck.ok && <span className="text-xs text-muted-foreground">{startCheck.reason}</span>}
    </div>
  );
}

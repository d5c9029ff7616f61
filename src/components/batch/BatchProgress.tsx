"use client";

import { useMemo } from "react";
import { Clock, FolderOutput } from "lucide-react";
import { CollapsibleSection } from "@/components/common/CollapsibleSection";
import { StatusBadge } from "@/components/common/StatusBadge";
import { estimateRemainingMs, groupErrors } from "@/context/batch-reducer";
import { useBatch } from "@/hooks/useBatch";
import { formatDuration } from "@/lib/format-utils";

export function BatchProgress() {
  const { state, summary } = useBatch();
  const run = state.currentRun;

  const errors = useMemo(() => groupErrors(run?.tasks ?? []), [run]);
  const eta = useMemo(() => estimateRemainingMs(run), [run]);
  const totalDuration = useMemo(() => (run?.tasks ?? []).reduce((sum, t) => sum + (t.durationMs ?? 0), 0), [run]);

  if (!run) return null;

  const done = summary.succeeded + summary.failed;
  const percentage = summary.total > 0 ? Math.round((done / summary.total) * 100) : 0;
  const isRunning = run.status === "running";
  const barColor =
    summary.total > 0 && summary.failed === summary.total
      ? "bg-destructive"
      : run.status === "completed"
        ? "bg-success"
        : run.status === "cancelled"
          ? "bg-amber-500"
          : "bg-gradient-to-r from-indigo-400 to-indigo-500";

  return (
    <div className="rounded-xl border border-border/80 bg-card p-5 shadow-[var(--shadow-card)]">
      <div className="mb-3 flex items-center justify-between gap-3">
        <div className="flex min-w-0 items-center gap-2">
          <StatusBadge status={run.status} />
          <span className="truncate text-sm font-semibold text-foreground">{run.name}</span>
        </div>
        <span className="text-sm font-medium text-muted-foreground">
          {done}/{summary.total} ({percentage}%)
        </span>
      </div>

      <div className="h-3.5 w-full overflow-hidden rounded-full bg-muted/70">
        <div
          className={`h-full rounded-full transition-all duration-500 ease-out ${barColor} ${isRunning ? "progress-bar-animated" : ""}`}
          style={{ width: `${percentage}%` }}
        />
      </div>

      <div className="mt-3 flex flex-wrap gap-4 text-xs text-muted-foreground">
        <span>{summary.succeeded} succeeded</span>
        {summary.failed > 0 && <span className="text-destructive">{summary.failed} failed</span>}
        {!isRunning && summary.pending > 0 && <span>{summary.pending} not processed</span>}
        {totalDuration > 0 && <span>Time: {formatDuration(totalDuration)}</span>}
        {eta !== null && <span className="font-medium text-foreground">~{formatDuration(eta)} left</span>}
        {isRunning && state.throttleWaitMs !== null && (
          <span className="flex items-center gap-1">
            <Clock className="h-3 w-3" />
            pacing {formatDuration(state.throttleWaitMs)}
          </span>
        )}
      </div>

      <p className="mt-2 flex items-center gap-1.5 text-xs text-muted-foreground">
        <FolderOutput className="h-3.5 w-3.5 shrink-0" />
        <span className="truncate font-mono" dir="ltr" title={run.outputDir}>
          {run.outputDir}
        </span>
      </p>

      {state.runError && <p className="mt-2 text-xs text-destructive">{state.runError}</p>}

      {errors.length > 0 && (
        <div className="mt-3">
          <CollapsibleSection title="Errors" count={summary.failed} tone="danger">
            <ul className="space-y-1">
              {errors.map((err) => (
                <li key={err.message} className="flex items-start gap-1.5 text-xs text-red-700">
                  <span className="mt-0.5 shrink-0 text-red-400">&#x2022;</span>
                  <span className="flex-1 break-words" dir="ltr">
                    <span className="font-medium">[{err.kind}]</span> {err.message}
                  </span>
                  {err.count > 1 && <span className="shrink-0 whitespace-nowrap text-red-400">({err.count}x)</span>}
                </li>
              ))}
            </ul>
          </CollapsibleSection>
        </div>
      )}
    </div>
  );
}

"use client";

import { useState } from "react";
import { AlertCircle, Loader2 } from "lucide-react";
import { StatusBadge } from "@/components/common/StatusBadge";
import { fileNameOf, formatDuration, imageFileUrl } from "@/lib/format-utils";
import type { ImageTask } from "@/types/batch";

interface TaskCardProps {
  task: ImageTask;
  onClick: () => void;
}

export function TaskCard({ task, onClick }: TaskCardProps) {
  const [loaded, setLoaded] = useState(false);
  const name = fileNameOf(task.sourcePath);
  const thumbnail = task.outputPath ?? task.sourcePath;

  return (
    <div
      onClick={onClick}
      className={`card-interactive group relative cursor-pointer overflow-hidden rounded-xl border bg-card hover:shadow-lg ${
        task.status === "running"
          ? "animate-pulse-border border-primary"
          : task.status === "failed"
            ? "border-destructive/50"
            : "border-border hover:border-primary/50"
      }`}
    >
      <div className="relative aspect-square w-full overflow-hidden bg-muted">
        {task.status === "failed" ? (
          <div className="flex h-full w-full flex-col items-center justify-center gap-2 bg-red-50 p-4">
            <AlertCircle className="h-8 w-8 text-destructive/60" />
            <p className="line-clamp-4 text-center text-xs font-medium text-destructive" dir="ltr">
              {task.error}
            </p>
          </div>
        ) : (
          <>
            {!loaded && (
              <div className="absolute inset-0 animate-pulse bg-gradient-to-r from-muted via-muted-foreground/10 to-muted" />
            )}
            <img
              src={imageFileUrl(thumbnail)}
              alt={name}
              loading="lazy"
              className={`h-full w-full object-cover transition-all duration-300 group-hover:scale-105 ${
                loaded ? "opacity-100" : "opacity-0"
              } ${task.status === "succeeded" ? "" : "grayscale"}`}
              onLoad={() => setLoaded(true)}
            />
            {task.status === "running" && (
              <div className="absolute inset-0 flex items-center justify-center bg-black/20">
                <Loader2 className="h-8 w-8 animate-spin text-white" />
              </div>
            )}
          </>
        )}
      </div>

      <div className="absolute left-1.5 top-1.5">
        <StatusBadge status={task.status} />
      </div>

      <div className="px-3 py-2.5">
        <p className="truncate font-mono text-xs text-foreground" title={task.sourcePath} dir="ltr">
          {task.index + 1}. {name}
        </p>
        {task.durationMs !== undefined && (
          <p className="mt-0.5 text-[10px] text-muted-foreground">{formatDuration(task.durationMs)}</p>
        )}
      </div>
    </div>
  );
}

"use client";

import { useMemo, useState } from "react";
import { ImageIcon } from "lucide-react";
import { SectionCard } from "@/components/common/SectionCard";
import { useBatch } from "@/hooks/useBatch";
import type { TaskStatus } from "@/types/batch";
import { ImageLightbox } from "./ImageLightbox";
import { TaskCard } from "./TaskCard";

type Filter = "all" | Extract<TaskStatus, "succeeded" | "failed">;

const FILTERS: Array<{ value: Filter; label: string }> = [
  { value: "all", label: "All" },
  { value: "succeeded", label: "Done" },
  { value: "failed", label: "Failed" },
];

export function TaskGallery() {
  const { state, summary } = useBatch();
  const run = state.currentRun;
  const [filter, setFilter] = useState<Filter>("all");
  const [openIndex, setOpenIndex] = useState<number | null>(null);

  const tasks = useMemo(
    () => (run?.tasks ?? []).filter((t) => filter === "all" || t.status === filter),
    [run, filter]
  );

  if (!run) return null;

  const position = openIndex === null ? -1 : tasks.findIndex((t) => t.index === openIndex);
  const open = position === -1 ? null : tasks[position];

  return (
    <SectionCard
      title="Images"
      subtitle={`${summary.total} in this run`}
      icon={<ImageIcon className="h-3.5 w-3.5" />}
      headerAction={
        <div className="flex gap-1">
          {FILTERS.map((f) => (
            <button
              key={f.value}
              onClick={() => setFilter(f.value)}
              className={`rounded-md px-2.5 py-1 text-xs font-medium transition-colors ${
                filter === f.value ? "bg-primary text-white" : "text-muted-foreground hover:bg-muted"
              }`}
            >
              {f.label}
            </button>
          ))}
        </div>
      }
    >
      {tasks.length === 0 ? (
        <p className="py-6 text-center text-sm text-muted-foreground">Nothing here yet.</p>
      ) : (
        <div className="grid grid-cols-2 gap-3 sm:grid-cols-3 lg:grid-cols-4">
          {tasks.map((task) => (
            <TaskCard key={task.id} task={task} onClick={() => setOpenIndex(task.index)} />
          ))}
        </div>
      )}

      {open && (
        <ImageLightbox
          item={{ sourcePath: open.sourcePath, outputPath: open.outputPath, caption: open.error }}
          onClose={() => setOpenIndex(null)}
          onPrev={position > 0 ? () => setOpenIndex(tasks[position - 1].index) : undefined}
          onNext={position < tasks.length - 1 ? () => setOpenIndex(tasks[position + 1].index) : undefined}
        />
      )}
    </SectionCard>
  );
}

"use client";

import { Fragment, useState } from "react";
import { FolderOpen, Type, Settings, Zap, ImageIcon, Images } from "lucide-react";
import { SectionCard } from "@/components/common/SectionCard";
import { ConfirmDialog } from "@/components/common/ConfirmDialog";
import { ImageSelector } from "@/components/batch/ImageSelector";
import { PromptEditor } from "@/components/batch/PromptEditor";
import { BatchControls } from "@/components/batch/BatchControls";
import { BatchProgress } from "@/components/batch/BatchProgress";
import { BatchHistory } from "@/components/batch/BatchHistory";
import { ImageLightbox } from "@/components/gallery/ImageLightbox";
import { TaskGallery } from "@/components/gallery/TaskGallery";
import { RunSettings } from "@/components/settings/RunSettings";
import { useBatch } from "@/hooks/useBatch";
import { useConfigStatus } from "@/hooks/useConfigStatus";

function WorkflowSteps() {
  const { state } = useBatch();

  const activeStep = state.currentRun
    ? state.currentRun.status === "running"
      ? 2
      : 3
    : state.selection.images.length > 0
      ? 1
      : 0;

  const steps = [
    { label: "Images", icon: FolderOpen },
    { label: "Prompt", icon: Type },
    { label: "Run", icon: Zap },
    { label: "Results", icon: ImageIcon },
  ];

  return (
    <div className="flex items-center justify-center gap-0 border-b border-border/60 bg-gradient-to-b from-card to-background px-6 py-3">
      {steps.map((step, i) => {
        const Icon = step.icon;
        const isActive = i === activeStep;
        const isDone = i < activeStep;
        return (
          <Fragment key={step.label}>
            {i > 0 && <div className={`h-px w-10 transition-colors duration-300 ${isDone ? "bg-primary" : "bg-border/60"}`} />}
            <div
              className={`flex items-center gap-1.5 rounded-full px-3.5 py-1.5 text-xs font-medium transition-all duration-300 ${
                isActive
                  ? "bg-primary/10 text-primary shadow-sm shadow-primary/10 ring-1 ring-primary/20"
                  : isDone
                    ? "text-primary/70"
                    : "text-muted-foreground/60"
              }`}
            >
              <Icon className="h-3.5 w-3.5" />
              {step.label}
            </div>
          </Fragment>
        );
      })}
    </div>
  );
}

export default function Home() {
  const { config, refresh } = useConfigStatus();
  const [preview, setPreview] = useState<string | null>(null);
  const blocked = config !== null && !config.configured;

  return (
    <div className="flex min-h-screen flex-col">
      <header className="relative border-b border-border/60 bg-card px-6 py-3.5 shadow-[0_1px_3px_0_rgba(0,0,0,0.04)]">
        <div className="absolute inset-x-0 top-0 h-0.5 bg-gradient-to-r from-primary via-primary/70 to-primary/30" />
        <div className="flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="flex h-8 w-8 items-center justify-center rounded-lg bg-primary/10">
              <Images className="h-5 w-5 text-primary" />
            </div>
            <h1 className="text-lg font-bold tracking-tight text-foreground">Image Batch Studio</h1>
          </div>
          {config?.model && (
            <span className="rounded-lg border border-border/50 bg-muted/50 px-3 py-1.5 font-mono text-xs text-muted-foreground">
              {config.model}
            </span>
          )}
        </div>
      </header>

      <WorkflowSteps />

      <div className="flex flex-1 overflow-hidden">
        <main className="flex-1 overflow-y-auto p-6">
          <div className="mx-auto flex max-w-5xl flex-col gap-5">
            <div className="grid gap-5 lg:grid-cols-2">
              <SectionCard title="Images" icon={<FolderOpen className="h-4 w-4" />} subtitle="Folder (recursive) or a single image" disabled={blocked}>
                <ImageSelector disabled={blocked} onPreview={setPreview} />
              </SectionCard>
              <SectionCard title="Prompt" icon={<Type className="h-4 w-4" />} subtitle="Sent with every image">
                <PromptEditor />
              </SectionCard>
            </div>

            <BatchControls />

            <BatchProgress />

            <TaskGallery />
          </div>
        </main>

        <aside className="flex w-80 shrink-0 flex-col gap-4 overflow-y-auto border-s border-border/60 bg-muted/20 p-4">
          <SectionCard title="Run settings" icon={<Settings className="h-4 w-4" />}>
            <RunSettings />
          </SectionCard>

          <BatchHistory />
        </aside>
      </div>

      {preview && <ImageLightbox item={{ sourcePath: preview }} onClose={() => setPreview(null)} />}

      <ConfirmDialog
        open={blocked}
        title="Gemini API key missing"
        message="Image selection and runs stay disabled until the server has an API key. Add it to .env.local and restart the server."
        detail={config?.error}
        confirmLabel="Check again"
        onConfirm={() => void refresh()}
      />
    </div>
  );
}

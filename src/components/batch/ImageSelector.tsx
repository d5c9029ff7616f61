"use client";

import { useState } from "react";
import { FolderOpen, ImageIcon, Loader2, X } from "lucide-react";
import { CollapsibleSection } from "@/components/common/CollapsibleSection";
import { useImageSelection } from "@/hooks/useImageSelection";
import { fileNameOf, shortPath } from "@/lib/format-utils";

interface ImageSelectorProps {
  disabled?: boolean;
  onPreview: (path: string) => void;
}

export function ImageSelector({ disabled, onPreview }: ImageSelectorProps) {
  const { selection, source, isScanning, selectFolder, selectImage, clear } = useImageSelection();
  const [path, setPath] = useState(source);
  const busy = disabled || isScanning;

  const skipped = selection.skippedDirectories + selection.skippedFiles;

  return (
    <div className="flex flex-col gap-3">
      <div>
        <label htmlFor="image-path" className="mb-1 block text-xs font-medium text-muted-foreground">
          Folder or image path on this computer
        </label>
        <input
          id="image-path"
          type="text"
          dir="ltr"
          value={path}
          onChange={(e) => setPath(e.target.value)}
          onKeyDown={(e) => {
            if (e.key === "Enter" && !busy) void selectFolder(path);
          }}
          placeholder="/Users/me/Pictures/site-survey"
          disabled={busy}
          className="w-full rounded-md border border-border bg-white px-3 py-2 font-mono text-sm text-foreground placeholder:text-muted-foreground focus:border-primary focus:outline-none focus:ring-1 focus:ring-primary disabled:opacity-50"
        />
      </div>

      <div className="flex flex-wrap gap-2">
        <button
          type="button"
          onClick={() => void selectFolder(path)}
          disabled={busy || !path.trim()}
          className="flex items-center gap-1.5 rounded-lg bg-primary px-3 py-2 text-sm font-medium text-primary-foreground transition-colors hover:bg-indigo-600 disabled:cursor-not-allowed disabled:opacity-50"
        >
          {isScanning ? <Loader2 className="h-4 w-4 animate-spin" /> : <FolderOpen className="h-4 w-4" />}
          Folder
        </button>
        <button
          type="button"
          onClick={() => void selectImage(path)}
          disabled={busy || !path.trim()}
          className="flex items-center gap-1.5 rounded-lg border border-border px-3 py-2 text-sm font-medium transition-colors hover:bg-muted disabled:cursor-not-allowed disabled:opacity-50"
        >
          <ImageIcon className="h-4 w-4" />
          Image
        </button>
        <button
          type="button"
          onClick={() => {
            setPath("");
            clear();
          }}
          disabled={busy || (selection.images.length === 0 && !source)}
          className="flex items-center gap-1.5 rounded-lg px-3 py-2 text-sm font-medium text-muted-foreground transition-colors hover:bg-muted disabled:opacity-50"
        >
          <X className="h-4 w-4" />
          Clear
        </button>
      </div>

      {source && (
        <div className="rounded-lg border border-primary/20 bg-primary/5 px-4 py-3 text-sm">
          <p>
            <strong className="text-foreground">{selection.images.length}</strong>
            <span className="text-muted-foreground"> images to process from </span>
            <span className="font-mono text-xs" dir="ltr">{shortPath(source)}</span>
          </p>
          {skipped > 0 && (
            <p className="mt-1 text-xs text-muted-foreground">
              Skipped {selection.skippedDirectories} result folders and {selection.skippedFiles} result files
            </p>
          )}
        </div>
      )}

      {selection.alreadyProcessed.length > 0 && (
        <CollapsibleSection title="Already processed, not selected" count={selection.alreadyProcessed.length}>
          <ul className="max-h-40 space-y-1 overflow-y-auto">
            {selection.alreadyProcessed.map((item) => (
              <li key={item.sourcePath} className="flex items-center justify-between gap-2 text-xs">
                <span className="truncate font-mono" dir="ltr">{fileNameOf(item.sourcePath)}</span>
                <button type="button" onClick={() => onPreview(item.outputPath)} className="shrink-0 text-primary hover:underline">
                  View result
                </button>
              </li>
            ))}
          </ul>
        </CollapsibleSection>
      )}

      {selection.images.length > 0 && (
        <ul className="max-h-48 space-y-0.5 overflow-y-auto rounded-md border border-border p-2">
          {selection.images.map((image) => (
            <li key={image}>
              <button
                type="button"
                onClick={() => onPreview(image)}
                className="w-full truncate rounded px-1.5 py-0.5 text-start font-mono text-xs text-foreground hover:bg-muted"
                dir="ltr"
                title={image}
              >
                {shortPath(image)}
              </button>
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}

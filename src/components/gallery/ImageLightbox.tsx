"use client";

import { useEffect, useState } from "react";
import { X, ChevronLeft, ChevronRight, Loader2 } from "lucide-react";
import { fileNameOf, imageFileUrl } from "@/lib/format-utils";

export interface LightboxItem {
  sourcePath: string;
  outputPath?: string;
  caption?: string;
}

interface ImageLightboxProps {
  item: LightboxItem;
  onClose: () => void;
  onPrev?: () => void;
  onNext?: () => void;
}

function LightboxImage({ path, label }: { path: string; label: string }) {
  // Track which path is loaded to reset the spinner when navigating
  const [loadedPath, setLoadedPath] = useState("");
  const loaded = loadedPath === path;

  return (
    <figure className="flex min-w-0 flex-1 flex-col items-center">
      <div className="relative flex min-h-32 items-center justify-center">
        {!loaded && <Loader2 className="absolute h-8 w-8 animate-spin text-white" />}
        <img
          src={imageFileUrl(path)}
          alt={fileNameOf(path)}
          className={`max-h-[70vh] max-w-full rounded-lg object-contain transition-opacity duration-200 ${
            loaded ? "opacity-100" : "opacity-0"
          }`}
          onLoad={() => setLoadedPath(path)}
        />
      </div>
      <figcaption className="mt-2 text-xs text-white/70">
        {label}: <span className="font-mono" dir="ltr">{fileNameOf(path)}</span>
      </figcaption>
    </figure>
  );
}

/** Full-screen preview; shows the original beside its result when there is one. */
export function ImageLightbox({ item, onClose, onPrev, onNext }: ImageLightboxProps) {
  useEffect(() => {
    const handleKey = (e: KeyboardEvent) => {
      if (e.key === "Escape") onClose();
      if (e.key === "ArrowLeft") onPrev?.();
      if (e.key === "ArrowRight") onNext?.();
    };
    window.addEventListener("keydown", handleKey);
    return () => window.removeEventListener("keydown", handleKey);
  }, [onClose, onPrev, onNext]);

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-black/80 p-8" onClick={onClose}>
      <div className="relative flex max-h-full w-full max-w-6xl flex-col items-center" onClick={(e) => e.stopPropagation()}>
        <button
          onClick={onClose}
          aria-label="Close preview"
          className="absolute -top-6 right-0 rounded-full bg-white/10 p-2 text-white backdrop-blur-sm transition-colors hover:bg-white/20"
        >
          <X className="h-5 w-5" />
        </button>

        <div className="flex w-full items-start justify-center gap-4">
          <LightboxImage path={item.sourcePath} label="Original" />
          {item.outputPath && <LightboxImage path={item.outputPath} label="Result" />}
        </div>

        {item.caption && <p className="mt-3 max-w-3xl text-center text-sm text-white/80" dir="ltr">{item.caption}</p>}

        {onPrev && (
          <button
            onClick={onPrev}
            aria-label="Previous"
            className="absolute left-0 top-1/2 -translate-x-12 -translate-y-1/2 rounded-full bg-black/50 p-2.5 text-white backdrop-blur-sm transition-colors hover:bg-black/70"
          >
            <ChevronLeft className="h-5 w-5" />
          </button>
        )}
        {onNext && (
          <button
            onClick={onNext}
            aria-label="Next"
            className="absolute right-0 top-1/2 -translate-y-1/2 translate-x-12 rounded-full bg-black/50 p-2.5 text-white backdrop-blur-sm transition-colors hover:bg-black/70"
          >
            <ChevronRight className="h-5 w-5" />
          </button>
        )}
      </div>
    </div>
  );
}

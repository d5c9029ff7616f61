"use client";

import { useState, type ReactNode } from "react";
import { ChevronDown } from "lucide-react";

interface CollapsibleSectionProps {
  title: string;
  count?: number;
  tone?: "neutral" | "danger";
  defaultOpen?: boolean;
  children: ReactNode;
}

const toneClasses = {
  neutral: "border-border bg-muted/40 text-foreground",
  danger: "border-red-200 bg-red-50 text-destructive",
};

/** Inline disclosure for secondary lists (errors, skipped images). */
export function CollapsibleSection({ title, count, tone = "neutral", defaultOpen = false, children }: CollapsibleSectionProps) {
  const [open, setOpen] = useState(defaultOpen);

  return (
    <div className={`rounded-lg border p-3 ${toneClasses[tone]}`}>
      <button
        type="button"
        onClick={() => setOpen((v) => !v)}
        aria-expanded={open}
        className="flex w-full items-center gap-2 text-start text-xs font-medium"
      >
        <span className="flex-1">
          {title}
          {count !== undefined && <span className="ml-1 opacity-70">({count})</span>}
        </span>
        <ChevronDown className={`h-3.5 w-3.5 transition-transform duration-200 ${open ? "rotate-180" : ""}`} />
      </button>
      <div
        className={`grid transition-[grid-template-rows] duration-200 ease-in-out ${
          open ? "grid-rows-[1fr]" : "grid-rows-[0fr]"
        }`}
      >
        <div className="overflow-hidden">
          <div className="pt-2">{children}</div>
        </div>
      </div>
    </div>
  );
}

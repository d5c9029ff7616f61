"use client";

import type { ReactNode } from "react";

interface TooltipProps {
  /** Nothing is shown when empty */
  content?: string;
  children: ReactNode;
}

export function Tooltip({ content, children }: TooltipProps) {
  if (!content) return <>{children}</>;
  return (
    <span className="group/tooltip relative inline-flex">
      {children}
      <span
        role="tooltip"
        className="pointer-events-none absolute bottom-full left-1/2 z-50 mb-2 w-max max-w-[240px] -translate-x-1/2 rounded-lg bg-foreground px-3 py-2 text-center text-xs leading-relaxed text-primary-foreground opacity-0 shadow-lg transition-opacity duration-150 group-hover/tooltip:opacity-100"
      >
        {content}
      </span>
    </span>
  );
}

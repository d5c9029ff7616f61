"use client";

import type { ReactNode } from "react";

interface SectionCardProps {
  title?: string;
  subtitle?: string;
  icon?: ReactNode;
  children: ReactNode;
  className?: string;
  headerAction?: ReactNode;
  /** Dims the body and blocks input, e.g. while the API key is missing */
  disabled?: boolean;
}

export function SectionCard({ title, subtitle, icon, children, className, headerAction, disabled }: SectionCardProps) {
  return (
    <section
      aria-disabled={disabled || undefined}
      className={`rounded-xl border border-border/80 bg-card shadow-[var(--shadow-card)] ${className ?? ""}`}
    >
      {title && (
        <header className="flex items-center justify-between gap-3 border-b border-border/60 px-5 py-3.5">
          <div className="flex min-w-0 items-center gap-2">
            {icon && (
              <span className="flex h-6 w-6 shrink-0 items-center justify-center rounded-md bg-primary/10 text-primary">
                {icon}
              </span>
            )}
            <div className="min-w-0">
              <h2 className="text-sm font-semibold text-foreground">{title}</h2>
              {subtitle && <p className="mt-0.5 truncate text-xs text-muted-foreground">{subtitle}</p>}
            </div>
          </div>
          {headerAction}
        </header>
      )}
      <div className={`p-5 ${disabled ? "pointer-events-none select-none opacity-50" : ""}`}>{children}</div>
    </section>
  );
}

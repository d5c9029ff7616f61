"use client";

import { Info } from "lucide-react";
import { Tooltip } from "@/components/common/Tooltip";
import { useBatch } from "@/hooks/useBatch";
import { API_TIERS } from "@/lib/constants";

export function RunSettings() {
  const { state, dispatch } = useBatch();
  const { settings } = state;
  const locked = state.currentRun?.status === "running";

  return (
    <div className="flex flex-col gap-4">
      <div>
        <label className="mb-1.5 flex items-center gap-1.5 text-sm font-medium text-muted-foreground">
          API tier
          <Tooltip content="Sets the minimum time between two requests so the run stays inside your Gemini quota.">
            <Info className="h-3.5 w-3.5 cursor-help text-muted-foreground/50 hover:text-muted-foreground" />
          </Tooltip>
        </label>
        <div className="grid grid-cols-3 gap-2">
          {API_TIERS.map((tier) => (
            <button
              key={tier.id}
              type="button"
              disabled={locked}
              onClick={() => dispatch({ type: "SET_SETTINGS", settings: { tier: tier.id } })}
              className={`rounded-lg border px-3 py-2 text-sm transition-colors disabled:opacity-50 ${
                settings.tier === tier.id
                  ? "border-primary bg-primary/10 font-semibold text-primary"
                  : "border-border hover:border-primary/40"
              }`}
            >
              {tier.label}
              <span className="block text-[10px] text-muted-foreground">{tier.intervalMs / 1000}s apart</span>
            </button>
          ))}
        </div>
      </div>

      <div>
        <label htmlFor="output-dir" className="mb-1 block text-sm font-medium text-muted-foreground">
          Output folder
        </label>
        <input
          id="output-dir"
          type="text"
          dir="ltr"
          value={settings.outputDir}
          disabled={locked}
          onChange={(e) => dispatch({ type: "SET_SETTINGS", settings: { outputDir: e.target.value } })}
          placeholder="beside the folder (…_results)"
          className="w-full rounded-md border border-border bg-white px-3 py-2 font-mono text-sm placeholder:text-muted-foreground focus:border-primary focus:outline-none focus:ring-1 focus:ring-primary disabled:opacity-50"
        />
      </div>
    </div>
  );
}

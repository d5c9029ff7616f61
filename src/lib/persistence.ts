"use client";

import { get, set, del, keys } from "idb-keyval";
import type { RunSettings } from "@/context/batch-reducer";
import { isApiTier } from "@/lib/constants";
import type { BatchRun } from "@/types/batch";

const CURRENT_RUN_KEY = "ibs:currentRun";
const RUN_HISTORY_PREFIX = "ibs:run:";
const SETTINGS_KEY = "ibs:settings";

function isBatchRun(value: unknown): value is BatchRun {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "tasks" in value &&
    Array.isArray(value.tasks) &&
    "createdAt" in value &&
    typeof value.createdAt === "string"
  );
}

// --- Current Run ---

export async function saveCurrentRun(run: BatchRun): Promise<void> {
  await set(CURRENT_RUN_KEY, run);
}

export async function loadCurrentRun(): Promise<BatchRun | null> {
  const run: unknown = await get(CURRENT_RUN_KEY);
  return isBatchRun(run) ? run : null;
}

export async function clearCurrentRun(): Promise<void> {
  await del(CURRENT_RUN_KEY);
}

// --- Run History ---

export async function archiveRun(run: BatchRun): Promise<void> {
  await set(`${RUN_HISTORY_PREFIX}${run.id}`, run);
}

export async function loadRunHistory(): Promise<BatchRun[]> {
  const allKeys = await keys();
  const runKeys = allKeys.filter((k) => typeof k === "string" && k.startsWith(RUN_HISTORY_PREFIX));
  const runs: BatchRun[] = [];
  for (const key of runKeys) {
    const run: unknown = await get(key);
    if (isBatchRun(run)) runs.push(run);
  }
  return runs.sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());
}

export async function deleteRunFromHistory(runId: string): Promise<void> {
  await del(`${RUN_HISTORY_PREFIX}${runId}`);
}

// --- Settings ---

export async function saveSettings(settings: RunSettings): Promise<void> {
  await set(SETTINGS_KEY, settings);
}

export async function loadSettings(): Promise<Partial<RunSettings> | null> {
  const stored: unknown = await get(SETTINGS_KEY);
  if (typeof stored !== "object" || stored === null) return null;

  const settings: Partial<RunSettings> = {};
  if ("promptName" in stored && typeof stored.promptName === "string") settings.promptName = stored.promptName;
  if ("outputDir" in stored && typeof stored.outputDir === "string") settings.outputDir = stored.outputDir;
  if ("tier" in stored && isApiTier(stored.tier)) settings.tier = stored.tier;
  return settings;
}

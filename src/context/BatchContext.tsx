"use client";

import { createContext, useContext, useReducer, useEffect, useState, type ReactNode } from "react";
import { batchReducer, initialBatchState, type BatchAction, type BatchState } from "./batch-reducer";
import {
  saveCurrentRun,
  loadCurrentRun,
  clearCurrentRun,
  archiveRun,
  saveSettings,
  loadSettings,
} from "@/lib/persistence";

const BatchContext = createContext<{
  state: BatchState;
  dispatch: React.Dispatch<BatchAction>;
  hydrated: boolean;
} | null>(null);

function logStorageError(error: unknown) {
  console.warn("[persistence] IndexedDB write failed:", error);
}

export function BatchProvider({ children }: { children: ReactNode }) {
  const [state, dispatch] = useReducer(batchReducer, initialBatchState);
  const [hydrated, setHydrated] = useState(false);

  // Hydrate from IndexedDB on mount
  useEffect(() => {
    async function hydrate() {
      try {
        const [savedRun, savedSettings] = await Promise.all([loadCurrentRun(), loadSettings()]);
        dispatch({
          type: "HYDRATE",
          currentRun: savedRun,
          settings: savedSettings ?? undefined,
        });
      } catch (error) {
        console.warn("[persistence] IndexedDB not available, using defaults:", error);
      }
      setHydrated(true);
    }
    void hydrate();
  }, []);

  // Persist run state on changes (debounced), skip when viewing history
  useEffect(() => {
    if (!hydrated || state.viewingHistory) return;
    const timeout = setTimeout(() => {
      if (state.currentRun) {
        saveCurrentRun(state.currentRun).catch(logStorageError);
      } else {
        clearCurrentRun().catch(logStorageError);
      }
    }, 300);
    return () => clearTimeout(timeout);
  }, [state.currentRun, state.viewingHistory, hydrated]);

  useEffect(() => {
    if (!hydrated) return;
    saveSettings(state.settings).catch(logStorageError);
  }, [state.settings, hydrated]);

  // Archive finished runs to history
  const finishedRun =
    !state.viewingHistory && (state.currentRun?.status === "completed" || state.currentRun?.status === "cancelled")
      ? state.currentRun
      : null;
  useEffect(() => {
    if (!hydrated || !finishedRun) return;
    archiveRun(finishedRun).catch(logStorageError);
  }, [finishedRun, hydrated]);

  return (
    <BatchContext.Provider value={{ state, dispatch, hydrated }}>
      {children}
    </BatchContext.Provider>
  );
}

export function useBatchContext() {
  const context = useContext(BatchContext);
  if (!context) {
    throw new Error("useBatchContext must be used within a BatchProvider");
  }
  return context;
}

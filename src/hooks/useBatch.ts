"use client";

import { useMemo } from "react";
import { useBatchContext } from "@/context/BatchContext";
import { canStartRun, runSummary } from "@/context/batch-reducer";

export function useBatch() {
  const { state, dispatch, hydrated } = useBatchContext();
  const summary = useMemo(() => runSummary(state.currentRun), [state.currentRun]);
  const startCheck = useMemo(() => canStartRun(state), [state]);
  return { state, dispatch, hydrated, summary, startCheck };
}

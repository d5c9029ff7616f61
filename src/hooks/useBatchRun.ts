"use client";

import { useCallback, useEffect, useRef } from "react";
import { toast } from "sonner";
import { useBatchContext } from "@/context/BatchContext";
import { canStartRun, failedPaths } from "@/context/batch-reducer";
import { asRunSnapshot, errorFromResponse, postJson, requestJson } from "@/lib/api-client";
import { tierInterval } from "@/lib/constants";
import { describeSummary } from "@/lib/run-summary";
import { SSEParser } from "@/lib/sse";
import type { ImageTask, RunEvent, RunRequest } from "@/types/batch";
import { useRunKeepAlive } from "./useRunKeepAlive";

/**
 * Reads the run's SSE stream until it ends.
 * Returns true if a run_complete event was received (clean finish).
 */
async function processSSEStream(
  reader: ReadableStreamDefaultReader<Uint8Array>,
  onEvent: (event: RunEvent) => void
): Promise<boolean> {
  const decoder = new TextDecoder();
  const parser = new SSEParser();
  let receivedComplete = false;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    for (const event of parser.push(decoder.decode(value, { stream: true }))) {
      if (event.type === "run_complete") receivedComplete = true;
      onEvent(event);
    }
  }
  return receivedComplete;
}

function describe(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error";
}

export function useBatchRun() {
  const { state, dispatch, hydrated } = useBatchContext();
  const abortControllerRef = useRef<AbortController | null>(null);
  const runRef = useRef(state.currentRun);
  runRef.current = state.viewingHistory ? state.savedRun : state.currentRun;
  const isRunning = runRef.current?.status === "running";

  /** Pulls the server's view of the run; the server owns the truth. */
  const reconcileWithServer = useCallback(async () => {
    const local = runRef.current;
    try {
      const { run } = asRunSnapshot(await requestJson("/api/run"));
      if (run && (!local || run.id === local.id)) {
        dispatch({ type: "SET_RUN", run });
      } else if (local?.status === "running") {
        // The server restarted or never saw this run
        dispatch({
          type: "SET_RUN",
          run: {
            ...local,
            status: "cancelled",
            tasks: local.tasks.map((t): ImageTask => (t.status === "running" ? { ...t, status: "pending" } : t)),
          },
        });
      }
    } catch (error) {
      console.warn("[run] Could not reach the server to reconcile:", error);
    }
  }, [dispatch]);

  useRunKeepAlive(isRunning, () => {
    void reconcileWithServer();
  });

  // A run saved as "running" was cut off from its stream by a reload
  const reconciledRef = useRef(false);
  useEffect(() => {
    if (!hydrated || reconciledRef.current) return;
    reconciledRef.current = true;
    if (runRef.current?.status === "running") void reconcileWithServer();
  }, [hydrated, reconcileWithServer]);

  const handleEvent = useCallback(
    (event: RunEvent) => {
      dispatch({ type: "APPLY_EVENT", event });
      if (event.type === "run_complete") {
        const text = describeSummary(event.summary);
        if (event.status === "cancelled") {
          toast.warning("Run cancelled", { description: text });
        } else if (event.summary.failed > 0) {
          toast.warning("Run finished with errors", { description: text, duration: 10000 });
        } else {
          toast.success("Run complete", { description: text });
        }
      } else if (event.type === "run_error") {
        toast.error("Run failed", { description: event.error });
      }
    },
    [dispatch]
  );

  const startRun = useCallback(
    async (imagePaths: string[] = state.selection.images, sourceRoot: string | undefined = state.selection.root) => {
      const check = canStartRun(state, imagePaths.length);
      if (!check.ok) {
        toast.error(check.reason);
        return;
      }

      const { settings } = state;
      const request: RunRequest = {
        imagePaths,
        promptName: settings.promptName,
        promptText: state.promptText,
        outputDir: settings.outputDir.trim() || undefined,
        sourceRoot,
        requestIntervalMs: tierInterval(settings.tier),
      };

      const abortController = new AbortController();
      abortControllerRef.current = abortController;

      try {
        const response = await fetch("/api/run", {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(request),
          signal: abortController.signal,
        });
        if (!response.ok) throw await errorFromResponse(response);
        if (!response.body) throw new Error("Server sent no progress stream");

        const complete = await processSSEStream(response.body.getReader(), handleEvent);
        if (!complete) {
          await reconcileWithServer();
          toast.warning("Lost the connection to the server", {
            description: "Showing the last known state of the run.",
            duration: 10000,
          });
        }
      } catch (error) {
        if (error instanceof DOMException && error.name === "AbortError") {
          await reconcileWithServer();
        } else {
          toast.error("Could not start the run", { description: describe(error) });
          await reconcileWithServer();
        }
      } finally {
        abortControllerRef.current = null;
      }
    },
    [state, handleEvent, reconcileWithServer]
  );

  const cancelRun = useCallback(async () => {
    try {
      const result: unknown = await postJson("/api/run/cancel");
      const cancelled = typeof result === "object" && result !== null && "cancelled" in result && result.cancelled === true;
      if (cancelled) {
        toast.info("Stopping after the current image");
      } else {
        await reconcileWithServer();
      }
    } catch (error) {
      toast.error("Could not cancel", { description: describe(error) });
    }
  }, [reconcileWithServer]);

  const retryFailed = useCallback(async () => {
    const paths = failedPaths(state.currentRun);
    if (paths.length === 0) {
      toast.info("Nothing to retry");
      return;
    }
    // Same layout as the run being retried, so results land beside the first attempt's
    await startRun(paths, state.currentRun?.sourceRoot);
  }, [state.currentRun, startRun]);

  const newRun = useCallback(() => {
    dispatch({ type: "RESET_RUN" });
  }, [dispatch]);

  return {
    isRunning,
    startRun,
    cancelRun,
    retryFailed,
    newRun,
    reconcileWithServer,
  };
}

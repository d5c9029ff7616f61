"use client";

import { useCallback, useEffect } from "react";
import { useBatchContext } from "@/context/BatchContext";
import { asConfigStatus, requestJson } from "@/lib/api-client";

export function useConfigStatus() {
  const { state, dispatch } = useBatchContext();

  const refresh = useCallback(async () => {
    try {
      const config = asConfigStatus(await requestJson("/api/status"));
      dispatch({ type: "SET_CONFIG", config });
    } catch (error) {
      dispatch({
        type: "SET_CONFIG",
        config: { configured: false, error: error instanceof Error ? error.message : "Server not reachable" },
      });
    }
  }, [dispatch]);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  return { config: state.config, refresh };
}

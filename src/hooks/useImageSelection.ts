"use client";

import { useCallback, useState } from "react";
import { toast } from "sonner";
import { useBatchContext } from "@/context/BatchContext";
import { asImageSelection, postJson } from "@/lib/api-client";
import type { ImageSelection } from "@/types/selection";

export function useImageSelection() {
  const { state, dispatch } = useBatchContext();
  const [isScanning, setIsScanning] = useState(false);

  const scan = useCallback(
    async (source: string, body: { folderPath: string } | { filePaths: string[] }): Promise<ImageSelection | null> => {
      setIsScanning(true);
      try {
        const selection = asImageSelection(await postJson("/api/images/scan", body));
        dispatch({ type: "SET_SELECTION", selection, source });

        if (selection.images.length === 0 && selection.alreadyProcessed.length === 0) {
          toast.warning("No supported images found", { description: source });
        } else if (selection.alreadyProcessed.length > 0) {
          toast.info(`${selection.alreadyProcessed.length} images already processed`, {
            description: `${selection.images.length} left to process`,
          });
        }
        return selection;
      } catch (error) {
        toast.error("Could not load images", {
          description: error instanceof Error ? error.message : "Unknown error",
        });
        return null;
      } finally {
        setIsScanning(false);
      }
    },
    [dispatch]
  );

  const selectFolder = useCallback(
    (folderPath: string) => {
      // A blank path means the user backed out; keep the current selection
      if (!folderPath.trim()) return Promise.resolve(null);
      return scan(folderPath.trim(), { folderPath });
    },
    [scan]
  );

  const selectImage = useCallback(
    (filePath: string) => {
      if (!filePath.trim()) return Promise.resolve(null);
      return scan(filePath.trim(), { filePaths: [filePath] });
    },
    [scan]
  );

  const clear = useCallback(() => dispatch({ type: "CLEAR_SELECTION" }), [dispatch]);

  return {
    selection: state.selection,
    source: state.selectionSource,
    isScanning,
    selectFolder,
    selectImage,
    clear,
  };
}

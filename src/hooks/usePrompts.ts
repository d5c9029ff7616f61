"use client";

import { useState, useCallback, useEffect } from "react";
import { toast } from "sonner";
import { asPromptList, asRenderedPrompt, postJson, requestJson } from "@/lib/api-client";
import type { Prompt } from "@/types/prompt";

function describe(error: unknown) {
  return error instanceof Error ? error.message : "Unknown error";
}

export function usePrompts() {
  const [prompts, setPrompts] = useState<Prompt[]>([]);
  const [dirty, setDirty] = useState(false);
  const [isFetching, setIsFetching] = useState(false);
  const [isSaving, setIsSaving] = useState(false);
  const [isDeleting, setIsDeleting] = useState(false);

  const fetchPrompts = useCallback(async () => {
    setIsFetching(true);
    try {
      const data = asPromptList(await requestJson("/api/prompts"));
      setPrompts(data.prompts);
      setDirty(data.dirty);
    } catch (error) {
      toast.error("Could not load prompts", { description: describe(error) });
    } finally {
      setIsFetching(false);
    }
  }, []);

  useEffect(() => {
    void fetchPrompts();
  }, [fetchPrompts]);

  const savePrompt = useCallback(
    async (prompt: Prompt): Promise<boolean> => {
      setIsSaving(true);
      try {
        await postJson("/api/prompts", prompt);
        await fetchPrompts();
        return true;
      } catch (error) {
        toast.error(`Could not save prompt "${prompt.name}"`, { description: describe(error) });
        return false;
      } finally {
        setIsSaving(false);
      }
    },
    [fetchPrompts]
  );

  const deletePrompt = useCallback(
    async (name: string): Promise<boolean> => {
      setIsDeleting(true);
      try {
        await requestJson(`/api/prompts/${encodeURIComponent(name)}`, { method: "DELETE" });
        await fetchPrompts();
        return true;
      } catch (error) {
        toast.error(`Could not delete prompt "${name}"`, { description: describe(error) });
        return false;
      } finally {
        setIsDeleting(false);
      }
    },
    [fetchPrompts]
  );

  /** The text that would be sent for `name`, placeholders filled in. */
  const renderPrompt = useCallback(async (name: string): Promise<string | null> => {
    try {
      return asRenderedPrompt(await requestJson(`/api/prompts/${encodeURIComponent(name)}`)).rendered;
    } catch (error) {
      toast.error(`Could not load prompt "${name}"`, { description: describe(error) });
      return null;
    }
  }, []);

  const persistPrompts = useCallback(async (): Promise<boolean> => {
    setIsSaving(true);
    try {
      await postJson("/api/prompts/save");
      setDirty(false);
      toast.success("Prompts saved to file");
      return true;
    } catch (error) {
      toast.error("Could not write the prompts file", { description: describe(error) });
      return false;
    } finally {
      setIsSaving(false);
    }
  }, []);

  return {
    prompts,
    dirty,
    isFetching,
    isSaving,
    isDeleting,
    fetchPrompts,
    savePrompt,
    deletePrompt,
    renderPrompt,
    persistPrompts,
  };
}

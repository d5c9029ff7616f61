"use client";

import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { Eye, FileDown, Plus, Save, Trash2 } from "lucide-react";
import { ConfirmDialog } from "@/components/common/ConfirmDialog";
import { useBatch } from "@/hooks/useBatch";
import { usePrompts } from "@/hooks/usePrompts";

export function PromptEditor({ disabled }: { disabled?: boolean }) {
  const { state, dispatch } = useBatch();
  const { prompts, dirty, isSaving, isDeleting, savePrompt, deletePrompt, renderPrompt, persistPrompts } = usePrompts();
  const [newName, setNewName] = useState("");
  const [confirmDelete, setConfirmDelete] = useState(false);
  const [preview, setPreview] = useState<string | null>(null);

  const selected = useMemo(
    () => prompts.find((p) => p.name === state.settings.promptName) ?? null,
    [prompts, state.settings.promptName]
  );
  const edited = selected !== null && state.promptText !== selected.text;

  const selectPrompt = useCallback(
    (name: string) => {
      const prompt = prompts.find((p) => p.name === name);
      dispatch({ type: "SET_SETTINGS", settings: { promptName: name } });
      dispatch({ type: "SET_PROMPT_TEXT", text: prompt?.text ?? "" });
      setPreview(null);
    },
    [prompts, dispatch]
  );

  // Fill the editor once prompts arrive, falling back when the remembered prompt is gone
  const filledRef = useRef(false);
  useEffect(() => {
    if (prompts.length === 0 || filledRef.current) return;
    filledRef.current = true;
    if (!selected || !state.promptText) selectPrompt(selected ? selected.name : prompts[0].name);
  }, [prompts, selected, state.promptText, selectPrompt]);

  const handleSaveAs = async () => {
    const name = newName.trim();
    if (!name) return;
    const ok = await savePrompt({ name, text: state.promptText });
    if (ok) {
      setNewName("");
      dispatch({ type: "SET_SETTINGS", settings: { promptName: name } });
    }
  };

  const handleUpdate = async () => {
    if (!selected) return;
    await savePrompt({ ...selected, text: state.promptText });
  };

  const handleDelete = async () => {
    setConfirmDelete(false);
    if (!selected) return;
    const ok = await deletePrompt(selected.name);
    if (ok) {
      dispatch({ type: "SET_SETTINGS", settings: { promptName: "" } });
      dispatch({ type: "SET_PROMPT_TEXT", text: "" });
    }
  };

  const handlePreview = async () => {
    if (!selected) return;
    setPreview(edited ? null : await renderPrompt(selected.name));
  };

  return (
    <div className={`flex flex-col gap-3 ${disabled ? "pointer-events-none opacity-50" : ""}`}>
      <div className="flex items-end gap-2">
        <div className="flex-1">
          <label htmlFor="prompt-select" className="mb-1 block text-xs font-medium text-muted-foreground">
            Prompt
          </label>
          <select
            id="prompt-select"
            value={state.settings.promptName}
            onChange={(e) => selectPrompt(e.target.value)}
            className="w-full rounded-md border border-border bg-white px-3 py-2 text-sm focus:border-primary focus:outline-none focus:ring-1 focus:ring-primary"
          >
            {!selected && <option value={state.settings.promptName}>Select a prompt…</option>}
            {prompts.map((p) => (
              <option key={p.name} value={p.name}>
                {p.label ?? p.name}
              </option>
            ))}
          </select>
        </div>
        <button
          type="button"
          onClick={() => void handlePreview()}
          disabled={!selected || edited}
          title="Show the text sent to the model"
          className="rounded-md border border-border p-2 text-muted-foreground transition-colors hover:bg-muted disabled:opacity-40"
        >
          <Eye className="h-4 w-4" />
        </button>
      </div>

      {selected?.description && <p className="text-xs text-muted-foreground">{selected.description}</p>}

      <div>
        <div className="mb-1 flex items-center justify-between">
          <label htmlFor="prompt-text" className="text-sm font-medium text-foreground">
            Prompt text
          </label>
          {edited && (
            <span className="rounded-full bg-amber-100 px-2 py-0.5 text-xs font-medium text-amber-700">edited</span>
          )}
        </div>
        <textarea
          id="prompt-text"
          dir="ltr"
          value={state.promptText}
          onChange={(e) => {
            dispatch({ type: "SET_PROMPT_TEXT", text: e.target.value });
            setPreview(null);
          }}
          rows={7}
          className="w-full resize-y rounded-md border border-border bg-white px-3 py-2 font-mono text-sm text-foreground focus:border-primary focus:outline-none focus:ring-1 focus:ring-primary"
        />
        <p className="mt-1 text-xs text-muted-foreground">
          {"{image_description}"}, {"{scene_type}"} and other placeholders are filled in before sending.
        </p>
      </div>

      {preview && (
        <div className="rounded-md border border-dashed border-border bg-muted/50 px-3 py-2 font-mono text-xs text-muted-foreground" dir="ltr">
          {preview}
        </div>
      )}

      <div className="flex flex-wrap items-center gap-2">
        <input
          type="text"
          value={newName}
          onChange={(e) => setNewName(e.target.value)}
          placeholder="new prompt name"
          className="w-40 rounded-md border border-border bg-white px-2.5 py-1.5 text-xs focus:border-primary focus:outline-none"
        />
        <button
          type="button"
          onClick={() => void handleSaveAs()}
          disabled={isSaving || !newName.trim() || !state.promptText.trim()}
          className="flex items-center gap-1 rounded-md border border-border px-2.5 py-1.5 text-xs font-medium hover:bg-muted disabled:opacity-40"
        >
          <Plus className="h-3.5 w-3.5" />
          Save as
        </button>
        <button
          type="button"
          onClick={() => void handleUpdate()}
          disabled={isSaving || !edited || !state.promptText.trim()}
          className="flex items-center gap-1 rounded-md border border-border px-2.5 py-1.5 text-xs font-medium hover:bg-muted disabled:opacity-40"
        >
          <Save className="h-3.5 w-3.5" />
          Update
        </button>
        <button
          type="button"
          onClick={() => setConfirmDelete(true)}
          disabled={isDeleting || !selected}
          className="flex items-center gap-1 rounded-md px-2.5 py-1.5 text-xs font-medium text-destructive hover:bg-destructive/10 disabled:opacity-40"
        >
          <Trash2 className="h-3.5 w-3.5" />
          Delete
        </button>
        <button
          type="button"
          onClick={() => void persistPrompts()}
          disabled={isSaving || !dirty}
          className="ml-auto flex items-center gap-1 rounded-md bg-primary px-2.5 py-1.5 text-xs font-medium text-primary-foreground hover:bg-indigo-600 disabled:opacity-40"
        >
          <FileDown className="h-3.5 w-3.5" />
          Save to file
        </button>
      </div>

      <ConfirmDialog
        open={confirmDelete}
        title="Delete prompt"
        message={`Delete "${selected?.name ?? ""}"? The prompts file changes only when you save to file.`}
        confirmLabel="Delete"
        destructive
        onConfirm={() => void handleDelete()}
        onCancel={() => setConfirmDelete(false)}
      />
    </div>
  );
}

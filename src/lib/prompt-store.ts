import fs from "fs/promises";
import path from "path";
import { resolveDataPaths } from "@/lib/config";
import { DEFAULT_MAX_PROMPT_LENGTH, FALLBACK_PROMPTS, PROMPT_VARIABLE_DEFAULTS } from "@/lib/constants";
import { NotFoundError, SelectionError, errorMessage } from "@/lib/errors";
import type { Prompt, PromptFile, PromptSettings } from "@/types/prompt";

const DEFAULT_PROMPT_SETTINGS: PromptSettings = {
  optimize: true,
  maxLength: DEFAULT_MAX_PROMPT_LENGTH,
};

function isPrompt(value: unknown): value is Prompt {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "text" in value &&
    typeof value.text === "string"
  );
}

export function isPromptFile(value: unknown): value is PromptFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "prompts" in value &&
    Array.isArray(value.prompts) &&
    value.prompts.every(isPrompt)
  );
}

/** Fills `{name}` placeholders from `variables`, then from the built-in defaults. Unknown ones stay. */
export function renderTemplate(template: string, variables: Record<string, string> = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (Object.hasOwn(variables, key)) return variables[key];
    if (Object.hasOwn(PROMPT_VARIABLE_DEFAULTS, key)) return PROMPT_VARIABLE_DEFAULTS[key];
    return match;
  });
}

export function optimizePrompt(text: string, maxLength: number): string {
  let prompt = text.replace(/\s+/g, " ").trim();
  if (!prompt) return prompt;
  if (prompt.length > maxLength) {
    prompt = prompt.slice(0, Math.max(0, maxLength - 3)).trimEnd() + "...";
  }
  if (!/[.!?]$/.test(prompt)) prompt += ".";
  return prompt;
}

function normalizeSettings(settings: Partial<PromptSettings> | undefined): PromptSettings {
  const result = { ...DEFAULT_PROMPT_SETTINGS };
  if (typeof settings?.optimize === "boolean") result.optimize = settings.optimize;
  if (typeof settings?.maxLength === "number" && settings.maxLength > 3) result.maxLength = settings.maxLength;
  return result;
}

export class PromptStore {
  private prompts: Prompt[];
  private settings: PromptSettings;
  private dirty = false;

  constructor(
    readonly filePath: string,
    prompts: Prompt[],
    settings?: Partial<PromptSettings>
  ) {
    this.prompts = prompts.map((p) => ({ ...p }));
    this.settings = normalizeSettings(settings);
  }

  static async load(filePath: string): Promise<PromptStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch {
      console.warn(`[prompts] ${filePath} not found, using built-in prompts`);
      return new PromptStore(filePath, FALLBACK_PROMPTS);
    }

    try {
      const data: unknown = JSON.parse(raw);
      if (!isPromptFile(data)) {
        throw new Error("expected { prompts: [{ name, text }] }");
      }
      console.log(`[prompts] Loaded ${data.prompts.length} prompts from ${filePath}`);
      return new PromptStore(filePath, data.prompts, data.settings);
    } catch (error) {
      console.warn(`[prompts] Could not parse ${filePath} (${errorMessage(error)}), using built-in prompts`);
      return new PromptStore(filePath, FALLBACK_PROMPTS);
    }
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  getSettings(): PromptSettings {
    return { ...this.settings };
  }

  list(): Prompt[] {
    return this.prompts.map((p) => ({ ...p }));
  }

  get(name: string): Prompt {
    const prompt = this.prompts.find((p) => p.name === name);
    if (!prompt) throw new NotFoundError(`Prompt "${name}" not found`);
    return { ...prompt };
  }

  /** The text sent to the model for `name`. */
  render(name: string, variables?: Record<string, string>): string {
    return this.process(this.get(name).text, variables);
  }

  process(text: string, variables?: Record<string, string>): string {
    const rendered = renderTemplate(text, variables);
    return this.settings.optimize ? optimizePrompt(rendered, this.settings.maxLength) : rendered.trim();
  }

  upsert(prompt: Prompt): Prompt {
    const name = prompt.name.trim();
    if (!name) throw new SelectionError("Prompt name is required");
    if (!prompt.text.trim()) throw new SelectionError(`Prompt "${name}" has no text`);

    const next: Prompt = { ...prompt, name };
    const index = this.prompts.findIndex((p) => p.name === name);
    if (index === -1) {
      this.prompts.push(next);
    } else {
      this.prompts[index] = next;
    }
    this.dirty = true;
    return { ...next };
  }

  remove(name: string): boolean {
    const before = this.prompts.length;
    this.prompts = this.prompts.filter((p) => p.name !== name);
    const removed = this.prompts.length !== before;
    if (removed) this.dirty = true;
    return removed;
  }

  async save(): Promise<void> {
    const data: PromptFile = { prompts: this.prompts, settings: this.settings };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(data, null, 2) + "\n", "utf-8");
    this.dirty = false;
    console.log(`[prompts] Saved ${this.prompts.length} prompts to ${this.filePath}`);
  }
}

// --- Process-wide store, loaded on first use ---

let storePromise: Promise<PromptStore> | null = null;

export function getPromptStore(filePath: string = resolveDataPaths().promptsFile): Promise<PromptStore> {
  if (!storePromise) {
    storePromise = PromptStore.load(filePath);
  }
  return storePromise;
}

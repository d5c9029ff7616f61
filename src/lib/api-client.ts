import type { BatchRun } from "@/types/batch";
import type { Prompt, PromptSettings } from "@/types/prompt";
import type { ConfigStatus, ImageSelection } from "@/types/selection";

/** Error carrying the `{ error, kind }` body an API route answered with. */
export class ApiClientError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly kind?: string
  ) {
    super(message);
    this.name = "ApiClientError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export async function requestJson(url: string, init?: RequestInit): Promise<unknown> {
  const res = await fetch(url, init);
  if (!res.ok) throw await errorFromResponse(res);
  return res.json();
}

export function postJson(url: string, body?: unknown): Promise<unknown> {
  return requestJson(url, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

function unexpected(what: string): never {
  throw new ApiClientError(`Unexpected ${what} response from server`, 500);
}

// --- Response guards ---

export function asConfigStatus(body: unknown): ConfigStatus {
  if (!isRecord(body) || typeof body.configured !== "boolean") unexpected("status");
  return {
    configured: body.configured,
    ...(typeof body.model === "string" ? { model: body.model } : {}),
    ...(typeof body.error === "string" ? { error: body.error } : {}),
  };
}

export function asImageSelection(body: unknown): ImageSelection {
  if (
    !isRecord(body) ||
    !Array.isArray(body.images) ||
    !Array.isArray(body.alreadyProcessed) ||
    typeof body.skippedDirectories !== "number" ||
    typeof body.skippedFiles !== "number"
  ) {
    unexpected("scan");
  }
  return {
    images: body.images.filter((p): p is string => typeof p === "string"),
    ...(typeof body.root === "string" ? { root: body.root } : {}),
    alreadyProcessed: body.alreadyProcessed.filter(
      (p): p is ImageSelection["alreadyProcessed"][number] =>
        isRecord(p) && typeof p.sourcePath === "string" && typeof p.outputPath === "string"
    ),
    skippedDirectories: body.skippedDirectories,
    skippedFiles: body.skippedFiles,
  };
}

function isPrompt(value: unknown): value is Prompt {
  return isRecord(value) && typeof value.name === "string" && typeof value.text === "string";
}

export interface PromptListResponse {
  prompts: Prompt[];
  settings?: PromptSettings;
  dirty: boolean;
}

export function asPromptList(body: unknown): PromptListResponse {
  if (!isRecord(body) || !Array.isArray(body.prompts)) unexpected("prompts");
  const settings = body.settings;
  return {
    prompts: body.prompts.filter(isPrompt),
    dirty: body.dirty === true,
    ...(isRecord(settings) && typeof settings.optimize === "boolean" && typeof settings.maxLength === "number"
      ? { settings: { optimize: settings.optimize, maxLength: settings.maxLength } }
      : {}),
  };
}

export function asRenderedPrompt(body: unknown): { prompt: Prompt; rendered: string } {
  if (!isRecord(body) || !isPrompt(body.prompt) || typeof body.rendered !== "string") unexpected("prompt");
  return { prompt: body.prompt, rendered: body.rendered };
}

function isBatchRun(value: unknown): value is BatchRun {
  return isRecord(value) && typeof value.id === "string" && typeof value.status === "string" && Array.isArray(value.tasks);
}

export function asRunSnapshot(body: unknown): { run: BatchRun | null; active: boolean } {
  if (!isRecord(body)) unexpected("run");
  return { run: isBatchRun(body.run) ? body.run : null, active: body.active === true };
}

/** For streaming endpoints, where the body cannot go through `requestJson`. */
export async function errorFromResponse(res: Response): Promise<ApiClientError> {
  const body: unknown = await res.json().catch(() => null);
  const message = isRecord(body) && typeof body.error === "string" ? body.error : `Server error: ${res.status}`;
  return new ApiClientError(message, res.status, isRecord(body) && typeof body.kind === "string" ? body.kind : undefined);
}

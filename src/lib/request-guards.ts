import { SelectionError } from "@/lib/errors";
import type { RunRequest } from "@/types/batch";
import type { Prompt } from "@/types/prompt";

export type ScanRequest = { folderPath: string } | { filePaths: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new SelectionError(`"${key}" must be a string`);
  return value;
}

export function parseScanRequest(body: unknown): ScanRequest {
  if (isRecord(body)) {
    if (typeof body.folderPath === "string") return { folderPath: body.folderPath };
    if (isStringArray(body.filePaths)) return { filePaths: body.filePaths };
  }
  throw new SelectionError('Expected { folderPath } or { filePaths: [...] }');
}

export function parsePromptBody(body: unknown): Prompt {
  if (!isRecord(body) || typeof body.name !== "string" || typeof body.text !== "string") {
    throw new SelectionError("Expected { name, text }");
  }
  const label = optionalString(body, "label");
  const description = optionalString(body, "description");
  return {
    name: body.name,
    text: body.text,
    ...(label ? { label } : {}),
    ...(description ? { description } : {}),
  };
}

export function parseRunRequest(body: unknown): RunRequest {
  if (!isRecord(body)) throw new SelectionError("Expected a run request object");
  if (!isStringArray(body.imagePaths)) throw new SelectionError('"imagePaths" must be a list of paths');
  if (typeof body.promptName !== "string" || !body.promptName.trim()) {
    throw new SelectionError("No prompt selected");
  }

  let variables: Record<string, string> | undefined;
  if (body.variables !== undefined) {
    if (!isRecord(body.variables)) throw new SelectionError('"variables" must be an object');
    variables = Object.fromEntries(
      Object.entries(body.variables).filter((entry): entry is [string, string] => typeof entry[1] === "string")
    );
  }

  let requestIntervalMs: number | undefined;
  if (typeof body.requestIntervalMs === "number" && Number.isFinite(body.requestIntervalMs)) {
    requestIntervalMs = Math.max(0, body.requestIntervalMs);
  }

  return {
    imagePaths: body.imagePaths,
    promptName: body.promptName,
    promptText: optionalString(body, "promptText"),
    variables,
    outputDir: optionalString(body, "outputDir"),
    sourceRoot: optionalString(body, "sourceRoot"),
    requestIntervalMs,
    name: optionalString(body, "name"),
  };
}

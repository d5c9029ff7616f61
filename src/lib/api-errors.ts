import { NextResponse } from "next/server";
import { AppError, SelectionError, errorMessage } from "@/lib/errors";
import type { ErrorKind } from "@/types/batch";

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  configuration: 503,
  selection: 400,
  not_found: 404,
  run_conflict: 409,
};

export function statusForError(error: unknown): number {
  return error instanceof AppError ? (STATUS_BY_KIND[error.kind] ?? 500) : 500;
}

export function errorResponse(error: unknown, fallback = "Request failed") {
  const status = statusForError(error);
  if (status >= 500 && !(error instanceof AppError && error.kind === "configuration")) {
    console.error(`[api] ${fallback}:`, error);
  }
  return NextResponse.json(
    { error: errorMessage(error, fallback), ...(error instanceof AppError ? { kind: error.kind } : {}) },
    { status }
  );
}

/** Reads a JSON body, turning a malformed one into a 400. */
export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new SelectionError("Request body must be JSON");
  }
}

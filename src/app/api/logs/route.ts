import { NextRequest, NextResponse } from "next/server";
import { errorResponse } from "@/lib/api-errors";
import { resolveDataPaths } from "@/lib/config";
import { SelectionError } from "@/lib/errors";
import { readLogs } from "@/lib/file-utils";

export async function GET(request: NextRequest) {
  try {
    const { searchParams } = new URL(request.url);
    const date = searchParams.get("date") ?? new Date().toISOString().slice(0, 10);
    const runId = searchParams.get("runId") ?? undefined;
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      throw new SelectionError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }

    const logs = await readLogs(resolveDataPaths().logsDir, date, runId);
    return NextResponse.json(logs);
  } catch (error) {
    return errorResponse(error, "Failed to read logs");
  }
}

import { NextRequest, NextResponse } from "next/server";
import { errorResponse, readJson } from "@/lib/api-errors";
import { BatchRunner } from "@/lib/batch-runner";
import { getConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { getPromptStore } from "@/lib/prompt-store";
import { getTransformer } from "@/lib/providers";
import { parseRunRequest } from "@/lib/request-guards";
import { getRunRegistry } from "@/lib/run-registry";
import { encodeEvent } from "@/lib/sse";
import type { BatchRun, RunEvent } from "@/types/batch";

export const dynamic = "force-dynamic";

export async function POST(request: NextRequest) {
  let runner: BatchRunner;
  try {
    const config = getConfig();
    const body = parseRunRequest(await readJson(request));
    const store = await getPromptStore();
    const promptText = body.promptText?.trim()
      ? store.process(body.promptText, body.variables)
      : store.render(body.promptName, body.variables);

    runner = new BatchRunner(
      {
        imagePaths: body.imagePaths,
        promptName: body.promptName,
        promptText,
        outputDir: body.outputDir,
        sourceRoot: body.sourceRoot,
        name: body.name,
      },
      {
        transformer: getTransformer(config),
        model: config.model,
        timeoutMs: config.requestTimeoutMs,
        outputSuffix: config.outputSuffix,
        requestIntervalMs: body.requestIntervalMs,
        logsDir: config.logsDir,
      }
    );
  } catch (error) {
    return errorResponse(error, "Failed to start run");
  }

  const encoder = new TextEncoder();
  let closed = false;
  let unsubscribe = () => {};
  let finish: (error?: unknown) => void = () => {};

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      const send = (event: RunEvent) => {
        if (closed) return;
        try {
          controller.enqueue(encoder.encode(encodeEvent(event)));
        } catch {
          closed = true;
        }
      };
      const close = () => {
        if (closed) return;
        closed = true;
        controller.close();
      };

      unsubscribe = runner.subscribe(send);
      finish = (error?: unknown) => {
        unsubscribe();
        if (error !== undefined) send({ type: "run_error", error: errorMessage(error, "Run failed") });
        close();
      };
    },
    cancel() {
      // Page went away: stop after the current image
      closed = true;
      unsubscribe();
      runner.cancel();
    },
  });

  let execution: Promise<BatchRun>;
  try {
    execution = getRunRegistry().start(runner);
  } catch (error) {
    unsubscribe();
    return errorResponse(error, "Failed to start run");
  }

  request.signal.addEventListener("abort", () => runner.cancel(), { once: true });
  void execution.then(
    () => finish(),
    (error: unknown) => {
      console.error(`[run] Run ${runner.id} failed:`, error);
      finish(error);
    }
  );

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
    },
  });
}

export async function GET() {
  const registry = getRunRegistry();
  return NextResponse.json({ run: registry.current(), active: registry.activeRun !== null });
}

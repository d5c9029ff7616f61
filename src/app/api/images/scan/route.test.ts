import { NextRequest } from "next/server";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetConfig } from "@/lib/config";
import { scanFolder, selectFiles } from "@/lib/image-selector";
import { POST } from "./route";

vi.mock("@/lib/image-selector");

function scanRequest(body: unknown): NextRequest {
  return new NextRequest("http://localhost/api/images/scan", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("POST /api/images/scan", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.stubEnv("GEMINI_API_KEY", "");
    vi.stubEnv("GEMINI_TIMEOUT_MS", "");
    vi.stubEnv("OUTPUT_SUFFIX", "");
    resetConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.mocked(scanFolder).mockReset();
    vi.mocked(selectFiles).mockReset();
    resetConfig();
  });

  it("refuses to select images without an API key", async () => {
    vi.stubEnv("GOOGLE_API_KEY", "");

    const response = await POST(scanRequest({ folderPath: "/photos" }));

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      error: "GOOGLE_API_KEY environment variable not configured. Add it to .env.local and restart.",
      kind: "configuration",
    });
    expect(scanFolder).not.toHaveBeenCalled();
  });

  it("scans the folder with the configured suffix", async () => {
    vi.stubEnv("GOOGLE_API_KEY", "test-secret");
    const selection = { images: ["/photos/a.jpg"], alreadyProcessed: [], skippedDirectories: 0, skippedFiles: 0 };
    vi.mocked(scanFolder).mockResolvedValue(selection);

    const response = await POST(scanRequest({ folderPath: "/photos" }));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(selection);
    expect(vi.mocked(scanFolder).mock.calls[0][0]).toBe("/photos");
    expect(vi.mocked(scanFolder).mock.calls[0][1]).toMatchObject({ outputSuffix: "_out" });
  });

  it("answers 400 for a malformed request", async () => {
    vi.stubEnv("GOOGLE_API_KEY", "test-secret");

    const response = await POST(scanRequest({ nothing: true }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Expected { folderPath } or { filePaths: [...] }",
      kind: "selection",
    });
    expect(selectFiles).not.toHaveBeenCalled();
  });
});

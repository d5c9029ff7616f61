import { NextRequest, NextResponse } from "next/server";
import { errorResponse, readJson } from "@/lib/api-errors";
import { getConfig } from "@/lib/config";
import { scanFolder, selectFiles } from "@/lib/image-selector";
import { parseScanRequest } from "@/lib/request-guards";

export async function POST(request: NextRequest) {
  try {
    // No selection without a usable configuration
    const config = getConfig();
    const scan = parseScanRequest(await readJson(request));

    const selection =
      "folderPath" in scan
        ? await scanFolder(scan.folderPath, { outputSuffix: config.outputSuffix, signal: request.signal })
        : await selectFiles(scan.filePaths);

    console.log(
      `[images/scan] ${selection.images.length} to process, ${selection.alreadyProcessed.length} already processed`
    );
    return NextResponse.json(selection);
  } catch (error) {
    return errorResponse(error, "Failed to scan images");
  }
}

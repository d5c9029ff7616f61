import fs from "fs/promises";
import path from "path";
import { NextRequest, NextResponse } from "next/server";
import { isSupportedImage, mimeTypeForPath } from "@/lib/image-utils";

export async function GET(request: NextRequest) {
  const filePath = request.nextUrl.searchParams.get("path");
  if (!filePath) {
    return NextResponse.json({ error: "Missing path param", kind: "selection" }, { status: 400 });
  }

  const resolved = path.resolve(filePath);
  if (!isSupportedImage(resolved)) {
    return NextResponse.json({ error: "Not a supported image", kind: "selection" }, { status: 400 });
  }

  try {
    const buffer = await fs.readFile(resolved);
    return new Response(new Uint8Array(buffer), {
      headers: {
        "Content-Type": mimeTypeForPath(resolved),
        "Cache-Control": "no-cache",
      },
    });
  } catch {
    return NextResponse.json({ error: `Image not found: ${resolved}`, kind: "not_found" }, { status: 404 });
  }
}

import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/api-errors";
import { getPromptStore } from "@/lib/prompt-store";

export async function POST() {
  try {
    const store = await getPromptStore();
    await store.save();
    return NextResponse.json({ success: true, count: store.list().length, file: store.filePath });
  } catch (error) {
    return errorResponse(error, "Failed to save prompts file");
  }
}

import { NextRequest, NextResponse } from "next/server";
import { errorResponse, readJson } from "@/lib/api-errors";
import { getPromptStore } from "@/lib/prompt-store";
import { parsePromptBody } from "@/lib/request-guards";

export async function GET() {
  try {
    const store = await getPromptStore();
    return NextResponse.json({ prompts: store.list(), settings: store.getSettings(), dirty: store.isDirty });
  } catch (error) {
    return errorResponse(error, "Failed to list prompts");
  }
}

export async function POST(request: NextRequest) {
  try {
    const prompt = parsePromptBody(await readJson(request));
    const store = await getPromptStore();
    const saved = store.upsert(prompt);
    return NextResponse.json({ prompt: saved, dirty: store.isDirty });
  } catch (error) {
    return errorResponse(error, "Failed to save prompt");
  }
}

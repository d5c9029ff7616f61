import { NextResponse } from "next/server";
import { getRunRegistry } from "@/lib/run-registry";

export async function POST() {
  const cancelled = getRunRegistry().cancel();
  return NextResponse.json({ cancelled });
}

export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { getConfigStatus } = await import("@/lib/config");
  const status = getConfigStatus();
  if (status.configured) {
    console.log(`[config] Gemini model ${status.model}`);
  } else {
    console.error(`[config] ${status.error}`);
  }
}

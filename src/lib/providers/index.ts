import type { AppConfig } from "@/lib/config";
import { GeminiProvider } from "./gemini-provider";
import type { ImageTransformer } from "./types";

let transformer: { apiKey: string; instance: ImageTransformer } | null = null;

export function getTransformer(config: Pick<AppConfig, "apiKey" | "model">): ImageTransformer {
  if (!transformer || transformer.apiKey !== config.apiKey) {
    transformer = { apiKey: config.apiKey, instance: new GeminiProvider(config) };
  }
  return transformer.instance;
}

export { GeminiProvider } from "./gemini-provider";
export type { ImageTransformer, TransformInput, TransformResult } from "./types";

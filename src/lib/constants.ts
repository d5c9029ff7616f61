import type { Prompt } from "@/types/prompt";

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".bmp", ".tiff", ".tif", ".webp"] as const;

// Extensions a previous run may have written a result with
export const RESULT_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp"] as const;

export const RESULTS_DIR_SUFFIX = "_results";
export const RESULTS_DIR_NAME = "results";

// Gemini config
export const GEMINI_MODEL = "gemini-2.5-flash-image";
export const DEFAULT_TIMEOUT_MS = 120000;
export const DEFAULT_OUTPUT_SUFFIX = "_out";

export const DEFAULT_MAX_PROMPT_LENGTH = 500;

// Request pacing per API tier (ms between request starts)
export const API_TIERS = [
  { id: "free", label: "Free", intervalMs: 6000 },
  { id: "tier1", label: "Tier 1", intervalMs: 2000 },
  { id: "tier3", label: "Tier 3", intervalMs: 1000 },
] as const;

export type ApiTier = (typeof API_TIERS)[number]["id"];

export function tierInterval(tier: ApiTier): number {
  return API_TIERS.find((t) => t.id === tier)?.intervalMs ?? API_TIERS[0].intervalMs;
}

export function isApiTier(value: unknown): value is ApiTier {
  return API_TIERS.some((t) => t.id === value);
}

// Filled in for {placeholders} the caller did not supply
export const PROMPT_VARIABLE_DEFAULTS: Record<string, string> = {
  image_description: "an outdoor scene with sky and foreground objects",
  scene_type: "outdoor scene",
  preservation_focus: "buildings and natural elements",
  removal_intensity: "moderate",
};

// Used when data/prompts.json is missing or unreadable
export const FALLBACK_PROMPTS: Prompt[] = [
  {
    name: "default",
    label: "Default Sky Removal",
    description: "Sky replaced with solid black for photogrammetry masking",
    text: "Remove the sky and clouds from this image and replace them with solid black background. This is for photogrammetric processing and 3D reconstruction. Preserve all buildings, trees, people, vehicles, and ground-level objects completely intact. Set sky areas to pure black (RGB 0,0,0) for clean masking.",
  },
  {
    name: "conservative",
    label: "Conservative Mode",
    description: "Minimal sky removal",
    text: "Carefully remove only the sky from this image, keeping all foreground elements intact. Replace the sky with transparency while maintaining the original lighting and color balance.",
  },
];

import {
  GoogleGenAI,
  Modality,
  type GenerateContentParameters,
  type GenerateContentResponse,
} from "@google/genai";
import {
  ApiRequestError,
  AuthError,
  InvalidResponseError,
  PerItemError,
  RateLimitError,
  TransientNetworkError,
  errorMessage,
} from "@/lib/errors";
import { detectImageMimeType } from "@/lib/image-utils";
import type { ImageTransformer, TransformInput, TransformResult } from "./types";

/** The slice of `GoogleGenAI#models` this provider calls. */
export interface GenerateContentClient {
  generateContent(
    params: GenerateContentParameters
  ): Promise<Pick<GenerateContentResponse, "candidates" | "promptFeedback">>;
}

export interface GeminiProviderOptions {
  apiKey: string;
  model: string;
}

const NETWORK_ERROR_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);

function readNumber(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
}

function readString(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

/** Maps an SDK / fetch failure onto the per-item error taxonomy. */
export function classifyGeminiError(error: unknown): PerItemError {
  if (error instanceof PerItemError) return error;

  const message = errorMessage(error, "Gemini request failed");
  const options = { cause: error };
  const lower = message.toLowerCase();
  const status = typeof error === "object" && error !== null ? readNumber(error, "status") : undefined;
  const name = error instanceof Error ? error.name : "";
  const code =
    error instanceof Error && typeof error.cause === "object" && error.cause !== null
      ? readString(error.cause, "code")
      : undefined;

  if (status === 429 || /rate limit|quota|resource_exhausted|\b429\b/.test(lower)) {
    return new RateLimitError(`Gemini rate limit exceeded: ${message}`, options);
  }
  if (status === 401 || status === 403 || /api key not valid|api_key_invalid|permission_denied|unauthenticated/.test(lower)) {
    return new AuthError(`Gemini rejected the API key: ${message}`, options);
  }
  if (status !== undefined && status >= 500) {
    return new TransientNetworkError(`Gemini service error (${status}): ${message}`, options);
  }
  if (status !== undefined) {
    return new ApiRequestError(`Gemini rejected the request (${status}): ${message}`, options);
  }
  if (
    name === "AbortError" ||
    name === "TimeoutError" ||
    (code !== undefined && NETWORK_ERROR_CODES.has(code)) ||
    /fetch failed|network|timed? ?out|socket/.test(lower)
  ) {
    return new TransientNetworkError(`Network error talking to Gemini: ${message}`, options);
  }
  return new ApiRequestError(message, options);
}

/** Pulls the first inline image out of a response, validating that the bytes really are an image. */
export function extractImage(
  response: Pick<GenerateContentResponse, "candidates" | "promptFeedback">
): TransformResult {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  const text = parts
    .map((part) => part.text ?? "")
    .join("")
    .trim();

  const imagePart = parts.find((part) => part.inlineData?.data);
  const data = imagePart?.inlineData?.data;
  if (!data) {
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new InvalidResponseError(`Gemini blocked the request (${blockReason})`);
    }
    const finishReason = response.candidates?.[0]?.finishReason;
    const detail = text || (finishReason ? `finish reason ${finishReason}` : "empty response");
    throw new InvalidResponseError(`Gemini returned no image: ${detail}`);
  }

  const image = Buffer.from(data, "base64");
  const mimeType = detectImageMimeType(image);
  if (!mimeType) {
    throw new InvalidResponseError(
      `Gemini returned ${image.length} bytes of ${imagePart?.inlineData?.mimeType ?? "unknown type"} that are not a decodable image`
    );
  }

  return { image, mimeType, ...(text ? { text } : {}) };
}

export class GeminiProvider implements ImageTransformer {
  private client: GenerateContentClient;

  constructor(
    private readonly options: GeminiProviderOptions,
    client?: GenerateContentClient
  ) {
    this.client = client ?? new GoogleGenAI({ apiKey: options.apiKey }).models;
  }

  async transform(input: TransformInput): Promise<TransformResult> {
    if (!this.options.apiKey) {
      throw new AuthError("No Gemini API key configured");
    }

    let response: Pick<GenerateContentResponse, "candidates" | "promptFeedback">;
    try {
      response = await this.client.generateContent({
        model: this.options.model,
        contents: [
          {
            role: "user",
            parts: [
              { text: input.prompt },
              { inlineData: { mimeType: input.mimeType, data: input.image.toString("base64") } },
            ],
          },
        ],
        config: {
          responseModalities: [Modality.IMAGE, Modality.TEXT],
          httpOptions: { timeout: input.timeoutMs },
        },
      });
    } catch (error) {
      throw classifyGeminiError(error);
    }

    return extractImage(response);
  }
}

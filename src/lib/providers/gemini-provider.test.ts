import type { GenerateContentParameters } from "@google/genai";
import { describe, expect, it } from "vitest";
import { AuthError, InvalidResponseError, RateLimitError, TransientNetworkError } from "@/lib/errors";
import { GeminiProvider, classifyGeminiError, extractImage, type GenerateContentClient } from "./gemini-provider";

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00]);

function withStatus(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("classifyGeminiError", () => {
  it("maps HTTP statuses onto error kinds", () => {
    const limited = classifyGeminiError(withStatus("Too many requests", 429));
    expect(limited).toBeInstanceOf(RateLimitError);
    expect(limited.message).toBe("Gemini rate limit exceeded: Too many requests");

    expect(classifyGeminiError(withStatus("denied", 403)).kind).toBe("auth");
    expect(classifyGeminiError(withStatus("x", 503)).message).toBe("Gemini service error (503): x");
    expect(classifyGeminiError(withStatus("bad", 400)).kind).toBe("api");
  });

  it("recognises failures from the message alone", () => {
    expect(classifyGeminiError(new Error("RESOURCE_EXHAUSTED: quota")).kind).toBe("rate_limit");
    expect(classifyGeminiError(new Error("API key not valid")).kind).toBe("auth");
    expect(classifyGeminiError(new TypeError("fetch failed"))).toBeInstanceOf(TransientNetworkError);
    expect(classifyGeminiError("weird").message).toBe("weird");
  });

  it("passes per-item errors through", () => {
    const error = new AuthError("no key");
    expect(classifyGeminiError(error)).toBe(error);
  });
});

describe("extractImage", () => {
  it("returns the image with any accompanying text", () => {
    const result = extractImage({
      candidates: [
        {
          content: {
            parts: [{ text: "Sky removed." }, { inlineData: { mimeType: "image/png", data: PNG_BYTES.toString("base64") } }],
          },
        },
      ],
    });
    expect(result.mimeType).toBe("image/png");
    expect(result.image.equals(PNG_BYTES)).toBe(true);
    expect(result.text).toBe("Sky removed.");
  });

  it("reports the model's text when no image came back", () => {
    expect(() => extractImage({ candidates: [{ content: { parts: [{ text: "I cannot do that" }] } }] })).toThrow(
      "Gemini returned no image: I cannot do that"
    );
    expect(() => extractImage({ candidates: [] })).toThrow("Gemini returned no image: empty response");
  });

  it("rejects bytes that are not an image", () => {
    const data = Buffer.from("hello").toString("base64");
    expect(() => extractImage({ candidates: [{ content: { parts: [{ inlineData: { mimeType: "image/png", data } }] } }] })).toThrow(
      new InvalidResponseError("Gemini returned 5 bytes of image/png that are not a decodable image")
    );
  });
});

describe("GeminiProvider", () => {
  function fakeClient(respond: () => ReturnType<GenerateContentClient["generateContent"]>) {
    const calls: GenerateContentParameters[] = [];
    const client: GenerateContentClient = {
      generateContent(params) {
        calls.push(params);
        return respond();
      },
    };
    return { client, calls };
  }

  it("sends the prompt and image and returns the result", async () => {
    const { client, calls } = fakeClient(async () => ({
      candidates: [{ content: { parts: [{ inlineData: { mimeType: "image/png", data: PNG_BYTES.toString("base64") } }] } }],
    }));
    const provider = new GeminiProvider({ apiKey: "test-secret", model: "test-model" }, client);

    const result = await provider.transform({
      image: Buffer.from([0xff, 0xd8, 0xff, 0xe0]),
      mimeType: "image/jpeg",
      prompt: "Remove the sky.",
      timeoutMs: 5000,
    });

    expect(result.mimeType).toBe("image/png");
    expect(calls).toHaveLength(1);
    expect(calls[0]).toMatchObject({
      model: "test-model",
      contents: [
        {
          role: "user",
          parts: [{ text: "Remove the sky." }, { inlineData: { mimeType: "image/jpeg", data: "/9j/4A==" } }],
        },
      ],
      config: { httpOptions: { timeout: 5000 } },
    });
  });

  it("classifies request failures", async () => {
    const { client } = fakeClient(() => Promise.reject(withStatus("Too many requests", 429)));
    const provider = new GeminiProvider({ apiKey: "test-secret", model: "test-model" }, client);

    await expect(
      provider.transform({ image: PNG_BYTES, mimeType: "image/png", prompt: "p", timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(RateLimitError);
  });

  it("refuses to run without an API key", async () => {
    const { client, calls } = fakeClient(async () => ({ candidates: [] }));
    const provider = new GeminiProvider({ apiKey: "", model: "test-model" }, client);

    await expect(
      provider.transform({ image: PNG_BYTES, mimeType: "image/png", prompt: "p", timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(AuthError);
    expect(calls).toHaveLength(0);
  });
});

import { GenerateContentResponse, Modality, type GenerateContentParameters } from "@google/genai";
import { describe, expect, it, vi } from "vitest";
import { extractImage } from "../src/pipeline/image_generator.js";
import { GeminiImageGenerator } from "../src/pipeline/image_model.js";

describe("GeminiImageGenerator", () => {
  it("requests an image modality and hands back the raw response", async () => {
    const sdkResponse = Object.assign(new GenerateContentResponse(), {
      candidates: [{ content: { role: "model", parts: [{ inlineData: { data: "AQID", mimeType: "image/webp" } }] } }]
    });
    const generateContent = vi.fn(async (_params: GenerateContentParameters) => sdkResponse);
    const generator = new GeminiImageGenerator({ model: "test-image-model", generateContent });
    const signal = new AbortController().signal;

    const result = await generator.generateImage({ prompt: "Arclight over the harbor.", signal });

    expect(generateContent).toHaveBeenCalledWith({
      model: "test-image-model",
      contents: "Arclight over the harbor.",
      config: { responseModalities: [Modality.IMAGE], abortSignal: signal }
    });
    expect(result.model).toBe("test-image-model");
    expect(result.response).toBe(sdkResponse);

    const image = extractImage(result.response);
    expect(image?.mimeType).toBe("image/webp");
    expect([...(image?.bytes ?? [])]).toEqual([1, 2, 3]);
  });

  it("propagates SDK failures to the caller", async () => {
    const generateContent = vi.fn(async (_params: GenerateContentParameters): Promise<GenerateContentResponse> => {
      throw new Error("PERMISSION_DENIED");
    });
    const generator = new GeminiImageGenerator({ model: "test-image-model", generateContent });
    await expect(generator.generateImage({ prompt: "p" })).rejects.toThrow("PERMISSION_DENIED");
  });
});

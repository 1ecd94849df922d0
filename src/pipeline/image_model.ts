import { GoogleGenAI, Modality } from "@google/genai";
import type { GenerativeCapability, ImageGenerationRequest, ImageGenerationResult } from "./generative.js";

type GenerateContent = GoogleGenAI["models"]["generateContent"];

export type GeminiImageGeneratorOptions = {
  model: string;
  apiKey?: string;
  /** Injected in tests; defaults to a client built from `apiKey`. */
  generateContent?: GenerateContent;
};

export class GeminiImageGenerator implements Pick<GenerativeCapability, "generateImage"> {
  private readonly model: string;
  private readonly generateContent: GenerateContent;

  constructor(options: GeminiImageGeneratorOptions) {
    this.model = options.model;
    if (options.generateContent) {
      this.generateContent = options.generateContent;
    } else {
      const client = new GoogleGenAI({ apiKey: options.apiKey });
      this.generateContent = (params) => client.models.generateContent(params);
    }
  }

  async generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    const response = await this.generateContent({
      model: this.model,
      contents: request.prompt,
      config: {
        responseModalities: [Modality.IMAGE],
        abortSignal: request.signal
      }
    });
    return { model: this.model, response };
  }
}

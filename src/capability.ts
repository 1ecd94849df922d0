import type { AppConfig } from "./config.js";
import { CapabilityUnavailableError } from "./errors.js";
import type { GenerationLimiter } from "./limiter.js";
import type { Logger } from "./logger.js";
import { AgentsTextGenerator } from "./pipeline/agents.js";
import {
  CompositeCapability,
  GuardedCapability,
  OfflineCapability,
  type GenerativeCapability,
  type ImageGenerationResult,
  type TextGenerationRequest
} from "./pipeline/generative.js";
import { GeminiImageGenerator } from "./pipeline/image_model.js";

// A missing key is not fatal: calls fail and the stages answer with fallback content.
class MissingKeyTextGenerator implements Pick<GenerativeCapability, "generateText"> {
  async generateText(request: TextGenerationRequest): Promise<string> {
    throw new CapabilityUnavailableError(`${request.name} text generation`, "OPENAI_API_KEY is not set");
  }
}

class MissingKeyImageGenerator implements Pick<GenerativeCapability, "generateImage"> {
  async generateImage(): Promise<ImageGenerationResult> {
    throw new CapabilityUnavailableError("image generation", "GOOGLE_API_KEY is not set");
  }
}

export function createGenerativeCapability(config: AppConfig, limiter: GenerationLimiter, logger: Logger): GenerativeCapability {
  if (config.pipelineMode === "offline") {
    logger.info("Pipeline mode is offline; every stage answers from fallback content");
    return new OfflineCapability();
  }

  if (!config.openaiApiKey) logger.warn("OPENAI_API_KEY is not set; writer and illustrator will use fallback content");
  if (!config.googleApiKey) logger.warn("GOOGLE_API_KEY is not set; images will use the placeholder");

  const text = config.openaiApiKey
    ? new AgentsTextGenerator({ model: config.textModel, apiKey: config.openaiApiKey })
    : new MissingKeyTextGenerator();
  const image = config.googleApiKey
    ? new GeminiImageGenerator({ model: config.imageModel, apiKey: config.googleApiKey })
    : new MissingKeyImageGenerator();

  return new GuardedCapability(new CompositeCapability(text, image), limiter, config.generationTimeoutMs);
}

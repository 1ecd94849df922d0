import { Agent, MaxTurnsExceededError, ModelBehaviorError, OpenAIProvider, Runner } from "@openai/agents";
import type { GenerativeCapability, TextGenerationRequest } from "./generative.js";
import { asRecord, isRecord, type JsonRecord } from "./utils.js";

const DEFAULT_TEMPERATURE = 0.9;

function contentText(part: JsonRecord): string {
  if (part.type === "output_text" && typeof part.text === "string") return part.text;
  if (part.type === "refusal" && typeof part.refusal === "string") return part.refusal;
  return "";
}

function assistantText(item: unknown): string | null {
  if (!isRecord(item) || item.role !== "assistant" || !Array.isArray(item.content)) return null;
  const text = item.content.filter(isRecord).map(contentText).join("").trim();
  return text || null;
}

/** The SDK keeps the rejected model output on the error's run state; recover it so coercion can still try. */
export function lastAssistantTextFromAgentsError(err: unknown): string | null {
  if (typeof err !== "object" || err === null) return null;
  const responses = asRecord(Reflect.get(err, "state"))._modelResponses;
  if (!Array.isArray(responses)) return null;

  const items = responses.flatMap((response: unknown) => {
    const output = asRecord(response).output;
    return Array.isArray(output) ? output : [];
  });
  for (const item of items.reverse()) {
    const text = assistantText(item);
    if (text) return text;
  }
  return null;
}

export function toRawText(finalOutput: unknown, name: string): string {
  if (typeof finalOutput === "string") return finalOutput;
  if (finalOutput === undefined || finalOutput === null) throw new Error(`${name} produced no final output`);
  return JSON.stringify(finalOutput);
}

export type AgentsTextGeneratorOptions = {
  model: string;
  apiKey?: string;
  temperature?: number;
  runner?: Runner;
};

/** Text generation through the OpenAI Agents SDK; one agent turn per call, returned as raw text. */
export class AgentsTextGenerator implements Pick<GenerativeCapability, "generateText"> {
  private readonly runner: Runner;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: AgentsTextGeneratorOptions) {
    this.model = options.model;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.runner = options.runner ?? new Runner({ modelProvider: new OpenAIProvider({ apiKey: options.apiKey }) });
  }

  async generateText(request: TextGenerationRequest): Promise<string> {
    const { name, instructions, prompt, outputShape, signal } = request;
    const modelSettings = { temperature: this.temperature };

    try {
      if (outputShape) {
        const agent = new Agent({ name, instructions, model: this.model, modelSettings, outputType: outputShape.schema });
        const result = await this.runner.run(agent, prompt, { maxTurns: 1, signal });
        return toRawText(result.finalOutput, name);
      }

      const agent = new Agent({ name, instructions, model: this.model, modelSettings });
      const result = await this.runner.run(agent, prompt, { maxTurns: 1, signal });
      return toRawText(result.finalOutput, name);
    } catch (err) {
      const isSchemaFailure = err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError;
      if (!isSchemaFailure) throw err;

      const badOutput = lastAssistantTextFromAgentsError(err);
      if (badOutput === null) throw err;
      return badOutput;
    }
  }
}

import { vi } from "vitest";
import type { StageInvoker } from "../src/host.js";
import { createLogger } from "../src/logger.js";
import type { GenerativeCapability } from "../src/pipeline/generative.js";
import type { StageContext } from "../src/pipeline/stages.js";

export const silentLogger = createLogger("silent");

/** A capability whose calls fail unless overridden, so stages take their fallback paths. */
export function stubCapability(overrides: Partial<GenerativeCapability> = {}): GenerativeCapability {
  return {
    generateText: vi.fn(async () => {
      throw new Error("text model unavailable");
    }),
    generateImage: vi.fn(async () => {
      throw new Error("image model unavailable");
    }),
    ...overrides
  };
}

export function textReturning(raw: string): GenerativeCapability["generateText"] {
  return vi.fn(async () => raw);
}

export function stageContext(overrides: Partial<StageContext> = {}): StageContext {
  const invoker: StageInvoker = {
    invoke: vi.fn(async () => {
      throw new Error("no nested stages in this test");
    })
  };
  return {
    logger: silentLogger,
    capability: stubCapability(),
    invoker,
    signal: new AbortController().signal,
    drawSeed: () => 42,
    ...overrides
  };
}

export function decodeJsonBody(body: Uint8Array): unknown {
  const parsed: unknown = JSON.parse(Buffer.from(body).toString("utf8"));
  return parsed;
}

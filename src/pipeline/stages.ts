import { StageInvocationError, UnknownStageError } from "../errors.js";
import {
  HttpStageInvoker,
  MemoryRequest,
  MemoryResponse,
  type InboundRequest,
  type OutboundResponse,
  type StageInvoker,
  type StageResponse
} from "../host.js";
import { stageLogger, type Logger } from "../logger.js";
import { directorStage } from "./director.js";
import type { GenerativeCapability } from "./generative.js";
import { illustratorStage } from "./illustrator.js";
import { imageStage } from "./image_generator.js";
import { drawSeed } from "./rng.js";
import type { StageName } from "./schemas.js";
import type { JsonRecord } from "./utils.js";
import { writerStage } from "./writer.js";

export type StageContext = {
  logger: Logger;
  capability: GenerativeCapability;
  invoker: StageInvoker;
  /** Aborts when the inbound request is cancelled. */
  signal: AbortSignal;
  drawSeed: () => number;
};

export type StageHandler = (request: InboundRequest, response: OutboundResponse, context: StageContext) => Promise<void>;

export type StageRegistry = ReadonlyMap<string, StageHandler>;

export function createStageRegistry(overrides: Partial<Record<StageName, StageHandler>> = {}): StageRegistry {
  const handlers: Record<StageName, StageHandler> = {
    writer: writerStage,
    illustrator: illustratorStage,
    "image-generator": imageStage,
    director: directorStage,
    ...overrides
  };
  return new Map(Object.entries(handlers));
}

/** Runs registered handlers through in-memory request/response objects, exactly as an HTTP call would. */
export class InProcessStageInvoker implements StageInvoker {
  constructor(
    private readonly registry: StageRegistry,
    private readonly makeContext: (stage: string) => StageContext
  ) {}

  async invoke(name: string, payload: JsonRecord): Promise<StageResponse> {
    const handler = this.registry.get(name);
    if (!handler) throw new UnknownStageError(name);

    const response = new MemoryResponse();
    await handler(MemoryRequest.fromJson(payload), response, this.makeContext(name));
    if (!response.result) throw new StageInvocationError(name, "stage produced no response");
    return response.result;
  }
}

export type StageRuntime = {
  logger: Logger;
  capability: GenerativeCapability;
  drawSeed?: () => number;
  /** When set, named-stage calls go over HTTP to this base URL instead of in-process. */
  stageBaseUrl?: string;
};

export type StageHost = {
  registry: StageRegistry;
  invoker: StageInvoker;
  makeContext: (stage: string, signal?: AbortSignal) => StageContext;
};

export function createStageHost(runtime: StageRuntime, registry: StageRegistry = createStageRegistry()): StageHost {
  const makeContext = (stage: string, signal: AbortSignal = new AbortController().signal): StageContext => ({
    logger: stageLogger(runtime.logger, stage),
    capability: runtime.capability,
    invoker,
    signal,
    drawSeed: runtime.drawSeed ?? drawSeed
  });

  const invoker: StageInvoker = runtime.stageBaseUrl
    ? new HttpStageInvoker(runtime.stageBaseUrl)
    : new InProcessStageInvoker(registry, (stage) => makeContext(stage));

  return { registry, invoker, makeContext };
}

import type { z } from "zod";
import { CapabilityTimeoutError, CapabilityUnavailableError } from "../errors.js";
import type { GenerationLimiter } from "../limiter.js";

export type OutputShape = {
  name: string;
  schema: z.AnyZodObject;
};

export type TextGenerationRequest = {
  /** Agent/persona name, used for tracing and error messages. */
  name: string;
  instructions: string;
  prompt: string;
  outputShape?: OutputShape;
  signal?: AbortSignal;
};

export type ImageGenerationRequest = {
  prompt: string;
  signal?: AbortSignal;
};

export type ImageGenerationResult = {
  model: string;
  /** Provider response, left untyped; the image stage extracts bytes from it. */
  response: unknown;
};

/** The external generative service. Text comes back raw and unvalidated; callers coerce it. */
export interface GenerativeCapability {
  generateText(request: TextGenerationRequest): Promise<string>;
  generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult>;
}

function linkSignals(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => undefined;
  if (parent.aborted) {
    child.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = () => child.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return () => parent.removeEventListener("abort", onAbort);
}

/** Runs `task` with a signal that aborts after `timeoutMs`; rejects with CapabilityTimeoutError on expiry. */
export function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const unlink = linkSignals(parentSignal, controller);

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = new CapabilityTimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    void Promise.resolve()
      .then(() => task(controller.signal))
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
        unlink();
      });
  });
}

/** Applies the shared concurrency limit and a per-call timeout to every external call. */
export class GuardedCapability implements GenerativeCapability {
  constructor(
    private readonly inner: GenerativeCapability,
    private readonly limiter: GenerationLimiter,
    private readonly timeoutMs: number
  ) {}

  generateText(request: TextGenerationRequest): Promise<string> {
    return this.limiter.run(() =>
      withTimeout(
        `${request.name} text generation`,
        this.timeoutMs,
        (signal) => this.inner.generateText({ ...request, signal }),
        request.signal
      )
    );
  }

  generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    return this.limiter.run(() =>
      withTimeout("image generation", this.timeoutMs, (signal) => this.inner.generateImage({ ...request, signal }), request.signal)
    );
  }
}

/** Always fails, so every stage answers from deterministic fallback content. */
export class OfflineCapability implements GenerativeCapability {
  async generateText(request: TextGenerationRequest): Promise<string> {
    throw new CapabilityUnavailableError(`${request.name} text generation`, "pipeline mode is offline");
  }

  async generateImage(): Promise<ImageGenerationResult> {
    throw new CapabilityUnavailableError("image generation", "pipeline mode is offline");
  }
}

/** Routes text and image calls to separate providers. */
export class CompositeCapability implements GenerativeCapability {
  constructor(
    private readonly text: Pick<GenerativeCapability, "generateText">,
    private readonly image: Pick<GenerativeCapability, "generateImage">
  ) {}

  generateText(request: TextGenerationRequest): Promise<string> {
    return this.text.generateText(request);
  }

  generateImage(request: ImageGenerationRequest): Promise<ImageGenerationResult> {
    return this.image.generateImage(request);
  }
}

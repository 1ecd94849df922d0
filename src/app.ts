import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { AppConfig } from "./config.js";
import { AppError, StageInvocationError, toErrorMessage, UnknownStageError } from "./errors.js";
import { encodeMetadataHeader, METADATA_HEADER, type InboundRequest, type OutboundResponse } from "./host.js";
import type { Logger } from "./logger.js";
import type { ImageMimeType } from "./pipeline/schemas.js";
import type { StageHost } from "./pipeline/stages.js";

const BODY_LIMIT = "2mb";

/** Raw request bytes; stages do their own decoding. */
class ExpressInboundRequest implements InboundRequest {
  constructor(private readonly body: unknown) {}

  async json(): Promise<unknown> {
    const parsed: unknown = JSON.parse(await this.text());
    return parsed;
  }

  async text(): Promise<string> {
    return Buffer.isBuffer(this.body) ? this.body.toString("utf8") : "";
  }
}

class ExpressOutboundResponse implements OutboundResponse {
  private sent = false;

  constructor(private readonly res: Response) {}

  get emitted(): boolean {
    return this.sent;
  }

  emit(body: unknown): void {
    this.sent = true;
    this.res.status(200).json(body);
  }

  emitBinary(bytes: Uint8Array, mimeType: ImageMimeType, metadata: Record<string, string>): void {
    this.sent = true;
    this.res.setHeader(METADATA_HEADER, encodeMetadataHeader(metadata));
    this.res.status(200).type(mimeType).send(Buffer.from(bytes));
  }
}

export type AppOptions = {
  config: AppConfig;
  host: StageHost;
  logger: Logger;
};

export function createApp(options: AppOptions) {
  const { config, host, logger } = options;
  const app = express();
  app.use(cors());

  const rawBody = express.raw({ type: () => true, limit: BODY_LIMIT });

  async function runStage(name: string, req: Request, res: Response, next: NextFunction): Promise<void> {
    const handler = host.registry.get(name);
    if (!handler) {
      next(new UnknownStageError(name));
      return;
    }

    // Client went away before we answered: stop the run at the next stage boundary.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const response = new ExpressOutboundResponse(res);
    try {
      await handler(new ExpressInboundRequest(req.body), response, host.makeContext(name, controller.signal));
      if (!response.emitted) next(new StageInvocationError(name, "stage produced no response"));
    } catch (err) {
      next(err);
    }
  }

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      mode: config.pipelineMode,
      hasOpenAIKey: Boolean(config.openaiApiKey),
      hasGoogleKey: Boolean(config.googleApiKey),
      stages: [...host.registry.keys()]
    });
  });

  app.post("/api/stages/:name", rawBody, (req, res, next) => {
    void runStage(req.params.name, req, res, next);
  });

  app.post("/api/pages", rawBody, (req, res, next) => {
    void runStage("director", req, res, next);
  });

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = err instanceof AppError ? err.statusCode : 500;
    const details = toErrorMessage(err);
    if (status >= 500) logger.error("Request failed", { path: req.path, status, error: details });
    else logger.warn("Request rejected", { path: req.path, status, error: details });

    res.status(status).json({ error: err instanceof AppError ? err.name : "InternalServerError", details });
  };
  app.use(errorHandler);

  return app;
}

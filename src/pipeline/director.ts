import { toErrorMessage } from "../errors.js";
import { JSON_CONTENT_TYPE, readPayload, type StageInvoker, type StageResponse } from "../host.js";
import type { Logger } from "../logger.js";
import type { BinaryDescriptor, PipelineErrorKind, PipelineReport, StageName, StageResult } from "./schemas.js";
import type { StageHandler } from "./stages.js";
import { isRecord, type JsonRecord } from "./utils.js";

type ReportKey = "writer" | "illustrator" | "image";

type PipelineStep = {
  stage: Exclude<StageName, "director">;
  key: ReportKey;
  /** The body is the next step's input, so it must be a plain object. */
  feedsNext: boolean;
};

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  { stage: "writer", key: "writer", feedsNext: true },
  { stage: "illustrator", key: "illustrator", feedsNext: true },
  { stage: "image-generator", key: "image", feedsNext: false }
];

export type PipelineOptions = {
  logger: Logger;
  signal?: AbortSignal;
};

function decodeText(body: Uint8Array): string {
  return Buffer.from(body).toString("utf8");
}

export function serializeStageResponse(name: string, response: StageResponse): StageResult {
  const contentType = response.contentType || "application/octet-stream";

  let body: unknown;
  if (contentType.startsWith(JSON_CONTENT_TYPE)) {
    const text = decodeText(response.body);
    try {
      body = JSON.parse(text);
    } catch {
      body = text;
    }
  } else if (contentType.startsWith("text/")) {
    body = decodeText(response.body);
  } else {
    const descriptor: BinaryDescriptor = {
      encoding: "base64",
      data: Buffer.from(response.body).toString("base64"),
      size: response.body.byteLength
    };
    body = descriptor;
  }

  return Object.freeze({ stage: name, contentType, metadata: { ...response.metadata }, body });
}

function fail(report: PipelineReport, stage: string, kind: PipelineErrorKind, details: string): PipelineReport {
  return { ...report, error: { stage, kind, details } };
}

/**
 * Writer, then illustrator, then image generator. Each body feeds the next stage.
 * The first failure ends the run; every result already produced stays on the report,
 * including a stage whose body could not feed the next one.
 */
export async function runPipeline(payload: JsonRecord, invoker: StageInvoker, options: PipelineOptions): Promise<PipelineReport> {
  const { logger, signal } = options;
  const report: PipelineReport = {};
  let input: JsonRecord = payload;

  for (const step of PIPELINE_STEPS) {
    if (signal?.aborted) {
      logger.info("Pipeline cancelled before stage", { next: step.stage });
      return fail(report, step.stage, "cancelled", "Request was cancelled before this stage started.");
    }

    let result: StageResult;
    try {
      logger.debug("Invoking stage", { target: step.stage, payloadKeys: Object.keys(input) });
      result = serializeStageResponse(step.stage, await invoker.invoke(step.stage, input));
    } catch (err) {
      const details = toErrorMessage(err);
      logger.error("Stage invocation failed", { target: step.stage, error: details });
      return fail(report, step.stage, "invocation_failed", details);
    }

    report[step.key] = result;
    if (step.feedsNext) {
      if (!isRecord(result.body)) {
        logger.error("Stage returned an unsupported payload type", { target: step.stage, contentType: result.contentType });
        return fail(report, step.stage, "invalid_payload", `The ${step.stage} stage must return a JSON object payload.`);
      }
      input = result.body;
    }
  }

  return report;
}

function errorSuffix(kind: PipelineErrorKind): string {
  return kind === "invocation_failed" ? "failed" : kind;
}

export function toOutboundBody(report: PipelineReport): JsonRecord {
  const upstream: JsonRecord = {};
  if (report.writer) upstream.writer = report.writer;
  if (report.illustrator) upstream.illustrator = report.illustrator;
  if (report.image) upstream.image = report.image;

  if (!report.error) return upstream;

  const { stage, kind, details } = report.error;
  return {
    error: `${stage.replace(/-/g, "_")}_${errorSuffix(kind)}`,
    stage,
    details,
    ...upstream
  };
}

export const directorStage: StageHandler = async (request, response, context) => {
  const payload = await readPayload(request, context.logger);
  context.logger.info("Director starting orchestration");

  const report = await runPipeline(payload, context.invoker, { logger: context.logger, signal: context.signal });
  if (report.error) {
    context.logger.warn("Director orchestration ended early", { failedStage: report.error.stage, kind: report.error.kind });
  } else {
    context.logger.info("Director orchestration completed successfully");
  }

  response.emit(toOutboundBody(report));
};

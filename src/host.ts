import { StageInvocationError, toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { ImageMimeType } from "./pipeline/schemas.js";
import { isRecord, type JsonRecord } from "./pipeline/utils.js";

export const METADATA_HEADER = "x-stage-metadata";
export const JSON_CONTENT_TYPE = "application/json";

/** Inbound side of a stage call, whatever transport carried it. */
export interface InboundRequest {
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/** Outbound side of a stage call. A stage emits exactly once. */
export interface OutboundResponse {
  emit(body: unknown): void;
  emitBinary(bytes: Uint8Array, mimeType: ImageMimeType, metadata: Record<string, string>): void;
}

export type StageResponse = {
  contentType: string;
  metadata: JsonRecord;
  body: Uint8Array;
};

export interface StageInvoker {
  invoke(name: string, payload: JsonRecord): Promise<StageResponse>;
}

/**
 * Structured decode first, then text decode with a second structured attempt, then `{}`.
 * An absent or unreadable payload is valid input for every stage.
 */
export async function readPayload(request: InboundRequest, logger: Logger): Promise<JsonRecord> {
  try {
    const payload = await request.json();
    if (isRecord(payload)) return payload;
    logger.debug("Request payload decoded but is not an object", { type: Array.isArray(payload) ? "array" : typeof payload });
  } catch (err) {
    logger.debug("Request payload is not structured JSON", { error: toErrorMessage(err) });
  }

  let text: string;
  try {
    text = await request.text();
  } catch (err) {
    logger.debug("Request payload not readable as text", { error: toErrorMessage(err) });
    return {};
  }

  if (text.trim().length === 0) return {};
  try {
    const decoded: unknown = JSON.parse(text);
    if (isRecord(decoded)) return decoded;
    logger.warn("Text payload decoded as JSON but it was not an object");
  } catch {
    logger.warn("Could not parse text payload as JSON");
  }
  return {};
}

export class MemoryRequest implements InboundRequest {
  constructor(private readonly bytes: Uint8Array) {}

  static fromJson(payload: unknown): MemoryRequest {
    return new MemoryRequest(Buffer.from(JSON.stringify(payload), "utf8"));
  }

  static fromText(text: string): MemoryRequest {
    return new MemoryRequest(Buffer.from(text, "utf8"));
  }

  async json(): Promise<unknown> {
    const parsed: unknown = JSON.parse(await this.text());
    return parsed;
  }

  async text(): Promise<string> {
    return Buffer.from(this.bytes).toString("utf8");
  }
}

export class MemoryResponse implements OutboundResponse {
  private captured: StageResponse | null = null;

  get result(): StageResponse | null {
    return this.captured;
  }

  emit(body: unknown): void {
    this.captured = {
      contentType: JSON_CONTENT_TYPE,
      metadata: {},
      body: Buffer.from(JSON.stringify(body) ?? "null", "utf8")
    };
  }

  emitBinary(bytes: Uint8Array, mimeType: ImageMimeType, metadata: Record<string, string>): void {
    this.captured = { contentType: mimeType, metadata: { ...metadata }, body: Uint8Array.from(bytes) };
  }
}

/** base64url JSON keeps non-ASCII values header-safe. */
export function encodeMetadataHeader(metadata: Record<string, string>): string {
  return Buffer.from(JSON.stringify(metadata), "utf8").toString("base64url");
}

export function decodeMetadataHeader(value: string | null): JsonRecord {
  if (!value) return {};
  try {
    const decoded: unknown = JSON.parse(Buffer.from(value, "base64url").toString("utf8"));
    return isRecord(decoded) ? decoded : {};
  } catch {
    return {};
  }
}

/** Invokes stages on another process over HTTP (`POST {baseUrl}/api/stages/:name`). */
export class HttpStageInvoker implements StageInvoker {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async invoke(name: string, payload: JsonRecord): Promise<StageResponse> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/api/stages/${encodeURIComponent(name)}`, {
        method: "POST",
        headers: { "content-type": JSON_CONTENT_TYPE },
        body: JSON.stringify(payload)
      });
    } catch (err) {
      throw new StageInvocationError(name, toErrorMessage(err));
    }

    if (!res.ok) throw new StageInvocationError(name, `HTTP ${res.status}`);

    return {
      contentType: res.headers.get("content-type") ?? "application/octet-stream",
      metadata: decodeMetadataHeader(res.headers.get(METADATA_HEADER)),
      body: new Uint8Array(await res.arrayBuffer())
    };
  }
}

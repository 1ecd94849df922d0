import { toErrorMessage } from "../errors.js";
import { readPayload } from "../host.js";
import type { Logger } from "../logger.js";
import { HERO } from "./fallback.js";
import type { GenerativeCapability, ImageGenerationResult } from "./generative.js";
import { IMAGE_MIME_TYPES, MAX_PANELS, METADATA_VALUE_MAX_LENGTH, type ImageMimeType, type RenderedImage } from "./schemas.js";
import type { StageHandler } from "./stages.js";
import { asRecord, firstDefined, firstText, isRecord, textOf, truncate, type JsonRecord } from "./utils.js";

const MAX_PROMPT_CHOICES = 2;

const DEFAULT_STORY = `${HERO} faces an unexpected threat in New York City.`;
const DEFAULT_ART_DIRECTION = `Dynamic comic book action from ${HERO}'s perspective.`;
const DEFAULT_COLOR_PALETTE = "Bold reds and blues with high-contrast highlights.";
const DEFAULT_LIGHTING = "City twilight glow with dramatic shadows.";
const DEFAULT_FOCUS = `${HERO} swings through Manhattan as energy crackles all around.`;
const STYLE_LINE = "Style: dynamic comic book illustration, crisp inks, expressive action, cinematic perspective.";

/** 1×1 transparent PNG returned whenever no real image can be produced. */
export const PLACEHOLDER_PNG: Uint8Array = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR4nGMAAQAABQABDQottAAAAABJRU5ErkJggg==",
  "base64"
);

export type ImageDeps = {
  capability: GenerativeCapability;
  logger: Logger;
  signal?: AbortSignal;
};

function panelLines(plan: JsonRecord): string[] {
  const layout = firstDefined(plan, ["panels", "panelLayout", "panel_layout"]);
  if (!Array.isArray(layout)) return [];

  const lines: string[] = [];
  for (const entry of layout.slice(0, MAX_PANELS)) {
    if (isRecord(entry)) {
      const description = textOf(entry.description);
      if (!description) continue;
      const number = textOf(entry.panel) || String(lines.length + 1);
      const focus = textOf(entry.focus) || HERO;
      lines.push(`Panel ${number}: ${description} (focus: ${focus})`);
    } else if (typeof entry === "string" && entry.trim()) {
      lines.push(`Panel ${lines.length + 1}: ${entry.trim()}`);
    }
  }
  return lines;
}

function choiceLabels(page: JsonRecord, plan: JsonRecord): string[] {
  const choices = Array.isArray(page.choices) && page.choices.length > 0 ? page.choices : plan.choices;
  if (!Array.isArray(choices)) return [];

  const labels: string[] = [];
  for (const choice of choices.slice(0, MAX_PROMPT_CHOICES)) {
    const label = isRecord(choice) ? textOf(choice.label) : textOf(choice);
    if (label) labels.push(label);
  }
  return labels;
}

/** Pure: the same page and plan always give the same prompt. */
export function composeImagePrompt(page: JsonRecord, plan: JsonRecord): string {
  const sections = [
    `${HERO} comic page concept art.`,
    `Story beat: ${textOf(page.story) || DEFAULT_STORY}`,
    `Art direction: ${firstText(plan, ["artDirection", "art_direction"]) || DEFAULT_ART_DIRECTION}`,
    `Color palette: ${firstText(plan, ["colorPalette", "color_palette"]) || DEFAULT_COLOR_PALETTE}`,
    `Lighting: ${firstText(plan, ["lighting"]) || DEFAULT_LIGHTING}`,
    `Primary focus: ${firstText(plan, ["imagePrompt", "image_prompt"]) || DEFAULT_FOCUS}`
  ];

  const panels = panelLines(plan);
  if (panels.length > 0) sections.push(`Panel breakdown:\n${panels.join("\n")}`);

  const labels = choiceLabels(page, plan);
  if (labels.length > 0) sections.push(`Choices presented: ${labels.join(" | ")}`);

  sections.push(STYLE_LINE);
  return sections.join("\n");
}

export type InlineImage = {
  bytes: Uint8Array;
  mimeType: ImageMimeType;
};

export type ExtractionStrategy = (part: JsonRecord) => InlineImage | null;

export function normalizeMimeType(value: string): ImageMimeType {
  const lowered = value.trim().toLowerCase();
  return IMAGE_MIME_TYPES.find((mime) => mime === lowered) ?? "image/png";
}

function toBytes(value: unknown): Uint8Array | null {
  if (value instanceof Uint8Array) return value;
  if (typeof value === "string") return Buffer.from(value, "base64");
  return null;
}

function inlineImageOf(holder: unknown): InlineImage | null {
  const inline = asRecord(firstDefined(asRecord(holder), ["inlineData", "inline_data"]));
  const bytes = toBytes(inline.data);
  if (!bytes || bytes.byteLength === 0) return null;
  return { bytes, mimeType: normalizeMimeType(firstText(inline, ["mimeType", "mime_type"])) };
}

// Tried in order on every part; some SDK builds nest the inline payload one level down.
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  (part) => inlineImageOf(part),
  (part) => inlineImageOf(part.data),
  (part) => inlineImageOf(part.image)
];

function partsOf(content: unknown): JsonRecord[] {
  const parts = asRecord(content).parts;
  return Array.isArray(parts) ? parts.filter(isRecord) : [];
}

function firstImageIn(parts: readonly JsonRecord[]): InlineImage | null {
  for (const part of parts) {
    for (const strategy of EXTRACTION_STRATEGIES) {
      const image = strategy(part);
      if (image) return image;
    }
  }
  return null;
}

/** Candidate parts first, then a top-level `content`. Null when the response carries no image bytes. */
export function extractImage(response: unknown): InlineImage | null {
  const record = asRecord(response);
  const candidates = Array.isArray(record.candidates) ? record.candidates : [];
  for (const candidate of candidates) {
    const image = firstImageIn(partsOf(asRecord(candidate).content));
    if (image) return image;
  }
  return firstImageIn(partsOf(record.content));
}

/** Metadata travels in a response header, so every value is single-line and capped. */
export function sanitizeMetadata(metadata: Record<string, unknown>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) continue;
    const raw = typeof value === "object" ? JSON.stringify(value) : String(value);
    const text = truncate(raw.replace(/[\r\n]/g, " ").trim(), METADATA_VALUE_MAX_LENGTH);
    if (text) sanitized[key] = text;
  }
  return sanitized;
}

/** The page as metadata: everything but the resubmitted history, which grows with every turn. */
function pageSummary(page: JsonRecord): JsonRecord {
  return Object.fromEntries(Object.entries(page).filter(([key]) => key !== "history"));
}

/** Exactly one external call; the placeholder stands in for a failed call or a response without bytes. */
export async function renderImage(page: JsonRecord, plan: JsonRecord, deps: ImageDeps): Promise<RenderedImage> {
  const { capability, logger } = deps;
  const prompt = composeImagePrompt(page, plan);
  const summary = pageSummary(page);

  let result: ImageGenerationResult;
  try {
    result = await capability.generateImage({ prompt, signal: deps.signal });
  } catch (err) {
    const error = toErrorMessage(err);
    logger.error("Image generation failed; using placeholder", { error });
    return {
      bytes: PLACEHOLDER_PNG,
      mimeType: "image/png",
      metadata: sanitizeMetadata({ error, prompt, fallback: true, page: summary, illustration: plan }),
      fallbackUsed: true
    };
  }

  const image = extractImage(result.response);
  if (!image) logger.warn("Image response missing inline image data; using placeholder");

  return {
    bytes: image?.bytes ?? PLACEHOLDER_PNG,
    mimeType: image?.mimeType ?? "image/png",
    metadata: sanitizeMetadata({ prompt, model: result.model, page: summary, illustration: plan, fallback: !image }),
    fallbackUsed: !image
  };
}

export const imageStage: StageHandler = async (request, response, context) => {
  const payload = await readPayload(request, context.logger);
  const page = isRecord(payload.page) ? payload.page : payload;
  const illustration = asRecord(payload.illustration);
  if (Object.keys(illustration).length === 0) {
    context.logger.error("Image stage received a payload without illustration data");
  }

  const image = await renderImage(page, illustration, context);
  response.emitBinary(image.bytes, image.mimeType, image.metadata);
};

import { toErrorMessage } from "../errors.js";
import { readPayload } from "../host.js";
import type { Logger } from "../logger.js";
import { collectPanels, coerceSoundEffects, parseModelJson } from "./coercion.js";
import { fallbackIllustration, HERO } from "./fallback.js";
import type { GenerativeCapability } from "./generative.js";
import { isSeed } from "./rng.js";
import { IllustratorOutputSchema, type IllustrationPlan } from "./schemas.js";
import type { StageHandler } from "./stages.js";
import { asRecord, firstDefined, firstText, isRecord, type JsonRecord } from "./utils.js";

const RECENT_HISTORY_WINDOW = 3;

export const ILLUSTRATOR_INSTRUCTIONS = `You are the cinematic art director for a comic starring ${HERO}.
Given story context, respond with the illustration plan for one comic page as a JSON object:
- "panels": up to 3 panels, each with a "panel" number, a "description" and a "focus".
- "artDirection": guidance for composition and perspective.
- "colorPalette": the dominant colors and mood.
- "lighting": the mood lighting.
- "imagePrompt": a concise description of the entire page for an image generator.
- "soundEffects": up to 4 stylized SFX strings.
Keep everything faithful to the hero's upbeat, kinetic tone.`;

const DEFAULT_ART_DIRECTION = "Cinematic motion with heroic staging.";
const DEFAULT_COLOR_PALETTE = "Rich reds and deep blues with energy highlights.";
const DEFAULT_LIGHTING = "High-contrast with streaked city lights.";

export type IllustratorDeps = {
  capability: GenerativeCapability;
  logger: Logger;
  drawSeed: () => number;
  signal?: AbortSignal;
};

export function buildIllustratorPrompt(page: JsonRecord): string {
  const history = page.history;
  const condensed = {
    page: firstDefined(page, ["pageNumber", "page"]) ?? null,
    story: page.story ?? null,
    dialogues: page.dialogues ?? null,
    choices: page.choices ?? null,
    previousChoice: firstDefined(page, ["previousChoice", "previous_choice"]) ?? null,
    recentHistory: Array.isArray(history) ? history.slice(-RECENT_HISTORY_WINDOW) : []
  };
  return `Context:${JSON.stringify(condensed)}`;
}

export function coerceIllustratorOutput(raw: string, page: JsonRecord, seed: number, logger: Logger): IllustrationPlan {
  const parsed = parseModelJson(raw);
  if (!parsed) {
    logger.warn("Illustrator model output parsing failed; using fallback plan", { preview: raw.slice(0, 200) });
    return fallbackIllustration(page, seed);
  }

  let fallback: IllustrationPlan | null = null;
  const fallbackPlan = (): IllustrationPlan => {
    if (!fallback) fallback = fallbackIllustration(page, seed);
    return fallback;
  };

  let panels = collectPanels(firstDefined(parsed, ["panels", "panelLayout", "panel_layout"]));
  if (panels.length === 0) {
    logger.info("Illustrator model missing panel layout; using fallback panels");
    panels = fallbackPlan().panels;
  }

  let imagePrompt = firstText(parsed, ["imagePrompt", "image_prompt"]);
  if (!imagePrompt) {
    logger.info("Illustrator model missing image prompt; using fallback prompt");
    imagePrompt = fallbackPlan().imagePrompt;
  }

  return {
    panels,
    artDirection: firstText(parsed, ["artDirection", "art_direction"]) || DEFAULT_ART_DIRECTION,
    colorPalette: firstText(parsed, ["colorPalette", "color_palette"]) || DEFAULT_COLOR_PALETTE,
    lighting: firstText(parsed, ["lighting"]) || DEFAULT_LIGHTING,
    imagePrompt,
    soundEffects: coerceSoundEffects(firstDefined(parsed, ["soundEffects", "sound_effects"]))
  };
}

/** Tolerates an absent or partial page; the plan always has at least one panel and one sound effect. */
export async function producePlan(page: unknown, deps: IllustratorDeps): Promise<IllustrationPlan> {
  const { capability, logger } = deps;
  const pageRecord = asRecord(page);
  const seed = isSeed(pageRecord.seed) ? pageRecord.seed : deps.drawSeed();

  if (Object.keys(pageRecord).length === 0) {
    logger.error("Illustrator received an empty page payload; responding with fallback plan");
    return fallbackIllustration(pageRecord, seed);
  }

  try {
    const raw = await capability.generateText({
      name: "Illustrator",
      instructions: ILLUSTRATOR_INSTRUCTIONS,
      prompt: buildIllustratorPrompt(pageRecord),
      outputShape: { name: "illustration_plan", schema: IllustratorOutputSchema },
      signal: deps.signal
    });
    return coerceIllustratorOutput(raw, pageRecord, seed, logger);
  } catch (err) {
    logger.error("Illustrator model request failed; using fallback plan", { error: toErrorMessage(err), seed });
    return fallbackIllustration(pageRecord, seed);
  }
}

export const illustratorStage: StageHandler = async (request, response, context) => {
  const payload = await readPayload(request, context.logger);
  const page = isRecord(payload.page) ? payload.page : payload;

  const illustration = await producePlan(page, context);
  response.emit({ page, illustration });
};

import { toErrorMessage } from "../errors.js";
import { readPayload } from "../host.js";
import type { Logger } from "../logger.js";
import { coerceChoiceInput, coerceChoices, coerceDialogues, coerceHistory, parseModelJson } from "./coercion.js";
import { buildPage, fallbackPageContent, HERO } from "./fallback.js";
import type { GenerativeCapability } from "./generative.js";
import { WriterOutputSchema, type HistoryEntry, type Page, type PageContent } from "./schemas.js";
import type { StageHandler } from "./stages.js";
import { textOf } from "./utils.js";

const HISTORY_WINDOW = 5;

export const WRITER_INSTRUCTIONS = `You are the narrative director for a choose-your-own-adventure comic starring ${HERO}, a masked hero who swings across New York City.

Rules:
- Answer with a single JSON object: {"story": string, "dialogues": [{"character": string, "line": string}], "choices": [{"id": string, "label": string}]}.
- "story" describes the cinematic scene in 3-5 sentences.
- "choices" has exactly two entries; "id" is kebab-case.
- Keep the tone upbeat and heroic, with quips and high stakes. Keep every dialogue line under 25 words.
- Never include markdown fencing or commentary outside the JSON object.`;

const INTRO_GUIDANCE =
  `Start a brand-new ${HERO} adventure with a surprising inciting incident in New York City. ` +
  "Invent an original villain motivation or anomaly. End with a sharp cliffhanger that naturally leads into both choices.";

const CONTINUATION_GUIDANCE =
  "Continue the serialized story using the provided history and the reader's latest choice. " +
  "Reference the most recent events, keep continuity tight, and escalate stakes. " +
  "Close with a new cliffhanger that matches both next-step choices.";

export type WriterRequestType = "intro" | "continuation";

export type WriterDeps = {
  capability: GenerativeCapability;
  logger: Logger;
  drawSeed: () => number;
  signal?: AbortSignal;
};

export function buildWriterPrompt(history: readonly HistoryEntry[], choice: string | undefined, seed: number): string {
  const requestType: WriterRequestType = history.length === 0 ? "intro" : "continuation";
  const frame = {
    randomSeed: seed,
    history: history.slice(-HISTORY_WINDOW),
    latestChoice: choice ?? null,
    requestType
  };
  const guidance = requestType === "intro" ? INTRO_GUIDANCE : CONTINUATION_GUIDANCE;

  return `Guidance: ${guidance}\nUse the JSON below as your context and craft the next page.\nContext:${JSON.stringify(frame)}`;
}

/** Field-by-field: a usable story survives even when dialogues or choices have to be backfilled. */
export function coerceWriterOutput(raw: string, priorHistoryLength: number, seed: number, logger: Logger): PageContent {
  const parsed = parseModelJson(raw);
  if (!parsed) {
    logger.warn("Falling back due to model parse failure", { preview: raw.slice(0, 200) });
    return fallbackPageContent(priorHistoryLength, seed);
  }

  let fallback: PageContent | null = null;
  const fallbackContent = (): PageContent => {
    if (!fallback) fallback = fallbackPageContent(priorHistoryLength, seed);
    return fallback;
  };

  let story = textOf(parsed.story);
  if (!story) {
    logger.info("Model omitted story text; using fallback narrative");
    story = fallbackContent().story;
  }

  let dialogues = coerceDialogues(parsed.dialogues);
  if (dialogues.length === 0) {
    logger.info("Model returned no usable dialogue; using fallback lines");
    dialogues = fallbackContent().dialogues;
  }

  return { story, dialogues, choices: coerceChoices(parsed.choices, seed) };
}

/** Never rejects: any failure of the external call ends in deterministic fallback content for this call's seed. */
export async function produceNextPage(history: readonly HistoryEntry[], choice: string | undefined, deps: WriterDeps): Promise<Page> {
  const { capability, logger } = deps;
  const seed = deps.drawSeed();
  const prompt = buildWriterPrompt(history, choice, seed);

  let content: PageContent;
  try {
    const raw = await capability.generateText({
      name: "Writer",
      instructions: WRITER_INSTRUCTIONS,
      prompt,
      outputShape: { name: "comic_page", schema: WriterOutputSchema },
      signal: deps.signal
    });
    content = coerceWriterOutput(raw, history.length, seed, logger);
  } catch (err) {
    logger.error("Writer model request failed; using fallback page", { error: toErrorMessage(err), seed });
    content = fallbackPageContent(history.length, seed);
  }

  return buildPage(content, history, seed, choice);
}

export const writerStage: StageHandler = async (request, response, context) => {
  const payload = await readPayload(request, context.logger);
  const history = coerceHistory(payload.history);
  const choice = coerceChoiceInput(payload.choice);

  const page = await produceNextPage(history, choice, context);
  response.emit(page);
};

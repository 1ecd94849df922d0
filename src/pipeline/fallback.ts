import { createRng, pick } from "./rng.js";
import type { Choice, Dialogue, HistoryEntry, IllustrationPlan, Page, PageContent, Panel } from "./schemas.js";
import { textOf, type JsonRecord } from "./utils.js";

export const HERO = "Arclight";

const FALLBACK_VILLAINS = [
  "the Voltage Queen",
  "Doctor Gravemind",
  "the Glass Falcon",
  "Mister Murmur",
  "the Tide Baron",
  "Hex Harlequin"
] as const;

const FALLBACK_LOCATIONS = [
  "Times Square",
  "the Brooklyn Bridge",
  "Queens rooftops",
  "a hidden safehouse in Hell's Kitchen",
  "Grand Central Terminal",
  "the New York Public Library"
] as const;

const FALLBACK_COMPLICATIONS = [
  "a collapsing hovercraft",
  "an unstable quantum rift",
  "civilians caught in a gravity storm",
  "a swarm of rogue drone-bots",
  "an EMP pulse knocking out city power",
  "dimensional echoes tearing open the sky"
] as const;

const FALLBACK_PALETTES = [
  "vibrant reds, electric blues, neon greens",
  "noir shadows with crimson highlights",
  "sunset oranges with stormy purples"
] as const;

const FALLBACK_LIGHTING = [
  "Dynamic rim lighting with sparks of energy",
  "Nocturnal city glow with reflective cables",
  `Backlit skyline with a dramatic spotlight on ${HERO}`
] as const;

export const FALLBACK_CHOICES: readonly Choice[] = [
  { id: "dive-straight-in", label: "Dive straight into the fray and confront the villain." },
  { id: "secure-civilians", label: "Secure the civilians before taking on the threat." }
];

export const FALLBACK_SOUND_EFFECTS = ["THWIP!", "KRAKOOM!", "VRRRMMM!"] as const;

export const FALLBACK_ART_DIRECTION = "Lean into kinetic motion, tilted angles, and close-ups that heighten tension.";

const DEFAULT_STORY = `${HERO} springs into action above Manhattan.`;
const PADDING_BEATS = [`${HERO} surveys the chaos below.`, "A looming threat crackles with energy."];
const IMAGE_PROMPT_STORY_CHARS = 220;

export type FallbackElements = {
  villain: string;
  location: string;
  complication: string;
  palette: string;
  lighting: string;
};

/** Draw order is part of the contract: villain, location, complication, palette, lighting. */
export function drawFallbackElements(seed: number): FallbackElements {
  const rng = createRng(seed);
  const villain = pick(rng, FALLBACK_VILLAINS);
  const location = pick(rng, FALLBACK_LOCATIONS);
  const complication = pick(rng, FALLBACK_COMPLICATIONS);
  const palette = pick(rng, FALLBACK_PALETTES);
  const lighting = pick(rng, FALLBACK_LIGHTING);
  return { villain, location, complication, palette, lighting };
}

function capitalizeFirst(text: string): string {
  return text.length > 0 ? `${text.charAt(0).toUpperCase()}${text.slice(1)}` : text;
}

export function fallbackPageContent(priorHistoryLength: number, seed: number): PageContent {
  const { villain, location, complication } = drawFallbackElements(seed);

  const story =
    priorHistoryLength === 0
      ? `${HERO} swings above ${location} when they spot ${villain} orchestrating ${complication}. ` +
        `With sirens blaring below, ${HERO} cracks a joke to calm everyone's nerves, their own included, ` +
        "before diving into danger."
      : `Still catching their breath from the last clash, ${HERO} tracks ${villain} to ${location}, ` +
        `where ${complication} threatens everyone nearby. ${HERO} fires off a quip and leaps back into the fight.`;

  const dialogues: Dialogue[] = [
    { character: HERO, line: "Okay, villain roll call: who ordered the reality meltdown combo?" },
    { character: capitalizeFirst(villain), line: `${HERO}, you're just in time to watch New York unravel!` }
  ];

  return { story, dialogues, choices: FALLBACK_CHOICES.map((c) => ({ ...c })) };
}

export function buildPage(content: PageContent, priorHistory: readonly HistoryEntry[], seed: number, choice?: string): Page {
  const pageNumber = priorHistory.length + 1;
  const entry: HistoryEntry =
    choice === undefined ? { page: pageNumber, story: content.story } : { page: pageNumber, choice, story: content.story };

  const page: Page = {
    pageNumber,
    story: content.story,
    dialogues: content.dialogues,
    choices: content.choices,
    history: [...priorHistory, entry],
    seed
  };
  if (choice) page.previousChoice = choice;
  return page;
}

export function fallbackPage(priorHistory: readonly HistoryEntry[], seed: number, choice?: string): Page {
  return buildPage(fallbackPageContent(priorHistory.length, seed), priorHistory, seed, choice);
}

export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

export function fallbackPanels(story: string): Panel[] {
  const sentences = splitSentences(story);
  if (sentences.length < 3) sentences.push(...PADDING_BEATS);
  return sentences.slice(0, 3).map((line, idx) => ({
    panel: idx + 1,
    description: line,
    focus: line.includes(HERO) ? HERO : "Scene action"
  }));
}

export function fallbackIllustration(page: JsonRecord, seed: number): IllustrationPlan {
  const story = textOf(page.story) || DEFAULT_STORY;
  const { palette, lighting } = drawFallbackElements(seed);

  return {
    panels: fallbackPanels(story),
    artDirection: FALLBACK_ART_DIRECTION,
    colorPalette: palette,
    lighting,
    imagePrompt: `Comic book illustration of ${HERO} in action: ${story.slice(0, IMAGE_PROMPT_STORY_CHARS)}`,
    soundEffects: [...FALLBACK_SOUND_EFFECTS]
  };
}

import { HERO } from "./fallback.js";
import { createRng, shuffle } from "./rng.js";
import {
  CHOICE_ID_MAX_LENGTH,
  MAX_DIALOGUES,
  MAX_PANELS,
  MAX_SOUND_EFFECTS,
  SOUND_EFFECT_MAX_LENGTH,
  type Choice,
  type Dialogue,
  type HistoryEntry,
  type Panel
} from "./schemas.js";
import { firstText, isRecord, slug, textOf, truncate, type JsonRecord } from "./utils.js";

const NARRATOR = "Narrator";

const CHOICE_POOL: readonly Choice[] = [
  { id: "swing-toward-the-chaos", label: "Swing toward the source of the disturbance." },
  { id: "shadow-trail", label: "Stay hidden and trail the villain through the shadows." },
  { id: "shield-civilians", label: "Throw up a barrier and protect the civilians first." },
  { id: "tech-diagnosis", label: "Scan the strange device with your suit's sensors." },
  { id: "call-for-backup", label: "Signal your allies across the city for backup." },
  { id: "chase-the-signal", label: "Follow the strange signal pulsing from downtown." }
];

export const DEFAULT_SOUND_EFFECTS = ["THWIP!", "WHOOSH!"] as const;

const DEFAULT_PANEL: Panel = {
  panel: 1,
  description: `${HERO} crouches on a rooftop ledge, scanning the city below.`,
  focus: HERO
};

/** Strips whitespace and surrounding code fences, then parses. Anything but a JSON object yields null. */
export function parseModelJson(raw: string): JsonRecord | null {
  const text = raw
    .trim()
    .replace(/^```(?:[A-Za-z]+|\{\})?\s*/, "")
    .replace(/\s*`+$/, "")
    .trim();

  const direct = tryParseObject(text);
  if (direct) return direct;

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return tryParseObject(text.slice(start, end + 1));
}

function tryParseObject(text: string): JsonRecord | null {
  if (text.length === 0) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function coerceDialogues(raw: unknown): Dialogue[] {
  const dialogues: Dialogue[] = [];

  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (isRecord(item)) {
        const line = firstText(item, ["line", "dialogue", "text"]);
        if (line) dialogues.push({ character: firstText(item, ["character", "speaker"]) || NARRATOR, line });
      } else if (typeof item === "string" && item.trim()) {
        dialogues.push({ character: NARRATOR, line: item.trim() });
      }
    }
  } else if (isRecord(raw)) {
    for (const [character, value] of Object.entries(raw)) {
      const line = textOf(value);
      if (line) dialogues.push({ character: character.trim() || NARRATOR, line });
    }
  }

  return dialogues.slice(0, MAX_DIALOGUES);
}

function choiceId(candidate: string, label: string, position: number): string {
  return slug(candidate, CHOICE_ID_MAX_LENGTH) || slug(label, CHOICE_ID_MAX_LENGTH) || `choice-${position}`;
}

function choiceFromEntry(item: unknown, position: number, key?: string): Choice | null {
  if (typeof item === "string") {
    const label = item.trim();
    return label ? { id: choiceId(key ?? label, label, position), label } : null;
  }
  if (!isRecord(item)) return null;

  const label = firstText(item, ["label", "text", "choice"]);
  if (!label) return null;
  return { id: choiceId(firstText(item, ["id", "slug"]) || key || label, label, position), label };
}

/** Always returns exactly two choices with unique ids and labels; gaps are filled from a seed-shuffled pool. */
export function coerceChoices(raw: unknown, seed: number): Choice[] {
  const choices: Choice[] = [];
  const accept = (choice: Choice | null) => {
    if (!choice) return;
    if (choices.some((existing) => existing.id === choice.id || existing.label === choice.label)) return;
    choices.push(choice);
  };

  if (Array.isArray(raw)) {
    raw.forEach((item, idx) => accept(choiceFromEntry(item, idx + 1)));
  } else if (isRecord(raw)) {
    Object.entries(raw).forEach(([key, value], idx) => accept(choiceFromEntry(value, idx + 1, key)));
  }

  if (choices.length >= 2) return choices.slice(0, 2);

  const pool = shuffle(createRng(seed), CHOICE_POOL);
  while (choices.length < 2) {
    const next = pool.pop();
    if (!next) break;
    accept({ ...next });
  }
  return choices;
}

function positiveInt(value: unknown): number | null {
  const n = typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value) : Number.NaN;
  return Number.isInteger(n) && n >= 1 ? n : null;
}

function focusText(value: unknown): string {
  if (Array.isArray(value)) return value.map(textOf).filter((s) => s.length > 0).join(", ");
  return textOf(value);
}

/** Usable panels only (0..5); callers decide what replaces an empty layout. */
export function collectPanels(raw: unknown): Panel[] {
  const panels: Panel[] = [];

  if (Array.isArray(raw)) {
    for (const entry of raw) {
      if (isRecord(entry)) {
        const description = firstText(entry, ["description", "scene"]);
        if (!description) continue;
        const focus = focusText(entry.focus) || focusText(entry.characters) || HERO;
        panels.push({ panel: positiveInt(entry.panel) ?? panels.length + 1, description, focus });
      } else if (typeof entry === "string" && entry.trim()) {
        panels.push({ panel: panels.length + 1, description: entry.trim(), focus: HERO });
      }
    }
  }

  return panels.slice(0, MAX_PANELS);
}

export function coercePanels(raw: unknown): Panel[] {
  const panels = collectPanels(raw);
  return panels.length > 0 ? panels : [{ ...DEFAULT_PANEL }];
}

export function coerceSoundEffects(raw: unknown): string[] {
  const items: unknown[] = Array.isArray(raw) ? raw : typeof raw === "string" ? [raw] : [];
  const effects = items
    .map((item) => truncate(textOf(item).toUpperCase(), SOUND_EFFECT_MAX_LENGTH).trim())
    .filter((effect) => effect.length > 0)
    .slice(0, MAX_SOUND_EFFECTS);
  return effects.length > 0 ? effects : [...DEFAULT_SOUND_EFFECTS];
}

/** Maps resubmitted history one-to-one so the next page number stays `history.length + 1`. */
export function coerceHistory(raw: unknown): HistoryEntry[] {
  if (!Array.isArray(raw)) return [];

  return raw.map((item, idx): HistoryEntry => {
    if (typeof item === "string") return { page: idx + 1, story: item.trim() };
    if (!isRecord(item)) return { page: idx + 1, story: "" };

    const page = positiveInt(item.page) ?? idx + 1;
    const choice = textOf(item.choice);
    const story = textOf(item.story);
    return choice ? { page, choice, story } : { page, story };
  });
}

export function coerceChoiceInput(raw: unknown): string | undefined {
  if (raw === undefined || raw === null) return undefined;
  const text = typeof raw === "string" ? raw.trim() : textOf(raw) || JSON.stringify(raw);
  return text.length > 0 ? text : undefined;
}

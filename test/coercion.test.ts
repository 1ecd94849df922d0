import { describe, expect, it } from "vitest";
import {
  coerceChoiceInput,
  coerceChoices,
  coerceDialogues,
  coerceHistory,
  coercePanels,
  coerceSoundEffects,
  collectPanels,
  parseModelJson
} from "../src/pipeline/coercion.js";
import { HERO } from "../src/pipeline/fallback.js";
import { ChoiceSchema, PanelSchema } from "../src/pipeline/schemas.js";

const ODD_INPUTS: unknown[] = [
  null,
  undefined,
  "",
  "just text",
  42,
  [],
  [null, 3, {}],
  { a: 1 },
  [{ label: "" }, { id: "only-id" }],
  ["same", "same", "same"],
  [{ description: "  " }, { scene: "" }]
];

describe("parseModelJson", () => {
  it("unwraps fenced output", () => {
    expect(parseModelJson('```json\n{"story":"Go"}\n```')).toEqual({ story: "Go" });
    expect(parseModelJson('```{}\n{"b":2}```')).toEqual({ b: 2 });
    expect(parseModelJson('  {"a":1}  ')).toEqual({ a: 1 });
  });

  it("recovers an object embedded in prose", () => {
    expect(parseModelJson('Here is the page: {"story":"Go"} Enjoy!')).toEqual({ story: "Go" });
  });

  it("rejects anything but an object", () => {
    expect(parseModelJson("[1,2]")).toBeNull();
    expect(parseModelJson('"text"')).toBeNull();
    expect(parseModelJson("")).toBeNull();
    expect(parseModelJson("{not json}")).toBeNull();
  });
});

describe("coerceDialogues", () => {
  it("reads records with alternate keys and plain strings", () => {
    expect(
      coerceDialogues([
        { speaker: "Hex Harlequin", text: "Pick a card!" },
        { character: "Arclight", dialogue: "Pass." },
        { line: "The crowd gasps." },
        { character: "Ghost", line: "   " },
        "  Meanwhile, downtown...  "
      ])
    ).toEqual([
      { character: "Hex Harlequin", line: "Pick a card!" },
      { character: "Arclight", line: "Pass." },
      { character: "Narrator", line: "The crowd gasps." },
      { character: "Narrator", line: "Meanwhile, downtown..." }
    ]);
  });

  it("reads a mapping of character to line", () => {
    expect(coerceDialogues({ Arclight: "Hi!", "Mister Murmur": "" })).toEqual([{ character: "Arclight", line: "Hi!" }]);
  });

  it("caps at eight entries and returns empty for unusable input", () => {
    expect(coerceDialogues(Array.from({ length: 12 }, (_, i) => `line ${i}`))).toHaveLength(8);
    expect(coerceDialogues(null)).toEqual([]);
    expect(coerceDialogues("a string")).toEqual([]);
  });
});

describe("coerceChoices", () => {
  it("slugifies ids and derives missing ids from labels", () => {
    expect(coerceChoices([{ id: "Go Left!", label: "Go left" }, { label: "Go right" }], 0)).toEqual([
      { id: "go-left", label: "Go left" },
      { id: "go-right", label: "Go right" }
    ]);
  });

  it("reads a mapping of id to label", () => {
    expect(coerceChoices({ "take-roof": "Take the roof", "take-subway": "Take the subway" }, 0)).toEqual([
      { id: "take-roof", label: "Take the roof" },
      { id: "take-subway", label: "Take the subway" }
    ]);
  });

  it("skips duplicates and keeps only the first two", () => {
    expect(coerceChoices(["Fight", "Fight", "Run", "Hide"], 0)).toEqual([
      { id: "fight", label: "Fight" },
      { id: "run", label: "Run" }
    ]);
  });

  it("fills gaps from the pool deterministically by seed", () => {
    expect(coerceChoices(null, 0).map((c) => c.id)).toEqual(["shadow-trail", "chase-the-signal"]);
    expect(coerceChoices(["Fight"], 42).map((c) => c.id)).toEqual(["fight", "shadow-trail"]);
    expect(coerceChoices([], 7)).toEqual(coerceChoices(undefined, 7));
  });

  it("caps ids at 64 characters and numbers ids it cannot slug", () => {
    const [long, symbols] = coerceChoices([{ label: "x".repeat(100) }, { label: "!!!" }], 0);
    expect(long?.id).toBe("x".repeat(64));
    expect(symbols).toEqual({ id: "choice-2", label: "!!!" });
  });

  it("always returns two unique, valid choices", () => {
    for (const raw of ODD_INPUTS) {
      for (const seed of [0, 1, 42, 4294967295]) {
        const choices = coerceChoices(raw, seed);
        expect(choices).toHaveLength(2);
        expect(new Set(choices.map((c) => c.id)).size).toBe(2);
        expect(new Set(choices.map((c) => c.label)).size).toBe(2);
        for (const choice of choices) expect(ChoiceSchema.safeParse(choice).success).toBe(true);
      }
    }
  });
});

describe("coercePanels", () => {
  it("reads descriptions, scenes, focus and character lists", () => {
    expect(
      coercePanels([
        { panel: "2", description: "Wide shot of the bridge.", focus: "Arclight" },
        { scene: "Close on the villain.", characters: ["Tide Baron", "Henchman"] },
        { panel: 1.5, description: "Sparks." },
        "A quiet street."
      ])
    ).toEqual([
      { panel: 2, description: "Wide shot of the bridge.", focus: "Arclight" },
      { panel: 2, description: "Close on the villain.", focus: "Tide Baron, Henchman" },
      { panel: 3, description: "Sparks.", focus: HERO },
      { panel: 4, description: "A quiet street.", focus: HERO }
    ]);
  });

  it("caps at five panels", () => {
    expect(coercePanels(Array.from({ length: 7 }, (_, i) => `beat ${i}`))).toHaveLength(5);
  });

  it("synthesizes one panel when nothing is usable", () => {
    expect(coercePanels({ panels: "nope" })).toEqual([
      { panel: 1, description: `${HERO} crouches on a rooftop ledge, scanning the city below.`, focus: HERO }
    ]);
    expect(collectPanels({ panels: "nope" })).toEqual([]);
  });

  it("always returns 1..5 valid panels", () => {
    for (const raw of ODD_INPUTS) {
      const panels = coercePanels(raw);
      expect(panels.length).toBeGreaterThanOrEqual(1);
      expect(panels.length).toBeLessThanOrEqual(5);
      for (const panel of panels) expect(PanelSchema.safeParse(panel).success).toBe(true);
    }
  });
});

describe("coerceSoundEffects", () => {
  it("upper-cases, trims and truncates", () => {
    expect(coerceSoundEffects(["boom", "  kapow  ", "a-very-long-sound-effect-name"])).toEqual([
      "BOOM",
      "KAPOW",
      "A-VERY-LONG-SOUND-"
    ]);
    expect(coerceSoundEffects("zap")).toEqual(["ZAP"]);
  });

  it("caps at four and defaults when empty", () => {
    expect(coerceSoundEffects(["a", "b", "c", "d", "e", "f"])).toEqual(["A", "B", "C", "D"]);
    expect(coerceSoundEffects([])).toEqual(["THWIP!", "WHOOSH!"]);
    expect(coerceSoundEffects([null, " "])).toEqual(["THWIP!", "WHOOSH!"]);
  });
});

describe("coerceHistory", () => {
  it("maps every entry so the page count is preserved", () => {
    expect(coerceHistory(["one", 5, { page: "3", choice: "left", story: "three" }, { story: "four", choice: "" }])).toEqual([
      { page: 1, story: "one" },
      { page: 2, story: "" },
      { page: 3, choice: "left", story: "three" },
      { page: 4, story: "four" }
    ]);
    expect(coerceHistory({ page: 1 })).toEqual([]);
  });
});

describe("coerceChoiceInput", () => {
  it("turns any present value into text", () => {
    expect(coerceChoiceInput(" shadow-trail ")).toBe("shadow-trail");
    expect(coerceChoiceInput(7)).toBe("7");
    expect(coerceChoiceInput({ id: "x" })).toBe('{"id":"x"}');
    expect(coerceChoiceInput(null)).toBeUndefined();
    expect(coerceChoiceInput("   ")).toBeUndefined();
  });
});

import { z } from "zod";

export const STAGE_NAMES = ["writer", "illustrator", "image-generator", "director"] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export const IMAGE_MIME_TYPES = ["image/png", "image/jpeg", "image/webp"] as const;
export type ImageMimeType = (typeof IMAGE_MIME_TYPES)[number];

export const MAX_DIALOGUES = 8;
export const MAX_PANELS = 5;
export const MAX_SOUND_EFFECTS = 4;
export const SOUND_EFFECT_MAX_LENGTH = 18;
export const CHOICE_ID_MAX_LENGTH = 64;
export const METADATA_VALUE_MAX_LENGTH = 512;
export const UINT32_MAX = 0xffffffff;

export const DialogueSchema = z.object({
  character: z.string().min(1),
  line: z.string().min(1)
});

export const ChoiceSchema = z.object({
  id: z
    .string()
    .min(1)
    .max(CHOICE_ID_MAX_LENGTH)
    .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/),
  label: z.string().min(1)
});

export const HistoryEntrySchema = z.object({
  page: z.number().int().positive(),
  choice: z.string().optional(),
  story: z.string()
});

export const SeedSchema = z.number().int().min(0).max(UINT32_MAX);

export const PageSchema = z.object({
  pageNumber: z.number().int().positive(),
  story: z.string().min(1),
  dialogues: z.array(DialogueSchema).min(1).max(MAX_DIALOGUES),
  choices: z.array(ChoiceSchema).length(2),
  history: z.array(HistoryEntrySchema).min(1),
  seed: SeedSchema,
  previousChoice: z.string().optional()
});

export const PanelSchema = z.object({
  panel: z.number().int().min(1),
  description: z.string().min(1),
  focus: z.string().min(1)
});

export const IllustrationPlanSchema = z.object({
  panels: z.array(PanelSchema).min(1).max(MAX_PANELS),
  artDirection: z.string().min(1),
  colorPalette: z.string().min(1),
  lighting: z.string().min(1),
  imagePrompt: z.string().min(1),
  soundEffects: z.array(z.string().min(1).max(SOUND_EFFECT_MAX_LENGTH)).min(1).max(MAX_SOUND_EFFECTS)
});

export const BinaryDescriptorSchema = z.object({
  encoding: z.literal("base64"),
  data: z.string(),
  size: z.number().int().min(0)
});

export const StageResultSchema = z.object({
  stage: z.string().min(1),
  contentType: z.string().min(1),
  metadata: z.record(z.unknown()),
  body: z.unknown()
});

export const PipelineErrorKindSchema = z.enum(["invocation_failed", "invalid_payload", "cancelled"]);

export const PipelineReportSchema = z.object({
  writer: StageResultSchema.optional(),
  illustrator: StageResultSchema.optional(),
  image: StageResultSchema.optional(),
  error: z
    .object({
      stage: z.string().min(1),
      kind: PipelineErrorKindSchema,
      details: z.string()
    })
    .optional()
});

// Output-shape hints handed to the text model. Bounds are enforced by coercion, not by the hint,
// since structured-output providers reject most length keywords.
export const WriterOutputSchema = z.object({
  story: z.string(),
  dialogues: z.array(z.object({ character: z.string(), line: z.string() })),
  choices: z.array(z.object({ id: z.string(), label: z.string() }))
});

export const IllustratorOutputSchema = z.object({
  panels: z.array(z.object({ panel: z.number().int(), description: z.string(), focus: z.string() })),
  artDirection: z.string(),
  colorPalette: z.string(),
  lighting: z.string(),
  imagePrompt: z.string(),
  soundEffects: z.array(z.string())
});

export type Dialogue = z.infer<typeof DialogueSchema>;
export type Choice = z.infer<typeof ChoiceSchema>;
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;
export type Page = z.infer<typeof PageSchema>;
export type Panel = z.infer<typeof PanelSchema>;
export type IllustrationPlan = z.infer<typeof IllustrationPlanSchema>;
export type BinaryDescriptor = z.infer<typeof BinaryDescriptorSchema>;
export type StageResult = z.infer<typeof StageResultSchema>;
export type PipelineErrorKind = z.infer<typeof PipelineErrorKindSchema>;
export type PipelineReport = z.infer<typeof PipelineReportSchema>;

export type PageContent = Pick<Page, "story" | "dialogues" | "choices">;

export type RenderedImage = {
  bytes: Uint8Array;
  mimeType: ImageMimeType;
  metadata: Record<string, string>;
  fallbackUsed: boolean;
};

import { z } from "zod";

// Log level type
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// Trainer mode for a review session
// - direct_recall: show the front, learner self-rates 0-5
// - cloze: generated sentence with the term blanked out, graded by similarity
// - multiple_choice: pick the back from shuffled options
export const TrainerModeSchema = z.enum(["direct_recall", "cloze", "multiple_choice"]);
export type TrainerMode = z.infer<typeof TrainerModeSchema>;

// Config validation schema
export const ConfigSchema = z.object({
  logLevel: LogLevelSchema,
  maxItemsPerSession: z.number().int().min(1).max(200),
  distractorCount: z.number().int().min(1).max(10),
  idleTimeoutMinutes: z.number().int().min(1).max(1440),
  cleanupIntervalMinutes: z.number().int().min(1).max(60),
  model: z.string().min(1),
  claudeExecutablePath: z.string(),
  generationRetries: z.number().int().min(0).max(5),
  databasePath: z.string(),
});

// Known config keys for filtering unknown fields
export const KNOWN_CONFIG_KEYS: readonly string[] = Object.keys(ConfigSchema.shape);

export type Config = z.infer<typeof ConfigSchema>;

// Config update validation (partial)
export const ConfigUpdateSchema = ConfigSchema.partial().strict();

export type ValidatedConfigUpdate = z.infer<typeof ConfigUpdateSchema>;

const IdSchema = z.string().min(1).max(128);

// Item payload accepted by the storage write path
export const ItemInputSchema = z.object({
  id: IdSchema,
  front: z.string().min(1),
  back: z.string(),
  language: z.string().min(2).max(16).optional(),
  tags: z.array(z.string()).optional(),
  interval: z.number().min(0.2).max(36500).optional(),
  easiness: z.number().min(1.3).max(5.0).optional(),
  reviewCount: z.number().int().min(0).optional(),
  due: z.string().datetime({ offset: true }).nullable().optional(),
});

export type ValidatedItemInput = z.infer<typeof ItemInputSchema>;

export const ItemsUpsertSchema = z.object({
  items: z.array(ItemInputSchema).min(1).max(1000),
});

export const BeginSessionSchema = z.object({
  userId: IdSchema,
  collectionId: IdSchema,
  mode: TrainerModeSchema.default("direct_recall"),
});

// Answers are opaque strings: a self-rating, a typed term or an option index
export const AnswerSchema = z.object({
  answer: z.string().max(500),
});

export const SwitchModeSchema = z.object({
  mode: TrainerModeSchema,
});

// Helper to format Zod errors for API response
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((e) => `${e.path.join(".")}: ${e.message}`);
}

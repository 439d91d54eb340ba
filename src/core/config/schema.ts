/**
 * Configuration schema for `.ufw-rules.yaml`.
 */
import { z } from 'zod';

/**
 * Make an object field optional and fill in its inner defaults when missing.
 * Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** How the parse command prints rules. */
export const OutputFormatSchema = z.enum(['debug', 'json', 'human']);

export const DuplicateClausePolicySchema = z.enum(['allow', 'reject']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('debug'),
  /** Spaces of indentation for JSON output; 0 prints one line */
  json_indent: z.number().int().min(0).max(8).default(2),
  colors: z.boolean().default(true),
});

export const ParserSettingsSchema = z.object({
  duplicate_clauses: DuplicateClausePolicySchema.default('allow'),
});

export const ConfigSchema = z.object({
  log_level: LogLevelSchema.default('info'),
  output: withDefaults(OutputSettingsSchema),
  parser: withDefaults(ParserSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type ParserSettings = z.infer<typeof ParserSettingsSchema>;

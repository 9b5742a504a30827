// ─── Config Schema ───────────────────────────────────────────────────────────
//
// Shape of config/config.json: which metadata functions run while loading,
// which filter tests are enabled, and which instrument families the
// preprocessing step strips.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { INSTRUMENT_FAMILIES } from "../midi/instruments.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

/**
 * One named function in the config. Arguments stay untyped here; each
 * function validates its own when it is looked up and called.
 */
export const PluginConfigSchema = z.object({
  run: z.boolean(),
  args: z.record(z.string(), z.unknown()).default({}),
});

export const RemoveInstrumentsSchema = z.record(z.enum(INSTRUMENT_FAMILIES), z.boolean());

export const ConfigSchema = z.object({
  data: z.object({
    tests: z.record(z.string(), PluginConfigSchema),
    metadata: z.object({
      functions: z.record(z.string(), PluginConfigSchema),
    }),
    preprocessing: z.object({
      remove_instruments: RemoveInstrumentsSchema,
    }),
  }),
});

// ─── Derived Types ───────────────────────────────────────────────────────────

export type PluginConfig = z.infer<typeof PluginConfigSchema>;
/** Function name → settings, in the order the config file lists them. */
export type PluginConfigMap = Record<string, PluginConfig>;
export type RemoveInstrumentsConfig = z.infer<typeof RemoveInstrumentsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a config object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = ConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}

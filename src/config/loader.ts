// ─── Config Loader ───────────────────────────────────────────────────────────
//
// Reads config.json, validates it with Zod, and returns a typed Config.
// The bundled file sits in config/ at the package root.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigSchema, type Config } from "./schema.js";

/** Path of the config.json that ships with the package. */
export function defaultConfigPath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, "..", "..", "config", "config.json");
}

/**
 * Load and validate a config file (the bundled one by default).
 */
export function loadConfig(filePath: string = defaultConfigPath()): Config {
  if (!existsSync(filePath)) {
    throw new Error(`Config not found: ${filePath}`);
  }

  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid config ${filePath}:\n${issues}`);
  }

  return result.data;
}

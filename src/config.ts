// Config loader: parse delivery-metrics.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "delivery-metrics.config.yaml";

// --- Zod Schemas ---

const TrackerSchema = z.object({
  base_url: z.string().url(),
  user: z.string().default(""),
  token: z.string().default(""),
  points_field: z.string().min(1).default("customfield_10002"),
  max_retries: z.number().int().min(0).max(10).default(3),
  retry_base_delay_ms: z.number().int().min(0).default(1000),
  max_results: z.number().int().min(1).default(500),
});

const CacheSchema = z.object({
  dir: z.string().min(1).default(".delivery-metrics/cache"),
  closed_grace_days: z.number().min(0).default(6),
});

const SprintSchema = z.object({
  overdue_after_days: z.number().positive().default(16),
});

const WorkflowSchema = z.object({
  done_statuses: z.array(z.string().min(1)).default(["done", "closed", "resolved"]),
  abandoned_resolutions: z
    .array(z.string().min(1))
    .default(["won't fix", "won't do", "duplicate", "cannot reproduce", "abandoned"]),
});

const TeamSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  board_id: z.number().int().positive(),
});

const LogSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigFileSchema = z.object({
  tracker: TrackerSchema,
  cache: CacheSchema.default({}),
  sprint: SprintSchema.default({}),
  workflow: WorkflowSchema.default({}),
  teams: z
    .array(TeamSchema)
    .min(1)
    .refine((teams) => new Set(teams.map((t) => t.id)).size === teams.length, {
      message: "team ids must be unique",
    }),
  log: LogSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type TeamConfig = z.infer<typeof TeamSchema>;

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      return "";
    }
    return value;
  });
}

// --- Loader ---

/**
 * Load and validate delivery-metrics.config.yaml.
 * @param configPath – absolute or relative path to YAML config file.
 *   Defaults to `delivery-metrics.config.yaml` in the current working directory.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Config file not found: ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");
  const substituted = substituteEnvVars(raw);
  const parsed: unknown = parseYaml(substituted, { customTags: [] });

  return ConfigFileSchema.parse(parsed);
}

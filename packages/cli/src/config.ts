/**
 * CLI settings
 *
 * Sources, lowest precedence first: ~/.glycotrend/config.json, environment
 * variables (a .env file is loaded at startup), command-line flags.
 */

import { readFileSync, writeFileSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { ACTIVITY_LEVELS, DEFAULT_TIMEZONE, parseInput, timezoneSchema } from "@glycotrend/diabetes";
import type { ActivityLevel } from "@glycotrend/diabetes";

export const CONFIG_DIR = join(homedir(), ".glycotrend");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export const DEFAULT_ACTIVITY_LEVEL: ActivityLevel = "light";

export const ENV_VARS = {
  timezone: "GLYCOTREND_TIMEZONE",
  activityLevel: "GLYCOTREND_ACTIVITY_LEVEL",
  geneticDataPath: "GLYCOTREND_GENETIC_DATA",
} as const;

export const configSchema = z.object({
  timezone: timezoneSchema.optional(),
  activityLevel: z.enum(ACTIVITY_LEVELS).optional(),
  geneticDataPath: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Unvalidated values from the environment or flags
 */
export interface SettingsOverrides {
  timezone?: string;
  activityLevel?: string;
  geneticDataPath?: string;
}

export interface Settings {
  timezone: string;
  activityLevel: ActivityLevel;
  geneticDataPath?: string;
}

const settingsSchema = z.object({
  timezone: timezoneSchema.default(DEFAULT_TIMEZONE),
  activityLevel: z.enum(ACTIVITY_LEVELS).default(DEFAULT_ACTIVITY_LEVEL),
  geneticDataPath: z.string().min(1).optional(),
});

/**
 * Load saved config. A missing file gives {}; an invalid one is reported and ignored.
 */
export function loadConfig(): Config {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(CONFIG_FILE, "utf-8"));
  } catch {
    return {};
  }

  const result = configSchema.safeParse(data);
  if (!result.success) {
    console.error(`Ignoring invalid config at ${CONFIG_FILE}`);
    return {};
  }
  return result.data;
}

/**
 * Save config
 */
export function saveConfig(config: Config): void {
  try {
    mkdirSync(CONFIG_DIR, { recursive: true });
    writeFileSync(CONFIG_FILE, JSON.stringify(config, null, 2));
  } catch (error) {
    console.error("Failed to save config:", error);
  }
}

/**
 * Merge updates into the saved config. Throws ValidationError on bad values.
 */
export function updateConfig(updates: SettingsOverrides): Config {
  const current = loadConfig();
  const config = parseInput(
    configSchema,
    {
      timezone: updates.timezone ?? current.timezone,
      activityLevel: updates.activityLevel ?? current.activityLevel,
      geneticDataPath: updates.geneticDataPath ?? current.geneticDataPath,
    },
    "config"
  );
  saveConfig(config);
  return config;
}

/**
 * Settings taken from environment variables
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): SettingsOverrides {
  return {
    timezone: env[ENV_VARS.timezone],
    activityLevel: env[ENV_VARS.activityLevel],
    geneticDataPath: env[ENV_VARS.geneticDataPath],
  };
}

export interface SettingsSources {
  config?: Config;
  env?: SettingsOverrides;
}

/**
 * Resolve effective settings. Empty strings count as unset.
 * Throws ValidationError for an unknown timezone or activity level.
 */
export function resolveSettings(flags: SettingsOverrides = {}, sources: SettingsSources = {}): Settings {
  const config = sources.config ?? loadConfig();
  const env = sources.env ?? readEnvOverrides();

  const pick = (key: keyof SettingsOverrides): string | undefined =>
    flags[key] || env[key] || config[key] || undefined;

  return parseInput(
    settingsSchema,
    {
      timezone: pick("timezone"),
      activityLevel: pick("activityLevel"),
      geneticDataPath: pick("geneticDataPath"),
    },
    "settings"
  );
}

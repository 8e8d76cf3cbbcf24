import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

import { DEFAULT_PLACEHOLDER, FIELD_REGISTRY, type FieldName } from './bib/config.js';

const fieldNameSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(FIELD_REGISTRY));

export const settingsSchema = z.object({
  placeholder: z.string().trim().min(1).default(DEFAULT_PLACEHOLDER),
  stripAccents: z.boolean().default(true),
  stripHyphens: z.boolean().default(false),
  titleFields: z.array(fieldNameSchema).min(1).default(['title']),
  smallWords: z.array(z.string().trim().min(1)).default([]),
});

export type Settings = {
  placeholder: string;
  stripAccents: boolean;
  stripHyphens: boolean;
  titleFields: FieldName[];
  smallWords: string[];
};

export const DEFAULT_SETTINGS: Settings = settingsSchema.parse({});

export function getSettingsPath(): string {
  const override = process.env.BIBTIDY_SETTINGS_PATH;
  if (override && override.trim()) return override.trim();
  return path.join(os.homedir(), '.bibtidy', 'settings.yaml');
}

export function parseSettings(raw: string): Settings {
  const parsed: unknown = YAML.parse(raw);
  return settingsSchema.parse(parsed ?? {});
}

/**
 * Load settings from the YAML file, if there is one. A file that cannot be
 * read or does not validate is reported and the defaults are used instead.
 */
export function loadSettings(filename = getSettingsPath()): Settings {
  if (!fs.existsSync(filename)) return { ...DEFAULT_SETTINGS };
  try {
    return parseSettings(fs.readFileSync(filename, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[bibtidy] Ignoring settings in ${filename}: ${message}`);
    return { ...DEFAULT_SETTINGS };
  }
}

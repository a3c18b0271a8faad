import fs from 'node:fs';
import path from 'node:path';
import process from 'node:process';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

const DOTENV_FILES = ['.env', '.env.local'];

export function loadDotenvFiles(rootDir: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const filename of DOTENV_FILES) {
    const filepath = path.join(rootDir, filename);
    if (fs.existsSync(filepath)) {
      loadEnv({ path: filepath, override: true });
      loaded.push(filepath);
    }
  }
  return loaded;
}

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const RawEnvSchema = z
  .object({
    TR_PHONE_NUMBER: optionalTrimmed,
    TR_PIN: optionalTrimmed,
    TR_SESSION_TOKEN: optionalTrimmed,
    TR_CONFIG: optionalTrimmed,
    TR_OUTPUT_FORMAT: optionalTrimmed,
    TR_OUTPUT_FOLDER: optionalTrimmed,
    TR_EXTRACT_DETAILS: optionalTrimmed,
    LOG_DIR: optionalTrimmed,
  })
  .passthrough();

export const coerceBoolean = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
};

export type ExportEnv = {
  readonly phoneNumber?: string;
  readonly pin?: string;
  readonly sessionToken?: string;
  readonly configPath?: string;
  readonly outputFormat?: string;
  readonly outputFolder?: string;
  readonly extractDetails?: boolean;
  readonly logDir?: string;
};

export function readExportEnv(source: NodeJS.ProcessEnv = process.env): ExportEnv {
  const raw = RawEnvSchema.parse(source);
  return {
    phoneNumber: raw.TR_PHONE_NUMBER,
    pin: raw.TR_PIN,
    sessionToken: raw.TR_SESSION_TOKEN,
    configPath: raw.TR_CONFIG,
    outputFormat: raw.TR_OUTPUT_FORMAT,
    outputFolder: raw.TR_OUTPUT_FOLDER,
    extractDetails:
      raw.TR_EXTRACT_DETAILS === undefined ? undefined : coerceBoolean(raw.TR_EXTRACT_DETAILS, false),
    logDir: raw.LOG_DIR,
  };
}

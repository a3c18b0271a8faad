import { promises as fs } from 'node:fs';
import path from 'node:path';

import { parse } from 'yaml';

import type { Credentials } from '../auth/login.js';
import type { ExportEnv } from '../bootstrap/env.js';
import { CONNECT_ATTEMPTS, RECEIVE_TIMEOUT_MS, REQUEST_ATTEMPTS } from '../config.js';
import { ConfigError, describeError } from '../errors.js';
import { resolveDirectory } from '../io/dir.js';
import { parseOutputFormat } from '../io/sink.js';
import type { ExportSettings } from '../sync/run.js';
import { ConfigFileSchema, EMPTY_CONFIG_FILE, type ConfigFile } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'config.yaml';
export const DEFAULT_OUTPUT_FOLDER = 'out';
export const DEFAULT_OUTPUT_FORMAT = 'json';

export type CliOptions = {
  readonly config?: string;
  readonly format?: string;
  readonly out?: string;
  readonly details?: boolean;
  readonly token?: string;
  readonly logDir?: string;
};

export type NetworkSettings = {
  readonly receiveTimeoutMs: number;
  readonly connectAttempts: number;
  readonly requestAttempts: number;
};

export type ResolvedSettings = {
  readonly export: ExportSettings;
  readonly network: NetworkSettings;
  readonly credentials?: Credentials;
  readonly token?: string;
  readonly logDir: string;
  readonly configPath?: string;
};

/**
 * Reads and validates the YAML config. A missing file is only an error when
 * its path was given explicitly.
 */
export async function loadConfigFile(filePath: string, required: boolean): Promise<ConfigFile | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT' && !required) {
      return null;
    }
    throw new ConfigError(`No se pudo leer el archivo de configuración ${filePath}: ${describeError(error)}`);
  }

  let raw: unknown;
  try {
    raw = parse(content) as unknown;
  } catch (error) {
    throw new ConfigError(`El archivo ${filePath} no es YAML válido: ${describeError(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<raíz>'}: ${issue.message}`);
    throw new ConfigError(`Configuración inválida en ${filePath}:\n${issues.join('\n')}`);
  }
  return parsed.data;
}

const firstDefined = <T>(...values: Array<T | undefined>): T | undefined =>
  values.find((value) => value !== undefined && value !== '');

/** CLI flags win over the config file, which wins over the environment. */
export function resolveSettings(
  cli: CliOptions,
  file: ConfigFile | null,
  env: ExportEnv,
  cwd: string = process.cwd(),
): Omit<ResolvedSettings, 'configPath'> {
  const config = file ?? EMPTY_CONFIG_FILE;

  const format = parseOutputFormat(
    firstDefined(cli.format, config.general.output_format, env.outputFormat) ?? DEFAULT_OUTPUT_FORMAT,
  );
  const outputFolder = resolveDirectory(
    firstDefined(cli.out, config.general.output_folder, env.outputFolder) ?? DEFAULT_OUTPUT_FOLDER,
    cwd,
  );
  const extractDetails = firstDefined(cli.details, config.general.extract_details, env.extractDetails) ?? false;

  const phoneNumber = firstDefined(config.secret.phone_number, env.phoneNumber);
  const pin = firstDefined(config.secret.pin, env.pin);
  const credentials = phoneNumber && pin ? { phoneNumber, pin } : undefined;

  return {
    export: { format, outputFolder, extractDetails },
    network: {
      receiveTimeoutMs: config.network.receive_timeout_ms ?? RECEIVE_TIMEOUT_MS,
      connectAttempts: config.network.connect_attempts ?? CONNECT_ATTEMPTS,
      requestAttempts: config.network.request_attempts ?? REQUEST_ATTEMPTS,
    },
    credentials,
    token: firstDefined(cli.token?.trim(), config.secret.session_token, env.sessionToken),
    logDir: resolveDirectory(firstDefined(cli.logDir, env.logDir) ?? 'logs', cwd),
  };
}

export async function loadSettings(
  cli: CliOptions,
  env: ExportEnv,
  cwd: string = process.cwd(),
): Promise<ResolvedSettings> {
  const explicitPath = firstDefined(cli.config, env.configPath);
  const configPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  const file = await loadConfigFile(configPath, explicitPath !== undefined);
  return { ...resolveSettings(cli, file, env, cwd), configPath: file ? configPath : undefined };
}

import { Command } from 'commander';

import { interactiveLogin } from '../../auth/login.js';
import type { Logger } from '../../bootstrap/logger.js';
import { ConfigError, describeError } from '../../errors.js';
import { loadSettings, type ResolvedSettings } from '../settings.js';
import {
  readCliOptions,
  resolveCwd,
  resolveEnv,
  resolveLoggerFactory,
  resolveLoginClient,
  resolvePrompt,
  writeStdout,
  type CommandContext,
} from './shared.js';

/**
 * Uses the configured session token when there is one, otherwise runs the
 * SMS/app 2FA login with the configured phone number and PIN.
 */
export async function acquireToken(
  settings: ResolvedSettings,
  context: CommandContext,
  logger: Logger,
): Promise<string> {
  if (settings.token) {
    logger.debug('[login] usando el token de sesión configurado');
    return settings.token;
  }
  if (!settings.credentials) {
    throw new ConfigError(
      'No hay token de sesión ni credenciales. Define TR_SESSION_TOKEN, o TR_PHONE_NUMBER y TR_PIN.',
    );
  }

  const prompt = resolvePrompt(context);
  try {
    return await interactiveLogin(resolveLoginClient(context), settings.credentials, prompt.ask, logger);
  } finally {
    prompt.close();
  }
}

type LoginOptions = { json?: boolean };

export async function runLoginCommand(
  options: LoginOptions,
  command: Command,
  context: CommandContext,
): Promise<string> {
  const cwd = resolveCwd(context);
  const settings = await loadSettings({ ...readCliOptions(command), token: undefined }, resolveEnv(context), cwd);
  const logger = resolveLoggerFactory(context)({
    name: 'tr-login',
    directory: settings.logDir,
    echo: ['info', 'warn'],
  });

  try {
    const token = await acquireToken({ ...settings, token: undefined }, context, logger);
    writeStdout(context, options.json ? JSON.stringify({ token }, null, 2) : token);
    return token;
  } catch (error) {
    logger.error(`❌ ${describeError(error)}`, error);
    throw error;
  } finally {
    await logger.close();
  }
}

export function registerLoginCommand(program: Command, context: CommandContext): void {
  program
    .command('login')
    .description('Inicia sesión con número de teléfono, PIN y código 2FA e imprime el token de sesión')
    .option('--json', 'Imprime el token en formato JSON')
    .action(async (options: LoginOptions, command: Command) => {
      await runLoginCommand(options, command, context);
    });
}

import { Command } from 'commander';

import { bindProcessSignals, registerCloser } from '../../bootstrap/signals.js';
import { describeError } from '../../errors.js';
import { ensureDirectory } from '../../io/dir.js';
import { runExport, type RunSummary } from '../../sync/run.js';
import { loadSettings, type CliOptions } from '../settings.js';
import { acquireToken } from './login.js';
import {
  readCliOptions,
  resolveCwd,
  resolveEnv,
  resolveLoggerFactory,
  resolveTransportFactory,
  type CommandContext,
} from './shared.js';

export async function runSyncCommand(cli: CliOptions, context: CommandContext): Promise<RunSummary> {
  const cwd = resolveCwd(context);
  const settings = await loadSettings(cli, resolveEnv(context), cwd);
  const logger = resolveLoggerFactory(context)({
    name: 'tr-export',
    directory: settings.logDir,
    echo: ['info', 'warn'],
  });

  if (context.bindSignals ?? true) {
    bindProcessSignals(logger);
  }
  const unregister = registerCloser(() => logger.close());

  logger.debug('boot', {
    command: 'sync',
    config: settings.configPath ?? null,
    format: settings.export.format,
    outputFolder: settings.export.outputFolder,
    extractDetails: settings.export.extractDetails,
  });

  try {
    const token = await acquireToken(settings, context, logger);
    await ensureDirectory(settings.export.outputFolder);

    const summary = await runExport({
      token,
      settings: settings.export,
      channel: {
        transportFactory: resolveTransportFactory(context, settings.network),
        connectAttempts: settings.network.connectAttempts,
        requestAttempts: settings.network.requestAttempts,
      },
      logger,
    });

    logger.info(
      `🎉 Exportación completada: ${summary.transactions} transacciones en ${summary.pages} páginas, ${summary.cashPositions} posiciones de efectivo.`,
    );
    return summary;
  } catch (error) {
    logger.error(`❌ ${describeError(error)}`, error);
    throw error;
  } finally {
    unregister();
    await logger.close();
  }
}

export function registerSyncCommand(program: Command, context: CommandContext): void {
  program
    .command('sync', { isDefault: true })
    .description('Descarga las transacciones y el efectivo disponible y los exporta a JSON o CSV')
    .option('-f, --format <format>', 'Formato de salida: json o csv')
    .option('-o, --out <dir>', 'Carpeta de salida')
    .option('--details', 'Enriquece cada transacción con la sección de detalle')
    .option('--no-details', 'No consulta el detalle de cada transacción')
    .option('--token <token>', 'Token de sesión; omite el inicio de sesión interactivo')
    .action(async (_options: unknown, command: Command) => {
      await runSyncCommand(readCliOptions(command), context);
    });
}

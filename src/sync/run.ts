import type { Logger } from '../bootstrap/logger.js';
import { noopLogger } from '../bootstrap/logger.js';
import { ConfigError } from '../errors.js';
import { exportRecords, type SinkSettings } from '../io/sink.js';
import { withChannel, type ChannelOptions } from '../stream/channel.js';
import { fetchAvailableCash, type CashPosition } from './cash.js';
import { fetchTimeline, type TimelineResult } from './timeline.js';

export type ExportSettings = SinkSettings & {
  readonly extractDetails: boolean;
};

export type RunOptions = {
  readonly token: string;
  readonly settings: ExportSettings;
  readonly channel: Omit<ChannelOptions, 'logger'>;
  readonly logger?: Logger;
};

export type RunSummary = {
  readonly transactions: number;
  readonly pages: number;
  readonly cashPositions: number;
  readonly files: readonly string[];
};

const channelOptions = (options: RunOptions): ChannelOptions => ({
  ...options.channel,
  logger: options.logger ?? noopLogger,
});

export function syncTransactions(options: RunOptions): Promise<TimelineResult> {
  return withChannel(channelOptions(options), (session) =>
    fetchTimeline(session, {
      token: options.token,
      extractDetails: options.settings.extractDetails,
      logger: options.logger,
    }),
  );
}

export function syncCash(options: RunOptions): Promise<CashPosition[]> {
  return withChannel(channelOptions(options), (session) => fetchAvailableCash(session, options.token));
}

/**
 * Transactions first, then the cash snapshot, each on its own channel and
 * exported as soon as it is complete.
 */
export async function runExport(options: RunOptions): Promise<RunSummary> {
  const logger = options.logger ?? noopLogger;
  if (!options.token.trim()) {
    throw new ConfigError('Se requiere un token de sesión para sincronizar.');
  }

  const files: string[] = [];

  logger.info('⏳ Descargando el historial de transacciones...');
  const timeline = await syncTransactions(options);
  const transactionsPath = await exportRecords('transactions', timeline.items, options.settings);
  if (transactionsPath) {
    files.push(transactionsPath);
    logger.info(`✅ ${timeline.items.length} transacciones guardadas en '${transactionsPath}'`);
  } else {
    logger.warn('No hay transacciones que exportar.');
  }

  logger.info('⏳ Consultando el efectivo disponible...');
  const cash = await syncCash(options);
  const cashPath = await exportRecords('cash', cash, options.settings);
  if (cashPath) {
    files.push(cashPath);
    logger.info(`✅ Efectivo disponible guardado en '${cashPath}'`);
  } else {
    logger.warn('No hay datos de efectivo que exportar.');
  }

  return {
    transactions: timeline.items.length,
    pages: timeline.pages,
    cashPositions: cash.length,
    files,
  };
}

import process from 'node:process';

import type { Logger } from './logger.js';
import { noopLogger } from './logger.js';

export type Signals = 'SIGINT' | 'SIGTERM';

export type Closer = () => void | Promise<void>;

const SIGNALS_TO_HANDLE: readonly Signals[] = ['SIGINT', 'SIGTERM'];

const closers: Closer[] = [];

let bound = false;
let shuttingDown: Promise<void> | null = null;
let activeLogger: Logger = noopLogger;

/** Runs every registered closer, newest first, exactly once. */
export async function runClosers(): Promise<void> {
  const pending = closers.splice(0, closers.length);

  for (let index = pending.length - 1; index >= 0; index -= 1) {
    const closer = pending[index];
    if (!closer) {
      continue;
    }
    try {
      await closer();
    } catch (error) {
      activeLogger.error('[signals] Error al ejecutar un closer registrado', error);
    }
  }
}

function shutdown(signal: Signals): Promise<void> {
  if (!shuttingDown) {
    activeLogger.warn(`Se recibió la señal ${signal}. Cerrando canales abiertos...`);
    shuttingDown = runClosers().finally(() => {
      // Re-raise so Node terminates with the conventional signal status.
      process.kill(process.pid, signal);
    });
  }
  return shuttingDown;
}

export function bindProcessSignals(logger: Logger = noopLogger): void {
  activeLogger = logger;
  if (bound) {
    return;
  }
  bound = true;

  for (const signal of SIGNALS_TO_HANDLE) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
}

export function registerCloser(closer: Closer): () => void {
  closers.push(closer);

  return () => {
    const index = closers.lastIndexOf(closer);
    if (index !== -1) {
      closers.splice(index, 1);
    }
  };
}

export const registeredCloserCount = (): number => closers.length;

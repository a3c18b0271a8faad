import { randomUUID } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ARTIFACT_BASENAMES, JSON_INDENT, type ArtifactKind } from '../config.js';
import { ConfigError } from '../errors.js';
import { toTable, type TableOptions } from '../normalize/table.js';
import { toCsvDocument } from './csv.js';
import { ensureDirectory } from './dir.js';

export const OUTPUT_FORMATS = ['json', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type SinkSettings = {
  readonly format: OutputFormat;
  readonly outputFolder: string;
  readonly table?: TableOptions;
};

const isOutputFormat = (value: string): value is OutputFormat =>
  (OUTPUT_FORMATS as readonly string[]).includes(value);

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new ConfigError(`El formato '${value}' es desconocido. Usa 'json' o 'csv'.`);
  }
  return normalized;
}

export const artifactPath = (kind: ArtifactKind, settings: SinkSettings): string =>
  path.join(settings.outputFolder, `${ARTIFACT_BASENAMES[kind]}.${settings.format}`);

async function writeArtifact(filePath: string, data: string): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await writeFile(tempPath, data, { encoding: 'utf8' });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeJsonArtifact(filePath: string, data: unknown): Promise<void> {
  await writeArtifact(filePath, JSON.stringify(data, null, JSON_INDENT));
}

/** Returns `false` without touching the disk when there is nothing to write. */
export async function writeCsvArtifact(
  filePath: string,
  records: readonly Record<string, unknown>[],
  options: TableOptions = {},
): Promise<boolean> {
  const table = toTable(records, options);
  if (table.rows.length === 0 || table.columns.length === 0) {
    return false;
  }
  await writeArtifact(filePath, toCsvDocument(table));
  return true;
}

export async function exportRecords(
  kind: ArtifactKind,
  records: readonly Record<string, unknown>[],
  settings: SinkSettings,
): Promise<string | null> {
  const filePath = artifactPath(kind, settings);
  if (settings.format === 'json') {
    await writeJsonArtifact(filePath, records);
    return filePath;
  }
  const written = await writeCsvArtifact(filePath, records, settings.table);
  return written ? filePath : null;
}

/**
 * CLI Helpers - Argument splitting, file loading and output
 */

import { readFile } from 'node:fs/promises';
import type { DataSource, FittedResult } from '../../types/index.js';
import { errorMessage } from '../../core/errors.js';
import { parseDataSource, parseModelFile, type ModelFile } from '../../core/model-file.js';
import { parsePosteriorSummary, TabulatedResult } from '../../results/tabulated-result.js';
import { ResultStore } from '../../storage/result-store.js';
import type { CommandResult, CommandConfig } from '../types.js';

/**
 * Read a validated string field
 */
export function stringField(data: Record<string, unknown>, name: string): string | undefined {
  const value = data[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a validated numeric field
 */
export function numberField(data: Record<string, unknown>, name: string): number | undefined {
  const value = data[name];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Split a comma-separated flag value into labels
 */
export function splitList(value: string | undefined): string[] | null {
  if (value === undefined) return null;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

/**
 * Turn an error into a failed CommandResult
 */
export function failure(error: unknown): CommandResult {
  return { success: false, error: errorMessage(error) };
}

/**
 * Read and parse a JSON file
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf8');
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function loadModelFile(path: string): Promise<ModelFile> {
  return parseModelFile(await readJsonFile(path));
}

export async function loadDataFile(path: string): Promise<DataSource> {
  return parseDataSource(await readJsonFile(path), path);
}

/**
 * Fitted result from a summary file, or from a stored record by id.
 * Null when neither is given.
 */
export async function loadFittedResult(
  source: { result?: string; resultId?: string },
  config: CommandConfig
): Promise<FittedResult | null> {
  if (source.result !== undefined) {
    return new TabulatedResult(parsePosteriorSummary(await readJsonFile(source.result)));
  }
  if (source.resultId === undefined) {
    return null;
  }

  const store = new ResultStore({ dataDir: config.dataDir });
  await store.init();
  try {
    const record = await store.load(source.resultId);
    if (!record) {
      throw new Error(`Result not found: ${source.resultId}`);
    }
    return new TabulatedResult(record.summary);
  } finally {
    await store.close();
  }
}

/**
 * Format output based on config (JSON or human-readable)
 */
export function formatOutput(result: CommandResult, config: CommandConfig): void {
  if (config.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    if (result.success) {
      if (result.data !== undefined) {
        console.log(result.data);
      }
    } else {
      console.error(`Error: ${result.error}`);
    }
  }
}

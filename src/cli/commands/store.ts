/**
 * Store Commands - Persisted posterior summaries
 */

import { parsePosteriorSummary } from '../../results/tabulated-result.js';
import { ResultStore } from '../../storage/result-store.js';
import type { CommandConfig, CommandResult } from '../types.js';
import { failure, readJsonFile, stringField } from '../utils/helpers.js';
import { formatHeader, formatRecordList } from '../utils/formatters.js';
import { isNonEmptyString, validateArgs, validationError, type CommandSchema } from '../utils/validators.js';

const saveSchema: CommandSchema = {
  file: { type: 'string', required: true, validator: isNonEmptyString },
  name: { type: 'string', maxLength: 100 },
};

const idSchema: CommandSchema = {
  id: { type: 'uuid', required: true },
};

async function withStore<T>(config: CommandConfig, body: (store: ResultStore) => Promise<T>): Promise<T> {
  const store = new ResultStore({ dataDir: config.dataDir });
  await store.init();
  try {
    return await body(store);
  } finally {
    await store.close();
  }
}

export async function cmdStore(args: string[], config: CommandConfig): Promise<CommandResult> {
  const subCommand = args[0];
  const params = args.slice(1);

  try {
    switch (subCommand) {
      case 'save': {
        const validation = validateArgs(params, saveSchema, ['file']);
        if (!validation.valid || !validation.data) {
          return validationError(validation.errors);
        }
        const file = stringField(validation.data, 'file') ?? '';
        const name = stringField(validation.data, 'name') ?? null;

        const summary = parsePosteriorSummary(await readJsonFile(file));
        const id = await withStore(config, store => store.save(summary, { name }));
        return {
          success: true,
          data: config.json ? { id, name } : `Saved result: ${id}${name ? `\n  Name: ${name}` : ''}`,
        };
      }

      case 'list':
      case 'ls': {
        const records = await withStore(config, store => store.list());
        return { success: true, data: config.json ? { records } : formatRecordList(records) };
      }

      case 'show':
      case 'get': {
        const validation = validateArgs(params, idSchema, ['id']);
        if (!validation.valid || !validation.data) {
          return validationError(validation.errors);
        }
        const id = stringField(validation.data, 'id') ?? '';
        const record = await withStore(config, store => store.load(id));
        if (!record) {
          return { success: false, error: `Result not found: ${id}` };
        }
        if (config.json) {
          return { success: true, data: record };
        }

        let output = formatHeader(`Result ${record.id}`);
        output += `\n  Name: ${record.name ?? '(none)'}\n`;
        output += `  Created: ${record.createdAt}\n`;
        output += `  Checksum: ${record.checksum}\n\n`;
        for (const [label, table] of Object.entries(record.summary.latent)) {
          output += `  ${label}: ${table.mean.length} values\n`;
        }
        for (const [name, hyper] of Object.entries(record.summary.hyperparameters)) {
          output += `  ${name} (${hyper.internalName}, ${hyper.link})\n`;
        }
        return { success: true, data: output };
      }

      case 'delete':
      case 'rm': {
        const validation = validateArgs(params, idSchema, ['id']);
        if (!validation.valid || !validation.data) {
          return validationError(validation.errors);
        }
        const id = stringField(validation.data, 'id') ?? '';
        const deleted = await withStore(config, store => store.delete(id));
        if (!deleted) {
          return { success: false, error: `Result not found: ${id}` };
        }
        return { success: true, data: config.json ? { id, deleted } : `Deleted result: ${id}` };
      }

      default:
        return {
          success: false,
          error: `Unknown store subcommand: ${subCommand}\n` +
            'Available: save, list, show, delete',
        };
    }
  } catch (error) {
    return failure(error);
  }
}

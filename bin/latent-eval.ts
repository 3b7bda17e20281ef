#!/usr/bin/env node
/**
 * latent-eval CLI
 * Evaluate component effects and predictor expressions for latent Gaussian models
 *
 * All commands run locally; stored results live in the data directory.
 */

import { parseArgs } from 'node:util';
import * as dotenv from 'dotenv';
import { getEngineConfig } from '../src/config.js';
import { errorMessage } from '../src/core/errors.js';
import {
  cmdEffects,
  cmdModel,
  cmdPredict,
  cmdState,
  cmdStore,
  formatOutput,
  type Command,
  type CommandConfig,
} from '../src/cli/index.js';
import { LogLevel, cliLogger, configureLogger, parseLogLevel } from '../src/utils/logger.js';

dotenv.config();

const VERSION = '1.0.0';

const HELP = `
latent-eval v${VERSION}
Component effect and predictor evaluation for latent Gaussian models

Usage: latent-eval [options] <command> [command options]

Commands:
  model <file>          Show components and the joint formula of a model file
  state                 Latent states (summary or samples) of a fitted result
  effects               Per-component effects for each state
  predict [expression]  Evaluate a predictor expression for each state
  store <sub>           Stored posterior summaries (save|list|show|delete)

State options (state, effects, predict):
  --model <file>        Model description (JSON)
  --result <file>       Posterior summary (JSON)
  --result-id <id>      Stored posterior summary
  --property <name>     mode, mean, sd, sample or <p>quant (default: mode)
  --n <count>           Number of samples for --property sample (default: 1)
  --seed <seed>         Random seed, 0 = not reproducible

Evaluation options (effects, predict):
  --data <file>         Data fields (JSON object)
  --include <labels>    Comma-separated component labels to include
  --exclude <labels>    Comma-separated component labels to exclude
  --format <format>     auto, matrix or list (predict only, default: auto)

Store:
  store save <file> [--name <name>]
  store list
  store show <id>
  store delete <id>

Options:
  -h, --help            Show this help message
  -v, --version         Show version number
  -d, --data-dir        Data directory (default: ./data)
  --json                Output as JSON
  --log-level <level>   debug, info, warn, error or silent
  --log-json            Log as JSON lines

Environment Variables:
  LATENT_EVAL_DATA_DIR   Data directory path
  LATENT_EVAL_LOG_LEVEL  Log level
  LATENT_EVAL_LOG_JSON   Log as JSON lines (1/true)
  LATENT_EVAL_SEED       Default seed

Examples:
  latent-eval model ./model.json
  latent-eval state --model ./model.json --result ./posterior.json --property mean
  latent-eval effects --model ./model.json --data ./data.json --result ./posterior.json
  latent-eval predict "exp(intercept_eval() + x_eval(x))" --model ./model.json --data ./data.json \\
      --result ./posterior.json --property sample --n 100 --seed 42
  latent-eval store save ./posterior.json --name first-fit
`;

const COMMANDS: Record<string, Command> = {
  model: cmdModel,
  state: cmdState,
  effects: cmdEffects,
  predict: cmdPredict,
  store: cmdStore,
};

const GLOBAL_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  'data-dir': { type: 'string', short: 'd' },
  json: { type: 'boolean' },
  'log-level': { type: 'string' },
  'log-json': { type: 'boolean' },
} as const;

// ============== Config ==============

interface ParsedCommandLine {
  command: string;
  args: string[];
  config: CommandConfig;
}

function parseCommandLine(argv: string[]): ParsedCommandLine {
  // Command options are left to the command's own schema
  const { values, tokens } = parseArgs({
    args: argv,
    options: GLOBAL_OPTIONS,
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  if (values.help === true) {
    console.log(HELP);
    process.exit(0);
  }

  if (values.version === true) {
    console.log(VERSION);
    process.exit(0);
  }

  const env = getEngineConfig();

  const logLevelName = values['log-level'];
  let logLevel = env.logLevel;
  if (typeof logLevelName === 'string') {
    const parsed = parseLogLevel(logLevelName);
    if (parsed === null) {
      throw new Error(`Unknown log level: ${logLevelName}`);
    }
    logLevel = parsed;
  } else if (values.json === true && !process.env.LATENT_EVAL_LOG_LEVEL) {
    // Keep stdout parseable
    logLevel = LogLevel.WARN;
  }
  configureLogger({ level: logLevel, json: values['log-json'] === true || env.logJson });

  const globalIndices = new Set<number>();
  for (const token of tokens) {
    if (token.kind === 'option' && token.name in GLOBAL_OPTIONS) {
      globalIndices.add(token.index);
      if (token.value !== undefined && !token.inlineValue) {
        globalIndices.add(token.index + 1);
      }
    }
  }
  const commandToken = tokens.find(t => t.kind === 'positional');
  if (!commandToken) {
    return { command: 'help', args: [], config: commandConfig(values, env.dataDir, env.seed) };
  }

  return {
    command: argv[commandToken.index],
    args: argv.filter((_, i) => i > commandToken.index && !globalIndices.has(i)),
    config: commandConfig(values, env.dataDir, env.seed),
  };
}

function commandConfig(
  values: Record<string, unknown>,
  dataDir: string,
  seed: number
): CommandConfig {
  const dir = values['data-dir'];
  return {
    json: values.json === true,
    dataDir: typeof dir === 'string' ? dir : dataDir,
    seed,
  };
}

// ============== Main ==============

async function main(): Promise<void> {
  const { command, args, config } = parseCommandLine(process.argv.slice(2));

  const run = COMMANDS[command];
  if (!run) {
    if (command !== 'help') {
      console.error(`Unknown command: ${command}`);
    }
    console.log(HELP);
    process.exit(command === 'help' ? 0 : 1);
  }

  cliLogger.debug('Running command', { command, args: args.length });
  const result = await run(args, config);
  formatOutput(result, config);
  process.exit(result.success ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});

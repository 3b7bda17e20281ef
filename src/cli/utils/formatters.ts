/**
 * CLI Formatters - Output formatting functions
 */

import type { EffectSequence, StateSequence } from '../../types/index.js';
import type { ComponentSummary } from '../../core/model.js';
import type { PredictorOutput } from '../../core/predictor-evaluator.js';
import { toPlain } from '../../expression/values.js';
import type { ResultRecordInfo } from '../../storage/result-store.js';

/**
 * Format header
 */
export function formatHeader(title: string): string {
  return `${title}:\n${'='.repeat(60)}\n`;
}

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NA';
  if (!Number.isFinite(value)) return value > 0 ? 'Inf' : '-Inf';
  if (Number.isInteger(value)) return String(value);
  const text = value.toPrecision(6);
  return /^-?\d+\.\d+$/.test(text) ? text.replace(/\.?0+$/, '') : text;
}

function formatVector(values: readonly number[], limit: number = 10): string {
  const shown = values.slice(0, limit).map(formatNumber).join(', ');
  return values.length > limit ? `[${shown}, ... (${values.length} values)]` : `[${shown}]`;
}

/**
 * Named vectors, one block per state
 */
function formatNamedSequence(title: string, sequence: ReadonlyArray<Record<string, readonly number[]>>): string {
  let output = formatHeader(title);

  if (sequence.length === 0) {
    output += '\n  No states.\n';
    return output;
  }

  sequence.forEach((entry, k) => {
    if (sequence.length > 1) {
      output += `\n  State ${k + 1}\n`;
    }
    for (const [name, values] of Object.entries(entry)) {
      output += `    ${name}: ${formatVector(values)}\n`;
    }
  });

  return output;
}

export function formatStates(states: StateSequence): string {
  return formatNamedSequence(`Latent States (${states.length})`, states);
}

export function formatEffects(effects: EffectSequence): string {
  return formatNamedSequence(`Component Effects (${effects.length} states)`, effects);
}

/**
 * Matrix output as a table with one column per state
 */
export function formatPredictor(output: PredictorOutput): string {
  if (output.format === 'list') {
    let text = formatHeader(`Predictor Values (${output.values.length} states)`);
    output.values.forEach((value, k) => {
      text += `  [${k + 1}] ${JSON.stringify(toPlain(value))}\n`;
    });
    return text;
  }

  let text = formatHeader(`Predictor (${output.nrow} x ${output.ncol})`);
  const labels = output.rowNames ?? output.columns[0].map((_, i) => String(i + 1));
  const width = Math.max(...labels.map(l => l.length));
  text += `  ${' '.repeat(width)}  ${output.columns.map((_, k) => `state ${k + 1}`.padStart(12)).join(' ')}\n`;
  for (let i = 0; i < output.nrow; i++) {
    const cells = output.columns.map(column => formatNumber(column[i]).padStart(12));
    text += `  ${labels[i].padEnd(width)}  ${cells.join(' ')}\n`;
  }
  return text;
}

export function formatModelSummary(components: ComponentSummary[], formula: string): string {
  let output = formatHeader('Model');
  output += `\n  Formula: ${formula}\n\n`;
  for (const c of components) {
    output += `  ${c.label} (${c.type}, ${c.model})\n`;
    output += `      Mapper: ${c.mapper}, size ${c.size}${c.linear ? '' : ', non-linear'}\n`;
  }
  return output;
}

export function formatRecordList(records: ResultRecordInfo[]): string {
  let output = formatHeader(`Stored Results (${records.length})`);

  if (records.length === 0) {
    output += '\n  No results stored.\n';
    return output;
  }

  for (const r of records) {
    output += `\n  ${r.id}${r.name ? `  "${r.name}"` : ''}\n`;
    output += `      Created: ${r.createdAt}\n`;
    output += `      Latent: ${r.latentLabels.join(', ') || '(none)'}\n`;
    if (r.hyperparameters.length > 0) {
      output += `      Hyperparameters: ${r.hyperparameters.join(', ')}\n`;
    }
    output += `      Checksum: ${r.checksum.slice(0, 16)}...\n`;
  }

  return output;
}

/**
 * CLI Formatter Tests
 */
import { describe, it, expect } from 'vitest';
import {
  formatEffects,
  formatHeader,
  formatModelSummary,
  formatNumber,
  formatPredictor,
  formatStates,
} from '../../src/cli/utils/formatters.js';
import { list, numeric } from '../../src/expression/values.js';

const RULE = '='.repeat(60);

describe('formatNumber', () => {
  it('should print integers as is', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(100000)).toBe('100000');
  });

  it('should trim trailing zeros to six significant digits', () => {
    expect(formatNumber(0.5)).toBe('0.5');
    expect(formatNumber(100.25)).toBe('100.25');
    expect(formatNumber(1 / 3)).toBe('0.333333');
  });

  it('should keep exponent notation', () => {
    expect(formatNumber(1234567.8)).toBe('1.23457e+6');
  });

  it('should name non-finite values', () => {
    expect(formatNumber(NaN)).toBe('NA');
    expect(formatNumber(Infinity)).toBe('Inf');
    expect(formatNumber(-Infinity)).toBe('-Inf');
  });
});

describe('formatStates and formatEffects', () => {
  it('should list a single state without a state heading', () => {
    expect(formatStates([{ x: [1, 0.5] }])).toBe(`Latent States (1):\n${RULE}\n    x: [1, 0.5]\n`);
  });

  it('should number multiple states', () => {
    expect(formatEffects([{ x: [1] }, { x: [2] }])).toBe(
      `Component Effects (2 states):\n${RULE}\n\n  State 1\n    x: [1]\n\n  State 2\n    x: [2]\n`
    );
  });

  it('should shorten long vectors', () => {
    const values = Array.from({ length: 12 }, (_, i) => i + 1);
    expect(formatStates([{ u: values }])).toBe(
      `Latent States (1):\n${RULE}\n    u: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, ... (12 values)]\n`
    );
  });

  it('should say when there are no states', () => {
    expect(formatEffects([])).toBe(`Component Effects (0 states):\n${RULE}\n\n  No states.\n`);
  });
});

describe('formatPredictor', () => {
  it('should print one column per state', () => {
    const text = formatPredictor({
      format: 'matrix',
      nrow: 2,
      ncol: 2,
      rowNames: null,
      columns: [[1, 2.5], [3, 4]],
    });

    const pad = (s: string): string => s.padStart(12);
    expect(text.split('\n')).toEqual([
      'Predictor (2 x 2):',
      RULE,
      `     ${pad('state 1')} ${pad('state 2')}`,
      `  1  ${pad('1')} ${pad('3')}`,
      `  2  ${pad('2.5')} ${pad('4')}`,
      '',
    ]);
  });

  it('should use row names as labels', () => {
    const text = formatPredictor({ format: 'matrix', nrow: 1, ncol: 1, rowNames: ['site_a'], columns: [[7]] });
    expect(text.split('\n')[3]).toBe(`  site_a  ${'7'.padStart(12)}`);
  });

  it('should print list values as JSON', () => {
    const text = formatPredictor({ format: 'list', values: [numeric([1, 2]), list([numeric([3])], ['a'])] });
    expect(text).toBe(`Predictor Values (2 states):\n${RULE}\n  [1] [1,2]\n  [2] {"a":[3]}\n`);
  });
});

describe('formatModelSummary', () => {
  it('should show the formula and each component', () => {
    const text = formatModelSummary(
      [
        { label: 'x', type: 'fixed', model: 'linear', mapper: 'linear', size: 1, linear: true },
        { label: 'ex', type: 'other', model: 'generic', mapper: 'exp(linear)', size: 1, linear: false },
      ],
      'BRU_response ~ -1 + f(x, model = "linear")'
    );

    expect(text).toBe(
      `${formatHeader('Model')}\n  Formula: BRU_response ~ -1 + f(x, model = "linear")\n\n` +
      '  x (fixed, linear)\n      Mapper: linear, size 1\n' +
      '  ex (other, generic)\n      Mapper: exp(linear), size 1, non-linear\n'
    );
  });
});

/**
 * Components & Component List
 *
 * A component couples a label, input expressions and a joint mapper. The
 * list keeps definition order; every downstream operation iterates in that
 * order regardless of how callers order include filters.
 *
 * @module core/component
 */

import type {
  Component,
  ComponentInputSpec,
  ComponentType,
  JointMapper,
  Label,
  MainMapper,
} from '../types/index.js';
import { COMPONENT_TYPES } from '../types/index.js';
import { ComponentMapper } from '../mappers/component-mapper.js';
import { IndexMapper } from '../mappers/index-mapper.js';
import { ConfigurationError } from './errors.js';

export interface ComponentOptions {
  label: Label;
  /** Inferred from the mapper kind when omitted */
  type?: ComponentType;
  /** Solver model name; defaults per type */
  model?: string;
  main?: string | null;
  group?: string | null;
  replicate?: string | null;
  weights?: string | null;
  /** Main-value mapper, or a complete joint mapper */
  mapper: MainMapper | JointMapper;
  /** Group levels when `mapper` is a main-value mapper */
  groupLevels?: Array<number | string>;
  replicateLevels?: Array<number | string>;
}

const DEFAULT_MODEL: Record<ComponentType, string> = {
  fixed: 'linear',
  offset: 'offset',
  const: 'const',
  iid: 'iid',
  other: 'generic',
};

const LABEL_PATTERN = /^[A-Za-z.][A-Za-z0-9._]*$/;

export function isJointMapper(mapper: MainMapper | JointMapper): mapper is JointMapper {
  return 'stages' in mapper;
}

function inferType(mapper: MainMapper | JointMapper): ComponentType {
  const kind = isJointMapper(mapper) ? mapper.stages[0].kind : mapper.kind;
  switch (kind) {
    case 'linear':
      return 'fixed';
    case 'const':
      return 'const';
    case 'offset':
      return 'offset';
    default:
      return 'other';
  }
}

/**
 * Build a frozen component. `main` defaults to the label, or to `1` for
 * const components.
 */
export function createComponent(options: ComponentOptions): Component {
  const { label } = options;
  if (!LABEL_PATTERN.test(label)) {
    throw new ConfigurationError(`Invalid component label "${label}"`);
  }
  const type = options.type ?? inferType(options.mapper);
  if (!COMPONENT_TYPES.includes(type)) {
    throw new ConfigurationError(`Component "${label}" has unknown type "${type}"`);
  }

  let mapper: JointMapper;
  if (isJointMapper(options.mapper)) {
    if (options.groupLevels || options.replicateLevels) {
      throw new ConfigurationError(`Component "${label}": group/replicate levels only apply to main-value mappers`);
    }
    mapper = options.mapper;
  } else {
    mapper = new ComponentMapper({
      main: options.mapper,
      group: options.groupLevels ? new IndexMapper(options.groupLevels) : undefined,
      replicate: options.replicateLevels ? new IndexMapper(options.replicateLevels) : undefined,
    });
  }

  const input: ComponentInputSpec = Object.freeze({
    main: options.main ?? (type === 'const' ? '1' : label),
    group: options.group ?? null,
    replicate: options.replicate ?? null,
    weights: options.weights ?? null,
  });

  return Object.freeze({
    label,
    type,
    model: options.model ?? DEFAULT_MODEL[type],
    input,
    mapper,
  });
}

/**
 * Ordered, label-unique, immutable collection of components
 */
export class ComponentList implements Iterable<Component> {
  private readonly items: readonly Component[];
  private readonly byLabel: ReadonlyMap<Label, Component>;

  constructor(components: Iterable<Component>) {
    const items = [...components];
    const byLabel = new Map<Label, Component>();
    const duplicates = new Set<Label>();
    for (const component of items) {
      if (byLabel.has(component.label)) {
        duplicates.add(component.label);
      }
      byLabel.set(component.label, component);
    }
    if (duplicates.size > 0) {
      throw new ConfigurationError(`Duplicate component label(s): ${[...duplicates].join(', ')}`);
    }
    this.items = Object.freeze(items);
    this.byLabel = byLabel;
  }

  get size(): number {
    return this.items.length;
  }

  labels(): Label[] {
    return this.items.map(c => c.label);
  }

  has(label: Label): boolean {
    return this.byLabel.has(label);
  }

  get(label: Label): Component {
    const component = this.byLabel.get(label);
    if (!component) {
      throw new ConfigurationError(`Unknown component label: ${label}`);
    }
    return component;
  }

  /**
   * Components whose labels are in `labels`, in list order
   */
  select(labels: Iterable<Label>): Component[] {
    const wanted = new Set(labels);
    return this.items.filter(c => wanted.has(c.label));
  }

  toArray(): Component[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Component> {
    return this.items[Symbol.iterator]();
  }
}

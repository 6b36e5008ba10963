/**
 * style-config-loader.ts
 * Loads the emitter's YAML style file and merges it over DEFAULT_STYLE.
 *
 * Accepted shape (every key optional):
 *
 *   graph:        { rankdir: TB, ... }          # DOT attributes
 *   node:         { fontname: Helvetica, ... }
 *   edge:         { color: black, ... }
 *   dataFlow:     { color: blue, ... }          # DEF → USE edges
 *   blocks:       { "FSM Controller": { color: red }, ... }
 *   fragments:    { opaque: { fillcolor: grey }, ... }
 *   linkTemplate: "{id}.html"
 *   bus:          { basePenWidth: 1, maxPenWidth: 8 }
 *
 * Attribute values may be strings, numbers or booleans; they are stored as
 * strings. Unknown keys and wrong types raise ConfigError.
 */

import yaml from 'js-yaml';
import type { BlockClassification, FragmentKind } from '../models/behavior.js';
import { DEFAULT_STYLE } from '../models/style-config.js';
import type { DotAttrs, StyleConfig } from '../models/style-config.js';
import { ConfigError } from './errors.js';

const TOP_LEVEL_KEYS = new Set(['graph', 'node', 'edge', 'dataFlow', 'blocks', 'fragments', 'linkTemplate', 'bus']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isClassification(key: string): key is BlockClassification {
  return Object.prototype.hasOwnProperty.call(DEFAULT_STYLE.blocks, key);
}

function isFragmentKind(key: string): key is FragmentKind {
  return Object.prototype.hasOwnProperty.call(DEFAULT_STYLE.fragments, key);
}

/** Parse and validate style YAML. An empty document yields the defaults. */
export function loadStyleConfig(text: string, source = '<style>'): StyleConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new ConfigError(`${source}: invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseStyleConfig(raw, source);
}

/** Validate an already-parsed style object and merge it over the defaults. */
export function parseStyleConfig(raw: unknown, source = '<style>'): StyleConfig {
  const style = cloneStyle(DEFAULT_STYLE);
  if (raw === null || raw === undefined) return style;
  if (!isRecord(raw)) throw new ConfigError(`${source}: top level must be a mapping`);

  for (const key of Object.keys(raw)) {
    if (!TOP_LEVEL_KEYS.has(key)) throw new ConfigError(`${source}: unknown key "${key}"`);
  }

  if (raw['graph'] !== undefined) Object.assign(style.graph, parseAttrs(raw['graph'], `${source}: graph`));
  if (raw['node'] !== undefined) Object.assign(style.node, parseAttrs(raw['node'], `${source}: node`));
  if (raw['edge'] !== undefined) Object.assign(style.edge, parseAttrs(raw['edge'], `${source}: edge`));
  if (raw['dataFlow'] !== undefined) {
    Object.assign(style.dataFlow, parseAttrs(raw['dataFlow'], `${source}: dataFlow`));
  }

  const blocks = raw['blocks'];
  if (blocks !== undefined) {
    if (!isRecord(blocks)) throw new ConfigError(`${source}: blocks must be a mapping`);
    for (const [name, attrs] of Object.entries(blocks)) {
      if (!isClassification(name)) throw new ConfigError(`${source}: unknown block classification "${name}"`);
      Object.assign(style.blocks[name], parseAttrs(attrs, `${source}: blocks.${name}`));
    }
  }

  const fragments = raw['fragments'];
  if (fragments !== undefined) {
    if (!isRecord(fragments)) throw new ConfigError(`${source}: fragments must be a mapping`);
    for (const [kind, attrs] of Object.entries(fragments)) {
      if (!isFragmentKind(kind)) throw new ConfigError(`${source}: unknown fragment kind "${kind}"`);
      Object.assign(style.fragments[kind], parseAttrs(attrs, `${source}: fragments.${kind}`));
    }
  }

  const link = raw['linkTemplate'];
  if (link !== undefined) {
    if (typeof link !== 'string' || !link.includes('{id}')) {
      throw new ConfigError(`${source}: linkTemplate must be a string containing "{id}"`);
    }
    style.linkTemplate = link;
  }

  const bus = raw['bus'];
  if (bus !== undefined) {
    if (!isRecord(bus)) throw new ConfigError(`${source}: bus must be a mapping`);
    for (const [key, value] of Object.entries(bus)) {
      if (key !== 'basePenWidth' && key !== 'maxPenWidth') {
        throw new ConfigError(`${source}: unknown key "bus.${key}"`);
      }
      if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ConfigError(`${source}: bus.${key} must be a positive number`);
      }
      style.bus[key] = value;
    }
    if (style.bus.maxPenWidth < style.bus.basePenWidth) {
      throw new ConfigError(`${source}: bus.maxPenWidth must not be smaller than bus.basePenWidth`);
    }
  }

  return style;
}

function parseAttrs(value: unknown, where: string): DotAttrs {
  if (!isRecord(value)) throw new ConfigError(`${where} must be a mapping`);
  const attrs: DotAttrs = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') attrs[k] = v;
    else if (typeof v === 'number' || typeof v === 'boolean') attrs[k] = String(v);
    else throw new ConfigError(`${where}.${k} must be a string, number or boolean`);
  }
  return attrs;
}

function cloneStyle(style: StyleConfig): StyleConfig {
  const blocks = { ...style.blocks };
  for (const name of Object.keys(blocks)) {
    if (isClassification(name)) blocks[name] = { ...blocks[name] };
  }
  const fragments = { ...style.fragments };
  for (const kind of Object.keys(fragments)) {
    if (isFragmentKind(kind)) fragments[kind] = { ...fragments[kind] };
  }
  return {
    graph: { ...style.graph },
    node: { ...style.node },
    edge: { ...style.edge },
    dataFlow: { ...style.dataFlow },
    blocks,
    fragments,
    linkTemplate: style.linkTemplate,
    bus: { ...style.bus },
  };
}

import fs from 'node:fs/promises';
import Ajv from 'ajv/dist/2020';

import {
  boolFlag,
  charFlag,
  doubleFlag,
  intFlag,
  slot,
  strFlag,
  type FlagDeclaration,
  type FlagTable,
  type FlagValue,
} from '../flags/declarations';
import { coerceChar, INT32_MAX, INT32_MIN } from '../flags/coerce';
import type { FlagType } from '../flags/flagTypes';
import { errorMessage } from '../util/errorMessage';
import flagTableSchema from './schema/flag-table-schema.json';

/**
 * On-disk form of a flag table (see schema/flag-table-schema.json).
 */
export type FlagTableEntry = {
  type: FlagType;
  short?: string;
  long?: string;
  description?: string;
  /** Checked against `type` by the schema. */
  default?: unknown;
};

export type FlagTableDocument = {
  name: string;
  description?: string;
  flags: FlagTableEntry[];
};

export type LoadedFlagTable = {
  name: string;
  description: string;
  flags: FlagDeclaration[];
};

export class FlagTableError extends Error {
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid flag table ${source}:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
    this.name = 'FlagTableError';
    this.problems = problems;
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile<FlagTableDocument>(flagTableSchema);

function entryLabel(entry: FlagTableEntry, index: number): string {
  return `/flags/${index} (${entry.long ?? entry.short ?? '?'})`;
}

/** `--output` -> `output`, `-o` -> `o`. */
function keyFromName(name: string): string {
  return name.replace(/^-+/, '');
}

/** Checks the schema cannot express: default ranges, name and value-key uniqueness. */
function semanticProblems(doc: FlagTableDocument): string[] {
  const problems: string[] = [];
  const seen = new Map<string, number>();
  const keys = new Map<string, number>();

  doc.flags.forEach((entry, index) => {
    const label = entryLabel(entry, index);
    if (entry.type === 'char' && typeof entry.default === 'string' && coerceChar(entry.default) === undefined) {
      problems.push(`${label} char default must be exactly one character`);
    }
    if (
      entry.type === 'int' &&
      typeof entry.default === 'number' &&
      (entry.default < INT32_MIN || entry.default > INT32_MAX)
    ) {
      problems.push(`${label} int default is outside the 32-bit range`);
    }
    for (const name of [entry.short, entry.long]) {
      if (name === undefined) continue;
      const prev = seen.get(name);
      if (prev !== undefined) problems.push(`${label} name "${name}" is already used by /flags/${prev}`);
      else seen.set(name, index);
    }
    const keyName = entry.long ?? entry.short;
    if (keyName !== undefined) {
      const key = keyFromName(keyName);
      const prev = keys.get(key);
      if (prev !== undefined) problems.push(`${label} value key "${key}" is already used by /flags/${prev}`);
      else keys.set(key, index);
    }
  });

  return problems;
}

function schemaProblems(): string[] {
  return (validateSchema.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
}

/**
 * Validate an already-parsed JSON value. Returns the list of problems (empty when valid).
 */
export function validateFlagTableDocument(doc: unknown): string[] {
  if (!validateSchema(doc)) return schemaProblems();
  return semanticProblems(doc);
}

export function parseFlagTableJson(text: string, source = '<inline>'): FlagTableDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new FlagTableError(source, [`invalid JSON: ${errorMessage(e)}`]);
  }
  if (!validateSchema(raw)) throw new FlagTableError(source, schemaProblems());
  const problems = semanticProblems(raw);
  if (problems.length > 0) throw new FlagTableError(source, problems);
  return raw;
}

export async function loadFlagTableFile(filePath: string): Promise<FlagTableDocument> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseFlagTableJson(text, filePath);
}

function toDeclaration(entry: FlagTableEntry): FlagDeclaration {
  const names = { short: entry.short, long: entry.long, description: entry.description };
  const d = entry.default;
  switch (entry.type) {
    case 'bool':
      return boolFlag(slot(typeof d === 'boolean' ? d : false), names);
    case 'char':
      return charFlag(slot(typeof d === 'string' ? d : ''), names);
    case 'str':
      return strFlag(slot(typeof d === 'string' ? d : ''), names);
    case 'int':
      return intFlag(slot(typeof d === 'number' ? d : 0), names);
    case 'double':
      return doubleFlag(slot(typeof d === 'number' ? d : 0), names);
  }
}

/**
 * Turn a validated document into declarations with fresh slots set to their defaults.
 */
export function buildFlagTable(doc: FlagTableDocument): LoadedFlagTable {
  return {
    name: doc.name,
    description: doc.description ?? '',
    flags: doc.flags.map(toDeclaration),
  };
}

/** Key of a flag in {@link collectValues}: its long name, else its short name, without dashes. */
export function flagKey(flag: FlagDeclaration): string {
  return keyFromName(flag.longName ?? flag.shortName ?? '');
}

/**
 * Current slot values keyed by {@link flagKey}, in table order.
 */
export function collectValues(flags: FlagTable): Record<string, FlagValue> {
  const out: Record<string, FlagValue> = {};
  for (const flag of flags) out[flagKey(flag)] = flag.target.value;
  return out;
}

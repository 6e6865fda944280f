import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parseFlags } from '../../flags/parseFlags';
import {
  buildFlagTable,
  collectValues,
  FlagTableError,
  loadFlagTableFile,
  parseFlagTableJson,
  validateFlagTableDocument,
} from '../flagTableFile';

const sampleDoc = {
  name: 'tool',
  description: 'A tool',
  flags: [
    { type: 'bool', short: '-h', long: '--help', description: 'show help' },
    { type: 'str', short: '-o', long: '--output', description: 'output file', default: 'out' },
    { type: 'char', short: '-c', default: 'A' },
    { type: 'int', long: '--count', default: 3 },
    { type: 'double', long: '--ratio' },
  ],
};

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof FlagTableError) return e.problems;
    throw e;
  }
  return [];
}

describe('flag table documents', () => {
  it('builds declarations with slots set to defaults', () => {
    const table = buildFlagTable(parseFlagTableJson(JSON.stringify(sampleDoc)));

    expect(table.name).toBe('tool');
    expect(table.description).toBe('A tool');
    expect(table.flags.map((f) => f.type)).toEqual(['bool', 'str', 'char', 'int', 'double']);
    expect(collectValues(table.flags)).toEqual({ help: false, output: 'out', c: 'A', count: 3, ratio: 0 });
  });

  it('feeds the parser', () => {
    const table = buildFlagTable(parseFlagTableJson(JSON.stringify(sampleDoc)));
    const result = parseFlags(table.flags, ['tool', '--count', '9', '-c', 'q', '--ratio', '0.5'], {
      diagnostics: () => undefined,
    });

    expect(result.ok).toBe(true);
    expect(collectValues(table.flags)).toEqual({ help: false, output: 'out', c: 'q', count: 9, ratio: 0.5 });
  });

  it('accepts a valid document', () => {
    expect(validateFlagTableDocument(sampleDoc)).toEqual([]);
  });

  it('requires a short or long name', () => {
    const problems = validateFlagTableDocument({ name: 't', flags: [{ type: 'bool', description: 'nameless' }] });
    expect(problems.length).toBeGreaterThan(0);
  });

  it('rejects unknown types and mistyped defaults', () => {
    expect(validateFlagTableDocument({ name: 't', flags: [{ type: 'list', short: '-l' }] }).length).toBeGreaterThan(0);
    expect(
      validateFlagTableDocument({ name: 't', flags: [{ type: 'bool', short: '-b', default: 'yes' }] }).length,
    ).toBeGreaterThan(0);
    expect(
      validateFlagTableDocument({ name: 't', flags: [{ type: 'int', short: '-n', default: 1.5 }] }).length,
    ).toBeGreaterThan(0);
  });

  it('rejects duplicate names', () => {
    const doc = {
      name: 't',
      flags: [
        { type: 'str', short: '-o', long: '--output' },
        { type: 'str', short: '-o', long: '--out2' },
      ],
    };
    expect(validateFlagTableDocument(doc)).toEqual(['/flags/1 (--out2) name "-o" is already used by /flags/0']);
  });

  it('rejects names that differ only in their dashes', () => {
    const doc = {
      name: 't',
      flags: [
        { type: 'double', long: '--ratio' },
        { type: 'str', short: '-o' },
        { type: 'str', long: '--o' },
      ],
    };
    expect(validateFlagTableDocument(doc)).toEqual(['/flags/2 (--o) value key "o" is already used by /flags/1']);
    expect(() => parseFlagTableJson(JSON.stringify(doc), 'keys.json')).toThrow(FlagTableError);
  });

  it('checks char and int default ranges', () => {
    const doc = {
      name: 't',
      flags: [
        { type: 'char', long: '--char', default: 'ab' },
        { type: 'int', long: '--count', default: 3000000000 },
      ],
    };
    expect(validateFlagTableDocument(doc)).toEqual([
      '/flags/0 (--char) char default must be exactly one character',
      '/flags/1 (--count) int default is outside the 32-bit range',
    ]);
  });

  it('reports malformed JSON', () => {
    const problems = problemsOf(() => parseFlagTableJson('{ nope', 'broken.json'));
    expect(problems).toHaveLength(1);
    expect(problems[0].startsWith('invalid JSON: ')).toBe(true);
  });

  it('names the source in the error message', () => {
    expect(() => parseFlagTableJson('{"name": "t"}', 'table.json')).toThrow(/^Invalid flag table table\.json:/);
  });

  it('loads a table from disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagtable-load-'));
    const file = path.join(dir, 'flags.json');
    fs.writeFileSync(file, JSON.stringify(sampleDoc), 'utf8');

    const doc = await loadFlagTableFile(file);
    expect(doc.name).toBe('tool');
    expect(doc.flags).toHaveLength(5);
  });
});

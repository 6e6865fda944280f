import { flagMatches, type FlagDeclaration, type FlagTable } from './declarations';
import { coerceChar, coerceDouble, coerceInt } from './coerce';
import { FlagParseError, unknownFlagMessage, usageMessage, type FlagErrorKind } from './errors';
import { isFlagType } from './flagTypes';

export type DiagnosticSink = (line: string) => void;

/**
 * How a token is applied when several declarations share its name:
 * - `first`: only the earliest declaration is filled
 * - `all`: every matching declaration is filled from the same value token
 */
export type DuplicateNameMode = 'first' | 'all';

export type ParseFlagsOptions = {
  /** Receives the diagnostic line written on failure (default: stdout). */
  diagnostics?: DiagnosticSink;
  duplicateNames?: DuplicateNameMode;
};

export type ParseResult = { ok: true } | { ok: false; error: FlagParseError };

type ApplyResult = { ok: true; consumed: 0 | 1 } | { ok: false; error: FlagParseError };

const writeDiagnostic: DiagnosticSink = (line) => {
  // eslint-disable-next-line no-console
  console.log(line);
};

function failure(kind: FlagErrorKind, flag: FlagDeclaration, token?: string): ApplyResult {
  return { ok: false, error: new FlagParseError({ kind, flag, token, usage: usageMessage(flag) }) };
}

/**
 * Fill one declaration's slot from the token following position `i`.
 */
function applyFlag(flag: FlagDeclaration, argv: readonly string[], i: number): ApplyResult {
  // Only reachable from untyped callers.
  if (!isFlagType(flag.type)) {
    return { ok: false, error: new FlagParseError({ kind: 'UnknownType', usage: '', token: argv[i] }) };
  }

  const hasValue = i + 1 < argv.length;
  const raw = hasValue ? argv[i + 1] : undefined;

  switch (flag.type) {
    case 'bool':
      flag.target.value = true;
      return { ok: true, consumed: 0 };

    case 'char': {
      if (raw === undefined) return failure('MissingChar', flag);
      const c = coerceChar(raw);
      if (c === undefined) return failure('CharWrongArg', flag, raw);
      flag.target.value = c;
      return { ok: true, consumed: 1 };
    }

    case 'str':
      if (raw === undefined) return failure('MissingStr', flag);
      flag.target.value = raw;
      return { ok: true, consumed: 1 };

    case 'int': {
      if (raw === undefined) return failure('MissingInt', flag);
      const n = coerceInt(raw);
      if (n === undefined) return failure('NotAnInt', flag, raw);
      flag.target.value = n;
      return { ok: true, consumed: 1 };
    }

    case 'double': {
      if (raw === undefined) return failure('MissingDouble', flag);
      const d = coerceDouble(raw);
      if (d === undefined) return failure('NotADouble', flag, raw);
      flag.target.value = d;
      return { ok: true, consumed: 1 };
    }
  }
}

function matchingFlags(flags: FlagTable, token: string, mode: DuplicateNameMode): FlagDeclaration[] {
  if (mode === 'all') return flags.filter((f) => flagMatches(f, token));
  const first = flags.find((f) => flagMatches(f, token));
  return first ? [first] : [];
}

/**
 * Parse `argv` against a flag table, writing each recognized value into its slot.
 *
 * `argv[0]` is the program name and is skipped. Parsing stops at the first error;
 * slots written before it keep their new values. On error one diagnostic line is
 * written before returning.
 */
export function parseFlags(flags: FlagTable, argv: readonly string[], options: ParseFlagsOptions = {}): ParseResult {
  const report = options.diagnostics ?? writeDiagnostic;
  const mode = options.duplicateNames ?? 'first';

  for (let i = 1; i < argv.length; i++) {
    const token = argv[i];
    const matches = matchingFlags(flags, token, mode);

    if (matches.length === 0) {
      const usage = unknownFlagMessage(token);
      report(usage);
      return { ok: false, error: new FlagParseError({ kind: 'UnknownFlag', usage, token }) };
    }

    let consumed = 0;
    for (const flag of matches) {
      const step = applyFlag(flag, argv, i);
      if (!step.ok) {
        if (step.error.usage) report(step.error.usage);
        return step;
      }
      consumed = Math.max(consumed, step.consumed);
    }
    i += consumed;
  }

  return { ok: true };
}

/**
 * Same as {@link parseFlags}, but throws the {@link FlagParseError} instead of returning it.
 */
export function parseFlagsOrThrow(flags: FlagTable, argv: readonly string[], options: ParseFlagsOptions = {}): void {
  const result = parseFlags(flags, argv, options);
  if (!result.ok) throw result.error;
}

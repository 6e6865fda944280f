/**
 * Caller-owned storage for one parsed value. The parser only ever assigns `value`.
 */
export type FlagSlot<T> = {
  value: T;
};

export type FlagNames = {
  /** Short spelling, e.g. `-h`. */
  shortName?: string;
  /** Long spelling, e.g. `--help`. */
  longName?: string;
  description: string;
};

export type BoolFlag = FlagNames & { type: 'bool'; target: FlagSlot<boolean> };
export type CharFlag = FlagNames & { type: 'char'; target: FlagSlot<string> };
export type StrFlag = FlagNames & { type: 'str'; target: FlagSlot<string> };
export type IntFlag = FlagNames & { type: 'int'; target: FlagSlot<number> };
export type DoubleFlag = FlagNames & { type: 'double'; target: FlagSlot<number> };

/**
 * One entry of a flag table. The `type` tag fixes the slot's value type.
 */
export type FlagDeclaration = BoolFlag | CharFlag | StrFlag | IntFlag | DoubleFlag;

export type FlagTable = readonly FlagDeclaration[];

export type FlagValue = FlagDeclaration['target']['value'];

export function slot<T>(initial: T): FlagSlot<T> {
  return { value: initial };
}

type NameArgs = { short?: string; long?: string; description?: string };

function names(args: NameArgs): FlagNames {
  const out: FlagNames = { description: args.description ?? '' };
  if (args.short !== undefined) out.shortName = args.short;
  if (args.long !== undefined) out.longName = args.long;
  return out;
}

export function boolFlag(target: FlagSlot<boolean>, args: NameArgs): BoolFlag {
  return { type: 'bool', target, ...names(args) };
}

export function charFlag(target: FlagSlot<string>, args: NameArgs): CharFlag {
  return { type: 'char', target, ...names(args) };
}

export function strFlag(target: FlagSlot<string>, args: NameArgs): StrFlag {
  return { type: 'str', target, ...names(args) };
}

export function intFlag(target: FlagSlot<number>, args: NameArgs): IntFlag {
  return { type: 'int', target, ...names(args) };
}

export function doubleFlag(target: FlagSlot<number>, args: NameArgs): DoubleFlag {
  return { type: 'double', target, ...names(args) };
}

export function flagMatches(flag: FlagNames, token: string): boolean {
  return flag.shortName === token || flag.longName === token;
}

/** `-o,--output`, `-o` or `--output`, depending on which names are declared. */
export function joinFlagNames(flag: FlagNames): string {
  const parts: string[] = [];
  if (flag.shortName !== undefined) parts.push(flag.shortName);
  if (flag.longName !== undefined) parts.push(flag.longName);
  return parts.join(',');
}

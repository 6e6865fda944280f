/**
 * Flag value kinds and their display strings.
 */

export type FlagType = 'bool' | 'char' | 'str' | 'int' | 'double';

export const FLAG_TYPES: readonly FlagType[] = Object.freeze(['bool', 'char', 'str', 'int', 'double'] as const);

/** Placeholder shown after the flag names in help output. */
export const FLAG_TYPE_PLACEHOLDERS: Readonly<Record<FlagType, string>> = Object.freeze({
  bool: '',
  char: '<char>',
  str: '<str>',
  int: '<int>',
  double: '<double>',
});

/** Value spelling used in `Usage:` diagnostic lines. */
export const FLAG_VALUE_NAMES: Readonly<Record<FlagType, string>> = Object.freeze({
  bool: '',
  char: '<char>',
  str: '<string>',
  int: '<integer>',
  double: '<double>',
});

export function isFlagType(v: unknown): v is FlagType {
  return typeof v === 'string' && (FLAG_TYPES as readonly string[]).includes(v);
}

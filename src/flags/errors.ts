import { joinFlagNames, type FlagDeclaration } from './declarations';
import { FLAG_VALUE_NAMES } from './flagTypes';

export type FlagErrorKind =
  | 'UnknownType'
  | 'MissingChar'
  | 'MissingStr'
  | 'MissingInt'
  | 'MissingDouble'
  | 'CharWrongArg'
  | 'UnknownFlag'
  | 'NotAnInt'
  | 'NotADouble';

/**
 * Numeric status codes, `Ok` first and then one per error kind.
 */
export const FlagStatus = Object.freeze({
  Ok: 0,
  UnknownType: 1,
  MissingChar: 2,
  MissingStr: 3,
  MissingInt: 4,
  MissingDouble: 5,
  CharWrongArg: 6,
  UnknownFlag: 7,
  NotAnInt: 8,
  NotADouble: 9,
} as const);

export type FlagStatusCode = (typeof FlagStatus)[keyof typeof FlagStatus];

export class FlagParseError extends Error {
  readonly kind: FlagErrorKind;
  readonly status: FlagStatusCode;
  /** Offending token: the unknown flag, or the value that failed coercion. */
  readonly token?: string;
  /** Declaration that was being filled, absent for `UnknownFlag`. */
  readonly flag?: FlagDeclaration;
  /** Diagnostic line written for this error, empty for `UnknownType`. */
  readonly usage: string;

  constructor(args: { kind: FlagErrorKind; usage: string; token?: string; flag?: FlagDeclaration }) {
    super(args.usage || `Error parsing flags: ${args.kind}`);
    this.name = 'FlagParseError';
    this.kind = args.kind;
    this.status = FlagStatus[args.kind];
    this.token = args.token;
    this.flag = args.flag;
    this.usage = args.usage;
  }
}

export function unknownFlagMessage(token: string): string {
  return `Error parsing flags: unknown flag "${token}"`;
}

export function usageMessage(flag: FlagDeclaration): string {
  return `Usage: ${joinFlagNames(flag)} ${FLAG_VALUE_NAMES[flag.type]}`;
}

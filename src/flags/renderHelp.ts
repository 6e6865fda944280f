import { joinFlagNames, type FlagTable } from './declarations';
import { FlagStatus } from './errors';
import { FLAG_TYPE_PLACEHOLDERS } from './flagTypes';

/**
 * Help text for a flag table:
 *
 * ```
 * example
 * A sample application
 *
 * Options:
 *     -o,--output <str>
 *         set output file
 * ```
 *
 * Boolean flags have an empty placeholder, so their names line ends with a space.
 */
export function renderHelp(progName: string, description: string, flags: FlagTable): string {
  const lines: string[] = [progName, description, '', 'Options:'];
  for (const flag of flags) {
    lines.push(`    ${joinFlagNames(flag)} ${FLAG_TYPE_PLACEHOLDERS[flag.type]}`);
    lines.push(`        ${flag.description}`);
  }
  return lines.join('\n') + '\n';
}

export function printHelp(
  progName: string,
  description: string,
  flags: FlagTable,
  write: (text: string) => void = (text) => process.stdout.write(text),
): typeof FlagStatus.Ok {
  write(renderHelp(progName, description, flags));
  return FlagStatus.Ok;
}

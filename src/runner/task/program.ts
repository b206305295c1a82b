/* src/runner/task/program.ts
 * ProgramSpec: a program name plus its arguments, parsed from either a
 * whitespace-separated string or an explicit list.
 */

export type ProgramSpec = {
  readonly program: string;
  readonly args: ReadonlyArray<string>;
};

/** Raw configuration value accepted for a command's `run`. */
export type RawProgramSpec = string | ReadonlyArray<string>;

const isBlank = (s: string): boolean => s.trim().length === 0;

/**
 * Parse a raw command specification.
 * - string: split on runs of whitespace; the first word is the program
 * - list: first element is the program, the rest are arguments verbatim
 *
 * @throws Error when the string/list is empty or a list fragment is blank.
 */
export const parseProgramSpec = (raw: RawProgramSpec): ProgramSpec => {
  if (typeof raw === 'string') {
    if (isBlank(raw)) throw new Error('command string is empty');
    const [program, ...args] = raw.trim().split(/\s+/);
    return Object.freeze({ program, args: Object.freeze(args) });
  }
  if (raw.length === 0) {
    throw new Error('empty list as command specification');
  }
  if (raw.some(isBlank)) {
    throw new Error('empty fragment in command specification');
  }
  const [program, ...args] = raw;
  return Object.freeze({ program, args: Object.freeze(args) });
};

const quoteIfSpaced = (s: string): string => (/\s/.test(s) ? `"${s}"` : s);

/** Render back to a single line; fragments containing whitespace are double-quoted. */
export const formatProgramSpec = (spec: ProgramSpec): string =>
  [spec.program, ...spec.args].map(quoteIfSpaced).join(' ');

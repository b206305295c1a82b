/* src/runner/util/color.ts
 * Terminal styling by meaning. Everything prints plain when stdout is not a
 * terminal or DEVRELAY_BORING / NO_COLOR / FORCE_COLOR=0 ask for it.
 */
import chalk from 'chalk';

type Style = (text: string) => string;

/** Read per call: tests and `--boring` flip the environment at run time. */
export const plainOutput = (): boolean => {
  const env = process.env;
  if (env.DEVRELAY_BORING === '1' || env.NO_COLOR === '1') return true;
  if (env.FORCE_COLOR === '0') return true;
  return process.stdout.isTTY !== true;
};

const paint =
  (style: Style): Style =>
  (text) =>
    plainOutput() ? text : style(text);

/** Things that went well (finished runs, commands being started). */
export const ok = paint(chalk.green);
/** Paths and addresses worth spotting. */
export const alert = paint(chalk.cyan);
export const red = paint(chalk.red);
export const orange = paint(chalk.hex('#FFA500'));
export const bold = paint(chalk.bold);
export const dim = paint(chalk.dim);

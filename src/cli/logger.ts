/**
 * Terminal output for the sqlchat CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

const title = gradient(['#00B4D8', '#0077B6']);
const alarm = gradient(['#ff6b6b', '#c92a2a']);

type Tone = 'ok' | 'fail' | 'note';

const marks: Record<Tone, string> = {
  ok: chalk.green('✔'),
  fail: chalk.red('✖'),
  note: chalk.cyan('›'),
};

/**
 * One status line, optionally followed by a dimmed hint.
 */
function line(tone: Tone, message: string, hint?: string): void {
  console.log(`${marks[tone]} ${message}`);
  if (hint) {
    console.log(`  ${chalk.dim(hint)}`);
  }
}

export function printBanner(version: string): void {
  console.log('');
  console.log(`  ${title('sqlchat')} ${chalk.dim(`v${version}`)}`);
  console.log(`  ${chalk.gray('ask your SQLite database in plain language')}`);
  console.log('');
}

export const success = (message: string): void => line('ok', message);
export const error = (message: string, hint?: string): void => line('fail', message, hint);
export const info = (message: string): void => line('note', message);

export function progress(text: string): ReturnType<typeof ora> {
  return ora({ text, color: 'cyan' }).start();
}

/**
 * Labelled values aligned in a rounded box.
 */
export function panel(heading: string, fields: Array<[string, string]>): void {
  const width = Math.max(...fields.map(([label]) => label.length));
  const body = fields
    .map(([label, value]) => `${chalk.bold(label.padEnd(width))}  ${chalk.cyan(value)}`)
    .join('\n');
  console.log(
    boxen(body, {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      margin: { top: 0, bottom: 1, left: 1, right: 0 },
      borderStyle: 'round',
      borderColor: 'cyan',
      title: heading,
    })
  );
}

export function failurePanel(heading: string, message: string): void {
  console.log(
    boxen(alarm(message), {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      borderStyle: 'round',
      borderColor: 'red',
      title: heading,
    })
  );
}

export function heading(text: string): void {
  console.log(`\n${title(text)}`);
}

/**
 * Print SQL with dimmed line numbers.
 */
export function sqlBlock(sql: string): void {
  const lines = sql.split('\n');
  const gutter = String(lines.length).length;
  lines.forEach((text, index) => {
    console.log(`  ${chalk.dim(String(index + 1).padStart(gutter))} ${chalk.cyan(text)}`);
  });
}

/**
 * `label: value`, marked red when the value reports a problem.
 */
export function field(label: string, value: string, ok: boolean = true): void {
  console.log(`  ${ok ? marks.ok : marks.fail} ${chalk.bold(label)}: ${value}`);
}

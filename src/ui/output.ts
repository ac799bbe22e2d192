import chalk from 'chalk';

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);

export function heading(msg: string): void {
  console.log(chalk.bold(msg));
}

/** Prints a titled, sorted list; `(none)` when empty. */
export function printList(title: string, items: readonly string[]): void {
  heading(title);
  if (items.length === 0) {
    console.log(chalk.dim('\t(none)'));
  }
  for (const item of items) {
    console.log(`\t${item}`);
  }
  console.log('');
}

export function die(msg: string): never {
  fail(msg);
  process.exit(1);
}

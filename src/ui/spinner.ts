import ora from 'ora';

/**
 * Runs a synchronous step behind a spinner. With `enabled` false the
 * step runs silently, which keeps structured output clean.
 */
export function withSpinner<T>(text: string, fn: () => T, enabled = true): T {
  if (!enabled) return fn();
  const spinner = ora({ text, stream: process.stderr }).start();
  try {
    const result = fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}

/**
 * Spinner helper for long-running waits
 */

import ora from 'ora';

export type Spinner = ReturnType<typeof ora>;

/**
 * Run an operation behind a spinner, marking it succeeded or failed
 */
export async function withSpinner<T>(
  text: string,
  operation: (spinner: Spinner) => Promise<T>,
  successText?: (result: T) => string
): Promise<T> {
  const spinner = ora(text).start();
  try {
    const result = await operation(spinner);
    spinner.succeed(successText ? successText(result) : text);
    return result;
  } catch (error) {
    spinner.fail(text);
    throw error;
  }
}

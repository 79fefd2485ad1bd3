import * as clack from '@clack/prompts';
import process from "node:process";

/**
 * Common prompt patterns and utilities for consistent user interaction
 */

/**
 * Handle clack prompt cancellation with consistent behavior.
 * A cancelled run installed nothing, so it exits non-zero; the installer's
 * exit hook still releases the lock.
 */
export function handleCancel<T>(result: T | symbol, message?: string): T {
  if (clack.isCancel(result)) {
    clack.cancel(message || 'Operation cancelled');
    process.exit(1);
  }
  return result;
}

/**
 * Create a text input prompt with validation
 */
export async function textPrompt(
  message: string,
  placeholder?: string,
  validate?: (value: string) => string | undefined,
  defaultValue?: string,
  cancelMessage?: string
): Promise<string> {
  const result = await clack.text({
    message,
    placeholder,
    defaultValue,
    validate
  });

  return handleCancel(result, cancelMessage);
}

/**
 * Input validation utilities for consistent user input handling
 */

import type { InstallMode } from '../../types.js';

const INSTALL_CHOICES: Record<string, InstallMode> = {
  '1': 'system',
  '2': 'user',
};

/**
 * Validate the installation type answer: 1 (system-wide) or 2 (current user)
 */
export function validateInstallChoice(value: string): string | undefined {
  if (!value || value.trim().length === 0) {
    return 'Please enter 1 or 2';
  }
  if (parseInstallChoice(value) === undefined) {
    return `Invalid choice "${value.trim()}". Enter 1 for system-wide or 2 for the current user`;
  }
  return undefined;
}

export function parseInstallChoice(value: string): InstallMode | undefined {
  const key = value.trim();
  return Object.hasOwn(INSTALL_CHOICES, key) ? INSTALL_CHOICES[key] : undefined;
}

/**
 * Parse an install mode given by name, as on the command line
 */
export function parseInstallMode(value: string | undefined): InstallMode | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'system' || normalized === 'user' ? normalized : undefined;
}

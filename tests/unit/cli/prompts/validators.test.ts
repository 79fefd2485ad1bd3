import { describe, it, expect } from 'vitest';
import {
  parseInstallChoice,
  parseInstallMode,
  validateInstallChoice,
} from '../../../../src/cli/prompts/validators.js';

describe('prompt validators', () => {
  describe('validateInstallChoice', () => {
    it('should accept 1 and 2', () => {
      expect(validateInstallChoice('1')).toBeUndefined();
      expect(validateInstallChoice(' 2 ')).toBeUndefined();
    });

    it('should ask again for empty input', () => {
      expect(validateInstallChoice('')).toBe('Please enter 1 or 2');
      expect(validateInstallChoice('   ')).toBe('Please enter 1 or 2');
    });

    it('should reject anything else', () => {
      expect(validateInstallChoice(' 3')).toBe('Invalid choice "3". Enter 1 for system-wide or 2 for the current user');
      expect(validateInstallChoice('toString')).toBe(
        'Invalid choice "toString". Enter 1 for system-wide or 2 for the current user'
      );
    });
  });

  describe('parseInstallChoice', () => {
    it('should map choices to modes', () => {
      expect(parseInstallChoice('1')).toBe('system');
      expect(parseInstallChoice('2')).toBe('user');
      expect(parseInstallChoice('system')).toBeUndefined();
    });
  });

  describe('parseInstallMode', () => {
    it('should accept mode names in any case', () => {
      expect(parseInstallMode('System')).toBe('system');
      expect(parseInstallMode(' user ')).toBe('user');
    });

    it('should reject unknown names', () => {
      expect(parseInstallMode('global')).toBeUndefined();
      expect(parseInstallMode(undefined)).toBeUndefined();
    });
  });
});

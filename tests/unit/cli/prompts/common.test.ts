import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import * as clack from '@clack/prompts';
import { textPrompt } from '../../../../src/cli/prompts/common.js';

const { CANCELLED } = vi.hoisted(() => ({ CANCELLED: Symbol('clack:cancel') }));

vi.mock('@clack/prompts', () => ({
  text: vi.fn(),
  isCancel: (value: unknown) => value === CANCELLED,
  cancel: vi.fn(),
}));

describe('textPrompt', () => {
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
  });

  afterEach(() => {
    exitSpy.mockRestore();
    vi.mocked(clack.text).mockReset();
    vi.mocked(clack.cancel).mockReset();
  });

  it('should return the answer', async () => {
    vi.mocked(clack.text).mockResolvedValue('1.20.12');

    await expect(textPrompt('Go version to install', '1.21.0', undefined, '1.21.0')).resolves.toBe('1.20.12');
    expect(clack.text).toHaveBeenCalledWith({
      message: 'Go version to install',
      placeholder: '1.21.0',
      defaultValue: '1.21.0',
      validate: undefined,
    });
  });

  it('should exit with status 1 when cancelled', async () => {
    vi.mocked(clack.text).mockResolvedValue(CANCELLED);

    await expect(textPrompt('Installation type')).rejects.toThrow('exit 1');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(clack.cancel).toHaveBeenCalledWith('Operation cancelled');
  });

  it('should show a custom cancel message', async () => {
    vi.mocked(clack.text).mockResolvedValue(CANCELLED);

    await expect(textPrompt('Installation type', undefined, undefined, undefined, 'Install aborted')).rejects.toThrow('exit 1');
    expect(clack.cancel).toHaveBeenCalledWith('Install aborted');
  });
});

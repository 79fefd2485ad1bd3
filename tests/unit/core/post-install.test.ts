import { describe, expect, it } from 'vitest';
import { PostInstallVerifier } from '../../../src/core/post-install.js';
import { FakeCommandRunner, captureError, failed, ok } from '../../setup.js';

const GO = '/opt/go/bin/go';

function runnerWith(version: ReturnType<typeof ok>, env: ReturnType<typeof ok>): FakeCommandRunner {
  return new FakeCommandRunner().on((command, args) => {
    if (command !== GO) return undefined;
    return args[0] === 'version' ? version : args[0] === 'env' ? env : undefined;
  });
}

describe('PostInstallVerifier', () => {
  it('should report the version token from go version', () => {
    const runner = runnerWith(ok('go version go1.20.12 linux/amd64\n'), ok("GOROOT='/opt/go'\n"));

    const report = new PostInstallVerifier(runner).verify('/opt/go');

    expect(report).toEqual({ versionOutput: 'go version go1.20.12 linux/amd64', reportedVersion: 'go1.20.12' });
    expect(runner.commandLines()).toEqual([`${GO} version`, `${GO} env`]);
  });

  it('should fail when go version exits non-zero', () => {
    const runner = runnerWith(failed(2, 'broken'), ok('GOROOT=x'));

    expect(captureError(() => new PostInstallVerifier(runner).verify('/opt/go'))).toMatchObject({
      kind: 'PostInstallVerificationFailed',
      message: `${GO} version exited with status 2: broken`,
    });
  });

  it('should fail when go env prints nothing', () => {
    const runner = runnerWith(ok('go version go1.20.12 linux/amd64'), ok('   \n'));

    expect(captureError(() => new PostInstallVerifier(runner).verify('/opt/go'))).toMatchObject({
      kind: 'PostInstallVerificationFailed',
      message: `${GO} env produced no output`,
    });
  });

  it('should fail when the binary cannot be spawned', () => {
    expect(captureError(() => new PostInstallVerifier(new FakeCommandRunner()).verify('/opt/go'))).toMatchObject({
      kind: 'PostInstallVerificationFailed',
      message: `Could not run ${GO} version`,
    });
  });
});

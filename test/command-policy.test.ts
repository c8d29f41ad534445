import { afterEach, describe, expect, it, vi } from 'vitest';
import { enforceCommandPolicy, isAllowedRemoteCommand } from '../src/command-policy.js';
import { CommandPolicyError } from '../src/errors.js';

describe('command policy', () => {
  const originalMode = process.env.DR_COMMAND_POLICY_MODE;

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalMode === undefined) {
      delete process.env.DR_COMMAND_POLICY_MODE;
    } else {
      process.env.DR_COMMAND_POLICY_MODE = originalMode;
    }
  });

  it('allows the ssh invocations the connector makes', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'enforce';
    expect(() =>
      enforceCommandPolicy('ssh', ['-M', '-S', '/tmp/dr.sock', '-o', 'BatchMode=yes', '-fN', 'admin@dr-cl'], { source: 'test' }),
    ).not.toThrow();
    expect(() =>
      enforceCommandPolicy(
        'ssh',
        ['-S', '/tmp/dr.sock', '-T', '-o', 'BatchMode=yes', 'admin@dr-cl', 'cifs share create -vserver svm_dr -share-name s1 -path /vol2/q1'],
        { source: 'test' },
      ),
    ).not.toThrow();
    expect(() => enforceCommandPolicy('ssh', ['-S', '/tmp/dr.sock', '-O', 'exit', 'admin@dr-cl'], { source: 'test' })).not.toThrow();
  });

  it('blocks remote commands outside the allowlist', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'enforce';
    expect(() =>
      enforceCommandPolicy('ssh', ['-S', '/tmp/dr.sock', '-T', 'admin@dr-cl', 'volume delete -vserver svm_dr -volume vol1']),
    ).toThrow(/not allowlisted: volume delete/);
    expect(() => enforceCommandPolicy('ssh', ['-S', '/tmp/dr.sock', '-O', 'forward', 'admin@dr-cl'])).toThrow(
      CommandPolicyError,
    );
  });

  it('requires a control socket for remote commands', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'enforce';
    expect(() => enforceCommandPolicy('ssh', ['admin@dr-cl', 'snapmirror show'])).toThrow(/control socket/);
    expect(() => enforceCommandPolicy('ssh', ['-N', 'admin@dr-cl'])).toThrow(/master connections/);
  });

  it('rejects shell metacharacters in the remote command', () => {
    expect(isAllowedRemoteCommand('snapmirror show -destination-path svm_dr:vol1; reboot')).toEqual({
      allowed: false,
      reason: 'remote command contains shell metacharacters',
    });
    expect(isAllowedRemoteCommand('snapmirror show -destination-path svm_dr:vol1 -fields state,status')).toEqual({
      allowed: true,
    });
  });

  it('blocks unknown programs', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'enforce';
    expect(() => enforceCommandPolicy('python', ['-c', 'print(1)'], { source: 'test' })).toThrow(/not allowlisted/i);
  });

  it('does not enforce command checks when mode is off', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'off';
    expect(() => enforceCommandPolicy('python', ['-c', 'print(1)'], { source: 'test' })).not.toThrow();
  });

  it('warns instead of throwing when mode is audit', () => {
    process.env.DR_COMMAND_POLICY_MODE = 'audit';
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(() => enforceCommandPolicy('python', ['-c', 'print(1)'], { source: 'test' })).not.toThrow();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0]?.[0] || '')).toMatch(/command policy violation/i);
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../src/exec.js', () => ({
  runCommand: vi.fn(),
}));

import { CommandPolicyError, ConnectionError } from '../src/errors.js';
import { runCommand } from '../src/exec.js';
import { SshConnector } from '../src/ssh-connector.js';

const runCommandMock = vi.mocked(runCommand);

describe('ssh connector', () => {
  const connector = new SshConnector({
    user: 'admin',
    identityFile: '/keys/dr-agent',
    controlDir: '/tmp/dr-ctl',
    timeoutMs: 5000,
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    runCommandMock.mockReset();
    vi.restoreAllMocks();
  });

  it('opens a control master and runs commands over its socket', async () => {
    runCommandMock
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' })
      .mockResolvedValueOnce({ code: 0, stdout: 'Operation succeeded: snapmirror break.\n', stderr: '' });

    const session = await connector.connect('dr-cl');
    const result = await session.execute('snapmirror break -destination-path svm_dr:vol1', { input: 'y\n' });

    expect(result).toEqual({ output: 'Operation succeeded: snapmirror break.\n' });
    const [masterCommand, masterArgs, masterTimeout] = runCommandMock.mock.calls[0] ?? [];
    expect(masterCommand).toBe('ssh');
    expect(masterTimeout).toBe(5000);
    const socket = masterArgs?.[2] ?? '';
    expect(socket).toMatch(/^\/tmp\/dr-ctl\/dr-agent-.+\.sock$/);
    expect(masterArgs).toEqual([
      '-M',
      '-S',
      socket,
      '-o',
      'BatchMode=yes',
      '-o',
      'ControlPersist=yes',
      '-i',
      '/keys/dr-agent',
      '-fN',
      'admin@dr-cl',
    ]);
    expect(runCommandMock.mock.calls[1]).toEqual([
      'ssh',
      ['-S', socket, '-T', '-o', 'BatchMode=yes', 'admin@dr-cl', 'snapmirror break -destination-path svm_dr:vol1'],
      5000,
      { input: 'y\n', signal: undefined },
    ]);
  });

  it('reports cluster-side rejections as command errors', async () => {
    runCommandMock
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' })
      .mockResolvedValueOnce({ code: 0, stdout: '\nError: command failed: Volume vol1 is busy.\n', stderr: '' });

    const session = await connector.connect('dr-cl');

    await expect(session.execute('volume offline -vserver svm_dr -volume vol1')).resolves.toEqual({
      output: '\nError: command failed: Volume vol1 is busy.\n',
      error: 'Error: command failed: Volume vol1 is busy.',
    });
  });

  it('treats ssh exit 255 as a connection failure', async () => {
    runCommandMock
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' })
      .mockResolvedValueOnce({ code: 255, stdout: '', stderr: 'Connection closed by remote host\n' });

    const session = await connector.connect('dr-cl');

    const attempt = session.execute('snapmirror update -destination-path svm_dr:vol1');
    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toThrow('ssh to dr-cl failed: Connection closed by remote host');
  });

  it('passes command policy violations through unchanged', async () => {
    runCommandMock
      .mockResolvedValueOnce({ code: 0, stdout: '', stderr: '' })
      .mockRejectedValueOnce(new CommandPolicyError('command policy violation reason=remote command not allowlisted: system node'));

    const session = await connector.connect('dr-cl');

    const attempt = session.execute('system node reboot');
    await expect(attempt).rejects.toBeInstanceOf(CommandPolicyError);
    await expect(attempt).rejects.not.toBeInstanceOf(ConnectionError);
  });

  it('fails to connect with ConnectionError', async () => {
    runCommandMock.mockResolvedValueOnce({ code: 255, stdout: '', stderr: 'Permission denied (publickey).\n' });

    await expect(connector.connect('prod-cl')).rejects.toBeInstanceOf(ConnectionError);
  });

  it('closes the master connection once', async () => {
    runCommandMock.mockResolvedValue({ code: 0, stdout: '', stderr: '' });

    const session = await connector.connect('prod-cl');
    await session.close();
    await session.close();

    expect(runCommandMock).toHaveBeenCalledTimes(2);
    const [, closeArgs] = runCommandMock.mock.calls[1] ?? [];
    expect(closeArgs?.slice(2)).toEqual(['-O', 'exit', 'admin@prod-cl']);
    await expect(session.execute('snapmirror show')).rejects.toBeInstanceOf(ConnectionError);
  });
});

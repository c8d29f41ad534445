import path from 'path';
import { CommandPolicyError } from './errors.js';

export type CommandPolicyMode = 'off' | 'audit' | 'enforce';

export type CommandPolicyContext = {
  source?: string;
};

type Decision =
  | { allowed: true }
  | { allowed: false; reason: string };

function getModeFromEnv(): CommandPolicyMode {
  const raw = String(process.env.DR_COMMAND_POLICY_MODE || '').trim().toLowerCase();
  if (raw === 'off' || raw === '0' || raw === 'false') return 'off';
  if (raw === 'audit') return 'audit';
  if (raw === 'enforce') return 'enforce';
  // Default to enforce so we fail-closed on unexpected command execution.
  return 'enforce';
}

function baseCommand(command: string) {
  return path.basename(command || '');
}

function hasUnsafeArgChars(value: string) {
  // NUL/newlines are almost always a bug in argv construction.
  return value.includes('\u0000') || value.includes('\n') || value.includes('\r');
}

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

function allow(): Decision {
  return { allowed: true };
}

// Cluster shell commands the agent issues, keyed by verb path.
const ONTAP_COMMANDS = new Set([
  'snapmirror show',
  'snapmirror update',
  'snapmirror quiesce',
  'snapmirror break',
  'snapmirror resync',
  'snapmirror create',
  'snapmirror delete',
  'volume online',
  'volume offline',
  'volume mount',
  'volume unmount',
  'cifs share show',
  'cifs share create',
  'cifs share delete',
]);

const REMOTE_METACHARACTERS = /[;&|`$<>(){}\\'"*?!#~]/;

export function isAllowedRemoteCommand(remote: string): Decision {
  const trimmed = remote.trim();
  if (!trimmed) return deny('empty remote command');
  if (REMOTE_METACHARACTERS.test(trimmed)) return deny('remote command contains shell metacharacters');
  const words = trimmed.split(/\s+/);
  const verb2 = words.slice(0, 2).join(' ');
  const verb3 = words.slice(0, 3).join(' ');
  if (ONTAP_COMMANDS.has(verb2) || ONTAP_COMMANDS.has(verb3)) return allow();
  return deny(`remote command not allowlisted: ${verb2 || '(missing)'}`);
}

function isAllowedSsh(args: string[]): Decision {
  const controlIndex = args.indexOf('-O');
  if (controlIndex >= 0) {
    const op = String(args[controlIndex + 1] || '');
    if (op !== 'exit' && op !== 'check') return deny(`ssh control operation not allowlisted: ${op || '(missing)'}`);
    return allow();
  }
  if (args.includes('-N') || args.includes('-fN')) {
    // Master connection without a remote command.
    if (!args.includes('-M')) return deny('ssh -N is only allowed for master connections');
    return allow();
  }
  if (!args.includes('-S')) return deny('ssh commands must reuse a control socket');
  const remote = args[args.length - 1] || '';
  return isAllowedRemoteCommand(remote);
}

function isAllowed(command: string, args: string[]): Decision {
  const cmd = baseCommand(command);
  if (!cmd) return deny('empty command');

  for (const arg of args) {
    if (hasUnsafeArgChars(arg)) return deny('argv contains unsafe characters');
  }

  switch (cmd) {
    case 'ssh':
      return isAllowedSsh(args);
    default:
      return deny(`command not allowlisted: ${cmd}`);
  }
}

export function enforceCommandPolicy(command: string, args: string[], context: CommandPolicyContext = {}) {
  const mode = getModeFromEnv();
  if (mode === 'off') return;

  const decision = isAllowed(command, args);
  if (decision.allowed) return;

  const message = [
    'command policy violation',
    context.source ? `source=${context.source}` : '',
    `command=${baseCommand(command)}`,
    `args=${JSON.stringify(args)}`,
    `reason=${decision.reason}`,
  ]
    .filter(Boolean)
    .join(' ');

  if (mode === 'enforce') {
    throw new CommandPolicyError(message);
  }

  // audit
  console.warn(message);
}

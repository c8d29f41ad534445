import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { AuditLog } from './audit-log.js';
import { loadApplications, readSettings } from './config.js';
import { Orchestrator } from './orchestrator.js';
import { SshConnector } from './ssh-connector.js';

const settings = readSettings();
const applications = loadApplications(settings.applicationsFile);

const orchestrator = new Orchestrator({
  applications,
  connector: new SshConnector({
    user: settings.sshUser,
    identityFile: settings.sshIdentityFile,
    controlDir: settings.sshControlDir,
    timeoutMs: settings.commandTimeoutMs,
  }),
  auditLog: new AuditLog({
    filePath: settings.auditLogFile,
    timezone: settings.timezone,
    lockTimeoutMs: settings.auditLockTimeoutMs,
    lockStaleMs: settings.auditLockStaleMs,
  }),
  statusConcurrency: settings.statusConcurrency,
  actionConcurrency: settings.actionConcurrency,
  pollIntervalMs: settings.pollIntervalMs,
  pollAttempts: settings.pollAttempts,
  defaultSnapmirrorPolicy: settings.defaultSnapmirrorPolicy,
  defaultSnapmirrorSchedule: settings.defaultSnapmirrorSchedule,
});

if (!settings.operatorSecret) {
  console.warn('dr.http.apply_disabled', { reason: 'DR_OPERATOR_SECRET not set' });
}

serve({
  fetch: createApp(orchestrator, { operatorSecret: settings.operatorSecret }).fetch,
  port: settings.port,
});

// Minimal boot log for operators.
console.log(`dr-agent listening on :${settings.port} (${applications.length} applications)`);

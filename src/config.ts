import fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { Application, Volume } from './model.js';

export type Settings = {
  port: number;
  applicationsFile: string;
  auditLogFile: string;
  timezone: string | undefined;
  statusConcurrency: number;
  actionConcurrency: number;
  pollIntervalMs: number;
  pollAttempts: number;
  commandTimeoutMs: number;
  sshUser: string | undefined;
  sshIdentityFile: string | undefined;
  sshControlDir: string;
  operatorSecret: string;
  auditLockTimeoutMs: number;
  auditLockStaleMs: number;
  /** Used when a relationship has to be created and no existing record carries one. */
  defaultSnapmirrorPolicy: string;
  defaultSnapmirrorSchedule: string;
};

function readInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const normalized = String(raw || '').trim();
  if (!normalized) return fallback;
  const parsed = Number.parseInt(normalized, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, Math.trunc(parsed)));
}

function readOptional(raw: string | undefined): string | undefined {
  const normalized = String(raw || '').trim();
  return normalized || undefined;
}

export function readSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: readInt(env.PORT, 8080, 1, 65535),
    applicationsFile: readOptional(env.DR_APPLICATIONS_FILE) ?? '/etc/dr-agent/applications.yaml',
    auditLogFile: readOptional(env.DR_AUDIT_LOG_FILE) ?? '/var/lib/dr-agent/recent-actions.log',
    timezone: readOptional(env.DR_TIMEZONE),
    statusConcurrency: readInt(env.DR_STATUS_CONCURRENCY, 8, 1, 64),
    actionConcurrency: readInt(env.DR_ACTION_CONCURRENCY, 8, 1, 64),
    pollIntervalMs: readInt(env.DR_STATUS_POLL_INTERVAL_MS, 5000, 0, 10 * 60 * 1000),
    pollAttempts: readInt(env.DR_STATUS_POLL_ATTEMPTS, 120, 1, 10_000),
    commandTimeoutMs: readInt(env.DR_COMMAND_TIMEOUT_MS, 60_000, 1000, 60 * 60 * 1000),
    sshUser: readOptional(env.DR_SSH_USER),
    sshIdentityFile: readOptional(env.DR_SSH_IDENTITY_FILE),
    sshControlDir: readOptional(env.DR_SSH_CONTROL_DIR) ?? '/tmp',
    operatorSecret: readOptional(env.DR_OPERATOR_SECRET) ?? '',
    auditLockTimeoutMs: readInt(env.DR_AUDIT_LOCK_TIMEOUT_MS, 10_000, 0, 10 * 60 * 1000),
    auditLockStaleMs: readInt(env.DR_AUDIT_LOCK_STALE_MS, 60_000, 1000, 24 * 60 * 60 * 1000),
    defaultSnapmirrorPolicy: readOptional(env.DR_DEFAULT_SNAPMIRROR_POLICY) ?? 'MirrorAllSnapshots',
    defaultSnapmirrorSchedule: readOptional(env.DR_DEFAULT_SNAPMIRROR_SCHEDULE) ?? 'hourly',
  };
}

// Identifiers end up inside remote CLI commands.
const identifier = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z0-9_.-]+$/, 'must only contain letters, digits, "_", "." or "-"');

const qtreeSchema = z.object({
  qtree_name: identifier,
  share_name: identifier.optional(),
});

const volumeSchema = z
  .object({
    volume_name: identifier,
    share_name: identifier.optional(),
    qtrees: z.array(qtreeSchema).optional(),
  })
  .refine((volume) => !(volume.share_name && volume.qtrees && volume.qtrees.length > 0), {
    message: 'a volume has either a share_name or qtrees, not both',
  });

const applicationSchema = z.object({
  app_name: identifier,
  prod_cluster: identifier,
  dr_cluster: identifier,
  prod_vserver: identifier,
  dr_vserver: identifier,
  details: z.string().optional(),
  volume_names: z.array(volumeSchema).min(1),
});

const applicationsSchema = z.array(applicationSchema);

export type ApplicationRecord = z.infer<typeof applicationSchema>;

function toVolume(record: ApplicationRecord['volume_names'][number]): Volume {
  return {
    name: record.volume_name,
    share: record.share_name ? { name: record.share_name } : undefined,
    qtrees: (record.qtrees ?? []).map((qtree) => ({
      name: qtree.qtree_name,
      share: qtree.share_name ? { name: qtree.share_name } : undefined,
    })),
  };
}

export function parseApplications(input: unknown): Application[] {
  const parsed = applicationsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError('invalid application configuration', issues);
  }
  const seen = new Set<string>();
  const applications: Application[] = [];
  for (const record of parsed.data) {
    if (seen.has(record.app_name)) {
      throw new ConfigurationError(`duplicate application: ${record.app_name}`, [`app_name: ${record.app_name}`]);
    }
    seen.add(record.app_name);
    const volumeNames = new Set<string>();
    for (const volume of record.volume_names) {
      if (volumeNames.has(volume.volume_name)) {
        throw new ConfigurationError(
          `duplicate volume ${volume.volume_name} in application ${record.app_name}`,
          [`volume_names.${volume.volume_name}`],
        );
      }
      volumeNames.add(volume.volume_name);
    }
    applications.push(Object.freeze({
      name: record.app_name,
      prod_cluster: record.prod_cluster,
      dr_cluster: record.dr_cluster,
      prod_vserver: record.prod_vserver,
      dr_vserver: record.dr_vserver,
      details: record.details?.trim() ?? '',
      volumes: record.volume_names.map(toVolume),
    }));
  }
  return applications;
}

export function parseApplicationsYaml(source: string): Application[] {
  let document: unknown;
  try {
    document = yaml.load(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`application configuration is not valid YAML: ${message}`);
  }
  return parseApplications(document ?? []);
}

export function loadApplications(filePath: string): Application[] {
  let source: string;
  try {
    source = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`cannot read application configuration ${filePath}: ${message}`);
  }
  return parseApplicationsYaml(source);
}

export function findApplication(applications: Application[], name: string): Application {
  const application = applications.find((entry) => entry.name === name);
  if (!application) {
    throw new ConfigurationError(`unknown application: ${name}`);
  }
  return application;
}

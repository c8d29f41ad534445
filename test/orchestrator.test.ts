import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AuditLog } from '../src/audit-log.js';
import { ConfigurationError, InconsistentDirectionError, PartialBatchFailure, UnknownActionError } from '../src/errors.js';
import { Orchestrator, type OperatorPrompt } from '../src/orchestrator.js';
import { FakeOntap, sampleApplication, seedProdToDr } from './fakes/fake-ontap.js';

function prompt(confirmPlan: boolean, confirmPartial = false) {
  return {
    confirmPlan: vi.fn<OperatorPrompt['confirmPlan']>(async () => confirmPlan),
    confirmPartial: vi.fn<OperatorPrompt['confirmPartial']>(async () => confirmPartial),
  };
}

describe('orchestrator', () => {
  let tmpDir: string;
  let fake: FakeOntap;
  let auditLog: AuditLog;
  let orchestrator: Orchestrator;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dr-orchestrator-'));
    fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Snapmirrored');
    auditLog = new AuditLog({ filePath: path.join(tmpDir, 'recent-actions.log'), timezone: 'UTC' });
    orchestrator = new Orchestrator({
      applications: [application],
      connector: fake,
      auditLog,
      pollIntervalMs: 0,
      pollAttempts: 3,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes no audit record when the operator declines', async () => {
    const answers = prompt(false);

    const outcome = await orchestrator.apply({ application: 'APP1', action: 'quiesce', operator: 'alice' }, answers);

    expect(outcome.applied).toBe(false);
    expect(outcome.reason).toBe('declined');
    expect(answers.confirmPlan).toHaveBeenCalledTimes(1);
    expect(fake.mutations()).toEqual([]);
    await expect(auditLog.readRecords()).resolves.toEqual([]);
  });

  it('writes exactly one audit record for a confirmed, successful action', async () => {
    const outcome = await orchestrator.apply({ application: 'APP1', action: 'quiesce', operator: 'alice' }, prompt(true));

    expect(outcome.applied).toBe(true);
    expect(outcome.batch?.ok).toBe(true);
    expect(outcome.audit.written).toBe(true);
    const records = await auditLog.readRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ action: 'quiesce', application: 'APP1', operator: 'alice', outcome: 'success 3/3' });
  });

  it('shows the plan without executing on a dry run', async () => {
    const answers = prompt(true);

    const outcome = await orchestrator.apply(
      { application: 'APP1', action: 'quiesce', operator: 'alice', dry_run: true },
      answers,
    );

    expect(outcome.reason).toBe('dry_run');
    expect(outcome.plan.relationships).toHaveLength(3);
    expect(answers.confirmPlan).not.toHaveBeenCalled();
    expect(fake.mutations()).toEqual([]);
    await expect(auditLog.readRecords()).resolves.toEqual([]);
  });

  it('asks again before recording a partial outcome', async () => {
    fake.failCommand(/^snapmirror quiesce -destination-path svm_dr:vol2$/, 'Error: quiesce failed');
    const declined = prompt(true, false);

    const first = await orchestrator.apply({ application: 'APP1', action: 'quiesce', operator: 'alice' }, declined);

    expect(first.applied).toBe(false);
    expect(first.reason).toBe('partial_declined');
    const failure = declined.confirmPartial.mock.calls[0]?.[1];
    expect(failure).toBeInstanceOf(PartialBatchFailure);
    expect(failure?.summary).toEqual({
      succeeded: ['vol1', 'vol3'],
      failed: [{ volume: 'vol2', message: 'snapmirror quiesce -destination-path svm_dr:vol2: Error: quiesce failed' }],
      cancelled: [],
    });
    await expect(auditLog.readRecords()).resolves.toEqual([]);
  });

  it('records an accepted partial outcome', async () => {
    fake.failCommand(/^snapmirror update -destination-path svm_dr:vol2$/, 'Error: transfer failed');

    const outcome = await orchestrator.apply(
      { application: 'APP1', action: 'update', operator: 'alice' },
      prompt(true, true),
    );

    expect(outcome.applied).toBe(true);
    const records = await auditLog.readRecords();
    expect(records.map((record) => record.outcome)).toEqual(['partial 2/3 (not completed: vol2)']);
  });

  it('rejects unknown names before contacting a cluster', async () => {
    await expect(
      orchestrator.apply({ application: 'NOPE', action: 'quiesce', operator: 'alice' }, prompt(true)),
    ).rejects.toBeInstanceOf(ConfigurationError);
    await expect(
      orchestrator.apply({ application: 'APP1', action: 'failback', operator: 'alice' }, prompt(true)),
    ).rejects.toBeInstanceOf(UnknownActionError);
    expect(fake.connected).toEqual([]);
  });

  it('refuses a whole-application action on an inconsistent direction and closes sessions', async () => {
    const relationship = fake.relationship('dr-cl', 'svm_dr:vol1');
    if (!relationship) throw new Error('seed missing');
    relationship.state = 'Broken-off';
    const answers = prompt(true);

    await expect(
      orchestrator.apply({ application: 'APP1', action: 'resync', operator: 'alice' }, answers),
    ).rejects.toBeInstanceOf(InconsistentDirectionError);

    expect(answers.confirmPlan).not.toHaveBeenCalled();
    expect([...fake.closed].sort()).toEqual(['dr-cl', 'prod-cl']);
    expect(fake.mutations()).toEqual([]);
  });

  it('returns an audit failure as a warning once the action has run', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, '');
    const broken = new Orchestrator({
      applications: orchestrator.listApplications(),
      connector: fake,
      auditLog: new AuditLog({ filePath: path.join(blocker, 'recent-actions.log') }),
      pollIntervalMs: 0,
    });

    const outcome = await broken.apply({ application: 'APP1', action: 'quiesce', operator: 'alice' }, prompt(true));

    expect(outcome.applied).toBe(true);
    expect(outcome.audit.written).toBe(false);
    expect(outcome.audit.error).toMatch(/^cannot create audit directory: /);
    expect(fake.relationship('dr-cl', 'svm_dr:vol1')?.status).toBe('Quiesced');
  });

  it('collects status through scoped sessions', async () => {
    const status = await orchestrator.status('APP1');

    expect(status.direction).toBe('PROD_TO_DR');
    expect([...fake.connected].sort()).toEqual(['dr-cl', 'prod-cl']);
    expect([...fake.closed].sort()).toEqual(['dr-cl', 'prod-cl']);
  });
});

import type { ActionPlan } from './actions.js';
import { aggregate, aggregateAll } from './aggregator.js';
import type { AuditLog } from './audit-log.js';
import { findApplication } from './config.js';
import { PartialBatchFailure, UnknownActionError, errorMessage } from './errors.js';
import type {
  ActionName,
  Application,
  ApplicationStatus,
  AuditRecord,
  BatchResult,
  ExecutionPolicy,
} from './model.js';
import { isActionName } from './model.js';
import { withClusterSessions, type ClusterConnector, type RemoteExecutor } from './remote.js';
import { ActionStateMachine } from './state-machine.js';

/**
 * How the operator answers the two questions an action can raise.
 */
export interface OperatorPrompt {
  confirmPlan(plan: ActionPlan): Promise<boolean>;
  confirmPartial(batch: BatchResult, failure: PartialBatchFailure): Promise<boolean>;
}

export type ActionRequest = {
  application: string;
  action: string;
  operator: string;
  targets?: string[];
  policy?: ExecutionPolicy;
  extended_recovery_ran?: boolean;
  dry_run?: boolean;
  signal?: AbortSignal;
};

export type PreviewOutcome = {
  status: ApplicationStatus;
  plan: ActionPlan;
};

export type ApplyOutcome = PreviewOutcome & {
  applied: boolean;
  reason?: 'dry_run' | 'declined' | 'partial_declined' | 'failed';
  batch?: BatchResult;
  partial?: PartialBatchFailure['summary'];
  audit: { written: boolean; record?: AuditRecord; error?: string };
};

export type OrchestratorOptions = {
  applications: Application[];
  connector: ClusterConnector;
  auditLog: AuditLog;
  statusConcurrency?: number;
  actionConcurrency?: number;
  pollIntervalMs?: number;
  pollAttempts?: number;
  defaultSnapmirrorPolicy?: string;
  defaultSnapmirrorSchedule?: string;
};

function partialSummary(batch: BatchResult): PartialBatchFailure['summary'] {
  return {
    succeeded: batch.results.filter((result) => result.ok).map((result) => result.volume),
    failed: batch.results
      .filter((result) => !result.ok && result.error?.kind !== 'cancelled')
      .map((result) => ({ volume: result.volume, message: result.error?.message ?? 'failed' })),
    cancelled: batch.results.filter((result) => result.error?.kind === 'cancelled').map((result) => result.volume),
  };
}

export function describeOutcome(batch: BatchResult): string {
  const succeeded = batch.results.filter((result) => result.ok).length;
  const total = batch.results.length;
  if (batch.ok) {
    return `success ${succeeded}/${total}`;
  }
  const failed = batch.results.filter((result) => !result.ok).map((result) => result.volume);
  return `partial ${succeeded}/${total} (not completed: ${failed.join(',')})`;
}

/**
 * Boundary between the operator and the clusters: status, preview and
 * confirmed application of actions, and the audit trail of the latter.
 */
export class Orchestrator {
  constructor(private readonly options: OrchestratorOptions) {}

  listApplications(): Application[] {
    return this.options.applications;
  }

  getApplication(name: string): Application {
    return findApplication(this.options.applications, name);
  }

  async status(name: string, signal?: AbortSignal): Promise<ApplicationStatus> {
    const application = this.getApplication(name);
    return withClusterSessions(this.options.connector, (executor) =>
      aggregate(application, executor, { concurrency: this.options.statusConcurrency, signal }),
    );
  }

  async statusAll(signal?: AbortSignal): Promise<ApplicationStatus[]> {
    return withClusterSessions(this.options.connector, (executor) =>
      aggregateAll(this.options.applications, executor, { concurrency: this.options.statusConcurrency, signal }),
    );
  }

  recentActions(): Promise<AuditRecord[]> {
    return this.options.auditLog.readRecords();
  }

  latestActions(): Promise<Map<string, AuditRecord>> {
    return this.options.auditLog.latestByApplication();
  }

  async preview(request: ActionRequest): Promise<PreviewOutcome> {
    const { application, action } = this.resolve(request);
    return withClusterSessions(this.options.connector, async (executor) => {
      const status = await aggregate(application, executor, {
        concurrency: this.options.statusConcurrency,
        signal: request.signal,
      });
      const plan = this.machine(executor).preview(application, action, status, this.executeOptions(request));
      return { status, plan };
    });
  }

  async apply(request: ActionRequest, prompt: OperatorPrompt): Promise<ApplyOutcome> {
    const { application, action } = this.resolve(request);
    return withClusterSessions(this.options.connector, async (executor) => {
      const machine = this.machine(executor);
      const status = await aggregate(application, executor, {
        concurrency: this.options.statusConcurrency,
        signal: request.signal,
      });
      const plan = machine.preview(application, action, status, this.executeOptions(request));
      const notWritten = { written: false };
      if (request.dry_run) {
        return { status, plan, applied: false, reason: 'dry_run', audit: notWritten };
      }
      if (!(await prompt.confirmPlan(plan))) {
        console.log('dr.action.declined', { application: application.name, action, operator: request.operator });
        return { status, plan, applied: false, reason: 'declined', audit: notWritten };
      }

      const batch = await machine.execute(application, action, status, {
        ...this.executeOptions(request),
        signal: request.signal,
      });
      if (batch.ok) {
        const audit = await this.writeAudit(request, batch);
        return { status, plan, applied: true, batch, audit };
      }

      const summary = partialSummary(batch);
      if (summary.succeeded.length === 0) {
        return { status, plan, applied: false, reason: 'failed', batch, partial: summary, audit: notWritten };
      }
      const failure = new PartialBatchFailure(
        `${action} on ${application.name}: ${summary.succeeded.length} of ${batch.results.length} relationships succeeded`,
        summary,
      );
      if (!(await prompt.confirmPartial(batch, failure))) {
        console.warn('dr.action.partial_declined', { application: application.name, action, ...summary });
        return { status, plan, applied: false, reason: 'partial_declined', batch, partial: summary, audit: notWritten };
      }
      const audit = await this.writeAudit(request, batch);
      return { status, plan, applied: true, batch, partial: summary, audit };
    });
  }

  private resolve(request: ActionRequest): { application: Application; action: ActionName } {
    const application = this.getApplication(request.application);
    if (!isActionName(request.action)) {
      throw new UnknownActionError(request.action);
    }
    return { application, action: request.action };
  }

  private machine(executor: RemoteExecutor): ActionStateMachine {
    return new ActionStateMachine(executor, {
      concurrency: this.options.actionConcurrency,
      pollIntervalMs: this.options.pollIntervalMs,
      pollAttempts: this.options.pollAttempts,
      defaultSnapmirrorPolicy: this.options.defaultSnapmirrorPolicy,
      defaultSnapmirrorSchedule: this.options.defaultSnapmirrorSchedule,
    });
  }

  private executeOptions(request: ActionRequest) {
    return {
      policy: request.policy,
      targets: request.targets,
      assertions: { extended_recovery_ran: request.extended_recovery_ran },
    };
  }

  private async writeAudit(request: ActionRequest, batch: BatchResult): Promise<ApplyOutcome['audit']> {
    try {
      const record = await this.options.auditLog.record(
        batch.action,
        batch.application,
        request.operator,
        describeOutcome(batch),
      );
      console.log('dr.action.applied', { application: batch.application, action: batch.action, operator: request.operator });
      return { written: true, record };
    } catch (error) {
      // The action already ran; the caller gets the write failure as a warning.
      console.error('dr.audit.write_failed', { application: batch.application, message: errorMessage(error) });
      return { written: false, error: errorMessage(error) };
    }
  }
}

import { planAction } from './actions.js';
import type { ActionPlan, LinkState, OperatorAssertions, PlanStep, RelationshipPlan } from './actions.js';
import { probeRelationship } from './aggregator.js';
import { delay, mapSequential, mapWithConcurrency } from './concurrency.js';
import { CommandPolicyError, ConnectionError, errorMessage, isAbortError } from './errors.js';
import type {
  ActionErrorKind,
  ActionName,
  ActionResult,
  Application,
  ApplicationStatus,
  BatchResult,
  CommandRecord,
  ExecutionPolicy,
} from './model.js';
import type { RemoteCommandOutput, RemoteExecutor } from './remote.js';
import { parseSnapmirrorShow, shareExists } from './snapmirror.js';

export type StateMachineOptions = {
  concurrency?: number;
  pollIntervalMs?: number;
  pollAttempts?: number;
  defaultSnapmirrorPolicy?: string;
  defaultSnapmirrorSchedule?: string;
};

export type ExecuteOptions = {
  policy?: ExecutionPolicy;
  targets?: string[];
  assertions?: OperatorAssertions;
  signal?: AbortSignal;
};

class StepFailure extends Error {
  constructor(
    message: string,
    public readonly kind: ActionErrorKind,
  ) {
    super(message);
    this.name = 'StepFailure';
  }
}

function failureKind(error: unknown): ActionErrorKind {
  if (error instanceof StepFailure) return error.kind;
  if (error instanceof ConnectionError) return 'ConnectionError';
  if (error instanceof CommandPolicyError) return 'CommandPolicyError';
  return 'RemoteCommandError';
}

/**
 * Drives SnapMirror actions over the relationships of one application.
 * Every relationship is planned from the collected status, executed
 * independently, and read back once its steps are done.
 */
export class ActionStateMachine {
  constructor(
    private readonly executor: RemoteExecutor,
    private readonly options: StateMachineOptions = {},
  ) {}

  /** What `execute` would do. No remote calls. */
  preview(
    application: Application,
    action: ActionName,
    status: ApplicationStatus,
    options: Omit<ExecuteOptions, 'signal'> = {},
  ): ActionPlan {
    return planAction(application, action, status, {
      ...options,
      defaultSnapmirrorPolicy: this.options.defaultSnapmirrorPolicy,
      defaultSnapmirrorSchedule: this.options.defaultSnapmirrorSchedule,
    });
  }

  async execute(
    application: Application,
    action: ActionName,
    status: ApplicationStatus,
    options: ExecuteOptions = {},
  ): Promise<BatchResult> {
    const plan = this.preview(application, action, status, options);
    const { signal } = options;
    const worker = (entry: RelationshipPlan) => this.runRelationship(action, entry, signal);
    const settled = plan.policy === 'sequential'
      ? await mapSequential(plan.relationships, worker, signal)
      : await mapWithConcurrency(plan.relationships, this.options.concurrency ?? 8, worker, signal);

    const results = settled.map((entry, index): ActionResult => {
      const relationship = plan.relationships[index];
      if (entry.status === 'fulfilled') {
        return entry.value;
      }
      const error = entry.status === 'cancelled'
        ? { kind: 'cancelled' as const, message: 'not started before cancellation' }
        : { kind: failureKind(entry.reason), message: errorMessage(entry.reason) };
      return {
        volume: relationship.volume,
        action,
        ok: false,
        state_before: relationship.state_before,
        state_after: relationship.state_before,
        error,
        commands: [],
      };
    });

    const ok = results.length > 0 && results.every((result) => result.ok);
    const batch: BatchResult = {
      application: application.name,
      action,
      policy: plan.policy,
      ok,
      partial_failure: !ok && results.some((result) => result.ok),
      cancelled: results.some((result) => result.error?.kind === 'cancelled'),
      results,
    };
    console.log('dr.action.executed', {
      application: application.name,
      action,
      policy: plan.policy,
      succeeded: results.filter((result) => result.ok).length,
      failed: results.filter((result) => !result.ok).length,
    });
    return batch;
  }

  private async runRelationship(
    action: ActionName,
    plan: RelationshipPlan,
    signal: AbortSignal | undefined,
  ): Promise<ActionResult> {
    const base = { volume: plan.volume, action, state_before: plan.state_before };
    if (!plan.allowed) {
      return {
        ...base,
        ok: false,
        state_after: plan.state_before,
        error: { kind: 'PreconditionError', message: plan.precondition?.message ?? `${action} not allowed` },
        commands: [],
      };
    }

    const commands: CommandRecord[] = [];
    try {
      for (const step of plan.steps) {
        await this.runStep(step, commands, signal);
      }
    } catch (error) {
      const cancelled = signal?.aborted || isAbortError(error);
      if (!cancelled) {
        console.warn('dr.action.relationship_failed', { action, volume: plan.volume, message: errorMessage(error) });
      }
      return {
        ...base,
        ok: false,
        state_after: await this.readBack(plan, signal),
        error: cancelled
          ? { kind: 'cancelled', message: 'cancelled before completion' }
          : { kind: failureKind(error), message: errorMessage(error) },
        commands,
      };
    }

    return { ...base, ok: true, state_after: await this.readBack(plan, signal), commands };
  }

  private async runStep(step: PlanStep, commands: CommandRecord[], signal: AbortSignal | undefined): Promise<void> {
    if (signal?.aborted) {
      throw new StepFailure('cancelled before completion', 'cancelled');
    }
    switch (step.kind) {
      case 'run':
        await this.runCommand(step.cluster, step.command, step.answer, commands, signal);
        return;
      case 'wait':
        await this.waitFor(step, signal);
        return;
      default: {
        const check = await this.executor.execute(step.cluster, step.check, { signal });
        if (check.error) {
          commands.push({ cluster: step.cluster, command: step.check, ok: false, error: check.error });
          throw new StepFailure(`${step.check}: ${check.error}`, 'RemoteCommandError');
        }
        const present = step.subject.type === 'share'
          ? shareExists(check.output, step.subject.name)
          : this.relationshipPresent(check.output, step.subject.destination_path, step.check);
        const needed = step.when === 'missing' ? !present : present;
        if (!needed) {
          commands.push({ cluster: step.cluster, command: step.command, ok: true, skipped: true });
          return;
        }
        await this.runCommand(step.cluster, step.command, step.answer, commands, signal);
      }
    }
  }

  private relationshipPresent(output: string, destinationPath: string, command: string): boolean {
    const parsed = parseSnapmirrorShow(output, destinationPath);
    if (parsed.kind === 'unparsed') {
      throw new StepFailure(`${command}: ${parsed.reason}`, 'RemoteCommandError');
    }
    return parsed.kind === 'record';
  }

  private async runCommand(
    cluster: string,
    command: string,
    answer: string | undefined,
    commands: CommandRecord[],
    signal: AbortSignal | undefined,
  ): Promise<void> {
    let response: RemoteCommandOutput;
    try {
      response = await this.executor.execute(cluster, command, answer === undefined ? { signal } : { signal, input: answer });
    } catch (error) {
      commands.push({ cluster, command, ok: false, error: errorMessage(error) });
      throw error;
    }
    if (response.error) {
      commands.push({ cluster, command, ok: false, output: response.output, error: response.error });
      throw new StepFailure(`${command}: ${response.error}`, 'RemoteCommandError');
    }
    commands.push({ cluster, command, ok: true, output: response.output });
  }

  private async waitFor(step: Extract<PlanStep, { kind: 'wait' }>, signal: AbortSignal | undefined): Promise<void> {
    const attempts = Math.max(1, this.options.pollAttempts ?? 120);
    const interval = this.options.pollIntervalMs ?? 5000;
    let last = 'unknown';
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const probe = await probeRelationship(this.executor, step.cluster, step.vserver, step.volume, step.link, signal);
      if (probe.outcome === 'resolved') {
        last = probe.relationship.state;
        if (step.until.includes(probe.relationship.state)) {
          return;
        }
      } else if (probe.outcome === 'failed') {
        throw new StepFailure(`${step.command}: ${probe.error}`, 'RemoteCommandError');
      } else {
        last = probe.outcome;
      }
      if (attempt < attempts) {
        await delay(interval, signal);
      }
    }
    throw new StepFailure(
      `${step.vserver}:${step.volume} did not reach ${step.until.join('/')} after ${attempts} checks (last ${last})`,
      'RemoteCommandError',
    );
  }

  private async readBack(plan: RelationshipPlan, signal: AbortSignal | undefined): Promise<LinkState> {
    if (signal?.aborted) {
      return plan.state_before;
    }
    try {
      const probe = await probeRelationship(
        this.executor,
        plan.verify.cluster,
        plan.verify.vserver,
        plan.volume,
        plan.verify.link,
        signal,
      );
      if (probe.outcome === 'resolved') return probe.relationship.state;
      if (probe.outcome === 'absent') return 'absent';
      return 'unknown';
    } catch (error) {
      console.warn('dr.action.read_back_failed', { volume: plan.volume, message: errorMessage(error) });
      return 'unknown';
    }
  }
}

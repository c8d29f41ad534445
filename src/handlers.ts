import { z } from 'zod';
import {
  ConfigurationError,
  DrError,
  InconsistentDirectionError,
  UnknownActionError,
  errorMessage,
} from './errors.js';
import type { Application } from './model.js';
import { volumeShares } from './model.js';
import { verifyOperatorRequest } from './operator-auth.js';
import type { ActionRequest, Orchestrator, OperatorPrompt } from './orchestrator.js';

export type HandlerResult = { status: 200 | 207 | 400 | 401 | 404 | 409 | 500; body: object };

const actionBodySchema = z
  .object({
    confirm: z.boolean().optional(),
    accept_partial: z.boolean().optional(),
    targets: z.array(z.string().min(1)).optional(),
    policy: z.enum(['sequential', 'parallel']).optional(),
    extended_recovery_ran: z.boolean().optional(),
    dry_run: z.boolean().optional(),
  })
  .strict();

type ActionBody = z.infer<typeof actionBodySchema>;

function readActionBody(raw: string): { ok: true; body: ActionBody } | { ok: false; result: HandlerResult } {
  let document: unknown = {};
  if (raw.trim()) {
    try {
      document = JSON.parse(raw);
    } catch {
      return { ok: false, result: { status: 400, body: { error: 'Invalid JSON body' } } };
    }
  }
  const parsed = actionBodySchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, result: { status: 400, body: { error: 'Invalid request body', issues } } };
  }
  return { ok: true, body: parsed.data };
}

export function errorResult(error: unknown): HandlerResult {
  if (error instanceof UnknownActionError) {
    return { status: 400, body: { error: error.message, code: error.code } };
  }
  if (error instanceof ConfigurationError) {
    const status = error.message.startsWith('unknown application') ? 404 : 400;
    return { status, body: { error: error.message, code: error.code, issues: error.issues } };
  }
  if (error instanceof InconsistentDirectionError) {
    return { status: 409, body: { error: error.message, code: error.code } };
  }
  if (error instanceof DrError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }
  console.error('dr.http.unhandled', { message: errorMessage(error) });
  return { status: 500, body: { error: 'Internal error' } };
}

function describeApplication(application: Application) {
  return {
    name: application.name,
    details: application.details,
    prod: { cluster: application.prod_cluster, vserver: application.prod_vserver },
    dr: { cluster: application.dr_cluster, vserver: application.dr_vserver },
    volumes: application.volumes.map((volume) => ({
      name: volume.name,
      qtrees: volume.qtrees.map((qtree) => qtree.name),
      shares: volumeShares(volume).map(({ share, path }) => ({ name: share.name, path })),
    })),
  };
}

export function handleListApplications(orchestrator: Orchestrator): HandlerResult {
  return {
    status: 200,
    body: {
      applications: orchestrator.listApplications().map((application) => ({
        name: application.name,
        details: application.details,
        volumes: application.volumes.length,
      })),
    },
  };
}

export function handleApplicationDetails(orchestrator: Orchestrator, name: string): HandlerResult {
  try {
    return { status: 200, body: describeApplication(orchestrator.getApplication(name)) };
  } catch (error) {
    return errorResult(error);
  }
}

export async function handleStatusAll(orchestrator: Orchestrator, signal?: AbortSignal): Promise<HandlerResult> {
  try {
    const [statuses, latest] = await Promise.all([orchestrator.statusAll(signal), orchestrator.latestActions()]);
    return {
      status: 200,
      body: {
        applications: statuses.map((status) => ({ ...status, last_action: latest.get(status.application) ?? null })),
      },
    };
  } catch (error) {
    return errorResult(error);
  }
}

export async function handleStatus(orchestrator: Orchestrator, name: string, signal?: AbortSignal): Promise<HandlerResult> {
  try {
    return { status: 200, body: await orchestrator.status(name, signal) };
  } catch (error) {
    return errorResult(error);
  }
}

export async function handleAudit(orchestrator: Orchestrator, application?: string): Promise<HandlerResult> {
  try {
    const records = await orchestrator.recentActions();
    const filtered = application ? records.filter((record) => record.application === application) : records;
    return { status: 200, body: { records: filtered } };
  } catch (error) {
    return errorResult(error);
  }
}

export async function handlePreview(
  orchestrator: Orchestrator,
  application: string,
  action: string,
  rawBody: string,
): Promise<HandlerResult> {
  const parsed = readActionBody(rawBody);
  if (!parsed.ok) return parsed.result;
  try {
    const outcome = await orchestrator.preview({
      application,
      action,
      operator: '-',
      targets: parsed.body.targets,
      policy: parsed.body.policy,
      extended_recovery_ran: parsed.body.extended_recovery_ran,
    });
    return { status: 200, body: outcome };
  } catch (error) {
    return errorResult(error);
  }
}

/**
 * HTTP callers answer both prompts up front in the request body.
 */
export function bodyPrompt(body: Pick<ActionBody, 'confirm' | 'accept_partial'>): OperatorPrompt {
  return {
    confirmPlan: async () => body.confirm === true,
    confirmPartial: async () => body.accept_partial === true,
  };
}

export async function handleApply(
  orchestrator: Orchestrator,
  request: Request,
  application: string,
  action: string,
  operatorSecret: string,
): Promise<HandlerResult> {
  const verified = await verifyOperatorRequest(request, operatorSecret);
  if (!verified.ok) {
    console.warn('dr.http.unauthorized', { application, action, reason: verified.reason });
    return { status: 401, body: { error: 'Unauthorized' } };
  }
  const parsed = readActionBody(await request.text());
  if (!parsed.ok) return parsed.result;

  const actionRequest: ActionRequest = {
    application,
    action,
    operator: verified.operator,
    targets: parsed.body.targets,
    policy: parsed.body.policy,
    extended_recovery_ran: parsed.body.extended_recovery_ran,
    dry_run: parsed.body.dry_run,
    signal: request.signal,
  };
  try {
    const outcome = await orchestrator.apply(actionRequest, bodyPrompt(parsed.body));
    const status = outcome.batch && !outcome.batch.ok ? 207 : 200;
    return { status, body: outcome };
  } catch (error) {
    return errorResult(error);
  }
}

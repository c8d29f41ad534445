import { mapWithConcurrency, type Settled } from './concurrency.js';
import { resolveDirection } from './direction.js';
import { errorMessage, isAbortError } from './errors.js';
import type { Application, ApplicationStatus, RelationshipProbe, ReplicationLink, VolumeStatus } from './model.js';
import type { RemoteExecutor } from './remote.js';
import { parseSnapmirrorShow, snapmirrorCommands, toRelationship } from './snapmirror.js';

export type AggregateOptions = {
  concurrency?: number;
  signal?: AbortSignal;
};

const DEFAULT_CONCURRENCY = 8;

/**
 * Reads one relationship from the cluster that owns its destination.
 * Always a fresh read.
 */
export async function probeRelationship(
  executor: RemoteExecutor,
  cluster: string,
  vserver: string,
  volume: string,
  link: ReplicationLink,
  signal?: AbortSignal,
): Promise<RelationshipProbe> {
  const destinationPath = `${vserver}:${volume}`;
  let output: string;
  try {
    const response = await executor.execute(cluster, snapmirrorCommands.show(vserver, volume), { signal });
    if (response.error) {
      return { outcome: 'failed', state: 'unknown', error: response.error };
    }
    output = response.output;
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error;
    }
    return { outcome: 'failed', state: 'unknown', error: errorMessage(error) };
  }
  const parsed = parseSnapmirrorShow(output, destinationPath);
  switch (parsed.kind) {
    case 'absent':
      return { outcome: 'absent' };
    case 'unparsed':
      return { outcome: 'failed', state: 'unknown', error: `unparseable snapmirror output: ${parsed.reason}` };
    default:
      return { outcome: 'resolved', relationship: toRelationship(volume, link, parsed.fields) };
  }
}

async function probeVolume(
  executor: RemoteExecutor,
  application: Application,
  volume: string,
  signal?: AbortSignal,
): Promise<VolumeStatus> {
  const [forward, reverse] = await Promise.all([
    probeRelationship(executor, application.dr_cluster, application.dr_vserver, volume, 'prod-to-dr', signal),
    probeRelationship(executor, application.prod_cluster, application.prod_vserver, volume, 'dr-to-prod', signal),
  ]);
  return { volume, prod_to_dr: forward, dr_to_prod: reverse };
}

function hasFailedProbe(status: VolumeStatus): boolean {
  return status.prod_to_dr.outcome === 'failed' || status.dr_to_prod.outcome === 'failed';
}

function summarize(application: Application, settled: Settled<VolumeStatus>[]): ApplicationStatus {
  let cancelled = false;
  const volumes = settled.map((entry, index): VolumeStatus => {
    const volume = application.volumes[index].name;
    if (entry.status === 'fulfilled') {
      return entry.value;
    }
    if (entry.status === 'cancelled') {
      cancelled = true;
      return { volume, prod_to_dr: { outcome: 'cancelled' }, dr_to_prod: { outcome: 'cancelled' } };
    }
    const error = errorMessage(entry.reason);
    return {
      volume,
      prod_to_dr: { outcome: 'failed', state: 'unknown', error },
      dr_to_prod: { outcome: 'failed', state: 'unknown', error },
    };
  });

  const partialFailure = volumes.some(hasFailedProbe);
  for (const status of volumes) {
    if (hasFailedProbe(status)) {
      console.warn('dr.status.probe_failed', { application: application.name, volume: status.volume });
    }
  }

  const { direction, sides } = resolveDirection(volumes);
  return {
    application: application.name,
    collected_at: new Date().toISOString(),
    volumes,
    direction,
    sides,
    partial_failure: partialFailure,
    cancelled,
  };
}

/**
 * Collects the replication state of every volume of an application from
 * both link perspectives with bounded fan-out. Read-only.
 */
export async function aggregate(
  application: Application,
  executor: RemoteExecutor,
  options: AggregateOptions = {},
): Promise<ApplicationStatus> {
  const { signal } = options;
  const settled = await mapWithConcurrency(
    application.volumes.map((volume) => volume.name),
    options.concurrency ?? DEFAULT_CONCURRENCY,
    (volume) => probeVolume(executor, application, volume, signal),
    signal,
  );
  return summarize(application, settled);
}

/** Every application's volumes share one pool, so the limit holds across applications. */
export async function aggregateAll(
  applications: Application[],
  executor: RemoteExecutor,
  options: AggregateOptions = {},
): Promise<ApplicationStatus[]> {
  const { signal } = options;
  const pairs = applications.flatMap((application) =>
    application.volumes.map((volume) => ({ application, volume: volume.name })),
  );
  const settled = await mapWithConcurrency(
    pairs,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    (pair) => probeVolume(executor, pair.application, pair.volume, signal),
    signal,
  );
  let offset = 0;
  return applications.map((application) => {
    const slice = settled.slice(offset, offset + application.volumes.length);
    offset += application.volumes.length;
    return summarize(application, slice);
  });
}

import type { RelationshipState, Relationship, ReplicationLink, Site } from './model.js';

export const SHOW_FIELDS = [
  'source-path',
  'destination-path',
  'state',
  'status',
  'lag-time',
  'last-transfer-end-timestamp',
  'schedule',
  'policy',
] as const;

const NO_ENTRIES = /There are no entries matching your query/i;

export const snapmirrorCommands = {
  show: (vserver: string, volume: string) =>
    `snapmirror show -destination-path ${vserver}:${volume} -fields ${SHOW_FIELDS.join(',')}`,
  update: (vserver: string, volume: string) => `snapmirror update -destination-path ${vserver}:${volume}`,
  quiesce: (vserver: string, volume: string) => `snapmirror quiesce -destination-path ${vserver}:${volume}`,
  break: (vserver: string, volume: string) => `snapmirror break -destination-path ${vserver}:${volume}`,
  resync: (vserver: string, volume: string) => `snapmirror resync -destination-path ${vserver}:${volume}`,
  delete: (vserver: string, volume: string) => `snapmirror delete -destination-path ${vserver}:${volume}`,
  create: (sourceVserver: string, destinationVserver: string, volume: string, policy: string, schedule: string) =>
    `snapmirror create -source-path ${sourceVserver}:${volume} -destination-path ${destinationVserver}:${volume} -policy ${policy} -schedule ${schedule}`,
};

export const volumeCommands = {
  online: (vserver: string, volume: string) => `volume online -vserver ${vserver} -volume ${volume}`,
  offline: (vserver: string, volume: string) => `volume offline -vserver ${vserver} -volume ${volume}`,
  mount: (vserver: string, volume: string) => `volume mount -vserver ${vserver} -volume ${volume} -junction-path /${volume}`,
  unmount: (vserver: string, volume: string) => `volume unmount -vserver ${vserver} -volume ${volume}`,
};

export const shareCommands = {
  show: (vserver: string, share: string) => `cifs share show -vserver ${vserver} -share-name ${share}`,
  create: (vserver: string, share: string, sharePath: string) =>
    `cifs share create -vserver ${vserver} -share-name ${share} -path ${sharePath}`,
  delete: (vserver: string, share: string) => `cifs share delete -vserver ${vserver} -share-name ${share}`,
};

export type ShowParseResult =
  | { kind: 'absent' }
  | { kind: 'record'; fields: Record<string, string> }
  | { kind: 'unparsed'; reason: string };

function columnSpans(dashLine: string): Array<[number, number]> {
  const spans: Array<[number, number]> = [];
  const pattern = /-+/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(dashLine)) !== null) {
    spans.push([match.index, match.index + match[0].length]);
  }
  return spans;
}

function sliceColumns(line: string, spans: Array<[number, number]>): string[] {
  return spans.map(([start, end], index) => {
    const stop = index === spans.length - 1 ? line.length : end;
    return line.slice(start, stop).trim();
  });
}

/**
 * Parses `snapmirror show -fields ...` table output. Columns are located
 * from the dashed separator under the header, so values containing
 * spaces (timestamps) stay in their column.
 */
export function parseSnapmirrorShow(output: string, destinationPath: string): ShowParseResult {
  if (NO_ENTRIES.test(output)) {
    return { kind: 'absent' };
  }
  const lines = output.split(/\r?\n/);
  const dashIndex = lines.findIndex((line) => /^\s*-{2,}(\s+-{2,})*\s*$/.test(line));
  if (dashIndex < 1) {
    return { kind: 'unparsed', reason: 'no table header in output' };
  }
  const spans = columnSpans(lines[dashIndex]);
  const header = sliceColumns(lines[dashIndex - 1], spans).map((name) => name.toLowerCase());
  const rows = lines
    .slice(dashIndex + 1)
    .filter((line) => line.trim() && !/entr(y|ies) (was|were) displayed/i.test(line))
    .map((line) => {
      const values = sliceColumns(line, spans);
      const fields: Record<string, string> = {};
      header.forEach((name, index) => {
        fields[name] = values[index] ?? '';
      });
      return fields;
    });
  const row = rows.find((fields) => fields['destination-path'] === destinationPath);
  if (!row) {
    return rows.length === 0
      ? { kind: 'unparsed', reason: 'table has no rows' }
      : { kind: 'unparsed', reason: `no row for ${destinationPath}` };
  }
  return { kind: 'record', fields: row };
}

const IN_FLIGHT_STATUSES = new Set(['transferring', 'preparing', 'finalizing', 'queued', 'checking', 'aborting', 'breaking']);
const KNOWN_STATUSES = new Set(['idle', 'quiescing', 'quiesced', ...IN_FLIGHT_STATUSES]);
const KNOWN_MIRROR_STATES = new Set(['snapmirrored', 'broken-off', 'uninitialized']);

/**
 * Maps the cluster's (mirror state, transfer status) pair onto the
 * lifecycle enumeration. Anything unrecognised is `unknown`.
 */
export function toLifecycleState(rawState: string | undefined, rawStatus: string | undefined): RelationshipState {
  const state = String(rawState || '').trim().toLowerCase();
  const status = String(rawStatus || '').trim().toLowerCase();
  if (!KNOWN_MIRROR_STATES.has(state) || !KNOWN_STATUSES.has(status)) {
    return 'unknown';
  }
  if (status === 'quiesced' || status === 'quiescing') {
    return 'quiesced';
  }
  if (IN_FLIGHT_STATUSES.has(status)) {
    return state === 'broken-off' ? 'resyncing' : 'transferring';
  }
  switch (state) {
    case 'snapmirrored':
      return 'mirrored';
    case 'broken-off':
      return 'broken-off';
    default:
      return 'uninitialized';
  }
}

function optionalField(value: string | undefined): string | null {
  const normalized = String(value || '').trim();
  return normalized && normalized !== '-' ? normalized : null;
}

export function linkSites(link: ReplicationLink): { source: Site; destination: Site } {
  return link === 'prod-to-dr' ? { source: 'prod', destination: 'dr' } : { source: 'dr', destination: 'prod' };
}

export function writableSite(link: ReplicationLink, state: RelationshipState): Site | 'unknown' {
  if (state === 'unknown') return 'unknown';
  const sites = linkSites(link);
  return state === 'broken-off' ? sites.destination : sites.source;
}

export function toRelationship(
  volume: string,
  link: ReplicationLink,
  fields: Record<string, string>,
): Relationship {
  const state = toLifecycleState(fields.state, fields.status);
  return {
    volume,
    link,
    source_path: String(fields['source-path'] || ''),
    destination_path: String(fields['destination-path'] || ''),
    state,
    status: String(fields.status || ''),
    lag_time: optionalField(fields['lag-time']),
    last_transfer: optionalField(fields['last-transfer-end-timestamp']),
    schedule: optionalField(fields.schedule),
    policy: optionalField(fields.policy),
    writable_site: writableSite(link, state),
  };
}

export function shareExists(output: string, share: string): boolean {
  if (NO_ENTRIES.test(output)) return false;
  return output.split(/\s+/).includes(share);
}

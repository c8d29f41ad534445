export type Share = {
  name: string;
};

export type Qtree = {
  name: string;
  share?: Share;
};

export type Volume = {
  name: string;
  share?: Share;
  qtrees: Qtree[];
};

export type Application = {
  name: string;
  prod_cluster: string;
  dr_cluster: string;
  prod_vserver: string;
  dr_vserver: string;
  details: string;
  volumes: Volume[];
};

export const RELATIONSHIP_STATES = [
  'uninitialized',
  'mirrored',
  'quiesced',
  'broken-off',
  'resyncing',
  'transferring',
  'unknown',
] as const;

export type RelationshipState = (typeof RELATIONSHIP_STATES)[number];

export type ReplicationLink = 'prod-to-dr' | 'dr-to-prod';

export type Site = 'prod' | 'dr';

export type Relationship = {
  volume: string;
  link: ReplicationLink;
  source_path: string;
  destination_path: string;
  state: RelationshipState;
  /** Raw transfer status as reported by the cluster (Idle, Transferring, ...). */
  status: string;
  lag_time: string | null;
  last_transfer: string | null;
  schedule: string | null;
  policy: string | null;
  writable_site: Site | 'unknown';
};

export type RelationshipProbe =
  | { outcome: 'resolved'; relationship: Relationship }
  | { outcome: 'absent' }
  | { outcome: 'failed'; state: 'unknown'; error: string }
  | { outcome: 'cancelled' };

export type VolumeStatus = {
  volume: string;
  prod_to_dr: RelationshipProbe;
  dr_to_prod: RelationshipProbe;
};

export type Direction = 'PROD_TO_DR' | 'DR_TO_PROD' | 'INCONSISTENT';

export type ActiveSide = Site | 'unknown';

export type VolumeSide = {
  volume: string;
  side: ActiveSide;
  reason: string;
};

export type ApplicationStatus = {
  application: string;
  collected_at: string;
  volumes: VolumeStatus[];
  direction: Direction;
  sides: VolumeSide[];
  partial_failure: boolean;
  cancelled: boolean;
};

export const ACTION_NAMES = [
  'update',
  'quiesce',
  'break',
  'resync',
  'recovery',
  'recovery-extended',
  'restoration-extended',
  'restoration-flip-flop',
  'restoration-post-tvt',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export type ExecutionPolicy = 'sequential' | 'parallel';

export type ActionErrorKind =
  | 'ConnectionError'
  | 'PreconditionError'
  | 'RemoteCommandError'
  | 'CommandPolicyError'
  | 'cancelled';

export type CommandRecord = {
  cluster: string;
  command: string;
  ok: boolean;
  skipped?: boolean;
  output?: string;
  error?: string;
};

export type ActionResult = {
  volume: string;
  action: ActionName;
  ok: boolean;
  state_before: RelationshipState | 'absent';
  state_after: RelationshipState | 'absent';
  error?: { kind: ActionErrorKind; message: string };
  commands: CommandRecord[];
};

export type BatchResult = {
  application: string;
  action: ActionName;
  policy: ExecutionPolicy;
  ok: boolean;
  partial_failure: boolean;
  cancelled: boolean;
  results: ActionResult[];
};

export type AuditRecord = {
  action: string;
  application: string;
  operator: string;
  timestamp: string;
  outcome: string;
};

export function isActionName(value: string): value is ActionName {
  return ACTION_NAMES.some((name) => name === value);
}

export function volumeShares(volume: Volume): Array<{ share: Share; path: string }> {
  if (volume.share) {
    return [{ share: volume.share, path: `/${volume.name}` }];
  }
  const output: Array<{ share: Share; path: string }> = [];
  for (const qtree of volume.qtrees) {
    if (qtree.share) {
      output.push({ share: qtree.share, path: `/${volume.name}/${qtree.name}` });
    }
  }
  return output;
}

import type { ActiveSide, Direction, RelationshipProbe, VolumeSide, VolumeStatus } from './model.js';

// States in which the source of a link is the live, writable copy.
const MIRRORING_STATES = new Set(['mirrored', 'quiesced', 'transferring', 'resyncing', 'uninitialized']);

function probeBlocksVerdict(probe: RelationshipProbe): string | null {
  switch (probe.outcome) {
    case 'failed':
      return `query failed: ${probe.error}`;
    case 'cancelled':
      return 'query cancelled';
    case 'resolved':
      return probe.relationship.state === 'unknown' ? `unrecognised status "${probe.relationship.status}"` : null;
    default:
      return null;
  }
}

/**
 * Decides which site holds the writable copy of one volume, from both
 * link perspectives.
 */
export function classifyVolume(status: VolumeStatus): VolumeSide {
  const { volume, prod_to_dr: forward, dr_to_prod: reverse } = status;
  const blocked = probeBlocksVerdict(forward) ?? probeBlocksVerdict(reverse);
  if (blocked) {
    return { volume, side: 'unknown', reason: blocked };
  }
  if (reverse.outcome === 'resolved') {
    const state = reverse.relationship.state;
    if (MIRRORING_STATES.has(state)) {
      return { volume, side: 'dr', reason: `dr-to-prod relationship ${state}` };
    }
    return { volume, side: 'prod', reason: 'dr-to-prod relationship broken-off at prod' };
  }
  if (forward.outcome === 'resolved') {
    const state = forward.relationship.state;
    if (state === 'broken-off') {
      return { volume, side: 'dr', reason: 'prod-to-dr relationship broken-off at dr' };
    }
    return { volume, side: 'prod', reason: `prod-to-dr relationship ${state}` };
  }
  return { volume, side: 'unknown', reason: 'no relationship in either direction' };
}

export function directionFromSides(sides: ActiveSide[]): Direction {
  if (sides.length === 0) return 'INCONSISTENT';
  if (sides.every((side) => side === 'prod')) return 'PROD_TO_DR';
  if (sides.every((side) => side === 'dr')) return 'DR_TO_PROD';
  return 'INCONSISTENT';
}

/**
 * Unanimous or inconsistent: a volume whose side cannot be determined
 * counts for neither direction and so breaks unanimity.
 */
export function resolveDirection(volumes: VolumeStatus[]): { direction: Direction; sides: VolumeSide[] } {
  const sides = volumes.map(classifyVolume);
  return { direction: directionFromSides(sides.map((entry) => entry.side)), sides };
}

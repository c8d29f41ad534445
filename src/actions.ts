import { ConfigurationError, InconsistentDirectionError, PreconditionError } from './errors.js';
import type {
  ActionName,
  ActiveSide,
  Application,
  ApplicationStatus,
  Direction,
  ExecutionPolicy,
  Relationship,
  RelationshipProbe,
  RelationshipState,
  ReplicationLink,
  Volume,
  VolumeSide,
  VolumeStatus,
} from './model.js';
import { volumeShares } from './model.js';
import { shareCommands, snapmirrorCommands, volumeCommands } from './snapmirror.js';

export type LinkState = RelationshipState | 'absent';

export type PlanStep =
  | { kind: 'run'; cluster: string; command: string; description: string; answer?: string }
  | {
      kind: 'wait';
      cluster: string;
      command: string;
      description: string;
      vserver: string;
      volume: string;
      link: ReplicationLink;
      until: RelationshipState[];
    }
  | {
      kind: 'conditional';
      cluster: string;
      command: string;
      description: string;
      check: string;
      subject: { type: 'share'; name: string } | { type: 'relationship'; destination_path: string };
      when: 'missing' | 'present';
      answer?: string;
    };

export type RelationshipPlan = {
  volume: string;
  link: ReplicationLink;
  side: ActiveSide;
  state_before: LinkState;
  allowed: boolean;
  precondition?: { expected: string[]; actual: string; message: string };
  steps: PlanStep[];
  /** Link read back after the steps to report the resulting state. */
  verify: { cluster: string; vserver: string; link: ReplicationLink };
};

export type ActionPlan = {
  application: string;
  action: ActionName;
  description: string;
  policy: ExecutionPolicy;
  direction: Direction;
  whole_application: boolean;
  relationships: RelationshipPlan[];
};

export type OperatorAssertions = {
  /** Operator statement that recovery-extended ran after the failover. */
  extended_recovery_ran?: boolean;
};

export type PlanOptions = {
  policy?: ExecutionPolicy;
  targets?: string[];
  assertions?: OperatorAssertions;
  defaultSnapmirrorPolicy?: string;
  defaultSnapmirrorSchedule?: string;
};

type Endpoint = { cluster: string; vserver: string };

type StepContext = {
  application: Application;
  volume: Volume;
  status: VolumeStatus;
  prod: Endpoint;
  dr: Endpoint;
  primary: ReplicationLink;
  state: LinkState;
  policy: string;
  schedule: string;
};

type ActionRule = {
  description: string;
  policy: ExecutionPolicy;
  /** Which link's state the precondition reads. */
  link: 'primary' | ReplicationLink;
  from: LinkState[];
  /** Active sides the relationship may be on; omitted means any. */
  sides?: ActiveSide[];
  /** The opposite link must not exist. */
  requires_absent?: ReplicationLink;
  extended_recovery_ran?: boolean;
  verify: 'primary' | ReplicationLink;
  steps: (ctx: StepContext) => PlanStep[];
};

const KNOWN_SIDES: ActiveSide[] = ['prod', 'dr'];
const YES = 'y\n';

function endpointFor(ctx: Pick<StepContext, 'prod' | 'dr'>, link: ReplicationLink): Endpoint {
  // Relationships are administered on the cluster that owns the destination.
  return link === 'prod-to-dr' ? ctx.dr : ctx.prod;
}

function run(endpoint: Endpoint, command: string, description: string, answer?: string): PlanStep {
  return answer === undefined
    ? { kind: 'run', cluster: endpoint.cluster, command, description }
    : { kind: 'run', cluster: endpoint.cluster, command, description, answer };
}

function waitFor(endpoint: Endpoint, volume: string, link: ReplicationLink, until: RelationshipState[]): PlanStep {
  return {
    kind: 'wait',
    cluster: endpoint.cluster,
    command: snapmirrorCommands.show(endpoint.vserver, volume),
    description: `wait for ${until.join('/')}`,
    vserver: endpoint.vserver,
    volume,
    link,
    until,
  };
}

function createSharesIfMissing(endpoint: Endpoint, volume: Volume): PlanStep[] {
  return volumeShares(volume).map(({ share, path }) => ({
    kind: 'conditional',
    cluster: endpoint.cluster,
    command: shareCommands.create(endpoint.vserver, share.name, path),
    description: `create share ${share.name} if missing`,
    check: shareCommands.show(endpoint.vserver, share.name),
    subject: { type: 'share', name: share.name },
    when: 'missing',
  }));
}

function deleteSharesIfPresent(endpoint: Endpoint, volume: Volume): PlanStep[] {
  return volumeShares(volume).map(({ share }) => ({
    kind: 'conditional',
    cluster: endpoint.cluster,
    command: shareCommands.delete(endpoint.vserver, share.name),
    description: `delete share ${share.name} if present`,
    check: shareCommands.show(endpoint.vserver, share.name),
    subject: { type: 'share', name: share.name },
    when: 'present',
    answer: YES,
  }));
}

function createRelationshipIfMissing(source: Endpoint, destination: Endpoint, ctx: StepContext): PlanStep {
  const volume = ctx.volume.name;
  return {
    kind: 'conditional',
    cluster: destination.cluster,
    command: snapmirrorCommands.create(source.vserver, destination.vserver, volume, ctx.policy, ctx.schedule),
    description: `create ${source.vserver}:${volume} -> ${destination.vserver}:${volume} if missing`,
    check: snapmirrorCommands.show(destination.vserver, volume),
    subject: { type: 'relationship', destination_path: `${destination.vserver}:${volume}` },
    when: 'missing',
  };
}

// Transfer, then quiesce, unless the relationship is already quiesced.
function drainAndQuiesce(endpoint: Endpoint, ctx: StepContext, link: ReplicationLink): PlanStep[] {
  const volume = ctx.volume.name;
  if (ctx.state === 'quiesced') {
    return [];
  }
  return [
    run(endpoint, snapmirrorCommands.update(endpoint.vserver, volume), 'final incremental transfer'),
    waitFor(endpoint, volume, link, ['mirrored']),
    run(endpoint, snapmirrorCommands.quiesce(endpoint.vserver, volume), 'quiesce'),
    waitFor(endpoint, volume, link, ['quiesced']),
  ];
}

export const ACTION_RULES: Record<ActionName, ActionRule> = {
  update: {
    description: 'trigger an incremental transfer on the active relationship',
    policy: 'parallel',
    link: 'primary',
    from: ['mirrored', 'quiesced'],
    sides: KNOWN_SIDES,
    verify: 'primary',
    steps: (ctx) => {
      const endpoint = endpointFor(ctx, ctx.primary);
      return [run(endpoint, snapmirrorCommands.update(endpoint.vserver, ctx.volume.name), 'incremental transfer')];
    },
  },
  quiesce: {
    description: 'pause scheduled transfers',
    policy: 'parallel',
    link: 'primary',
    from: ['mirrored'],
    verify: 'primary',
    steps: (ctx) => {
      const endpoint = endpointFor(ctx, ctx.primary);
      return [
        run(endpoint, snapmirrorCommands.quiesce(endpoint.vserver, ctx.volume.name), 'quiesce'),
        waitFor(endpoint, ctx.volume.name, ctx.primary, ['quiesced']),
      ];
    },
  },
  break: {
    description: 'break the relationship and make the destination writable',
    policy: 'parallel',
    link: 'primary',
    from: ['quiesced'],
    verify: 'primary',
    steps: (ctx) => {
      const endpoint = endpointFor(ctx, ctx.primary);
      return [run(endpoint, snapmirrorCommands.break(endpoint.vserver, ctx.volume.name), 'break', YES)];
    },
  },
  resync: {
    description: 're-establish a broken relationship',
    policy: 'parallel',
    link: 'primary',
    from: ['broken-off'],
    verify: 'primary',
    steps: (ctx) => {
      const endpoint = endpointFor(ctx, ctx.primary);
      return [
        run(endpoint, snapmirrorCommands.resync(endpoint.vserver, ctx.volume.name), 'resync', YES),
        waitFor(endpoint, ctx.volume.name, ctx.primary, ['mirrored']),
      ];
    },
  },
  recovery: {
    description: 'fail over to DR: break every relationship and publish the DR copies',
    policy: 'sequential',
    link: 'prod-to-dr',
    from: ['mirrored', 'quiesced'],
    sides: ['prod'],
    verify: 'prod-to-dr',
    steps: (ctx) => {
      const volume = ctx.volume.name;
      return [
        ...drainAndQuiesce(ctx.dr, ctx, 'prod-to-dr'),
        run(ctx.dr, snapmirrorCommands.break(ctx.dr.vserver, volume), 'break', YES),
        run(ctx.prod, volumeCommands.unmount(ctx.prod.vserver, volume), 'unmount production volume', YES),
        run(ctx.prod, volumeCommands.offline(ctx.prod.vserver, volume), 'take production volume offline', YES),
        run(ctx.dr, volumeCommands.mount(ctx.dr.vserver, volume), 'mount DR volume'),
        ...createSharesIfMissing(ctx.dr, ctx.volume),
      ];
    },
  },
  'recovery-extended': {
    description: 'reverse-mirror DR to PROD to capture changes made on the DR copy',
    policy: 'sequential',
    link: 'prod-to-dr',
    from: ['broken-off'],
    requires_absent: 'dr-to-prod',
    verify: 'dr-to-prod',
    steps: (ctx) => {
      const volume = ctx.volume.name;
      return [
        run(ctx.prod, volumeCommands.online(ctx.prod.vserver, volume), 'bring production volume online'),
        run(
          ctx.prod,
          snapmirrorCommands.create(ctx.dr.vserver, ctx.prod.vserver, volume, ctx.policy, ctx.schedule),
          'create DR-to-PROD relationship',
        ),
        run(ctx.prod, snapmirrorCommands.resync(ctx.prod.vserver, volume), 'resync DR to PROD', YES),
        waitFor(ctx.prod, volume, 'dr-to-prod', ['mirrored']),
      ];
    },
  },
  'restoration-extended': {
    description: 'finish the reverse mirror and hand the writable copy back to PROD',
    policy: 'sequential',
    link: 'dr-to-prod',
    from: ['mirrored', 'quiesced'],
    sides: ['dr'],
    extended_recovery_ran: true,
    verify: 'prod-to-dr',
    steps: (ctx) => {
      const volume = ctx.volume.name;
      return [
        ...deleteSharesIfPresent(ctx.dr, ctx.volume),
        ...drainAndQuiesce(ctx.prod, ctx, 'dr-to-prod'),
        run(ctx.prod, snapmirrorCommands.break(ctx.prod.vserver, volume), 'break DR-to-PROD', YES),
        run(ctx.prod, volumeCommands.mount(ctx.prod.vserver, volume), 'mount production volume'),
        ...createSharesIfMissing(ctx.prod, ctx.volume),
        createRelationshipIfMissing(ctx.prod, ctx.dr, ctx),
        run(ctx.prod, snapmirrorCommands.delete(ctx.prod.vserver, volume), 'delete DR-to-PROD relationship', YES),
        run(ctx.dr, volumeCommands.unmount(ctx.dr.vserver, volume), 'unmount DR volume', YES),
        run(ctx.dr, volumeCommands.offline(ctx.dr.vserver, volume), 'take DR volume offline', YES),
      ];
    },
  },
  'restoration-flip-flop': {
    description: 'hand the writable copy back to PROD without capturing DR changes',
    policy: 'sequential',
    link: 'prod-to-dr',
    from: ['broken-off'],
    requires_absent: 'dr-to-prod',
    extended_recovery_ran: false,
    verify: 'prod-to-dr',
    steps: (ctx) => {
      const volume = ctx.volume.name;
      return [
        run(ctx.prod, volumeCommands.online(ctx.prod.vserver, volume), 'bring production volume online'),
        run(ctx.prod, volumeCommands.mount(ctx.prod.vserver, volume), 'mount production volume'),
        ...createSharesIfMissing(ctx.prod, ctx.volume),
        run(ctx.dr, volumeCommands.unmount(ctx.dr.vserver, volume), 'unmount DR volume', YES),
        run(ctx.dr, volumeCommands.offline(ctx.dr.vserver, volume), 'take DR volume offline', YES),
      ];
    },
  },
  'restoration-post-tvt': {
    description: 're-mirror PROD to DR and resume scheduled updates',
    policy: 'sequential',
    link: 'prod-to-dr',
    from: ['broken-off', 'uninitialized', 'absent'],
    requires_absent: 'dr-to-prod',
    verify: 'prod-to-dr',
    steps: (ctx) => {
      const volume = ctx.volume.name;
      return [
        run(ctx.dr, volumeCommands.online(ctx.dr.vserver, volume), 'bring DR volume online'),
        createRelationshipIfMissing(ctx.prod, ctx.dr, ctx),
        ...deleteSharesIfPresent(ctx.dr, ctx.volume),
        run(ctx.dr, snapmirrorCommands.resync(ctx.dr.vserver, volume), 'resync PROD to DR', YES),
        waitFor(ctx.dr, volume, 'prod-to-dr', ['mirrored']),
      ];
    },
  },
};

export function probeState(probe: RelationshipProbe): LinkState | 'cancelled' {
  switch (probe.outcome) {
    case 'resolved':
      return probe.relationship.state;
    case 'absent':
      return 'absent';
    case 'failed':
      return 'unknown';
    default:
      return 'cancelled';
  }
}

function probeFor(status: VolumeStatus, link: ReplicationLink): RelationshipProbe {
  return link === 'prod-to-dr' ? status.prod_to_dr : status.dr_to_prod;
}

export function primaryLink(status: VolumeStatus): ReplicationLink {
  return status.dr_to_prod.outcome === 'resolved' ? 'dr-to-prod' : 'prod-to-dr';
}

function relationshipOf(probe: RelationshipProbe): Relationship | null {
  return probe.outcome === 'resolved' ? probe.relationship : null;
}

/**
 * Checks one relationship against the action's rule. Returns the error
 * the relationship would fail with, or null when the action is legal.
 */
export function checkPrecondition(
  action: ActionName,
  status: VolumeStatus,
  side: VolumeSide,
  assertions: OperatorAssertions = {},
): PreconditionError | null {
  const rule = ACTION_RULES[action];
  const link = rule.link === 'primary' ? primaryLink(status) : rule.link;
  const state = probeState(probeFor(status, link));

  if (state === 'cancelled' || state === 'unknown') {
    return new PreconditionError(
      `${action} on ${status.volume}: ${link} state is ${state}, expected ${rule.from.join(' or ')}`,
      rule.from,
      state,
    );
  }
  if (rule.sides && !rule.sides.includes(side.side)) {
    return new PreconditionError(
      `${action} on ${status.volume}: active side is ${side.side}, expected ${rule.sides.join(' or ')}`,
      rule.sides.map((entry) => `side:${entry}`),
      `side:${side.side}`,
    );
  }
  if (rule.requires_absent) {
    const other = probeState(probeFor(status, rule.requires_absent));
    if (other !== 'absent') {
      return new PreconditionError(
        `${action} on ${status.volume}: ${rule.requires_absent} relationship must not exist (found ${other})`,
        [`${rule.requires_absent}:absent`],
        `${rule.requires_absent}:${other}`,
      );
    }
  }
  if (!rule.from.includes(state)) {
    return new PreconditionError(
      `${action} on ${status.volume}: expected ${link} state ${rule.from.join(' or ')}, actual ${state}`,
      rule.from,
      state,
    );
  }
  if (rule.extended_recovery_ran !== undefined && assertions.extended_recovery_ran !== rule.extended_recovery_ran) {
    const expected = rule.extended_recovery_ran ? 'ran' : 'did not run';
    const actual = assertions.extended_recovery_ran === undefined
      ? 'not asserted'
      : assertions.extended_recovery_ran ? 'ran' : 'did not run';
    return new PreconditionError(
      `${action} on ${status.volume}: requires the operator to assert recovery-extended ${expected} (${actual})`,
      [`recovery-extended ${expected}`],
      actual,
    );
  }
  return null;
}

function selectVolumes(application: Application, targets: string[] | undefined): Volume[] {
  if (!targets || targets.length === 0) {
    return application.volumes;
  }
  const unknown = targets.filter((name) => !application.volumes.some((volume) => volume.name === name));
  if (unknown.length > 0) {
    throw new ConfigurationError(`unknown volume(s) for ${application.name}: ${unknown.join(', ')}`);
  }
  return application.volumes.filter((volume) => targets.includes(volume.name));
}

/**
 * Builds what an action would do to each relationship, without touching
 * any cluster. Whole-application requests are refused while the
 * direction is inconsistent; naming targets overrides that.
 */
export function planAction(
  application: Application,
  action: ActionName,
  status: ApplicationStatus,
  options: PlanOptions = {},
): ActionPlan {
  const rule = ACTION_RULES[action];
  const wholeApplication = !options.targets || options.targets.length === 0;
  if (wholeApplication && status.direction === 'INCONSISTENT') {
    throw new InconsistentDirectionError(
      `${application.name}: replication direction is inconsistent; target specific volumes to ${action}`,
      application.name,
    );
  }
  const prod: Endpoint = { cluster: application.prod_cluster, vserver: application.prod_vserver };
  const dr: Endpoint = { cluster: application.dr_cluster, vserver: application.dr_vserver };

  const relationships = selectVolumes(application, options.targets).map((volume): RelationshipPlan => {
    const volumeStatus = status.volumes.find((entry) => entry.volume === volume.name) ?? {
      volume: volume.name,
      prod_to_dr: { outcome: 'cancelled' },
      dr_to_prod: { outcome: 'cancelled' },
    };
    const side = status.sides.find((entry) => entry.volume === volume.name) ?? {
      volume: volume.name,
      side: 'unknown',
      reason: 'not collected',
    };
    const primary = primaryLink(volumeStatus);
    const link = rule.link === 'primary' ? primary : rule.link;
    const rawState = probeState(probeFor(volumeStatus, link));
    const state: LinkState = rawState === 'cancelled' ? 'unknown' : rawState;
    const verifyLink = rule.verify === 'primary' ? primary : rule.verify;
    const verifyEndpoint = endpointFor({ prod, dr }, verifyLink);
    const verify = { cluster: verifyEndpoint.cluster, vserver: verifyEndpoint.vserver, link: verifyLink };

    const error = checkPrecondition(action, volumeStatus, side, options.assertions);
    if (error) {
      return {
        volume: volume.name,
        link,
        side: side.side,
        state_before: state,
        allowed: false,
        precondition: { expected: error.expected, actual: error.actual, message: error.message },
        steps: [],
        verify,
      };
    }

    const record = relationshipOf(volumeStatus.prod_to_dr) ?? relationshipOf(volumeStatus.dr_to_prod);
    const ctx: StepContext = {
      application,
      volume,
      status: volumeStatus,
      prod,
      dr,
      primary,
      state,
      policy: record?.policy ?? options.defaultSnapmirrorPolicy ?? 'MirrorAllSnapshots',
      schedule: record?.schedule ?? options.defaultSnapmirrorSchedule ?? 'hourly',
    };
    return {
      volume: volume.name,
      link,
      side: side.side,
      state_before: state,
      allowed: true,
      steps: rule.steps(ctx),
      verify,
    };
  });

  return {
    application: application.name,
    action,
    description: rule.description,
    policy: options.policy ?? rule.policy,
    direction: status.direction,
    whole_application: wholeApplication,
    relationships,
  };
}

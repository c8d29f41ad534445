import { afterEach, describe, expect, it, vi } from 'vitest';
import { aggregate, aggregateAll } from '../src/aggregator.js';
import { FakeOntap, sampleApplication, seedDrToProd, seedProdToDr } from './fakes/fake-ontap.js';

function fiveVolumeApplication() {
  return sampleApplication(
    'APP5',
    ['vol1', 'vol2', 'vol3', 'vol4', 'vol5'].map((name) => ({ name, qtrees: [] })),
  );
}

describe('status aggregation', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads both links of every volume and resolves PROD_TO_DR', async () => {
    const fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Snapmirrored');

    const status = await aggregate(application, fake);

    expect(status.direction).toBe('PROD_TO_DR');
    expect(status.partial_failure).toBe(false);
    expect(status.cancelled).toBe(false);
    expect(status.volumes.map((entry) => entry.volume)).toEqual(['vol1', 'vol2', 'vol3']);
    const first = status.volumes[0];
    expect(first.dr_to_prod).toEqual({ outcome: 'absent' });
    expect(first.prod_to_dr.outcome === 'resolved' && first.prod_to_dr.relationship.state).toBe('mirrored');
    expect(fake.calls.filter((call) => call.cluster === 'dr-cl')).toHaveLength(3);
    expect(fake.calls.filter((call) => call.cluster === 'prod-cl')).toHaveLength(3);
  });

  it('resolves DR_TO_PROD while the reverse mirror runs', async () => {
    const fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Broken-off');
    seedDrToProd(fake, application, 'Snapmirrored');

    const status = await aggregate(application, fake);

    expect(status.direction).toBe('DR_TO_PROD');
    expect(status.sides.every((entry) => entry.reason === 'dr-to-prod relationship mirrored')).toBe(true);
  });

  it('never serves a cached read', async () => {
    const fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Snapmirrored');

    await aggregate(application, fake);
    const relationship = fake.relationship('dr-cl', 'svm_dr:vol2');
    if (!relationship) throw new Error('seed missing');
    relationship.state = 'Broken-off';
    const second = await aggregate(application, fake);

    expect(fake.calls).toHaveLength(12);
    expect(second.direction).toBe('INCONSISTENT');
  });

  it('keeps a failed probe as unknown and flags a partial failure', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Snapmirrored');
    fake.failCommand(/svm_dr:vol2 /, 'Error: command failed: RPC timed out', 'dr-cl');

    const status = await aggregate(application, fake);

    expect(status.partial_failure).toBe(true);
    expect(status.volumes[1].prod_to_dr).toEqual({
      outcome: 'failed',
      state: 'unknown',
      error: 'Error: command failed: RPC timed out',
    });
    expect(status.sides[1]).toEqual({
      volume: 'vol2',
      side: 'unknown',
      reason: 'query failed: Error: command failed: RPC timed out',
    });
    expect(status.direction).toBe('INCONSISTENT');
  });

  it('records a connection failure against the affected probes only', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const fake = new FakeOntap();
    const application = sampleApplication();
    seedProdToDr(fake, application, 'Snapmirrored');
    fake.failConnection(/svm_prod:vol3 /, 'broken pipe', 'prod-cl');

    const status = await aggregate(application, fake);

    expect(status.volumes[2].dr_to_prod).toEqual({
      outcome: 'failed',
      state: 'unknown',
      error: 'ssh to prod-cl failed: broken pipe',
    });
    expect(status.volumes[2].prod_to_dr.outcome).toBe('resolved');
    expect(status.volumes[0].dr_to_prod).toEqual({ outcome: 'absent' });
  });

  it('keeps finished volumes and marks the rest cancelled when aborted', async () => {
    const fake = new FakeOntap();
    const application = fiveVolumeApplication();
    seedProdToDr(fake, application, 'Snapmirrored');
    const controller = new AbortController();
    // Two volumes take four reads; the fifth read belongs to vol3.
    fake.beforeExecute = () => {
      if (fake.calls.length === 5) controller.abort();
    };

    const status = await aggregate(application, fake, { concurrency: 1, signal: controller.signal });

    expect(status.cancelled).toBe(true);
    expect(status.volumes.map((entry) => entry.prod_to_dr.outcome)).toEqual([
      'resolved',
      'resolved',
      'cancelled',
      'cancelled',
      'cancelled',
    ]);
    expect(status.partial_failure).toBe(false);
    expect(status.direction).toBe('INCONSISTENT');
    expect(fake.calls).toHaveLength(5);
  });

  it('bounds the number of volumes read at once', async () => {
    const fake = new FakeOntap();
    const application = fiveVolumeApplication();
    seedProdToDr(fake, application, 'Snapmirrored');
    let inFlight = 0;
    let peak = 0;
    fake.beforeExecute = async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
    };

    const status = await aggregate(application, fake, { concurrency: 2 });

    expect(status.direction).toBe('PROD_TO_DR');
    // Each volume reads its two links together.
    expect(peak).toBe(4);
  });

  it('keeps the limit across applications', async () => {
    const fake = new FakeOntap();
    const applications = ['APP1', 'APP2', 'APP3', 'APP4'].map((name) => sampleApplication(name));
    for (const application of applications) {
      seedProdToDr(fake, application, 'Snapmirrored');
    }
    let inFlight = 0;
    let peak = 0;
    fake.beforeExecute = async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
    };

    const statuses = await aggregateAll(applications, fake, { concurrency: 2 });

    expect(statuses.map((status) => [status.application, status.volumes.length])).toEqual([
      ['APP1', 3],
      ['APP2', 3],
      ['APP3', 3],
      ['APP4', 3],
    ]);
    expect(peak).toBe(4);
  });

  it('aggregates every application', async () => {
    const fake = new FakeOntap();
    const first = sampleApplication('APP1');
    const second = sampleApplication('APP2', [{ name: 'data9', qtrees: [] }]);
    seedProdToDr(fake, first, 'Snapmirrored');
    seedProdToDr(fake, second, 'Broken-off');

    const statuses = await aggregateAll([first, second], fake);

    expect(statuses.map((status) => [status.application, status.direction])).toEqual([
      ['APP1', 'PROD_TO_DR'],
      ['APP2', 'DR_TO_PROD'],
    ]);
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SegmentationEngine } from './segmentationEngine';
import { InvalidArgumentError } from '../errors';
import { CustomerFeature } from '../types';

function feature(
  customerId: string,
  interactionCount: number,
  purchaseCount: number,
  totalSpent: number,
  activeMonths: number
): CustomerFeature {
  return { customerId, interactionCount, purchaseCount, totalSpent, activeMonths };
}

const CASUAL = [
  feature('c1', 1, 0, 0, 0),
  feature('c2', 2, 1, 20, 1),
  feature('c3', 0, 1, 15, 1),
];
const LOYAL = [
  feature('l1', 40, 12, 900, 6),
  feature('l2', 38, 11, 860, 5),
  feature('l3', 42, 13, 950, 6),
];

describe('SegmentationEngine', () => {
  const engine = new SegmentationEngine({ seed: 42 });

  it('labels every customer the same when k = 1', () => {
    const labels = engine.run([...CASUAL, ...LOYAL], 1);
    assert.equal(labels.size, 6);
    assert.deepEqual(new Set(labels.values()), new Set(['segment_0']));
  });

  it('splits well-separated customers into two segments', () => {
    const labels = engine.run([...CASUAL, ...LOYAL], 2);
    assert.deepEqual(Object.fromEntries(labels), {
      c1: 'segment_0',
      c2: 'segment_0',
      c3: 'segment_0',
      l1: 'segment_1',
      l2: 'segment_1',
      l3: 'segment_1',
    });
  });

  it('numbers labels by first appearance', () => {
    const labels = engine.run([...LOYAL, ...CASUAL], 2);
    assert.equal(labels.get('l1'), 'segment_0');
    assert.equal(labels.get('c1'), 'segment_1');
  });

  it('gives every customer exactly one label', () => {
    const labels = engine.run([...CASUAL, ...LOYAL], 3);
    assert.deepEqual([...labels.keys()], ['c1', 'c2', 'c3', 'l1', 'l2', 'l3']);
    assert.ok([...labels.values()].every((label) => /^segment_[0-2]$/.test(label)));
  });

  it('is reproducible across runs and instances', () => {
    const batch = [...CASUAL, ...LOYAL];
    const first = engine.run(batch, 3);
    assert.deepEqual(engine.run(batch, 3), first);
    assert.deepEqual(new SegmentationEngine({ seed: 42 }).run(batch, 3), first);
  });

  it('maps identical customers to a single segment', () => {
    const same = [feature('a', 3, 1, 10, 1), feature('b', 3, 1, 10, 1), feature('c', 3, 1, 10, 1)];
    const labels = engine.run(same, 3);
    assert.deepEqual(new Set(labels.values()), new Set(['segment_0']));
  });

  it('segments a single customer', () => {
    const labels = engine.run([feature('solo', 0, 0, 0, 0)], 4);
    assert.deepEqual(Object.fromEntries(labels), { solo: 'segment_0' });
  });

  it('rejects a non-positive or fractional k', () => {
    assert.throws(() => engine.run(CASUAL, 0), InvalidArgumentError);
    assert.throws(() => engine.run(CASUAL, -2), InvalidArgumentError);
    assert.throws(() => engine.run(CASUAL, 1.5), InvalidArgumentError);
  });

  it('rejects an empty batch', () => {
    assert.throws(() => engine.run([], 2), InvalidArgumentError);
  });

  it('rejects malformed batches', () => {
    assert.throws(() => engine.run([CASUAL[0], CASUAL[0]], 1), InvalidArgumentError);
    assert.throws(
      () => engine.run([feature('bad', Number.NaN, 0, 0, 0)], 1),
      InvalidArgumentError
    );
  });
});

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadSettings } from './settings';
import { InvalidArgumentError } from '../errors';

describe('loadSettings', () => {
  it('uses defaults when nothing is set', () => {
    assert.deepEqual(loadSettings({}), {
      port: 4000,
      recordStore: 'firestore',
      vectorDimensions: 128,
      vectorSalt: 'catalog-v1',
      recentInteractionLimit: 3,
      defaultTopN: 5,
      segmentCount: 4,
      segmentSeed: 42,
      segmentMaxIterations: 100,
      seedSampleData: false,
      firestore: { projectId: null, serviceAccountPath: 'secrets/serviceAccountKey.json' },
    });
  });

  it('reads values from the environment', () => {
    const settings = loadSettings({
      PORT: '8080',
      RECORD_STORE: 'memory',
      VECTOR_DIMENSIONS: '64',
      VECTOR_SALT: 'catalog-v2',
      RECENT_INTERACTION_LIMIT: '5',
      DEFAULT_TOP_N: '10',
      SEGMENT_COUNT: '3',
      SEGMENT_SEED: '-7',
      SEGMENT_MAX_ITERATIONS: '20',
      SEED_SAMPLE_DATA: 'TRUE',
      GOOGLE_CLOUD_PROJECT: 'test-project',
      FIREBASE_SERVICE_ACCOUNT_PATH: '/tmp/key.json',
    });

    assert.equal(settings.port, 8080);
    assert.equal(settings.recordStore, 'memory');
    assert.equal(settings.vectorDimensions, 64);
    assert.equal(settings.vectorSalt, 'catalog-v2');
    assert.equal(settings.recentInteractionLimit, 5);
    assert.equal(settings.defaultTopN, 10);
    assert.equal(settings.segmentCount, 3);
    assert.equal(settings.segmentSeed, -7);
    assert.equal(settings.segmentMaxIterations, 20);
    assert.equal(settings.seedSampleData, true);
    assert.deepEqual(settings.firestore, { projectId: 'test-project', serviceAccountPath: '/tmp/key.json' });
  });

  it('treats blank values as unset', () => {
    const settings = loadSettings({ PORT: ' ', RECORD_STORE: '', SEGMENT_SEED: '' });
    assert.equal(settings.port, 4000);
    assert.equal(settings.recordStore, 'firestore');
    assert.equal(settings.segmentSeed, 42);
  });

  it('accepts 1 as a true flag and anything else as false', () => {
    assert.equal(loadSettings({ SEED_SAMPLE_DATA: '1' }).seedSampleData, true);
    assert.equal(loadSettings({ SEED_SAMPLE_DATA: 'yes' }).seedSampleData, false);
  });

  it('rejects invalid values', () => {
    assert.throws(() => loadSettings({ PORT: 'abc' }), InvalidArgumentError);
    assert.throws(() => loadSettings({ DEFAULT_TOP_N: '0' }), InvalidArgumentError);
    assert.throws(() => loadSettings({ SEGMENT_COUNT: '2.5' }), InvalidArgumentError);
    assert.throws(() => loadSettings({ SEGMENT_SEED: 'seed' }), InvalidArgumentError);
    assert.throws(() => loadSettings({ RECORD_STORE: 'postgres' }), /RECORD_STORE must be/);
  });
});

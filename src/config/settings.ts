import { InvalidArgumentError } from '../errors';
import { FirestoreSettings } from './firestore';

export type RecordStoreKind = 'firestore' | 'memory';

export interface Settings {
  port: number;
  recordStore: RecordStoreKind;
  vectorDimensions: number;
  vectorSalt: string;
  recentInteractionLimit: number;
  defaultTopN: number;
  segmentCount: number;
  segmentSeed: number;
  segmentMaxIterations: number;
  seedSampleData: boolean;
  firestore: FirestoreSettings;
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function integer(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${key} must be an integer, got "${raw}"`);
  }
  return value;
}

function flag(env: NodeJS.ProcessEnv, key: string): boolean {
  const raw = env[key]?.trim().toLowerCase();
  return raw === 'true' || raw === '1';
}

function recordStoreKind(env: NodeJS.ProcessEnv): RecordStoreKind {
  const raw = env.RECORD_STORE?.trim() || 'firestore';
  if (raw !== 'firestore' && raw !== 'memory') {
    throw new InvalidArgumentError(`RECORD_STORE must be "firestore" or "memory", got "${raw}"`);
  }
  return raw;
}

/**
 * Reads service settings from the environment.
 * Unset variables take their defaults; set but invalid ones throw InvalidArgumentError.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    port: positiveInt(env, 'PORT', 4000),
    recordStore: recordStoreKind(env),
    vectorDimensions: positiveInt(env, 'VECTOR_DIMENSIONS', 128),
    vectorSalt: env.VECTOR_SALT || 'catalog-v1',
    recentInteractionLimit: positiveInt(env, 'RECENT_INTERACTION_LIMIT', 3),
    defaultTopN: positiveInt(env, 'DEFAULT_TOP_N', 5),
    segmentCount: positiveInt(env, 'SEGMENT_COUNT', 4),
    segmentSeed: integer(env, 'SEGMENT_SEED', 42),
    segmentMaxIterations: positiveInt(env, 'SEGMENT_MAX_ITERATIONS', 100),
    seedSampleData: flag(env, 'SEED_SAMPLE_DATA'),
    firestore: {
      projectId: env.GCLOUD_PROJECT || env.GOOGLE_CLOUD_PROJECT || null,
      serviceAccountPath: env.FIREBASE_SERVICE_ACCOUNT_PATH || 'secrets/serviceAccountKey.json',
    },
  };
}

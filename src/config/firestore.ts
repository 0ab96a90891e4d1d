import * as admin from 'firebase-admin';
import * as fs from 'fs';
import * as path from 'path';

export interface FirestoreSettings {
  projectId: string | null;
  serviceAccountPath: string;
}

function resolveCredential(serviceAccountPath: string): admin.credential.Credential {
  const keyFile = path.resolve(serviceAccountPath);
  if (fs.existsSync(keyFile)) {
    const serviceAccount: admin.ServiceAccount = JSON.parse(fs.readFileSync(keyFile, 'utf8'));
    console.log('[Firestore] Using service account key file', { keyFile });
    return admin.credential.cert(serviceAccount);
  }

  console.log(
    process.env.GOOGLE_APPLICATION_CREDENTIALS
      ? '[Firestore] Using GOOGLE_APPLICATION_CREDENTIALS'
      : '[Firestore] Using applicationDefault (may require setup)'
  );
  return admin.credential.applicationDefault();
}

/**
 * Initializes the default firebase-admin app once and returns its Firestore client.
 */
export function connectFirestore(settings: FirestoreSettings): admin.firestore.Firestore {
  if (!admin.apps.length) {
    admin.initializeApp({
      credential: resolveCredential(settings.serviceAccountPath),
      projectId: settings.projectId ?? undefined,
    });
  }
  return admin.firestore();
}

/**
 * Document data as plain JSON: Timestamps and Dates become ISO strings.
 */
export function firestoreToJSON(data: unknown): unknown {
  if (data instanceof admin.firestore.Timestamp) {
    return data.toDate().toISOString();
  }
  if (data instanceof Date) {
    return data.toISOString();
  }
  if (Array.isArray(data)) {
    return data.map(firestoreToJSON);
  }
  if (typeof data === 'object' && data !== null) {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]) => [key, firestoreToJSON(value)])
    );
  }
  return data;
}

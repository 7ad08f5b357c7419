import * as admin from 'firebase-admin';
import * as path from 'path';
import * as fs from 'fs';

let firestoreInstance: admin.firestore.Firestore | null = null;

function initializeAdmin(): void {
  if (admin.apps.length) {
    return;
  }

  const projectId = process.env.GCLOUD_PROJECT || process.env.GOOGLE_CLOUD_PROJECT || undefined;

  // Try to use service account key file if available
  const serviceAccountPath =
    process.env.FIREBASE_SERVICE_ACCOUNT_PATH || path.join(__dirname, '../../secrets/serviceAccountKey.json');
  let credential: admin.credential.Credential;

  if (fs.existsSync(serviceAccountPath)) {
    credential = admin.credential.cert(serviceAccountPath);
    console.log('[Firestore] Using service account key file');
  } else if (process.env.GOOGLE_APPLICATION_CREDENTIALS) {
    credential = admin.credential.applicationDefault();
    console.log('[Firestore] Using GOOGLE_APPLICATION_CREDENTIALS');
  } else {
    // Fallback to applicationDefault (may fail if not configured)
    credential = admin.credential.applicationDefault();
    console.log('[Firestore] Using applicationDefault (may require setup)');
  }

  admin.initializeApp({ credential, projectId });
}

/**
 * Firestore client, initialised on first use so processes that never touch
 * Firestore need no credentials.
 */
export function getFirestore(): admin.firestore.Firestore {
  if (!firestoreInstance) {
    initializeAdmin();
    firestoreInstance = admin.firestore();
  }
  return firestoreInstance;
}

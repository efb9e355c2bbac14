/**
 * Centralized Firebase Admin Configuration
 * Initializes the Admin SDK once and hands out the Firestore and Storage handles
 */

import { existsSync } from 'fs';
import { applicationDefault, cert, getApps, initializeApp, type App } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';
import { getStorage, type Storage } from 'firebase-admin/storage';
import { ConfigurationError } from '../utils/errors.js';

export type StorageBucket = ReturnType<Storage['bucket']>;

export interface FirebaseSettings {
  serviceAccountPath?: string;
  storageBucket: string;
}

export interface FirebaseHandles {
  app: App;
  firestore: Firestore;
  bucket: StorageBucket;
}

let handles: FirebaseHandles | null = null;

const createApp = (settings: FirebaseSettings): App => {
  const existing = getApps();
  if (existing.length > 0) {
    return existing[0];
  }

  if (settings.serviceAccountPath) {
    if (!existsSync(settings.serviceAccountPath)) {
      throw new ConfigurationError(`Service account file not found: ${settings.serviceAccountPath}`);
    }
    return initializeApp({
      credential: cert(settings.serviceAccountPath),
      storageBucket: settings.storageBucket
    });
  }

  // GOOGLE_APPLICATION_CREDENTIALS or the metadata server
  return initializeApp({
    credential: applicationDefault(),
    storageBucket: settings.storageBucket
  });
};

/**
 * Initialize Firebase Admin SDK (idempotent)
 */
export const initializeFirebase = (settings: FirebaseSettings): FirebaseHandles => {
  if (handles) {
    return handles;
  }

  try {
    const app = createApp(settings);
    const firestore = getFirestore(app);
    firestore.settings({ ignoreUndefinedProperties: true });
    handles = {
      app,
      firestore,
      bucket: getStorage(app).bucket(settings.storageBucket)
    };
    console.log(`✅ [FIREBASE] Initialized (bucket: ${settings.storageBucket})`);
    return handles;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(
      `Firebase Admin initialization failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
};

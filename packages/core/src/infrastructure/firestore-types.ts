import type { Firestore, DocumentReference } from '@google-cloud/firestore';

/**
 * Where a repository keeps its collections.
 * - For the default layout: pass `db` (Firestore)
 * - For an isolated area (e.g. one per deployment): pass `db.collection('deployments').doc(id)`
 * Both have a `.collection()` method.
 */
export type FirestoreBase = Firestore | DocumentReference;

/**
 * Extracts the root Firestore client from a FirestoreBase.
 * Needed for operations like `recursiveDelete()` that only exist on Firestore.
 */
export function getFirestoreClient(base: FirestoreBase): Firestore {
  if ('recursiveDelete' in base) {
    return base;
  }
  return base.firestore;
}

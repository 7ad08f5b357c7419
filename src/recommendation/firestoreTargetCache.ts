import { KeyValueCache } from './targetCache';

// The slice of the Firestore client the cache uses; admin.firestore() satisfies it.
export interface DocumentStore {
  collection(path: string): {
    doc(id: string): {
      get(): Promise<{ exists: boolean; data(): Record<string, unknown> | undefined }>;
      set(data: Record<string, unknown>): Promise<unknown>;
      delete(): Promise<unknown>;
    };
  };
}

/**
 * Stores each cache entry as a document { value, updatedAt } keyed by the URI-encoded
 * cache key.
 */
export class FirestoreKeyValueCache implements KeyValueCache {
  constructor(
    private readonly store: DocumentStore,
    private readonly collectionName: string
  ) {}

  // document ids may not contain '/', and user ids end up in the key
  private doc(key: string) {
    return this.store.collection(this.collectionName).doc(encodeURIComponent(key));
  }

  async get(key: string): Promise<string | null> {
    const snapshot = await this.doc(key).get();
    if (!snapshot.exists) {
      return null;
    }
    const value = snapshot.data()?.value;
    return typeof value === 'string' ? value : null;
  }

  async set(key: string, value: string): Promise<void> {
    await this.doc(key).set({ value, updatedAt: new Date().toISOString() });
  }

  async delete(key: string): Promise<void> {
    await this.doc(key).delete();
  }
}

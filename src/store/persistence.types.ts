/**
 * PersistenceStore port
 * Opaque blob storage; the data store owns the encoding.
 */

export interface PersistenceStore {
  loadState(): Promise<string | undefined>;
  saveState(blob: string): Promise<void>;
}

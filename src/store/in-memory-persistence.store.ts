import type { PersistenceStore } from './persistence.types.js';

export class InMemoryPersistenceStore implements PersistenceStore {
  private blob: string | undefined;
  saveCount = 0;

  constructor(initial?: string) {
    this.blob = initial;
  }

  async loadState(): Promise<string | undefined> {
    return this.blob;
  }

  async saveState(blob: string): Promise<void> {
    this.blob = blob;
    this.saveCount++;
  }

  get current(): string | undefined {
    return this.blob;
  }
}

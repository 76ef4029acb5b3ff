import { Injectable } from '@nestjs/common';
import { LoadedDataset } from '../dataset/loaded-dataset';

/**
 * Maps session ids to the dataset that produced them. Datasets themselves are
 * read-only; only this table changes (insert on load, bulk clear on reset).
 */
@Injectable()
export class DatasetStore {
  private readonly bySession = new Map<string, LoadedDataset>();

  /** Registers every session of the dataset; later loads win. Returns the ids. */
  insert(dataset: LoadedDataset): string[] {
    const sessionIds = dataset.getAllSessions();
    for (const sessionId of sessionIds) {
      this.bySession.set(sessionId, dataset);
    }
    return sessionIds;
  }

  get(sessionId: string): LoadedDataset | undefined {
    return this.bySession.get(sessionId);
  }

  sessionIds(): string[] {
    return [...this.bySession.keys()];
  }

  list(): Array<[string, LoadedDataset]> {
    return [...this.bySession.entries()];
  }

  /** Distinct datasets, in the order their first session was registered. */
  datasets(): LoadedDataset[] {
    return [...new Set(this.bySession.values())];
  }

  first(): LoadedDataset | undefined {
    return this.datasets()[0];
  }

  get size(): number {
    return this.bySession.size;
  }

  clear(): void {
    this.bySession.clear();
  }
}

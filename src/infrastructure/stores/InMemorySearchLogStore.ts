import { SearchEntry } from '../../domain/models.js';
import { ISearchLogStore } from './ISearchLogStore.js';

export class InMemorySearchLogStore implements ISearchLogStore {
  private entries: Map<string, SearchEntry[]> = new Map(); // userId -> searches

  async recordSearch(entry: SearchEntry): Promise<SearchEntry> {
    const history = this.entries.get(entry.userId) ?? [];
    history.push({ ...entry });
    this.entries.set(entry.userId, history);
    return { ...entry };
  }

  async listSearchesByUser(userId: string): Promise<SearchEntry[]> {
    return (this.entries.get(userId) ?? []).map((entry) => ({ ...entry }));
  }

  // Utility methods for testing
  getSearchCount(): number {
    let count = 0;
    for (const history of this.entries.values()) count += history.length;
    return count;
  }
}

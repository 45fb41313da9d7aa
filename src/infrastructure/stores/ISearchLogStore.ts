import { SearchEntry } from '../../domain/models.js';

export interface ISearchLogStore {
  recordSearch(entry: SearchEntry): Promise<SearchEntry>;
  listSearchesByUser(userId: string): Promise<SearchEntry[]>;
}

import type { SearchHit } from "../workers/types.js";

/** Web search backend. Failures throw SearchError. */
export interface SearchClient {
  readonly name: string;
  search(term: string, maxResults: number): Promise<SearchHit[]>;
}

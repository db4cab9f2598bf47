import type { SearchHit } from '../api/types.js';
import type { Message } from './types.js';

type FilterOptions = {
  authorId: string;
  skipPinned: boolean;
  skipMarked: boolean;
  markerText: string;
};

type FilteredPage = {
  /** Every entry flagged as a search hit, whatever its author. */
  hits: SearchHit[];
  /** Hits authored by the current user; they all count toward cursor progress. */
  authoredHits: Message[];
  /** Authored hits that pass the pinned/marked filters. */
  eligible: Message[];
};

function toMessage(hit: SearchHit, authorId: string): Message {
  return {
    id: hit.id,
    authorId,
    content: hit.content,
    pinned: hit.pinned,
    createdAt: hit.createdAt,
  };
}

export function filterPage(
  groups: ReadonlyArray<ReadonlyArray<SearchHit>>,
  options: FilterOptions,
): FilteredPage {
  const hits: SearchHit[] = [];
  const authoredHits: Message[] = [];
  const eligible: Message[] = [];

  for (const group of groups) {
    for (const entry of group) {
      if (!entry.hit) {
        continue;
      }
      hits.push(entry);

      if (entry.authorId !== options.authorId) {
        continue;
      }

      const message = toMessage(entry, options.authorId);
      authoredHits.push(message);

      if (options.skipPinned && message.pinned) {
        continue;
      }
      if (options.skipMarked && message.content === options.markerText) {
        continue;
      }

      eligible.push(message);
    }
  }

  return { hits, authoredHits, eligible };
}

export type { FilterOptions, FilteredPage };

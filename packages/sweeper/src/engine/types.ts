type TargetKind = 'guild' | 'direct' | 'group';

type Target = {
  readonly kind: TargetKind;
  /** Guild id, or `@me` for direct and group conversations. */
  readonly containerId: string;
  readonly channelId: string;
  readonly displayName: string;
  readonly enabled: boolean;
};

type Message = {
  id: string;
  authorId: string;
  content: string;
  pinned: boolean;
  createdAt: string;
};

type CursorState = {
  /** Exclusive upper bound for the next search; `null` starts from the newest message. */
  maxId: bigint | null;
  offset: number;
  emptyPageCount: number;
};

type ActionOutcome =
  | 'completed'
  | 'already-gone'
  | 'skipped'
  | 'transient-failure'
  | 'permanent-failure';

type TerminalOutcome = Exclude<ActionOutcome, 'transient-failure'>;

type ActionMode = 'delete-only' | 'mark-and-delete' | 'mark-only';

type EngineSettings = {
  searchDelayMs: number;
  deleteDelayMs: number;
  transientRetryDelayMs: number;
  skipPinned: boolean;
  skipMarked: boolean;
  maxRetries: number;
  mode: ActionMode;
  markerText: string;
  dryRun: boolean;
};

type ExhaustionReason = 'empty-pages' | 'search-failed' | 'cancelled';

type PageResult =
  | {
      kind: 'page';
      messages: Message[];
      totalResults: number;
      cursor: CursorState;
    }
  | {
      kind: 'exhausted';
      reason: ExhaustionReason;
      cursor: CursorState;
    };

type BatchSummary = {
  marked: number;
  deleted: number;
  skipped: number;
};

type BatchResult = {
  oldestProcessedId: bigint | null;
  processed: number;
  summary: BatchSummary;
};

export type {
  TargetKind,
  Target,
  Message,
  CursorState,
  ActionOutcome,
  TerminalOutcome,
  ActionMode,
  EngineSettings,
  ExhaustionReason,
  PageResult,
  BatchSummary,
  BatchResult,
};

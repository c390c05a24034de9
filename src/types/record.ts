import type { MarketQuote } from './market.js';
import type { GamePicks } from './pick.js';
import type { SlateEntry } from './slate.js';

/** Slate entry joined with its optional quote and derived picks. Upserted by key. */
export interface PredictionRecord {
  key: string;
  slate: SlateEntry;
  market: MarketQuote | null;
  picks: GamePicks | null;
  notes: string;
  sources: string;
}

export type FieldValue = string | number | null;
export type RecordFields = Record<string, FieldValue>;

export type UpsertStatus = 'created' | 'updated';

export interface UpsertOutcome {
  key: string;
  status: UpsertStatus;
  id: string;
}

/** Keyed destination for prediction records. */
export interface RecordStore {
  /** Field names the destination schema recognizes. */
  knownFields(): Promise<ReadonlySet<string>>;
  findIdByKey(key: string): Promise<string | null>;
  create(fields: RecordFields): Promise<string>;
  update(id: string, fields: RecordFields): Promise<void>;
}

export type { RawGameDescriptor, SlateEntry, ScheduleProvider } from './slate.js';
export type { MarketQuote, OddsRowSkipReason, SkippedOddsRow } from './market.js';
export type { MoneylineSide, TotalSide, RunLineSide, Pick, GamePicks } from './pick.js';
export type {
  PredictionRecord,
  FieldValue,
  RecordFields,
  UpsertStatus,
  UpsertOutcome,
  RecordStore,
} from './record.js';

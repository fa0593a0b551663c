import type { ColumnType } from 'kysely';

export type Json = ColumnType<string, string, string>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type Generated<T> =
  T extends ColumnType<infer S, infer I, infer U> ? ColumnType<S, I | undefined, U> : ColumnType<T, T | undefined, T>;

export interface ListingStatus {
  symbol: string;
  name: string | null;
  exchange: string | null;
  asset_type: string | null;
  ipo_date: string | null;
  delisting_date: string | null;
  status: Generated<string>;
  updated_at: Generated<Timestamp>;
}

export interface EtlWatermarks {
  target: string;
  symbol: string;
  exchange: string | null;
  asset_type: string | null;
  status: Generated<string>;
  delisting_date: string | null;
  eligibility: Generated<'ELIGIBLE' | 'INELIGIBLE' | 'DELISTED'>;
  first_observed_date: string | null;
  last_observed_date: string | null;
  last_success_at: Timestamp | null;
  consecutive_failures: Generated<number>;
  last_error: string | null;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface EtlRunHistory {
  id: Generated<number>;
  run_id: string;
  target: string;
  status: string;
  summary: Json;
  started_at: Timestamp | null;
  finished_at: Timestamp | null;
  created_at: Generated<Timestamp>;
}

export interface Database {
  listing_status: ListingStatus;
  etl_watermarks: EtlWatermarks;
  etl_run_history: EtlRunHistory;
}

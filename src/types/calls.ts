export type CallDirection = 'inbound' | 'outbound';

export interface DetailRecord {
  readonly callId: string;
  readonly direction: CallDirection;
  readonly number: string;
  readonly duration: number;
  readonly switchCode: string;
}

export interface MasterRecord {
  readonly name: string;
  readonly account: string;
  readonly calls: number;
  readonly minutes: number;
  readonly details: readonly DetailRecord[];
}

/**
 * Ordered master records. A loaded dataset ends with exactly one orphan
 * bucket (see `injectOrphans`).
 */
export type Dataset = readonly MasterRecord[];

// Row shapes handed to the grid renderer
export interface DetailRow {
  callId: string;
  direction: CallDirection;
  number: string;
  duration: number;
  switchCode: string;
}

export interface MasterRow {
  name: string;
  account: string;
  calls: number;
  minutes: number;
  callRecords: DetailRow[];
}

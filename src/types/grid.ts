import type { DetailRow, MasterRow } from './calls';

export type ValueFormatter = (value: number) => string;

export interface ColumnFlags {
  checkboxSelection?: boolean;
  groupCell?: boolean;
  sortable?: boolean;
  minWidth?: number;
}

export interface ColumnSpec<TRow> {
  field: keyof TRow & string;
  formatter?: ValueFormatter;
  flags: ColumnFlags;
}

export interface GridOptions {
  rowSelection: 'single' | 'multiple';
  suppressRowClickSelection: boolean;
  pagination: boolean;
}

export type DetailAccessor = (row: MasterRow) => readonly DetailRow[];

export interface GridConfig {
  masterDetail: true;
  masterColumns: readonly ColumnSpec<MasterRow>[];
  detailColumns: readonly ColumnSpec<DetailRow>[];
  masterOptions: GridOptions;
  detailOptions: GridOptions;
  rows: readonly MasterRow[];
  detailAccessor: DetailAccessor;
}

export interface SelectionResult {
  masterRowIds: string[];
  detailRowIds: string[];
}

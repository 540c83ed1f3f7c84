import type {
  ColumnSpec,
  Dataset,
  DetailAccessor,
  DetailRecord,
  DetailRow,
  GridConfig,
  GridOptions,
  MasterRecord,
  MasterRow,
} from '../types';
import { FORMATTERS, formatterName } from './formatters';

export const MASTER_COLUMNS: readonly ColumnSpec<MasterRow>[] = [
  { field: 'name', flags: { groupCell: true, checkboxSelection: true } },
  { field: 'account', flags: {} },
  { field: 'calls', flags: {} },
  { field: 'minutes', formatter: FORMATTERS.minutes, flags: {} },
];

export const DETAIL_COLUMNS: readonly ColumnSpec<DetailRow>[] = [
  { field: 'callId', flags: { checkboxSelection: true, sortable: true } },
  { field: 'direction', flags: { sortable: true } },
  { field: 'number', flags: { sortable: true, minWidth: 150 } },
  { field: 'duration', formatter: FORMATTERS.duration, flags: { sortable: true } },
  { field: 'switchCode', flags: { sortable: true, minWidth: 150 } },
];

// No column flex or range selection: the table renderer has neither
export const MASTER_OPTIONS: GridOptions = {
  rowSelection: 'single',
  suppressRowClickSelection: false,
  pagination: false,
};

export const DETAIL_OPTIONS: GridOptions = {
  rowSelection: 'multiple',
  suppressRowClickSelection: true,
  pagination: true,
};

export const DEFAULT_DETAIL_PAGE_SIZE = 10;

// Anything but a positive integer falls back to the default
export function parsePageSize(value: string | undefined, fallback = DEFAULT_DETAIL_PAGE_SIZE): number {
  const size = Number(value?.trim());
  return Number.isInteger(size) && size > 0 ? size : fallback;
}

// Called lazily by the renderer when a master row is expanded
export const getDetailRowData: DetailAccessor = (row) => row.callRecords;

function toDetailRow(detail: DetailRecord): DetailRow {
  return {
    callId: detail.callId,
    direction: detail.direction,
    number: detail.number,
    duration: detail.duration,
    switchCode: detail.switchCode,
  };
}

export function toMasterRow(record: MasterRecord): MasterRow {
  return {
    name: record.name,
    account: record.account,
    calls: record.calls,
    minutes: record.minutes,
    callRecords: record.details.map(toDetailRow),
  };
}

/**
 * Maps a loaded dataset to the master-detail grid configuration. Columns,
 * formatters and options are fixed; only `rows` depends on the input.
 */
export function buildConfig(dataset: Dataset): GridConfig {
  return {
    masterDetail: true,
    masterColumns: MASTER_COLUMNS,
    detailColumns: DETAIL_COLUMNS,
    masterOptions: MASTER_OPTIONS,
    detailOptions: DETAIL_OPTIONS,
    rows: dataset.map(toMasterRow),
    detailAccessor: getDetailRowData,
  };
}

function describeColumn<TRow>(column: ColumnSpec<TRow>) {
  return {
    field: column.field,
    ...(column.formatter ? { formatter: formatterName(column.formatter) ?? 'custom' } : {}),
    ...column.flags,
  };
}

/**
 * JSON view of a config. Functions are replaced by their names so the
 * output is stable across builds.
 */
export function serializeConfig(config: GridConfig, space = 2): string {
  return JSON.stringify(
    {
      masterDetail: config.masterDetail,
      masterOptions: config.masterOptions,
      columnDefs: config.masterColumns.map(describeColumn),
      detailOptions: config.detailOptions,
      detailColumnDefs: config.detailColumns.map(describeColumn),
      detailAccessor: config.detailAccessor === getDetailRowData ? 'callRecords' : 'custom',
      rowData: config.rows,
    },
    null,
    space
  );
}

import { describe, it, expect } from 'vitest';
import { buildConfig, parsePageSize, serializeConfig, toMasterRow } from './gridConfig';
import { FORMATTERS } from './formatters';
import { injectOrphans, ORPHAN_MASTER } from './orphans';
import { makeMaster } from '../test/fixtures';

const dataset = injectOrphans([
  makeMaster({ name: 'A', minutes: 1234 }),
  makeMaster({ name: 'B', details: [] }),
]);

describe('buildConfig', () => {
  it('should define the master columns in order', () => {
    const config = buildConfig(dataset);

    expect(config.masterDetail).toBe(true);
    expect(config.masterColumns.map((c) => c.field)).toEqual(['name', 'account', 'calls', 'minutes']);
    expect(config.masterColumns[0].flags).toEqual({ groupCell: true, checkboxSelection: true });
    expect(config.masterColumns[3].formatter).toBe(FORMATTERS.minutes);
  });

  it('should define the detail columns in order', () => {
    const config = buildConfig(dataset);

    expect(config.detailColumns.map((c) => c.field)).toEqual([
      'callId',
      'direction',
      'number',
      'duration',
      'switchCode',
    ]);
    expect(config.detailColumns[0].flags.checkboxSelection).toBe(true);
    expect(config.detailColumns[2].flags.minWidth).toBe(150);
    expect(config.detailColumns[3].formatter).toBe(FORMATTERS.duration);
    expect(config.detailColumns[4].flags.minWidth).toBe(150);
    expect(config.detailColumns.every((c) => c.flags.sortable)).toBe(true);
  });

  it('should apply the column formatters', () => {
    const config = buildConfig(dataset);

    expect(config.masterColumns[3].formatter?.(1234)).toBe('1,234m');
    expect(config.detailColumns[3].formatter?.(5000)).toBe('5,000s');
  });

  it('should serialize every master with its call records, orphan bucket last', () => {
    const config = buildConfig(dataset);

    expect(config.rows).toHaveLength(3);
    expect(config.rows[0]).toEqual({
      name: 'A',
      account: '100',
      calls: 1,
      minutes: 1234,
      callRecords: [{ callId: 'c-1', direction: 'inbound', number: '555-0100', duration: 30, switchCode: 'SW1' }],
    });
    expect(config.rows[2]).toEqual(toMasterRow(ORPHAN_MASTER));
    expect(config.rows[2].name).toBe('Orphaned Record');
  });

  it('should return a row\'s call records verbatim from the accessor', () => {
    const config = buildConfig(dataset);
    const row = config.rows[0];

    expect(config.detailAccessor(row)).toBe(row.callRecords);
    expect(config.detailAccessor(config.rows[1])).toEqual([]);
  });

  it('should carry the grid options', () => {
    const config = buildConfig(dataset);

    expect(config.masterOptions).toEqual({
      rowSelection: 'single',
      suppressRowClickSelection: false,
      pagination: false,
    });
    expect(config.detailOptions).toEqual({
      rowSelection: 'multiple',
      suppressRowClickSelection: true,
      pagination: true,
    });
  });

  it('should be deterministic', () => {
    expect(serializeConfig(buildConfig(dataset))).toBe(serializeConfig(buildConfig(dataset)));
  });

  it('should not share row objects between builds', () => {
    const first = buildConfig(dataset);
    const second = buildConfig(dataset);

    expect(first.rows[0]).not.toBe(second.rows[0]);
    expect(first.rows).toEqual(second.rows);
  });
});

describe('serializeConfig', () => {
  it('should replace functions with their names', () => {
    const parsed = JSON.parse(serializeConfig(buildConfig(dataset)));

    expect(parsed.columnDefs[3]).toEqual({ field: 'minutes', formatter: 'minutes' });
    expect(parsed.columnDefs[0]).toEqual({ field: 'name', groupCell: true, checkboxSelection: true });
    expect(parsed.detailColumnDefs[2]).toEqual({ field: 'number', sortable: true, minWidth: 150 });
    expect(parsed.detailColumnDefs[3]).toEqual({ field: 'duration', formatter: 'duration', sortable: true });
    expect(parsed.detailAccessor).toBe('callRecords');
    expect(parsed.rowData).toHaveLength(3);
  });

  it('should honour the indentation argument', () => {
    const compact = serializeConfig(buildConfig([]), 0);

    expect(compact.startsWith('{"masterDetail":true,"masterOptions":{"rowSelection":"single"')).toBe(true);
  });
});

describe('parsePageSize', () => {
  it('should accept a positive integer', () => {
    expect(parsePageSize('25')).toBe(25);
    expect(parsePageSize(' 7 ')).toBe(7);
  });

  it.each([undefined, '', '0', '-5', '2.5', 'abc'])('should fall back to 10 for %j', (value) => {
    expect(parsePageSize(value)).toBe(10);
  });

  it('should use the given fallback', () => {
    expect(parsePageSize('-1', 20)).toBe(20);
  });
});

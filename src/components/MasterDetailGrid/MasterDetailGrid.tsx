import React, { memo, useCallback, useEffect, useMemo, useState } from 'react';
import {
  useReactTable,
  getCoreRowModel,
  flexRender,
  functionalUpdate,
  type ExpandedState,
  type RowSelectionState,
  type Updater,
} from '@tanstack/react-table';
import type { GridConfig, SelectionResult } from '../../types';
import { toColumnDefs, columnStyle } from './columns';
import { DetailGrid } from './DetailGrid';
import { DEFAULT_DETAIL_PAGE_SIZE } from '../../utils/gridConfig';

function selectedIds(selection: RowSelectionState): string[] {
  return Object.keys(selection).filter((id) => selection[id]);
}

interface MasterDetailGridProps {
  config: GridConfig;
  detailPageSize?: number;
  onSelectionChange?: (selection: SelectionResult) => void;
}

/**
 * Renders a master grid whose rows expand into a detail grid. Detail rows
 * are pulled through `config.detailAccessor` only when a row is expanded.
 */
export const MasterDetailGrid = memo<MasterDetailGridProps>(({
  config,
  detailPageSize = DEFAULT_DETAIL_PAGE_SIZE,
  onSelectionChange,
}) => {
  const [rowSelection, setRowSelection] = useState<RowSelectionState>({});
  const [expanded, setExpanded] = useState<ExpandedState>({});
  const [detailSelection, setDetailSelection] = useState<Record<string, RowSelectionState>>({});

  const data = useMemo(() => [...config.rows], [config.rows]);
  const columns = useMemo(() => toColumnDefs(config.masterColumns), [config.masterColumns]);

  const table = useReactTable({
    data,
    columns,
    state: {
      rowSelection,
      expanded,
    },
    getRowId: (_row, index) => String(index),
    getRowCanExpand: () => config.masterDetail,
    enableRowSelection: true,
    enableMultiRowSelection: config.masterOptions.rowSelection === 'multiple',
    onRowSelectionChange: setRowSelection,
    onExpandedChange: setExpanded,
    getCoreRowModel: getCoreRowModel(),
  });

  const handleDetailSelection = useCallback((masterId: string, updater: Updater<RowSelectionState>) => {
    setDetailSelection(prev => ({
      ...prev,
      [masterId]: functionalUpdate(updater, prev[masterId] ?? {}),
    }));
  }, []);

  // Report selection changes
  useEffect(() => {
    onSelectionChange?.({
      masterRowIds: selectedIds(rowSelection),
      detailRowIds: Object.values(detailSelection).flatMap(selectedIds),
    });
  }, [rowSelection, detailSelection, onSelectionChange]);

  if (data.length === 0) {
    return (
      <div className="text-center py-8 text-gray-500">
        No data available
      </div>
    );
  }

  return (
    <div className="w-full">
      <div className="rounded-md border overflow-hidden">
        <div className="overflow-x-auto max-w-full">
          <table className="w-full text-sm min-w-full">
            <thead className="border-b bg-gray-50">
              {table.getHeaderGroups().map((headerGroup) => (
                <tr key={headerGroup.id}>
                  {headerGroup.headers.map((header) => (
                    <th
                      key={header.id}
                      className="text-left font-medium text-gray-700 px-2 py-1"
                      style={columnStyle(config.masterColumns, header.column.id)}
                    >
                      {header.isPlaceholder
                        ? null
                        : flexRender(header.column.columnDef.header, header.getContext())}
                    </th>
                  ))}
                </tr>
              ))}
            </thead>
            <tbody className="divide-y divide-gray-200 bg-white">
              {table.getRowModel().rows.map((row) => (
                <React.Fragment key={row.id}>
                  <tr
                    data-row-id={row.id}
                    className={row.getIsSelected() ? 'bg-blue-50' : ''}
                    onClick={config.masterOptions.suppressRowClickSelection ? undefined : row.getToggleSelectedHandler()}
                  >
                    {row.getVisibleCells().map((cell) => (
                      <td key={cell.id} className="text-sm p-0" style={columnStyle(config.masterColumns, cell.column.id)}>
                        {flexRender(cell.column.columnDef.cell, cell.getContext())}
                      </td>
                    ))}
                  </tr>
                  {row.getIsExpanded() && (
                    <tr>
                      <td colSpan={row.getVisibleCells().length} className="p-0">
                        <DetailGrid
                          masterId={row.id}
                          rows={config.detailAccessor(row.original)}
                          columns={config.detailColumns}
                          options={config.detailOptions}
                          pageSize={detailPageSize}
                          rowSelection={detailSelection[row.id] ?? {}}
                          onRowSelectionChange={(updater) => handleDetailSelection(row.id, updater)}
                        />
                      </td>
                    </tr>
                  )}
                </React.Fragment>
              ))}
            </tbody>
          </table>
        </div>
      </div>
    </div>
  );
});

MasterDetailGrid.displayName = 'MasterDetailGrid';

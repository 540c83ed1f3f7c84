import { memo, useMemo, useState } from 'react';
import {
  useReactTable,
  getCoreRowModel,
  getPaginationRowModel,
  getSortedRowModel,
  flexRender,
  type OnChangeFn,
  type RowSelectionState,
  type SortingState,
} from '@tanstack/react-table';
import { ArrowDown, ArrowUp } from 'lucide-react';
import type { ColumnSpec, DetailRow, GridOptions } from '../../types';
import { toColumnDefs, columnStyle } from './columns';

// Positional, since callId is not guaranteed unique within a master
export function detailRowId(masterId: string, index: number): string {
  return `${masterId}.${index}`;
}

interface DetailGridProps {
  masterId: string;
  rows: readonly DetailRow[];
  columns: readonly ColumnSpec<DetailRow>[];
  options: GridOptions;
  pageSize: number;
  rowSelection: RowSelectionState;
  onRowSelectionChange: OnChangeFn<RowSelectionState>;
}

export const DetailGrid = memo<DetailGridProps>(({
  masterId,
  rows,
  columns,
  options,
  pageSize,
  rowSelection,
  onRowSelectionChange,
}) => {
  const [sorting, setSorting] = useState<SortingState>([]);
  const data = useMemo(() => [...rows], [rows]);
  const columnDefs = useMemo(() => toColumnDefs(columns), [columns]);

  const table = useReactTable({
    data,
    columns: columnDefs,
    state: {
      sorting,
      rowSelection,
    },
    initialState: {
      pagination: { pageIndex: 0, pageSize },
    },
    getRowId: (_row, index) => detailRowId(masterId, index),
    enableRowSelection: true,
    enableMultiRowSelection: options.rowSelection === 'multiple',
    onSortingChange: setSorting,
    onRowSelectionChange,
    getCoreRowModel: getCoreRowModel(),
    getSortedRowModel: getSortedRowModel(),
    ...(options.pagination ? { getPaginationRowModel: getPaginationRowModel() } : {}),
  });

  if (data.length === 0) {
    return (
      <div className="text-center py-4 text-gray-500">
        No call records
      </div>
    );
  }

  return (
    <div className="pl-8 pr-2 py-2 bg-gray-50" data-testid={`detail-grid-${masterId}`}>
      <table className="w-full text-sm border rounded-md bg-white">
        <thead className="border-b bg-gray-50">
          {table.getHeaderGroups().map((headerGroup) => (
            <tr key={headerGroup.id}>
              {headerGroup.headers.map((header) => {
                const sorted = header.column.getIsSorted();
                return (
                  <th
                    key={header.id}
                    className="text-left font-medium text-gray-700 px-2 py-1"
                    style={columnStyle(columns, header.column.id)}
                    aria-sort={sorted === 'asc' ? 'ascending' : sorted === 'desc' ? 'descending' : 'none'}
                  >
                    {header.column.getCanSort() ? (
                      <button
                        type="button"
                        className="flex items-center gap-1 select-none"
                        onClick={header.column.getToggleSortingHandler()}
                      >
                        {flexRender(header.column.columnDef.header, header.getContext())}
                        {sorted === 'asc' && <ArrowUp className="w-3 h-3" />}
                        {sorted === 'desc' && <ArrowDown className="w-3 h-3" />}
                      </button>
                    ) : (
                      flexRender(header.column.columnDef.header, header.getContext())
                    )}
                  </th>
                );
              })}
            </tr>
          ))}
        </thead>
        <tbody className="divide-y divide-gray-200">
          {table.getRowModel().rows.map((row) => (
            <tr
              key={row.id}
              data-row-id={row.id}
              className={row.getIsSelected() ? 'bg-blue-50' : ''}
              onClick={options.suppressRowClickSelection ? undefined : row.getToggleSelectedHandler()}
            >
              {row.getVisibleCells().map((cell) => (
                <td key={cell.id} className="p-0" style={columnStyle(columns, cell.column.id)}>
                  {flexRender(cell.column.columnDef.cell, cell.getContext())}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>

      {options.pagination && table.getPageCount() > 1 && (
        <div className="flex items-center justify-between px-2 py-2">
          <div className="flex items-center gap-2">
            <button
              className="px-3 py-1 border rounded hover:bg-gray-50 disabled:opacity-50"
              onClick={() => table.previousPage()}
              disabled={!table.getCanPreviousPage()}
            >
              Previous
            </button>
            <button
              className="px-3 py-1 border rounded hover:bg-gray-50 disabled:opacity-50"
              onClick={() => table.nextPage()}
              disabled={!table.getCanNextPage()}
            >
              Next
            </button>
          </div>
          <span className="text-sm text-gray-700">
            Page {table.getState().pagination.pageIndex + 1} of{' '}
            {table.getPageCount()}
          </span>
        </div>
      )}
    </div>
  );
});

DetailGrid.displayName = 'DetailGrid';

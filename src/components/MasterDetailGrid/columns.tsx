import React from 'react';
import type { ColumnDef, Row } from '@tanstack/react-table';
import { ChevronDown, ChevronRight } from 'lucide-react';
import type { ColumnSpec } from '../../types';
import { formatCell } from '../../utils/formatters';

function SelectCheckbox<TRow>({ row, label }: { row: Row<TRow>; label: string }) {
  return (
    <input
      type="checkbox"
      aria-label={label}
      checked={row.getIsSelected()}
      disabled={!row.getCanSelect()}
      onChange={row.getToggleSelectedHandler()}
      onClick={(e) => e.stopPropagation()}
      className="cursor-pointer"
    />
  );
}

function ExpandToggle<TRow>({ row }: { row: Row<TRow> }) {
  const expanded = row.getIsExpanded();
  return (
    <button
      type="button"
      aria-label={expanded ? 'Collapse row' : 'Expand row'}
      aria-expanded={expanded}
      onClick={(e) => {
        e.stopPropagation();
        row.toggleExpanded();
      }}
      className="p-0.5 rounded hover:bg-gray-100"
    >
      {expanded ? <ChevronDown className="w-4 h-4" /> : <ChevronRight className="w-4 h-4" />}
    </button>
  );
}

/**
 * Turns declarative column specs into table column definitions. The group
 * cell gets the expand toggle; checkbox columns get a row selector.
 */
export function toColumnDefs<TRow>(specs: readonly ColumnSpec<TRow>[]): ColumnDef<TRow, unknown>[] {
  return specs.map((spec): ColumnDef<TRow, unknown> => ({
    id: spec.field,
    accessorFn: (row: TRow): unknown => row[spec.field],
    header: spec.field,
    enableSorting: spec.flags.sortable ?? false,
    cell: ({ row, getValue }) => {
      const display = formatCell(getValue(), spec.formatter);
      return (
        <div className="flex items-center gap-2 px-2 py-1">
          {spec.flags.groupCell && <ExpandToggle row={row} />}
          {spec.flags.checkboxSelection && <SelectCheckbox row={row} label={`Select ${display}`} />}
          <span className="break-words min-w-0" title={display}>{display}</span>
        </div>
      );
    },
  }));
}

export function columnStyle<TRow>(specs: readonly ColumnSpec<TRow>[], columnId: string): React.CSSProperties {
  const spec = specs.find((candidate) => candidate.field === columnId);
  return spec?.flags.minWidth !== undefined ? { minWidth: spec.flags.minWidth } : {};
}

/**
 * Selection state and the selection output contract.
 *
 * Selection is an ordered list of {@link SelectedRecord}s; every
 * transition returns a new list. {@link buildSelectionOutput} produces the
 * values published on each change: singular fields in single-select mode,
 * plural lists in multi-select mode, never both.
 */
import type { DisplayRecord, FieldRoleConfig, RecordRow, SelectionOutput } from "../../shared/types/lookup.js";
import { shapeRow } from "../display/result-shaper.js";

/** A selected record with the row it was shaped from. */
export interface SelectedRecord extends DisplayRecord {
  original: RecordRow;
}

/** Shape `row` for the selection list. */
export function toSelectedRecord(row: RecordRow, roles: FieldRoleConfig, icon?: string): SelectedRecord {
  return { ...shapeRow(row, roles, { icon }), original: row };
}

/**
 * Add `record` to the selection. Multi-select appends unless the id is
 * already selected; single-select replaces the selection.
 */
export function selectRecord(
  selected: readonly SelectedRecord[],
  record: SelectedRecord,
  multiple: boolean,
): SelectedRecord[] {
  if (!multiple) return [record];
  if (selected.some((r) => r.id === record.id)) return [...selected];
  return [...selected, record];
}

export function removeRecord(selected: readonly SelectedRecord[], id: string): SelectedRecord[] {
  return selected.filter((r) => r.id !== id);
}

export function clearSelection(): SelectedRecord[] {
  return [];
}

/** Ids of the current selection, in order. */
export function selectedIds(selected: readonly SelectedRecord[]): string[] {
  return selected.map((r) => r.id);
}

function toDisplayRecord(record: SelectedRecord): DisplayRecord {
  const { original: _original, ...display } = record;
  return display;
}

/**
 * Build the selection output for the current selection.
 *
 * - single-select: `recordId` and the three text values of the first
 *   selected record (or `""`), plural lists empty;
 * - multi-select: `selectedRecordIds` and `selectedRecords`, singular
 *   fields `""`.
 */
export function buildSelectionOutput(selected: readonly SelectedRecord[], multiple: boolean): SelectionOutput {
  if (multiple) {
    return {
      recordId: "",
      primaryFieldValue: "",
      secondaryFieldValue: "",
      tertiaryFieldValue: "",
      selectedRecordIds: selectedIds(selected),
      selectedRecords: selected.map(toDisplayRecord),
    };
  }

  const first = selected.at(0);
  return {
    recordId: first?.id ?? "",
    primaryFieldValue: first?.primaryText ?? "",
    secondaryFieldValue: first?.secondaryText ?? "",
    tertiaryFieldValue: first?.tertiaryText ?? "",
    selectedRecordIds: [],
    selectedRecords: [],
  };
}

import {
  DEFAULT_SORT,
  ModelFileRecord,
  SelectionSummary,
  SortDirection,
  SortField,
  SortState,
  TableRow,
} from '../types/model-record';

export interface ResultTableOptions {
  sort?: SortState;
  filter?: string;
}

type Comparator = (a: ModelFileRecord, b: ModelFileRecord) => number;

function compareText(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

const COMPARATORS: Record<SortField, Comparator> = {
  name: (a, b) => compareText(a.name, b.name),
  path: (a, b) => compareText(a.path, b.path),
  directory: (a, b) => compareText(a.directory, b.directory),
  extension: (a, b) => compareText(a.extension, b.extension),
  sizeBytes: (a, b) => a.sizeBytes - b.sizeBytes,
  lastAccessTime: (a, b) => a.lastAccessTime.getTime() - b.lastAccessTime.getTime(),
  lastWriteTime: (a, b) => a.lastWriteTime.getTime() - b.lastWriteTime.getTime(),
  creationTime: (a, b) => a.creationTime.getTime() - b.creationTime.getTime(),
};

/**
 * The records of one scan plus the user's view of them: sort, filter and
 * checked rows.
 *
 * Selection is keyed by path and lives for the lifetime of the table, so it
 * survives re-sorting and re-filtering. A new scan means a new table.
 */
export class ResultTable {
  private records: ModelFileRecord[];
  private byPath = new Map<string, ModelFileRecord>();
  private selected = new Set<string>();
  private sort: SortState;
  private filter: string;
  private visibleCache: ModelFileRecord[] | null = null;

  constructor(records: readonly ModelFileRecord[], options: ResultTableOptions = {}) {
    this.records = [];
    for (const record of records) {
      if (this.byPath.has(record.path)) continue;
      this.byPath.set(record.path, record);
      this.records.push(record);
    }

    this.sort = { ...(options.sort ?? DEFAULT_SORT) };
    this.filter = normalizeFilter(options.filter ?? '');
  }

  get size(): number {
    return this.records.length;
  }

  getSort(): SortState {
    return { ...this.sort };
  }

  getFilter(): string {
    return this.filter;
  }

  /**
   * Reorder visible rows. Stable: rows with equal keys keep scan order in
   * both directions.
   */
  setSortKey(field: SortField, direction: SortDirection): void {
    this.sort = { field, direction };
    this.visibleCache = null;
  }

  /**
   * Header-click behaviour: same column flips direction, new column starts
   * ascending
   */
  toggleSort(field: SortField): SortState {
    if (this.sort.field === field) {
      this.setSortKey(field, this.sort.direction === 'asc' ? 'desc' : 'asc');
    } else {
      this.setSortKey(field, 'asc');
    }
    return this.getSort();
  }

  /**
   * Case-insensitive substring match on path, name or extension.
   * Empty text shows everything.
   */
  setFilter(text: string): void {
    this.filter = normalizeFilter(text);
    this.visibleCache = null;
  }

  /**
   * Rows after filter, in sort order
   */
  visibleRows(): TableRow[] {
    return this.visibleRecords().map((record) => this.toRow(record));
  }

  visibleCount(): number {
    return this.visibleRecords().length;
  }

  getRow(path: string): TableRow | null {
    const record = this.byPath.get(path);
    return record ? this.toRow(record) : null;
  }

  isSelected(path: string): boolean {
    return this.selected.has(path);
  }

  /**
   * Flip one row's checkbox. Returns the new state; unknown paths stay
   * unselected.
   */
  toggleSelect(path: string): boolean {
    if (this.selected.has(path)) {
      this.selected.delete(path);
      return false;
    }
    if (!this.byPath.has(path)) {
      return false;
    }
    this.selected.add(path);
    return true;
  }

  /**
   * Check every visible row. Hidden rows are left as they are.
   */
  selectAll(): void {
    for (const record of this.visibleRecords()) {
      this.selected.add(record.path);
    }
  }

  /**
   * Uncheck every visible row. Hidden rows are left as they are.
   */
  selectNone(): void {
    for (const record of this.visibleRecords()) {
      this.selected.delete(record.path);
    }
  }

  /**
   * Count and total size of checked rows across the whole table,
   * regardless of the filter
   */
  selectionSummary(): SelectionSummary {
    let count = 0;
    let totalBytes = 0;
    for (const record of this.records) {
      if (this.selected.has(record.path)) {
        count++;
        totalBytes += record.sizeBytes;
      }
    }
    return { count, totalBytes };
  }

  /**
   * Every checked path in scan order, hidden rows included
   */
  selectedPaths(): string[] {
    return this.records.filter((r) => this.selected.has(r.path)).map((r) => r.path);
  }

  /**
   * Drop records (e.g. after they were deleted from disk)
   */
  removeRecords(paths: Iterable<string>): number {
    const toRemove = new Set(paths);
    if (toRemove.size === 0) return 0;

    const before = this.records.length;
    this.records = this.records.filter((r) => !toRemove.has(r.path));
    for (const path of toRemove) {
      this.byPath.delete(path);
      this.selected.delete(path);
    }
    this.visibleCache = null;
    return before - this.records.length;
  }

  private visibleRecords(): ModelFileRecord[] {
    if (this.visibleCache) return this.visibleCache;

    const needle = this.filter.toLowerCase();
    const filtered =
      needle === ''
        ? [...this.records]
        : this.records.filter(
            (r) =>
              r.path.toLowerCase().includes(needle) ||
              r.name.toLowerCase().includes(needle) ||
              r.extension.includes(needle)
          );

    const compare = COMPARATORS[this.sort.field];
    const sign = this.sort.direction === 'asc' ? 1 : -1;
    // Array.prototype.sort is stable, so ties keep scan order
    filtered.sort((a, b) => sign * compare(a, b));

    this.visibleCache = filtered;
    return filtered;
  }

  private toRow(record: ModelFileRecord): TableRow {
    return { ...record, selected: this.selected.has(record.path) };
  }
}

function normalizeFilter(text: string): string {
  return text.trim();
}

import blessed from 'blessed';
import { ResultTable } from '../lib/result-table';
import { OperationManager } from '../lib/operation-manager';
import { ScanOperation } from '../lib/scan-operation';
import { DeleteOperation } from '../lib/delete-operation';
import { DEFAULT_EXPORT_FILENAME, ExportOperation, normalizeExportPath } from '../lib/export-operation';
import { ExportError, errorMessage } from '../lib/errors';
import { stateManager } from '../lib/state-manager';
import { activityLogger } from '../lib/activity-logger';
import { platformTrash } from '../lib/trash-manager';
import { GlobalConfig } from '../types/global-config';
import { SortField, SortState, TableRow } from '../types/model-record';
import { DeleteMode } from '../types/operation-types';
import { formatBytes, formatDateTime, pad, truncate, truncateStart } from '../utils/format-utils';
import { ModalController } from './shared/modal-controller';
import * as path from 'path';

interface Column {
  key: string;
  label: string;
  field: SortField;
  width: number;
}

// Number keys 1-7 sort by these, in this order
const COLUMNS: readonly Column[] = [
  { key: '1', label: 'Name', field: 'name', width: 40 },
  { key: '2', label: 'Ext', field: 'extension', width: 13 },
  { key: '3', label: 'Size', field: 'sizeBytes', width: 11 },
  { key: '4', label: 'Last Access', field: 'lastAccessTime', width: 20 },
  { key: '5', label: 'Modified', field: 'lastWriteTime', width: 20 },
  { key: '6', label: 'Created', field: 'creationTime', width: 20 },
  { key: '7', label: 'Directory', field: 'directory', width: 0 },
];

const HEADER_LINES = 6;
const FOOTER_LINES = 3;
const PROGRESS_RENDER_INTERVAL_MS = 100;

/**
 * Interactive browser for one scan root: checkbox grid, sort, filter,
 * delete and export
 */
export async function createBrowserUI(
  screen: blessed.Widgets.Screen,
  root: string,
  config: GlobalConfig
): Promise<void> {
  let table: ResultTable | null = null;
  let sort: SortState = { ...config.sort };
  let filter = '';
  let cursor = 0;
  let offset = 0;
  let permanent = config.deleteMode === 'permanent';
  let scanning = false;
  let statusMessage = '';
  let lastRender = 0;

  const operations = new OperationManager();
  const modalController = new ModalController(screen);

  const contentBox = blessed.box({
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    tags: true,
  });
  screen.append(contentBox);

  function deleteMode(): DeleteMode {
    return permanent ? 'permanent' : 'recycle';
  }

  function listHeight(): number {
    const height = typeof screen.height === 'number' ? screen.height : 24;
    return Math.max(1, height - HEADER_LINES - FOOTER_LINES);
  }

  function termWidth(): number {
    return typeof screen.width === 'number' ? screen.width : 80;
  }

  // Keep the cursor on screen after it moves or the row count changes
  function clampCursor(rowCount: number): void {
    cursor = Math.max(0, Math.min(cursor, rowCount - 1));
    const height = listHeight();
    if (cursor < offset) offset = cursor;
    if (cursor >= offset + height) offset = cursor - height + 1;
    offset = Math.max(0, Math.min(offset, Math.max(0, rowCount - height)));
  }

  function directoryWidth(): number {
    const fixed = COLUMNS.reduce((sum, column) => sum + column.width, 0);
    // Checkbox and cursor take 6, plus one space per column
    return Math.max(10, termWidth() - fixed - 6 - COLUMNS.length - 2);
  }

  function renderColumnHeader(): string {
    let line = '      ';
    for (const column of COLUMNS) {
      let label = `${column.key}:${column.label}`;
      if (column.field === sort.field) {
        label += sort.direction === 'asc' ? ' ▲' : ' ▼';
      }
      const width = column.width || directoryWidth();
      line += pad(label, width) + ' ';
    }
    return `{bold}${line}{/bold}`;
  }

  function renderRow(row: TableRow, isCursor: boolean): string {
    const indicator = isCursor ? '►' : ' ';
    const checkbox = row.selected ? '[x]' : '[ ]';
    const cells = [
      pad(truncate(row.name, 39), 40),
      pad(row.extension, 13),
      formatBytes(row.sizeBytes).padStart(10) + ' ',
      pad(formatDateTime(row.lastAccessTime), 20),
      pad(formatDateTime(row.lastWriteTime), 20),
      pad(formatDateTime(row.creationTime), 20),
      truncateStart(row.directory, directoryWidth()),
    ];
    const text = blessed.escape(`${indicator} ${checkbox} ${cells.join(' ')}`);

    if (isCursor) {
      return `{cyan-bg}{15-fg}${text}{/15-fg}{/cyan-bg}`;
    }
    return row.selected ? `{yellow-fg}${text}{/yellow-fg}` : text;
  }

  function render(): void {
    lastRender = Date.now();
    const divider = '─'.repeat(Math.max(1, termWidth() - 2));
    let content = '';

    content += '{bold}{blue-fg}═══ Model Files{/blue-fg}{/bold}  ';
    content += `{gray-fg}${blessed.escape(root)}{/gray-fg}\n`;

    const modeText = permanent
      ? '{red-fg}{bold}PERMANENT DELETE{/bold}{/red-fg}'
      : `{green-fg}Move to ${platformTrash.describe()}{/green-fg}`;

    if (table) {
      const summary = table.selectionSummary();
      const visible = table.visibleCount();
      content += `{bold}${visible}{/bold} of ${table.size} files shown`;
      content += `  │  {bold}${summary.count}{/bold} selected (${formatBytes(summary.totalBytes)})`;
      content += `  │  ${modeText}\n`;
    } else {
      content += `${modeText}\n`;
    }

    content += filter
      ? `Filter: {yellow-fg}${blessed.escape(filter)}{/yellow-fg}\n`
      : '{gray-fg}Filter: (none){/gray-fg}\n';
    content += divider + '\n';
    content += renderColumnHeader() + '\n';
    content += divider + '\n';

    const height = listHeight();
    const rows = table ? table.visibleRows() : [];

    if (!table) {
      content += scanning ? '{cyan-fg}⏳ Scanning...{/cyan-fg}\n' : '\n';
      content += '\n'.repeat(Math.max(0, height - 1));
    } else if (rows.length === 0) {
      const emptyText = table.size === 0
        ? '{yellow-fg}No model files found{/yellow-fg}'
        : '{yellow-fg}No files match the filter{/yellow-fg}';
      content += emptyText + '\n';
      content += '\n'.repeat(Math.max(0, height - 1));
    } else {
      clampCursor(rows.length);
      const page = rows.slice(offset, offset + height);
      page.forEach((row, index) => {
        content += renderRow(row, offset + index === cursor) + '\n';
      });
      content += '\n'.repeat(Math.max(0, height - page.length));
    }

    content += divider + '\n';
    content += statusMessage ? `${statusMessage}\n` : '\n';
    content += '{gray-fg}[↑/↓] Move [Space] Select [A]ll [N]one [/] Filter [1-7] Sort ';
    content += '[D]elete [P]ermanent [E]xport [R]escan [C]ancel [Q]uit{/gray-fg}';

    contentBox.setContent(content);
    screen.render();
  }

  function renderThrottled(): void {
    if (Date.now() - lastRender >= PROGRESS_RENDER_INTERVAL_MS) {
      render();
    }
  }

  function setStatus(message: string): void {
    statusMessage = message;
    render();
  }

  // Key handlers are synchronous; anything async reports its failure in a dialog
  function guard(action: () => Promise<void>): void {
    void action().catch((error: unknown) => {
      render();
      return modalController.showError(errorMessage(error));
    });
  }

  // Editing keys wait until the running operation has finished
  function blockedByOperation(): boolean {
    const active = operations.getActive();
    if (!active) return false;
    setStatus(`{yellow-fg}A ${active.kind} is running. Press [C] to cancel it.{/yellow-fg}`);
    return true;
  }

  function cursorRow(): TableRow | null {
    if (!table) return null;
    const rows = table.visibleRows();
    return rows[cursor] ?? null;
  }

  async function rescan(): Promise<void> {
    const operation = new ScanOperation(root);
    operation.onProgress((progress) => {
      statusMessage =
        `{cyan-fg}🔍 ${progress.matched} found, ${progress.entriesVisited} checked{/cyan-fg} ` +
        `{gray-fg}${blessed.escape(truncateStart(progress.currentDirectory, 60))}{/gray-fg}`;
      renderThrottled();
    });

    table = null;
    cursor = 0;
    offset = 0;
    scanning = true;
    setStatus('');

    try {
      const report = await operations.run(operation);
      await activityLogger.logScan(report);

      if (report.error) {
        table = new ResultTable([], { sort, filter });
        setStatus('');
        await modalController.showError(report.error.message);
        return;
      }

      table = new ResultTable(report.records, { sort, filter });
      let message = `{green-fg}✓ ${report.records.length} model files found{/green-fg}`;
      if (report.cancelled) {
        message = `{yellow-fg}⚠️  Scan cancelled: showing the ${report.records.length} files found so far{/yellow-fg}`;
      } else if (report.skipped.length > 0) {
        message += ` {yellow-fg}(${report.skipped.length} entries skipped){/yellow-fg}`;
      }
      setStatus(message);
    } finally {
      scanning = false;
    }
  }

  async function deleteSelected(): Promise<void> {
    if (!table) return;
    const summary = table.selectionSummary();
    if (summary.count === 0) {
      setStatus('{yellow-fg}Nothing selected. Press [Space] to select files.{/yellow-fg}');
      return;
    }

    const mode = deleteMode();
    const hidden = summary.count - table.visibleRows().filter((row) => row.selected).length;
    let message = mode === 'recycle'
      ? `  Move {bold}${summary.count}{/bold} file(s) (${formatBytes(summary.totalBytes)}) to the ${platformTrash.describe()}?`
      : `  {red-fg}{bold}PERMANENTLY delete ${summary.count} file(s) (${formatBytes(summary.totalBytes)})?{/bold}{/red-fg}\n  {red-fg}This cannot be undone.{/red-fg}`;
    if (hidden > 0) {
      message += `\n  {yellow-fg}${hidden} of them are hidden by the filter.{/yellow-fg}`;
    }

    const confirmed = await modalController.showConfirm(
      mode === 'recycle' ? 'Delete Files' : 'Delete Permanently',
      message,
      mode === 'recycle' ? 'yellow' : 'red'
    );
    if (!confirmed) {
      render();
      return;
    }

    const operation = new DeleteOperation(table, { mode });
    const progressBox = modalController.showProgress(`Deleting ${summary.count} file(s)...`);
    operation.onProgress((progress) => {
      progressBox.setContent(
        `\n  {cyan-fg}🗑️  ${progress.processed}/${progress.total} processed, ${progress.failed} failed{/cyan-fg}\n\n` +
        '  {gray-fg}[C] Cancel{/gray-fg}'
      );
      renderThrottled();
    });

    const report = await operations
      .run(operation)
      .finally(() => modalController.closeProgress(progressBox));
    await activityLogger.logDelete(report, root);

    const lines: string[] = [];
    const verb = mode === 'recycle' ? `Moved to ${platformTrash.describe()}` : 'Deleted';
    lines.push(`  {green-fg}✓ ${verb}: ${report.deleted.length} file(s), ${formatBytes(report.freedBytes)} freed{/green-fg}`);
    if (report.cancelled) {
      lines.push(`  {yellow-fg}⚠️  Cancelled: ${report.notProcessed.length} file(s) left untouched{/yellow-fg}`);
    }
    if (report.failures.length > 0) {
      lines.push(`  {red-fg}❌ Failed: ${report.failures.length} file(s), still selected{/red-fg}`);
      for (const failure of report.failures.slice(0, 5)) {
        lines.push(`  {gray-fg}${blessed.escape(truncateStart(failure.path, 60))}{/gray-fg}`);
        lines.push(`    ${blessed.escape(failure.reason)}`);
      }
      if (report.failures.length > 5) {
        lines.push(`  {gray-fg}...and ${report.failures.length - 5} more (see: modelsweep log){/gray-fg}`);
      }
    }

    statusMessage = '';
    render();
    const title = report.failures.length > 0 ? 'Delete Finished With Errors' : 'Delete Finished';
    await modalController.showMessage(title, lines.join('\n'), report.failures.length > 0 ? 'red' : 'green');
    render();
  }

  async function exportVisible(): Promise<void> {
    if (!table) return;

    const suggested = path.join(config.exportDirectory || process.cwd(), DEFAULT_EXPORT_FILENAME);
    const answer = await modalController.showTextInput(
      'Export to Spreadsheet',
      suggested,
      `{gray-fg}${table.visibleCount()} visible row(s) will be written (.xlsx){/gray-fg}`
    );
    if (answer === null || answer.trim() === '') {
      render();
      return;
    }

    const outputPath = normalizeExportPath(answer.trim());
    const operation = new ExportOperation(table, {
      outputPath,
      openAfterExport: config.openAfterExport,
    });
    const progressBox = modalController.showProgress(`Writing ${outputPath}...`);
    operation.onProgress((progress) => {
      progressBox.setContent(
        `\n  {cyan-fg}📄 ${progress.rowsWritten}/${progress.totalRows} rows{/cyan-fg}\n\n` +
        '  {gray-fg}[C] Cancel{/gray-fg}'
      );
      renderThrottled();
    });

    try {
      const report = await operations.run(operation);
      modalController.closeProgress(progressBox);
      await activityLogger.logExport(report, root);

      let message = `Exported ${report.rowCount} row(s) to ${blessed.escape(report.outputPath)}`;
      if (report.opened) {
        message += '\n  {gray-fg}Opened in your spreadsheet application{/gray-fg}';
      }
      render();
      await modalController.showSuccess(message);
    } catch (error) {
      modalController.closeProgress(progressBox);
      if (error instanceof ExportError) {
        await activityLogger.logExportFailure(error.outputPath, error.message, root);
      }
      throw error;
    }
    render();
  }

  function changeSort(field: SortField): void {
    if (!table) return;
    sort = table.toggleSort(field);
    render();
    guard(() => stateManager.setSort(sort));
  }

  const keyHandlers = {
    up: () => {
      if (modalController.isModalOpen()) return;
      cursor = Math.max(0, cursor - 1);
      render();
    },
    down: () => {
      if (modalController.isModalOpen() || !table) return;
      cursor = Math.min(table.visibleCount() - 1, cursor + 1);
      render();
    },
    pageUp: () => {
      if (modalController.isModalOpen()) return;
      cursor = Math.max(0, cursor - listHeight());
      render();
    },
    pageDown: () => {
      if (modalController.isModalOpen() || !table) return;
      cursor = Math.min(table.visibleCount() - 1, cursor + listHeight());
      render();
    },
    toggle: () => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      const row = cursorRow();
      if (!table || !row) return;
      table.toggleSelect(row.path);
      render();
    },
    selectAll: () => {
      if (modalController.isModalOpen() || blockedByOperation() || !table) return;
      table.selectAll();
      render();
    },
    selectNone: () => {
      if (modalController.isModalOpen() || blockedByOperation() || !table) return;
      table.selectNone();
      render();
    },
    filter: () => {
      if (modalController.isModalOpen() || blockedByOperation() || !table) return;
      const current = table;
      guard(async () => {
        const text = await modalController.showTextInput(
          'Filter',
          filter,
          '{gray-fg}Matches path, name or extension. Empty shows everything.{/gray-fg}'
        );
        if (text !== null) {
          current.setFilter(text);
          filter = current.getFilter();
          cursor = 0;
          offset = 0;
        }
        render();
      });
    },
    sort: (ch: string) => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      const column = COLUMNS.find((c) => c.key === ch);
      if (column) changeSort(column.field);
    },
    delete: () => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      guard(deleteSelected);
    },
    permanent: () => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      permanent = !permanent;
      setStatus(permanent
        ? '{red-fg}Delete mode: permanent{/red-fg}'
        : `{green-fg}Delete mode: move to ${platformTrash.describe()}{/green-fg}`);
    },
    export: () => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      guard(exportVisible);
    },
    rescan: () => {
      if (modalController.isModalOpen() || blockedByOperation()) return;
      guard(rescan);
    },
    cancel: () => {
      if (modalController.isModalOpen()) return;
      const active = operations.getActive();
      if (operations.cancelActive() && active) {
        setStatus(`{yellow-fg}Cancelling ${active.kind}...{/yellow-fg}`);
      }
    },
    quit: () => {
      if (modalController.isModalOpen()) return;
      operations.cancelActive();
      screen.destroy();
      process.exit(0);
    },
  };

  screen.key(['up', 'k'], keyHandlers.up);
  screen.key(['down', 'j'], keyHandlers.down);
  screen.key(['pageup'], keyHandlers.pageUp);
  screen.key(['pagedown'], keyHandlers.pageDown);
  screen.key(['space'], keyHandlers.toggle);
  screen.key(['a', 'A'], keyHandlers.selectAll);
  screen.key(['n', 'N'], keyHandlers.selectNone);
  screen.key(['/'], keyHandlers.filter);
  screen.key(COLUMNS.map((c) => c.key), keyHandlers.sort);
  screen.key(['d', 'D'], keyHandlers.delete);
  screen.key(['p', 'P'], keyHandlers.permanent);
  screen.key(['e', 'E'], keyHandlers.export);
  screen.key(['r', 'R'], keyHandlers.rescan);
  screen.key(['c', 'C'], keyHandlers.cancel);
  screen.key(['q', 'Q', 'C-c'], keyHandlers.quit);
  screen.on('resize', () => render());

  await rescan();
}

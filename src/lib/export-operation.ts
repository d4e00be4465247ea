import * as path from 'path';
import { Workbook, Worksheet } from 'exceljs';
import { TableRow } from '../types/model-record';
import { ExportProgress, ExportReport } from '../types/operation-types';
import { expandHome, isWritableDirectory } from '../utils/file-utils';
import { ExportError, errorMessage } from './errors';
import { Operation } from './operation';
import { ResultTable } from './result-table';
import { SpreadsheetLauncher, spreadsheetLauncher } from './spreadsheet-launcher';

export const DEFAULT_EXPORT_FILENAME = 'models.xlsx';

const SIZE_FORMAT = '#,##0';
const DATE_FORMAT = 'yyyy-mm-dd hh:mm:ss';
const MAX_COLUMN_WIDTH = 80;
const PROGRESS_EVERY = 500;

interface ExportColumn {
  header: string;
  key: string;
  value: (row: TableRow) => string | number | boolean | Date;
  display: (row: TableRow) => string;
  numFmt?: string;
}

/**
 * Spreadsheets have no time zones: shift so the cell shows local wall-clock time
 */
export function toSpreadsheetDate(date: Date): Date {
  return new Date(date.getTime() - date.getTimezoneOffset() * 60_000);
}

export const EXPORT_COLUMNS: readonly ExportColumn[] = [
  { header: 'Name', key: 'name', value: (r) => r.name, display: (r) => r.name },
  { header: 'Path', key: 'path', value: (r) => r.path, display: (r) => r.path },
  { header: 'Extension', key: 'extension', value: (r) => r.extension, display: (r) => r.extension },
  {
    header: 'Size',
    key: 'size',
    value: (r) => r.sizeBytes,
    display: (r) => r.sizeBytes.toLocaleString('en-US'),
    numFmt: SIZE_FORMAT,
  },
  {
    header: 'Last Access Time',
    key: 'lastAccessTime',
    value: (r) => toSpreadsheetDate(r.lastAccessTime),
    display: () => DATE_FORMAT,
    numFmt: DATE_FORMAT,
  },
  {
    header: 'Selected',
    key: 'selected',
    value: (r) => r.selected,
    display: (r) => (r.selected ? 'TRUE' : 'FALSE'),
  },
];

/**
 * Add .xlsx when the user left the extension off
 */
export function normalizeExportPath(outputPath: string): string {
  const resolved = path.resolve(expandHome(outputPath));
  return resolved.toLowerCase().endsWith('.xlsx') ? resolved : `${resolved}.xlsx`;
}

export interface ExportOperationOptions {
  outputPath: string;
  openAfterExport?: boolean;
  launcher?: SpreadsheetLauncher;
}

/**
 * Writes the table's visible rows, in their visible order, to an .xlsx file
 */
export class ExportOperation extends Operation<ExportProgress, ExportReport> {
  readonly kind = 'export' as const;
  readonly outputPath: string;
  private table: ResultTable;
  private openAfterExport: boolean;
  private launcher: SpreadsheetLauncher;

  constructor(table: ResultTable, options: ExportOperationOptions) {
    super();
    this.table = table;
    this.outputPath = normalizeExportPath(options.outputPath);
    this.openAfterExport = options.openAfterExport ?? false;
    this.launcher = options.launcher ?? spreadsheetLauncher;
  }

  protected async run(signal: AbortSignal): Promise<ExportReport> {
    const rows = this.table.visibleRows();

    const directory = path.dirname(this.outputPath);
    if (!(await isWritableDirectory(directory))) {
      throw new ExportError(this.outputPath, `directory ${directory} does not exist or is not writable`);
    }

    const workbook = this.buildWorkbook(rows);

    try {
      await workbook.xlsx.writeFile(this.outputPath);
    } catch (error) {
      throw new ExportError(this.outputPath, errorMessage(error));
    }

    const opened = this.openAfterExport && !signal.aborted
      ? await this.tryOpen()
      : false;

    return {
      outputPath: this.outputPath,
      rowCount: rows.length,
      opened,
    };
  }

  private buildWorkbook(rows: TableRow[]): Workbook {
    const workbook = new Workbook();
    workbook.creator = 'modelsweep';
    workbook.created = new Date();

    const sheet = workbook.addWorksheet('Models', {
      views: [{ state: 'frozen', ySplit: 1 }],
    });

    sheet.columns = EXPORT_COLUMNS.map((column) => ({
      header: column.header,
      key: column.key,
    }));
    sheet.getRow(1).font = { bold: true };

    rows.forEach((row, index) => {
      const added = sheet.addRow(
        Object.fromEntries(EXPORT_COLUMNS.map((column) => [column.key, column.value(row)]))
      );
      for (const column of EXPORT_COLUMNS) {
        if (column.numFmt) {
          added.getCell(column.key).numFmt = column.numFmt;
        }
      }

      const written = index + 1;
      if (written % PROGRESS_EVERY === 0 || written === rows.length) {
        this.emitProgress({ rowsWritten: written, totalRows: rows.length });
      }
    });

    this.sizeColumns(sheet, rows);
    return workbook;
  }

  private sizeColumns(sheet: Worksheet, rows: TableRow[]): void {
    EXPORT_COLUMNS.forEach((column, index) => {
      let longest = column.header.length;
      for (const row of rows) {
        longest = Math.max(longest, column.display(row).length);
      }
      sheet.getColumn(index + 1).width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
    });
  }

  /**
   * Opening is a convenience: no application, no problem
   */
  private async tryOpen(): Promise<boolean> {
    try {
      return await this.launcher.open(this.outputPath);
    } catch {
      return false;
    }
  }
}

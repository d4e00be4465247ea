/**
 * Extensions recognised as model weight files (lowercase, with leading dot)
 */
export const MODEL_EXTENSIONS = [
  '.safetensors',
  '.ckpt',
  '.pth',
  '.pt',
  '.onnx',
  '.bin',
  '.gguf',
] as const;

export type ModelExtension = (typeof MODEL_EXTENSIONS)[number];

export interface ModelFileRecord {
  readonly path: string;            // Absolute path, unique within a scan
  readonly name: string;            // Filename component
  readonly directory: string;       // Parent directory
  readonly extension: ModelExtension;
  readonly sizeBytes: number;
  readonly lastAccessTime: Date;
  readonly lastWriteTime: Date;
  readonly creationTime: Date;      // birthtime; ctime where the filesystem has none
}

/**
 * A record as shown in the table, with the user's checkbox state
 */
export interface TableRow extends ModelFileRecord {
  readonly selected: boolean;
}

export const SORT_FIELDS = [
  'name',
  'path',
  'directory',
  'extension',
  'sizeBytes',
  'lastAccessTime',
  'lastWriteTime',
  'creationTime',
] as const;

export type SortField = (typeof SORT_FIELDS)[number];

export type SortDirection = 'asc' | 'desc';

export interface SortState {
  field: SortField;
  direction: SortDirection;
}

/**
 * Least recently used first
 */
export const DEFAULT_SORT: SortState = {
  field: 'lastAccessTime',
  direction: 'asc',
};

export interface SelectionSummary {
  count: number;
  totalBytes: number;
}

export function isSortField(value: string): value is SortField {
  return (SORT_FIELDS as readonly string[]).includes(value);
}

const MODEL_EXTENSION_SET: ReadonlySet<string> = new Set(MODEL_EXTENSIONS);

export function isModelExtension(value: string): value is ModelExtension {
  return MODEL_EXTENSION_SET.has(value);
}

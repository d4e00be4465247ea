import * as fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import * as path from 'path';
import * as os from 'os';
import { errorCode } from '../lib/errors';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true, mode: 0o755 });
  } catch (error) {
    // Ignore error if directory already exists
    if (errorCode(error) !== 'EEXIST') {
      throw error;
    }
  }
}

/**
 * Write a file atomically (write to temp, then rename)
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}

/**
 * Write JSON to a file atomically
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const content = JSON.stringify(data, null, 2);
  await writeFileAtomic(filePath, content);
}

/**
 * Read and parse a JSON file. Callers validate the shape.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a path is an existing directory we can create files in
 */
export async function isWritableDirectory(dirPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(dirPath);
    if (!stats.isDirectory()) return false;
    await fs.access(dirPath, fsConstants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the modelsweep config directory (~/.modelsweep, or $MODELSWEEP_HOME)
 */
export function getConfigDir(): string {
  const override = process.env.MODELSWEEP_HOME;
  if (override && override.trim() !== '') {
    return path.resolve(expandHome(override.trim()));
  }
  return path.join(os.homedir(), '.modelsweep');
}

/**
 * Get the logs directory (~/.modelsweep/logs)
 */
export function getLogsDir(): string {
  return path.join(getConfigDir(), 'logs');
}

/**
 * Get the global config file path
 */
export function getGlobalConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Get the activity log path (~/.modelsweep/logs/activity.log)
 */
export function getActivityLogPath(): string {
  return path.join(getLogsDir(), 'activity.log');
}

/**
 * Expand tilde (~) in path to home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

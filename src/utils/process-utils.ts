import { execFile, spawn } from 'child_process';
import { promisify } from 'util';

export const execFileAsync = promisify(execFile);

/**
 * Run a program with arguments (no shell) and return trimmed stdout.
 * Throws on non-zero exit code.
 */
export async function runCommand(file: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync(file, args, { windowsHide: true });
  return stdout.trim();
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<boolean> {
  const locator = process.platform === 'win32' ? 'where' : 'which';
  try {
    await execFileAsync(locator, [command], { windowsHide: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Start a program detached from this process and resolve once it has
 * spawned. Resolves false if it could not be started.
 */
export function launchDetached(file: string, args: string[]): Promise<boolean> {
  return new Promise((resolve) => {
    const child = spawn(file, args, {
      detached: true,
      stdio: 'ignore',
      windowsHide: true,
    });

    child.once('error', () => resolve(false));
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}

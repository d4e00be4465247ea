import * as path from 'path';
import { commandExists, runCommand } from '../utils/process-utils';
import { UnsupportedOperation } from './errors';

/**
 * Reversible delete. Implementations report whether the platform offers one.
 */
export interface TrashFacility {
  isAvailable(): Promise<boolean>;
  moveToTrash(filePath: string): Promise<void>;
  describe(): string;
}

export interface TrashBackend {
  command: string;
  args: (filePath: string) => string[];
}

function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function escapePowerShell(value: string): string {
  return value.replace(/'/g, "''");
}

const MAC_BACKENDS: TrashBackend[] = [
  {
    command: 'osascript',
    args: (filePath) => [
      '-e',
      `tell application "Finder" to delete POSIX file "${escapeAppleScript(filePath)}"`,
    ],
  },
];

const LINUX_BACKENDS: TrashBackend[] = [
  { command: 'gio', args: (filePath) => ['trash', filePath] },
  { command: 'trash-put', args: (filePath) => [filePath] },
  { command: 'kioclient5', args: (filePath) => ['move', filePath, 'trash:/'] },
];

const WINDOWS_BACKENDS: TrashBackend[] = [
  {
    command: 'powershell.exe',
    args: (filePath) => [
      '-NoProfile',
      '-NonInteractive',
      '-Command',
      'Add-Type -AssemblyName Microsoft.VisualBasic; ' +
        `[Microsoft.VisualBasic.FileIO.FileSystem]::DeleteFile('${escapePowerShell(filePath)}', ` +
        "'OnlyErrorDialogs', 'SendToRecycleBin')",
    ],
  },
];

export function backendsForPlatform(platform: NodeJS.Platform): TrashBackend[] {
  switch (platform) {
    case 'darwin':
      return MAC_BACKENDS;
    case 'win32':
      return WINDOWS_BACKENDS;
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return LINUX_BACKENDS;
    default:
      return [];
  }
}

/**
 * Moves files to the OS trash through whatever tool the platform ships.
 * The first backend whose command is on PATH wins; with none, recycling is
 * unsupported and every request fails with UnsupportedOperation.
 */
export class PlatformTrash implements TrashFacility {
  private platform: NodeJS.Platform;
  private backend: Promise<TrashBackend | null> | null = null;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.resolveBackend()) !== null;
  }

  async moveToTrash(filePath: string): Promise<void> {
    const backend = await this.resolveBackend();
    if (!backend) {
      throw new UnsupportedOperation(`Moving files to the ${this.describe()}`, this.platform);
    }
    await runCommand(backend.command, backend.args(path.resolve(filePath)));
  }

  /**
   * Where recycled files end up, for prompts
   */
  describe(): string {
    return this.platform === 'win32' ? 'Recycle Bin' : 'Trash';
  }

  /**
   * Backend lookup runs once; concurrent callers share it
   */
  private resolveBackend(): Promise<TrashBackend | null> {
    if (!this.backend) {
      this.backend = this.findBackend();
    }
    return this.backend;
  }

  private async findBackend(): Promise<TrashBackend | null> {
    for (const candidate of backendsForPlatform(this.platform)) {
      if (await commandExists(candidate.command)) {
        return candidate;
      }
    }
    return null;
  }
}

// Export singleton instance
export const platformTrash = new PlatformTrash();

import * as path from 'path';
import { commandExists, launchDetached } from '../utils/process-utils';

/**
 * Opens a file in whatever application the desktop associates with it
 */
export interface SpreadsheetLauncher {
  open(filePath: string): Promise<boolean>;
}

interface OpenCommand {
  command: string;
  args: string[];
}

export function openCommandFor(platform: NodeJS.Platform, filePath: string): OpenCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [filePath] };
    case 'win32':
      return { command: 'explorer.exe', args: [filePath] };
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return { command: 'xdg-open', args: [filePath] };
    default:
      return null;
  }
}

/**
 * Best-effort launcher: resolves false instead of throwing when there is
 * nothing to open the file with.
 */
export class DesktopSpreadsheetLauncher implements SpreadsheetLauncher {
  private platform: NodeJS.Platform;

  constructor(platform: NodeJS.Platform = process.platform) {
    this.platform = platform;
  }

  async open(filePath: string): Promise<boolean> {
    const opener = openCommandFor(this.platform, path.resolve(filePath));
    if (!opener) return false;

    if (!(await commandExists(opener.command))) {
      return false;
    }

    return launchDetached(opener.command, opener.args);
  }
}

export const spreadsheetLauncher = new DesktopSpreadsheetLauncher();

import blessed from 'blessed';
import { stateManager } from '../lib/state-manager';
import { createBrowserUI } from '../tui/BrowserApp';
import { resolveScanRoot } from './scan-runner';

export async function browseCommand(dir: string | undefined): Promise<void> {
  const root = await resolveScanRoot(dir);
  const config = await stateManager.loadGlobalConfig();

  const screen = blessed.screen({
    smartCSR: true,
    title: 'modelsweep',
    fullUnicode: true,
  });

  await createBrowserUI(screen, root, config);
}

import blessed from 'blessed';

interface CreateModalOptions {
  title: string;
  width?: string | number;
  height?: string | number;
  borderColor?: string;
}

interface ModalContext {
  element: blessed.Widgets.BoxElement;
  overlay: blessed.Widgets.BoxElement;
}

/**
 * Dimmed full-screen box behind a dialog
 */
function createOverlay(): blessed.Widgets.BoxElement {
  return blessed.box({
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    style: {
      bg: 'gray',
      transparent: true,
    },
  });
}

/**
 * Dialogs for the browser. While one is open, isModalOpen() is true and the
 * screen-level key handlers are expected to ignore keys.
 */
export class ModalController {
  private screen: blessed.Widgets.Screen;
  private modalStack: ModalContext[] = [];

  constructor(screen: blessed.Widgets.Screen) {
    this.screen = screen;
  }

  /**
   * Check if any modal is currently open
   */
  isModalOpen(): boolean {
    return this.modalStack.length > 0;
  }

  /**
   * Show a message with a single [Enter] Close action
   */
  showMessage(title: string, message: string, borderColor = 'cyan'): Promise<void> {
    return new Promise((resolve) => {
      const lineCount = message.split('\n').length;
      const modal = this.createModalElement({
        title,
        height: Math.min(lineCount + 6, 24),
        borderColor,
      });
      modal.setContent(`\n${message}\n\n  {gray-fg}[Enter] Close{/gray-fg}`);

      const context = this.open(modal);
      modal.key(['enter', 'escape', 'q'], () => {
        this.close(context);
        resolve();
      });
      modal.focus();
      this.screen.render();
    });
  }

  showError(message: string): Promise<void> {
    return this.showMessage('Error', `  {red-fg}❌ ${blessed.escape(message)}{/red-fg}`, 'red');
  }

  showSuccess(message: string): Promise<void> {
    return this.showMessage('Done', `  {green-fg}✓ ${message}{/green-fg}`, 'green');
  }

  /**
   * Yes/no question. Resolves false on [N] or [ESC].
   */
  showConfirm(title: string, message: string, borderColor = 'yellow'): Promise<boolean> {
    return new Promise((resolve) => {
      const lineCount = message.split('\n').length;
      const modal = this.createModalElement({
        title,
        height: lineCount + 6,
        borderColor,
      });
      modal.setContent(`\n${message}\n\n  {gray-fg}[Y]es  [N]o{/gray-fg}`);

      const context = this.open(modal);
      const closeWithResult = (result: boolean) => {
        this.close(context);
        resolve(result);
      };

      modal.key(['y', 'Y'], () => closeWithResult(true));
      modal.key(['n', 'N', 'escape'], () => closeWithResult(false));
      modal.focus();
      this.screen.render();
    });
  }

  /**
   * Single-line text input. Resolves null on [ESC].
   */
  showTextInput(title: string, currentValue: string, hint?: string): Promise<string | null> {
    return new Promise((resolve) => {
      const modal = this.createModalElement({ title, height: 10 });

      if (hint) {
        blessed.text({
          parent: modal,
          top: 1,
          left: 2,
          content: hint,
          tags: true,
        });
      }

      const inputBox = blessed.textbox({
        parent: modal,
        top: 3,
        left: 2,
        right: 2,
        height: 3,
        inputOnFocus: true,
        border: { type: 'line' },
        style: {
          border: { fg: 'white' },
          focus: { border: { fg: 'green' } },
        },
      });

      blessed.text({
        parent: modal,
        bottom: 1,
        left: 2,
        content: '{gray-fg}[Enter] Confirm  [ESC] Cancel{/gray-fg}',
        tags: true,
      });

      const context = this.open(modal);
      const closeWithResult = (result: string | null) => {
        this.close(context);
        resolve(result);
      };

      inputBox.setValue(currentValue);
      inputBox.on('submit', (value: string) => closeWithResult(value));
      inputBox.on('cancel', () => closeWithResult(null));
      this.screen.render();
      inputBox.focus();
    });
  }

  /**
   * Show a progress modal (non-interactive). Update it with setContent.
   */
  showProgress(message: string): blessed.Widgets.BoxElement {
    const modal = this.createModalElement({ title: 'Working', height: 7 });
    modal.setContent(`\n  {cyan-fg}${message}{/cyan-fg}\n\n  {gray-fg}[C] Cancel{/gray-fg}`);
    this.screen.append(modal);
    this.screen.render();
    return modal;
  }

  closeProgress(modal: blessed.Widgets.BoxElement): void {
    this.screen.remove(modal);
    modal.destroy();
    this.screen.render();
  }

  private createModalElement(options: CreateModalOptions): blessed.Widgets.BoxElement {
    return blessed.box({
      top: 'center',
      left: 'center',
      width: options.width || '70%',
      height: options.height || 'shrink',
      border: { type: 'line' },
      style: {
        border: { fg: options.borderColor || 'cyan' },
        fg: 'white',
      },
      tags: true,
      keys: true,
      label: ` ${options.title} `,
    });
  }

  private open(modal: blessed.Widgets.BoxElement): ModalContext {
    const context: ModalContext = { element: modal, overlay: createOverlay() };
    this.modalStack.push(context);
    this.screen.append(context.overlay);
    this.screen.append(modal);
    return context;
  }

  private close(context: ModalContext): void {
    this.screen.remove(context.element);
    this.screen.remove(context.overlay);
    context.element.destroy();
    context.overlay.destroy();
    this.modalStack = this.modalStack.filter((c) => c !== context);
    this.screen.render();
  }
}

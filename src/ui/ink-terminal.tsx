import { render, useInput, useStdin, type Instance } from 'ink';

import { StartupError } from '../../lib/errors';
import type { KeyPress } from '../../lib/keys';
import { logger } from '../../lib/logger';
import type { Size } from '../../lib/probe';
import type { Frame, Terminal } from '../../lib/terminal';
import { DashboardView } from './dashboard';

const FALLBACK_SIZE: Size = { width: 80, height: 24 };

const terminalLogger = logger.child({ component: 'terminal' });

function KeyListener({ onKey }: { onKey: (key: KeyPress) => void }) {
  const { isRawModeSupported } = useStdin();

  useInput((input, key) => {
    onKey({ input, ctrl: key.ctrl, meta: key.meta, escape: key.escape });
  }, { isActive: isRawModeSupported });

  return null;
}

interface RootProps {
  frame: Frame | null;
  height: number;
  onKey: (key: KeyPress) => void;
}

function Root({ frame, height, onKey }: RootProps) {
  return (
    <>
      <KeyListener onKey={onKey} />
      {frame !== null ? <DashboardView frame={frame} height={height} /> : null}
    </>
  );
}

export interface InkTerminalOptions {
  stdout?: NodeJS.WriteStream;
  stdin?: NodeJS.ReadStream;
}

/**
 * Terminal backed by Ink. Each frame re-renders the whole React tree.
 */
export class InkTerminal implements Terminal {
  private readonly stdout: NodeJS.WriteStream;
  private readonly stdin: NodeJS.ReadStream;
  private instance: Instance | null = null;
  private frame: Frame | null = null;
  private readonly resizeListeners: Array<(size: Size) => void> = [];
  private readonly keyListeners: Array<(key: KeyPress) => void> = [];

  constructor(options: InkTerminalOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stdin = options.stdin ?? process.stdin;
  }

  open() {
    if (this.instance !== null) return;
    if (!this.stdout.isTTY) {
      throw new StartupError('stdout is not a terminal');
    }

    this.instance = render(this.tree(), {
      stdout: this.stdout,
      stdin: this.stdin,
      exitOnCtrlC: false,
      patchConsole: false,
    });
    this.stdout.on('resize', this.handleResize);
    terminalLogger.debug({ size: this.size() }, 'Terminal acquired');
  }

  size(): Size {
    const width = this.stdout.columns;
    const height = this.stdout.rows;
    return {
      width: width > 0 ? width : FALLBACK_SIZE.width,
      height: height > 0 ? height : FALLBACK_SIZE.height,
    };
  }

  draw(frame: Frame) {
    this.frame = frame;
    this.instance?.rerender(this.tree());
  }

  onResize(listener: (size: Size) => void) {
    this.resizeListeners.push(listener);
  }

  onKey(listener: (key: KeyPress) => void) {
    this.keyListeners.push(listener);
  }

  close() {
    this.stdout.off('resize', this.handleResize);
    const instance = this.instance;
    this.instance = null;
    if (instance === null) return;
    instance.clear();
    instance.unmount();
  }

  private readonly handleResize = () => {
    const size = this.size();
    for (const listener of this.resizeListeners) listener(size);
  };

  private readonly handleKey = (key: KeyPress) => {
    for (const listener of this.keyListeners) listener(key);
  };

  private tree() {
    // Ink falls back to clearing the screen when output fills every row
    const height = Math.max(1, (this.frame?.size.height ?? 1) - 1);
    return <Root frame={this.frame} height={height} onKey={this.handleKey} />;
  }
}

import readline from 'node:readline';
import type { RendererCapability } from './renderer.js';

const ALTERNATE_SCREEN_ENTER = '\x1b[?1049h';
const ALTERNATE_SCREEN_EXIT = '\x1b[?1049l';
const CURSOR_HIDE = '\x1b[?25l';
const CURSOR_SHOW = '\x1b[?25h';

/**
 * Where rendered frames go
 */
export interface Screen {
  open(): void;
  draw(text: string): void;
  close(): void;
}

/**
 * Redraws in place on the terminal's alternate buffer,
 * restoring the shell's screen on close.
 */
export class AlternateScreen implements Screen {
  private opened = false;

  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  open(): void {
    if (this.opened) return;
    this.opened = true;
    this.out.write(ALTERNATE_SCREEN_ENTER + CURSOR_HIDE);
  }

  draw(text: string): void {
    // Never touch the shell's own screen
    if (!this.opened) return;
    // In the alternate buffer, 0,0 is top left
    readline.cursorTo(this.out, 0, 0);
    readline.clearScreenDown(this.out);
    this.out.write(text + '\n');
  }

  close(): void {
    if (!this.opened) return;
    this.opened = false;
    this.out.write(CURSOR_SHOW + ALTERNATE_SCREEN_EXIT);
  }
}

/**
 * Appends each frame, separated by a blank line. Safe for pipes and logs.
 */
export class StreamScreen implements Screen {
  constructor(private readonly out: NodeJS.WritableStream = process.stdout) {}

  open(): void {}

  draw(text: string): void {
    this.out.write(text + '\n\n');
  }

  close(): void {}
}

export function createScreen(capability: RendererCapability): Screen {
  return capability === 'rich' ? new AlternateScreen() : new StreamScreen();
}

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { AlternateScreen, StreamScreen, createScreen } from '../../src/display/screen.js';

function sink() {
  const chunks: string[] = [];
  const out = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { out, chunks };
}

describe('StreamScreen', () => {
  it('appends each frame followed by a blank line', () => {
    const { out, chunks } = sink();
    const screen = new StreamScreen(out);

    screen.open();
    screen.draw('frame 1');
    screen.draw('frame 2');
    screen.close();

    expect(chunks.join('')).toBe('frame 1\n\nframe 2\n\n');
  });
});

describe('AlternateScreen', () => {
  it('switches buffers around the frames it draws', () => {
    const { out, chunks } = sink();
    const screen = new AlternateScreen(out);

    screen.open();
    screen.draw('frame 1');
    screen.close();

    const written = chunks.join('');
    expect(written.startsWith('\x1b[?1049h\x1b[?25l')).toBe(true);
    expect(written).toContain('frame 1\n');
    expect(written.endsWith('\x1b[?25h\x1b[?1049l')).toBe(true);
  });

  it('draws nothing unless open', () => {
    const { out, chunks } = sink();
    const screen = new AlternateScreen(out);

    screen.draw('too early');
    expect(chunks).toEqual([]);

    screen.open();
    screen.close();
    const written = chunks.length;
    screen.draw('too late');

    expect(chunks).toHaveLength(written);
  });
});

describe('createScreen', () => {
  it('redraws in place for rich output', () => {
    expect(createScreen('rich')).toBeInstanceOf(AlternateScreen);
  });

  it('streams plain output', () => {
    expect(createScreen('plain')).toBeInstanceOf(StreamScreen);
  });
});

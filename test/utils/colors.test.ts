import { describe, it, expect } from 'vitest';
import colors, { createColors, detectColorSupport } from '../../src/utils/colors.js';

describe('Colors Utility', () => {
  describe('detectColorSupport', () => {
    it('respects NO_COLOR even on a TTY', () => {
      expect(detectColorSupport({ NO_COLOR: '' }, true)).toBe(false);
    });

    it('honors FORCE_COLOR without a TTY', () => {
      expect(detectColorSupport({ FORCE_COLOR: '1' }, false)).toBe(true);
    });

    it('disables colors on a dumb terminal', () => {
      expect(detectColorSupport({ TERM: 'dumb' }, true)).toBe(false);
    });

    it('enables colors on a TTY', () => {
      expect(detectColorSupport({}, true)).toBe(true);
    });

    it('enables colors in CI', () => {
      expect(detectColorSupport({ CI: 'true' }, false)).toBe(true);
    });

    it('disables colors when piped', () => {
      expect(detectColorSupport({}, false)).toBe(false);
    });
  });

  describe('createColors', () => {
    it('wraps text in ANSI codes when enabled', () => {
      const paint = createColors(true);
      expect(paint.red('hot')).toBe('\x1b[31mhot\x1b[39m');
      expect(paint.dim('x')).toBe('\x1b[2mx\x1b[22m');
    });

    it('nests codes', () => {
      const paint = createColors(true);
      expect(paint.bold(paint.red('hot'))).toBe('\x1b[1m\x1b[31mhot\x1b[39m\x1b[22m');
    });

    it('reopens an outer style after an inner one closes', () => {
      const paint = createColors(true);
      expect(paint.red(`a${paint.blue('b')}c`)).toBe('\x1b[31ma\x1b[34mb\x1b[31mc\x1b[39m');
    });

    it('returns plain text when disabled', () => {
      const paint = createColors(false);
      expect(paint.enabled).toBe(false);
      expect(paint.bold(paint.red('hot'))).toBe('hot');
      expect(paint.gray(42)).toBe('42');
    });
  });

  it('exports a default palette', () => {
    expect(typeof colors.cyan).toBe('function');
    expect(typeof colors.enabled).toBe('boolean');
  });
});

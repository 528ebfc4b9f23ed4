import { describe, it, expect } from 'vitest';
import { createColors, detectColorSupport } from '../../src/utils/colors.js';

describe('Colors Utility', () => {
  describe('detectColorSupport', () => {
    it('should honour NO_COLOR over everything else', () => {
      expect(detectColorSupport({ NO_COLOR: '', FORCE_COLOR: '1' }, true)).toBe(false);
    });

    it('should honour FORCE_COLOR without a TTY', () => {
      expect(detectColorSupport({ FORCE_COLOR: '1' }, false)).toBe(true);
    });

    it('should disable colors on a dumb terminal', () => {
      expect(detectColorSupport({ TERM: 'dumb' }, true)).toBe(false);
    });

    it('should follow the TTY, then CI', () => {
      expect(detectColorSupport({}, true)).toBe(true);
      expect(detectColorSupport({}, false)).toBe(false);
      expect(detectColorSupport({ CI: 'true' }, false)).toBe(true);
    });
  });

  describe('createColors', () => {
    it('should wrap text in ANSI codes when enabled', () => {
      const c = createColors(true);
      expect(c.red('error')).toBe('\x1b[31merror\x1b[39m');
      expect(c.bold(200)).toBe('\x1b[1m200\x1b[22m');
    });

    it('should re-open the outer style after a nested close', () => {
      const c = createColors(true);
      expect(c.bold(c.red('x') + 'y')).toBe('\x1b[1m\x1b[31mx\x1b[39my\x1b[22m');
      expect(c.green(`a ${c.red('b')} c`)).toBe('\x1b[32ma \x1b[31mb\x1b[32m c\x1b[39m');
    });

    it('should return plain strings when disabled', () => {
      const c = createColors(false);
      expect(c.enabled).toBe(false);
      expect(c.cyan('url')).toBe('url');
      expect(c.gray(404)).toBe('404');
    });
  });
});

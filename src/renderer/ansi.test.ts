import { describe, it, expect } from 'vitest';
import {
  fg,
  style,
  styled,
  stripAnsi,
  visibleLength,
  truncateVisible,
  padVisible,
  centerOffset,
} from './ansi';

describe('ansi helpers', () => {
  describe('stripAnsi', () => {
    it('should remove SGR sequences', () => {
      expect(stripAnsi('\x1b[31mred\x1b[0m')).toBe('red');
      expect(stripAnsi('\x1b[1;34mbold blue\x1b[0m')).toBe('bold blue');
    });

    it('should leave plain text alone', () => {
      expect(stripAnsi('plain')).toBe('plain');
    });
  });

  describe('visibleLength', () => {
    it('should ignore escape sequences', () => {
      expect(visibleLength(`${fg.green}ok${style.reset}`)).toBe(2);
    });

    it('should count terminal columns, with wide characters taking two', () => {
      expect(visibleLength('📁 src')).toBe(6);
      expect(visibleLength('漢字')).toBe(4);
      expect(visibleLength('█▒░')).toBe(3);
    });
  });

  describe('styled', () => {
    it('should wrap text in styles and a reset', () => {
      expect(styled('x', fg.red, style.bold)).toBe('\x1b[31m\x1b[1mx\x1b[0m');
    });

    it('should return text unchanged with no styles', () => {
      expect(styled('x')).toBe('x');
    });
  });

  describe('truncateVisible', () => {
    it('should keep short strings as they are', () => {
      expect(truncateVisible('hello', 10)).toBe('hello');
    });

    it('should cut plain text to width', () => {
      expect(truncateVisible('hello world', 5)).toBe('hello');
    });

    it('should keep escapes and close them with a reset', () => {
      expect(truncateVisible('\x1b[31mhello\x1b[0m', 3)).toBe('\x1b[31mhel\x1b[0m');
    });

    it('should drop a wide character that would cross the edge', () => {
      expect(truncateVisible('漢字x', 3)).toBe('漢');
      expect(truncateVisible('漢字x', 4)).toBe('漢字');
    });
  });

  describe('padVisible', () => {
    it('should pad left aligned text on the right', () => {
      expect(padVisible('ab', 5)).toBe('ab   ');
    });

    it('should pad right aligned text on the left', () => {
      expect(padVisible('ab', 5, 'right')).toBe('   ab');
    });

    it('should put the odd column on the right when centering', () => {
      expect(padVisible('ab', 5, 'center')).toBe(' ab  ');
    });

    it('should truncate text wider than the cell', () => {
      expect(padVisible('abcdef', 3)).toBe('abc');
    });

    it('should fill a cell exactly when a wide character is cut', () => {
      expect(padVisible('漢字x', 3)).toBe('漢 ');
      expect(padVisible('📁', 4, 'right')).toBe('  📁');
    });

    it('should pad by visible width for colored text', () => {
      expect(padVisible('\x1b[32mok\x1b[0m', 4)).toBe('\x1b[32mok\x1b[0m  ');
    });
  });

  describe('centerOffset', () => {
    it('should center text inside the width', () => {
      expect(centerOffset('abc', 10)).toBe(3);
    });

    it('should never go negative', () => {
      expect(centerOffset('abcdef', 4)).toBe(0);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { formatCodePoint, nonAsciiChars, toHex } from './codepoints';

describe('nonAsciiChars', () => {
  it('skips ASCII, including DEL', () => {
    expect([...nonAsciiChars('plain text ~\x7f')]).toEqual([]);
  });

  it('yields characters in order with their hex form', () => {
    expect([...nonAsciiChars('café — ok')]).toEqual([
      { char: 'é', codePoint: 0xe9, hex: 'e9' },
      { char: '—', codePoint: 0x2014, hex: '2014' },
    ]);
  });

  it('keeps astral characters whole', () => {
    expect([...nonAsciiChars('a😀b')]).toEqual([
      { char: '😀', codePoint: 0x1f600, hex: '1f600' },
    ]);
  });

  it('yields repeats per occurrence by default', () => {
    expect([...nonAsciiChars('éé')].map((c) => c.hex)).toEqual(['e9', 'e9']);
  });

  it('collapses repeats within the text when deduplicating', () => {
    expect([...nonAsciiChars('éaéü', { dedupe: true })].map((c) => c.hex)).toEqual(['e9', 'fc']);
  });

  it('reports a lone surrogate as its own code point', () => {
    expect([...nonAsciiChars('x\ud800y')].map((c) => c.hex)).toEqual(['d800']);
  });
});

describe('toHex', () => {
  it('matches printf %x', () => {
    expect(toHex(233)).toBe('e9');
    expect(toHex(0x80)).toBe('80');
    expect(toHex(0xfeff)).toBe('feff');
  });
});

describe('formatCodePoint', () => {
  it('uppercases behind a U+ prefix', () => {
    expect(formatCodePoint('e9')).toBe('U+E9');
    expect(formatCodePoint('1f600')).toBe('U+1F600');
  });
});

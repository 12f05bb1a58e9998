import { describe, it, expect } from 'vitest';
import { isBlankItem, isValidEmail } from '../validation';

describe('isValidEmail', () => {
  it('requires a top-level label of at least two letters', () => {
    expect(isValidEmail('a@b')).toBe(false);
    expect(isValidEmail('a@b.c')).toBe(false);
    expect(isValidEmail('a@b.co')).toBe(true);
    expect(isValidEmail('first.last+tag@sub.example.org')).toBe(true);
  });

  it('rejects any non-ASCII character regardless of shape', () => {
    const eAcute = String.fromCharCode(0xe9);
    expect(isValidEmail(`jos${eAcute}@example.com`)).toBe(false);
    expect(isValidEmail(`a@b.co${String.fromCharCode(0x200f)}`)).toBe(false);
  });

  it('trims surrounding whitespace and rejects blanks', () => {
    expect(isValidEmail('  a@b.co  ')).toBe(true);
    expect(isValidEmail('   ')).toBe(false);
    expect(isValidEmail('a b@c.co')).toBe(false);
  });
});

describe('isBlankItem', () => {
  it('is true only when both fields are blank', () => {
    expect(isBlankItem(' ', '\n')).toBe(true);
    expect(isBlankItem('', 'note')).toBe(false);
    expect(isBlankItem('Crack on wall', '')).toBe(false);
  });
});

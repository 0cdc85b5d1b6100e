import { describe, it, expect } from 'vitest';
import { parseCorrectableTag, parseItemTag, toTagCode } from '../tags';

describe('parseItemTag', () => {
  it('accepts names in any case and short codes', () => {
    expect(parseItemTag('Recurring')).toBe('recurring');
    expect(parseItemTag(' IN ')).toBe('income');
    expect(parseItemTag('d')).toBe('debt');
    expect(parseItemTag('Unknown')).toBe('unknown');
  });

  it('returns null for anything else', () => {
    expect(parseItemTag('groceries')).toBeNull();
    expect(parseItemTag('')).toBeNull();
  });
});

describe('parseCorrectableTag', () => {
  it('never yields unknown', () => {
    expect(parseCorrectableTag('unknown')).toBeNull();
    expect(parseCorrectableTag('S')).toBe('savings');
  });
});

describe('toTagCode', () => {
  it('emits legacy codes', () => {
    expect(toTagCode('budget')).toBe('B');
    expect(toTagCode('income')).toBe('IN');
    expect(toTagCode('unknown')).toBe('');
  });
});

import { describe, it, expect } from 'vitest';
import { columnLetter, plural, truncate } from '../../src/utils/strings.js';

describe('truncate', () => {
  it('leaves short strings alone', () => {
    expect(truncate('Revenue', 10)).toBe('Revenue');
  });

  it('cuts long strings and appends an ellipsis', () => {
    expect(truncate('Quarterly revenue', 10)).toBe('Quarter...');
  });
});

describe('plural', () => {
  it('uses the singular for one', () => {
    expect(plural(1, 'block')).toBe('1 block');
  });

  it('adds an s otherwise', () => {
    expect(plural(0, 'break')).toBe('0 breaks');
    expect(plural(3, 'block')).toBe('3 blocks');
  });
});

describe('columnLetter', () => {
  it('maps the first 26 columns to letters', () => {
    expect(columnLetter(0)).toBe('A');
    expect(columnLetter(25)).toBe('Z');
  });

  it('labels later columns by index', () => {
    expect(columnLetter(26)).toBe('Col26');
  });
});

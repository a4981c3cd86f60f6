import { describe, it, expect } from 'vitest';
import { detectEmphasis, stripEmphasis } from '@/lib/emphasis';

describe('detectEmphasis', () => {
  it('prefers the strongest marker on the line', () => {
    expect(detectEmphasis('**Run** and *hide*')).toBe('bold-italic');
    expect(detectEmphasis('__Loud__ words.')).toBe('bold-italic');
    expect(detectEmphasis('Just *this*.')).toBe('bold');
    expect(detectEmphasis('An _aside_.')).toBe('italic');
    expect(detectEmphasis('Plain words.')).toBeUndefined();
  });
});

describe('stripEmphasis', () => {
  it('removes markers and keeps the words', () => {
    expect(stripEmphasis('**Run** and *hide*, __now__ or _never_')).toBe('Run and hide, now or never');
  });
});

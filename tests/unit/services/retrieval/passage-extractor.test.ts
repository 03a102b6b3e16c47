import { describe, it, expect } from 'vitest';
import { extractPassageText, toPassage } from '../../../../src/services/retrieval/passage-extractor.js';

describe('extractPassageText', () => {
  it('prefers page_content, then text, then content', () => {
    expect(extractPassageText({ page_content: 'A', text: 'B', content: 'C' })).toBe('A');
    expect(extractPassageText({ text: 'B', content: 'C' })).toBe('B');
    expect(extractPassageText({ content: 'C' })).toBe('C');
  });

  it('skips blank and non-string fields', () => {
    expect(extractPassageText({ page_content: '   ', text: 42, content: 'Actuators' })).toBe('Actuators');
  });

  it('returns null when no field is usable', () => {
    expect(extractPassageText({ title: 'Chapter 1' })).toBeNull();
    expect(extractPassageText(null)).toBeNull();
    expect(extractPassageText(undefined)).toBeNull();
  });
});

describe('toPassage', () => {
  it('moves the remaining payload into metadata', () => {
    const passage = toPassage({
      id: 7,
      score: 0.82,
      payload: { text: 'ZMP keeps the robot balanced.', chapter: 3, source: 'ch3.md' }
    });

    expect(passage).toEqual({
      id: 7,
      text: 'ZMP keeps the robot balanced.',
      score: 0.82,
      metadata: { chapter: 3, source: 'ch3.md' }
    });
  });

  it('returns null for hits without text', () => {
    expect(toPassage({ id: 'x', score: 0.5, payload: null })).toBeNull();
  });
});

import {
  deriveAnalysisFields,
  extractDominantColors,
  extractHasPeople,
  extractTextElements,
} from '../cache/analysis-fields.js';

describe('analysis field extraction', () => {
  it('reads dominant colors and drops non-string entries', () => {
    expect(extractDominantColors({ colors: { dominant_colors: ['red', 3, 'navy blue', null] } })).toEqual([
      'red',
      'navy blue',
    ]);
  });

  it('returns no colors when the shape does not match', () => {
    expect(extractDominantColors({ colors: 'red' })).toEqual([]);
    expect(extractDominantColors({})).toEqual([]);
  });

  it('treats a non-blank people description as people present', () => {
    expect(extractHasPeople({ people_description: 'Two runners on a track' })).toBe(true);
    expect(extractHasPeople({ people_description: '   ' })).toBe(false);
    expect(extractHasPeople({ people_description: ['a person'] })).toBe(false);
  });

  it('flattens string and array text elements in insertion order', () => {
    expect(
      extractTextElements({
        text_elements: {
          headline: 'Summer Sale',
          body_text: ['Up to 50% off', 7, 'Today only'],
          legal: { small_print: 'ignored' },
          call_to_action: 'Shop now',
        },
      })
    ).toEqual(['Summer Sale', 'Up to 50% off', 'Today only', 'Shop now']);
  });

  it('derives empty defaults without an analysis', () => {
    expect(deriveAnalysisFields()).toEqual({ dominantColors: [], hasPeople: false, textElements: [] });
  });

  it('derives all fields from one analysis', () => {
    expect(
      deriveAnalysisFields({
        colors: { dominant_colors: ['teal'] },
        people_description: 'A chef',
        text_elements: { headline: 'Fresh' },
      })
    ).toEqual({ dominantColors: ['teal'], hasPeople: true, textElements: ['Fresh'] });
  });
});

import { DEFAULT_MATCHING_CONFIG, resolveMatchingConfig } from '../matching';
import { InvalidInputError } from '../../utils/errorHandler';

describe('resolveMatchingConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveMatchingConfig()).toEqual({
      similarityThreshold: 0.75,
      weakMatchThreshold: 0.85,
      relevanceWeight: 0.7,
      completenessWeight: 0.3,
      strongMin: 75,
      moderateMin: 45,
      suggestionCap: 10
    });
  });

  it('applies overrides onto the given base without mutating it', () => {
    const base = resolveMatchingConfig({ suggestionCap: 3 });

    const config = resolveMatchingConfig({ similarityThreshold: 0.6, strongMin: 80, moderateMin: undefined }, base);

    expect(config).toMatchObject({ similarityThreshold: 0.6, strongMin: 80, moderateMin: 45, suggestionCap: 3 });
    expect(base.similarityThreshold).toBe(0.75);
    expect(DEFAULT_MATCHING_CONFIG.suggestionCap).toBe(10);
  });

  const invalidOverrides: Array<[string, unknown, string]> = [
    ['a non-object', 'strict', 'Matching config overrides must be an object'],
    ['an array', [], 'Matching config overrides must be an object'],
    ['an unknown key', { threshold: 0.5 }, 'Unknown matching config option "threshold"'],
    ['a non-numeric value', { strongMin: '80' }, 'Matching config "strongMin" must be a finite number'],
    ['a threshold above 1', { similarityThreshold: 1.2, weakMatchThreshold: 1 }, 'similarityThreshold must be within [0, 1]'],
    ['a weak threshold below the match threshold', { weakMatchThreshold: 0.5 }, 'weakMatchThreshold must be within [similarityThreshold, 1]'],
    ['a negative weight', { relevanceWeight: -1 }, 'Score weights must not be negative'],
    ['two zero weights', { relevanceWeight: 0, completenessWeight: 0 }, 'Score weights must not both be zero'],
    ['inverted role-fit boundaries', { moderateMin: 80 }, 'moderateMin must not exceed strongMin'],
    ['a fractional suggestion cap', { suggestionCap: 2.5 }, 'suggestionCap must be a non-negative integer']
  ];

  it.each(invalidOverrides)('rejects %s', (_label, overrides, message) => {
    expect(() => resolveMatchingConfig(overrides)).toThrow(InvalidInputError);
    expect(() => resolveMatchingConfig(overrides)).toThrow(message);
  });
});

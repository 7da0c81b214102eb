import { describe, expect, it } from 'vitest';
import {
  cleanTitle,
  collapseAgeStatement,
  createProductKey,
  deduplicateTokens,
  filterStopwords,
  foldAccents,
  isAgeToken,
  normalizeForMatching,
  normalizeSpellingVariants,
  stripCommercialNoise,
  stripPossessivesAndSymbols,
  titleCase,
} from '../src/text-normalizer.js';
import { loadVocabulary } from '../src/vocabulary.js';

const vocabulary = loadVocabulary();

describe('foldAccents', () => {
  it('replaces accented letters instead of dropping them', () => {
    expect(foldAccents('Tread Softly Rosé Wine')).toBe('Tread Softly Rose Wine');
    expect(foldAccents('Crème Brûlée')).toBe('Creme Brulee');
  });

  it('expands letters without a combining form', () => {
    expect(foldAccents('Straße')).toBe('Strasse');
    expect(foldAccents('Ørsted Æble')).toBe('Orsted AEble');
  });

  it('leaves plain ASCII alone', () => {
    expect(foldAccents('Grey Goose Vodka')).toBe('Grey Goose Vodka');
  });

  it('keeps the marks of non-Latin letters', () => {
    expect(foldAccents('Йогурт ёлка')).toBe('Йогурт ёлка');
    expect(foldAccents('Café Йогурт')).toBe('Cafe Йогурт');
  });
});

describe('stripPossessivesAndSymbols', () => {
  it('joins possessives and turns punctuation into spaces', () => {
    expect(stripPossessivesAndSymbols("Jack Daniel's Tennessee Whiskey & Cola")).toBe(
      'Jack Daniels Tennessee Whiskey Cola',
    );
  });

  it('handles curly apostrophes', () => {
    expect(stripPossessivesAndSymbols('Gordon’s Gin')).toBe('Gordons Gin');
  });
});

describe('stripCommercialNoise', () => {
  it('removes sizes, strength, asides and gift words', () => {
    expect(stripCommercialNoise('Kestrel Ridge Gin 70cl 40% vol Gift Box (Batch 2)', vocabulary)).toBe(
      'Kestrel Ridge Gin',
    );
  });

  it('removes multipack formats and years', () => {
    expect(stripCommercialNoise('Copper Fox Sour 12x440ml 2023', vocabulary)).toBe('Copper Fox Sour');
  });

  it('keeps a year that belongs to the brand', () => {
    expect(stripCommercialNoise('Distillery 1757 Gin 2019', vocabulary, 'Distillery 1757')).toBe(
      'Distillery 1757 Gin',
    );
  });
});

describe('collapseAgeStatement', () => {
  it('shortens age statements to a yr token', () => {
    expect(collapseAgeStatement('Glen Test 12 Year Old Whisky', 'suffix')).toBe('Glen Test 12yr Whisky');
    expect(collapseAgeStatement('Glen Test 18-year-old', 'suffix')).toBe('Glen Test 18yr');
    expect(collapseAgeStatement('Glen Test 21yo', 'suffix')).toBe('Glen Test 21yr');
  });

  it('drops age statements', () => {
    expect(collapseAgeStatement('Glen Test 12 Year Old Whisky', 'drop')).toBe('Glen Test Whisky');
  });

  it('recognises yr tokens', () => {
    expect(isAgeToken('16yr')).toBe(true);
    expect(isAgeToken('16')).toBe(false);
    expect(isAgeToken('year')).toBe(false);
  });
});

describe('deduplicateTokens', () => {
  it('keeps the first occurrence, ignoring case', () => {
    expect(deduplicateTokens(['Absolut', 'Vodka', 'absolut'])).toEqual(['Absolut', 'Vodka']);
  });

  it('treats plural and singular forms as one word when asked', () => {
    expect(deduplicateTokens(['Cats', 'cat', 'Food'], { singularize: true })).toEqual(['Cats', 'Food']);
    expect(deduplicateTokens(['box', 'boxes'], { singularize: true })).toEqual(['box']);
    expect(deduplicateTokens(['Cats', 'cat', 'Food'])).toEqual(['Cats', 'cat', 'Food']);
  });
});

describe('filterStopwords', () => {
  it('compares folded lower-case tokens', () => {
    expect(filterStopwords(['The', 'Sweet', 'Oak'], new Set(['the', 'sweet']))).toEqual(['Oak']);
  });
});

describe('titleCase', () => {
  it('capitalises the first letter only', () => {
    expect(titleCase(['hELLO', '16yr', 'ipa'])).toEqual(['Hello', '16yr', 'Ipa']);
  });
});

describe('spelling variants', () => {
  it('rewrites alternates to the canonical spelling', () => {
    expect(normalizeSpellingVariants('Grey Whiskey', vocabulary.spellingVariants)).toBe('Grey whisky');
  });

  it('normalizes titles for matching', () => {
    expect(normalizeForMatching("Jameson Irish Whiskey", vocabulary.spellingVariants)).toBe('jameson irish whisky');
    expect(normalizeForMatching('Gray Dog-Bed', vocabulary.spellingVariants)).toBe('grey dog bed');
  });
});

describe('cleanTitle', () => {
  const options = { noise: vocabulary, ageStatements: 'suffix' as const };

  it('runs the whole cleanup', () => {
    expect(cleanTitle('Glen Test 12 Year Old Whisky 70cl (Gift Box)', options)).toBe('Glen Test 12yr Whisky');
    expect(cleanTitle('Domaine Élise Rosé 2023 75cl', options)).toBe('Domaine Elise Rose');
  });

  it('is idempotent', () => {
    const titles = [
      'Personalised Luxury Grey Goose Vodka Hamper Gift',
      "Jack Daniel's Old No. 7 Tennessee Whiskey 1L",
      'Buy Old Mill Pale Ale 500ml Special Offer',
      'Blantons Single Barrel Bourbon 750ml',
    ];
    for (const title of titles) {
      const once = cleanTitle(title, options);
      expect(cleanTitle(once, options)).toBe(once);
    }
  });
});

describe('createProductKey', () => {
  it('builds a lower-case alphanumeric key', () => {
    expect(createProductKey("Jack Daniel's No. 7 — Gift")).toBe('jack daniels no 7 gift');
    expect(createProductKey('Rosé  Wine')).toBe('rose wine');
  });
});

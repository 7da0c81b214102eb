import { beforeAll, describe, expect, it } from 'vitest';
import { TaxonomyLoadError, UnknownProductTypeError } from '../src/errors.js';
import { deriveKeywords, TaxonomyIndex } from '../src/taxonomy-index.js';
import { loadTaxonomyCsv, parseTaxonomyCsv } from '../src/taxonomy-loader.js';
import type { TaxonomyRow } from '../src/types.js';
import { loadVocabulary } from '../src/vocabulary.js';

const vocabulary = loadVocabulary();

describe('parseTaxonomyCsv', () => {
  it('reads rows and drops empty levels', () => {
    const rows = parseTaxonomyCsv(
      [
        'Product Type,Level 1,Level 2,Level 3',
        'Pets,Dog Supplies,Dog Food,Dry Dog Food',
        'Pets,Dog Supplies,Dog Toys,',
        'Pets,,Orphan,',
        'Pets,Cat Supplies,,Stray Level 3',
      ].join('\n'),
    );

    expect(rows).toEqual([
      { productType: 'Pets', level1: 'Dog Supplies', level2: 'Dog Food', level3: 'Dry Dog Food' },
      { productType: 'Pets', level1: 'Dog Supplies', level2: 'Dog Toys' },
      { productType: 'Pets', level1: 'Cat Supplies' },
    ]);
  });

  it('reports a missing file as an unavailable source', async () => {
    await expect(loadTaxonomyCsv('does-not-exist/taxonomy.csv')).rejects.toBeInstanceOf(TaxonomyLoadError);
  });
});

describe('deriveKeywords', () => {
  it('adds the phrase, bigrams, non-generic tokens and spelling variants', () => {
    expect([...deriveKeywords('Scotch Whisky', vocabulary)].sort()).toEqual([
      'scotch',
      'scotch whiskey',
      'scotch whiskeys',
      'scotch whiskies',
      'scotch whisky',
    ]);
  });

  it('applies enrichment additions and removals', () => {
    const keywords = deriveKeywords('Camera Lenses', vocabulary, {
      match: 'Lenses',
      add: ['lens', 'canon'],
      remove: ['canon'],
    });
    expect([...keywords].sort()).toEqual(['camera lenses', 'lens']);
  });

  it('gives "Other" no keywords', () => {
    expect(deriveKeywords('Other', vocabulary).size).toBe(0);
  });
});

describe('TaxonomyIndex', () => {
  let taxonomy: TaxonomyIndex;

  beforeAll(async () => {
    taxonomy = await TaxonomyIndex.fromCsv();
  });

  it('resolves aliases and case differences', () => {
    expect(taxonomy.resolveProductType('BWS')).toBe('Alcoholic Beverages');
    expect(taxonomy.resolveProductType('  pets ')).toBe('Pets');
  });

  it('knows types from the taxonomy and from the default label table', () => {
    expect(taxonomy.isKnownProductType('Pets')).toBe(true);
    expect(taxonomy.isKnownProductType('F&F (Later)')).toBe(true);
    expect(taxonomy.hasTaxonomy('F&F (Later)')).toBe(false);
    expect(taxonomy.isKnownProductType('Garden Gnomes')).toBe(false);
  });

  it('returns the configured default label', () => {
    expect(taxonomy.defaultLabel('Pets')).toBe('Pet Supplies');
    expect(taxonomy.defaultLabel('BWS')).toBe('Alcoholic Beverages');
    expect(() => taxonomy.defaultLabel('Garden Gnomes')).toThrow(UnknownProductTypeError);
  });

  it('falls back to the product type name when it has no configured label', () => {
    const index = new TaxonomyIndex([{ productType: 'Stationery', level1: 'Paper', level2: 'Notebooks' }]);
    expect(index.defaultLabel('stationery')).toBe('Stationery');
  });

  it('builds a tree per product type', () => {
    const roots = taxonomy.build('Pets');
    expect(roots.map(root => root.name)).toEqual(['Dog Supplies', 'Cat Supplies', 'Fish Supplies']);

    const dogFood = roots[0]?.children.find(child => child.name === 'Dog Food');
    expect(dogFood?.level).toBe(2);
    expect(dogFood?.id).toBe('Pets::Dog Supplies > Dog Food');
    expect(dogFood?.children.map(child => child.name)).toEqual(['Dry Dog Food', 'Wet Dog Food']);
    expect(dogFood?.keywords.has('pedigree')).toBe(true);
    expect(dogFood?.parent?.name).toBe('Dog Supplies');
  });

  it('caches and freezes built trees', () => {
    const first = taxonomy.build('Pets');
    expect(taxonomy.build('pets')).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first[0])).toBe(true);

    taxonomy.invalidate('pets');
    const rebuilt = taxonomy.build('Pets');
    expect(rebuilt).not.toBe(first);
    expect(rebuilt.map(node => node.id)).toEqual(first.map(node => node.id));
  });

  it('raises a load error for a known type without categories', () => {
    expect(() => taxonomy.build('F&F (Later)')).toThrow(TaxonomyLoadError);
  });

  it('lists leaf names without "Other"', () => {
    expect(taxonomy.leafNames('Luggage & Bags')).toEqual(['Backpacks', 'Cabin Suitcases', 'Handbags']);
  });

  it('finds the deepest node by name', () => {
    const rows: TaxonomyRow[] = [
      { productType: 'Furniture', level1: 'Beds', level2: 'Frames' },
      { productType: 'Furniture', level1: 'Bedroom', level2: 'Beds' },
    ];
    const index = new TaxonomyIndex(rows);
    expect(index.findByName('Furniture', 'beds')?.path).toEqual(['Bedroom', 'Beds']);
    expect(index.findByName('Furniture', 'Wardrobes')).toBeUndefined();
  });

  it('skips "Other" levels when building', () => {
    const index = new TaxonomyIndex([
      { productType: 'Toys', level1: 'Games', level2: 'Other', level3: 'Dice' },
      { productType: 'Toys', level1: 'Games', level2: 'Card Games' },
    ]);
    expect(index.nodes('Toys').map(node => node.path.join(' > '))).toEqual(['Games', 'Games > Card Games']);
  });

  it('rebuilds from new rows after a reload', () => {
    const index = new TaxonomyIndex([{ productType: 'Toys', level1: 'Games', level2: 'Board Games' }]);
    const before = index.build('Toys');
    index.reload([{ productType: 'Toys', level1: 'Games', level2: 'Card Games' }]);

    const after = index.build('Toys');
    expect(after).not.toBe(before);
    expect(index.leafNames('Toys')).toEqual(['Card Games']);
    expect(before[0]?.children[0]?.name).toBe('Board Games');
  });

  it('counts distinct categories', () => {
    const index = new TaxonomyIndex([
      { productType: 'Toys', level1: 'Games', level2: 'Board Games' },
      { productType: 'Toys', level1: 'Games', level2: 'Card Games', level3: 'Poker' },
      { productType: 'Hardware', level1: 'Tools' },
    ]);
    expect(index.getStats()).toMatchObject({ productTypes: 2, categories: 5 });
  });
});

import { describe, it, expect } from 'vitest';
import {
  analyze,
  analyzeItem,
  analyzeItems,
  buildSnippet,
  charLength,
  countWords,
  createExtractorConfig,
  detectClaims,
  detectKeywords,
  extractMeasurements,
  extractNumbers,
  normalizeText,
  sliceChars,
  splitSentences,
  DEFAULT_KEYWORDS,
} from './extractor.js';

const K2_18B =
  'Title: Discovery of Water Vapor on K2-18b. ' +
  'The exoplanet K2-18b, located 124 light-years away, was observed using Hubble. ' +
  'Spectral analysis revealed signatures consistent with water vapor. ' +
  'The planet has a radius of approximately 2.6 times that of Earth and an orbital period of 33 days. ' +
  'Methods included transit spectroscopy over 8 transits.';

describe('normalizeText', () => {
  it('collapses tabs, carriage returns and newlines to single spaces', () => {
    expect(normalizeText('  a\t\tb\r\nc   d \n')).toBe('a b c d');
  });

  it('returns empty string for empty input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText(' \n\t ')).toBe('');
  });

  it('is idempotent', () => {
    const once = normalizeText('x \n y\tz');
    expect(normalizeText(once)).toBe(once);
  });
});

describe('countWords', () => {
  it('counts space-separated tokens', () => {
    expect(countWords('one two three')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});

describe('splitSentences', () => {
  it('splits on terminal punctuation followed by whitespace', () => {
    expect(splitSentences('First one. Second? Third! Fourth')).toEqual([
      'First one.',
      'Second?',
      'Third!',
      'Fourth',
    ]);
  });

  it('does not split inside decimals', () => {
    expect(splitSentences('A radius of 2.6 units. Done.')).toEqual([
      'A radius of 2.6 units.',
      'Done.',
    ]);
  });

  it('splits after abbreviations (known limitation)', () => {
    expect(splitSentences('Dr. Smith observed it.')).toEqual(['Dr.', 'Smith observed it.']);
  });
});

describe('extractNumbers', () => {
  it('keeps order and duplicates', () => {
    expect(extractNumbers('3 then 1.5 then 3 again')).toEqual([3, 1.5, 3]);
  });

  it('attaches signs to decimals only', () => {
    expect(extractNumbers('-0.5 and -4 and +.25')).toEqual([-0.5, 4, 0.25]);
  });

  it('returns an empty list when there are no digits', () => {
    expect(extractNumbers('no digits here')).toEqual([]);
  });
});

describe('extractMeasurements', () => {
  it('captures value, unit and raw span', () => {
    expect(extractMeasurements('an orbital period of 33 days')).toEqual([
      { value: 33, unit: 'days', raw: '33 days' },
    ]);
  });

  it('accepts hyphen separators and glued units', () => {
    expect(extractMeasurements('a 5-km crater and 12% albedo')).toEqual([
      { value: 5, unit: 'km', raw: '5-km' },
      { value: 12, unit: '%', raw: '12%' },
    ]);
  });

  it('parses exponent values', () => {
    expect(extractMeasurements('about 1e3 km wide')).toEqual([
      { value: 1000, unit: 'km', raw: '1e3 km' },
    ]);
  });

  it('normalizes the micro sign to u', () => {
    expect(extractMeasurements('a 3 μm grain')).toEqual([
      { value: 3, unit: 'um', raw: '3 μm' },
    ]);
  });

  it('matches ordinary words as units', () => {
    expect(extractMeasurements('2.6 times that of Earth')).toEqual([
      { value: 2.6, unit: 'times', raw: '2.6 times' },
    ]);
  });
});

describe('detectKeywords', () => {
  it('reports vocabulary order, not occurrence order', () => {
    expect(detectKeywords('Period first, then ORBIT', ['orbit', 'period'])).toEqual(['orbit', 'period']);
  });

  it('reports each keyword once', () => {
    expect(detectKeywords('mass mass mass', ['mass', 'mass'])).toEqual(['mass']);
  });
});

describe('detectClaims', () => {
  const config = createExtractorConfig({ keywords: ['transit'], minClaimLength: 20 });

  it('keeps long sentences with a keyword or a measurement', () => {
    const sentences = [
      'A transit was seen by the telescope.',
      'The star dimmed over 4 hours overall.',
      'Nothing relevant is said in this line.',
      'Short transit.',
    ];
    expect(detectClaims(sentences, config)).toEqual([
      'A transit was seen by the telescope.',
      'The star dimmed over 4 hours overall.',
    ]);
  });

  it('measures the minimum length in characters', () => {
    const orbitConfig = createExtractorConfig({ keywords: ['orbit'], minClaimLength: 30 });
    const short = '🌍'.repeat(20) + ' orbit';
    const exact = '🌍'.repeat(24) + ' orbit';

    expect(short.length).toBe(46);
    expect(detectClaims([short, exact], orbitConfig)).toEqual([exact]);
  });
});

describe('buildSnippet', () => {
  it('returns the text unchanged when it fits', () => {
    expect(buildSnippet('short', 10)).toBe('short');
  });

  it('truncates and appends the marker', () => {
    expect(buildSnippet('abcdefghij', 4)).toBe('abcd...');
  });

  it('keeps astral characters whole at the cut point', () => {
    expect(buildSnippet('abc\u{1F680}def', 4)).toBe('abc🚀...');
    expect(buildSnippet('🚀🚀🚀', 3)).toBe('🚀🚀🚀');
  });
});

describe('character helpers', () => {
  it('count and slice by code point', () => {
    expect(charLength('a🚀b')).toBe(3);
    expect(sliceChars('a🚀b', 2)).toBe('a🚀');
  });
});

describe('createExtractorConfig', () => {
  it('uses the default vocabulary when none is given', () => {
    expect(createExtractorConfig().keywords).toEqual(DEFAULT_KEYWORDS);
  });

  it('falls back to defaults for an empty vocabulary', () => {
    expect(createExtractorConfig({ keywords: [] }).keywords).toEqual(DEFAULT_KEYWORDS);
  });

  it('lower-cases a custom vocabulary and freezes the config', () => {
    const config = createExtractorConfig({ keywords: ['Nebula', 'CME'] });
    expect(config.keywords).toEqual(['nebula', 'cme']);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.keywords)).toBe(true);
  });
});

describe('analyze', () => {
  it('returns an empty record for empty text', () => {
    expect(analyze('')).toEqual({
      wordCount: 0,
      sentenceCount: 0,
      numbers: [],
      measurements: [],
      keywords: [],
      claims: [],
      snippet: '',
    });
  });

  it('extracts the K2-18b paragraph', () => {
    const record = analyze(K2_18B);

    expect(record.wordCount).toBe(52);
    expect(record.sentenceCount).toBe(5);
    expect(record.numbers).toEqual([2, 18, 2, 18, 124, 2.6, 33, 8]);
    expect(record.measurements.map(m => m.raw)).toEqual([
      '18b',
      '18b',
      '124 light',
      '2.6 times',
      '33 days',
      '8 transits',
    ]);
    expect(record.keywords).toEqual([
      'exoplanet',
      'orbital',
      'orbit',
      'radius',
      'transit',
      'spectra',
      'period',
      'days',
      'light-years',
      'spectroscopy',
    ]);
    expect(record.claims).toHaveLength(5);
    expect(record.claims[3]).toBe(
      'The planet has a radius of approximately 2.6 times that of Earth and an orbital period of 33 days.',
    );
    expect(record.snippet).toBe(K2_18B);
  });

  it('keeps 124, 2.6 and 33 in relative order', () => {
    const { numbers } = analyze(K2_18B);
    const positions = [124, 2.6, 33].map(n => numbers.indexOf(n));
    expect(positions.every(p => p >= 0)).toBe(true);
    expect(positions).toEqual([...positions].sort((a, b) => a - b));
  });

  it('only reports keywords that occur in the text', () => {
    const record = analyze(K2_18B);
    const lower = normalizeText(K2_18B).toLowerCase();
    expect(record.keywords.length).toBeLessThanOrEqual(DEFAULT_KEYWORDS.length);
    for (const keyword of record.keywords) {
      expect(lower).toContain(keyword);
    }
  });

  it('gives the same record for normalized and raw text', () => {
    const messy = '  The  exoplanet\torbits\n\nevery 12.5 days.   Its mass is 3 units.  ';
    expect(analyze(normalizeText(messy))).toEqual(analyze(messy));
  });

  it('truncates the snippet at maxSnippetChars', () => {
    const config = createExtractorConfig({ maxSnippetChars: 10 });
    expect(analyze(K2_18B, config).snippet).toBe('Title: Dis...');
  });

  it('does not split an emoji when truncating the snippet', () => {
    const config = createExtractorConfig({ maxSnippetChars: 4 });
    expect(analyze('abc\u{1F680}def', config).snippet).toBe('abc\u{1F680}...');
  });

  it('returns a frozen record', () => {
    const record = analyze(K2_18B);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.numbers)).toBe(true);
  });
});

describe('analyzeItem', () => {
  it('wraps the analysis with item metadata', () => {
    const result = analyzeItem({ id: 'k2.txt', title: 'K2-18b', source: 'local_file', raw: K2_18B });
    expect(result.originalId).toBe('k2.txt');
    expect(result.title).toBe('K2-18b');
    expect(result.source).toBe('local_file');
    expect(result.analysis.wordCount).toBe(52);
  });

  it('treats a missing raw field as empty text', () => {
    const result = analyzeItem({ id: 'empty' });
    expect(result.analysis.wordCount).toBe(0);
    expect(result.analysis.snippet).toBe('');
  });

  it('analyzes a batch in order', () => {
    const results = analyzeItems([{ id: 'a', raw: 'one' }, { id: 'b', raw: 'one two' }]);
    expect(results.map(r => [r.originalId, r.analysis.wordCount])).toEqual([['a', 1], ['b', 2]]);
  });
});

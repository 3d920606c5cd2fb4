import { describe, it, expect } from 'vitest';
import {
  escapeText,
  styleSpan,
  clickSpan,
  spaces,
  displayWidth,
  tokenize,
  stripMarkup,
  markupWidth,
  truncateMarkup,
} from '../hud/markup.js';

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

describe('styleSpan', () => {
  it('should switch to the style and back to the reset style', () => {
    expect(styleSpan('LazyLine_1', 'main', 'Normal')).toBe('%#LazyLine_1#main%#Normal#');
  });
});

describe('escapeText', () => {
  it('should double every percent', () => {
    expect(escapeText('50% of 100%')).toBe('50%% of 100%%');
  });

  it('should leave text without percent alone', () => {
    expect(escapeText('main')).toBe('main');
  });
});

describe('clickSpan', () => {
  it('should wrap markup in a click region for the id', () => {
    expect(clickSpan(3, 'lazyline.click', 'go')).toBe('%3@lazyline.click@go%X');
  });
});

describe('spaces', () => {
  it('should repeat spaces', () => {
    expect(spaces(3)).toBe('   ');
  });

  it('should never go negative', () => {
    expect(spaces(-4)).toBe('');
  });
});

describe('displayWidth', () => {
  it('should count ASCII as one cell each', () => {
    expect(displayWidth('abc')).toBe(3);
  });

  it('should count CJK as two cells each', () => {
    expect(displayWidth('漢字')).toBe(4);
  });

  it('should count characters, not bytes', () => {
    expect(displayWidth('é')).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe('tokenize', () => {
  it('should split markers from text', () => {
    expect(tokenize('%#A#hi%#Normal#')).toEqual([
      { kind: 'marker', value: '%#A#' },
      { kind: 'text', value: 'hi' },
      { kind: 'marker', value: '%#Normal#' },
    ]);
  });

  it('should treat an escaped percent as text', () => {
    expect(tokenize('5%%')).toEqual([
      { kind: 'text', value: '5' },
      { kind: 'text', value: '%%' },
    ]);
  });

  it('should recognise click regions', () => {
    expect(tokenize('%12@fn@x%X')).toEqual([
      { kind: 'marker', value: '%12@fn@' },
      { kind: 'text', value: 'x' },
      { kind: 'marker', value: '%X' },
    ]);
  });
});

describe('stripMarkup', () => {
  it('should keep only visible text', () => {
    expect(stripMarkup('%2@h@%#A#50%%%#Normal#%X')).toBe('50%');
  });

  it('should leave plain text alone', () => {
    expect(stripMarkup('plain')).toBe('plain');
  });
});

describe('markupWidth', () => {
  it('should ignore markers', () => {
    expect(markupWidth('%2@h@%#A#50%%%#Normal#%X')).toBe(3);
  });
});

// ---------------------------------------------------------------------------
// Truncation
// ---------------------------------------------------------------------------

describe('truncateMarkup', () => {
  it('should cut visible text and keep the closing marker', () => {
    expect(truncateMarkup('%#A#hello%#Normal#', 3)).toBe('%#A#hel%#Normal#');
  });

  it('should keep the reset marker after an escaped percent', () => {
    const markup = styleSpan('LazyLine_1', escapeText('cpu 50%'), 'Normal');

    expect(truncateMarkup(markup, 5)).toBe('%#LazyLine_1#cpu 5%#Normal#');
    expect(truncateMarkup(markup, 7)).toBe('%#LazyLine_1#cpu 50%%%#Normal#');
  });

  it('should keep markers of components past the cut', () => {
    expect(truncateMarkup('%#A#ab%#Normal#%#B#cd%#Normal#', 3)).toBe(
      '%#A#ab%#Normal#%#B#c%#Normal#'
    );
  });

  it('should keep click regions balanced', () => {
    expect(truncateMarkup('%1@f@%#A#abc%#Normal#%X', 1)).toBe('%1@f@%#A#a%#Normal#%X');
  });

  it('should drop a wide character that would straddle the limit', () => {
    expect(truncateMarkup('漢字', 3)).toBe('漢');
  });

  it('should return only markers at width 0', () => {
    expect(truncateMarkup('%#A#abc%#Normal#', 0)).toBe('%#A#%#Normal#');
  });

  it('should not change text that already fits', () => {
    expect(truncateMarkup('%#A#ab%#Normal#', 10)).toBe('%#A#ab%#Normal#');
  });
});

// tests/unit/ReadmeAssembler.test.ts

import { describe, it, expect } from 'vitest';
import { assembleReadme, parseReadmeLines } from '../../src/core/readme/ReadmeAssembler';

describe('assembleReadme', () => {
  it('should end every line with a newline, including the last', () => {
    expect(assembleReadme([{ text: 'a' }, { text: 'b' }])).toBe('a\nb\n');
  });

  it('should return an empty string for no lines', () => {
    expect(assembleReadme([])).toBe('');
  });

  it('should treat a line without text as empty', () => {
    expect(assembleReadme([{}])).toBe('\n');
  });

  it('should keep blank lines and source order', () => {
    const lines = [{ text: '# Title' }, { text: '' }, { text: 'Body' }, {}, { text: '  indented' }];
    expect(assembleReadme(lines)).toBe('# Title\n\nBody\n\n  indented\n');
  });
});

describe('parseReadmeLines', () => {
  it('should keep string text and drop other fields', () => {
    expect(parseReadmeLines([{ text: 'ok', extra: 1 }])).toEqual([{ text: 'ok' }]);
  });

  it('should read records whose text is not a string as empty lines', () => {
    const lines = parseReadmeLines([{ text: 42 }, null, 'raw', { text: 'ok' }]);

    expect(lines).toEqual([{}, {}, {}, { text: 'ok' }]);
    expect(assembleReadme(lines)).toBe('\n\n\nok\n');
  });
});

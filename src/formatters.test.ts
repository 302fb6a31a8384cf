import { describe, it, expect } from 'vitest';
import {
  demoteHeadings,
  extractExamples,
  formatDescription,
  formatExample,
  formatInlineExample,
  formatType,
  inlineCode,
  safeReplace,
  schemaLink,
} from './formatters.js';

describe('schemaLink', () => {
  it('links to the lower-cased anchor', () => {
    expect(schemaLink('PetOwner')).toBe('[PetOwner](#petowner)');
  });
});

describe('formatType', () => {
  it('links references and expanded references', () => {
    expect(formatType({ $ref: '#/components/schemas/Pet' })).toBe('[Pet](#pet)');
    expect(formatType({ type: 'object', 'x-original-ref': '#/components/schemas/Pet' })).toBe('[Pet](#pet)');
  });

  it('describes maps', () => {
    expect(formatType({ type: 'object', additionalProperties: { type: 'integer' } })).toBe('object<string, integer>');
    expect(formatType({ type: 'object', additionalProperties: true })).toBe('object');
  });

  it('describes combinators', () => {
    expect(formatType({ anyOf: [{ type: 'string' }, { type: 'integer' }] })).toBe('anyOf<string , integer>');
    expect(formatType({ oneOf: [{ $ref: '#/components/schemas/A' }, { type: 'null' }] })).toBe('oneOf<[A](#a) , null>');
    expect(formatType({
      allOf: [{ $ref: '#/components/schemas/A' }, { type: 'object', properties: {} }],
    })).toBe('allOf<[A](#a) & object>');
  });

  it('describes arrays', () => {
    expect(formatType({ type: 'array', items: { type: 'string' } })).toBe('array<string>');
    expect(formatType({ type: 'array', items: { $ref: '#/components/schemas/Pet' } })).toBe('array<[Pet](#pet)>');
    expect(formatType({ type: 'array', items: { type: 'array', items: { type: 'number' } } })).toBe('array<array<number>>');
  });

  it('returns plain and union types', () => {
    expect(formatType({ type: 'boolean' })).toBe('boolean');
    expect(formatType({ type: ['string', 'null'] })).toBe('string | null');
    expect(formatType({ type: 'object', properties: { a: { type: 'string' } } })).toBe('object');
    expect(formatType({})).toBe('object');
  });
});

describe('formatDescription', () => {
  it('prefers description, then title', () => {
    expect(formatDescription({ description: 'D', title: 'T' })).toBe('D');
    expect(formatDescription({ description: '', title: 'T' })).toBe('T');
    expect(formatDescription({})).toBe('');
  });
});

describe('safeReplace', () => {
  it('turns line breaks and indented list items into <br>', () => {
    expect(safeReplace('first\nsecond')).toBe('first<br>second');
    expect(safeReplace('modes:  - fast  - slow')).toBe('modes:<br>- fast<br>- slow');
    expect(safeReplace(undefined)).toBe('');
  });
});

describe('formatExample', () => {
  it('pretty-prints structured values', () => {
    expect(formatExample({ a: 1 })).toBe('{\n  "a": 1\n}');
  });

  it('truncates long structured values', () => {
    expect(formatExample([1, 2, 3], 5)).toBe('[\n  1...');
  });

  it('stringifies scalars and ignores missing values', () => {
    expect(formatExample(42)).toBe('42');
    expect(formatExample(false)).toBe('false');
    expect(formatExample('text')).toBe('text');
    expect(formatExample(null)).toBe('');
    expect(formatExample(undefined)).toBe('');
  });
});

describe('formatInlineExample', () => {
  it('keeps strings and compacts everything else', () => {
    expect(formatInlineExample('abc')).toBe('abc');
    expect(formatInlineExample({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(formatInlineExample(7)).toBe('7');
  });

  it('should write strings with line breaks as JSON literals', () => {
    expect(formatInlineExample('a\nb')).toBe('"a\\nb"');
  });
});

describe('inlineCode', () => {
  it('should use a single backtick fence for plain text', () => {
    expect(inlineCode('abc')).toBe('`abc`');
  });

  it('should lengthen the fence past the longest backtick run', () => {
    expect(inlineCode('a`b')).toBe('``a`b``');
    expect(inlineCode('a``b`c')).toBe('```a``b`c```');
  });

  it('should pad text that starts or ends with a backtick or a space', () => {
    expect(inlineCode('`x')).toBe('`` `x ``');
    expect(inlineCode(' x ')).toBe('`  x  `');
  });
});

describe('demoteHeadings', () => {
  it('should move level one to three headings to level four', () => {
    expect(demoteHeadings('# A\n## B\n### C\n#### D\n##### E')).toBe('#### A\n#### B\n#### C\n#### D\n##### E');
  });

  it('should leave hashes that are not headings alone', () => {
    expect(demoteHeadings('Issue #12\n#hashtag')).toBe('Issue #12\n#hashtag');
  });
});

describe('extractExamples', () => {
  it('collects examples from the node and its schema in order', () => {
    const examples = extractExamples({
      example: 1,
      examples: {
        one: { summary: 'First', value: 'x' },
        two: { value: 'y' },
        raw: 5,
      },
      schema: { example: 'z', examples: ['p', 'q'] },
    });

    expect(examples).toEqual([
      { label: 'Example', value: 1 },
      { label: 'First', value: 'x' },
      { label: 'two', value: 'y' },
      { label: 'raw', value: 5 },
      { label: 'Example', value: 'z' },
      { label: 'Example 1', value: 'p' },
      { label: 'Example 2', value: 'q' },
    ]);
  });

  it('keeps an explicit null example', () => {
    expect(extractExamples({ example: null })).toEqual([{ label: 'Example', value: null }]);
  });

  it('returns nothing for nodes without examples', () => {
    expect(extractExamples({ type: 'string' })).toEqual([]);
  });
});

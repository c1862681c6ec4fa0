/**
 * Unit tests for the SAS lexer
 */

import {
  LineIndex,
  leadingKeyword,
  maskSource,
  sliceSpans,
  splitStatements,
  unquote,
} from '../sas-lexer';

describe('maskSource', () => {
  it('should blank block comments in both views', () => {
    const masked = maskSource('a /* x */ b;');

    expect(masked.withoutComments).toBe('a' + ' '.repeat(9) + 'b;');
    expect(masked.code).toBe('a' + ' '.repeat(9) + 'b;');
    expect(masked.comments).toEqual([{ start: 2, end: 9 }]);
  });

  it('should keep newlines inside masked comments', () => {
    const masked = maskSource('/* a\nb */x;');

    expect(masked.withoutComments).toBe(' '.repeat(4) + '\n' + ' '.repeat(4) + 'x;');
  });

  it('should mask string contents only in the code view', () => {
    const masked = maskSource('x = "a;b";');

    expect(masked.code).toBe(`x = "${' '.repeat(3)}";`);
    expect(masked.withoutComments).toBe('x = "a;b";');
  });

  it('should treat doubled quotes as part of the string', () => {
    const masked = maskSource("x = 'it''s';");

    expect(masked.code).toBe(`x = '${' '.repeat(5)}';`);
    expect(masked.unterminated).toEqual([]);
  });

  it('should recognise statement comments only at statement start', () => {
    const masked = maskSource('* note;\ny = 2 * 3;');

    expect(masked.withoutComments).toBe(' '.repeat(7) + '\ny = 2 * 3;');
    expect(masked.comments).toEqual([{ start: 0, end: 7 }]);
  });

  it('should mask macro comments anywhere', () => {
    const masked = maskSource('x = 1; %* skip me;');

    expect(masked.code).toBe('x = 1;' + ' '.repeat(12));
  });

  it('should report an unterminated block comment', () => {
    const masked = maskSource('a; /* open');

    expect(masked.unterminated).toHaveLength(1);
    expect(masked.unterminated[0]).toMatchObject({
      kind: 'unterminated-block',
      block: 'comment',
      offset: 3,
      line: 1,
    });
    expect(masked.code).toBe('a;' + ' '.repeat(8));
  });

  it('should report an unterminated string', () => {
    const masked = maskSource("x = 'abc");

    expect(masked.unterminated).toHaveLength(1);
    expect(masked.unterminated[0]).toMatchObject({ block: 'string', offset: 4 });
  });
});

describe('LineIndex', () => {
  it('should map offsets to 1-based lines', () => {
    const index = new LineIndex('a\nb\nc');

    expect(index.lineCount).toBe(3);
    expect(index.lineAt(0)).toBe(1);
    expect(index.lineAt(1)).toBe(1);
    expect(index.lineAt(2)).toBe(2);
    expect(index.lineAt(4)).toBe(3);
  });
});

describe('splitStatements', () => {
  it('should split on semicolons and keep a trailing fragment', () => {
    expect(splitStatements('a; b;c')).toEqual([
      { start: 0, end: 2, terminated: true },
      { start: 2, end: 5, terminated: true },
      { start: 5, end: 6, terminated: false },
    ]);
  });

  it('should reproduce the range when spans are concatenated', () => {
    const text = 'data x;\n  set y;\nrun;\n';
    expect(sliceSpans(text, splitStatements(text))).toBe(text);
  });

  it('should respect the requested range', () => {
    expect(splitStatements('a; b; c;', 3, 6)).toEqual([
      { start: 3, end: 5, terminated: true },
      { start: 5, end: 6, terminated: false },
    ]);
  });
});

describe('leadingKeyword', () => {
  it('should return the first word in lower case', () => {
    expect(leadingKeyword('  %LET x=1;')).toBe('%let');
    expect(leadingKeyword('\nLibName dwh oracle;')).toBe('libname');
    expect(leadingKeyword(' ;')).toBe('');
  });
});

describe('unquote', () => {
  it('should strip one level of quoting', () => {
    expect(unquote('"it""s"')).toBe('it"s');
    expect(unquote(" 'RISK_DB' ")).toBe('RISK_DB');
    expect(unquote('plain')).toBe('plain');
  });
});

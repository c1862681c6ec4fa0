/**
 * Unit tests for the statement segmenter
 */

import { StatementSegmenter, blockSpans } from '../statement-segmenter';

describe('StatementSegmenter', () => {
  let segmenter: StatementSegmenter;

  beforeEach(() => {
    segmenter = new StatementSegmenter();
  });

  describe('nesting', () => {
    const source = [
      '%macro outer(a, b);',
      '  %macro inner;',
      '    x = 1;',
      '  %mend inner;',
      '  proc sql; select * from lib.t; quit;',
      '%mend outer;',
      'data y; set z; run;',
    ].join('\n');

    it('should match nested definitions with a stack', () => {
      const result = segmenter.segment(source);

      expect(result.segments.map(segment => segment.kind)).toEqual(['macro', 'residual']);
      expect(result.macros.map(macro => macro.name)).toEqual(['outer', 'inner']);
      expect(result.macros[0].parameters).toBe('a, b');
      expect(result.anomalies).toEqual([]);
    });

    it('should keep child segments inside the enclosing macro', () => {
      const result = segmenter.segment(source);
      const outer = result.segments[0];
      if (outer.kind !== 'macro') throw new Error(`expected a macro segment, got ${outer.kind}`);

      expect(outer.children.map(segment => segment.kind)).toEqual([
        'residual',
        'macro',
        'residual',
        'query',
        'residual',
      ]);
      expect(result.queries).toHaveLength(1);
      expect(result.queries[0].owner?.name).toBe('outer');
      expect(result.queries[0].segment.terminated).toBe(true);
    });

    it('should cover the source without gaps', () => {
      const result = segmenter.segment(source);
      const rebuilt = result.segments.map(segment => source.slice(segment.start, segment.end)).join('');

      expect(rebuilt).toBe(source);
    });

    it('should end a macro after its %mend statement', () => {
      const result = segmenter.segment(source);
      const outer = result.macros[0];

      expect(source.slice(outer.start, outer.end).endsWith('%mend outer;')).toBe(true);
      expect(source.slice(outer.bodyEnd, outer.end)).toBe('%mend outer;');
    });
  });

  it('should run an unterminated macro to end of input', () => {
    const source = '%macro broken;\n  x = 1;\n';
    const result = segmenter.segment(source);

    expect(result.macros[0]).toMatchObject({ name: 'broken', end: source.length, terminated: false });
    expect(result.anomalies).toEqual([
      expect.objectContaining({ kind: 'unterminated-block', block: 'macro', name: 'broken', offset: 0, line: 1 }),
    ]);
  });

  it('should report a %mend without an open macro', () => {
    const result = segmenter.segment('%mend stray;\ndata x; run;');

    expect(result.macros).toEqual([]);
    expect(result.anomalies).toEqual([
      expect.objectContaining({ kind: 'unmatched-macro-end', name: 'stray', offset: 0 }),
    ]);
  });

  it('should close a macro even when %mend names another one', () => {
    const result = segmenter.segment('%macro a;\n%mend b;');

    expect(result.macros[0].terminated).toBe(true);
    expect(result.anomalies).toEqual([
      expect.objectContaining({ kind: 'mismatched-macro-end', expected: 'a', found: 'b', line: 2 }),
    ]);
  });

  it('should run an unterminated query to end of input', () => {
    const source = 'proc sql;\n select * from a.b;\n';
    const result = segmenter.segment(source);

    expect(result.queries[0].segment).toMatchObject({ terminated: false, bodyEnd: source.length });
    expect(result.anomalies).toEqual([
      expect.objectContaining({ kind: 'unterminated-block', block: 'query', offset: 0 }),
    ]);
  });

  it('should stop an unterminated query at the end of its macro', () => {
    const source = '%macro m;\nproc sql; select 1;\n%mend m;';
    const result = segmenter.segment(source);

    expect(result.macros[0].terminated).toBe(true);
    expect(result.queries[0].owner?.name).toBe('m');
    expect(result.queries[0].segment.end).toBe(source.indexOf('%mend'));
    expect(result.anomalies.map(anomaly => anomaly.kind)).toEqual(['unterminated-block']);
  });

  it('should ignore markers inside comments and strings', () => {
    const result = segmenter.segment("/* %macro fake; */\nx = '%mend';");

    expect(result.macros).toEqual([]);
    expect(result.anomalies).toEqual([]);
  });

  it('should leave nested definitions out of a block', () => {
    const source = '%macro outer;\n%macro inner;\n%mend inner;\nx = 1;\n%mend outer;';
    const result = segmenter.segment(source);
    const outer = result.macros[0];
    const text = blockSpans(result, outer).map(span => source.slice(span.start, span.end)).join('');

    expect(text).toBe('\n\nx = 1;\n');
  });
});

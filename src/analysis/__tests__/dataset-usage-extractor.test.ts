/**
 * Unit tests for the dataset usage extractor
 */

import { DatasetUsageExtractor, classifyDatasetStatement } from '../dataset-usage-extractor';
import { LibraryRegistry } from '../library-registry';
import { VariableResolver } from '../variable-resolver';
import { StatementSegmenter } from '../../parsers/statement-segmenter';
import { maskSource } from '../../parsers/sas-lexer';

const summarize = (statement: string) =>
  classifyDatasetStatement(statement).map(({ alias, table, direction }) => `${direction} ${alias}.${table}`);

function extract(source: string) {
  const masked = maskSource(source);
  const resolver = VariableResolver.fromSource(masked);
  const registry = LibraryRegistry.fromSource(masked, resolver);
  const segmentation = new StatementSegmenter().segmentMasked(masked);
  return new DatasetUsageExtractor(registry, resolver).extract(segmentation);
}

describe('classifyDatasetStatement', () => {
  it('should read DATA statement targets up to the options slash', () => {
    expect(summarize('data dwh.out(keep=a b) summary / view=summary;')).toEqual([
      'output dwh.out',
      'output work.summary',
    ]);
  });

  it('should read SET sources and skip statement options', () => {
    expect(summarize('set dwh.src(where=(x > 1)) stage.more end=eof;')).toEqual([
      'input dwh.src',
      'input stage.more',
    ]);
    expect(summarize('merge a(in=x) b;')).toEqual(['input work.a', 'input work.b']);
  });

  it('should read data= and out= options of procedure steps', () => {
    expect(summarize('proc sort data=dwh.src out=dwh.sorted nodupkey;')).toEqual([
      'input dwh.src',
      'output dwh.sorted',
    ]);
  });

  it('should ignore special names and macro statements', () => {
    expect(summarize('data _null_;')).toEqual([]);
    expect(summarize('%let x = 1;')).toEqual([]);
  });

  it('should look past macro conditions', () => {
    expect(summarize('%if &x %then data dwh.flag;')).toEqual(['output dwh.flag']);
  });
});

describe('DatasetUsageExtractor', () => {
  const source = [
    '%let lib = stage;',
    'libname dwh oracle;',
    'data dwh.out; set dwh.src; run;',
    'proc sort data=dwh.src out=dwh.sorted; by id; run;',
    'proc sql; create table x.y as select * from dwh.z; quit;',
    '%macro m;',
    '  data staging; merge work.a &lib..b; run;',
    '%mend m;',
  ].join('\n');

  it('should list each dataset once per direction in document order', () => {
    const usage = extract(source);

    expect(usage.inputs.map(reference => [reference.alias, reference.datasetName, reference.line])).toEqual([
      ['dwh', 'src', 3],
      ['work', 'a', 7],
      ['stage', 'b', 7],
    ]);
    expect(usage.outputs.map(reference => [reference.alias, reference.datasetName, reference.line])).toEqual([
      ['dwh', 'out', 3],
      ['dwh', 'sorted', 4],
      ['work', 'staging', 7],
    ]);
  });

  it('should resolve declared libraries to their handle', () => {
    const usage = extract(source);

    expect(usage.inputs[0].handle?.alias).toBe('dwh');
    expect(usage.inputs[1].handle).toBeUndefined();
  });

  it('should leave PROC SQL tables to the table-operation extractor', () => {
    const usage = extract(source);
    const names = [...usage.inputs, ...usage.outputs].map(reference => reference.datasetName);

    expect(names).not.toContain('y');
    expect(names).not.toContain('z');
  });
});

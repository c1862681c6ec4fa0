/**
 * Unit tests for the dependency graph builder
 */

import {
  DependencyGraphBuilder,
  TOP_LEVEL_CALLER,
  isReservedMacroWord,
  summarizeEdges,
} from '../dependency-graph-builder';
import { VariableResolver } from '../variable-resolver';
import { StatementSegmenter } from '../../parsers/statement-segmenter';
import { maskSource } from '../../parsers/sas-lexer';

function graphFor(source: string) {
  const masked = maskSource(source);
  const segmentation = new StatementSegmenter().segmentMasked(masked);
  return new DependencyGraphBuilder(VariableResolver.fromSource(masked)).build(segmentation);
}

const edgeTuples = (source: string) =>
  graphFor(source).edges.map(edge => [edge.caller, edge.callee, edge.kind]);

describe('DependencyGraphBuilder', () => {
  const chain = ['%macro A;', '  %B', '%mend A;', '%macro B;', '  %C(1)', '%mend B;', '%A'].join('\n');

  it('should tag calls to defined macros internal and others external', () => {
    expect(edgeTuples(chain)).toEqual([
      ['A', 'B', 'internal'],
      ['B', 'C', 'external'],
      [TOP_LEVEL_CALLER, 'A', 'internal'],
    ]);
  });

  it('should describe each macro definition', () => {
    const graph = graphFor(chain);

    expect(graph.macros.map(macro => [macro.name, macro.status, macro.invokes])).toEqual([
      ['A', 'used', ['B']],
      ['B', 'used', ['C']],
    ]);
    expect(graph.macros[0]).toMatchObject({ invokedAtTopLevel: true, invokedByMacro: false, line: 1 });
    expect(graph.macros[1]).toMatchObject({ invokedAtTopLevel: false, invokedByMacro: true, line: 4 });
    expect(graph.unusedMacros).toEqual([]);
    expect(graph.externalMacros).toEqual(['C']);
  });

  it('should keep repeated edges and self loops in the raw graph', () => {
    const graph = graphFor(
      ['%macro loader;', '  %step(1)', '  %step(2)', '  %loader', '%mend loader;'].join('\n')
    );

    expect(graph.edges).toHaveLength(3);
    expect(graph.summary).toEqual([
      { caller: 'loader', callee: 'step', kind: 'external', callCount: 2 },
      { caller: 'loader', callee: 'loader', kind: 'internal', callCount: 1 },
    ]);
    expect(graph.unusedMacros).toEqual(['loader']);
  });

  it('should ignore macro statements and built-in functions', () => {
    const graph = graphFor(
      [
        '%macro m;',
        '  %let x = 1;',
        '  %if &x = 1 %then %do; %put hi; %end;',
        '  %sysfunc(today())',
        '%mend m;',
      ].join('\n')
    );

    expect(graph.edges).toEqual([]);
    expect(graph.unusedMacros).toEqual(['m']);
  });

  it('should attribute calls in nested definitions to the nested macro', () => {
    const graph = graphFor(
      ['%macro outer;', '  %macro inner;', '    %helper', '  %mend inner;', '  %inner', '%mend outer;'].join('\n')
    );

    expect(graph.edges.map(edge => [edge.caller, edge.callee, edge.kind])).toEqual([
      ['inner', 'helper', 'external'],
      ['outer', 'inner', 'internal'],
    ]);
    expect(graph.macros.find(macro => macro.name === 'inner')).toMatchObject({ parent: 'outer', status: 'used' });
    expect(graph.macros.find(macro => macro.name === 'outer')?.status).toBe('unused');
  });

  it('should ignore invocations inside comments and strings', () => {
    expect(edgeTuples("/* %hidden */\nx = '%quoted';\n%real")).toEqual([[TOP_LEVEL_CALLER, 'real', 'external']]);
  });

  it('should list include targets', () => {
    const graph = graphFor("%include '/sas/common.sas';\n%inc setup / source2;");

    expect(graph.includes).toEqual([
      { target: '/sas/common.sas', quoted: true, offset: 0, line: 1 },
      { target: 'setup', quoted: false, offset: 28, line: 2 },
    ]);
    expect(graph.edges).toEqual([]);
  });

  it('should substitute variables in include targets', () => {
    const graph = graphFor('%let root = /sas;\n%include "&root/common.sas";');

    expect(graph.includes.map(include => include.target)).toEqual(['/sas/common.sas']);
  });
});

describe('summarizeEdges', () => {
  it('should merge edges case-insensitively', () => {
    const summary = summarizeEdges([
      { caller: 'a', callee: 'B', kind: 'internal', offset: 0, line: 1 },
      { caller: 'A', callee: 'b', kind: 'internal', offset: 5, line: 2 },
    ]);

    expect(summary).toEqual([{ caller: 'a', callee: 'B', kind: 'internal', callCount: 2 }]);
  });
});

describe('isReservedMacroWord', () => {
  it('should recognise macro statements and functions', () => {
    expect(isReservedMacroWord('LET')).toBe(true);
    expect(isReservedMacroWord('sysfunc')).toBe(true);
    expect(isReservedMacroWord('load_data')).toBe(false);
  });
});

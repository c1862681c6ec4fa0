/**
 * Dependency Graph Builder
 *
 * Builds the macro call graph of one source unit. Every `%name` invocation in
 * a block becomes an edge from the block's macro (or the top-level pseudo
 * caller) to `name`. Raw edges keep repeats and self loops; the summary view
 * collapses them with a call count.
 */

import type { DependencyKind, MacroDefinition } from '../types/analysis-types.js';
import { splitStatements, leadingKeyword, unquote } from '../parsers/sas-lexer.js';
import { blockSpans, type MacroSegment, type Segmentation } from '../parsers/statement-segmenter.js';
import { createLogger } from '../utils/logger.js';
import { VariableResolver } from './variable-resolver.js';
import macroKeywords from '../data/sas-macro-keywords.json';

export const TOP_LEVEL_CALLER = '(top-level)';

export interface DependencyEdge {
  caller: string;
  callee: string;
  kind: DependencyKind;
  offset: number;
  line: number;
}

export interface DependencySummaryEdge {
  caller: string;
  callee: string;
  kind: DependencyKind;
  callCount: number;
}

export type MacroStatus = 'used' | 'unused';

export interface MacroNode extends MacroDefinition {
  status: MacroStatus;
  line: number;
}

export interface IncludeReference {
  target: string;
  /** True for quoted file paths, false for filerefs */
  quoted: boolean;
  offset: number;
  line: number;
}

export interface DependencyGraph {
  macros: MacroNode[];
  edges: DependencyEdge[];
  summary: DependencySummaryEdge[];
  unusedMacros: string[];
  externalMacros: string[];
  includes: IncludeReference[];
}

const RESERVED_MACRO_WORDS: ReadonlySet<string> = new Set([
  ...macroKeywords.statements,
  ...macroKeywords.functions,
]);

/**
 * True when `%name` is macro-language syntax rather than a user macro call
 */
export function isReservedMacroWord(name: string): boolean {
  return RESERVED_MACRO_WORDS.has(name.toLowerCase());
}

export class DependencyGraphBuilder {
  private logger = createLogger('DependencyGraphBuilder');

  constructor(private resolver: VariableResolver = new VariableResolver()) {}

  build(segmentation: Segmentation): DependencyGraph {
    const { source } = segmentation;
    const defined = new Set(segmentation.macros.map(macro => macro.name.toLowerCase()));
    const edges: DependencyEdge[] = [];

    const scanBlock = (caller: string, macro: MacroSegment | null): void => {
      for (const span of blockSpans(segmentation, macro)) {
        const invocation = /%([A-Za-z_]\w*)/g;
        invocation.lastIndex = span.start;
        let match: RegExpExecArray | null;

        while ((match = invocation.exec(source.code)) !== null && match.index < span.end) {
          const callee = match[1];
          if (isReservedMacroWord(callee)) continue;
          edges.push({
            caller,
            callee,
            kind: defined.has(callee.toLowerCase()) ? 'internal' : 'external',
            offset: match.index,
            line: source.lines.lineAt(match.index),
          });
        }
      }
    };

    scanBlock(TOP_LEVEL_CALLER, null);
    for (const macro of segmentation.macros) {
      scanBlock(macro.name, macro);
    }
    edges.sort((a, b) => a.offset - b.offset);

    const macros = this.buildMacroNodes(segmentation, edges);
    const graph: DependencyGraph = {
      macros,
      edges,
      summary: summarizeEdges(edges),
      unusedMacros: macros.filter(macro => macro.status === 'unused').map(macro => macro.name),
      externalMacros: uniqueNames(edges.filter(edge => edge.kind === 'external').map(edge => edge.callee)),
      includes: this.findIncludes(segmentation),
    };

    this.logger.metric('macroEdges', edges.length, 'count', {
      macros: macros.length,
      external: graph.externalMacros.length,
    });

    return graph;
  }

  private buildMacroNodes(segmentation: Segmentation, edges: DependencyEdge[]): MacroNode[] {
    const parents = new Map<MacroSegment, string>();
    for (const macro of segmentation.macros) {
      for (const child of macro.children) {
        if (child.kind === 'macro') parents.set(child, macro.name);
      }
    }

    return segmentation.macros.map(macro => {
      const key = macro.name.toLowerCase();
      const incoming = edges.filter(
        edge => edge.callee.toLowerCase() === key && edge.caller.toLowerCase() !== key
      );
      const invokedByMacro = incoming.some(edge => edge.caller !== TOP_LEVEL_CALLER);
      const invokedAtTopLevel = incoming.some(edge => edge.caller === TOP_LEVEL_CALLER);
      const parent = parents.get(macro);

      return {
        name: macro.name,
        parameters: macro.parameters,
        start: macro.start,
        end: macro.end,
        bodyStart: macro.bodyStart,
        bodyEnd: macro.bodyEnd,
        invokes: edges.filter(edge => edge.caller === macro.name && this.inBody(edge, macro)).map(edge => edge.callee),
        invokedByMacro,
        invokedAtTopLevel,
        terminated: macro.terminated,
        ...(parent !== undefined && { parent }),
        status: invokedByMacro || invokedAtTopLevel ? 'used' : 'unused',
        line: segmentation.source.lines.lineAt(macro.start),
      };
    });
  }

  private inBody(edge: DependencyEdge, macro: MacroSegment): boolean {
    return edge.offset >= macro.bodyStart && edge.offset < macro.bodyEnd;
  }

  /**
   * `%include` / `%inc` targets: quoted paths and filerefs, options after `/` dropped
   */
  private findIncludes(segmentation: Segmentation): IncludeReference[] {
    const { source } = segmentation;
    const includes: IncludeReference[] = [];

    for (const statement of splitStatements(source.code)) {
      const masked = source.code.slice(statement.start, statement.end);
      const keyword = leadingKeyword(masked);
      if (keyword !== '%include' && keyword !== '%inc') continue;

      const keywordAt = masked.toLowerCase().indexOf(keyword);
      const optionsAt = masked.indexOf('/', keywordAt);
      const argumentsEnd = optionsAt === -1 ? masked.lastIndexOf(';') : optionsAt;
      const argumentsText = source.withoutComments.slice(
        statement.start + keywordAt + keyword.length,
        statement.start + (argumentsEnd === -1 ? masked.length : argumentsEnd)
      );

      const offset = statement.start + keywordAt;
      for (const match of argumentsText.matchAll(/"(?:[^"]|"")*"|'(?:[^']|'')*'|[^\s'"]+/g)) {
        const quoted = /^["']/.test(match[0]);
        includes.push({
          target: this.resolver.substitute(quoted ? unquote(match[0]) : match[0]),
          quoted,
          offset,
          line: source.lines.lineAt(offset),
        });
      }
    }

    return includes;
  }
}

/**
 * Collapse repeated caller→callee edges, keeping first-seen order
 */
export function summarizeEdges(edges: DependencyEdge[]): DependencySummaryEdge[] {
  const summary = new Map<string, DependencySummaryEdge>();

  for (const edge of edges) {
    const key = `${edge.caller.toLowerCase()}\u0000${edge.callee.toLowerCase()}`;
    const existing = summary.get(key);
    if (existing) {
      existing.callCount++;
    } else {
      summary.set(key, { caller: edge.caller, callee: edge.callee, kind: edge.kind, callCount: 1 });
    }
  }

  return [...summary.values()];
}

function uniqueNames(names: string[]): string[] {
  const seen = new Map<string, string>();
  for (const name of names) {
    if (!seen.has(name.toLowerCase())) seen.set(name.toLowerCase(), name);
  }
  return [...seen.values()];
}

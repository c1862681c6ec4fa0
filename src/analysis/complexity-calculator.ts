/**
 * Complexity Calculator
 *
 * Keyword-count metrics per block: the top-level body and every macro body,
 * each with nested macro definitions left out. No control-flow graph is
 * built; cyclomatic complexity is decision points + 1.
 */

import type { ComplexityMetrics } from '../types/analysis-types.js';
import { maskSource, sliceSpans } from '../parsers/sas-lexer.js';
import {
  blockSpans,
  type MacroSegment,
  type Segmentation,
} from '../parsers/statement-segmenter.js';
import { createLogger } from '../utils/logger.js';

export const COMPLEXITY_METHOD = 'keyword-count-approximation';
export const TOP_LEVEL_BLOCK = 'top-level';

export interface BlockComplexity {
  /** `top-level`, `macro:<name>`, or `macro:<name>#<n>` for repeated names */
  block: string;
  kind: 'top-level' | 'macro';
  name?: string;
  metrics: ComplexityMetrics;
}

/** Text of one block in the three lexer views */
export interface BlockText {
  text: string;
  withoutComments: string;
  code: string;
}

const PROC_STEP = /(?:^|;)\s*proc\s+[A-Za-z_]\w*/gim;
const DATA_STEP = /(?:^|;)\s*data\s+[&A-Za-z_]/gim;
const CONDITIONAL = /\bif\b/gi;
const LOOP = /\bdo\s+(?:%?(?:while|until)\b|over\b|%?&?[A-Za-z_]\w*\s*=)/gi;

const countMatches = (pattern: RegExp, text: string): number =>
  (text.match(new RegExp(pattern.source, pattern.flags)) ?? []).length;

/**
 * Metrics for a single block of text
 */
export function measureBlock(block: BlockText, macroCount: number): ComplexityMetrics {
  const lines = block.text === '' ? [] : block.text.split('\n');
  const visible = block.withoutComments.split('\n');

  let blankLines = 0;
  let commentLines = 0;
  lines.forEach((line, index) => {
    if (line.trim() === '') blankLines++;
    else if ((visible[index] ?? '').trim() === '') commentLines++;
  });

  const conditionalCount = countMatches(CONDITIONAL, block.code);
  const loopCount = countMatches(LOOP, block.code);
  const decisionPoints = conditionalCount + loopCount;

  return {
    totalLines: lines.length,
    codeLines: lines.length - blankLines - commentLines,
    commentLines,
    blankLines,
    macroCount,
    procCount: countMatches(PROC_STEP, block.code),
    dataStepCount: countMatches(DATA_STEP, block.code),
    conditionalCount,
    loopCount,
    decisionPoints,
    cyclomaticComplexity: decisionPoints + 1,
  };
}

export class ComplexityCalculator {
  private logger = createLogger('ComplexityCalculator');

  /**
   * Metrics for a standalone snippet, treated as one top-level block
   */
  measureText(text: string): ComplexityMetrics {
    const masked = maskSource(text);
    return measureBlock(masked, 0);
  }

  calculate(segmentation: Segmentation): BlockComplexity[] {
    const results: BlockComplexity[] = [
      {
        block: TOP_LEVEL_BLOCK,
        kind: 'top-level',
        metrics: this.measureSegment(segmentation, null),
      },
    ];

    const seen = new Map<string, number>();
    for (const macro of segmentation.macros) {
      const key = macro.name.toLowerCase();
      const occurrence = (seen.get(key) ?? 0) + 1;
      seen.set(key, occurrence);

      results.push({
        block: occurrence === 1 ? `macro:${macro.name}` : `macro:${macro.name}#${occurrence}`,
        kind: 'macro',
        name: macro.name,
        metrics: this.measureSegment(segmentation, macro),
      });
    }

    const peak = Math.max(...results.map(result => result.metrics.cyclomaticComplexity));
    this.logger.metric('maxCyclomaticComplexity', peak, 'score', { blocks: results.length });

    return results;
  }

  private measureSegment(segmentation: Segmentation, macro: MacroSegment | null): ComplexityMetrics {
    const { source } = segmentation;
    const spans = blockSpans(segmentation, macro);
    const children = macro ? macro.children : segmentation.segments;

    return measureBlock(
      {
        text: sliceSpans(source.text, spans),
        withoutComments: sliceSpans(source.withoutComments, spans),
        code: sliceSpans(source.code, spans),
      },
      children.filter(segment => segment.kind === 'macro').length
    );
  }
}

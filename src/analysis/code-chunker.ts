/**
 * Code Chunker
 *
 * Pulls top-level macro definitions out whole, leaving a placeholder comment
 * in the main body, then packs the main body into chunks under a token
 * budget. Split points fall only between top-level statements, whole query
 * blocks and placeholders.
 */

import { splitStatements } from '../parsers/sas-lexer.js';
import type { Segmentation } from '../parsers/statement-segmenter.js';
import { createLogger } from '../utils/logger.js';

export interface ChunkingOptions {
  maxTokens: number;
  charsPerToken: number;
  /** Name of the analyzed unit (usually the file), appended to placeholders */
  unitName?: string;
}

export interface ExtractedMacro {
  index: number;
  name: string;
  placeholder: string;
  /** Full definition text, `%macro` through `%mend`, nested definitions included */
  code: string;
  tokenEstimate: number;
  start: number;
  end: number;
}

export interface CodeChunk {
  index: number;
  text: string;
  tokenEstimate: number;
  /** A single unit larger than the budget on its own */
  oversized: boolean;
  statementCount: number;
}

export interface ChunkingResult {
  macros: ExtractedMacro[];
  mainBody: string;
  chunks: CodeChunk[];
}

export function estimateTokens(text: string, charsPerToken: number): number {
  return Math.ceil(text.length / charsPerToken);
}

export function macroPlaceholder(index: number, name: string, unitName?: string): string {
  const suffix = unitName ? `_${unitName.replace(/\W+/g, '_')}` : '';
  return `/* MACRO_${index}_${name}${suffix} */`;
}

export class CodeChunker {
  private logger = createLogger('CodeChunker');

  constructor(private options: ChunkingOptions) {}

  chunk(segmentation: Segmentation): ChunkingResult {
    const { source } = segmentation;
    const { charsPerToken, unitName } = this.options;
    const macros: ExtractedMacro[] = [];
    const units: string[] = [];

    for (const segment of segmentation.segments) {
      if (segment.kind === 'macro') {
        const index = macros.length;
        const code = source.text.slice(segment.start, segment.end);
        const placeholder = macroPlaceholder(index, segment.name, unitName);
        macros.push({
          index,
          name: segment.name,
          placeholder,
          code,
          tokenEstimate: estimateTokens(code, charsPerToken),
          start: segment.start,
          end: segment.end,
        });
        units.push(placeholder);
      } else if (segment.kind === 'query') {
        units.push(source.text.slice(segment.start, segment.end));
      } else {
        for (const statement of splitStatements(source.code, segment.start, segment.end)) {
          units.push(source.text.slice(statement.start, statement.end));
        }
      }
    }

    const chunks = this.pack(units);

    this.logger.metric('chunks', chunks.length, 'count', {
      macros: macros.length,
      oversized: chunks.filter(chunk => chunk.oversized).length,
    });

    return { macros, mainBody: units.join(''), chunks };
  }

  /**
   * Greedy packing: a unit joins the current chunk while the chunk's estimate
   * stays within budget
   */
  pack(units: string[]): CodeChunk[] {
    const { maxTokens, charsPerToken } = this.options;
    const chunks: CodeChunk[] = [];
    let current: string[] = [];
    let currentLength = 0;

    const flush = (): void => {
      if (current.length === 0) return;
      const text = current.join('');
      const tokenEstimate = estimateTokens(text, charsPerToken);
      chunks.push({
        index: chunks.length,
        text,
        tokenEstimate,
        oversized: tokenEstimate > maxTokens,
        statementCount: current.length,
      });
      current = [];
      currentLength = 0;
    };

    for (const unit of units) {
      if (current.length > 0 && Math.ceil((currentLength + unit.length) / charsPerToken) > maxTokens) {
        flush();
      }
      current.push(unit);
      currentLength += unit.length;
    }
    flush();

    return chunks;
  }
}

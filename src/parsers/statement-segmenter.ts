/**
 * Statement Segmenter
 *
 * Splits SAS source into macro definitions, PROC SQL query blocks and the
 * residual statements around them. Macro definitions nest: they are matched
 * with a stack rather than by searching for the next `%mend`, and each
 * definition keeps its own child segments.
 *
 * Segments at every level cover their parent range without gaps, so slicing
 * and concatenating them reproduces the original text.
 */

import type { Anomaly, SourceSpan } from '../types/analysis-types.js';
import { createLogger } from '../utils/logger.js';
import { MaskedSource, maskSource } from './sas-lexer.js';

export interface MacroSegment extends SourceSpan {
  kind: 'macro';
  name: string;
  parameters: string;
  bodyStart: number;
  bodyEnd: number;
  terminated: boolean;
  children: Segment[];
}

export interface QuerySegment extends SourceSpan {
  kind: 'query';
  bodyStart: number;
  bodyEnd: number;
  terminated: boolean;
}

export interface ResidualSegment extends SourceSpan {
  kind: 'residual';
}

export type Segment = MacroSegment | QuerySegment | ResidualSegment;

export interface OwnedQuery {
  segment: QuerySegment;
  /** Innermost macro containing the query, null at top level */
  owner: MacroSegment | null;
}

export interface Segmentation {
  source: MaskedSource;
  segments: Segment[];
  /** All macro definitions, nested ones included, in document order */
  macros: MacroSegment[];
  queries: OwnedQuery[];
  anomalies: Anomaly[];
}

interface Frame {
  macro: MacroSegment | null;
  children: Segment[];
  cursor: number;
}

interface OpenQuery {
  start: number;
  bodyStart: number;
  frame: Frame;
}

const MARKER_PATTERN = /%macro\b|%mend\b|\bproc\s+sql\b|\bquit\s*;/gi;

export class StatementSegmenter {
  private logger = createLogger('StatementSegmenter');

  /**
   * Segment raw source text
   */
  segment(text: string): Segmentation {
    return this.segmentMasked(maskSource(text));
  }

  /**
   * Segment an already masked source
   */
  segmentMasked(source: MaskedSource): Segmentation {
    const { code, lines } = source;
    const anomalies: Anomaly[] = [...source.unterminated];
    const root: Frame = { macro: null, children: [], cursor: 0 };
    const stack: Frame[] = [root];
    let openQuery: OpenQuery | null = null;

    const current = (): Frame => stack[stack.length - 1];

    const closeQuery = (end: number, terminatedAt: number | null): void => {
      if (!openQuery) return;
      const { frame, start, bodyStart } = openQuery;
      const terminated = terminatedAt !== null;
      frame.children.push({
        kind: 'query',
        start,
        end,
        bodyStart: Math.min(bodyStart, terminatedAt ?? end),
        bodyEnd: terminatedAt ?? end,
        terminated,
      });
      frame.cursor = end;
      if (!terminated) {
        anomalies.push({
          kind: 'unterminated-block',
          block: 'query',
          message: 'PROC SQL block has no QUIT statement',
          offset: start,
          line: lines.lineAt(start),
        });
      }
      openQuery = null;
    };

    const pattern = new RegExp(MARKER_PATTERN.source, MARKER_PATTERN.flags);
    const macroName = /%macro\s+([A-Za-z_]\w*)/iy;
    const macroEnd = /%mend\b\s*([A-Za-z_]\w*)?\s*;?/iy;
    let match: RegExpExecArray | null;

    while ((match = pattern.exec(code)) !== null) {
      const position = match.index;
      const marker = match[0].toLowerCase();

      if (marker === '%macro') {
        macroName.lastIndex = position;
        const header = macroName.exec(code);
        if (!header) {
          continue;
        }
        closeQuery(position, null);
        const { parameters, headerEnd } = this.readMacroHeader(code, position + header[0].length);
        const frame = current();
        this.flushResidual(frame, position);
        stack.push({
          macro: {
            kind: 'macro',
            name: header[1],
            parameters,
            start: position,
            end: headerEnd,
            bodyStart: headerEnd,
            bodyEnd: headerEnd,
            terminated: false,
            children: [],
          },
          children: [],
          cursor: headerEnd,
        });
        pattern.lastIndex = headerEnd;
        continue;
      }

      if (marker === '%mend') {
        macroEnd.lastIndex = position;
        const end = macroEnd.exec(code);
        const endName = end?.[1];
        const endPosition = end ? position + end[0].length : position + match[0].length;
        closeQuery(position, null);

        const frame = current();
        if (!frame.macro) {
          anomalies.push({
            kind: 'unmatched-macro-end',
            name: endName,
            message: '%MEND without a matching %MACRO',
            offset: position,
            line: lines.lineAt(position),
          });
          pattern.lastIndex = endPosition;
          continue;
        }

        stack.pop();
        this.flushResidual(frame, position);
        if (endName && endName.toLowerCase() !== frame.macro.name.toLowerCase()) {
          anomalies.push({
            kind: 'mismatched-macro-end',
            expected: frame.macro.name,
            found: endName,
            message: `%MEND ${endName} closes macro ${frame.macro.name}`,
            offset: position,
            line: lines.lineAt(position),
          });
        }
        const parent = current();
        parent.children.push({
          ...frame.macro,
          end: endPosition,
          bodyEnd: position,
          terminated: true,
          children: frame.children,
        });
        parent.cursor = endPosition;
        pattern.lastIndex = endPosition;
        continue;
      }

      if (marker.startsWith('proc')) {
        closeQuery(position, null);
        this.flushResidual(current(), position);
        const semicolon = code.indexOf(';', position);
        const headerEnd = semicolon === -1 ? code.length : semicolon + 1;
        openQuery = { start: position, bodyStart: headerEnd, frame: current() };
        pattern.lastIndex = headerEnd;
        continue;
      }

      // quit;
      if (openQuery) {
        closeQuery(position + match[0].length, position);
      }
    }

    closeQuery(code.length, null);

    while (stack.length > 1) {
      const frame = stack.pop();
      if (!frame?.macro) break;
      this.flushResidual(frame, code.length);
      anomalies.push({
        kind: 'unterminated-block',
        block: 'macro',
        name: frame.macro.name,
        message: `Macro ${frame.macro.name} has no %MEND`,
        offset: frame.macro.start,
        line: lines.lineAt(frame.macro.start),
      });
      const parent = current();
      parent.children.push({
        ...frame.macro,
        end: code.length,
        bodyEnd: code.length,
        terminated: false,
        children: frame.children,
      });
      parent.cursor = code.length;
    }

    this.flushResidual(root, code.length);

    const macros: MacroSegment[] = [];
    const queries: OwnedQuery[] = [];
    this.collect(root.children, null, macros, queries);

    anomalies.sort((a, b) => a.offset - b.offset);

    this.logger.debug('Segmented source', {
      segments: root.children.length,
      macros: macros.length,
      queries: queries.length,
      anomalies: anomalies.length,
    });

    return { source, segments: root.children, macros, queries, anomalies };
  }

  /**
   * Read `(params)` and any options up to the terminating `;`
   */
  private readMacroHeader(code: string, from: number): { parameters: string; headerEnd: number } {
    let i = from;
    while (i < code.length && /\s/.test(code[i])) i++;

    let parameters = '';
    if (code[i] === '(') {
      let depth = 0;
      const open = i;
      for (; i < code.length; i++) {
        if (code[i] === '(') depth++;
        else if (code[i] === ')') {
          depth--;
          if (depth === 0) break;
        }
      }
      parameters = code.slice(open + 1, Math.min(i, code.length)).trim();
    }

    const semicolon = code.indexOf(';', i);
    return { parameters, headerEnd: semicolon === -1 ? code.length : semicolon + 1 };
  }

  private flushResidual(frame: Frame, upTo: number): void {
    if (upTo > frame.cursor) {
      frame.children.push({ kind: 'residual', start: frame.cursor, end: upTo });
    }
    frame.cursor = Math.max(frame.cursor, upTo);
  }

  private collect(
    segments: Segment[],
    owner: MacroSegment | null,
    macros: MacroSegment[],
    queries: OwnedQuery[]
  ): void {
    for (const segment of segments) {
      if (segment.kind === 'macro') {
        macros.push(segment);
        this.collect(segment.children, segment, macros, queries);
      } else if (segment.kind === 'query') {
        queries.push({ segment, owner });
      }
    }
  }
}

/**
 * Spans of a block's own text: a macro body, or the top level when `macro`
 * is null, with nested macro definitions left out
 */
export function blockSpans(segmentation: Segmentation, macro: MacroSegment | null): SourceSpan[] {
  const children = macro ? macro.children : segmentation.segments;
  return children
    .filter(segment => segment.kind !== 'macro')
    .map(segment => ({ start: segment.start, end: segment.end }));
}

/**
 * SAS Lexer
 *
 * Lexical groundwork shared by every analysis component. Instead of a token
 * stream it produces masked copies of the source in which comments (and, in
 * the `code` view, string literal contents) are blanked out with spaces. Offsets
 * and newlines are preserved, so a match found in a masked view can be sliced
 * straight out of the original text.
 */

import type { SourceSpan, UnterminatedBlockAnomaly } from '../types/analysis-types.js';

export interface StatementSpan extends SourceSpan {
  /** False for trailing text that never reached a `;` */
  terminated: boolean;
}

export interface MaskedSource {
  text: string;
  /** Comments blanked, string literals intact */
  withoutComments: string;
  /** Comments and string literal contents blanked, quotes kept */
  code: string;
  comments: SourceSpan[];
  unterminated: UnterminatedBlockAnomaly[];
  lines: LineIndex;
}

/**
 * Maps offsets to 1-based line numbers
 */
export class LineIndex {
  private lineStarts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  }
}

const blankOut = (ch: string): string => (ch === '\n' || ch === '\r' ? ch : ' ');

function maskRange(chars: string[], start: number, end: number): void {
  for (let i = start; i < end; i++) {
    chars[i] = blankOut(chars[i]);
  }
}

/**
 * Blank out comments and string contents.
 *
 * Recognises `/* ... *\/` block comments anywhere, `* ... ;` comments at the
 * start of a statement and `%* ... ;` macro comments. Quotes escape by doubling.
 */
export function maskSource(text: string): MaskedSource {
  const lines = new LineIndex(text);
  const withoutComments = text.split('');
  const code = text.split('');
  const comments: SourceSpan[] = [];
  const unterminated: UnterminatedBlockAnomaly[] = [];
  const n = text.length;

  let atStatementStart = true;
  let i = 0;

  while (i < n) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === '/' && next === '*') {
      const close = text.indexOf('*/', i + 2);
      const end = close === -1 ? n : close + 2;
      if (close === -1) {
        unterminated.push({
          kind: 'unterminated-block',
          block: 'comment',
          message: 'Block comment is never closed; treated as running to end of input',
          offset: i,
          line: lines.lineAt(i),
        });
      }
      maskRange(withoutComments, i, end);
      maskRange(code, i, end);
      comments.push({ start: i, end });
      i = end;
      continue;
    }

    if ((ch === '*' && atStatementStart) || (ch === '%' && next === '*')) {
      const semicolon = text.indexOf(';', i);
      const end = semicolon === -1 ? n : semicolon + 1;
      maskRange(withoutComments, i, end);
      maskRange(code, i, end);
      comments.push({ start: i, end });
      atStatementStart = true;
      i = end;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      let closed = false;
      while (j < n) {
        if (text[j] === ch) {
          if (text[j + 1] === ch) {
            j += 2;
            continue;
          }
          closed = true;
          break;
        }
        j++;
      }
      if (!closed) {
        unterminated.push({
          kind: 'unterminated-block',
          block: 'string',
          message: 'String literal is never closed; treated as running to end of input',
          offset: i,
          line: lines.lineAt(i),
        });
      }
      maskRange(code, i + 1, closed ? j : n);
      atStatementStart = false;
      i = closed ? j + 1 : n;
      continue;
    }

    if (!/\s/.test(ch)) {
      atStatementStart = ch === ';';
    }
    i++;
  }

  return {
    text,
    withoutComments: withoutComments.join(''),
    code: code.join(''),
    comments,
    unterminated,
    lines,
  };
}

/**
 * Split `[start, end)` of masked code into contiguous statements.
 * Each span runs from the end of the previous one up to and including its `;`,
 * so concatenating the spans reproduces the range exactly.
 */
export function splitStatements(code: string, start = 0, end = code.length): StatementSpan[] {
  const spans: StatementSpan[] = [];
  let cursor = start;

  for (let i = start; i < end; i++) {
    if (code[i] === ';') {
      spans.push({ start: cursor, end: i + 1, terminated: true });
      cursor = i + 1;
    }
  }

  if (cursor < end) {
    spans.push({ start: cursor, end, terminated: false });
  }

  return spans;
}

/**
 * Concatenate the given spans of `text`
 */
export function sliceSpans(text: string, spans: SourceSpan[]): string {
  return spans.map(span => text.slice(span.start, span.end)).join('');
}

/**
 * First word of a statement, lowercased (`%let`, `libname`, `proc` ...)
 */
export function leadingKeyword(statement: string): string {
  const match = statement.match(/^\s*(%?[A-Za-z_]\w*)/);
  return match ? match[1].toLowerCase() : '';
}

/**
 * Strip one level of SAS quoting, undoubling embedded quotes
 */
export function unquote(value: string): string {
  const trimmed = value.trim();
  const quote = trimmed[0];
  if ((quote === '"' || quote === "'") && trimmed.length >= 2 && trimmed.endsWith(quote)) {
    return trimmed.slice(1, -1).split(quote + quote).join(quote);
  }
  return trimmed;
}

/**
 * Table-Operation Extractor
 *
 * Finds two-level `alias.table` references inside PROC SQL blocks and
 * classifies what each statement does to them. Works on a flat token stream
 * per statement instead of a SQL grammar: statement-level keywords pick the
 * target, `FROM`/`JOIN` lists give the sources.
 */

import {
  TableOperation,
  type Anomaly,
  type DatabaseHandle,
  type TableReference,
} from '../types/analysis-types.js';
import { splitStatements } from '../parsers/sas-lexer.js';
import type { Segmentation } from '../parsers/statement-segmenter.js';
import { createLogger } from '../utils/logger.js';
import { LibraryRegistry } from './library-registry.js';
import { VariableResolver } from './variable-resolver.js';

export interface Token {
  text: string;
  lower: string;
}

export interface TableExtraction {
  /** References whose alias resolved to a declared library */
  references: TableReference[];
  /** References to aliases with no library declaration */
  unattributed: TableReference[];
  anomalies: Anomaly[];
}

/** Words that end a FROM list or cannot be a table alias */
const CLAUSE_KEYWORDS = new Set([
  'where', 'group', 'order', 'having', 'join', 'inner', 'left', 'right', 'full',
  'cross', 'outer', 'natural', 'on', 'using', 'union', 'except', 'intersect',
  'set', 'values', 'select', 'from', 'into', 'as', 'limit', 'when',
  'then', 'else', 'end', 'and', 'or', 'not',
]);

const tokenPattern = (): RegExp =>
  /:?[&A-Za-z_][\w&]*(?:\.{1,2}[&A-Za-z_][\w&]*)*|\d[\w.]*|[(),;]|[^\s\w]/g;

/**
 * Split a statement into word, number and punctuation tokens
 */
export function tokenizeSql(statement: string): Token[] {
  return Array.from(statement.matchAll(tokenPattern()), match => ({
    text: match[0],
    lower: match[0].toLowerCase(),
  }));
}

/**
 * `alias.table` parts of a token, null for anything that is not two-level
 */
function qualifiedName(token: Token | undefined): { alias: string; table: string } | null {
  if (!token || token.text.startsWith(':')) {
    return null;
  }
  const parts = token.text.split(/\.{1,2}/);
  if (parts.length !== 2 || parts[0] === '' || parts[1] === '') {
    return null;
  }
  return { alias: parts[0], table: parts[1] };
}

const isIdentifier = (token: Token | undefined): boolean =>
  token !== undefined && /^[A-Za-z_]\w*$/.test(token.text) && !CLAUSE_KEYWORDS.has(token.lower);

export function skipParentheses(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    if (tokens[i].text === '(') depth++;
    else if (tokens[i].text === ')') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return tokens.length;
}

type Occurrence = { alias: string; table: string; operation: TableOperation };

/**
 * Index of the first token after leading macro control words
 * (`%if ... %then`, `%else`, `%do`). An `%if` with no `%then` is left alone.
 */
export function skipMacroControl(tokens: Token[]): number {
  let i = 0;

  while (tokens[i]?.text === '%') {
    const word = tokens[i + 1]?.lower;
    if (word === 'else' || word === 'do') {
      i += 2;
    } else if (word === 'if') {
      let j = i + 2;
      while (j < tokens.length && !(tokens[j].text === '%' && tokens[j + 1]?.lower === 'then')) {
        j++;
      }
      if (j >= tokens.length) return i;
      i = j + 2;
    } else {
      break;
    }
  }

  return i;
}

/**
 * Table operations performed by one SQL statement, in the order found
 */
export function classifyStatement(statement: string): Occurrence[] {
  const tokens = tokenizeSql(statement);
  const found: Occurrence[] = [];

  const record = (index: number, operation: TableOperation): void => {
    const name = qualifiedName(tokens[index]);
    if (name) {
      found.push({ ...name, operation });
    }
  };

  const start = skipMacroControl(tokens);
  const first = tokens[start]?.lower;
  const second = tokens[start + 1]?.lower;
  let scanFrom = start;

  if (first === 'create' && (second === 'table' || second === 'view')) {
    record(start + 2, second === 'table' ? TableOperation.CreateTable : TableOperation.CreateView);
    scanFrom = start + 3;
  } else if (first === 'insert' && second === 'into') {
    record(start + 2, TableOperation.Insert);
    scanFrom = start + 3;
  } else if (first === 'update') {
    record(start + 1, TableOperation.Update);
    scanFrom = start + 2;
  } else if (first === 'delete' && second === 'from') {
    record(start + 2, TableOperation.Delete);
    scanFrom = start + 3;
  }

  for (let i = scanFrom; i < tokens.length; i++) {
    const word = tokens[i].lower;

    if (word === 'from') {
      readSourceList(tokens, i + 1, index => record(index, TableOperation.Select));
    } else if (word === 'join') {
      record(i + 1, TableOperation.Select);
    } else if (word === 'into' && !tokens[i + 1]?.text.startsWith(':')) {
      record(i + 1, TableOperation.SelectInto);
    }
  }

  return found;
}

/**
 * Walk a comma-separated FROM list starting at `start`, calling `onTable` with
 * the index of each table token. Subqueries are skipped here; their own FROM
 * clauses are picked up by the caller's linear scan.
 */
function readSourceList(tokens: Token[], start: number, onTable: (index: number) => void): void {
  let i = start;

  while (i < tokens.length) {
    if (tokens[i].text === '(') {
      i = skipParentheses(tokens, i);
    } else {
      onTable(i);
      i++;
      // dataset options: lib.t(keep=a b)
      if (tokens[i]?.text === '(') {
        i = skipParentheses(tokens, i);
      }
    }

    if (tokens[i]?.lower === 'as') {
      i += 2;
    } else if (isIdentifier(tokens[i])) {
      i++;
    }

    if (tokens[i]?.text !== ',') {
      return;
    }
    i++;
  }
}

export class TableOperationExtractor {
  private logger = createLogger('TableOperationExtractor');

  constructor(private registry: LibraryRegistry, private resolver: VariableResolver) {}

  extract(segmentation: Segmentation): TableExtraction {
    const { source } = segmentation;
    const attributed = new Map<string, TableReference>();
    const unattributed = new Map<string, TableReference>();
    const anomalies: Anomaly[] = [];

    for (const { segment } of segmentation.queries) {
      for (const span of splitStatements(source.code, segment.bodyStart, segment.bodyEnd)) {
        const raw = source.code.slice(span.start, span.end);
        const offset = span.start + (raw.length - raw.trimStart().length);
        const line = source.lines.lineAt(offset);

        for (const occurrence of classifyStatement(this.resolver.substitute(raw))) {
          const handle = this.registry.resolve(occurrence.alias);
          const target = handle ? attributed : unattributed;
          const key = `${handle ? handle.alias.toLowerCase() : occurrence.alias.toLowerCase()}.${occurrence.table.toLowerCase()}`;

          let reference = target.get(key);
          if (!reference) {
            reference = this.createReference(occurrence, handle, offset, line);
            target.set(key, reference);
            if (!handle) {
              anomalies.push({
                kind: 'unattributed-table',
                alias: occurrence.alias,
                tableName: occurrence.table,
                message: `Table ${occurrence.alias}.${occurrence.table} uses undeclared library ${occurrence.alias}`,
                offset,
                line,
              });
            }
          }
          reference.operations.add(occurrence.operation);
        }
      }
    }

    this.logger.metric('tableReferences', attributed.size + unattributed.size, 'count', {
      unattributed: unattributed.size,
    });

    return {
      references: [...attributed.values()],
      unattributed: [...unattributed.values()],
      anomalies,
    };
  }

  private createReference(
    occurrence: Occurrence,
    handle: DatabaseHandle | undefined,
    offset: number,
    line: number
  ): TableReference {
    return {
      alias: handle ? handle.alias : occurrence.alias,
      tableName: occurrence.table,
      operations: new Set(),
      ...(handle && { handle }),
      offset,
      line,
    };
  }
}

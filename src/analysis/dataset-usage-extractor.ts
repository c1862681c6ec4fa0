/**
 * Dataset Usage Extractor
 *
 * Reads and writes outside PROC SQL: DATA statement targets, SET / MERGE /
 * MODIFY / UPDATE sources, and `data=` / `out=` options of procedure steps.
 * One-level names live in the `work` library. Each library is resolved
 * through the registry so declared databases can be named.
 */

import type { DatabaseHandle } from '../types/analysis-types.js';
import { splitStatements } from '../parsers/sas-lexer.js';
import type { ResidualSegment, Segment, Segmentation } from '../parsers/statement-segmenter.js';
import { createLogger } from '../utils/logger.js';
import { LibraryRegistry } from './library-registry.js';
import { skipMacroControl, skipParentheses, tokenizeSql, type Token } from './table-operation-extractor.js';
import { VariableResolver } from './variable-resolver.js';

export type DatasetDirection = 'input' | 'output';

export interface DatasetReference {
  /** Resolved library name, `work` for one-level names */
  alias: string;
  datasetName: string;
  direction: DatasetDirection;
  handle?: DatabaseHandle;
  offset: number;
  line: number;
}

export interface DatasetUsage {
  inputs: DatasetReference[];
  outputs: DatasetReference[];
}

export const DEFAULT_LIBRARY = 'work';

const DATASET_NAME = /^[&A-Za-z_][\w&]*(?:\.{1,2}[&A-Za-z_][\w&]*)?$/;
const SPECIAL_NAMES = new Set(['_null_', '_last_', '_data_']);
const INPUT_STATEMENTS = new Set(['set', 'merge', 'modify', 'update']);
const DATASET_OPTIONS = new Map<string, DatasetDirection>([
  ['data', 'input'],
  ['out', 'output'],
]);

type Found = { alias: string; table: string; direction: DatasetDirection };

function datasetName(token: Token | undefined): { alias: string; table: string } | null {
  if (!token || !DATASET_NAME.test(token.text) || SPECIAL_NAMES.has(token.lower)) {
    return null;
  }
  const parts = token.text.split(/\.{1,2}/);
  return parts.length === 2
    ? { alias: parts[0], table: parts[1] }
    : { alias: DEFAULT_LIBRARY, table: parts[0] };
}

/**
 * Dataset names listed after a DATA or SET-like keyword. Parenthesised
 * dataset options and `name=value` statement options are skipped; a `/`
 * ends the list.
 */
function readDatasetList(tokens: Token[], start: number, onDataset: (index: number) => void): void {
  let i = start;

  while (i < tokens.length) {
    if (tokens[i].text === '/') {
      return;
    }
    if (tokens[i].text === '(') {
      i = skipParentheses(tokens, i);
    } else if (tokens[i + 1]?.text === '=') {
      i += 2;
      i = tokens[i]?.text === '(' ? skipParentheses(tokens, i) : i + 1;
    } else {
      onDataset(i);
      i++;
    }
  }
}

/**
 * Datasets read and written by one statement outside PROC SQL
 */
export function classifyDatasetStatement(statement: string): Found[] {
  const tokens = tokenizeSql(statement);
  const found: Found[] = [];

  const record = (index: number, direction: DatasetDirection): void => {
    const name = datasetName(tokens[index]);
    if (name) {
      found.push({ ...name, direction });
    }
  };

  const start = skipMacroControl(tokens);
  const keyword = tokens[start]?.lower;

  if (keyword === undefined || keyword === '%' || keyword === 'libname') {
    return found;
  }

  if (keyword === 'data') {
    readDatasetList(tokens, start + 1, index => record(index, 'output'));
  } else if (INPUT_STATEMENTS.has(keyword)) {
    readDatasetList(tokens, start + 1, index => record(index, 'input'));
  } else {
    for (let i = start; i + 2 < tokens.length; i++) {
      const direction = DATASET_OPTIONS.get(tokens[i].lower);
      if (direction && tokens[i + 1].text === '=') {
        record(i + 2, direction);
      }
    }
  }

  return found;
}

function residualSegments(segments: Segment[]): ResidualSegment[] {
  return segments.flatMap(segment => {
    if (segment.kind === 'residual') return [segment];
    if (segment.kind === 'macro') return residualSegments(segment.children);
    return [];
  });
}

export class DatasetUsageExtractor {
  private logger = createLogger('DatasetUsageExtractor');

  constructor(private registry: LibraryRegistry, private resolver: VariableResolver) {}

  extract(segmentation: Segmentation): DatasetUsage {
    const { source } = segmentation;
    const seen = new Map<string, DatasetReference>();

    for (const segment of residualSegments(segmentation.segments)) {
      for (const span of splitStatements(source.code, segment.start, segment.end)) {
        const raw = source.code.slice(span.start, span.end);
        const offset = span.start + (raw.length - raw.trimStart().length);

        for (const { alias, table, direction } of classifyDatasetStatement(this.resolver.substitute(raw))) {
          const handle = this.registry.resolve(alias);
          const library = handle ? handle.alias : alias;
          const key = `${direction}:${library.toLowerCase()}.${table.toLowerCase()}`;
          if (seen.has(key)) continue;

          seen.set(key, {
            alias: library,
            datasetName: table,
            direction,
            ...(handle && { handle }),
            offset,
            line: source.lines.lineAt(offset),
          });
        }
      }
    }

    const references = [...seen.values()];
    const usage = {
      inputs: references.filter(reference => reference.direction === 'input'),
      outputs: references.filter(reference => reference.direction === 'output'),
    };

    this.logger.metric('datasets', references.length, 'count', {
      inputs: usage.inputs.length,
      outputs: usage.outputs.length,
    });

    return usage;
  }
}

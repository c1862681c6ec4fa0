/**
 * Library Registry
 *
 * Turns `libname` statements into database handles keyed by alias.
 *
 * Two declaration shapes are recognised:
 *   libname dwh oracle user=x path="P";          alias + engine + attributes
 *   libname RSK TERADATA server="t1" schema="S"; database identity from schema=
 * A quoted path (`libname raw '/data/raw';`) is a plain SAS library.
 */

import {
  DatabaseDialect,
  type Anomaly,
  type DatabaseHandle,
} from '../types/analysis-types.js';
import { MaskedSource, leadingKeyword, splitStatements, unquote } from '../parsers/sas-lexer.js';
import { createLogger } from '../utils/logger.js';
import { VariableResolver } from './variable-resolver.js';

export interface LibraryRegistryOptions {
  redactSecrets?: boolean;
}

/** Engine tokens, lowercased, mapped to their dialect */
const ENGINE_DIALECTS: Record<string, DatabaseDialect> = {
  base: DatabaseDialect.Base,
  v9: DatabaseDialect.Base,
  v8: DatabaseDialect.Base,
  v7: DatabaseDialect.Base,
  v6: DatabaseDialect.Base,
  spde: DatabaseDialect.Base,
  oracle: DatabaseDialect.Oracle,
  sqlsvr: DatabaseDialect.SqlServer,
  sqlserver: DatabaseDialect.SqlServer,
  bigquery: DatabaseDialect.BigQuery,
  bigquer: DatabaseDialect.BigQuery,
  teradata: DatabaseDialect.Teradata,
  db2: DatabaseDialect.Db2,
  postgres: DatabaseDialect.Postgres,
  mysql: DatabaseDialect.MySql,
  odbc: DatabaseDialect.Odbc,
  snow: DatabaseDialect.Snowflake,
  snowflake: DatabaseDialect.Snowflake,
  redshift: DatabaseDialect.Redshift,
  hadoop: DatabaseDialect.Hadoop,
  impala: DatabaseDialect.Impala,
};

/** Engine-position words that manage existing libraries rather than declare one */
const NON_DECLARING_WORDS = new Set(['clear', 'list']);

const SECRET_KEYS = new Set(['password', 'pw', 'pwd', 'pass']);
const SCHEMA_KEYS = ['schema', 'database'];

const attributePattern = (): RegExp =>
  /([A-Za-z_]\w*)\s*=\s*("(?:[^"]|"")*"|'(?:[^']|'')*'|\([^)]*\)|[^\s;]+)/g;

/**
 * Map an engine token to its dialect, `generic` when unknown
 */
export function dialectForEngine(engine: string): DatabaseDialect {
  return ENGINE_DIALECTS[engine.toLowerCase()] ?? DatabaseDialect.Generic;
}

/**
 * Replace the values of password-like attributes with `****`
 */
export function redactConnectionDetail(detail: string): string {
  return detail.replace(attributePattern(), (attribute: string, key: string) =>
    SECRET_KEYS.has(key.toLowerCase()) ? `${key}=****` : attribute
  );
}

export class LibraryRegistry {
  private handles: Map<string, DatabaseHandle> = new Map();
  private anomalies: Anomaly[] = [];
  private logger = createLogger('LibraryRegistry');

  constructor(private resolver: VariableResolver, private options: LibraryRegistryOptions = {}) {}

  /**
   * Register every library declaration in the source, in order
   */
  static fromSource(
    source: MaskedSource,
    resolver: VariableResolver,
    options: LibraryRegistryOptions = {}
  ): LibraryRegistry {
    const registry = new LibraryRegistry(resolver, options);

    for (const statement of splitStatements(source.code)) {
      if (leadingKeyword(source.code.slice(statement.start, statement.end)) !== 'libname') {
        continue;
      }
      const raw = source.withoutComments.slice(statement.start, statement.end);
      const offset = statement.start + (raw.length - raw.trimStart().length);
      registry.declare(raw, offset, source.lines.lineAt(offset));
    }

    registry.logger.metric('libraries', registry.handles.size, 'count');
    return registry;
  }

  /**
   * Parse a single `libname` statement. Returns the new handle, or null when
   * the statement does not declare a library.
   */
  declare(statement: string, offset = 0, line = 1): DatabaseHandle | null {
    const resolved = this.resolver.substitute(statement);
    const header = resolved.match(/^\s*libname\s+([^\s;('"]+)\s*([\s\S]*?)\s*;?\s*$/i);
    if (!header) {
      return null;
    }

    const alias = header[1];
    const rest = header[2];
    if (rest === '' || alias.toLowerCase() === '_all_') {
      return null;
    }

    let handle: DatabaseHandle;

    if (/^["'(]/.test(rest)) {
      handle = {
        alias,
        databaseName: alias,
        dialect: DatabaseDialect.Base,
        engine: '',
        connectionDetail: this.finishDetail(rest),
        offset,
        line,
      };
    } else {
      const engineMatch = rest.match(/^([A-Za-z_]\w*)\s*([\s\S]*)$/);
      if (!engineMatch || NON_DECLARING_WORDS.has(engineMatch[1].toLowerCase())) {
        return null;
      }
      const engine = engineMatch[1];
      const attributes = engineMatch[2];
      const dialect = dialectForEngine(engine);

      handle = dialect === DatabaseDialect.Teradata
        ? this.teradataHandle(alias, engine, attributes, offset, line)
        : {
            alias,
            databaseName: alias,
            dialect,
            engine,
            connectionDetail: this.finishDetail(attributes),
            offset,
            line,
          };
    }

    this.store(handle);
    return handle;
  }

  /**
   * Teradata libraries name a table family; the schema attribute carries the
   * database identity
   */
  private teradataHandle(
    alias: string,
    engine: string,
    attributes: string,
    offset: number,
    line: number
  ): DatabaseHandle {
    const values = new Map<string, string>();
    for (const match of attributes.matchAll(attributePattern())) {
      const key = match[1].toLowerCase();
      if (!values.has(key)) {
        values.set(key, match[2]);
      }
    }

    const schemaKey = SCHEMA_KEYS.find(key => values.has(key));
    const schemaValue = schemaKey ? values.get(schemaKey) : undefined;
    const schema = schemaValue !== undefined ? unquote(schemaValue) : undefined;

    if (schema === undefined) {
      this.anomalies.push({
        kind: 'missing-schema',
        alias,
        message: `Teradata library ${alias} declares no schema; using the alias as database name`,
        offset,
        line,
      });
    }

    const remaining = attributes
      .replace(attributePattern(), (attribute: string, key: string) =>
        SCHEMA_KEYS.includes(key.toLowerCase()) ? '' : attribute
      )
      .replace(/\s+/g, ' ');

    return {
      alias,
      databaseName: schema ?? alias,
      dialect: DatabaseDialect.Teradata,
      engine,
      connectionDetail: this.finishDetail(remaining),
      ...(schema !== undefined && { schema }),
      offset,
      line,
    };
  }

  private finishDetail(detail: string): string {
    const trimmed = detail.trim();
    return this.options.redactSecrets ? redactConnectionDetail(trimmed) : trimmed;
  }

  private store(handle: DatabaseHandle): void {
    const key = handle.alias.toLowerCase();
    const previous = this.handles.get(key);

    if (previous && previous.dialect !== handle.dialect) {
      this.anomalies.push({
        kind: 'conflicting-library',
        alias: handle.alias,
        previousDialect: previous.dialect,
        dialect: handle.dialect,
        message: `Library ${handle.alias} redeclared as ${handle.dialect} (was ${previous.dialect})`,
        offset: handle.offset,
        line: handle.line,
      });
    }

    this.handles.set(key, handle);
  }

  /**
   * Look up a handle by alias, case-insensitively
   */
  resolve(alias: string): DatabaseHandle | undefined {
    return this.handles.get(alias.toLowerCase());
  }

  /**
   * Current handles, in order of first declaration
   */
  getHandles(): DatabaseHandle[] {
    return [...this.handles.values()];
  }

  getAnomalies(): Anomaly[] {
    return [...this.anomalies];
  }
}

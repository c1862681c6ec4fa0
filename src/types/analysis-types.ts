/**
 * Shared data model for the SAS static-analysis core.
 *
 * Everything in here is plain data: components build these values, the
 * report assembler turns them into the externally visible report.
 */

/**
 * Half-open offset range `[start, end)` into the analyzed source
 */
export interface SourceSpan {
  start: number;
  end: number;
}

/**
 * Database backends a library declaration can bind to.
 * Unknown engines fall back to `Generic`.
 */
export enum DatabaseDialect {
  Generic = 'generic',
  Base = 'base',
  Oracle = 'oracle',
  SqlServer = 'sqlsvr',
  BigQuery = 'bigquery',
  Teradata = 'TERADATA',
  Db2 = 'db2',
  Postgres = 'postgres',
  MySql = 'mysql',
  Odbc = 'odbc',
  Snowflake = 'snowflake',
  Redshift = 'redshift',
  Hadoop = 'hadoop',
  Impala = 'impala',
}

/**
 * Operations a query can perform against a table.
 * Declaration order is the order operations are reported in.
 */
export enum TableOperation {
  Select = 'SELECT',
  Insert = 'INSERT',
  Update = 'UPDATE',
  Delete = 'DELETE',
  CreateTable = 'CREATE TABLE',
  CreateView = 'CREATE VIEW',
  SelectInto = 'SELECT INTO',
}

export const TABLE_OPERATION_ORDER: readonly TableOperation[] = Object.values(TableOperation);

export interface VariableBinding {
  /** Name as written in the defining statement */
  name: string;
  /** Value after substitution with the bindings defined before it */
  value: string;
  /** Definition order, 0-based, across the whole run */
  order: number;
  /** Offset of the defining statement, -1 for seeded variables */
  offset: number;
}

export interface DatabaseHandle {
  /** Library name used as the qualifier in table references */
  alias: string;
  /** Logical database identity: the alias, or the schema for Teradata */
  databaseName: string;
  dialect: DatabaseDialect;
  /** Engine token exactly as written in the declaration */
  engine: string;
  /** Attribute text that was not interpreted */
  connectionDetail: string;
  /** Teradata only: resolved schema name */
  schema?: string;
  offset: number;
  line: number;
}

export interface TableReference {
  /** Resolved qualifier */
  alias: string;
  tableName: string;
  operations: Set<TableOperation>;
  /** Handle the alias resolved to, absent for unknown libraries */
  handle?: DatabaseHandle;
  offset: number;
  line: number;
}

export type DependencyKind = 'internal' | 'external';

export interface MacroDefinition {
  name: string;
  /** Parameter list text between the parentheses, unvalidated */
  parameters: string;
  start: number;
  end: number;
  bodyStart: number;
  bodyEnd: number;
  /** Names invoked from the body, in order of appearance, repeats kept */
  invokes: string[];
  invokedByMacro: boolean;
  invokedAtTopLevel: boolean;
  terminated: boolean;
  /** Name of the enclosing macro for nested definitions */
  parent?: string;
}

export interface ComplexityMetrics {
  totalLines: number;
  codeLines: number;
  commentLines: number;
  blankLines: number;
  macroCount: number;
  procCount: number;
  dataStepCount: number;
  conditionalCount: number;
  loopCount: number;
  decisionPoints: number;
  cyclomaticComplexity: number;
}

// ---------------- Anomalies ----------------

interface AnomalyBase {
  message: string;
  offset: number;
  line: number;
}

export interface UnterminatedBlockAnomaly extends AnomalyBase {
  kind: 'unterminated-block';
  block: 'macro' | 'query' | 'comment' | 'string';
  name?: string;
}

export interface UnmatchedMacroEndAnomaly extends AnomalyBase {
  kind: 'unmatched-macro-end';
  name?: string;
}

export interface MismatchedMacroEndAnomaly extends AnomalyBase {
  kind: 'mismatched-macro-end';
  expected: string;
  found: string;
}

export interface UnattributedTableAnomaly extends AnomalyBase {
  kind: 'unattributed-table';
  alias: string;
  tableName: string;
}

export interface MissingSchemaAnomaly extends AnomalyBase {
  kind: 'missing-schema';
  alias: string;
}

export interface ConflictingLibraryAnomaly extends AnomalyBase {
  kind: 'conflicting-library';
  alias: string;
  previousDialect: DatabaseDialect;
  dialect: DatabaseDialect;
}

export type Anomaly =
  | UnterminatedBlockAnomaly
  | UnmatchedMacroEndAnomaly
  | MismatchedMacroEndAnomaly
  | UnattributedTableAnomaly
  | MissingSchemaAnomaly
  | ConflictingLibraryAnomaly;

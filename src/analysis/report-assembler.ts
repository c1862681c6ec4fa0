/**
 * Report Assembler
 *
 * Merges component results into the externally visible report. Only plain
 * JSON-ready values leave this module: sets become ordered arrays and
 * internal offsets are reduced to line numbers.
 */

import {
  TABLE_OPERATION_ORDER,
  type Anomaly,
  type ComplexityMetrics,
  type DatabaseDialect,
  type DatabaseHandle,
  type TableOperation,
  type TableReference,
  type VariableBinding,
} from '../types/analysis-types.js';
import { COMPLEXITY_METHOD, type BlockComplexity } from './complexity-calculator.js';
import type { ChunkingResult, CodeChunk } from './code-chunker.js';
import type { DatasetReference, DatasetUsage } from './dataset-usage-extractor.js';
import type {
  DependencyEdge,
  DependencyGraph,
  DependencySummaryEdge,
  IncludeReference,
  MacroStatus,
} from './dependency-graph-builder.js';

export interface OperationTableEntry {
  tableName: string;
  operations: TableOperation[];
}

export interface DatabaseEntry {
  databaseName: string;
  databaseType: DatabaseDialect;
  libraryAlias: string;
  engine: string;
  connectionDetail: string;
  operationTables: OperationTableEntry[];
}

export interface DatabaseUsageReport {
  databases: DatabaseEntry[];
}

export interface UnattributedTableEntry {
  libraryAlias: string;
  tableName: string;
  operations: TableOperation[];
  line: number;
}

export interface DatasetEntry {
  libraryAlias: string;
  datasetName: string;
  /** Present when the library has a `libname` declaration */
  databaseName?: string;
  databaseType?: DatabaseDialect;
  line: number;
}

export interface DatasetReport {
  inputs: DatasetEntry[];
  outputs: DatasetEntry[];
}

export interface MacroEntry {
  name: string;
  parameters: string;
  line: number;
  status: MacroStatus;
  invokes: string[];
  terminated: boolean;
  parent?: string;
}

export interface DependencyReport {
  macros: MacroEntry[];
  edges: Array<Omit<DependencyEdge, 'offset'>>;
  summary: DependencySummaryEdge[];
  unusedMacros: string[];
  externalMacros: string[];
}

export interface ComplexityReport {
  method: typeof COMPLEXITY_METHOD;
  blocks: Record<string, ComplexityMetrics>;
}

export interface ChunkReport {
  maxTokens: number;
  charsPerToken: number;
  macros: Array<{ index: number; name: string; placeholder: string; tokenEstimate: number; code: string }>;
  mainBody: CodeChunk[];
}

export interface AnalysisReport extends DatabaseUsageReport {
  unattributedTables: UnattributedTableEntry[];
  datasets: DatasetReport;
  dependencies: DependencyReport;
  complexity: ComplexityReport;
  includes: Array<Omit<IncludeReference, 'offset'>>;
  chunks: ChunkReport;
  variables: Record<string, string>;
  anomalies: Anomaly[];
}

export interface DatabaseParts {
  handles: DatabaseHandle[];
  references: TableReference[];
  includeUnreferencedLibraries: boolean;
}

export interface ReportParts extends DatabaseParts {
  unattributed: TableReference[];
  datasets: DatasetUsage;
  graph: DependencyGraph;
  complexity: BlockComplexity[];
  chunking: ChunkingResult;
  chunkingOptions: { maxTokens: number; charsPerToken: number };
  variables: VariableBinding[];
  anomalies: Anomaly[];
}

/**
 * Operations of a reference in reporting order
 */
export function orderedOperations(operations: Set<TableOperation>): TableOperation[] {
  return TABLE_OPERATION_ORDER.filter(operation => operations.has(operation));
}

function datasetEntry(reference: DatasetReference): DatasetEntry {
  return {
    libraryAlias: reference.alias,
    datasetName: reference.datasetName,
    ...(reference.handle && {
      databaseName: reference.handle.databaseName,
      databaseType: reference.handle.dialect,
    }),
    line: reference.line,
  };
}

export class ReportAssembler {
  /**
   * Database usage section: one entry per library, tables grouped under it
   */
  assembleDatabases(parts: DatabaseParts): DatabaseUsageReport {
    const tablesByAlias = new Map<string, OperationTableEntry[]>();
    for (const reference of parts.references) {
      const key = reference.alias.toLowerCase();
      const tables = tablesByAlias.get(key) ?? [];
      tables.push({ tableName: reference.tableName, operations: orderedOperations(reference.operations) });
      tablesByAlias.set(key, tables);
    }

    const databases = parts.handles
      .map(handle => ({
        databaseName: handle.databaseName,
        databaseType: handle.dialect,
        libraryAlias: handle.alias,
        engine: handle.engine,
        connectionDetail: handle.connectionDetail,
        operationTables: tablesByAlias.get(handle.alias.toLowerCase()) ?? [],
      }))
      .filter(entry => parts.includeUnreferencedLibraries || entry.operationTables.length > 0);

    return { databases };
  }

  assemble(parts: ReportParts): AnalysisReport {
    const { graph, chunking } = parts;

    const blocks: Record<string, ComplexityMetrics> = {};
    for (const block of parts.complexity) {
      blocks[block.block] = block.metrics;
    }

    const variables: Record<string, string> = {};
    for (const binding of parts.variables) {
      variables[binding.name] = binding.value;
    }

    return {
      ...this.assembleDatabases(parts),
      unattributedTables: parts.unattributed.map(reference => ({
        libraryAlias: reference.alias,
        tableName: reference.tableName,
        operations: orderedOperations(reference.operations),
        line: reference.line,
      })),
      datasets: {
        inputs: parts.datasets.inputs.map(datasetEntry),
        outputs: parts.datasets.outputs.map(datasetEntry),
      },
      dependencies: {
        macros: graph.macros.map(macro => ({
          name: macro.name,
          parameters: macro.parameters,
          line: macro.line,
          status: macro.status,
          invokes: macro.invokes,
          terminated: macro.terminated,
          ...(macro.parent !== undefined && { parent: macro.parent }),
        })),
        edges: graph.edges.map(({ caller, callee, kind, line }) => ({ caller, callee, kind, line })),
        summary: graph.summary,
        unusedMacros: graph.unusedMacros,
        externalMacros: graph.externalMacros,
      },
      complexity: { method: COMPLEXITY_METHOD, blocks },
      includes: graph.includes.map(({ target, quoted, line }) => ({ target, quoted, line })),
      chunks: {
        ...parts.chunkingOptions,
        macros: chunking.macros.map(({ index, name, placeholder, tokenEstimate, code }) => ({
          index,
          name,
          placeholder,
          tokenEstimate,
          code,
        })),
        mainBody: chunking.chunks,
      },
      variables,
      anomalies: [...parts.anomalies].sort((a, b) => a.offset - b.offset),
    };
  }
}

/**
 * Render a report as JSON
 */
export function serializeReport(report: DatabaseUsageReport | AnalysisReport, pretty = false): string {
  return JSON.stringify(report, null, pretty ? 2 : undefined);
}

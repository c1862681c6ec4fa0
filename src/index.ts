/**
 * SAS static-analysis core
 *
 * Scans SAS source text and reports database/table usage, the macro call
 * graph and keyword-count complexity metrics without executing anything.
 */

export {
  analyze,
  validateSource,
  validateOptions,
  AnalyzeOptionsSchema,
  type AnalyzeOptions,
} from './sas-analyzer.js';

export {
  serializeReport,
  ReportAssembler,
  type AnalysisReport,
  type DatabaseUsageReport,
  type DatabaseEntry,
  type OperationTableEntry,
  type UnattributedTableEntry,
  type DatasetEntry,
  type DatasetReport,
  type DependencyReport,
  type ComplexityReport,
  type ChunkReport,
  type MacroEntry,
} from './analysis/report-assembler.js';

export { VariableResolver } from './analysis/variable-resolver.js';
export { LibraryRegistry, dialectForEngine, redactConnectionDetail } from './analysis/library-registry.js';
export { TableOperationExtractor, classifyStatement, type TableExtraction } from './analysis/table-operation-extractor.js';
export {
  DatasetUsageExtractor,
  classifyDatasetStatement,
  type DatasetReference,
  type DatasetUsage,
} from './analysis/dataset-usage-extractor.js';
export {
  DependencyGraphBuilder,
  TOP_LEVEL_CALLER,
  type DependencyGraph,
  type DependencyEdge,
  type DependencySummaryEdge,
  type IncludeReference,
} from './analysis/dependency-graph-builder.js';
export {
  ComplexityCalculator,
  COMPLEXITY_METHOD,
  measureBlock,
  type BlockComplexity,
} from './analysis/complexity-calculator.js';
export { CodeChunker, estimateTokens, type CodeChunk, type ChunkingResult } from './analysis/code-chunker.js';

export { maskSource, splitStatements, LineIndex, type MaskedSource } from './parsers/sas-lexer.js';
export { StatementSegmenter, type Segmentation, type Segment } from './parsers/statement-segmenter.js';

export * from './types/analysis-types.js';
export { AnalysisInputError } from './utils/analysis-errors.js';
export {
  getAnalyzerConfig,
  getConfigInstance,
  clearConfigCache,
  validateAnalyzerConfig,
  type AnalyzerConfig,
} from './config/analyzer-config.js';
export { createLogger, Logger } from './utils/logger.js';

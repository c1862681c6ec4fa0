/**
 * SAS Analyzer
 *
 * Entry point of the analysis core. Validates input, runs every component
 * over one shared segmentation and hands the pieces to the report assembler.
 * Runs are independent: each call builds its own resolver, registry and graph.
 */

import { z } from 'zod';
import { getConfigInstance } from './config/analyzer-config.js';
import { maskSource } from './parsers/sas-lexer.js';
import { StatementSegmenter } from './parsers/statement-segmenter.js';
import { VariableResolver } from './analysis/variable-resolver.js';
import { LibraryRegistry } from './analysis/library-registry.js';
import { TableOperationExtractor } from './analysis/table-operation-extractor.js';
import { DatasetUsageExtractor } from './analysis/dataset-usage-extractor.js';
import { DependencyGraphBuilder } from './analysis/dependency-graph-builder.js';
import { ComplexityCalculator } from './analysis/complexity-calculator.js';
import { CodeChunker } from './analysis/code-chunker.js';
import {
  ReportAssembler,
  type AnalysisReport,
  type DatabaseUsageReport,
} from './analysis/report-assembler.js';
import { AnalysisInputError } from './utils/analysis-errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('SasAnalyzer');

export const AnalyzeOptionsSchema = z
  .object({
    maxTokens: z.number().int().positive().optional().describe('Token budget per main-body chunk'),
    charsPerToken: z.number().positive().max(16).optional().describe('Characters assumed per token'),
    databaseOnly: z.boolean().optional().describe('Return only the database usage section'),
    variables: z.record(z.string()).optional().describe('Macro variables known before the source runs'),
    includeUnreferencedLibraries: z.boolean().optional().describe('Keep libraries with no table operations'),
    redactSecrets: z.boolean().optional().describe('Mask password values in connection details'),
    unitName: z.string().min(1).optional().describe('Name of the analyzed file, used in macro placeholders'),
  })
  .strict();

export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;

const SourceSchema = z
  .string({ invalid_type_error: 'Source must be a string', required_error: 'Source is required' })
  .refine(text => text.trim().length > 0, { message: 'Source is empty' });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Check that the input is non-empty source text
 */
export function validateSource(input: unknown): string {
  const result = SourceSchema.safeParse(input);
  if (!result.success) {
    throw new AnalysisInputError('Invalid SAS source', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Check analyze options against the schema
 */
export function validateOptions(input: unknown): AnalyzeOptions {
  const result = AnalyzeOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new AnalysisInputError('Invalid analyze options', formatIssues(result.error));
  }
  return result.data;
}

export function analyze(source: string, options: AnalyzeOptions & { databaseOnly: true }): DatabaseUsageReport;
export function analyze(source: string, options?: AnalyzeOptions & { databaseOnly?: false }): AnalysisReport;
export function analyze(source: string, options?: AnalyzeOptions): AnalysisReport | DatabaseUsageReport;
export function analyze(source: string, options: AnalyzeOptions = {}): AnalysisReport | DatabaseUsageReport {
  const text = validateSource(source);
  const settings = validateOptions(options);
  const config = getConfigInstance();

  const maxTokens = settings.maxTokens ?? config.chunking.maxTokens;
  const charsPerToken = settings.charsPerToken ?? config.chunking.charsPerToken;
  const includeUnreferencedLibraries =
    settings.includeUnreferencedLibraries ?? config.report.includeUnreferencedLibraries;
  const redactSecrets = settings.redactSecrets ?? config.report.redactSecrets;

  const done = logger.operation('analyze', {
    characters: text.length,
    databaseOnly: settings.databaseOnly === true,
  });

  const masked = maskSource(text);
  const segmentation = new StatementSegmenter().segmentMasked(masked);
  const resolver = VariableResolver.fromSource(masked, settings.variables);
  const registry = LibraryRegistry.fromSource(masked, resolver, { redactSecrets });
  const extraction = new TableOperationExtractor(registry, resolver).extract(segmentation);
  const assembler = new ReportAssembler();

  if (settings.databaseOnly) {
    const usage = assembler.assembleDatabases({
      handles: registry.getHandles(),
      references: extraction.references,
      includeUnreferencedLibraries,
    });
    done();
    return usage;
  }

  const datasets = new DatasetUsageExtractor(registry, resolver).extract(segmentation);
  const graph = new DependencyGraphBuilder(resolver).build(segmentation);
  const complexity = new ComplexityCalculator().calculate(segmentation);
  const chunking = new CodeChunker({ maxTokens, charsPerToken, unitName: settings.unitName }).chunk(segmentation);

  const anomalies = [
    ...segmentation.anomalies,
    ...registry.getAnomalies(),
    ...extraction.anomalies,
  ];
  if (anomalies.length > 0) {
    logger.warn('Source contains structural anomalies', {
      count: anomalies.length,
      kinds: [...new Set(anomalies.map(anomaly => anomaly.kind))],
    });
  }

  const report = assembler.assemble({
    handles: registry.getHandles(),
    references: extraction.references,
    includeUnreferencedLibraries,
    unattributed: extraction.unattributed,
    datasets,
    graph,
    complexity,
    chunking,
    chunkingOptions: { maxTokens, charsPerToken },
    variables: resolver.getBindings(),
    anomalies,
  });

  done();
  return report;
}

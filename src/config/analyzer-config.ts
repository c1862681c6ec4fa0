/**
 * Analyzer Configuration
 *
 * Centralized defaults for the analysis core, layered with per-environment
 * overrides and environment variables. Per-call options passed to `analyze`
 * take precedence over everything in here.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface AnalyzerConfig {
  chunking: {
    maxTokens: number;       // Token budget for one main-body chunk
    charsPerToken: number;   // Characters assumed per token when estimating
  };

  report: {
    includeUnreferencedLibraries: boolean; // Keep libraries with no table operations
    redactSecrets: boolean;                // Mask password values in connection details
  };

  logLevel: LogLevel;
}

interface AnalyzerConfigOverride {
  chunking?: Partial<AnalyzerConfig['chunking']>;
  report?: Partial<AnalyzerConfig['report']>;
  logLevel?: LogLevel;
}

const defaultAnalyzerConfig: AnalyzerConfig = {
  chunking: {
    maxTokens: 4000,
    charsPerToken: 4,
  },

  report: {
    includeUnreferencedLibraries: false,
    redactSecrets: false,
  },

  logLevel: 'info',
};

const environmentOverrides: Record<string, AnalyzerConfigOverride> = {
  development: {
    logLevel: 'debug',
  },

  test: {
    logLevel: 'error',
  },

  production: {
    logLevel: 'info',
    report: {
      redactSecrets: true,
    },
  },
};

/**
 * Get analyzer configuration for the current environment
 */
export function getAnalyzerConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const environment = env.NODE_ENV || 'development';

  let config = mergeConfig(defaultAnalyzerConfig, {});

  const override = environmentOverrides[environment];
  if (override) {
    config = mergeConfig(config, override);
  }

  return applyEnvOverrides(config, env);
}

/**
 * Merge an override into a base configuration without mutating either
 */
export function mergeConfig(base: AnalyzerConfig, override: AnalyzerConfigOverride): AnalyzerConfig {
  return {
    chunking: { ...base.chunking, ...override.chunking },
    report: { ...base.report, ...override.report },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Apply environment variable overrides
 */
function applyEnvOverrides(config: AnalyzerConfig, env: NodeJS.ProcessEnv): AnalyzerConfig {
  const result = mergeConfig(config, {});

  const maxTokens = env.SAS_ANALYZER_MAX_TOKENS;
  if (maxTokens && !isNaN(Number(maxTokens))) {
    result.chunking.maxTokens = Number(maxTokens);
  }

  const charsPerToken = env.SAS_ANALYZER_CHARS_PER_TOKEN;
  if (charsPerToken && !isNaN(Number(charsPerToken))) {
    result.chunking.charsPerToken = Number(charsPerToken);
  }

  const logLevel = env.SAS_ANALYZER_LOG_LEVEL?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) {
    result.logLevel = logLevel;
  }

  return result;
}

/**
 * Validate analyzer configuration
 */
export function validateAnalyzerConfig(config: AnalyzerConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.chunking.maxTokens) || config.chunking.maxTokens < 1) {
    errors.push('Chunk token budget must be a positive integer');
  }

  if (config.chunking.charsPerToken <= 0) {
    errors.push('Characters per token must be greater than zero');
  }

  if (config.chunking.charsPerToken > 16) {
    errors.push('Characters per token too high (maximum 16)');
  }

  return errors;
}

let cachedConfig: AnalyzerConfig | null = null;

export function getConfigInstance(): AnalyzerConfig {
  if (!cachedConfig) {
    const config = getAnalyzerConfig();

    const errors = validateAnalyzerConfig(config);
    if (errors.length > 0) {
      console.warn('Analyzer configuration warnings:', errors);
      cachedConfig = mergeConfig(config, { chunking: defaultAnalyzerConfig.chunking });
    } else {
      cachedConfig = config;
    }
  }

  return cachedConfig;
}

// Clear cached config (useful for testing)
export function clearConfigCache(): void {
  cachedConfig = null;
}

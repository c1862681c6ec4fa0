/**
 * Unit tests for analyzer configuration
 */

import {
  clearConfigCache,
  getAnalyzerConfig,
  getConfigInstance,
  mergeConfig,
  validateAnalyzerConfig,
} from '../analyzer-config';

describe('getAnalyzerConfig', () => {
  it('should quiet logging under test', () => {
    const config = getAnalyzerConfig({ NODE_ENV: 'test' });

    expect(config).toEqual({
      chunking: { maxTokens: 4000, charsPerToken: 4 },
      report: { includeUnreferencedLibraries: false, redactSecrets: false },
      logLevel: 'error',
    });
  });

  it('should redact secrets in production', () => {
    const config = getAnalyzerConfig({ NODE_ENV: 'production' });

    expect(config.report.redactSecrets).toBe(true);
    expect(config.logLevel).toBe('info');
  });

  it('should default to development settings', () => {
    expect(getAnalyzerConfig({}).logLevel).toBe('debug');
  });

  it('should apply environment variable overrides', () => {
    const config = getAnalyzerConfig({
      NODE_ENV: 'test',
      SAS_ANALYZER_MAX_TOKENS: '1000',
      SAS_ANALYZER_CHARS_PER_TOKEN: '3',
      SAS_ANALYZER_LOG_LEVEL: 'WARN',
    });

    expect(config.chunking).toEqual({ maxTokens: 1000, charsPerToken: 3 });
    expect(config.logLevel).toBe('warn');
  });

  it('should ignore malformed overrides', () => {
    const config = getAnalyzerConfig({
      NODE_ENV: 'test',
      SAS_ANALYZER_MAX_TOKENS: 'lots',
      SAS_ANALYZER_LOG_LEVEL: 'verbose',
    });

    expect(config.chunking.maxTokens).toBe(4000);
    expect(config.logLevel).toBe('error');
  });
});

describe('validateAnalyzerConfig', () => {
  it('should accept the defaults', () => {
    expect(validateAnalyzerConfig(getAnalyzerConfig({ NODE_ENV: 'test' }))).toEqual([]);
  });

  it('should describe every problem', () => {
    const config = mergeConfig(getAnalyzerConfig({ NODE_ENV: 'test' }), {
      chunking: { maxTokens: 0, charsPerToken: 20 },
    });

    expect(validateAnalyzerConfig(config)).toEqual([
      'Chunk token budget must be a positive integer',
      'Characters per token too high (maximum 16)',
    ]);
  });
});

describe('getConfigInstance', () => {
  const originalEnv = process.env;

  afterEach(() => {
    process.env = originalEnv;
    clearConfigCache();
  });

  it('should cache the configuration until cleared', () => {
    process.env = { ...originalEnv, NODE_ENV: 'test', SAS_ANALYZER_MAX_TOKENS: '123' };
    clearConfigCache();

    const first = getConfigInstance();
    process.env = { ...originalEnv, NODE_ENV: 'test', SAS_ANALYZER_MAX_TOKENS: '456' };

    expect(getConfigInstance()).toBe(first);
    expect(first.chunking.maxTokens).toBe(123);

    clearConfigCache();
    expect(getConfigInstance().chunking.maxTokens).toBe(456);
  });

  it('should fall back to default chunking when the environment is invalid', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    process.env = { ...originalEnv, NODE_ENV: 'test', SAS_ANALYZER_MAX_TOKENS: '-5' };
    clearConfigCache();

    expect(getConfigInstance().chunking.maxTokens).toBe(4000);
    expect(warn).toHaveBeenCalledWith('Analyzer configuration warnings:', [
      'Chunk token budget must be a positive integer',
    ]);
    warn.mockRestore();
  });
});

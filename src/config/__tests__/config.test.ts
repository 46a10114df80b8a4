import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, loadConfigFile } from '../index';

describe('loadConfig', () => {
  test('fills in defaults around the required key', () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret' });

    expect(config).toEqual({
      LLM_PROVIDER: 'openai',
      LLM_MODEL: 'gpt-4o-mini',
      LLM_BASE_URL: 'http://litellm:4000',
      LLM_API_KEY: 'test-secret',
      LLM_TIMEOUT_MS: 60000,
      LLM_MAX_ATTEMPTS: 3,
      ICD10_BASE_URL: 'https://clinicaltables.nlm.nih.gov',
      RXNORM_BASE_URL: 'https://rxnav.nlm.nih.gov',
      LOOKUP_TIMEOUT_MS: 10000,
      LOOKUP_MAX_CANDIDATES: 5,
      LOOKUP_MAX_CONCURRENCY: 8,
      PIPELINE_PARALLEL_ENRICHMENT: false,
      PIPELINE_RUN_DEADLINE_MS: null,
    });
  });

  test('requires an API key', () => {
    expect(() => loadConfig({})).toThrow('Missing required environment variable: LLM_API_KEY');
  });

  test('picks provider specific defaults', () => {
    const config = loadConfig({ LLM_API_KEY: 'test-secret', LLM_PROVIDER: 'anthropic' });

    expect(config.LLM_BASE_URL).toBe('https://api.anthropic.com');
    expect(config.LLM_MODEL).toBe('claude-3-5-sonnet-latest');
  });

  test('rejects an unknown provider', () => {
    expect(() => loadConfig({ LLM_API_KEY: 'test-secret', LLM_PROVIDER: 'mystery' })).toThrow(
      /^Invalid value for environment variable LLM_PROVIDER: mystery/
    );
  });

  test.each(['abc', '0', '-5', '1.5'])('rejects %s as a timeout', (value) => {
    expect(() => loadConfig({ LLM_API_KEY: 'test-secret', LOOKUP_TIMEOUT_MS: value })).toThrow(
      `Invalid value for environment variable LOOKUP_TIMEOUT_MS: ${value}`
    );
  });

  test('reads pipeline switches', () => {
    const config = loadConfig({
      LLM_API_KEY: 'test-secret',
      PIPELINE_PARALLEL_ENRICHMENT: 'true',
      PIPELINE_RUN_DEADLINE_MS: '30000',
    });

    expect(config.PIPELINE_PARALLEL_ENRICHMENT).toBe(true);
    expect(config.PIPELINE_RUN_DEADLINE_MS).toBe(30000);
  });

  test('rejects a boolean flag that is not true or false', () => {
    expect(() => loadConfig({ LLM_API_KEY: 'test-secret', PIPELINE_PARALLEL_ENRICHMENT: 'yes' })).toThrow(
      /PIPELINE_PARALLEL_ENRICHMENT: yes/
    );
  });

  test('never logs the API key', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const previous = process.env.LOG_LEVEL;
    process.env.LOG_LEVEL = 'INFO';
    try {
      loadConfig({ LLM_API_KEY: 'test-secret' });
      const output = spy.mock.calls.map((args) => args.join(' ')).join('\n');
      expect(output).toContain('LLM_API_KEY: ***masked***');
      expect(output).not.toContain('test-secret');
    } finally {
      if (previous === undefined) {
        delete process.env.LOG_LEVEL;
      } else {
        process.env.LOG_LEVEL = previous;
      }
      spy.mockRestore();
    }
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'note-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('reads values from an env file and lets the environment win', () => {
    const path = join(dir, '.env');
    writeFileSync(path, 'LLM_API_KEY=test-secret\nLLM_MODEL=file-model\nLOOKUP_MAX_CANDIDATES=3\n');

    const config = loadConfigFile(path, { LLM_MODEL: 'env-model' });

    expect(config.LLM_API_KEY).toBe('test-secret');
    expect(config.LLM_MODEL).toBe('env-model');
    expect(config.LOOKUP_MAX_CANDIDATES).toBe(3);
  });
});

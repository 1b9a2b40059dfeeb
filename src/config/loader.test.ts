import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, parseConfig, mergeConfig, ConfigError } from './loader.js';
import { defaultConfig } from './defaults.js';

describe('config loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'grader-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the defaults when no file or overrides are given', () => {
    const config = loadConfig({ configPath: undefined, env: {} });
    expect(config.inference.model).toBe('codellama:7b');
    expect(config.inference.temperature).toBe(0.2);
    expect(config.inference.timeoutMs).toBe(45000);
    expect(config.requirements.maxChars).toBe(2500);
    expect(config.prompt.maxContentChars).toBe(2500);
    expect(config.report.totalDenominator).toBe(40);
    expect(config.archive.fileExtensions).toEqual(['.py', '.yaml', '.yml']);
  });

  it('layers file, environment and explicit overrides in that order', () => {
    const file = join(dir, 'grader.yaml');
    writeFileSync(file, [
      'outputPath: out.csv',
      'debug: true',
      'inference:',
      '  host: http://file-host:1',
      '  model: llama3:8b',
      'report:',
      '  totalDenominator: 30',
    ].join('\n'));

    const config = loadConfig({
      configPath: file,
      env: { OLLAMA_HOST: 'http://env-host:2' },
      overrides: { inference: { model: 'qwen2.5-coder:7b' } },
    });

    expect(config.outputPath).toBe('out.csv');
    expect(config.debug).toBe(true);
    expect(config.inference.host).toBe('http://env-host:2');
    expect(config.inference.model).toBe('qwen2.5-coder:7b');
    expect(config.inference.temperature).toBe(0.2);
    expect(config.report.totalDenominator).toBe(30);
  });

  it('lets a null format switch the response-format hint off', () => {
    const overrides = parseConfig({ inference: { format: null } });
    const config = mergeConfig(defaultConfig(), overrides);
    expect(config.inference.format).toBeNull();
  });

  it('keeps base values for keys the overrides leave out', () => {
    const config = mergeConfig(defaultConfig(), { inference: { model: undefined } });
    expect(config.inference.model).toBe('codellama:7b');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => loadConfig({ configPath: join(dir, 'nope.yaml'), env: {} })).toThrow(ConfigError);
  });

  it('names the field path of a wrongly typed value', () => {
    expect(() => parseConfig({ requirements: { maxChars: 'lots' } })).toThrow(
      'requirements.maxChars must be a number'
    );
    expect(() => parseConfig({ report: { totalDenominator: 0 } })).toThrow(
      'report.totalDenominator must be a positive integer'
    );
    expect(() => parseConfig({ archive: { fileExtensions: ['.py', 3] } })).toThrow(
      'archive.fileExtensions[1] must be a non-empty string'
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => parseConfig({ inference: { provider: 'openai' } })).toThrow(
      'inference.provider must be one of: ollama, anthropic'
    );
  });

  it('rejects a config that is not a mapping', () => {
    expect(() => parseConfig(['a', 'b'])).toThrow('config must be a mapping');
  });

  it('treats an empty YAML file as no overrides', () => {
    const file = join(dir, 'empty.yaml');
    writeFileSync(file, '');
    const config = loadConfig({ configPath: file, env: {} });
    expect(config).toEqual({ ...defaultConfig(), workDir: config.workDir });
  });
});

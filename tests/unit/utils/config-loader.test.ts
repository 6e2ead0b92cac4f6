import { describe, it, expect } from 'vitest';
import { DEFAULT_INFER_CONFIG, loadInferConfig, parseList } from '../../../src/utils/config-loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('parseList', () => {
  it('should split on commas and drop blanks', () => {
    expect(parseList(' Patient, ,Condition ')).toEqual(['Patient', 'Condition']);
  });

  it('should return undefined when nothing is left', () => {
    expect(parseList(undefined)).toBeUndefined();
    expect(parseList(' , ')).toBeUndefined();
  });
});

describe('loadInferConfig', () => {
  it('should apply defaults', () => {
    expect(loadInferConfig('/data/export')).toEqual({
      input: { path: '/data/export', recursive: false },
      defaults: { bundled: true },
      output: { format: 'json' },
      fieldOrder: DEFAULT_INFER_CONFIG.fieldOrder,
      partitions: 1,
    });
  });

  it('should let CLI options override the config file', () => {
    const config = loadInferConfig(
      undefined,
      { partitions: 2, resource: 'Patient,Condition', outputDir: '/out' },
      {
        input: { path: '/from-file', recursive: true, resourceTypes: ['Observation'] },
        output: { format: 'arrow', dir: '/file-out' },
        fieldOrder: 'reference',
        partitions: 4,
      },
    );

    expect(config).toEqual({
      input: { path: '/from-file', recursive: true, resourceTypes: ['Patient', 'Condition'] },
      defaults: { bundled: true },
      output: { format: 'arrow', dir: '/out' },
      fieldOrder: 'reference',
      partitions: 2,
    });
  });

  it('should prefer the positional input directory', () => {
    expect(loadInferConfig('/cli', {}, { input: { path: '/file' } }).input.path).toBe('/cli');
  });

  it('should only turn off bundled defaults when asked', () => {
    expect(loadInferConfig('/d', { bundledDefaults: true }, { defaults: { bundled: false } }).defaults).toEqual({
      bundled: false,
    });
    expect(loadInferConfig('/d', { bundledDefaults: false }).defaults.bundled).toBe(false);
    expect(
      loadInferConfig('/d', { defaults: 'fields.yaml' }, { defaults: { file: 'other.yaml' } }).defaults,
    ).toEqual({ bundled: true, file: 'fields.yaml' });
  });

  it('should require an input directory', () => {
    expect(() => loadInferConfig(undefined)).toThrow(ConfigError);
  });

  it('should reject invalid values', () => {
    expect(() => loadInferConfig('/d', { fieldOrder: 'random' })).toThrow(
      'Invalid field order: random. Must be one of observed, reference, alphabetical',
    );
    expect(() => loadInferConfig('/d', { format: 'parquet' })).toThrow(ConfigError);
    expect(() => loadInferConfig('/d', { partitions: Number.NaN })).toThrow(
      'Partition count must be a positive integer, got NaN',
    );
    expect(() => loadInferConfig('/d', { partitions: 0 })).toThrow(ConfigError);
  });

  it('should require an output directory for arrow output', () => {
    expect(() => loadInferConfig('/d', { format: 'arrow' })).toThrow(
      'Arrow output needs an output directory (--output-dir)',
    );
  });
});

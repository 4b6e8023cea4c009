/**
 * Run configuration tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { findConfigFile, loadRunConfig, readConfigFile, resolveRunConfig } from '../run-config.js';
import { ConfigurationError } from '../../reliability/errors.js';

describe('resolveRunConfig', () => {
  it('applies defaults relative to cwd', () => {
    expect(resolveRunConfig({}, '/work')).toEqual({
      papersDir: path.resolve('/work', 'data/papers_json'),
      policyPath: path.resolve('/work', 'policy/checklist.json'),
      outDir: path.resolve('/work', 'results'),
      reportsDir: path.join(path.resolve('/work', 'results'), 'reports'),
      topK: 5,
      mode: 'basic',
      evidenceTypeBonuses: {},
      maxPointersPerCriterion: 8,
    });
  });

  it('keeps explicit values', () => {
    const config = resolveRunConfig(
      {
        papersDir: 'in',
        outDir: '/tmp/out',
        reportsDir: 'md',
        topK: 3,
        mode: 'extended',
        evidenceTypeBonuses: { Survey: 0.1 },
      },
      '/work'
    );

    expect(config.papersDir).toBe(path.resolve('/work', 'in'));
    expect(config.outDir).toBe(path.resolve('/tmp/out'));
    expect(config.reportsDir).toBe(path.resolve('/work', 'md'));
    expect(config.topK).toBe(3);
    expect(config.mode).toBe('extended');
    expect(config.evidenceTypeBonuses).toEqual({ Survey: 0.1 });
  });

  it('rejects invalid fields with their names', () => {
    try {
      resolveRunConfig({ topK: 0, mode: 'fancy' }, '/work');
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(Object.keys(error.fieldErrors ?? {})).toEqual(['topK', 'mode']);
      expect(error.message.startsWith('Invalid run configuration:\n  - topK: ')).toBe(true);
    }
  });

  it('rejects negative or infinite evidence-type bonuses', () => {
    try {
      resolveRunConfig(
        { evidenceTypeBonuses: { Survey: -0.5, Anecdote: Number.POSITIVE_INFINITY, 'Case Study': 0 } },
        '/work'
      );
      expect.unreachable('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (!(error instanceof ConfigurationError)) return;
      expect(Object.keys(error.fieldErrors ?? {})).toEqual([
        'evidenceTypeBonuses.Survey',
        'evidenceTypeBonuses.Anecdote',
      ]);
    }
  });

  it('rejects unknown keys', () => {
    expect(() => resolveRunConfig({ top_k: 3 }, '/work')).toThrow(ConfigurationError);
  });
});

describe('config files', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scorecard-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('finds the default config file', () => {
    expect(findConfigFile(tmpDir)).toBeUndefined();

    fs.writeFileSync(path.join(tmpDir, 'scorecard.config.yml'), 'topK: 2\n');
    expect(findConfigFile(tmpDir)).toBe(path.join(tmpDir, 'scorecard.config.yml'));
  });

  it('requires an explicit config file to exist', () => {
    expect(() => findConfigFile(tmpDir, 'missing.yaml')).toThrow(
      `Config file not found: ${path.join(tmpDir, 'missing.yaml')}`
    );
  });

  it('reads YAML and JSON, treating an empty file as no settings', () => {
    const yamlFile = path.join(tmpDir, 'a.yaml');
    const jsonFile = path.join(tmpDir, 'b.json');
    const emptyFile = path.join(tmpDir, 'c.yaml');
    fs.writeFileSync(yamlFile, 'mode: extended\ntopK: 4\n');
    fs.writeFileSync(jsonFile, '{"outDir": "reports-out"}');
    fs.writeFileSync(emptyFile, '');

    expect(readConfigFile(yamlFile)).toEqual({ mode: 'extended', topK: 4 });
    expect(readConfigFile(jsonFile)).toEqual({ outDir: 'reports-out' });
    expect(readConfigFile(emptyFile)).toEqual({});
  });

  it('rejects a config file that is not a mapping', () => {
    const listFile = path.join(tmpDir, 'list.yaml');
    fs.writeFileSync(listFile, '- a\n- b\n');
    expect(() => readConfigFile(listFile)).toThrow(`Config file ${listFile} must contain a mapping`);
  });

  it('lets overrides win over the config file', () => {
    fs.writeFileSync(
      path.join(tmpDir, 'scorecard.config.yaml'),
      'papersDir: docs\ntopK: 2\nmode: extended\n'
    );

    const config = loadRunConfig({ cwd: tmpDir, overrides: { topK: 7, mode: undefined } });

    expect(config.papersDir).toBe(path.join(tmpDir, 'docs'));
    expect(config.topK).toBe(7);
    expect(config.mode).toBe('extended');
  });
});

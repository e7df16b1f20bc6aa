import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { StrataError } from '@strata/core';
import { LoadConfig } from '../config-loader';

const ENV_KEYS = ['STRATA_SOURCES', 'STRATA_PLATFORM', 'STRATA_WARNINGS_AS_ERRORS'];

function clearEnv(): void {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
}

describe('LoadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    clearEnv();
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-cli-'));
  });

  afterEach(() => {
    clearEnv();
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): void {
    fs.mkdirSync(path.dirname(path.join(cwd, name)), { recursive: true });
    fs.writeFileSync(path.join(cwd, name), content);
  }

  it('takes sources from CLI flags and applies defaults', () => {
    const config = LoadConfig({ Sources: 'schema/orders, schema/billing' }, cwd);

    expect(config.Sources).toEqual(['schema/orders', 'schema/billing']);
    expect(config.Platforms).toEqual(['all']);
    expect(config.TreatWarningsAsErrors).toBe(false);
    expect(config.FilePatterns).toBeUndefined();
    expect(config.ManifestFile).toBeUndefined();
  });

  it('requires a source', () => {
    expect(() => LoadConfig({}, cwd)).toThrow(StrataError);
    expect(() => LoadConfig({}, cwd)).toThrow(/At least one package source is required/);
  });

  it('reads environment variables', () => {
    process.env.STRATA_SOURCES = 'from-env';
    process.env.STRATA_PLATFORM = 'mysql,all';
    process.env.STRATA_WARNINGS_AS_ERRORS = 'yes';

    const config = LoadConfig({}, cwd);

    expect(config.Sources).toEqual(['from-env']);
    expect(config.Platforms).toEqual(['mysql', 'all']);
    expect(config.TreatWarningsAsErrors).toBe(true);
  });

  it('reads a .env file', () => {
    writeFile('.env', 'STRATA_SOURCES=dotenv-source\n');
    expect(LoadConfig({}, cwd).Sources).toEqual(['dotenv-source']);
  });

  it('reads camelCase keys from strata.json', () => {
    writeFile(
      'strata.json',
      JSON.stringify({ sources: ['pkg'], platforms: 'postgresql', treatWarningsAsErrors: true, manifestFile: 'version.yaml' })
    );

    const config = LoadConfig({}, cwd);

    expect(config.Sources).toEqual([path.join(cwd, 'pkg')]);
    expect(config.Platforms).toEqual(['postgresql']);
    expect(config.TreatWarningsAsErrors).toBe(true);
    expect(config.ManifestFile).toBe('version.yaml');
  });

  it('lets CLI flags override the config file', () => {
    writeFile('strata.json', JSON.stringify({ Sources: ['pkg'], Platforms: ['mysql'] }));

    const config = LoadConfig({ Sources: 'cli-pkg', Platform: 'oracle', WarningsAsErrors: true }, cwd);

    expect(config.Sources).toEqual(['cli-pkg']);
    expect(config.Platforms).toEqual(['oracle']);
    expect(config.TreatWarningsAsErrors).toBe(true);
  });

  it('resolves file sources against an explicit config location', () => {
    writeFile('conf/strata.json', JSON.stringify({ sources: '../pkg' }));
    const config = LoadConfig({ Config: 'conf/strata.json' }, cwd);
    expect(config.Sources).toEqual([path.join(cwd, 'pkg')]);
  });

  it('rejects unknown config keys', () => {
    writeFile('strata.json', JSON.stringify({ sauces: ['pkg'] }));
    expect(() => LoadConfig({}, cwd)).toThrow(/Unrecognized key\(s\) in object: 'sauces'/);
  });

  it('rejects a missing explicit config file', () => {
    expect(() => LoadConfig({ Config: 'nope.json' }, cwd)).toThrow(
      `Config file not found: ${path.join(cwd, 'nope.json')}`
    );
  });
});

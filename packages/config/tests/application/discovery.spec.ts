import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { resolveConfigPath } from '../../src/discovery.js';

const YAML_SETTINGS = 'version: 1\nroot:\n  level: INFO\n';
const INI_SETTINGS = '[loggers]\nkeys=root\n\n[logger_root]\nlevel=INFO\nhandlers=\n';

describe('resolveConfigPath', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), 'evtlog-discovery-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('returns an explicit path that exists', async () => {
    await writeFile(path.join(directory, 'custom.yaml'), YAML_SETTINGS);

    await expect(resolveConfigPath({ cwd: directory, configPath: 'custom.yaml' })).resolves.toBe(
      path.join(directory, 'custom.yaml'),
    );
  });

  it('rejects an explicit path that does not exist', async () => {
    await expect(resolveConfigPath({ cwd: directory, configPath: 'nope.yaml' })).rejects.toThrow(
      'Configuration file not found: nope.yaml',
    );
  });

  it('finds the default YAML file', async () => {
    await writeFile(path.join(directory, 'evtlog.config.yaml'), YAML_SETTINGS);

    await expect(resolveConfigPath({ cwd: directory })).resolves.toBe(
      path.join(directory, 'evtlog.config.yaml'),
    );
  });

  it('prefers earlier candidates', async () => {
    await writeFile(path.join(directory, '.evtlogrc'), INI_SETTINGS);
    await writeFile(path.join(directory, 'evtlog.config.yml'), YAML_SETTINGS);

    await expect(resolveConfigPath({ cwd: directory })).resolves.toBe(
      path.join(directory, 'evtlog.config.yml'),
    );
  });

  it('reads an extensionless rc file holding INI', async () => {
    await writeFile(path.join(directory, '.evtlogrc'), INI_SETTINGS);

    await expect(resolveConfigPath({ cwd: directory })).resolves.toBe(
      path.join(directory, '.evtlogrc'),
    );
  });

  it('searches custom candidates only', async () => {
    await writeFile(path.join(directory, 'evtlog.config.yaml'), YAML_SETTINGS);
    await writeFile(path.join(directory, 'logging.yml'), YAML_SETTINGS);

    await expect(resolveConfigPath({ cwd: directory, candidates: ['logging.yml'] })).resolves.toBe(
      path.join(directory, 'logging.yml'),
    );
  });

  it('fails when no candidate exists', async () => {
    await expect(resolveConfigPath({ cwd: directory })).rejects.toThrow(
      'Unable to locate evtlog configuration file in the current directory.',
    );
  });
});

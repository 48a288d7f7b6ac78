/**
 * Tests for config engine.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, getConfigValue, DEFAULTS } from '../config.js';
import { ExitCode } from '../../types/exit-codes.js';

const ENV_KEYS = [
  'TASKLANE_HOME',
  'TASKLANE_DIR',
  'TASKLANE_FORMAT',
  'TASKLANE_LOCK_STALE_MS',
  'TASKLANE_LOCK_RETRIES',
  'TASKLANE_BACKUP_MAX_SNAPSHOTS',
  'TASKLANE_MILESTONE_MAX_TASKS',
  'TASKLANE_LOG_LEVEL',
  'TASKLANE_LOG_FILE',
] as const;

describe('config', () => {
  let tempDir: string;
  let projectDir: string;
  const saved = new Map<string, string | undefined>();

  beforeEach(async () => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-config-test-'));
    projectDir = join(tempDir, 'project');
    // Point to a global config directory of our own
    process.env['TASKLANE_HOME'] = join(tempDir, 'global');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  async function writeProjectConfig(data: unknown): Promise<void> {
    await mkdir(join(projectDir, '.tasklane'), { recursive: true });
    await writeFile(join(projectDir, '.tasklane', 'config.json'), JSON.stringify(data));
  }

  async function writeGlobalConfig(data: unknown): Promise<void> {
    await mkdir(join(tempDir, 'global'), { recursive: true });
    await writeFile(join(tempDir, 'global', 'config.json'), JSON.stringify(data));
  }

  describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
      expect(await loadConfig(projectDir)).toEqual(DEFAULTS);
    });

    it('merges project config over defaults', async () => {
      await writeProjectConfig({ output: { defaultFormat: 'human' }, lock: { retries: 0 } });
      const config = await loadConfig(projectDir);
      expect(config.output.defaultFormat).toBe('human');
      expect(config.lock).toEqual({ ...DEFAULTS.lock, retries: 0 });
      expect(config.milestones.defaultMaxTasks).toBe(5);
    });

    it('layers project config over global config', async () => {
      await writeGlobalConfig({ backup: { maxSnapshots: 3 }, scope: { defaultMaxFileChanges: 4 } });
      await writeProjectConfig({ scope: { defaultMaxFileChanges: 6 } });
      const config = await loadConfig(projectDir);
      expect(config.backup.maxSnapshots).toBe(3);
      expect(config.scope.defaultMaxFileChanges).toBe(6);
    });

    it('applies environment overrides last', async () => {
      await writeProjectConfig({ milestones: { defaultMaxTasks: 8 } });
      process.env['TASKLANE_MILESTONE_MAX_TASKS'] = '6';
      process.env['TASKLANE_FORMAT'] = 'human';
      const config = await loadConfig(projectDir);
      expect(config.milestones.defaultMaxTasks).toBe(6);
      expect(config.output.defaultFormat).toBe('human');
    });

    it('rejects an unknown key with CONFIG_ERROR', async () => {
      await writeProjectConfig({ hierarchy: { maxDepth: 3 } });
      await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
    });

    it('rejects a bad environment value with CONFIG_ERROR', async () => {
      process.env['TASKLANE_LOCK_RETRIES'] = 'lots';
      await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
    });

    it('honours an absolute TASKLANE_DIR', async () => {
      const stateDir = join(tempDir, 'elsewhere');
      await mkdir(stateDir, { recursive: true });
      await writeFile(join(stateDir, 'config.json'), JSON.stringify({ logging: { level: 'debug' } }));
      process.env['TASKLANE_DIR'] = stateDir;
      expect((await loadConfig(projectDir)).logging.level).toBe('debug');
    });
  });

  describe('getConfigValue', () => {
    it('reports the default source', async () => {
      expect(await getConfigValue('lock.staleMs', projectDir)).toEqual({ value: 10_000, source: 'default' });
    });

    it('reports project, global and env sources', async () => {
      await writeGlobalConfig({ backup: { maxSnapshots: 3 } });
      await writeProjectConfig({ output: { defaultFormat: 'human' } });
      process.env['TASKLANE_LOCK_RETRIES'] = '7';

      expect(await getConfigValue('backup.maxSnapshots', projectDir)).toEqual({ value: 3, source: 'global' });
      expect(await getConfigValue('output.defaultFormat', projectDir)).toEqual({ value: 'human', source: 'project' });
      expect(await getConfigValue('lock.retries', projectDir)).toEqual({ value: 7, source: 'env' });
    });

    it('returns undefined for an unknown key', async () => {
      expect(await getConfigValue('nope.missing', projectDir)).toEqual({ value: undefined, source: 'default' });
    });
  });
});

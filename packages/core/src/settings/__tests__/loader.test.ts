/**
 * @fileoverview Settings Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  applyEnvOverrides,
  createDefaultSettings,
  getSettingsPath,
  loadSettings,
  loadUserSettings,
  mergeSettings,
} from '../index.js';

describe('settings loader', () => {
  let homeDir: string;

  beforeEach(async () => {
    homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'settings-test-'));
  });

  afterEach(async () => {
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  async function writeSettings(content: string): Promise<string> {
    const settingsPath = getSettingsPath(homeDir);
    await fs.mkdir(path.dirname(settingsPath), { recursive: true });
    await fs.writeFile(settingsPath, content, 'utf-8');
    return settingsPath;
  }

  describe('createDefaultSettings', () => {
    it('places data files under ~/.tasklist', () => {
      const settings = createDefaultSettings(homeDir);

      expect(settings).toEqual({
        storage: {
          backend: 'sqlite',
          key: 'TODOS',
          filePath: path.join(homeDir, '.tasklist', 'tasks.json'),
          sqlitePath: path.join(homeDir, '.tasklist', 'tasks.db'),
        },
        logging: { level: 'warn', pretty: false },
      });
    });
  });

  describe('loadUserSettings', () => {
    it('returns null when the file does not exist', async () => {
      await expect(loadUserSettings(getSettingsPath(homeDir))).resolves.toBeNull();
    });

    it('returns the validated overrides', async () => {
      const settingsPath = await writeSettings(JSON.stringify({ storage: { backend: 'file' } }));
      await expect(loadUserSettings(settingsPath)).resolves.toEqual({ storage: { backend: 'file' } });
    });

    it('returns null for invalid JSON', async () => {
      const settingsPath = await writeSettings('{ storage: ');
      await expect(loadUserSettings(settingsPath)).resolves.toBeNull();
    });

    it('returns null for unknown keys or bad values', async () => {
      const unknownKey = await writeSettings(JSON.stringify({ theme: 'dark' }));
      await expect(loadUserSettings(unknownKey)).resolves.toBeNull();

      const badBackend = await writeSettings(JSON.stringify({ storage: { backend: 'postgres' } }));
      await expect(loadUserSettings(badBackend)).resolves.toBeNull();

      const emptyKey = await writeSettings(JSON.stringify({ storage: { key: '' } }));
      await expect(loadUserSettings(emptyKey)).resolves.toBeNull();
    });
  });

  describe('mergeSettings', () => {
    it('overrides only the fields given', () => {
      const base = createDefaultSettings(homeDir);
      const merged = mergeSettings(base, { storage: { key: 'work' }, logging: { pretty: true } });

      expect(merged.storage).toEqual({ ...base.storage, key: 'work' });
      expect(merged.logging).toEqual({ level: 'warn', pretty: true });
    });

    it('returns the base when there are no overrides', () => {
      const base = createDefaultSettings(homeDir);
      expect(mergeSettings(base, null)).toBe(base);
    });
  });

  describe('applyEnvOverrides', () => {
    it('reads every supported variable', () => {
      const settings = applyEnvOverrides(createDefaultSettings(homeDir), {
        TASKLIST_STORAGE_BACKEND: 'FILE',
        TASKLIST_STORAGE_KEY: ' work ',
        TASKLIST_FILE_PATH: '/tmp/tasks.json',
        TASKLIST_DB_PATH: ':memory:',
        LOG_LEVEL: 'debug',
        TASKLIST_LOG_PRETTY: 'yes',
      });

      expect(settings).toEqual({
        storage: {
          backend: 'file',
          key: 'work',
          filePath: '/tmp/tasks.json',
          sqlitePath: ':memory:',
        },
        logging: { level: 'debug', pretty: true },
      });
    });

    it('falls back on invalid values', () => {
      const base = createDefaultSettings(homeDir);
      const settings = applyEnvOverrides(base, {
        TASKLIST_STORAGE_BACKEND: 'postgres',
        TASKLIST_STORAGE_KEY: '   ',
        LOG_LEVEL: 'loud',
        TASKLIST_LOG_PRETTY: 'maybe',
      });

      expect(settings).toEqual(base);
    });
  });

  describe('loadSettings', () => {
    it('layers defaults, file and environment', async () => {
      await writeSettings(JSON.stringify({
        storage: { backend: 'file', key: 'from-file' },
        logging: { level: 'info' },
      }));

      const settings = await loadSettings({ homeDir, env: { TASKLIST_STORAGE_KEY: 'from-env' } });

      expect(settings.storage.backend).toBe('file');
      expect(settings.storage.key).toBe('from-env');
      expect(settings.storage.filePath).toBe(path.join(homeDir, '.tasklist', 'tasks.json'));
      expect(settings.logging.level).toBe('info');
    });

    it('uses the defaults when nothing is configured', async () => {
      await expect(loadSettings({ homeDir, env: {} })).resolves.toEqual(createDefaultSettings(homeDir));
    });

    it('reads an explicit settings path', async () => {
      const settingsPath = path.join(homeDir, 'custom.json');
      await fs.writeFile(settingsPath, JSON.stringify({ storage: { backend: 'memory' } }), 'utf-8');

      const settings = await loadSettings({ homeDir, settingsPath, env: {} });
      expect(settings.storage.backend).toBe('memory');
    });
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import {
  USER_CONFIG_FILENAME,
  getUserConfigPath,
  loadUserConfig,
  readEnvOverrides,
  resolveConfig,
} from './user-config.js';
import { globalLogger, LogLevel } from '../core/Logger.js';

describe('user-config', () => {
  let testDir: string;

  beforeEach(() => {
    globalLogger.setLevel(LogLevel.SILENT);
    testDir = path.join(tmpdir(), `notebook-config-test-${randomUUID()}`);
    fs.mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    globalLogger.setLevel(LogLevel.INFO);
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function writeUserConfig(content: unknown): void {
    fs.writeFileSync(
      path.join(testDir, USER_CONFIG_FILENAME),
      typeof content === 'string' ? content : JSON.stringify(content),
    );
  }

  describe('loadUserConfig', () => {
    it('should return null when the file does not exist', () => {
      expect(loadUserConfig(testDir)).toBeNull();
      expect(getUserConfigPath(testDir)).toBe(
        path.join(testDir, 'config.json'),
      );
    });

    it('should strip documentation keys', () => {
      writeUserConfig({
        $schema: './schema.json',
        _docs: 'Local overrides',
        search: { _note: 'fewer results', defaultLimit: 7 },
      });

      expect(loadUserConfig(testDir)).toEqual({ search: { defaultLimit: 7 } });
    });

    it('should return null for invalid JSON', () => {
      writeUserConfig('{ not json');

      expect(loadUserConfig(testDir)).toBeNull();
    });

    it('should return null when values fail validation', () => {
      writeUserConfig({ embeddings: { dimensions: -3 } });

      expect(loadUserConfig(testDir)).toBeNull();
    });
  });

  describe('readEnvOverrides', () => {
    it('should map environment variables onto config sections', () => {
      const overrides = readEnvOverrides({
        NOTEBOOK_SEARCH_BACKUP_DIR: ['/data/a', '/data/b'].join(path.delimiter),
        NOTEBOOK_SEARCH_SOURCE: 'api',
        NOTEBOOK_SEARCH_OCR: 'off',
        NOTEBOOK_SEARCH_MODEL: 'test-model',
        NOTEBOOK_SEARCH_API_TOKEN: 'test-secret',
      });

      expect(overrides).toEqual({
        sources: { backupRoots: ['/data/a', '/data/b'], backend: 'remote' },
        ocr: { enabled: false },
        embeddings: { model: 'test-model' },
        remote: { accessToken: 'test-secret' },
      });
    });

    it('should ignore blank and unknown values', () => {
      expect(
        readEnvOverrides({
          NOTEBOOK_SEARCH_MODEL: '  ',
          NOTEBOOK_SEARCH_SOURCE: 'ftp',
        }),
      ).toEqual({});
    });
  });

  describe('resolveConfig', () => {
    it('should layer file, overrides and environment', () => {
      writeUserConfig({
        search: { defaultLimit: 7, minScore: 0.2 },
        ocr: { enabled: false },
      });

      const config = resolveConfig({
        overrides: { search: { minScore: 0.3 } },
        env: {
          NOTEBOOK_SEARCH_INDEX_DIR: testDir,
          NOTEBOOK_SEARCH_OCR: 'on',
        },
      });

      expect(config.index.storageDir).toBe(testDir);
      expect(config.search.defaultLimit).toBe(7);
      expect(config.search.minScore).toBe(0.3);
      expect(config.ocr.enabled).toBe(true);
    });

    it('should use backup roots from the environment as given', () => {
      const config = resolveConfig({
        env: {
          NOTEBOOK_SEARCH_INDEX_DIR: testDir,
          NOTEBOOK_SEARCH_BACKUP_DIR: path.join(testDir, 'missing'),
        },
      });

      expect(config.sources.backupRoots).toEqual([
        path.join(testDir, 'missing'),
      ]);
    });
  });
});

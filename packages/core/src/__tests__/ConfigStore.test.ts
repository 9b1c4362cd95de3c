import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigDirectoryError } from '@sentinel/shared';
import { ConfigStore } from '../config/ConfigStore.js';
import type { ConfigStoreOptions } from '../config/ConfigStore.js';
import { hashCredential, verifyCredential } from '../auth/credentials.js';

const TEST_PARAMS = { N: 1024, r: 8, p: 1 };
const CREATED_AT = '2026-03-01T12:00:00.000Z';

describe('ConfigStore', () => {
  let dir: string;
  let configPath: string;
  let findPort: ReturnType<typeof vi.fn>;

  function createStore(overrides: ConfigStoreOptions = {}): ConfigStore {
    return new ConfigStore(configPath, {
      findPort: () => findPort(),
      generateCredential: () => 'testpass',
      hashCredential: (credential) => hashCredential(credential, TEST_PARAMS),
      now: () => new Date(CREATED_AT),
      ...overrides,
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sentinel-config-'));
    configPath = join(dir, 'nested', 'config.json');
    findPort = vi.fn().mockResolvedValue(43210);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('first run', () => {
    it('should generate, save and return a new config', async () => {
      const { config, created, credential } = await createStore().loadOrCreate();

      expect(created).toBe(true);
      expect(config.port).toBe(43210);
      expect(config.created_at).toBe(CREATED_AT);
      expect(config.password_hash.startsWith('scrypt:1024:8:1$')).toBe(true);

      const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
      expect(saved).toEqual(config);

      expect(credential?.reveal()).toBe('testpass');
      expect(await verifyCredential('testpass', config.password_hash)).toBe(true);
    });

    it('should never write the plaintext credential to disk', async () => {
      await createStore().loadOrCreate();

      const content = await readFile(configPath, 'utf-8');
      expect(content.includes('testpass')).toBe(false);
    });

    it('should write the file with owner-only permissions', async () => {
      await createStore().loadOrCreate();

      const info = await stat(configPath);
      expect(info.mode & 0o777).toBe(0o600);
    });

    it('should leave no temporary files behind', async () => {
      await createStore().loadOrCreate();

      expect(await readdir(join(dir, 'nested'))).toEqual(['config.json']);
    });

    it('should generate once for concurrent callers', async () => {
      const store = createStore();

      const [first, second] = await Promise.all([store.loadOrCreate(), store.loadOrCreate()]);

      expect(findPort).toHaveBeenCalledTimes(1);
      expect(second.config).toEqual(first.config);
    });
  });

  describe('later runs', () => {
    it('should return the stored config unchanged without rewriting it', async () => {
      const first = await createStore().loadOrCreate();
      const before = await readFile(configPath);
      const mtimeBefore = (await stat(configPath)).mtimeMs;

      const second = await createStore({ now: () => new Date('2027-01-01T00:00:00.000Z') }).loadOrCreate();

      expect(second.created).toBe(false);
      expect(second.credential).toBeNull();
      expect(second.config).toEqual(first.config);
      expect((await readFile(configPath)).equals(before)).toBe(true);
      expect((await stat(configPath)).mtimeMs).toBe(mtimeBefore);
      expect(findPort).toHaveBeenCalledTimes(1);
    });

    it('should accept timestamps without a timezone', async () => {
      const stored = {
        port: 23456,
        password_hash: 'scrypt:1024:8:1$abcdefgh12345678$00ff',
        created_at: '2025-06-01T10:20:30.123456',
      };
      await createStore().save(stored);

      const { config, created } = await createStore().loadOrCreate();

      expect(created).toBe(false);
      expect(config).toEqual(stored);
    });
  });

  describe('recovery', () => {
    it('should regenerate when the file is not valid JSON', async () => {
      await createStore().save({ port: 1, password_hash: 'x', created_at: CREATED_AT });
      await writeFile(configPath, '{"port": 12', 'utf-8');

      const { created, config } = await createStore().loadOrCreate();

      expect(created).toBe(true);
      expect(config.port).toBe(43210);
    });

    it('should regenerate when the file fails validation', async () => {
      await createStore().save({ port: 0, password_hash: '', created_at: 'yesterday' });

      const { created } = await createStore().loadOrCreate();

      expect(created).toBe(true);
      const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'));
      expect(saved).toMatchObject({ port: 43210, created_at: CREATED_AT });
    });

    it('should regenerate when the stored hash is in no format that can be verified', async () => {
      await createStore().save({ port: 23456, password_hash: 'garbage', created_at: CREATED_AT });

      await expect(createStore().load()).rejects.toThrow(
        `Config file is corrupt: ${configPath} (password_hash: unrecognised hash format)`,
      );

      const { created, config, credential } = await createStore().loadOrCreate();

      expect(created).toBe(true);
      expect(config.port).toBe(43210);
      expect(await verifyCredential('testpass', config.password_hash)).toBe(true);
      expect(credential?.reveal()).toBe('testpass');
    });

    it('should fail with ConfigDirectoryError when the directory cannot be created', async () => {
      await writeFile(join(dir, 'blocker'), 'not a directory', 'utf-8');
      configPath = join(dir, 'blocker', 'sub', 'config.json');

      await expect(createStore().loadOrCreate()).rejects.toBeInstanceOf(ConfigDirectoryError);
    });
  });

  describe('load', () => {
    it('should return null when no file exists', async () => {
      expect(await createStore().load()).toBeNull();
    });
  });
});

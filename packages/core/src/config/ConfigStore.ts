import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  ConfigCorruptError,
  ConfigDirectoryError,
  getLogger,
  sentinelConfigSchema,
} from '@sentinel/shared';
import type { SentinelConfig } from '@sentinel/shared';
import { generateCredential, hashCredential, parseCredentialHash } from '../auth/credentials.js';
import { OneTimeCredential } from '../auth/OneTimeCredential.js';
import { findAvailablePort } from './portFinder.js';

const logger = getLogger();

const CONFIG_FILE_MODE = 0o600;
const CONFIG_DIR_MODE = 0o700;

export interface LoadedConfig {
  config: SentinelConfig;
  /** True when this call generated and saved a fresh config. */
  created: boolean;
  /** Present only when `created` is true. */
  credential: OneTimeCredential | null;
}

export interface ConfigStoreOptions {
  findPort?: () => Promise<number>;
  generateCredential?: () => string;
  hashCredential?: (credential: string) => Promise<string>;
  now?: () => Date;
}

/**
 * Owns the agent's config file. The port and password hash written on first
 * run are returned unchanged on every later start; a new pair is generated only
 * when the file is missing or unreadable.
 */
export class ConfigStore {
  private readonly path: string;
  private readonly findPort: () => Promise<number>;
  private readonly newCredential: () => string;
  private readonly hash: (credential: string) => Promise<string>;
  private readonly now: () => Date;
  private pending: Promise<LoadedConfig> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(path: string, options: ConfigStoreOptions = {}) {
    this.path = path;
    this.findPort = options.findPort ?? (() => findAvailablePort());
    this.newCredential = options.generateCredential ?? generateCredential;
    this.hash = options.hashCredential ?? ((credential) => hashCredential(credential));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Return the stored config, or generate, save and return a new one.
   * Concurrent callers share one load so at most one config is generated.
   */
  loadOrCreate(): Promise<LoadedConfig> {
    if (!this.pending) {
      this.pending = this.resolveConfig().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Read and validate the config file. Resolves to null when the file does not
   * exist; rejects with ConfigCorruptError when it exists but cannot be used.
   */
  async load(): Promise<SentinelConfig | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw new ConfigCorruptError(this.path, describe(err));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ConfigCorruptError(this.path, describe(err));
    }

    const result = sentinelConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigCorruptError(this.path, issues.join('; '));
    }
    if (parseCredentialHash(result.data.password_hash) === null) {
      throw new ConfigCorruptError(this.path, 'password_hash: unrecognised hash format');
    }

    return {
      port: result.data.port,
      password_hash: result.data.password_hash,
      created_at: result.data.created_at,
    };
  }

  /**
   * Write the config atomically: a temp file beside the target is written,
   * flushed and renamed over it, so readers see either the old or the new file.
   */
  save(config: SentinelConfig): Promise<void> {
    const write = this.writeQueue.then(() => this.atomicWrite(config));
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  async generate(): Promise<{ config: SentinelConfig; credential: OneTimeCredential }> {
    const plaintext = this.newCredential();
    const [port, passwordHash] = await Promise.all([this.findPort(), this.hash(plaintext)]);

    return {
      config: {
        port,
        password_hash: passwordHash,
        created_at: this.now().toISOString(),
      },
      credential: new OneTimeCredential(plaintext),
    };
  }

  private async resolveConfig(): Promise<LoadedConfig> {
    try {
      const existing = await this.load();
      if (existing) {
        logger.info({ path: this.path, port: existing.port }, 'Loaded configuration');
        return { config: existing, created: false, credential: null };
      }
      logger.info({ path: this.path }, 'No configuration found, generating one');
    } catch (err) {
      if (!(err instanceof ConfigCorruptError)) throw err;
      logger.warn({ path: this.path, reason: err.message }, 'Configuration unusable, regenerating');
    }

    const { config, credential } = await this.generate();
    await this.save(config);
    logger.info({ path: this.path, port: config.port }, 'Generated new configuration');

    return { config, created: true, credential };
  }

  private async atomicWrite(config: SentinelConfig): Promise<void> {
    const dir = dirname(this.path);
    try {
      await mkdir(dir, { recursive: true, mode: CONFIG_DIR_MODE });
    } catch (err) {
      throw new ConfigDirectoryError(dir, describe(err));
    }

    const content = JSON.stringify(config, null, 4);
    const tmpPath = `${this.path}.tmp.${process.pid}.${Date.now()}`;

    try {
      const handle = await open(tmpPath, 'w', CONFIG_FILE_MODE);
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.chmod(CONFIG_FILE_MODE);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.path);
    } catch (error) {
      try {
        await unlink(tmpPath);
      } catch {
        // temp file was never created or is already gone
      }
      throw error;
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

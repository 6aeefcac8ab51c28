// tests/unit/env.test.ts

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfigFromEnv } from '../../src/config/env';

describe('loadConfigFromEnv', () => {
  let tmpDir: string;
  let dotenvPath: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'external-lists-env-'));
    dotenvPath = path.join(tmpDir, '.env');
    fs.writeFileSync(dotenvPath, 'TMDB_API_KEY=file-key\nTRAKT_CLIENT_ID=file-client\n');
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should map environment variables onto the configuration', () => {
    const config = loadConfigFromEnv({
      env: {
        MDBLIST_API_KEY: 'test-key',
        TMDB_API_KEY: 'test-tmdb-key',
        TRAKT_CLIENT_ID: 'test-client-id',
        LOG_LEVEL: 'debug',
        LOG_FORMAT: 'pretty',
        HTTP_TIMEOUT_MS: '15000',
      },
    });

    expect(config).toEqual({
      credentials: {
        mdbListApiKey: 'test-key',
        tmdbApiKey: 'test-tmdb-key',
        traktClientId: 'test-client-id',
      },
      http: { timeout: 15000 },
      logging: { level: 'debug', format: 'pretty' },
    });
  });

  it('should treat blank values as unset', () => {
    const config = loadConfigFromEnv({ env: { MDBLIST_API_KEY: '   ', LOG_LEVEL: '' } });

    expect(config.credentials?.mdbListApiKey).toBeUndefined();
    expect(config.logging?.level).toBeUndefined();
    expect(config.http).toBeUndefined();
  });

  it('should read a dotenv file and let explicit variables win', () => {
    const config = loadConfigFromEnv({ env: { TMDB_API_KEY: 'env-key' }, dotenvPath });

    expect(config.credentials).toEqual({ tmdbApiKey: 'env-key', traktClientId: 'file-client' });
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => loadConfigFromEnv({ env: { HTTP_TIMEOUT_MS: 'soon' } })).toThrow();
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfigFromEnv({ env: { LOG_LEVEL: 'chatty' } })).toThrow();
  });
});

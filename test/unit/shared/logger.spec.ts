import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, logger } from '../../../src/shared/logger/logger';
import { buildDeps } from '../../../src/app/di';
import { buildTestConfig } from '../../helpers/build-test-app';

describe('configureLogger', () => {
  afterEach(() => {
    configureLogger({ logLevel: 'error', serviceName: 'hub-singleuser', nodeEnv: 'test' });
  });

  it('applies level and service metadata', () => {
    configureLogger({ logLevel: 'debug', serviceName: 'svc-a', nodeEnv: 'production' });

    expect(logger.level).toBe('debug');
    expect(logger.defaultMeta).toEqual({ service: 'svc-a', env: 'production' });
  });

  it('is driven by the app config when deps are built', async () => {
    const deps = buildDeps({ ...buildTestConfig(), logLevel: 'warn', serviceName: 'svc-b' });

    try {
      expect(logger.level).toBe('warn');
      expect(logger.defaultMeta).toEqual({ service: 'svc-b', env: 'test' });
    } finally {
      await deps.close();
    }
  });
});

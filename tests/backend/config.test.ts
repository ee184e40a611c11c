import { DEFAULT_CONFIG, loadConfig } from '../../src/backend/utils/config';
import { HOUR_MS } from '../../src/backend/utils/timestamps';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      ...DEFAULT_CONFIG,
      frontendUrl: undefined,
    });
  });

  it('should read values from the environment', () => {
    // Arrange
    const env = {
      DATA_DIR: '/tmp/playtally',
      PORT: '4000',
      HOST: '0.0.0.0',
      FRONTEND_URL: 'http://localhost:3000',
      FULL_SYNC_INTERVAL_HOURS: '2',
      RECONCILE_BATCH_SIZE: '25',
      TICK_INTERVAL_MS: '500',
      PLAY_RETENTION_DAYS: '30',
      CATALOG_FILE: 'catalog/other.json',
    };

    // Act
    const config = loadConfig(env);

    // Assert
    expect(config).toEqual({
      dataDir: '/tmp/playtally',
      port: 4000,
      host: '0.0.0.0',
      frontendUrl: 'http://localhost:3000',
      fullSyncIntervalMs: 2 * HOUR_MS,
      reconcileBatchSize: 25,
      tickIntervalMs: 500,
      playRetentionDays: 30,
      catalogFile: 'catalog/other.json',
    });
  });

  it('should prefer BACKEND_PORT over PORT', () => {
    expect(loadConfig({ BACKEND_PORT: '5000', PORT: '4000' }).port).toBe(5000);
  });

  it('should fall back to defaults for invalid numbers', () => {
    const config = loadConfig({
      FULL_SYNC_INTERVAL_HOURS: 'soon',
      RECONCILE_BATCH_SIZE: '-3',
      TICK_INTERVAL_MS: '0',
    });

    expect(config.fullSyncIntervalMs).toBe(4 * HOUR_MS);
    expect(config.reconcileBatchSize).toBe(100);
    expect(config.tickIntervalMs).toBe(1000);
  });

  it('should never use a batch size below one', () => {
    expect(loadConfig({ RECONCILE_BATCH_SIZE: '0.5' }).reconcileBatchSize).toBe(
      1
    );
  });
});

import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

import createChartsRouter from './backend/routes/charts';
import createMaintenanceRouter from './backend/routes/maintenance';
import createPlayerRouter from './backend/routes/player';
import createSyncRouter from './backend/routes/sync';
import { BridgedMediaPlayer } from './backend/services/bridgedMediaPlayer';
import {
  CatalogAccessor,
  JsonCatalogAccessor,
} from './backend/services/catalogAccessor';
import { ChartAggregator } from './backend/services/chartAggregator';
import { CounterReconciler } from './backend/services/counterReconciler';
import { EngineStateStore } from './backend/services/engineStateStore';
import { FileLibraryStore, LibraryStore } from './backend/services/libraryStore';
import { LiveTrackingSession } from './backend/services/liveTrackingSession';
import { MaintenanceService } from './backend/services/maintenanceService';
import { PlaybackSampler } from './backend/services/playbackSampler';
import { ReconciliationLock } from './backend/services/reconciliationLock';
import { SyncScheduler } from './backend/services/syncScheduler';
import { TrackingEngine } from './backend/services/trackingEngine';
import { sendError } from './backend/utils/apiResponse';
import { AppConfig } from './backend/utils/config';
import { errorMessage } from './backend/utils/errors';
import { FileStorage } from './backend/utils/fileStorage';
import { createLogger } from './backend/utils/logger';

const logger = createLogger('Server');

export interface Services {
  fileStorage: FileStorage;
  player: BridgedMediaPlayer;
  catalog: CatalogAccessor;
  store: LibraryStore;
  lock: ReconciliationLock;
  stateStore: EngineStateStore;
  reconciler: CounterReconciler;
  scheduler: SyncScheduler;
  charts: ChartAggregator;
  maintenance: MaintenanceService;
  engine: TrackingEngine;
}

export interface ServiceOverrides {
  catalog?: CatalogAccessor;
  store?: LibraryStore;
  random?: () => number;
}

/**
 * Wire the engine's services for one data directory.
 */
export function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Services {
  const fileStorage = new FileStorage(config.dataDir);
  const player = new BridgedMediaPlayer();
  const catalog =
    overrides.catalog ??
    new JsonCatalogAccessor(fileStorage, config.catalogFile, player);
  const store = overrides.store ?? new FileLibraryStore(fileStorage);
  const lock = new ReconciliationLock();
  const stateStore = new EngineStateStore(fileStorage);

  const reconciler = new CounterReconciler(catalog, store, lock, {
    batchSize: config.reconcileBatchSize,
    random: overrides.random,
  });
  const scheduler = new SyncScheduler(reconciler, catalog, stateStore, {
    fullSyncIntervalMs: config.fullSyncIntervalMs,
  });
  const charts = new ChartAggregator(store, fileStorage);
  const maintenance = new MaintenanceService(
    store,
    catalog,
    stateStore,
    charts,
    config.playRetentionDays
  );

  const engine = new TrackingEngine({
    sampler: new PlaybackSampler(player),
    session: new LiveTrackingSession({ tickIntervalMs: config.tickIntervalMs }),
    reconciler,
    scheduler,
    charts,
    store,
    lock,
    stateStore,
  });

  return {
    fileStorage,
    player,
    catalog,
    store,
    lock,
    stateStore,
    reconciler,
    scheduler,
    charts,
    maintenance,
    engine,
  };
}

/**
 * Build the Express app serving the local HTTP bridge.
 */
export function createApp(services: Services, config: AppConfig) {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration with strict origin allowlist
  const allowedOrigins = [
    'http://localhost:8080',
    'http://127.0.0.1:8080',
    config.frontendUrl,
  ].filter((origin): origin is string => Boolean(origin));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Requests without an origin (curl, the OS bridge) outside production
        if (!origin && process.env.NODE_ENV !== 'production') {
          return callback(null, true);
        }
        if (origin && allowedOrigins.includes(origin)) {
          return callback(null, true);
        }

        logger.warn(`CORS request rejected from origin: ${origin || 'null'}`);
        return callback(new Error('Not allowed by CORS'));
      },
      credentials: true,
    })
  );

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(
    '/api/v1/charts',
    createChartsRouter(services.charts, services.store)
  );
  app.use(
    '/api/v1/sync',
    createSyncRouter(services.engine, services.scheduler)
  );
  app.use(
    '/api/v1/player',
    createPlayerRouter(services.player, services.engine)
  );
  app.use('/api/v1/maintenance', createMaintenanceRouter(services.maintenance));

  app.get('/api/v1', (_req, res) => {
    res.json({
      message: 'Playtally play tracking API',
      version: '1.0.0',
      endpoints: {
        charts: '/api/v1/charts',
        sync: '/api/v1/sync',
        player: '/api/v1/player',
        maintenance: '/api/v1/maintenance',
      },
    });
  });

  // Error handling middleware
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      logger.error('Unhandled request error', err);
      sendError(
        res,
        500,
        process.env.NODE_ENV === 'production'
          ? 'Internal server error'
          : errorMessage(err)
      );
    }
  );

  // 404 handler
  app.use((_req, res) => {
    sendError(res, 404, 'Route not found');
  });

  return app;
}

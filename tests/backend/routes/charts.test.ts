import * as fs from 'fs/promises';

import express from 'express';
import request from 'supertest';

import createChartsRouter from '../../../src/backend/routes/charts';
import { ChartAggregator } from '../../../src/backend/services/chartAggregator';
import { FileLibraryStore } from '../../../src/backend/services/libraryStore';
import { FileStorage } from '../../../src/backend/utils/fileStorage';
import { createTrackRecord } from '../helpers/inMemoryCatalog';

describe('Charts Routes', () => {
  const testDataDir = './test-data-routes-charts';
  let app: express.Application;
  let store: FileLibraryStore;
  let charts: ChartAggregator;

  beforeEach(async () => {
    const fileStorage = new FileStorage(testDataDir);
    await fileStorage.ensureDataDir();
    store = new FileLibraryStore(fileStorage);
    charts = new ChartAggregator(store, fileStorage);

    await store.transaction(tx => {
      tx.upsertTrack(
        createTrackRecord({ id: 'a', title: 'Alpha', baselineCounter: 2 })
      );
      tx.upsertTrack(
        createTrackRecord({ id: 'b', title: 'Bravo', baselineCounter: 7 })
      );
      tx.insertPlay({ trackId: 'a', timestamp: Date.now(), source: 'live' });
    });

    app = express();
    app.use(express.json());
    app.use('/api/v1/charts', createChartsRouter(charts, store));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  describe('GET /api/v1/charts', () => {
    it('should return the all-time chart by default', async () => {
      const response = await request(app).get('/api/v1/charts').expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.period).toBe('allTime');
      expect(response.body.data.since).toBeNull();
      expect(
        response.body.data.tracks.map(
          (track: { trackId: string; playCount: number }) => [
            track.trackId,
            track.playCount,
          ]
        )
      ).toEqual([
        ['b', 7],
        ['a', 3],
      ]);
    });

    it('should return a period chart without baseline plays', async () => {
      const response = await request(app)
        .get('/api/v1/charts?period=week')
        .expect(200);

      expect(response.body.data.tracks).toHaveLength(1);
      expect(response.body.data.tracks[0]).toMatchObject({
        rank: 1,
        trackId: 'a',
        playCount: 1,
        movement: { kind: 'new' },
      });
    });

    it('should record ranks when asked to', async () => {
      await request(app).get('/api/v1/charts?record=true').expect(200);

      expect((await charts.getRankBook()).allTime).toEqual({ b: 1, a: 2 });
    });

    it('should reject unknown periods', async () => {
      const response = await request(app)
        .get('/api/v1/charts?period=decade')
        .expect(400);

      expect(response.body).toEqual({
        success: false,
        error: 'period must be one of: allTime, week, month, year',
      });
    });

    it('should map store failures to a 500', async () => {
      jest
        .spyOn(store, 'listTracks')
        .mockRejectedValueOnce(new Error('ledger unreadable'));

      const response = await request(app).get('/api/v1/charts').expect(500);

      expect(response.body.error).toBe('ledger unreadable');
    });
  });

  describe('GET /api/v1/charts/tracks/:trackId', () => {
    it('should return totals and the source breakdown', async () => {
      const response = await request(app)
        .get('/api/v1/charts/tracks/a')
        .expect(200);

      expect(response.body.data.totalPlayCount).toBe(3);
      expect(response.body.data.breakdown).toEqual({
        live: 1,
        counterSync: 0,
        baseline: 2,
        total: 3,
      });
      expect(response.body.data.periodCounts).toEqual({
        week: 1,
        month: 1,
        year: 1,
      });
      expect(response.body.data.recentPlays).toHaveLength(1);
    });

    it('should return 404 for an unknown track', async () => {
      const response = await request(app)
        .get('/api/v1/charts/tracks/missing')
        .expect(404);

      expect(response.body.error).toBe('Track not found');
    });

    it('should reject malformed track ids', async () => {
      const response = await request(app)
        .get('/api/v1/charts/tracks/bad%20id')
        .expect(400);

      expect(response.body.error).toBe('Invalid track ID format');
    });
  });
});

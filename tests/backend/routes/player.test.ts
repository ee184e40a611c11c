import * as fs from 'fs/promises';

import express from 'express';
import request from 'supertest';

import { Services, createServices } from '../../../src/app';
import createPlayerRouter from '../../../src/backend/routes/player';
import { DEFAULT_CONFIG } from '../../../src/backend/utils/config';
import { InMemoryCatalog, createCatalogTrack } from '../helpers/inMemoryCatalog';

describe('Player Routes', () => {
  const testDataDir = './test-data-routes-player';
  let app: express.Application;
  let services: Services;

  beforeEach(async () => {
    services = createServices(
      { ...DEFAULT_CONFIG, dataDir: testDataDir },
      { catalog: new InMemoryCatalog() }
    );
    await services.fileStorage.ensureDataDir();
    services.engine.start();

    app = express();
    app.use(express.json());
    app.use(
      '/api/v1/player',
      createPlayerRouter(services.player, services.engine)
    );
  });

  afterEach(async () => {
    await services.engine.stop();
    await fs.rm(testDataDir, { recursive: true, force: true });
  });

  describe('POST /api/v1/player/now-playing', () => {
    it('should start tracking a playing track', async () => {
      const track = createCatalogTrack({ id: 'a' });

      const response = await request(app)
        .post('/api/v1/player/now-playing')
        .send({ track, state: 'playing' })
        .expect(200);

      expect(response.body.data.nowPlaying).toEqual(track);
      expect(response.body.data.state).toBe('playing');
      expect(response.body.data.session).toMatchObject({
        state: 'tracking',
        trackId: 'a',
      });
    });

    it('should accept a cleared now-playing item', async () => {
      const response = await request(app)
        .post('/api/v1/player/now-playing')
        .send({ track: null, state: 'stopped' })
        .expect(200);

      expect(response.body.data.nowPlaying).toBeNull();
      expect(response.body.data.session.state).toBe('idle');
    });

    it('should reject a track without required fields', async () => {
      const response = await request(app)
        .post('/api/v1/player/now-playing')
        .send({ track: { id: 'a', title: 'No artist' }, state: 'playing' })
        .expect(400);

      expect(response.body.error).toBe(
        'track requires id, title, artist and currentPlayCount'
      );
    });

    it('should reject an unknown playback state', async () => {
      await request(app)
        .post('/api/v1/player/now-playing')
        .send({ track: createCatalogTrack(), state: 'rewinding' })
        .expect(400);
    });
  });

  describe('POST /api/v1/player/state', () => {
    it('should pause the current session', async () => {
      await request(app)
        .post('/api/v1/player/now-playing')
        .send({ track: createCatalogTrack({ id: 'a' }), state: 'playing' })
        .expect(200);

      const response = await request(app)
        .post('/api/v1/player/state')
        .send({ state: 'paused' })
        .expect(200);

      expect(response.body.data.state).toBe('paused');
      expect(response.body.data.session).toMatchObject({
        state: 'idle',
        trackId: 'a',
      });
    });

    it('should reject a missing state', async () => {
      const response = await request(app)
        .post('/api/v1/player/state')
        .send({})
        .expect(400);

      expect(response.body.error).toBe('Invalid playback state');
    });
  });

  describe('GET /api/v1/player/now-playing', () => {
    it('should report nothing playing initially', async () => {
      const response = await request(app)
        .get('/api/v1/player/now-playing')
        .expect(200);

      expect(response.body.data).toMatchObject({
        nowPlaying: null,
        state: 'unknown',
      });
    });
  });
});

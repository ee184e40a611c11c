import express from 'express';
import request from 'supertest';

import {
  sendErrorFromException,
  sendSuccess,
} from '../../src/backend/utils/apiResponse';
import {
  CatalogUnavailableError,
  PermissionDeniedError,
  PersistenceFailureError,
} from '../../src/backend/utils/errors';

describe('apiResponse', () => {
  const appThrowing = (error: unknown) => {
    const app = express();
    app.get('/', (_req, res) =>
      sendErrorFromException(res, error, 'Something failed')
    );
    return app;
  };

  it('should wrap data in a success envelope', async () => {
    const app = express();
    app.get('/', (_req, res) => sendSuccess(res, { ok: 1 }, 201));

    const response = await request(app).get('/').expect(201);

    expect(response.body).toEqual({ success: true, data: { ok: 1 } });
  });

  it.each([
    [new PermissionDeniedError(), 403, 'PERMISSION_DENIED'],
    [new CatalogUnavailableError(), 503, 'CATALOG_UNAVAILABLE'],
    [new PersistenceFailureError('write failed'), 500, 'PERSISTENCE_FAILURE'],
  ])('should map %s to its status code', async (error, status, code) => {
    const response = await request(appThrowing(error)).get('/').expect(status);

    expect(response.body.data).toEqual({ code });
  });

  it('should use the message of other errors', async () => {
    const response = await request(appThrowing(new Error('boom')))
      .get('/')
      .expect(500);

    expect(response.body).toEqual({ success: false, error: 'boom' });
  });

  it('should fall back for non-error values', async () => {
    const response = await request(appThrowing('nope')).get('/').expect(500);

    expect(response.body.error).toBe('Something failed');
  });
});

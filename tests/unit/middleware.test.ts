/**
 * Middleware Tests
 * Request ids, async forwarding and the error envelope
 */

import express, { Express, Request, Response } from 'express';
import request from 'supertest';
import { requestId, asyncHandler, notFoundHandler, errorHandler } from '../../src/api/middleware';
import { InvalidStateError, StorageError, ValidationError } from '../../src/errors';

function buildApp(exposeInternalErrors: boolean, register: (app: Express) => void): Express {
  const app = express();
  app.use(requestId());
  app.use(express.json());
  register(app);
  app.use(notFoundHandler);
  app.use(errorHandler(exposeInternalErrors));
  return app;
}

describe('requestId', () => {
  const app = buildApp(false, a => {
    a.get('/echo', (req: Request, res: Response) => {
      res.json({ id: req.id });
    });
  });

  it('should keep a well-formed inbound id', async () => {
    const res = await request(app).get('/echo').set('X-Request-Id', 'batch-42.retry_1');

    expect(res.headers['x-request-id']).toBe('batch-42.retry_1');
    expect(res.body).toEqual({ id: 'batch-42.retry_1' });
  });

  it('should replace an id with unsafe characters', async () => {
    const res = await request(app).get('/echo').set('X-Request-Id', 'abc def<script>');

    expect(res.headers['x-request-id']).toMatch(/^req_\d+_[0-9a-f]{8}$/);
    expect(res.body.id).toBe(res.headers['x-request-id']);
  });

  it('should generate an id when none is sent', async () => {
    const res = await request(app).get('/echo');
    expect(res.headers['x-request-id']).toMatch(/^req_\d+_[0-9a-f]{8}$/);
  });
});

describe('asyncHandler', () => {
  it('should forward a rejected handler to the error middleware', async () => {
    const app = buildApp(false, a => {
      a.get('/fail', asyncHandler(async () => {
        throw new ValidationError('limit must be between 1 and 100', [{ path: ['limit'] }]);
      }));
    });

    const res = await request(app).get('/fail').set('X-Request-Id', 'r1');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'limit must be between 1 and 100',
        details: [{ path: ['limit'] }],
        requestId: 'r1',
      },
    });
  });

  it('should pass through a resolved handler', async () => {
    const app = buildApp(false, a => {
      a.get('/ok', asyncHandler(async (_req, res) => {
        res.json({ ok: true });
      }));
    });

    const res = await request(app).get('/ok');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });
});

describe('notFoundHandler', () => {
  it('should name the unmatched endpoint', async () => {
    const app = buildApp(false, () => undefined);

    const res = await request(app).post('/v1/nowhere').set('X-Request-Id', 'r2');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: { code: 'NOT_FOUND', message: 'Endpoint POST /v1/nowhere not found', requestId: 'r2' },
    });
  });
});

describe('errorHandler', () => {
  function failingApp(exposeInternalErrors: boolean, error: unknown): Express {
    return buildApp(exposeInternalErrors, a => {
      a.post('/work', asyncHandler(async () => {
        throw error;
      }));
    });
  }

  it('should map an invalid state to 409', async () => {
    const res = await request(failingApp(false, new InvalidStateError('Queue item 3 is already labeled'))).post('/work');

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('INVALID_STATE');
    expect(res.body.error.message).toBe('Queue item 3 is already labeled');
  });

  it('should log storage outages and answer 503', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(failingApp(false, new StorageError('Database unavailable: timeout'))).post('/work');

    expect(res.status).toBe(503);
    expect(res.body.error.code).toBe('STORAGE_UNAVAILABLE');
    expect(errorSpy).toHaveBeenCalledWith('[HTTP] POST /work failed: Database unavailable: timeout');
  });

  it('should report malformed JSON as a validation error', async () => {
    const res = await request(failingApp(false, new Error('unused')))
      .post('/work')
      .set('Content-Type', 'application/json')
      .set('X-Request-Id', 'r3')
      .send('{"title": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body', requestId: 'r3' },
    });
  });

  it('should hide unexpected error messages by default', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(failingApp(false, new Error('secret connection string'))).post('/work');

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe('INTERNAL_ERROR');
    expect(res.body.error.message).toBe('An internal error occurred');
  });

  it('should expose unexpected error messages when configured', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const res = await request(failingApp(true, new Error('index out of range'))).post('/work');

    expect(res.status).toBe(500);
    expect(res.body.error.message).toBe('index out of range');
  });
});

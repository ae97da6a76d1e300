import express from 'express';
import request from 'supertest';

import { createLimiter } from 'App/rateLimiters/generalRateLimiter';

describe('createLimiter', () => {
  it('answers 429 with a coded body once the window budget is spent', async () => {
    const app = express();
    app.use(createLimiter({ windowMs: 60_000, limit: 1, message: 'slow down' }));
    app.get('/ping', (_req, res) => {
      res.json({ ok: true });
    });

    const first = await request(app).get('/ping');
    expect(first.status).toBe(200);
    expect(first.headers['ratelimit-limit']).toBe('1');

    const second = await request(app).get('/ping');
    expect(second.status).toBe(429);
    expect(second.body).toEqual({ code: 'TOO_MANY_REQUESTS', message: 'slow down' });
  });
});

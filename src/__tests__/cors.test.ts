import request from 'supertest';

describe('CORS policy', () => {
  afterAll(() => {
    delete process.env.CORS_ORIGINS;
    jest.resetModules();
  });

  it('answers listed origins and refuses the others', async () => {
    process.env.CORS_ORIGINS = 'http://localhost:5173';
    jest.resetModules();
    const { createApp } = await import('App/server');
    const app = createApp();

    const allowed = await request(app).get('/health').set('Origin', 'http://localhost:5173');
    expect(allowed.status).toBe(200);
    expect(allowed.headers['access-control-allow-origin']).toBe('http://localhost:5173');

    const refused = await request(app).get('/health').set('Origin', 'http://elsewhere.test');
    expect(refused.status).toBe(403);
    expect(refused.body).toEqual({
      code: 'NOT_ALLOWED_BY_CORS',
      message: 'Origin http://elsewhere.test is not allowed',
      details: [{ path: 'origin', message: 'not listed in CORS_ORIGINS' }],
    });
  });
});

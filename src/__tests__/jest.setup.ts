// Global test setup: quiet logs and a predictable environment

// 1) Development mode: no helmet, morgan or rate limiting in supertest runs
process.env.NODE_ENV = 'test';

// 2) No pause between process exit and the artifact check
process.env.RUN_SETTLE_MS = process.env.RUN_SETTLE_MS || '0';

// 3) Limit noisy console output during tests
const mute = process.env.JEST_SILENT !== '0';
if (mute) {
  const noop = () => {};
  jest.spyOn(console, 'error').mockImplementation(noop);
  jest.spyOn(console, 'warn').mockImplementation(noop);
}

// src/__tests__/app.test.ts

import { jest } from '@jest/globals';

const mockListen = jest.fn((_port: number, _onListening: () => void) => {});

jest.mock('App/config/config', () => ({
  MODE: 'development',
  PORT: 4000,
}));

jest.mock('App/server', () => ({
  __esModule: true,
  default: { listen: mockListen },
}));

const consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => {});

import { main } from 'App/app';

describe('HTTP entry point', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('listens on the configured port', async () => {
    await main();

    expect(mockListen).toHaveBeenCalledTimes(1);
    expect(mockListen).toHaveBeenCalledWith(4000, expect.any(Function));

    mockListen.mock.calls[0][1]();
    expect(consoleLogSpy).toHaveBeenCalledWith('Now listening on port 4000');
  });

  it('falls back to port 3000 without a configured port', async () => {
    jest.resetModules();
    const listenDefault = jest.fn();
    jest.doMock('App/config/config', () => ({ MODE: 'production', PORT: 0 }));
    jest.doMock('App/server', () => ({ __esModule: true, default: { listen: listenDefault } }));

    const { main: mainDefault } = await import('App/app');
    await mainDefault();

    expect(listenDefault).toHaveBeenCalledWith(3000, expect.any(Function));
  });

  it('logs a failure to start listening', async () => {
    jest.resetModules();
    const failure = new Error('EADDRINUSE');
    const listenFail = jest.fn(() => {
      throw failure;
    });
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    jest.doMock('App/config/config', () => ({ MODE: 'production', PORT: 5000 }));
    jest.doMock('App/server', () => ({ __esModule: true, default: { listen: listenFail } }));

    const { main: mainFail } = await import('App/app');
    await mainFail();

    expect(listenFail).toHaveBeenCalledWith(5000, expect.any(Function));
    expect(errorSpy).toHaveBeenCalledWith(failure);
  });
});

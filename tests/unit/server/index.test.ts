import { jest, describe, it, expect } from '@jest/globals';

// ── Mock all heavy dependencies ─────────────────────────────────────

const mockListen = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
const mockClose = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
const mockRegister = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
const mockAddHook = jest.fn();

jest.unstable_mockModule('fastify', () => ({
  default: jest.fn(() => ({
    listen: mockListen,
    close: mockClose,
    register: mockRegister,
    addHook: mockAddHook,
    setErrorHandler: jest.fn(),
    setNotFoundHandler: jest.fn(),
    get: jest.fn(),
    ready: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
  })),
}));

jest.unstable_mockModule('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
  },
}));

jest.unstable_mockModule('../../../src/config.js', () => ({
  config: {
    port: 3000,
    host: '0.0.0.0',
    logLevel: 'info',
    nodeEnv: 'test',
    database: {
      url: 'postgresql://localhost:5432/test',
      readonlyUrl: 'postgresql://localhost:5432/test',
      statementTimeoutMs: 12000,
    },
    segmentation: { recencyWindowMonths: 9, recencyWindowDays: 0 },
  },
}));

const mockRegisterErrorHandler = jest.fn();
const mockReadonlyDb = {
  destroy: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
};
const mockCreateReadonlyDb = jest.fn(() => mockReadonlyDb);
const mockRecordSource = {};
const mockCreateRecordSource = jest.fn(() => mockRecordSource);
const mockCreateLapsedCustomerService = jest.fn(() => ({}));

jest.unstable_mockModule('../../../src/middleware/errorHandler.js', () => ({
  registerErrorHandler: mockRegisterErrorHandler,
}));

jest.unstable_mockModule('../../../src/db/readonlyConnection.js', () => ({
  createReadonlyDb: mockCreateReadonlyDb,
}));

jest.unstable_mockModule('../../../src/db/recordSource.js', () => ({
  createRecordSource: mockCreateRecordSource,
}));

jest.unstable_mockModule('../../../src/services/lapsedCustomerService.js', () => ({
  createLapsedCustomerService: mockCreateLapsedCustomerService,
}));

jest.unstable_mockModule('../../../src/routes/health.js', () => ({
  healthRoutes: jest.fn(),
}));

jest.unstable_mockModule('../../../src/routes/segments.js', () => ({
  segmentRoutes: jest.fn(),
}));

// Import index.ts once — all assertions reference the same mock references
const indexModule = await import('../../../src/index.js');

// ── Tests ───────────────────────────────────────────────────────────

describe('Server initialization', () => {
  it('exports the fastify and readonlyDb instances', () => {
    expect(indexModule.fastify).toBeDefined();
    expect(indexModule.readonlyDb).toBe(mockReadonlyDb);
  });

  it('creates the read-only connection from the configured URL', () => {
    expect(mockCreateReadonlyDb).toHaveBeenCalledWith('postgresql://localhost:5432/test', {
      statementTimeoutMs: 12000,
    });
  });

  it('builds the record source on the read-only connection', () => {
    expect(mockCreateRecordSource).toHaveBeenCalledWith({ readonlyDb: mockReadonlyDb });
  });

  it('passes the configured recency window to the segment service', () => {
    expect(mockCreateLapsedCustomerService).toHaveBeenCalledWith({
      recordSource: mockRecordSource,
      defaultRecencyWindow: { months: 9, days: 0 },
    });
  });

  it('registers the error handler and request logging hooks', () => {
    expect(mockRegisterErrorHandler).toHaveBeenCalled();
    expect(mockAddHook).toHaveBeenCalledWith('onRequest', expect.any(Function));
    expect(mockAddHook).toHaveBeenCalledWith('onResponse', expect.any(Function));
  });

  it('registers the health and segment route groups', () => {
    expect(mockRegister).toHaveBeenCalledTimes(2);
  });

  it('calls fastify.listen with configured port and host', () => {
    expect(mockListen).toHaveBeenCalledWith({ port: 3000, host: '0.0.0.0' });
  });
});

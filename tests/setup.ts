import 'reflect-metadata';

// Mock environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.ENABLE_METRICS = 'false';
process.env.API_KEYS = 'test-key';

// Mock logger to reduce noise in tests
jest.mock('../src/config', () => ({
  ...jest.requireActual<typeof import('../src/config')>('../src/config'),
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

// Clean up after tests
afterEach(() => {
  jest.clearAllMocks();
});

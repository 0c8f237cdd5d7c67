import { rateLimit, requireApiKey } from '../../src/middleware/auth';
import { logger } from '../../src/config';

function fakeResponse() {
  const json = jest.fn();
  const status = jest.fn(() => ({ json }));
  return { res: { status }, status, json };
}

describe('requireApiKey', () => {
  const middleware = requireApiKey(['test-key', 'second-key']);

  it('should pass requests carrying a configured key', () => {
    const { res, status } = fakeResponse();
    const next = jest.fn();

    middleware({ headers: { 'x-api-key': 'second-key' }, path: '/ingest' }, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(status).not.toHaveBeenCalled();
  });

  it('should reject requests without a key', () => {
    const { res, status, json } = fakeResponse();
    const next = jest.fn();

    middleware({ headers: {}, path: '/ingest' }, res, next);

    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ error: 'No API key provided' });
    expect(next).not.toHaveBeenCalled();
  });

  it('should reject unknown keys and log a truncated key', () => {
    const { res, status, json } = fakeResponse();
    const next = jest.fn();

    middleware({ headers: { 'x-api-key': 'wrong-key' }, path: '/health' }, res, next);

    expect(status).toHaveBeenCalledWith(401);
    expect(json).toHaveBeenCalledWith({ error: 'Invalid API key' });
    expect(logger.warn).toHaveBeenCalledWith({ path: '/health', apiKey: 'wron...' }, 'Invalid API key');
    expect(next).not.toHaveBeenCalled();
  });

  it('should reject every request when no keys are configured', () => {
    const { res, status } = fakeResponse();
    const next = jest.fn();

    requireApiKey([])({ headers: { 'x-api-key': 'test-key' }, path: '/ingest' }, res, next);

    expect(status).toHaveBeenCalledWith(401);
    expect(next).not.toHaveBeenCalled();
  });
});

describe('rateLimit', () => {
  it('should answer 429 once a client exceeds the window budget', () => {
    const limiter = rateLimit(60_000, 2);
    const next = jest.fn();
    const { res, status, json } = fakeResponse();

    limiter({ ip: '10.0.0.1' }, res, next);
    limiter({ ip: '10.0.0.1' }, res, next);
    limiter({ ip: '10.0.0.1' }, res, next);
    limiter({ ip: '10.0.0.2' }, res, next);

    expect(next).toHaveBeenCalledTimes(3);
    expect(status).toHaveBeenCalledTimes(1);
    expect(status).toHaveBeenCalledWith(429);
    expect(json).toHaveBeenCalledWith({ error: 'Too many requests', retryAfter: 60 });
  });
});

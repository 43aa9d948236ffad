/**
 * Tests for logging.
 */

import { describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NoopLogger, logCancellation, logFailure } from '../observability/index.js';
import { CosmosHttpResponseError, CosmosResourceNotFoundError } from '../errors/index.js';

describe('ConsoleLogger', () => {
  it('should write structured lines at or above the minimum level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn');

    logger.error('Request failed', { status: 503 });
    logger.debug('hidden');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toMatch(/^\[\S+\] \[ERROR\] \[cosmos\] Request failed \{"status":503\}$/);
    expect(debug).not.toHaveBeenCalled();
    expect(logger.isEnabled('info')).toBe(false);
  });
});

describe('logFailure', () => {
  it('should include the error kind', () => {
    const logger = new ConsoleLogger('error', 'test');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logFailure(logger, 'readItem', 'dbs/shop/colls/products/docs/1', new CosmosResourceNotFoundError({ message: 'missing' }));

    expect(error.mock.calls[0]?.[0]).toContain(
      '"errorName":"CosmosResourceNotFoundError","errorKind":"ResourceNotFound","errorMessage":"missing"'
    );
  });

  it('should carry the status and activity id of service responses', () => {
    const logger = new ConsoleLogger('error', 'test');
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logFailure(
      logger,
      'queryItems',
      'dbs/shop/colls/products/docs',
      new CosmosHttpResponseError({ message: 'throttled', statusCode: 429, activityId: 'activity-1' })
    );

    expect(error.mock.calls[0]?.[0]).toMatch(
      / \[ERROR\] \[test\] Cosmos operation failed \{"operation":"queryItems","resource":"dbs\/shop\/colls\/products\/docs","errorName":"CosmosHttpResponseError","errorKind":"GenericHttpError","errorMessage":"throttled","statusCode":429,"activityId":"activity-1"\}$/
    );
  });
});

describe('logCancellation', () => {
  it('should log at debug only', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logCancellation(new ConsoleLogger('debug'), 'readItem', 'dbs/shop/colls/products/docs/1');

    expect(debug.mock.calls[0]?.[0]).toMatch(
      /\[DEBUG\] \[cosmos\] Cosmos operation cancelled \{"operation":"readItem","resource":"dbs\/shop\/colls\/products\/docs\/1"\}$/
    );
    expect(error).not.toHaveBeenCalled();
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new NoopLogger().info('ignored', { a: 1 });

    expect(log).not.toHaveBeenCalled();
  });
});

import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { ConfigError, loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.dbPath).toBe(path.resolve(process.cwd(), 'data/tracker.db'));
    expect(config.seedPath).toBe(path.resolve(process.cwd(), 'data/seed/tax-examples.json'));
    expect(config.lookupUrlTemplate).toContain('{apn}');
    expect(config.defaults).toEqual({ city: 'Winnemucca', state: 'NV', zip: '89445' });
    expect(config.lookupTimeoutMs).toBe(15_000);
    expect(config.documentTimeoutMs).toBe(30_000);
    expect(config.resolverBatchSize).toBe(25);
    expect(config.resolverConcurrency).toBe(3);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      DISTRESS_TRACKER_DB_PATH: ':memory:',
      PARCEL_LOOKUP_URL_TEMPLATE: 'https://parcels.example.test/view?apn={apn}',
      DEFAULT_CITY: 'Lovelock',
      DEFAULT_ZIP: '89419',
      LOOKUP_TIMEOUT_MS: '5000',
      RESOLVER_CONCURRENCY: '-4',
      RESOLVER_BATCH_SIZE: 'lots',
    });

    expect(config.dbPath).toBe(':memory:');
    expect(config.lookupUrlTemplate).toBe('https://parcels.example.test/view?apn={apn}');
    expect(config.defaults).toEqual({ city: 'Lovelock', state: 'NV', zip: '89419' });
    expect(config.lookupTimeoutMs).toBe(5000);
    expect(config.resolverConcurrency).toBe(1);
    expect(config.resolverBatchSize).toBe(25);
  });

  it('rejects a lookup template without the placeholder', () => {
    expect(() => loadConfig({ PARCEL_LOOKUP_URL_TEMPLATE: 'https://parcels.example.test/view' })).toThrow(
      'Invalid configuration: PARCEL_LOOKUP_URL_TEMPLATE: must contain the {apn} placeholder',
    );
  });

  it('names every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ DEFAULT_ZIP: 'none', TAX_LIST_PAGE_URL: 'not a url' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((issue) => issue.split(':')[0]).sort()).toEqual(['DEFAULT_ZIP', 'TAX_LIST_PAGE_URL']);
  });
});

/**
 * Tests for config
 *
 * Usage: node --import tsx --test src/__tests__/config.test.ts
 */

import { strict as assert } from 'node:assert';
import { describe, test } from 'node:test';
import { API_KEY_HEADER, API_URL, USER_AGENT, parseSeconds, resolveClientConfig } from '../config.js';

describe('resolveClientConfig', () => {
  test('uses built-in endpoint and agent with the given key', () => {
    const config = resolveClientConfig({ apiKey: 'test-secret', timeoutMs: 1000 }, {});
    assert.deepStrictEqual(config, {
      apiUrl: API_URL,
      userAgent: USER_AGENT,
      apiKeyHeader: API_KEY_HEADER,
      apiKey: 'test-secret',
      timeoutMs: 1000
    });
    assert.ok(Object.isFrozen(config));
  });

  test('falls back to HIBP_API_KEY', () => {
    const config = resolveClientConfig({}, { HIBP_API_KEY: ' env-secret ' });
    assert.strictEqual(config.apiKey, 'env-secret');
    assert.strictEqual(config.timeoutMs, 30000);
  });

  test('prefers the command-line key over the environment', () => {
    const config = resolveClientConfig({ apiKey: 'cli-secret' }, { HIBP_API_KEY: 'env-secret' });
    assert.strictEqual(config.apiKey, 'cli-secret');
  });

  test('applies endpoint and agent overrides, trimming trailing slashes', () => {
    const config = resolveClientConfig(
      { apiKey: 'test-secret' },
      { HIBP_API_URL: 'http://localhost:8080/breachedaccount//', HIBP_USER_AGENT: 'custom-agent' }
    );
    assert.strictEqual(config.apiUrl, 'http://localhost:8080/breachedaccount');
    assert.strictEqual(config.userAgent, 'custom-agent');
  });

  test('throws when no key is available', () => {
    assert.throws(() => resolveClientConfig({}, {}), /API key is required/);
    assert.throws(() => resolveClientConfig({ apiKey: '   ' }, {}), /API key is required/);
  });
});

describe('parseSeconds', () => {
  test('converts fractional seconds to milliseconds', () => {
    assert.strictEqual(parseSeconds('1.6', '--sleep'), 1600);
    assert.strictEqual(parseSeconds('0', '--sleep'), 0);
    assert.strictEqual(parseSeconds(2, '--sleep'), 2000);
  });

  test('rejects negative, empty and non-numeric values', () => {
    assert.throws(() => parseSeconds('-1', '--sleep'), /--sleep must be a non-negative number/);
    assert.throws(() => parseSeconds('', '--sleep'), /--sleep must be/);
    assert.throws(() => parseSeconds('fast', '--timeout'), /--timeout must be/);
  });
});

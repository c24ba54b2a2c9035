/**
 * Tests for reportWriter
 *
 * Usage: node --import tsx --test src/report/__tests__/reportWriter.test.ts
 */

import { strict as assert } from 'node:assert';
import { after, before, describe, test } from 'node:test';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parseReport, renderJsonReport, renderReport, writeReport } from '../reportWriter.js';
import { formatResults } from '../../formatter/breachFormatter.js';
import { createLogger } from '../../logger.js';
import type { BreachIndex } from '../../types.js';

const logger = createLogger({ quiet: true });
let testDir = '';

before(() => {
  testDir = mkdtempSync(path.join(os.tmpdir(), 'breach-report-writer-'));
});

after(() => {
  rmSync(testDir, { recursive: true, force: true });
});

const sample: BreachIndex = new Map([
  ['Adobe', ['alice@example.com', 'bob@example.com']],
  ['LinkedIn', ['alice@example.com']]
]);

describe('renderReport', () => {
  test('writes a bold heading, one bullet per address and a blank line per breach', () => {
    assert.strictEqual(
      renderReport(sample),
      '**Adobe**\n* alice@example.com\n* bob@example.com\n\n**LinkedIn**\n* alice@example.com\n\n'
    );
  });

  test('renders an empty index as an empty string', () => {
    assert.strictEqual(renderReport(new Map()), '');
  });
});

describe('renderJsonReport', () => {
  test('writes breach -> addresses as an object', () => {
    assert.deepStrictEqual(JSON.parse(renderJsonReport(sample)), {
      Adobe: ['alice@example.com', 'bob@example.com'],
      LinkedIn: ['alice@example.com']
    });
  });
});

describe('writeReport', () => {
  test('overwrites an existing file', async () => {
    const outPath = path.join(testDir, 'pwned.txt');
    writeFileSync(outPath, 'stale contents that should disappear\n', 'utf8');

    await writeReport(sample, outPath, logger);

    assert.strictEqual(
      readFileSync(outPath, 'utf8'),
      '**Adobe**\n* alice@example.com\n* bob@example.com\n\n**LinkedIn**\n* alice@example.com\n\n'
    );
  });

  test('writes JSON when the path ends in .json', async () => {
    const outPath = path.join(testDir, 'pwned.json');
    await writeReport(sample, outPath, logger);
    assert.deepStrictEqual(JSON.parse(readFileSync(outPath, 'utf8')), {
      Adobe: ['alice@example.com', 'bob@example.com'],
      LinkedIn: ['alice@example.com']
    });
  });

  test('format, write and re-read gives back every block in discovery order', async () => {
    const index = formatResults(new Map([
      ['c@x.com', '[{"Name":"Beta"}]'],
      ['a@x.com', '[{"Name":"Alpha"},{"Name":"Beta"}]'],
      ['b@x.com', '[{"Name":"Alpha"}]']
    ]));
    const outPath = path.join(testDir, 'roundtrip.txt');

    await writeReport(index, outPath, logger);
    const reread = parseReport(readFileSync(outPath, 'utf8'));

    assert.deepStrictEqual(Array.from(reread), [
      ['Beta', ['c@x.com', 'a@x.com']],
      ['Alpha', ['a@x.com', 'b@x.com']]
    ]);
  });
});

describe('parseReport', () => {
  test('ignores bullets outside a breach block', () => {
    const index = parseReport('* stray@x.com\n\n**Adobe**\n* a@x.com\n\n* orphan@x.com\n');
    assert.deepStrictEqual(Array.from(index), [['Adobe', ['a@x.com']]]);
  });
});

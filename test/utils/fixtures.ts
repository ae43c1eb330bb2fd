import * as fs from 'fs';
import * as path from 'path';
import { HITRON_CODA45_PAGES } from '../../src/modem/drivers/hitron-coda45.driver';
import { ReadingType } from '../../src/docsis';

const fixturesPath = path.join(__dirname, '..', 'fixtures');

/**
 * Load a recorded modem page from test/fixtures by file name.
 */
export function loadFixture(fileName: string): unknown {
  const payload: unknown = JSON.parse(
    fs.readFileSync(path.join(fixturesPath, fileName), 'utf-8'),
  );
  return payload;
}

/**
 * Fixture for a reading type, named after the page it was captured from
 * (e.g. dsinfo.json for /data/dsinfo.asp).
 */
export function loadPageFixture(readingType: ReadingType): unknown {
  return loadFixture(
    `${path.basename(HITRON_CODA45_PAGES[readingType], '.asp')}.json`,
  );
}

/** Fixed capture time used across suites: 2026-01-04T10:00:00Z. */
export const TEST_TIMESTAMP = 1_767_520_800_000_000_000n;

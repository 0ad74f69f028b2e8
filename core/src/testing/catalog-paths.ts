/**
 * Test utility for resolving catalog and fixture paths.
 * Tests should use this instead of importing from the CLI so the root catalog
 * stays the single source of truth.
 */
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Repository root directory */
export const REPO_ROOT = resolve(__dirname, '..', '..', '..');

/** Root catalog directory */
export const CATALOG_ROOT = resolve(REPO_ROOT, 'catalog');

/** Key-path maps within the catalog */
export const CATALOG_KEY_MAPS_ROOT = resolve(CATALOG_ROOT, 'key-maps');

/** Default key-path map */
export const DEFAULT_KEY_MAP_PATH = resolve(CATALOG_KEY_MAPS_ROOT, 'strategy.yaml');

/** Core test fixtures directory */
export const TEST_FIXTURES_ROOT = resolve(REPO_ROOT, 'core', 'tests', 'fixtures');

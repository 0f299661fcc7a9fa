/**
 * Test fixtures for the controller.
 *
 * Fixtures live next to this module as JSON and text files.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const fixturesDir = dirname(fileURLToPath(import.meta.url));

/**
 * Load a fixture file as a string.
 */
export function loadFixture(relativePath: string): string {
  return readFileSync(join(fixturesDir, relativePath), 'utf-8');
}

/**
 * Load a JSON fixture and parse it.
 */
export function loadJsonFixture(relativePath: string): unknown {
  return JSON.parse(loadFixture(relativePath));
}

/**
 * Split fixture text into chunks of at most `size` characters, the way a
 * network read might deliver it.
 */
export function chunkText(text: string, size: number): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

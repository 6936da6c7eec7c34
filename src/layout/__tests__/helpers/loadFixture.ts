/**
 * Load test fixtures from the test/ directory.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { GraphInput } from '../../../types.js';
import { TestPayload } from './graphs.js';

/**
 * Load a JSON graph fixture by name (without .json extension).
 */
export function loadFixture(name: string): GraphInput<TestPayload> {
    const fixturePath = join(process.cwd(), 'test', `${name}.json`);
    const content = readFileSync(fixturePath, 'utf-8');
    return JSON.parse(content) as GraphInput<TestPayload>;
}

/**
 * Load a fixture file as raw text.
 */
export function loadFixtureText(name: string): string {
    return readFileSync(join(process.cwd(), 'test', `${name}.json`), 'utf-8');
}

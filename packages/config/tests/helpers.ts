import path from 'node:path';
import { fileURLToPath } from 'node:url';

const packageRoot = fileURLToPath(new URL('..', import.meta.url));

export const fixturesDirectory = path.join(packageRoot, 'tests/fixtures');

export function fixture(name: string): string {
  return path.join(fixturesDirectory, name);
}

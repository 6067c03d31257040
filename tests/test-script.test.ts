import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { readFileSync, readdirSync } from 'fs';

const root = new URL('../', import.meta.url);

function testScript(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL('package.json', root), 'utf8'));
  if (typeof pkg !== 'object' || pkg === null || !('scripts' in pkg)) throw new Error('package.json has no scripts');
  const { scripts } = pkg;
  if (typeof scripts !== 'object' || scripts === null || !('test' in scripts) || typeof scripts.test !== 'string') {
    throw new Error('package.json has no test script');
  }
  return scripts.test;
}

describe('npm test script', () => {
  // node --test on Node 20 takes no globs, so every file is named
  it('should name every test file under tests/', () => {
    const named = testScript().split(/\s+/).filter((arg) => arg.endsWith('.test.ts')).sort();
    const onDisk = readdirSync(new URL('tests/', root))
      .filter((file) => file.endsWith('.test.ts'))
      .map((file) => `tests/${file}`)
      .sort();
    assert.deepEqual(named, onDisk);
  });
});

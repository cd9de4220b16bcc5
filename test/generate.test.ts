import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { FIXTURES, fixtureBytes } from '../src/fixtures';
import { WORKSPACE_PREFIX, createFixtures, writeFixture } from '../src/generate';

describe('createFixtures', () => {
  let parentDir: string;

  beforeEach(() => {
    parentDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fixtures-test-'));
  });

  afterEach(() => {
    fs.rmSync(parentDir, { recursive: true, force: true });
  });

  it('should return a new directory under the parent', () => {
    const workspace = createFixtures(parentDir);

    expect(path.dirname(workspace)).toBe(parentDir);
    expect(path.basename(workspace).startsWith(WORKSPACE_PREFIX)).toBe(true);
    expect(fs.statSync(workspace).isDirectory()).toBe(true);
  });

  it('should write exactly the six fixtures', () => {
    const workspace = createFixtures(parentDir);

    expect(fs.readdirSync(workspace).sort()).toEqual([
      'analysis.ipynb',
      'config.json',
      'diagram.svg',
      'example.py',
      'example.rs',
      'pixel.png',
    ]);
  });

  it('should write each fixture at its authored byte length', () => {
    const workspace = createFixtures(parentDir);

    for (const fixture of FIXTURES) {
      expect(fs.statSync(path.join(workspace, fixture.name)).size).toBe(fixtureBytes(fixture));
    }
  });

  it('should write the authored content verbatim', () => {
    const workspace = createFixtures(parentDir);

    for (const fixture of FIXTURES) {
      const written = fs.readFileSync(path.join(workspace, fixture.name));
      const authored =
        typeof fixture.content === 'string' ? Buffer.from(fixture.content, 'utf8') : fixture.content;
      expect(written.equals(authored)).toBe(true);
    }
  });

  it('should never reuse a workspace between runs', () => {
    const first = createFixtures(parentDir);
    const second = createFixtures(parentDir);

    expect(second).not.toBe(first);
    expect(fs.readdirSync(parentDir)).toHaveLength(2);
  });

  it('should propagate filesystem errors', () => {
    const missing = path.join(parentDir, 'does-not-exist');

    expect(() => createFixtures(missing)).toThrow(/ENOENT/);
  });
});

describe('writeFixture', () => {
  let workspace: string;

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'fixtures-test-'));
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it('should overwrite an existing file', () => {
    const target = path.join(workspace, 'example.py');
    fs.writeFileSync(target, 'stale content that is longer than nothing');

    const written = writeFixture(workspace, { name: 'example.py', format: 'python', content: 'pass\n' });

    expect(written).toBe(target);
    expect(fs.readFileSync(target, 'utf-8')).toBe('pass\n');
  });
});

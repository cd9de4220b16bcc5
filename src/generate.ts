import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FIXTURES, fixtureBytes, type FixtureFile } from './fixtures';

// mkdtemp appends six random characters to this prefix
export const WORKSPACE_PREFIX = 'multimodal-read-';

/**
 * Write a single fixture into the workspace, replacing any existing file
 */
export function writeFixture(workspace: string, fixture: FixtureFile): string {
  const filePath = path.join(workspace, fixture.name);
  fs.writeFileSync(filePath, fixture.content);
  return filePath;
}

/**
 * Create a fresh workspace under parentDir and write every fixture into it.
 * Filesystem errors are not caught; a failed run may leave a partial workspace.
 */
export function createFixtures(parentDir: string = os.tmpdir()): string {
  const workspace = fs.mkdtempSync(path.join(parentDir, WORKSPACE_PREFIX));

  for (const fixture of FIXTURES) {
    writeFixture(workspace, fixture);
  }

  return workspace;
}

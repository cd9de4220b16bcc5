import * as fs from 'fs';
import * as path from 'path';
import * as core from '@actions/core';

export const READ_COMMAND = 'aster read';
export const HINT_FIXTURES = ['example.py', 'diagram.svg', 'analysis.ipynb'] as const;

export interface FixtureEntry {
  name: string;
  size: number;
}

/**
 * Entries directly inside the workspace, sorted by name
 */
export function listFixtures(workspace: string): FixtureEntry[] {
  return fs
    .readdirSync(workspace)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .map((name) => ({ name, size: fs.statSync(path.join(workspace, name)).size }));
}

export function report(workspace: string): FixtureEntry[] {
  const entries = listFixtures(workspace);
  for (const entry of entries) {
    core.info(`  - ${entry.name} (${entry.size} bytes)`);
  }
  return entries;
}

export function reportUsageHints(workspace: string): void {
  core.info(`Point the read tool at the fixtures, for example:`);
  for (const name of HINT_FIXTURES) {
    core.info(`   e.g. ${READ_COMMAND} ${path.join(workspace, name)}`);
  }
}

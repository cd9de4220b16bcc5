import * as core from '@actions/core';
import { createFixtures } from './generate';
import { report, reportUsageHints } from './report';

/**
 * Generate a workspace of fixtures, list it and print read-tool hints.
 * Returns the workspace path; it is left on disk for the read tool.
 */
export function main(parentDir?: string): string {
  core.info('Creating fixture files...');
  const workspace = createFixtures(parentDir);

  core.info(`Fixtures written to: ${workspace}`);
  core.info('');
  core.info('Files:');
  report(workspace);

  core.info('');
  core.info('Fixtures ready.');
  reportUsageHints(workspace);

  return workspace;
}

/**
 * Deployment Package Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import AdmZip from 'adm-zip';
import fs from 'fs-extra';
import path from 'path';
import { createDeploymentPackage } from '../src/deployment/package';
import { createSpyLogger, makeTempDir, writeFiles } from './helpers';

function zipEntries(zipPath: string): string[] {
  return new AdmZip(zipPath)
    .getEntries()
    .filter((entry) => !entry.isDirectory)
    .map((entry) => entry.entryName)
    .sort();
}

describe('createDeploymentPackage', () => {
  let dir: string;

  beforeEach(async (): Promise<void> => {
    dir = await makeTempDir();
    await writeFiles(dir, {
      'publish/App.dll': 'binary',
      'publish/oryx-manifest.toml': '[build]\n',
      'publish/wwwroot/index.html': '<html></html>',
    });
  });

  afterEach(async (): Promise<void> => {
    await fs.remove(dir);
  });

  it('zips the artifact contents next to the project', async (): Promise<void> => {
    const zipPath = await createDeploymentPackage(dir, path.join(dir, 'publish'), 'app.zip', createSpyLogger());

    expect(zipPath).toBe(path.join(dir, 'app.zip'));
    expect(zipEntries(zipPath)).toEqual(['App.dll', 'oryx-manifest.toml', 'wwwroot/index.html']);
  });

  it('replaces a stale package', async (): Promise<void> => {
    await writeFiles(dir, { 'app.zip': 'stale' });

    const zipPath = await createDeploymentPackage(dir, path.join(dir, 'publish'), 'app.zip', createSpyLogger());

    expect(zipPath).toBe(path.join(dir, 'app.zip'));
    expect(zipEntries(zipPath)).toContain('App.dll');
  });
});

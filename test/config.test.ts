/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_OUTPUT_PATH, ProjectPlatform, parsePlatform, resolveBuildConfig } from '../src/deployment/config';

describe('parsePlatform', () => {
  it.each([
    ['dotnet', ProjectPlatform.DOTNET],
    ['.NET', ProjectPlatform.DOTNET],
    ['node', ProjectPlatform.NODEJS],
    [' NodeJS ', ProjectPlatform.NODEJS],
    ['python', ProjectPlatform.PYTHON],
  ])('maps %s', (value, expected): void => {
    expect(parsePlatform(value)).toBe(expected);
  });

  it('returns undefined for unknown or empty values', (): void => {
    expect(parsePlatform('ruby')).toBeUndefined();
    expect(parsePlatform('')).toBeUndefined();
    expect(parsePlatform(undefined)).toBeUndefined();
  });
});

describe('resolveBuildConfig', () => {
  it('uses defaults when nothing is set', (): void => {
    expect(resolveBuildConfig({ projectPath: '/src/app' }, {})).toEqual({
      projectPath: '/src/app',
      outputPath: DEFAULT_OUTPUT_PATH,
      verbose: false,
      platform: undefined,
      deploymentZip: undefined,
      deploymentTarget: undefined,
    });
  });

  it('reads BUILDPILOT_* environment variables', (): void => {
    const config = resolveBuildConfig(
      { projectPath: '/src/app' },
      {
        BUILDPILOT_OUTPUT_PATH: 'out',
        BUILDPILOT_VERBOSE: 'yes',
        BUILDPILOT_PLATFORM: 'python',
        BUILDPILOT_DEPLOYMENT_ZIP: 'app.zip',
        BUILDPILOT_RESOURCE_GROUP: 'rg-test',
        BUILDPILOT_APP_NAME: 'app-test',
      }
    );

    expect(config).toEqual({
      projectPath: '/src/app',
      outputPath: 'out',
      verbose: true,
      platform: ProjectPlatform.PYTHON,
      deploymentZip: 'app.zip',
      deploymentTarget: { resourceGroup: 'rg-test', appName: 'app-test' },
    });
  });

  it('lets explicit overrides win over the environment', (): void => {
    const config = resolveBuildConfig(
      { projectPath: '/src/app', outputPath: 'dist', verbose: false, platform: ProjectPlatform.NODEJS },
      { BUILDPILOT_OUTPUT_PATH: 'out', BUILDPILOT_VERBOSE: 'true', BUILDPILOT_PLATFORM: 'dotnet' }
    );

    expect(config.outputPath).toBe('dist');
    expect(config.verbose).toBe(false);
    expect(config.platform).toBe(ProjectPlatform.NODEJS);
  });

  it('needs both resource group and app name for a deployment target', (): void => {
    const config = resolveBuildConfig({ projectPath: '.' }, { BUILDPILOT_RESOURCE_GROUP: 'rg-test' });
    expect(config.deploymentTarget).toBeUndefined();
  });

  it('treats other flag values as false', (): void => {
    expect(resolveBuildConfig({ projectPath: '.' }, { BUILDPILOT_VERBOSE: 'off' }).verbose).toBe(false);
  });
});

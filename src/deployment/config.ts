export enum ProjectPlatform {
    DOTNET = 'dotnet',
    NODEJS = 'nodejs',
    PYTHON = 'python',
    UNKNOWN = 'unknown'
}

export interface DeploymentTarget {
    resourceGroup: string;
    appName: string;
}

export interface BuildConfig {
    projectPath: string;
    outputPath: string; // Artifact directory, resolved against projectPath
    verbose: boolean;
    platform?: ProjectPlatform; // Skips detection when set
    deploymentZip?: string; // Zip file name written next to the project when set
    deploymentTarget?: DeploymentTarget;
}

export const DEFAULT_OUTPUT_PATH = 'publish';
export const MANIFEST_FILE_NAME = 'oryx-manifest.toml';

// Top-level markers, checked in this order by the detector
export const DOTNET_PROJECT_EXTENSIONS = ['.csproj', '.fsproj', '.vbproj'];
export const NODE_MARKER_FILES = ['package.json'];
export const NODE_SOURCE_EXTENSIONS = ['.js', '.ts'];
export const PYTHON_MARKER_FILES = ['requirements.txt', 'setup.py', 'pyproject.toml'];
export const PYTHON_SOURCE_EXTENSIONS = ['.py'];

// Used when the project declares no runtime version. Fixed so that the manifest
// only depends on the project, never on the machine that built it.
export const DEFAULT_DOTNET_VERSION = '8.0';
export const DEFAULT_NODE_VERSION = '20';
export const DEFAULT_PYTHON_VERSION = '3.11';

export const DEPLOYMENT_FILE_CONTENT = '[config]\nSCM_DO_BUILD_DURING_DEPLOYMENT=true\n';

export const IGNORED_DIRS = [
    'node_modules',
    '.git',
    '.vs',
    '.vscode',
    '__pycache__',
    '__MACOSX'
];

export function parsePlatform(value: string | undefined): ProjectPlatform | undefined {
    if (!value) return undefined;
    const normalized = value.trim().toLowerCase();
    switch (normalized) {
        case 'dotnet':
        case '.net':
            return ProjectPlatform.DOTNET;
        case 'nodejs':
        case 'node':
            return ProjectPlatform.NODEJS;
        case 'python':
            return ProjectPlatform.PYTHON;
        default:
            return undefined;
    }
}

function parseFlag(value: string | undefined): boolean | undefined {
    if (value === undefined) return undefined;
    return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Builds the effective configuration.
 * Explicit overrides win over BUILDPILOT_* environment variables, which win over defaults.
 */
export function resolveBuildConfig(
    overrides: Partial<BuildConfig> & Pick<BuildConfig, 'projectPath'>,
    env: NodeJS.ProcessEnv = process.env
): BuildConfig {
    const resourceGroup = env['BUILDPILOT_RESOURCE_GROUP'];
    const appName = env['BUILDPILOT_APP_NAME'];
    const envTarget = resourceGroup && appName ? { resourceGroup, appName } : undefined;

    return {
        projectPath: overrides.projectPath,
        outputPath: overrides.outputPath ?? env['BUILDPILOT_OUTPUT_PATH'] ?? DEFAULT_OUTPUT_PATH,
        verbose: overrides.verbose ?? parseFlag(env['BUILDPILOT_VERBOSE']) ?? false,
        platform: overrides.platform ?? parsePlatform(env['BUILDPILOT_PLATFORM']),
        deploymentZip: overrides.deploymentZip ?? env['BUILDPILOT_DEPLOYMENT_ZIP'],
        deploymentTarget: overrides.deploymentTarget ?? envTarget
    };
}

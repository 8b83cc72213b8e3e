import fs from 'fs-extra';
import path from 'path';
import { MANIFEST_FILE_NAME, ProjectPlatform } from './config';

/**
 * How to start a built artifact. `command` runs with the artifact directory as the
 * working directory; deployment tooling depends on these three fields as they are.
 */
export interface Manifest {
    readonly platform: string;
    readonly version: string;
    readonly command: string;
    /** Build the host runs after upload, written as `build-command` when set */
    readonly buildCommand?: string;
}

export function createManifest(
    platform: ProjectPlatform,
    version: string,
    command: string,
    buildCommand?: string
): Manifest {
    return Object.freeze(buildCommand ? { platform, version, command, buildCommand } : { platform, version, command });
}

function tomlString(value: string): string {
    const escaped = value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r')
        .replace(/\t/g, '\\t');
    return `"${escaped}"`;
}

export function renderManifest(manifest: Manifest): string {
    return [
        '[build]',
        `platform = ${tomlString(manifest.platform)}`,
        `version = ${tomlString(manifest.version)}`,
        ...(manifest.buildCommand ? [`build-command = ${tomlString(manifest.buildCommand)}`] : []),
        '',
        '[run]',
        `command = ${tomlString(manifest.command)}`,
        ''
    ].join('\n');
}

export async function writeManifest(manifest: Manifest, artifactPath: string): Promise<string> {
    const manifestPath = path.join(artifactPath, MANIFEST_FILE_NAME);
    await fs.writeFile(manifestPath, renderManifest(manifest));
    return manifestPath;
}

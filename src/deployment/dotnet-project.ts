import fs from 'fs-extra';
import path from 'path';
import { listTopLevelFiles } from './analyzer';
import { DOTNET_PROJECT_EXTENSIONS } from './config';
import { Logger } from './logger';

/**
 * Picks the project file to build. Extensions are tried in order (.csproj, .fsproj,
 * .vbproj) and names sorted within each, so the choice is stable. More than one
 * candidate is not an error: the first wins and the rest are reported.
 */
export async function resolveProjectFile(projectDir: string, logger: Logger): Promise<string | undefined> {
    const files = await listTopLevelFiles(projectDir);
    const candidates = DOTNET_PROJECT_EXTENSIONS.flatMap((extension) =>
        files.filter((file) => path.extname(file).toLowerCase() === extension).sort()
    );

    if (candidates.length === 0) {
        logger.error(`No .NET project file found in ${projectDir}`);
        return undefined;
    }

    const [chosen, ...ignored] = candidates;
    if (ignored.length > 0) {
        logger.warn(`Multiple project files found. Using: ${chosen} (ignored: ${ignored.join(', ')})`);
    }
    return chosen;
}

/**
 * Reads the target runtime version ("8.0", "9.0") from <TargetFramework> or the first
 * entry of <TargetFrameworks>. Returns undefined when nothing usable is declared.
 */
export async function detectTargetRuntimeVersion(projectFilePath: string, logger: Logger): Promise<string | undefined> {
    if (!(await fs.pathExists(projectFilePath))) {
        logger.warn(`Project file not found: ${projectFilePath}`);
        return undefined;
    }

    const content = await fs.readFile(projectFilePath, 'utf-8');
    const tfmMatch = /<TargetFrameworks?>\s*([^<]+?)\s*<\/TargetFrameworks?>/i.exec(content);
    if (!tfmMatch) {
        logger.warn(`No TargetFramework(s) found in project file: ${projectFilePath}`);
        return undefined;
    }

    const tfm = tfmMatch[1]
        .split(';')
        .map((value) => value.trim())
        .find((value) => value.length > 0);
    if (!tfm) return undefined;

    // net8.0, net9.0-windows, ...
    const versionMatch = /^net(\d+)\.(\d+)/i.exec(tfm);
    if (!versionMatch) {
        logger.warn(`Unrecognized TargetFramework format: ${tfm}`);
        return undefined;
    }

    const version = `${versionMatch[1]}.${versionMatch[2]}`;
    logger.info(`Detected TargetFramework: ${tfm} -> .NET ${version}`);
    return version;
}

/**
 * Compares dotted versions numerically by their first two components.
 * Returns a negative number when `a` is older than `b`.
 */
export function compareMajorMinor(a: string, b: string): number {
    const parse = (value: string) => {
        const [major = 0, minor = 0] = value
            .trim()
            .split('.')
            .map((part) => Number.parseInt(part, 10))
            .map((part) => (Number.isNaN(part) ? 0 : part));
        return [major, minor];
    };
    const [aMajor, aMinor] = parse(a);
    const [bMajor, bMinor] = parse(b);
    return aMajor !== bMajor ? aMajor - bMajor : aMinor - bMinor;
}

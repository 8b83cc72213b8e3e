import fs from 'fs-extra';
import path from 'path';
import {
    DOTNET_PROJECT_EXTENSIONS,
    NODE_MARKER_FILES,
    NODE_SOURCE_EXTENSIONS,
    ProjectPlatform,
    PYTHON_MARKER_FILES,
    PYTHON_SOURCE_EXTENSIONS
} from './config';
import { Logger } from './logger';

/**
 * Lists the regular files directly inside a directory. Subdirectories are never
 * descended into: a nested project must not classify its parent.
 */
export async function listTopLevelFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
}

export function hasExtension(fileName: string, extensions: readonly string[]): boolean {
    return extensions.includes(path.extname(fileName).toLowerCase());
}

async function isDirectory(target: string): Promise<boolean> {
    if (!(await fs.pathExists(target))) return false;
    const stat = await fs.stat(target);
    return stat.isDirectory();
}

/**
 * Detects the platform of a project directory from its top-level marker files.
 * Priority: .NET -> Node.js -> Python -> Unknown. A directory holding both a .csproj
 * and a package.json is .NET.
 *
 * A missing path is reported through the logger and yields UNKNOWN.
 */
export async function detectPlatform(projectPath: string, logger: Logger): Promise<ProjectPlatform> {
    if (!projectPath.trim() || !(await isDirectory(projectPath))) {
        logger.error(`Project path does not exist or is not a directory: ${projectPath}`);
        return ProjectPlatform.UNKNOWN;
    }

    logger.info(`Detecting platform in: ${projectPath}`);
    const files = await listTopLevelFiles(projectPath);

    const dotnetFiles = files.filter((file) => hasExtension(file, DOTNET_PROJECT_EXTENSIONS));
    if (dotnetFiles.length > 0) {
        logger.info(`Detected .NET project (found ${dotnetFiles.length} project file(s))`);
        return ProjectPlatform.DOTNET;
    }

    if (files.some((file) => NODE_MARKER_FILES.includes(file) || hasExtension(file, NODE_SOURCE_EXTENSIONS))) {
        logger.info('Detected Node.js project');
        return ProjectPlatform.NODEJS;
    }

    if (files.some((file) => PYTHON_MARKER_FILES.includes(file) || hasExtension(file, PYTHON_SOURCE_EXTENSIONS))) {
        logger.info('Detected Python project');
        return ProjectPlatform.PYTHON;
    }

    logger.warn(`Could not detect project platform in: ${projectPath}`);
    return ProjectPlatform.UNKNOWN;
}

import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { BuildContext } from './builder';

const UNIX_CANDIDATES = [
    '/usr/bin/python3',
    '/usr/local/bin/python3',
    '/opt/homebrew/bin/python3', // macOS ARM
    '/opt/local/bin/python3', // MacPorts
    '/usr/bin/python',
    '/usr/local/bin/python'
];

function windowsCandidates(): string[] {
    const localAppData = process.env['LOCALAPPDATA'] ?? path.join(os.homedir(), 'AppData', 'Local');
    const programFiles = process.env['ProgramFiles'] ?? 'C:\\Program Files';
    const candidates = [
        path.join(localAppData, 'Microsoft', 'WindowsApps', 'python.exe'),
        path.join(localAppData, 'Microsoft', 'WindowsApps', 'python3.exe')
    ];
    for (let ver = 313; ver >= 38; ver--) {
        candidates.push(
            `C:\\Python${ver}\\python.exe`,
            path.join(localAppData, 'Programs', 'Python', `Python${ver}`, 'python.exe'),
            path.join(programFiles, `Python${ver}`, 'python.exe')
        );
    }
    return candidates;
}

async function findInPath(ctx: BuildContext, isWindows: boolean): Promise<string | undefined> {
    const lookup = isWindows ? 'where' : 'which';
    const names = isWindows ? ['python', 'python3'] : ['python3', 'python'];

    for (const name of names) {
        const result = await ctx.executor.execute(lookup, [name], { signal: ctx.signal });
        if (!result.success) continue;

        const found = result.stdout
            .split(/\r?\n/)
            .map((line) => line.trim())
            .find((line) => line.length > 0);
        if (found && (await fs.pathExists(found))) {
            return found;
        }
    }
    return undefined;
}

/**
 * Finds a Python interpreter: PATH first, then well-known install locations.
 * Resolved on every call; nothing is cached between builds.
 */
export async function findPythonExecutable(
    ctx: BuildContext,
    platform: NodeJS.Platform = process.platform
): Promise<string | undefined> {
    const isWindows = platform === 'win32';

    const fromPath = await findInPath(ctx, isWindows);
    if (fromPath) return fromPath;

    for (const candidate of isWindows ? windowsCandidates() : UNIX_CANDIDATES) {
        if (await fs.pathExists(candidate)) {
            return candidate;
        }
    }
    return undefined;
}

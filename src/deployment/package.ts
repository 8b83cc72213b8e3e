import AdmZip from 'adm-zip';
import fs from 'fs-extra';
import path from 'path';
import { Logger } from './logger';

function timestamp(date: Date): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

/**
 * Zips the artifact's contents (without the directory itself) into the project
 * directory. When a stale package cannot be removed, a timestamped name is used instead.
 */
export async function createDeploymentPackage(
    projectDir: string,
    artifactPath: string,
    zipName: string,
    logger: Logger
): Promise<string> {
    let zipPath = path.resolve(projectDir, zipName);
    logger.info(`Creating deployment package: ${zipPath}`);

    if (await fs.pathExists(zipPath)) {
        logger.debug('Removing existing deployment package...');
        try {
            await fs.remove(zipPath);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            const parsed = path.parse(zipPath);
            zipPath = path.join(parsed.dir, `${parsed.name}_${timestamp(new Date())}${parsed.ext}`);
            logger.warn(`Could not delete existing package (${reason}), using ${zipPath}`);
        }
    }

    const started = Date.now();
    const zip = new AdmZip();
    zip.addLocalFolder(artifactPath);
    zip.writeZip(zipPath);

    const fileCount = zip.getEntries().filter((entry) => !entry.isDirectory).length;
    const { size } = await fs.stat(zipPath);
    logger.info(
        `Packaged ${fileCount} files in ${((Date.now() - started) / 1000).toFixed(1)}s - ` +
            `Size: ${(size / 1024 / 1024).toFixed(2)} MB`
    );
    return zipPath;
}

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Produces a file at a temporary path beside `targetPath`, then renames it
 * into place. Readers see either the previous file or the complete new one.
 */
export async function replaceAtomically(
    targetPath: string,
    produce: (tempPath: string) => Promise<void>
): Promise<void> {
    await mkdir(dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.tmp-${process.pid}-${randomUUID()}`;
    try {
        await produce(tempPath);
        await rename(tempPath, targetPath);
    } catch (err) {
        await rm(tempPath, { force: true });
        throw err;
    }
}

export async function writeFileAtomically(targetPath: string, contents: string): Promise<void> {
    await replaceAtomically(targetPath, (tempPath) => writeFile(tempPath, contents, 'utf-8'));
}

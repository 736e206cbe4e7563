import fs from 'fs';
import path from 'path';

const PRIVATE_DIRECTORY_MODE = 0o700;
const PRIVATE_FILE_MODE = 0o600;

function restrictPermissions(targetPath: string, mode: number): void {
    if (process.platform === 'win32') {
        return;
    }
    try {
        fs.chmodSync(targetPath, mode);
    } catch (error) {
        // some mounted filesystems refuse chmod; the data stays usable
        console.warn(`[WARN] chmod ${mode.toString(8)} failed on ${targetPath}`, error instanceof Error ? error.message : error);
    }
}

export function ensureDirectoryPrivate(directoryPath: string): void {
    if (!fs.existsSync(directoryPath)) {
        fs.mkdirSync(directoryPath, { recursive: true });
    }
    restrictPermissions(directoryPath, PRIVATE_DIRECTORY_MODE);
}

/** Creates the parent of a database or session file with owner-only access. */
export function ensureParentDirectoryPrivate(filePath: string): void {
    ensureDirectoryPrivate(path.dirname(filePath));
}

export function ensureFilePrivate(filePath: string): void {
    if (!fs.existsSync(filePath)) {
        return;
    }
    restrictPermissions(filePath, PRIVATE_FILE_MODE);
}

import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

// Nearest directory holding package.json, from src/shared or dist/src/shared alike
function findPackageRoot(start: string): string {
    let dir = start;
    while (!existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) return start;
        dir = parent;
    }
    return dir;
}

export const PACKAGE_ROOT = findPackageRoot(MODULE_DIR);

/**
 * Absolute path of a file shipped with the package (data/, templates/).
 */
export function packagePath(...segments: string[]): string {
    return path.join(PACKAGE_ROOT, ...segments);
}

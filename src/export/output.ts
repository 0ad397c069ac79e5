import * as fs from 'fs/promises';
import * as path from 'path';
import { WriteError } from '../capstone/errors.js';

/**
 * Writes a text output, creating missing parent directories.
 * @throws WriteError
 */
export async function writeOutput(filePath: string, contents: string): Promise<void> {
    try {
        await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await fs.writeFile(filePath, contents, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new WriteError(`Cannot write ${filePath}: ${reason}`, err);
    }
}

import * as fs from 'fs/promises';
import * as path from 'path';
import JSZip from 'jszip';
import { ArchiveError } from './errors.js';
import { INDEX_ENTRY } from './format.js';

/**
 * Capstone writes entry references with Windows separators (`data\\1.bin`),
 * sometimes doubled. Lookups go through this normalization.
 */
export function normalizeEntryName(name: string): string {
    const posix = path.posix.normalize(name.trim().replace(/\\/g, '/'));
    return posix.replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Read-only view over the zip container of a `.cap` file.
 */
export class CapstoneArchive {
    private readonly entries: Map<string, JSZip.JSZipObject>;
    private readonly foldedEntries: Map<string, JSZip.JSZipObject>;

    private constructor(public readonly source: string, zip: JSZip) {
        this.entries = new Map();
        this.foldedEntries = new Map();
        zip.forEach((relativePath, file) => {
            if (file.dir) return;
            const key = normalizeEntryName(relativePath);
            this.entries.set(key, file);
            const folded = key.toLowerCase();
            if (!this.foldedEntries.has(folded)) this.foldedEntries.set(folded, file);
        });
        if (!this.entries.has(INDEX_ENTRY)) {
            throw new ArchiveError(`${source}: archive has no ${INDEX_ENTRY} index`);
        }
    }

    /**
     * Opens a `.cap` file from disk.
     * @throws ArchiveError if the file cannot be read, is not a zip, or has no index.
     */
    static async open(filePath: string): Promise<CapstoneArchive> {
        let bytes: Uint8Array;
        try {
            bytes = await fs.readFile(filePath);
        } catch (err) {
            throw new ArchiveError(`Unable to read Capstone file ${filePath}: ${describe(err)}`, err);
        }
        return CapstoneArchive.fromBytes(bytes, filePath);
    }

    static async fromBytes(bytes: Uint8Array, source: string = '<memory>'): Promise<CapstoneArchive> {
        let zip: JSZip;
        try {
            zip = await JSZip.loadAsync(bytes);
        } catch (err) {
            throw new ArchiveError(`${source} is not a valid zip archive: ${describe(err)}`, err);
        }
        return new CapstoneArchive(source, zip);
    }

    entryNames(): string[] {
        return [...this.entries.keys()];
    }

    hasEntry(name: string): boolean {
        return this.lookup(name) !== null;
    }

    /**
     * @throws ArchiveError if the index cannot be inflated.
     */
    async readIndex(): Promise<string> {
        const file = this.lookupOrThrow(INDEX_ENTRY);
        try {
            return await file.async('string');
        } catch (err) {
            throw this.corrupt(INDEX_ENTRY, err);
        }
    }

    /**
     * Raw bytes of an inner entry.
     * @throws ArchiveError if the entry is absent or cannot be inflated.
     */
    async readEntry(name: string): Promise<Uint8Array> {
        const file = this.lookupOrThrow(name);
        try {
            return await file.async('uint8array');
        } catch (err) {
            throw this.corrupt(name, err);
        }
    }

    private corrupt(name: string, err: unknown): ArchiveError {
        return new ArchiveError(`${this.source}: entry "${name}" is corrupt: ${describe(err)}`, err);
    }

    private lookup(name: string): JSZip.JSZipObject | null {
        const key = normalizeEntryName(name);
        return this.entries.get(key) ?? this.foldedEntries.get(key.toLowerCase()) ?? null;
    }

    private lookupOrThrow(name: string): JSZip.JSZipObject {
        const file = this.lookup(name);
        if (!file) {
            throw new ArchiveError(`${this.source}: entry "${name}" not found in archive`);
        }
        return file;
    }
}

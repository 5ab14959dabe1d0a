import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { CuneibibDatabase } from '../storage/database.js';
import type { NewPublication } from '../types/index.js';

export interface TempDatabase {
    db: CuneibibDatabase;
    dbPath: string;
    cleanup(): void;
}

/**
 * Open a fresh database in its own temp directory.
 */
export function createTempDatabase(): TempDatabase {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cuneibib-test-'));
    const dbPath = path.join(tmpDir, 'test.db');
    const db = new CuneibibDatabase(dbPath);

    return {
        db,
        dbPath,
        cleanup() {
            db.close();
            fs.rmSync(tmpDir, { recursive: true, force: true });
        },
    };
}

export function publication(overrides: Partial<NewPublication> = {}): NewPublication {
    return {
        title: null,
        year: null,
        doi: null,
        bibtex_key: null,
        short_title: null,
        volume_in_series: null,
        source: 'test',
        ...overrides,
    };
}

import { unlink } from 'node:fs/promises';
import type { MediaPayload } from '../types/queue.js';
import { logThought } from '../utils/logger.js';

export interface CleanupReport {
    removed: string[];
    missing: string[];
    failed: Array<{ path: string; error: string }>;
}

/**
 * Delete the downloaded files of a delivered payload. A failure on one file
 * is logged and does not stop the others.
 */
export async function cleanupPayloadFiles(
    payload: MediaPayload,
    remove: (filePath: string) => Promise<void> = unlink,
): Promise<CleanupReport> {
    const report: CleanupReport = { removed: [], missing: [], failed: [] };

    for (const file of payload.files) {
        try {
            await remove(file.path);
            report.removed.push(file.path);
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
                report.missing.push(file.path);
                continue;
            }
            const message = err instanceof Error ? err.message : String(err);
            report.failed.push({ path: file.path, error: message });
            console.warn(`[MediaCleanup] Could not delete ${file.path}: ${message}`);
            await logThought(`[MediaCleanup] Could not delete ${file.path}: ${message}`);
        }
    }

    if (report.removed.length > 0) {
        await logThought(`[MediaCleanup] Deleted ${report.removed.length} delivered file(s).`);
    }
    return report;
}

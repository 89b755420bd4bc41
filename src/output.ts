import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { OutputError } from "./errors";
import type { SiteFile } from "./renderer";

/**
 * Replace `outDir` with exactly `files`. Anything left from an earlier run
 * is removed first.
 */
export function writeSite(outDir: string, files: SiteFile[]): void {
    try {
        rmSync(outDir, { recursive: true, force: true });
        mkdirSync(outDir, { recursive: true });
        for (const file of files) {
            const path = join(outDir, file.path);
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, file.contents, "utf-8");
        }
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new OutputError(`Failed to write site to ${outDir}: ${reason}`, err);
    }
}

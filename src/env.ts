import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

/**
 * Loads KEY=value lines from `.env` in the given directory into `env`.
 * Variables that are already set win.
 */
export function loadEnv(dir = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
    const envPath = join(dir, ".env");
    if (!existsSync(envPath)) return;

    const content = readFileSync(envPath, "utf-8");
    for (const line of content.split("\n")) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith("#")) continue;

        const eq = trimmed.indexOf("=");
        if (eq === -1) continue;

        const key = trimmed.slice(0, eq).trim();
        const value = trimmed.slice(eq + 1).trim().replace(/^(["'])(.*)\1$/, "$2");
        if (key && !env[key]) {
            env[key] = value;
        }
    }
}

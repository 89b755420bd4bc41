import { existsSync, readFileSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import YAML from "yaml";
import { ConfigError } from "./errors";
import { isRecord, readBoolean, readNumber, readRecord, readString } from "./guards";
import type { AppConfig, TitlePredicate } from "./types";

const DEFAULTS: AppConfig = {
    ed: {
        token: "",
        courseId: "",
        baseUrl: "https://us.edstem.org/api",
        pageSize: 50,
        timeout: 15000,
        fetchDetails: true,
    },
    filter: {
        mode: "substring",
        pattern: "special participation b",
    },
    site: {
        title: "Forum Digest",
        outDir: "out",
        timeZone: "UTC",
        excerptLength: 300,
        embedTimestamp: false,
    },
};

const ROOT_DIR = resolve(__dirname, "..");

function snakeToCamel(obj: unknown): unknown {
    if (Array.isArray(obj)) return obj.map(snakeToCamel);
    if (isRecord(obj)) {
        const result: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(obj)) {
            const camelKey = key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
            result[camelKey] = snakeToCamel(value);
        }
        return result;
    }
    return obj;
}

function parseFilterMode(raw: string): TitlePredicate["mode"] {
    if (raw === "substring" || raw === "prefix") return raw;
    throw new ConfigError(`Invalid filter.mode "${raw}". Use "substring" or "prefix".`);
}

function readTokenFile(path: string): string {
    if (!existsSync(path)) {
        throw new ConfigError(`ed.token_file "${path}" does not exist`);
    }
    return readFileSync(path, "utf-8").trim();
}

export interface LoadConfigOptions {
    /** Defaults to config.yaml at the project root; a missing default file is fine. */
    configPath?: string;
    /** Replaces site.out_dir; relative to the working directory. */
    outDir?: string;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

/**
 * Build the run's configuration from config.yaml and the environment.
 * Throws ConfigError for anything that would make the run pointless.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const configPath = options.configPath ? resolve(options.configPath) : resolve(ROOT_DIR, "config.yaml");

    let raw: Record<string, unknown> = {};
    if (existsSync(configPath)) {
        let parsed: unknown;
        try {
            parsed = YAML.parse(readFileSync(configPath, "utf-8"));
        } catch (err) {
            throw new ConfigError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
        }
        const normalized = snakeToCamel(parsed ?? {});
        if (!isRecord(normalized)) {
            throw new ConfigError(`${configPath} must contain a mapping at the top level`);
        }
        raw = normalized;
    } else if (options.configPath) {
        throw new ConfigError(`Config file ${configPath} not found`);
    }

    const ed = readRecord(raw, "ed");
    const filter = readRecord(raw, "filter");
    const site = readRecord(raw, "site");

    const config: AppConfig = {
        ed: {
            token: readString(ed, "token") ?? DEFAULTS.ed.token,
            courseId: readString(ed, "courseId") ?? DEFAULTS.ed.courseId,
            baseUrl: (readString(ed, "baseUrl") ?? DEFAULTS.ed.baseUrl).replace(/\/+$/, ""),
            pageSize: readNumber(ed, "pageSize") ?? DEFAULTS.ed.pageSize,
            timeout: readNumber(ed, "timeout") ?? DEFAULTS.ed.timeout,
            fetchDetails: readBoolean(ed, "fetchDetails") ?? DEFAULTS.ed.fetchDetails,
        },
        filter: {
            mode: parseFilterMode(readString(filter, "mode") ?? DEFAULTS.filter.mode),
            pattern: readString(filter, "pattern") ?? DEFAULTS.filter.pattern,
        },
        site: {
            title: readString(site, "title") ?? DEFAULTS.site.title,
            outDir: resolve(ROOT_DIR, readString(site, "outDir") ?? DEFAULTS.site.outDir),
            timeZone: readString(site, "timeZone") ?? DEFAULTS.site.timeZone,
            excerptLength: readNumber(site, "excerptLength") ?? DEFAULTS.site.excerptLength,
            embedTimestamp: readBoolean(site, "embedTimestamp") ?? DEFAULTS.site.embedTimestamp,
        },
    };

    // Env fallbacks
    if (!config.ed.token) {
        config.ed.token = env.ED_API_TOKEN || "";
    }
    const tokenFile = readString(ed, "tokenFile");
    if (!config.ed.token && tokenFile) {
        config.ed.token = readTokenFile(resolve(dirname(configPath), tokenFile));
    }
    if (!config.ed.courseId) {
        config.ed.courseId = env.ED_COURSE_ID || "";
    }
    if (options.outDir) {
        config.site.outDir = resolve(cwd, options.outDir);
    }

    validate(config);
    assertDisposableOutDir(config.site.outDir, [ROOT_DIR, cwd]);
    return config;
}

function validate(config: AppConfig): void {
    if (!config.ed.token.trim()) {
        throw new ConfigError("Missing API token. Set ED_API_TOKEN, ed.token or ed.token_file.");
    }
    if (!/^\d+$/.test(config.ed.courseId.trim())) {
        throw new ConfigError(`Invalid course id "${config.ed.courseId}". Set ED_COURSE_ID or ed.course_id.`);
    }
    if (!config.filter.pattern.trim()) {
        throw new ConfigError("filter.pattern must not be empty");
    }
    if (!Number.isInteger(config.ed.pageSize) || config.ed.pageSize <= 0) {
        throw new ConfigError(`ed.page_size must be a positive integer, got ${config.ed.pageSize}`);
    }
    if (config.ed.timeout <= 0) {
        throw new ConfigError(`ed.timeout must be positive, got ${config.ed.timeout}`);
    }
    if (config.site.excerptLength <= 0) {
        throw new ConfigError(`site.excerpt_length must be positive, got ${config.site.excerptLength}`);
    }
    try {
        new Intl.DateTimeFormat("en-US", { timeZone: config.site.timeZone });
    } catch {
        throw new ConfigError(`Unknown site.time_zone "${config.site.timeZone}"`);
    }
}

function containsOrEquals(dir: string, target: string): boolean {
    const rel = relative(dir, target);
    return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * The output directory is wiped on every run, so it must not be, or
 * contain, the project root or the working directory.
 */
export function assertDisposableOutDir(outDir: string, protectedDirs: string[]): void {
    for (const dir of protectedDirs) {
        if (containsOrEquals(outDir, dir)) {
            throw new ConfigError(`site.out_dir "${outDir}" would delete ${dir}; choose a dedicated output directory`);
        }
    }
}

export { ROOT_DIR };

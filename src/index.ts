#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { loadConfig, ROOT_DIR } from "./config";
import { loadEnv } from "./env";
import { exitCodeFor } from "./errors";
import { runPipeline } from "./pipeline";
import { EdClient } from "./sources/ed";

interface BuildOptions {
    config?: string;
    out?: string;
}

async function runBuild(opts: BuildOptions) {
    loadEnv();
    const config = loadConfig({ configPath: opts.config, outDir: opts.out });

    console.log(`📋 build — course ${config.ed.courseId}`);
    console.log(`   Output: ${config.site.outDir}\n`);

    const stylesheet = readFileSync(join(ROOT_DIR, "assets", "style.css"), "utf-8");

    const result = await runPipeline(config, {
        source: new EdClient(config.ed),
        stylesheet,
    });

    if (result.degraded > 0) {
        console.log(`⚠️  ${result.degraded} post(s) rendered without their body`);
    }
    console.log(`\n🎉 Done! Open ${join(result.outDir, "index.html")} in your browser.`);
}

const program = new Command();

program
    .name("ed-forum-site")
    .description("Fetch Ed forum threads matching a title filter and render them as a static site")
    .version("0.1.0")
    .option("-c, --config <path>", "config file (default: config.yaml)")
    .option("-o, --out <dir>", "output directory (overrides site.out_dir)")
    .action(async (opts: BuildOptions) => {
        try {
            await runBuild(opts);
        } catch (err) {
            console.error("❌", err);
            process.exit(exitCodeFor(err));
        }
    });

program.parseAsync().catch((err: unknown) => {
    console.error("❌", err);
    process.exit(1);
});

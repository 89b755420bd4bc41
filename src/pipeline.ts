import { computeStats } from "./analysis";
import { errorMessage, isAuthError } from "./errors";
import { describePredicate, filterThreads, sortNewestFirst } from "./filter";
import { buildPosts } from "./posts";
import { renderSite } from "./renderer";
import { writeSite } from "./output";
import type { ThreadSource } from "./sources/ed";
import type { AppConfig, Thread } from "./types";

export interface PipelineDeps {
    source: ThreadSource;
    stylesheet: string;
    now?: () => Date;
}

export interface PipelineResult {
    fetched: number;
    matched: number;
    degraded: number;
    outDir: string;
}

/** fetch → filter → (details) → sort → parse → render → write. */
export async function runPipeline(config: AppConfig, deps: PipelineDeps): Promise<PipelineResult> {
    const { source } = deps;

    console.log("🔐 Authenticating with Ed API...");
    const name = await source.whoami();
    console.log(`✅ Authenticated as ${name}`);

    console.log(`📚 Fetching threads from course ${config.ed.courseId}...`);
    const threads = await source.fetchThreads();
    console.log(`✅ Found ${threads.length} total threads`);

    console.log(`🔍 ${describePredicate(config.filter)}...`);
    let matched = filterThreads(threads, config.filter);
    console.log(`✅ Found ${matched.length} matching posts`);
    if (matched.length === 0) {
        console.log("⚠️  No posts found matching the criteria, writing an empty site");
    }

    if (config.ed.fetchDetails && matched.length > 0) {
        console.log("📖 Fetching full thread details...");
        matched = await fetchDetails(source, matched);
    }
    matched = sortNewestFirst(matched);

    const posts = buildPosts(matched, { excerptLength: config.site.excerptLength });
    const degraded = posts.filter((p) => p.parseFailed).length;
    if (posts.length > 0) {
        const stats = computeStats(posts);
        console.log(`📊 ${stats.models.length} models, ${stats.homeworks.length} homeworks, ${stats.failureModes.length} failure modes`);
    }

    console.log("🌐 Generating static website...");
    const files = renderSite(posts, {
        title: config.site.title,
        description: describePredicate(config.filter),
        timeZone: config.site.timeZone,
        stylesheet: deps.stylesheet,
        generatedAt: config.site.embedTimestamp ? (deps.now ?? (() => new Date()))() : undefined,
    });
    writeSite(config.site.outDir, files);
    console.log(`✅ Wrote ${files.length} files to ${config.site.outDir}`);

    return { fetched: threads.length, matched: posts.length, degraded, outDir: config.site.outDir };
}

/**
 * Refresh each thread's body, counts and files from its detail endpoint.
 * Title, author and date stay as listed. A failed lookup keeps the list
 * record, except for authentication failures.
 */
async function fetchDetails(source: ThreadSource, threads: Thread[]): Promise<Thread[]> {
    const detailed: Thread[] = [];
    for (const thread of threads) {
        try {
            detailed.push(withDetail(thread, await source.fetchThread(thread.id)));
        } catch (err) {
            if (isAuthError(err)) throw err;
            console.warn(`⚠️  Error fetching thread ${thread.id}: ${errorMessage(err)}`);
            detailed.push(thread);
        }
    }
    return detailed;
}

export function withDetail(listed: Thread, detail: Thread): Thread {
    return {
        ...listed,
        document: detail.document || listed.document,
        comments: detail.comments,
        votes: detail.votes,
        files: detail.files.length > 0 ? detail.files : listed.files,
    };
}

import type { Thread, TitlePredicate } from "./types";

export function matchesTitle(title: string, predicate: TitlePredicate): boolean {
    const t = title.toLowerCase();
    const p = predicate.pattern.toLowerCase();
    return predicate.mode === "prefix" ? t.startsWith(p) : t.includes(p);
}

export function filterThreads(threads: Thread[], predicate: TitlePredicate): Thread[] {
    return threads.filter((t) => matchesTitle(t.title, predicate));
}

/**
 * Newest first. Array.prototype.sort is stable, so equal timestamps keep
 * fetch order; undated threads go last.
 */
export function sortNewestFirst(threads: Thread[]): Thread[] {
    const time = (t: Thread) => {
        const ms = t.createdAt.getTime();
        return Number.isNaN(ms) ? -Infinity : ms;
    };
    return [...threads].sort((a, b) => {
        const ta = time(a);
        const tb = time(b);
        if (ta === tb) return 0;
        return tb > ta ? 1 : -1;
    });
}

export function describePredicate(predicate: TitlePredicate): string {
    const how = predicate.mode === "prefix" ? "starting with" : "containing";
    return `Threads with titles ${how} "${predicate.pattern}" (case-insensitive)`;
}

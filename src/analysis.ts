import heuristics from "./data/heuristics.json";
import type { FailureMode, Outcome, ParsedPost, PostAnalysis } from "./types";

export const UNKNOWN = "Unknown";

export const FAILURE_MODE_LABELS: Record<FailureMode, string> = {
    hallucination: "Hallucination",
    context_loss: "Context Loss",
    wrong_algorithm: "Wrong Algorithm",
    syntax_error: "Syntax Error",
    api_confusion: "API Confusion",
    off_topic: "Off Topic",
    incomplete: "Incomplete",
    overcomplicated: "Overcomplicated",
    wrong_dimensions: "Dimension Errors",
    numerical_error: "Numerical Errors",
};

const FAILURE_MODES: readonly FailureMode[] = [
    "hallucination",
    "context_loss",
    "wrong_algorithm",
    "syntax_error",
    "api_confusion",
    "off_topic",
    "incomplete",
    "overcomplicated",
    "wrong_dimensions",
    "numerical_error",
];

export const OUTCOMES: readonly Outcome[] = ["success", "partial", "failed", "unknown"];

// First match wins, so more specific patterns come first in the table.
const MODEL_PATTERNS = heuristics.models.map(({ pattern, name }) => ({ re: new RegExp(pattern, "i"), name }));
const HOMEWORK_PATTERN = new RegExp(heuristics.homework, "i");

export function extractModel(title: string, body: string): string {
    const text = `${title} ${body}`;
    return MODEL_PATTERNS.find(({ re }) => re.test(text))?.name ?? UNKNOWN;
}

/** "HW3" for "hw 03", "Homework-3" and the like. */
export function extractHomework(title: string, body: string): string {
    const m = HOMEWORK_PATTERN.exec(`${title} ${body}`);
    const num = m ? m[1] ?? m[2] : undefined;
    return num ? `HW${parseInt(num, 10)}` : UNKNOWN;
}

export function extractFailureModes(body: string): FailureMode[] {
    const text = body.toLowerCase();
    return FAILURE_MODES.filter((mode) => heuristics.failureKeywords[mode].some((k) => text.includes(k)));
}

/**
 * Keyword vote over the body. Failures outweighing successes is "failed";
 * any failure alongside a hedge ("eventually", "mostly") is "partial".
 */
export function analyzeOutcome(body: string): Outcome {
    const text = body.toLowerCase();
    const count = (words: string[]) => words.filter((w) => text.includes(w)).length;
    const { success, failure, partial } = heuristics.outcomeIndicators;
    const s = count(success);
    const f = count(failure);
    const p = count(partial);

    if (f > s) return "failed";
    if (p > 0 && f > 0) return "partial";
    if (s > 0) return "success";
    return "unknown";
}

export function analyzePost(title: string, body: string): PostAnalysis {
    return {
        model: extractModel(title, body),
        homework: extractHomework(title, body),
        outcome: analyzeOutcome(body),
        failureModes: extractFailureModes(body),
    };
}

// ── Aggregates ──

export interface GroupStats {
    name: string;
    total: number;
    outcomes: Record<Outcome, number>;
}

export interface FailureModeCount {
    mode: FailureMode;
    label: string;
    count: number;
}

export interface SiteStats {
    outcomes: Record<Outcome, number>;
    models: GroupStats[];      // alphabetical, Unknown last
    homeworks: GroupStats[];   // by number, Unknown last
    failureModes: FailureModeCount[];  // most frequent first
}

function emptyOutcomes(): Record<Outcome, number> {
    return { success: 0, partial: 0, failed: 0, unknown: 0 };
}

function group(posts: ParsedPost[], key: (post: ParsedPost) => string): Map<string, GroupStats> {
    const groups = new Map<string, GroupStats>();
    for (const post of posts) {
        const name = key(post);
        let g = groups.get(name);
        if (!g) {
            g = { name, total: 0, outcomes: emptyOutcomes() };
            groups.set(name, g);
        }
        g.total++;
        g.outcomes[post.analysis.outcome]++;
    }
    return groups;
}

function unknownLast(compare: (a: string, b: string) => number) {
    return (a: GroupStats, b: GroupStats) => {
        if (a.name === UNKNOWN || b.name === UNKNOWN) return Number(a.name === UNKNOWN) - Number(b.name === UNKNOWN);
        return compare(a.name, b.name);
    };
}

function homeworkNumber(name: string): number {
    const m = /(\d+)/.exec(name);
    return m ? parseInt(m[1], 10) : Number.MAX_SAFE_INTEGER;
}

export function computeStats(posts: ParsedPost[]): SiteStats {
    const outcomes = emptyOutcomes();
    const failureCounts = new Map<FailureMode, number>();
    for (const post of posts) {
        outcomes[post.analysis.outcome]++;
        for (const mode of post.analysis.failureModes) {
            failureCounts.set(mode, (failureCounts.get(mode) ?? 0) + 1);
        }
    }

    return {
        outcomes,
        models: [...group(posts, (p) => p.analysis.model).values()]
            .sort(unknownLast((a, b) => (a < b ? -1 : a > b ? 1 : 0))),
        homeworks: [...group(posts, (p) => p.analysis.homework).values()]
            .sort(unknownLast((a, b) => homeworkNumber(a) - homeworkNumber(b))),
        failureModes: FAILURE_MODES
            .filter((mode) => failureCounts.has(mode))
            .map((mode) => ({ mode, label: FAILURE_MODE_LABELS[mode], count: failureCounts.get(mode) ?? 0 }))
            .sort((a, b) => b.count - a.count),
    };
}

/** The `n` largest groups; ties keep their display order. */
export function topGroups(groups: GroupStats[], n: number): GroupStats[] {
    return [...groups].sort((a, b) => b.total - a.total).slice(0, n);
}

import { FAILURE_MODE_LABELS, OUTCOMES, computeStats, topGroups, type GroupStats, type SiteStats } from "./analysis";
import type { Outcome, ParsedPost } from "./types";

export interface SiteMeta {
    title: string;
    description: string;
    timeZone: string;
    stylesheet: string;
    /** Printed in the footer only when set; leave unset for reproducible output. */
    generatedAt?: Date;
}

export interface SiteFile {
    path: string;
    contents: string;
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#x27;");
}

/** "January 05, 2025 at 03:04 PM" in the given time zone. */
export function formatDate(date: Date, timeZone: string): string {
    if (Number.isNaN(date.getTime())) return "Unknown date";
    const parts = new Intl.DateTimeFormat("en-US", {
        timeZone,
        year: "numeric",
        month: "long",
        day: "2-digit",
        hour: "2-digit",
        minute: "2-digit",
        hour12: true,
    }).formatToParts(date);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
    return `${part("month")} ${part("day")}, ${part("year")} at ${part("hour")}:${part("minute")} ${part("dayPeriod").toUpperCase()}`;
}

function postPath(post: ParsedPost): string {
    return `posts/${encodeURIComponent(post.thread.id)}.html`;
}

function plural(n: number, word: string): string {
    return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function page(title: string, cssHref: string, body: string[]): string {
    return [
        "<!DOCTYPE html>",
        '<html lang="en">',
        "<head>",
        '    <meta charset="UTF-8">',
        '    <meta name="viewport" content="width=device-width, initial-scale=1.0">',
        `    <title>${escapeHtml(title)}</title>`,
        `    <link rel="stylesheet" href="${cssHref}">`,
        "</head>",
        "<body>",
        ...body,
        "</body>",
        "</html>",
        "",
    ].join("\n");
}

function meta(post: ParsedPost, timeZone: string): string {
    const { thread } = post;
    return `<p class="meta">${escapeHtml(thread.author)} · ${escapeHtml(formatDate(thread.createdAt, timeZone))} · ${plural(thread.comments, "comment")} · ${plural(thread.votes, "vote")}</p>`;
}

const OUTCOME_LABELS: Record<Outcome, string> = {
    success: "Success",
    partial: "Partial",
    failed: "Failed",
    unknown: "Unknown",
};

function tags(post: ParsedPost): string {
    const { model, homework, outcome } = post.analysis;
    return [
        '<p class="tags">',
        `<span class="tag tag-model">${escapeHtml(model)}</span>`,
        `<span class="tag tag-hw">${escapeHtml(homework)}</span>`,
        `<span class="tag outcome-${outcome}">${OUTCOME_LABELS[outcome]}</span>`,
        "</p>",
    ].join("");
}

function statCard(title: string, items: [string, number, string?][]): string[] {
    const lines = ['        <div class="stat-card">', `            <h3>${title}</h3>`, '            <ul class="stat-grid">'];
    for (const [label, value, cls] of items) {
        lines.push(`                <li><span class="stat-value${cls ? ` ${cls}` : ""}">${value}</span> ${escapeHtml(label)}</li>`);
    }
    lines.push("            </ul>", "        </div>");
    return lines;
}

const TOP_GROUPS = 4;
const TOP_FAILURE_MODES = 8;

function dashboard(stats: SiteStats): string[] {
    const top = (groups: GroupStats[]) => topGroups(groups, TOP_GROUPS).map((g): [string, number] => [g.name, g.total]);
    const lines = [
        '    <section class="dashboard">',
        ...statCard("Outcomes", OUTCOMES.map((o): [string, number, string] => [OUTCOME_LABELS[o], stats.outcomes[o], `outcome-${o}`])),
        ...statCard("Top models", top(stats.models)),
        ...statCard("Top homeworks", top(stats.homeworks)),
        "    </section>",
        '    <section class="failure-modes">',
        "        <h3>Common failure modes</h3>",
    ];
    const shown = stats.failureModes.slice(0, TOP_FAILURE_MODES);
    if (shown.length === 0) {
        lines.push('        <p class="empty">No specific failure modes detected.</p>');
    }
    const max = Math.max(1, ...shown.map((f) => f.count));
    for (const f of shown) {
        lines.push(`        <div class="failure-bar"><span class="failure-label">${f.label}</span><span class="failure-track"><span class="failure-fill" style="width: ${Math.round((f.count * 100) / max)}%">${f.count}</span></span></div>`);
    }
    lines.push("    </section>");
    return lines;
}

function select(id: string, allLabel: string, options: [string, string][]): string {
    const opts = options.map(([value, label]) => `<option value="${escapeHtml(value)}">${escapeHtml(label)}</option>`);
    return `        <select id="${id}"><option value="">${allLabel}</option>${opts.join("")}</select>`;
}

function filters(stats: SiteStats): string[] {
    const grouped = (groups: GroupStats[]) => groups.map((g): [string, string] => [g.name, `${g.name} (${g.total})`]);
    return [
        '    <form class="filters">',
        '        <input type="search" id="searchInput" placeholder="Search posts...">',
        select("modelFilter", "All models", grouped(stats.models)),
        select("hwFilter", "All homeworks", grouped(stats.homeworks)),
        select("outcomeFilter", "All outcomes", OUTCOMES.map((o): [string, string] => [o, OUTCOME_LABELS[o]])),
        "    </form>",
    ];
}

// Hides cards that fail any control and keeps the count in step.
const FILTER_SCRIPT = [
    "    <script>",
    "    (function () {",
    '        var cards = Array.prototype.slice.call(document.querySelectorAll(".post-card"));',
    '        var search = document.getElementById("searchInput");',
    '        var model = document.getElementById("modelFilter");',
    '        var hw = document.getElementById("hwFilter");',
    '        var outcome = document.getElementById("outcomeFilter");',
    '        var count = document.getElementById("resultsCount");',
    "        function apply() {",
    "            var q = search.value.trim().toLowerCase();",
    "            var shown = 0;",
    "            cards.forEach(function (card) {",
    "                var ok = (!model.value || card.dataset.model === model.value)",
    "                    && (!hw.value || card.dataset.homework === hw.value)",
    "                    && (!outcome.value || card.dataset.outcome === outcome.value)",
    "                    && (!q || card.textContent.toLowerCase().indexOf(q) !== -1);",
    "                card.hidden = !ok;",
    "                if (ok) shown++;",
    "            });",
    '            count.textContent = shown + (shown === 1 ? " post" : " posts");',
    "        }",
    '        [search, model, hw, outcome].forEach(function (el) { el.addEventListener("input", apply); });',
    "    })();",
    "    </script>",
];

function footer(data: SiteMeta): string[] {
    if (!data.generatedAt) return [];
    return [`    <footer>Generated ${escapeHtml(data.generatedAt.toISOString())}</footer>`];
}

export function renderIndex(posts: ParsedPost[], data: SiteMeta): string {
    const lines: string[] = [];

    lines.push("    <header>");
    lines.push(`        <h1>${escapeHtml(data.title)}</h1>`);
    lines.push(`        <p class="subtitle">${escapeHtml(data.description)}</p>`);
    lines.push(`        <p class="count" id="resultsCount">${plural(posts.length, "post")}</p>`);
    lines.push("    </header>");

    if (posts.length > 0) {
        const stats = computeStats(posts);
        lines.push(...dashboard(stats), ...filters(stats));
    }

    lines.push("    <main>");
    if (posts.length === 0) {
        lines.push('        <p class="empty">No posts matched.</p>');
    }
    for (const post of posts) {
        const { model, homework, outcome } = post.analysis;
        lines.push(`        <article class="post-card" data-model="${escapeHtml(model)}" data-homework="${escapeHtml(homework)}" data-outcome="${outcome}">`);
        lines.push(`            <h2><a href="${postPath(post)}">${escapeHtml(post.thread.title)}</a></h2>`);
        lines.push(`            ${meta(post, data.timeZone)}`);
        lines.push(`            ${tags(post)}`);
        lines.push(`            <p class="excerpt">${escapeHtml(post.excerpt)}</p>`);
        lines.push("        </article>");
    }
    lines.push("    </main>");
    lines.push(...footer(data));
    if (posts.length > 0) lines.push(...FILTER_SCRIPT);

    return page(data.title, "style.css", lines);
}

export function renderPost(post: ParsedPost, data: SiteMeta): string {
    const { thread } = post;
    const lines: string[] = [];

    lines.push('    <nav><a href="../index.html">← All posts</a></nav>');
    lines.push("    <article>");
    lines.push(`        <h1>${escapeHtml(thread.title)}</h1>`);
    lines.push(`        ${meta(post, data.timeZone)}`);
    lines.push(`        ${tags(post)}`);
    if (post.analysis.failureModes.length > 0) {
        const labels = post.analysis.failureModes.map((m) => FAILURE_MODE_LABELS[m]);
        lines.push(`        <p class="failure-list">Failure modes: ${labels.join(", ")}</p>`);
    }
    lines.push(`        <div class="post-body${post.parseFailed ? " unavailable" : ""}">${escapeHtml(post.body)}</div>`);
    if (post.attachments.length > 0) {
        lines.push('        <ul class="attachments">');
        for (const a of post.attachments) {
            const origin = a.fromComment ? ' <span class="from-comment">(comment)</span>' : "";
            lines.push(`            <li><a href="${escapeHtml(a.url)}">${escapeHtml(a.name)}</a>${origin}</li>`);
        }
        lines.push("        </ul>");
    }
    lines.push(`        <p class="source"><a href="${escapeHtml(thread.url)}">View on Ed</a></p>`);
    lines.push("    </article>");
    lines.push(...footer(data));

    return page(`${thread.title} | ${data.title}`, "../style.css", lines);
}

export function renderJson(posts: ParsedPost[]): string {
    const payload = posts.map(({ thread, body, attachments, parseFailed, analysis }) => ({
        id: thread.id,
        title: thread.title,
        author: thread.author,
        createdAt: Number.isNaN(thread.createdAt.getTime()) ? null : thread.createdAt.toISOString(),
        comments: thread.comments,
        votes: thread.votes,
        category: thread.category,
        url: thread.url,
        model: analysis.model,
        homework: analysis.homework,
        outcome: analysis.outcome,
        failureModes: analysis.failureModes,
        body,
        attachments,
        parseFailed,
    }));
    return JSON.stringify(payload, null, 2) + "\n";
}

/** Every file of the site, in a fixed order. */
export function renderSite(posts: ParsedPost[], data: SiteMeta): SiteFile[] {
    return [
        { path: "index.html", contents: renderIndex(posts, data) },
        { path: "style.css", contents: data.stylesheet },
        { path: "posts.json", contents: renderJson(posts) },
        ...posts.map((post) => ({ path: postPath(post), contents: renderPost(post, data) })),
    ];
}

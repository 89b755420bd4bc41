import { ApiError, AuthError, NetworkError } from "../errors";
import { isRecord, readBoolean, readNumber, readRecord, readString } from "../guards";
import type { Attachment, EdConfig, Thread } from "../types";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Where the pipeline gets its threads from. */
export interface ThreadSource {
    whoami(): Promise<string>;
    fetchThreads(): Promise<Thread[]>;
    fetchThread(id: string): Promise<Thread>;
}

const USER_AGENT = "ed-forum-site/0.1";

/**
 * Ed discussion API client. Lists are paged with limit/offset; user names
 * arrive in a `users` array next to the threads.
 */
export class EdClient implements ThreadSource {
    private fetchImpl: FetchLike;

    constructor(private config: EdConfig, fetchImpl?: FetchLike) {
        this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
    }

    async whoami(): Promise<string> {
        const data = await this.get("user");
        const user = readRecord(data, "user");
        return readString(user, "name") ?? "User";
    }

    async fetchThreads(): Promise<Thread[]> {
        const { courseId, pageSize } = this.config;
        const all: Thread[] = [];
        const seen = new Set<string>();

        for (let page = 0; ; page++) {
            const offset = page * pageSize;
            const data = await this.get(`courses/${courseId}/threads?limit=${pageSize}&offset=${offset}`);
            const raw = data.threads;
            if (!Array.isArray(raw)) {
                throw new ApiError(`Unexpected thread list response for course ${courseId}`);
            }
            if (raw.length === 0) break;

            const users = userNames(data.users);
            let added = 0;
            for (const t of raw) {
                if (!isRecord(t)) continue;
                const thread = normalize(t, users, courseId);
                if (!thread || seen.has(thread.id)) continue;
                seen.add(thread.id);
                all.push(thread);
                added++;
            }
            console.log(`   Fetched page ${page + 1}: ${added} threads (total so far: ${all.length})`);

            if (raw.length < pageSize) break;
        }

        return all;
    }

    async fetchThread(id: string): Promise<Thread> {
        const data = await this.get(`threads/${id}`);
        const raw = data.thread;
        const thread = isRecord(raw) ? normalize(raw, userNames(data.users), this.config.courseId) : null;
        if (!thread) {
            throw new ApiError(`Unexpected response for thread ${id}`);
        }
        return thread;
    }

    private async get(path: string): Promise<Record<string, unknown>> {
        const url = `${this.config.baseUrl}/${path}`;
        let resp: Response;
        try {
            resp = await this.fetchImpl(url, {
                headers: {
                    Authorization: `Bearer ${this.config.token}`,
                    "User-Agent": USER_AGENT,
                },
                signal: AbortSignal.timeout(this.config.timeout),
            });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new NetworkError(`Request to ${url} failed: ${reason}`, err);
        }

        if (resp.status === 401 || resp.status === 403) {
            throw new AuthError(`Ed API rejected the token: ${resp.status} ${resp.statusText}`, resp.status);
        }
        if (!resp.ok) {
            throw new ApiError(`Ed API error: ${resp.status} ${resp.statusText}`, resp.status);
        }

        let body: unknown;
        try {
            body = await resp.json();
        } catch {
            throw new ApiError(`Ed API returned invalid JSON for ${path}`, resp.status);
        }
        if (!isRecord(body)) {
            throw new ApiError(`Ed API returned an unexpected body for ${path}`, resp.status);
        }
        return body;
    }
}

function userNames(raw: unknown): Map<number, string> {
    const names = new Map<number, string>();
    if (!Array.isArray(raw)) return names;
    for (const u of raw) {
        if (!isRecord(u)) continue;
        const id = readNumber(u, "id");
        const name = readString(u, "name");
        if (id !== undefined && name) names.set(id, name);
    }
    return names;
}

function normalize(t: Record<string, unknown>, users: Map<number, string>, courseId: string): Thread | null {
    const id = readString(t, "id");
    if (!id) return null;

    let author = readString(readRecord(t, "user"), "name");
    if (!author) {
        const userId = readNumber(t, "user_id");
        author = userId !== undefined ? users.get(userId) : undefined;
    }
    if (readBoolean(t, "is_anonymous")) author = "Anonymous";

    return {
        id,
        title: readString(t, "title") ?? "Untitled",
        author: author ?? "Unknown",
        createdAt: new Date(readString(t, "created_at") ?? ""),
        document: readString(t, "content") || readString(t, "document") || "",
        comments: Math.max(0, Math.trunc(readNumber(t, "comment_count") || readNumber(t, "num_comments") || readNumber(t, "reply_count") || 0)),
        votes: Math.trunc(readNumber(t, "vote_count") || readNumber(t, "upvotes") || readNumber(t, "votes") || 0) || 0,
        category: readString(t, "category") ?? "",
        url: `https://edstem.org/us/courses/${courseId}/discussion/${id}`,
        files: [...readFiles(t.files, false), ...commentFiles(t.comments)],
    };
}

function readFiles(raw: unknown, fromComment: boolean): Attachment[] {
    if (!Array.isArray(raw)) return [];
    const files: Attachment[] = [];
    for (const f of raw) {
        if (!isRecord(f)) continue;
        const url = readString(f, "url");
        if (!url) continue;
        files.push({
            name: readString(f, "name") || "attachment",
            url,
            type: readString(f, "type") ?? "",
            size: readNumber(f, "size") ?? 0,
            fromComment,
        });
    }
    return files;
}

/** Uploads on comments and their replies, only present on thread details. */
function commentFiles(raw: unknown): Attachment[] {
    if (!Array.isArray(raw)) return [];
    const files: Attachment[] = [];
    for (const c of raw) {
        if (!isRecord(c)) continue;
        files.push(...readFiles(c.files, true), ...commentFiles(c.comments));
    }
    return files;
}

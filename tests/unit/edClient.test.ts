/**
 * Unit tests for the Ed API client
 */

import { ApiError, AuthError, NetworkError } from "../../src/errors";
import { EdClient } from "../../src/sources/ed";
import type { EdConfig } from "../../src/types";
import { muteConsole } from "../fixtures";

const config: EdConfig = {
    token: "test-token",
    courseId: "123",
    baseUrl: "https://ed.test/api",
    pageSize: 2,
    timeout: 1000,
    fetchDetails: false,
};

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function rawThread(id: number, extra: Record<string, unknown> = {}) {
    return { id, title: `Thread ${id}`, created_at: "2025-01-05T11:30:00Z", ...extra };
}

describe("EdClient", () => {
    muteConsole();

    let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit?]>;

    beforeEach(() => {
        fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
    });

    describe("fetchThreads", () => {
        it("should page until an empty page and drop duplicates", async () => {
            fetchMock
                .mockResolvedValueOnce(json({ threads: [rawThread(1), rawThread(2)], users: [] }))
                .mockResolvedValueOnce(json({ threads: [rawThread(2), rawThread(3)], users: [] }))
                .mockResolvedValueOnce(json({ threads: [], users: [] }));

            const threads = await new EdClient(config, fetchMock).fetchThreads();

            expect(threads.map((t) => t.id)).toEqual(["1", "2", "3"]);
            expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
                "https://ed.test/api/courses/123/threads?limit=2&offset=0",
                "https://ed.test/api/courses/123/threads?limit=2&offset=2",
                "https://ed.test/api/courses/123/threads?limit=2&offset=4",
            ]);
        });

        it("should stop after a short page", async () => {
            fetchMock.mockResolvedValueOnce(json({ threads: [rawThread(1)], users: [] }));
            const threads = await new EdClient(config, fetchMock).fetchThreads();
            expect(threads).toHaveLength(1);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        it("should send the bearer token", async () => {
            fetchMock.mockResolvedValueOnce(json({ threads: [] }));
            await new EdClient(config, fetchMock).fetchThreads();
            expect(fetchMock.mock.calls[0][1]).toMatchObject({
                headers: { Authorization: "Bearer test-token" },
            });
        });

        it("should map thread fields", async () => {
            fetchMock.mockResolvedValueOnce(json({
                threads: [rawThread(1, {
                    user_id: 7,
                    content: '<document version="2.0"><paragraph>Hi</paragraph></document>',
                    document: "Hi",
                    comment_count: 4,
                    vote_count: 2,
                    category: "Homework",
                })],
                users: [{ id: 7, name: "Ada" }],
            }));

            const [thread] = await new EdClient(config, fetchMock).fetchThreads();

            expect(thread).toEqual({
                id: "1",
                title: "Thread 1",
                author: "Ada",
                createdAt: new Date("2025-01-05T11:30:00Z"),
                document: '<document version="2.0"><paragraph>Hi</paragraph></document>',
                comments: 4,
                votes: 2,
                category: "Homework",
                url: "https://edstem.org/us/courses/123/discussion/1",
                files: [],
            });
        });

        it("should truncate counts and keep comments non-negative", async () => {
            fetchMock.mockResolvedValueOnce(json({
                threads: [rawThread(1, { comment_count: -3, vote_count: 2.7 })],
            }));
            const [thread] = await new EdClient(config, fetchMock).fetchThreads();
            expect(thread.comments).toBe(0);
            expect(thread.votes).toBe(2);
        });

        it("should resolve anonymous and unknown authors", async () => {
            fetchMock
                .mockResolvedValueOnce(json({
                    threads: [rawThread(1, { user_id: 7, is_anonymous: true }), rawThread(2, { user_id: 99 })],
                    users: [{ id: 7, name: "Ada" }],
                }))
                .mockResolvedValueOnce(json({ threads: [], users: [] }));
            const threads = await new EdClient(config, fetchMock).fetchThreads();
            expect(threads.map((t) => t.author)).toEqual(["Anonymous", "Unknown"]);
        });

        it("should raise AuthError on 401", async () => {
            fetchMock.mockImplementation(async () => json({ message: "bad token" }, 401));
            const client = new EdClient(config, fetchMock);
            await expect(client.fetchThreads()).rejects.toBeInstanceOf(AuthError);
            await expect(client.fetchThreads()).rejects.toMatchObject({ status: 401 });
        });

        it("should raise NetworkError when fetch rejects", async () => {
            fetchMock.mockRejectedValue(new TypeError("fetch failed"));
            await expect(new EdClient(config, fetchMock).fetchThreads()).rejects.toBeInstanceOf(NetworkError);
        });

        it("should raise ApiError on other failures", async () => {
            fetchMock.mockImplementation(async () => json({}, 500));
            await expect(new EdClient(config, fetchMock).fetchThreads()).rejects.toMatchObject({ name: "ApiError", status: 500 });
        });

        it("should raise ApiError on a malformed body", async () => {
            fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
            await expect(new EdClient(config, fetchMock).fetchThreads()).rejects.toBeInstanceOf(ApiError);

            fetchMock.mockResolvedValueOnce(json({ items: [] }));
            await expect(new EdClient(config, fetchMock).fetchThreads()).rejects.toBeInstanceOf(ApiError);
        });
    });

    describe("whoami", () => {
        it("should return the user's name", async () => {
            fetchMock.mockResolvedValueOnce(json({ user: { name: "Ada" } }));
            await expect(new EdClient(config, fetchMock).whoami()).resolves.toBe("Ada");
            expect(fetchMock.mock.calls[0][0]).toBe("https://ed.test/api/user");
        });
    });

    describe("fetchThread", () => {
        it("should load one thread with its author", async () => {
            fetchMock.mockResolvedValueOnce(json({ thread: rawThread(9, { user: { name: "Bo" } }), users: [] }));
            const thread = await new EdClient(config, fetchMock).fetchThread("9");
            expect(fetchMock.mock.calls[0][0]).toBe("https://ed.test/api/threads/9");
            expect(thread.author).toBe("Bo");
            expect(thread.title).toBe("Thread 9");
        });

        it("should collect thread and comment files", async () => {
            fetchMock.mockResolvedValueOnce(json({
                thread: rawThread(9, {
                    files: [{ id: 1, name: "prompt.txt", url: "https://static.example.com/p.txt", type: "text/plain", size: 120 }],
                    comments: [{
                        files: [{ name: "log.pdf", url: "https://static.example.com/l.pdf" }],
                        comments: [{ files: [{ name: "no-url.png" }, { url: "https://static.example.com/r.png" }] }],
                    }],
                }),
                users: [],
            }));

            const thread = await new EdClient(config, fetchMock).fetchThread("9");

            expect(thread.files).toEqual([
                { name: "prompt.txt", url: "https://static.example.com/p.txt", type: "text/plain", size: 120, fromComment: false },
                { name: "log.pdf", url: "https://static.example.com/l.pdf", type: "", size: 0, fromComment: true },
                { name: "attachment", url: "https://static.example.com/r.png", type: "", size: 0, fromComment: true },
            ]);
        });

        it("should raise ApiError when the thread is missing", async () => {
            fetchMock.mockResolvedValueOnce(json({ users: [] }));
            await expect(new EdClient(config, fetchMock).fetchThread("9")).rejects.toBeInstanceOf(ApiError);
        });
    });
});

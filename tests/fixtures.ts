import type { AppConfig, Thread } from "../src/types";

export function makeThread(overrides: Partial<Thread> & { id: string }): Thread {
    return {
        title: "Untitled",
        author: "Ada",
        createdAt: new Date("2025-01-01T00:00:00Z"),
        document: '<document version="2.0"><paragraph>Body</paragraph></document>',
        comments: 0,
        votes: 0,
        category: "General",
        url: `https://edstem.org/us/courses/1/discussion/${overrides.id}`,
        files: [],
        ...overrides,
    };
}

export function makeConfig(outDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        ed: {
            token: "test-token",
            courseId: "1",
            baseUrl: "https://ed.test/api",
            pageSize: 50,
            timeout: 1000,
            fetchDetails: false,
        },
        filter: { mode: "substring", pattern: "special participation b" },
        site: {
            title: "Test Site",
            outDir,
            timeZone: "UTC",
            excerptLength: 300,
            embedTimestamp: false,
        },
        ...overrides,
    };
}

/** Silence the console progress lines for the duration of a test file. */
export function muteConsole(): void {
    beforeEach(() => {
        jest.spyOn(console, "log").mockImplementation(() => undefined);
        jest.spyOn(console, "warn").mockImplementation(() => undefined);
        jest.spyOn(console, "error").mockImplementation(() => undefined);
    });
    afterEach(() => {
        jest.restoreAllMocks();
    });
}

// ── Thread ──

export interface Thread {
    id: string;
    title: string;
    author: string;
    createdAt: Date;
    document: string;     // raw XML body (Ed "content"), plain text as fallback
    comments: number;
    votes: number;
    category: string;
    url: string;          // thread page on Ed
    files: Attachment[];  // thread and comment uploads
}

export interface Attachment {
    name: string;
    url: string;
    type: string;
    size: number;
    fromComment: boolean;
}

// ── Analysis ──

export type Outcome = "success" | "partial" | "failed" | "unknown";

export type FailureMode =
    | "hallucination"
    | "context_loss"
    | "wrong_algorithm"
    | "syntax_error"
    | "api_confusion"
    | "off_topic"
    | "incomplete"
    | "overcomplicated"
    | "wrong_dimensions"
    | "numerical_error";

export interface PostAnalysis {
    model: string;        // "Unknown" when nothing matched
    homework: string;     // "HW3", or "Unknown"
    outcome: Outcome;
    failureModes: FailureMode[];
}

export interface ParsedPost {
    thread: Thread;
    body: string;
    attachments: Attachment[];
    excerpt: string;
    parseFailed: boolean;
    analysis: PostAnalysis;
}

export interface TitlePredicate {
    mode: "substring" | "prefix";
    pattern: string;
}

// ── Config ──

export interface EdConfig {
    token: string;
    courseId: string;
    baseUrl: string;
    pageSize: number;
    timeout: number;
    fetchDetails: boolean;
}

export interface SiteConfig {
    title: string;
    outDir: string;
    timeZone: string;
    excerptLength: number;
    embedTimestamp: boolean;
}

export interface AppConfig {
    ed: EdConfig;
    filter: TitlePredicate;
    site: SiteConfig;
}

import { analyzePost } from "./analysis";
import { collectAttachments, parseDocument, renderText, type DocumentNode } from "./document";
import { errorMessage } from "./errors";
import { generateSnippet } from "./snippet";
import type { Attachment, ParsedPost, Thread } from "./types";

export const UNAVAILABLE_BODY = "(content unavailable)";

export interface BuildPostsOptions {
    excerptLength: number;
    /** Swappable for tests; defaults to the Ed document parser. */
    parse?: (xml: string) => DocumentNode[];
}

/** Thread and comment uploads first, then files linked in the body; one entry per URL. */
export function mergeAttachments(...lists: Attachment[][]): Attachment[] {
    const seen = new Set<string>();
    const merged: Attachment[] = [];
    for (const a of lists.flat()) {
        if (seen.has(a.url)) continue;
        seen.add(a.url);
        merged.push(a);
    }
    return merged;
}

/**
 * Turn threads into posts. A body that fails to parse degrades to a
 * placeholder for that post only.
 */
export function buildPosts(threads: Thread[], options: BuildPostsOptions): ParsedPost[] {
    const parse = options.parse ?? parseDocument;

    return threads.map((thread) => {
        try {
            const nodes = parse(thread.document);
            const body = renderText(nodes);
            return {
                thread,
                body,
                attachments: mergeAttachments(thread.files, collectAttachments(nodes)),
                excerpt: generateSnippet(body, options.excerptLength),
                parseFailed: false,
                analysis: analyzePost(thread.title, body),
            };
        } catch (err) {
            console.warn(`   ⚠️ Could not parse thread ${thread.id} ("${thread.title}"): ${errorMessage(err)}`);
            return {
                thread,
                body: UNAVAILABLE_BODY,
                attachments: mergeAttachments(thread.files),
                excerpt: UNAVAILABLE_BODY,
                parseFailed: true,
                analysis: analyzePost(thread.title, ""),
            };
        }
    });
}

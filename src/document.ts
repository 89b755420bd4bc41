import * as cheerio from "cheerio";
import { isCDATA, isTag, isText, type AnyNode, type Element } from "domhandler";
import type { Attachment } from "./types";

// ── Node tree ──

export type InlineTag = "bold" | "italic" | "underline" | "strike" | "code" | "math" | "spoiler";

export type DocumentNode =
    | { kind: "text"; text: string }
    | { kind: "paragraph"; children: DocumentNode[] }
    | { kind: "heading"; level: number; children: DocumentNode[] }
    | { kind: "list"; ordered: boolean; items: DocumentNode[][] }
    | { kind: "code"; language: string; code: string }
    | { kind: "inline"; tag: InlineTag; children: DocumentNode[] }
    | { kind: "link"; href: string; children: DocumentNode[] }
    | { kind: "file"; name: string; url: string }
    | { kind: "image"; src: string }
    | { kind: "break" }
    | { kind: "unknown"; tag: string }
    | { kind: "truncated" };

export const MAX_DEPTH = 1000;
export const TRUNCATION_MARKER = "[…]";

const INLINE_TAGS: ReadonlySet<string> = new Set<InlineTag>([
    "bold", "italic", "underline", "strike", "code", "math", "spoiler",
]);

function isInlineTag(name: string): name is InlineTag {
    return INLINE_TAGS.has(name);
}

// ── Parsing ──

const DOCUMENT_ROOT = /^\s*<document[\s>/]/i;

/**
 * Parse an Ed document body (`<document version="2.0">…</document>`) into
 * a node tree. Anything else is a plain-text body and becomes one text node.
 */
export function parseDocument(xml: string): DocumentNode[] {
    if (!xml.trim()) return [];
    if (!DOCUMENT_ROOT.test(xml)) return [{ kind: "text", text: xml }];
    const $ = cheerio.load(xml, { xml: true });
    return convertAll($.root().contents().toArray(), 0);
}

function convertAll(nodes: AnyNode[], depth: number): DocumentNode[] {
    const out: DocumentNode[] = [];
    for (const node of nodes) {
        out.push(...convert(node, depth));
    }
    return out;
}

function convert(node: AnyNode, depth: number): DocumentNode[] {
    if (depth > MAX_DEPTH) return [{ kind: "truncated" }];

    if (isText(node)) return node.data ? [{ kind: "text", text: node.data }] : [];
    if (isCDATA(node)) return [{ kind: "text", text: textOf(node.children) }];
    if (!isTag(node)) return []; // comments, processing instructions

    const name = node.name.toLowerCase();
    const children = () => convertAll(node.children, depth + 1);

    switch (name) {
        case "document":
            return children();
        case "paragraph":
        case "callout":
            return [{ kind: "paragraph", children: children() }];
        case "heading":
            return [{ kind: "heading", level: Number(node.attribs.level) || 1, children: children() }];
        case "list":
            return [{
                kind: "list",
                ordered: node.attribs.style === "number",
                items: node.children
                    .filter((c): c is Element => isTag(c) && c.name.toLowerCase() === "list-item")
                    .map((item) => convertAll(item.children, depth + 2)),
            }];
        case "snippet":
        case "pre":
            return [{ kind: "code", language: node.attribs.language ?? "", code: textOf(node.children) }];
        case "link":
            return [{ kind: "link", href: node.attribs.href ?? "", children: children() }];
        case "file":
            return [{ kind: "file", name: node.attribs.filename ?? node.attribs.name ?? "attachment", url: node.attribs.url ?? "" }];
        case "image":
            return [{ kind: "image", src: node.attribs.src ?? "" }];
        case "break":
            return [{ kind: "break" }];
        default:
            if (isInlineTag(name)) return [{ kind: "inline", tag: name, children: children() }];
            return [{ kind: "unknown", tag: name }];
    }
}

function textOf(nodes: AnyNode[]): string {
    let out = "";
    for (const n of nodes) {
        if (isText(n)) out += n.data;
        else if (isTag(n) || isCDATA(n)) out += textOf(n.children);
    }
    return out;
}

// ── Rendering ──

/** Flatten a node tree into readable plain text. Pure. */
export function renderText(nodes: DocumentNode[]): string {
    return renderNodes(nodes)
        .replace(/[ \t]+\n/g, "\n")
        .replace(/\n{3,}/g, "\n\n")
        .trim();
}

function renderNodes(nodes: DocumentNode[]): string {
    return nodes.map(renderNode).join("");
}

function renderNode(node: DocumentNode): string {
    switch (node.kind) {
        case "text":
            return node.text;
        case "paragraph":
        case "heading":
            return `${renderNodes(node.children).trim()}\n\n`;
        case "list":
            return `${node.items.map((item, i) => listItem(item, node.ordered ? `${i + 1}. ` : "- ")).join("\n")}\n\n`;
        case "code":
            return `${node.code.replace(/^\n+|\s+$/g, "")}\n\n`;
        case "inline":
            return renderNodes(node.children);
        case "link": {
            const label = renderNodes(node.children);
            return label.trim() ? label : node.href;
        }
        case "break":
            return "\n";
        case "image":
            return "[image]";
        case "truncated":
            return TRUNCATION_MARKER;
        case "file":
        case "unknown":
            return "";
    }
}

function listItem(children: DocumentNode[], bullet: string): string {
    const text = renderNodes(children).replace(/\n{2,}/g, "\n").trim();
    const indent = " ".repeat(bullet.length);
    return bullet + text.split("\n").join(`\n${indent}`);
}

// ── Attachments ──

export function collectAttachments(nodes: DocumentNode[]): Attachment[] {
    const found: Attachment[] = [];
    const walk = (list: DocumentNode[]) => {
        for (const node of list) {
            switch (node.kind) {
                case "file":
                    if (node.url) found.push({ name: node.name, url: node.url, type: "", size: 0, fromComment: false });
                    break;
                case "paragraph":
                case "heading":
                case "inline":
                case "link":
                    walk(node.children);
                    break;
                case "list":
                    node.items.forEach(walk);
                    break;
                default:
                    break;
            }
        }
    };
    walk(nodes);
    return found;
}

/** parseDocument + renderText. */
export function renderDocument(xml: string): string {
    return renderText(parseDocument(xml));
}

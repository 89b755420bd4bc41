/**
 * Unit tests for the Ed document parser
 */

import {
    MAX_DEPTH,
    TRUNCATION_MARKER,
    collectAttachments,
    parseDocument,
    renderDocument,
    renderText,
} from "../../src/document";

const doc = (inner: string) => `<document version="2.0">${inner}</document>`;

describe("parseDocument", () => {
    it("should build a paragraph with a text run", () => {
        expect(parseDocument(doc("<paragraph>Hello</paragraph>"))).toEqual([
            { kind: "paragraph", children: [{ kind: "text", text: "Hello" }] },
        ]);
    });

    it("should read heading levels and snippet languages", () => {
        expect(parseDocument(doc('<heading level="2">Title</heading><snippet language="py">print(1)</snippet>'))).toEqual([
            { kind: "heading", level: 2, children: [{ kind: "text", text: "Title" }] },
            { kind: "code", language: "py", code: "print(1)" },
        ]);
    });

    it("should map unrecognised elements to unknown nodes", () => {
        expect(parseDocument(doc('<widget foo="1">ignored</widget>'))).toEqual([{ kind: "unknown", tag: "widget" }]);
    });

    it("should return no nodes for an empty body", () => {
        expect(parseDocument("")).toEqual([]);
        expect(parseDocument("   ")).toEqual([]);
    });
});

describe("renderDocument", () => {
    it("should render a single paragraph to exactly its text", () => {
        expect(renderDocument(doc("<paragraph>Hello</paragraph>"))).toBe("Hello");
    });

    it("should skip unknown nodes and keep valid paragraphs", () => {
        const xml = doc('<widget foo="1">ignored</widget><paragraph>Kept</paragraph>');
        expect(renderDocument(xml)).toBe("Kept");
    });

    it("should separate paragraphs with a blank line", () => {
        expect(renderDocument(doc("<paragraph>One</paragraph><paragraph>Two</paragraph>"))).toBe("One\n\nTwo");
    });

    it("should flatten inline formatting", () => {
        const xml = doc("<paragraph>Use <bold>bold</bold> and <code>x</code></paragraph>");
        expect(renderDocument(xml)).toBe("Use bold and x");
    });

    it("should render bullet and numbered lists", () => {
        const items = "<list-item><paragraph>a</paragraph></list-item><list-item><paragraph>b</paragraph></list-item>";
        expect(renderDocument(doc(`<list style="bullet">${items}</list>`))).toBe("- a\n- b");
        expect(renderDocument(doc(`<list style="number">${items}</list>`))).toBe("1. a\n2. b");
    });

    it("should indent nested lists", () => {
        const xml = doc(
            '<list style="bullet"><list-item><paragraph>a</paragraph>' +
            '<list style="bullet"><list-item><paragraph>b</paragraph></list-item></list>' +
            "</list-item></list>",
        );
        expect(renderDocument(xml)).toBe("- a\n  - b");
    });

    it("should keep code blocks verbatim", () => {
        const xml = doc('<paragraph>Run:</paragraph><snippet language="py">for i in x:\n    print(i)</snippet>');
        expect(renderDocument(xml)).toBe("Run:\n\nfor i in x:\n    print(i)");
    });

    it("should use the link text, or the href when there is none", () => {
        expect(renderDocument(doc('<paragraph>see <link href="https://example.com/a">docs</link></paragraph>'))).toBe("see docs");
        expect(renderDocument(doc('<paragraph><link href="https://example.com/a"></link></paragraph>'))).toBe("https://example.com/a");
    });

    it("should render breaks and images", () => {
        expect(renderDocument(doc("<paragraph>line1<break/>line2</paragraph>"))).toBe("line1\nline2");
        expect(renderDocument(doc('<paragraph>Before<image src="x.png"/></paragraph>'))).toBe("Before[image]");
    });

    it("should decode entities", () => {
        expect(renderDocument(doc("<paragraph>a &lt; b &amp; c</paragraph>"))).toBe("a < b & c");
    });

    it("should render a plain-text body as is", () => {
        expect(renderDocument("Just text")).toBe("Just text");
    });

    it("should keep angle brackets in a plain-text body", () => {
        expect(renderDocument("use <T> generics")).toBe("use <T> generics");
        expect(renderDocument("if (a<b) {}")).toBe("if (a<b) {}");
        expect(renderDocument("a<b>c")).toBe("a<b>c");
        expect(parseDocument("<paragraph>not a document</paragraph>")).toEqual([
            { kind: "text", text: "<paragraph>not a document</paragraph>" },
        ]);
    });

    it("should truncate nesting past the depth bound", () => {
        const levels = MAX_DEPTH + 100;
        const xml = doc(`${"<paragraph>".repeat(levels)}deep${"</paragraph>".repeat(levels)}`);
        expect(renderDocument(xml)).toBe(TRUNCATION_MARKER);
    });

    it("should be deterministic", () => {
        const xml = doc('<heading level="1">H</heading><paragraph>P <italic>i</italic></paragraph><list style="number"><list-item><paragraph>x</paragraph></list-item></list>');
        expect(renderDocument(xml)).toBe(renderDocument(xml));
        expect(renderDocument(xml)).toBe("H\n\nP i\n\n1. x");
    });
});

describe("renderText", () => {
    it("should render a hand-built tree", () => {
        expect(renderText([
            { kind: "paragraph", children: [{ kind: "text", text: "A" }, { kind: "unknown", tag: "video" }] },
            { kind: "truncated" },
        ])).toBe("A\n\n[…]");
    });
});

describe("collectAttachments", () => {
    it("should list files and leave them out of the text", () => {
        const nodes = parseDocument(doc(
            '<paragraph>See <file url="https://static.example.com/f.pdf" filename="report.pdf"/></paragraph>' +
            '<list style="bullet"><list-item><paragraph><file url="https://static.example.com/g.zip" filename="code.zip"/></paragraph></list-item></list>',
        ));
        expect(collectAttachments(nodes)).toEqual([
            { name: "report.pdf", url: "https://static.example.com/f.pdf", type: "", size: 0, fromComment: false },
            { name: "code.zip", url: "https://static.example.com/g.zip", type: "", size: 0, fromComment: false },
        ]);
        expect(renderText(nodes).startsWith("See")).toBe(true);
    });
});

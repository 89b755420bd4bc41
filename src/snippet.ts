/**
 * Generate a plain-text excerpt from a post body.
 * Truncates at a sentence boundary, else a word boundary, within maxLen.
 */
export function generateSnippet(content: string, maxLen = 300): string {
    if (!content || !content.trim()) return "";
    const cleaned = content
        .replace(/\[image\]/g, "")
        .replace(/[ \t]+/g, " ")
        .replace(/\n{2,}/g, "\n")
        .trim();
    if (cleaned.length <= maxLen) return cleaned;

    const truncated = cleaned.slice(0, maxLen);
    const lastPeriod = Math.max(
        truncated.lastIndexOf(". "),
        truncated.lastIndexOf("! "),
        truncated.lastIndexOf("? "),
        truncated.lastIndexOf(".\n"),
    );
    if (lastPeriod > maxLen * 0.4) return truncated.slice(0, lastPeriod + 1);

    const lastSpace = truncated.lastIndexOf(" ");
    if (lastSpace > maxLen * 0.5) return truncated.slice(0, lastSpace) + "...";
    return truncated + "...";
}

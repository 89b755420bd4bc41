// Narrowing helpers for JSON and YAML values of unknown shape.

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(obj: Record<string, unknown>, key: string): string | undefined {
    const v = obj[key];
    if (typeof v === "string") return v;
    if (typeof v === "number") return String(v);
    return undefined;
}

export function readNumber(obj: Record<string, unknown>, key: string): number | undefined {
    const v = obj[key];
    if (typeof v === "number" && Number.isFinite(v)) return v;
    if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Number(v);
    return undefined;
}

export function readBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
    const v = obj[key];
    return typeof v === "boolean" ? v : undefined;
}

export function readRecord(obj: Record<string, unknown>, key: string): Record<string, unknown> {
    const v = obj[key];
    return isRecord(v) ? v : {};
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Reads a dotted path ("doente.nome", "queimaduras.0.data"). Numeric segments
 * index arrays. Any missing step yields undefined.
 */
export function readPath(source: unknown, path: string): unknown {
    let current: unknown = source;
    for (const segment of path.split('.')) {
        if (Array.isArray(current)) {
            if (!/^\d+$/.test(segment)) return undefined;
            current = current[Number(segment)];
        } else if (isPlainRecord(current)) {
            current = current[segment];
        } else {
            return undefined;
        }
    }
    return current;
}

// Rough per-item footprint used by the list examples
const BYTES_PER_ITEM = 100;

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/** Illustrative only; this is not a measurement */
export function estimateMemoryUsage(itemCount: number): string {
    return formatBytes(itemCount * BYTES_PER_ITEM);
}

/** Opaque cartel id -> operator-assigned VM name */
export type VmMapping = Map<string, string>;

export interface StatRecord {
    /** The five whitespace-separated tokens exactly as the host printed them */
    columns: [string, string, string, string, string];
    name: string;
    memSizeMb: number;
    activeMb: number;
    tier0ConsumedMb: number;
    tier1ConsumedMb: number;
}

const DATA_LINE = /^\S+\s+\d+\s+\d+\s+\d+\s+\d+$/;

/**
 * Parse `esxcli --formatter csv vm process list` output into a mapping.
 * The first line is the CSV header and is always skipped. When an id appears
 * twice the later row wins.
 */
export function buildVmMapping(lines: string[]): VmMapping {
    const mapping: VmMapping = new Map();

    for (const line of lines.slice(1)) {
        const parts = line.trim().split(",");
        if (parts.length < 5) continue;

        const vmName = parts[1].trim();
        const vmId = parts[4].trim();
        mapping.set(vmId, vmName);
    }

    return mapping;
}

/**
 * Replace every `vm.<id>` token with its VM name. Longer ids are
 * substituted first so that "vm.10" is never rewritten by the entry for "1".
 */
export function substituteVmIds(lines: string[], mapping: VmMapping): string[] {
    const entries = [...mapping.entries()].sort((a, b) => b[0].length - a[0].length);

    return lines.map(line => {
        let replaced = line;
        for (const [vmId, vmName] of entries) {
            replaced = replaced.split(`vm.${vmId}`).join(vmName);
        }
        return replaced;
    });
}

export function isDataLine(line: string): boolean {
    return DATA_LINE.test(line.trim());
}

/**
 * Keep only rows shaped like `<name> <int> <int> <int> <int>`; headers,
 * separators and blank lines are dropped.
 */
export function filterDataLines(lines: string[]): string[] {
    return lines.filter(isDataLine).map(line => line.trim());
}

/**
 * Returns undefined for lines that are not data rows. The numeric fields are
 * for typed access only; values past 2^53 lose precision there, so rendering
 * goes through `columns`.
 */
export function parseStatRecord(line: string): StatRecord | undefined {
    if (!isDataLine(line)) return undefined;
    const [name, memSize, active, tier0, tier1] = line.trim().split(/\s+/);
    return {
        columns: [name, memSize, active, tier0, tier1],
        name,
        memSizeMb: parseInt(memSize, 10),
        activeMb: parseInt(active, 10),
        tier0ConsumedMb: parseInt(tier0, 10),
        tier1ConsumedMb: parseInt(tier1, 10),
    };
}

import { sprintf } from "sprintf-js";
import { TABLE } from "./constants";
import { filterDataLines, parseStatRecord, substituteVmIds, type StatRecord, type VmMapping } from "./parser";

// Widths count code points, not UTF-16 units, so names with emoji line up
function displayLength(text: string): number {
    return [...text].length;
}

/** Widest display name across the whole mapping, rendered or not */
export function nameColumnWidth(mapping: VmMapping): number {
    return Math.max(...[...mapping.values()].map(displayLength));
}

function padName(name: string, width: number): string {
    return name + " ".repeat(Math.max(0, width - displayLength(name)));
}

function formatRow(nameWidth: number, name: string, mem: string, active: string, tier0: string, tier1: string): string {
    const [memWidth, activeWidth, tier0Width, tier1Width] = TABLE.NUMERIC_WIDTHS;
    return sprintf(
        `%s  %-${memWidth}s  %-${activeWidth}s  %-${tier0Width}s  %-${tier1Width}s`,
        padName(name, nameWidth),
        mem,
        active,
        tier0,
        tier1
    );
}

export function formatRecord(record: StatRecord, nameWidth: number): string {
    return formatRow(nameWidth, ...record.columns);
}

/**
 * Render raw memstats output as an aligned table. Values are never truncated,
 * so a name longer than the column pushes the rest of its row right.
 *
 * Example, for VMs "web01" and "db01":
 *
 * VM Name  MemSize (MB)     Active (MB)      Tier0 Consumed (MB)   Tier1 Consumed (MB)
 * -----------------------------------------------------------------------------------------------
 * web01  2048             512              100                   20
 * db01   4096             1024             200                   40
 */
export function renderStatsTable(rawStats: string[], mapping: VmMapping): string {
    if (mapping.size === 0) {
        throw new Error("Cannot size the VM name column without any VMs");
    }

    const nameWidth = nameColumnWidth(mapping);
    const records = filterDataLines(substituteVmIds(rawStats, mapping))
        .map(parseStatRecord)
        .filter((record): record is StatRecord => record !== undefined);

    const lines: string[] = [];
    lines.push(formatRow(nameWidth, ...TABLE.HEADERS));
    lines.push("-".repeat(nameWidth + TABLE.RULE_EXTRA));
    for (const record of records) {
        lines.push(formatRecord(record, nameWidth));
    }
    return lines.join("\n");
}

import { describe, expect, it } from "vitest";
import type { StatRecord } from "./parser";
import { formatRecord, nameColumnWidth, renderStatsTable } from "./render";

function row(name: string, width: number, mem: string, active: string, tier0: string, tier1: string): string {
    return [name.padEnd(width), mem.padEnd(15), active.padEnd(15), tier0.padEnd(20), tier1.padEnd(20)].join("  ");
}

const HEADER = row("VM Name", 0, "MemSize (MB)", "Active (MB)", "Tier0 Consumed (MB)", "Tier1 Consumed (MB)");

describe("nameColumnWidth", () => {
    it("uses the longest name in the mapping", () => {
        expect(nameColumnWidth(new Map([["1", "a"], ["2", "abcd"], ["3", "ab"]]))).toBe(4);
    });
});

describe("formatRecord", () => {
    it("pads each column to its width", () => {
        const record: StatRecord = {
            columns: ["web01", "2048", "512", "100", "20"],
            name: "web01",
            memSizeMb: 2048,
            activeMb: 512,
            tier0ConsumedMb: 100,
            tier1ConsumedMb: 20,
        };

        expect(formatRecord(record, 8)).toBe(row("web01", 8, "2048", "512", "100", "20"));
    });
});

describe("renderStatsTable", () => {
    it("renders substituted data rows under a header and rule", () => {
        const mapping = new Map([
            ["100", "web01"],
            ["200", "db01"],
        ]);
        const table = renderStatsTable(
            ["vm.100 2048 512 100 20", "vm.200 4096 1024 200 40", "garbage line"],
            mapping
        );

        expect(table.split("\n")).toEqual([
            HEADER,
            "-".repeat(95),
            row("web01", 5, "2048", "512", "100", "20"),
            row("db01", 5, "4096", "1024", "200", "40"),
        ]);
    });

    it("sizes the name column from every VM, even ones without stats", () => {
        const mapping = new Map([
            ["1", "a"],
            ["2", "a-much-longer-name"],
        ]);
        const lines = renderStatsTable(["vm.1 1 2 3 4"], mapping).split("\n");

        expect(lines[1]).toBe("-".repeat(18 + 90));
        expect(lines[2]).toBe(row("a", 18, "1", "2", "3", "4"));
    });

    it("renders only the header and rule when nothing qualifies", () => {
        const table = renderStatsTable(["name memSize active", "", "vm.300 1 2 3 4 5"], new Map([["300", "app"]]));

        expect(table).toBe(`${HEADER}\n${"-".repeat(93)}`);
    });

    it("renders exactly one row per qualifying line", () => {
        const mapping = new Map([["7", "vm-seven"]]);
        const raw = [
            "   name     memSize   active  tier0Consumed  tier1Consumed",
            "----------------------------------------------------------",
            "  vm.7        1024      256            128             64",
            "  vm.8         512      128             64             32",
            "  vm.7       bogus      256            128             64",
            "  vm.7        1024      256            128",
        ];
        const lines = renderStatsTable(raw, mapping).split("\n");

        expect(lines.slice(2)).toEqual([
            row("vm-seven", 8, "1024", "256", "128", "64"),
            row("vm.8", 8, "512", "128", "64", "32"),
        ]);
    });

    it("prints numeric columns exactly as the host wrote them", () => {
        const lines = renderStatsTable(
            ["vm.1 0512 9007199254740993 123456789012345678901234 20"],
            new Map([["1", "web01"]])
        ).split("\n");

        expect(lines[2]).toBe(row("web01", 5, "0512", "9007199254740993", "123456789012345678901234", "20"));
        expect(lines[2].split(/\s+/).slice(0, 5)).toEqual([
            "web01",
            "0512",
            "9007199254740993",
            "123456789012345678901234",
            "20",
        ]);
    });

    it("measures names in code points", () => {
        const lines = renderStatsTable(["vm.1 1 2 3 4"], new Map([["1", "\u{1F600}vm"], ["2", "db"]])).split("\n");

        expect(lines[1]).toBe("-".repeat(93));
        expect(lines[2]).toBe(["\u{1F600}vm", "1".padEnd(15), "2".padEnd(15), "3".padEnd(20), "4".padEnd(20)].join("  "));
    });

    it("refuses to render without any VMs", () => {
        expect(() => renderStatsTable(["vm.1 1 2 3 4"], new Map())).toThrow(
            "Cannot size the VM name column without any VMs"
        );
    });
});

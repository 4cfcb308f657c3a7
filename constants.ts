/**
 * Commands run on the host
 */
export const COMMANDS = {
    /** CSV listing of running VMs: display name in column 1, cartel id in column 4 */
    VM_PROCESS_LIST: "esxcli --formatter csv vm process list",
    /** Per-VM tiering stats in MB, one row per vm.<id> */
    MEMSTATS: "memstats -r vmtier-stats -u mb -s name:memSize:active:tier0Consumed:tier1Consumed",
} as const;

/**
 * Stats table layout
 */
export const TABLE = {
    TITLE: "Memory stats:",
    HEADERS: ["VM Name", "MemSize (MB)", "Active (MB)", "Tier0 Consumed (MB)", "Tier1 Consumed (MB)"],
    /** Widths of the four numeric columns; the name column is sized from the mapping */
    NUMERIC_WIDTHS: [15, 15, 20, 20],
    /** Dashes in the rule beyond the name column width */
    RULE_EXTRA: 90,
} as const;

/**
 * SSH connection defaults
 */
export const SSH = {
    DEFAULT_PORT: 22,
    DEFAULT_READY_TIMEOUT_MS: 20000,
} as const;

export const DEFAULT_CONFIG_PATH = "esxi_credentials.json";

export const EXIT_CODES = {
    OK: 0,
    UNEXPECTED: 1,
    CONFIG: 2,
    CONNECTION: 3,
    NO_VMS: 4,
} as const;

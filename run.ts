import type { Credentials } from "./config";
import { COMMANDS, EXIT_CODES, TABLE } from "./constants";
import { ConnectionError, NoVmsRunningError, VmTierError } from "./errors";
import * as logger from "./logger";
import { buildVmMapping, type VmMapping } from "./parser";
import { renderStatsTable } from "./render";
import type { Connect, RemoteSession } from "./session";

export interface RunDeps {
    connect: Connect;
    /** Receives the title and the rendered table */
    print: (text: string) => void;
}

/**
 * Run a command, surfacing stderr as a warning. The host tools print
 * diagnostics on stderr for otherwise usable output, so stdout is always
 * returned.
 */
export async function executeCommand(session: RemoteSession, command: string): Promise<string[]> {
    const output = await session.run(command);
    if (output.stderr.length) {
        logger.warn(`Errors occurred while executing command: ${output.stderr.join("\n")}`);
    }
    return output.stdout;
}

export async function getVmMapping(session: RemoteSession): Promise<VmMapping> {
    logger.info("Retrieving VM names and IDs...");
    const lines = await executeCommand(session, COMMANDS.VM_PROCESS_LIST);
    const mapping = buildVmMapping(lines);
    logger.debug(`Found ${mapping.size} running VMs`);
    return mapping;
}

export async function getMemoryStats(session: RemoteSession): Promise<string[]> {
    logger.info("Retrieving memory stats for VMs backed by NVMe...");
    return await executeCommand(session, COMMANDS.MEMSTATS);
}

/**
 * Connect, collect and print. The session is closed on every path once it
 * has been opened.
 */
export async function runReport(credentials: Credentials, deps: RunDeps): Promise<void> {
    const session = await deps.connect(credentials);
    try {
        const mapping = await getVmMapping(session);
        if (mapping.size === 0) {
            throw new NoVmsRunningError();
        }

        const rawStats = await getMemoryStats(session);
        const table = renderStatsTable(rawStats, mapping);

        deps.print(TABLE.TITLE);
        deps.print(table);
    } finally {
        session.close();
    }
}

/**
 * Log a failure that ended the run and return the exit code for it. An empty
 * host is not an error, so it is reported at info level.
 */
export function reportFailure(e: unknown): number {
    if (e instanceof NoVmsRunningError) {
        logger.info(e.message);
    } else {
        logger.error(e instanceof Error ? e : String(e));
    }
    if (e instanceof ConnectionError) {
        logger.error("Exiting due to connection failure.");
    }
    return e instanceof VmTierError ? e.exitCode : EXIT_CODES.UNEXPECTED;
}

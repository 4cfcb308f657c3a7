import { EXIT_CODES } from "./constants";

export abstract class VmTierError extends Error {
    abstract readonly exitCode: number;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Credential file missing, unparsable, or missing a required field. */
export class ConfigError extends VmTierError {
    readonly exitCode = EXIT_CODES.CONFIG;
}

/** SSH handshake or authentication failed. */
export class ConnectionError extends VmTierError {
    readonly exitCode = EXIT_CODES.CONNECTION;
}

/** A remote command could not be started at all. */
export class RemoteCommandError extends VmTierError {
    readonly exitCode = EXIT_CODES.UNEXPECTED;

    constructor(readonly command: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** The host reported no running VMs. */
export class NoVmsRunningError extends VmTierError {
    readonly exitCode = EXIT_CODES.NO_VMS;

    constructor() {
        super("No VMs are currently running on the ESXi host.");
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

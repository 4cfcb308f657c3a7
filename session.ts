import { Client } from "ssh2";
import type { Credentials } from "./config";
import { ConnectionError, RemoteCommandError } from "./errors";
import * as logger from "./logger";

export interface CommandOutput {
    stdout: string[];
    stderr: string[];
    exitCode: number | null;
}

export interface RemoteSession {
    run(command: string): Promise<CommandOutput>;
    close(): void;
}

export type Connect = (credentials: Credentials) => Promise<RemoteSession>;

/**
 * Split command output into lines, dropping the empty string produced by the
 * final newline
 */
export function splitLines(text: string): string[] {
    if (!text) return [];
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === "") {
        lines.pop();
    }
    return lines;
}

class SshSession implements RemoteSession {
    private closed = false;

    constructor(private client: Client) { }

    run(command: string): Promise<CommandOutput> {
        logger.debug(`Running: ${command}`);
        return new Promise((resolve, reject) => {
            this.client.exec(command, (err, stream) => {
                if (err) {
                    reject(new RemoteCommandError(command, `Unable to run "${command}": ${err.message}`, { cause: err }));
                    return;
                }
                let stdout = "";
                let stderr = "";
                let exitCode: number | null = null;
                stream.on("data", (chunk: Buffer) => {
                    stdout += chunk.toString("utf8");
                });
                stream.stderr.on("data", (chunk: Buffer) => {
                    stderr += chunk.toString("utf8");
                });
                // null when the command was killed by a signal
                stream.on("exit", (code: number | null) => {
                    exitCode = typeof code === "number" ? code : null;
                });
                stream.on("close", () => {
                    logger.debug(`"${command}" exited with ${exitCode}`);
                    resolve({
                        stdout: splitLines(stdout),
                        stderr: splitLines(stderr),
                        exitCode,
                    });
                });
            });
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        logger.info("Closing SSH connection...");
        this.client.end();
        logger.info("SSH connection closed.");
    }
}

/**
 * Open a password-authenticated session. Any host key is accepted.
 */
export const connectSsh: Connect = (credentials) => {
    logger.info(`Connecting to ${credentials.host}...`);
    const client = new Client();
    return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
            client.end();
            reject(new ConnectionError(`Failed to connect: ${err.message}`, { cause: err }));
        };
        client.once("error", onError);
        client.once("ready", () => {
            client.removeListener("error", onError);
            client.on("error", (err) => logger.error(err));
            logger.info("Connected successfully!");
            resolve(new SshSession(client));
        });
        client.connect({
            host: credentials.host,
            port: credentials.port,
            username: credentials.username,
            password: credentials.password,
            readyTimeout: credentials.readyTimeoutMs,
            tryKeyboard: false,
        });
    });
};

import fs from "fs";
import path from "path";
import { XMLParser } from "fast-xml-parser";
import { SSH } from "./constants";
import { ConfigError, toError } from "./errors";

export interface Credentials {
    host: string;
    username: string;
    password: string;
    port: number;
    readyTimeoutMs: number;
}

export interface CredentialOverrides {
    host?: string;
    username?: string;
    /** When set, the file may omit `password`; it is filled in by the caller afterwards */
    passwordOptional?: boolean;
}

function readRequiredString(raw: Record<string, unknown>, field: string, configPath: string): string {
    const value = raw[field];
    if (typeof value !== "string" || !value.trim()) {
        throw new ConfigError(`Missing required field "${field}" in ${configPath}`);
    }
    return value.trim();
}

function readPositiveInt(raw: Record<string, unknown>, field: string, configPath: string, fallback: number, max?: number): number {
    const value = raw[field];
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || (max !== undefined && value > max)) {
        throw new ConfigError(`Field "${field}" in ${configPath} must be an integer between 1 and ${max ?? "infinity"}`);
    }
    return value;
}

/**
 * Validate the parsed credential file. Overrides win over file values, so a
 * field supplied on the command line need not be present in the file.
 */
export function parseCredentials(raw: unknown, configPath: string, overrides: CredentialOverrides = {}): Credentials {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
        throw new ConfigError(`${configPath} must contain a JSON object`);
    }
    const fields: Record<string, unknown> = { ...raw };
    if (overrides.host) fields.host = overrides.host;
    if (overrides.username) fields.username = overrides.username;

    const host = readRequiredString(fields, "host", configPath);
    const username = readRequiredString(fields, "username", configPath);
    const password = overrides.passwordOptional && fields.password === undefined
        ? ""
        : readRequiredString(fields, "password", configPath);

    return {
        host,
        username,
        password,
        port: readPositiveInt(fields, "port", configPath, SSH.DEFAULT_PORT, 65535),
        readyTimeoutMs: readPositiveInt(fields, "readyTimeoutMs", configPath, SSH.DEFAULT_READY_TIMEOUT_MS),
    };
}

const INTEGER_FIELDS = ["port", "readyTimeoutMs"];

/**
 * Read the `<host>`, `<username>` and `<password>` children of the root
 * element, as in `esxi_credentials.xml`. The root element's name is ignored.
 * Tag values stay strings so a numeric password is not turned into a number.
 */
export function parseXmlCredentials(text: string): Record<string, unknown> {
    const parser = new XMLParser({ ignoreDeclaration: true, ignoreAttributes: true, parseTagValue: false });
    const document: unknown = parser.parse(text, true);
    const roots = typeof document === "object" && document !== null ? Object.values(document) : [];
    const root: unknown = roots[0];
    if (roots.length !== 1 || typeof root !== "object" || root === null || Array.isArray(root)) {
        throw new Error("expected a single root element holding <host>, <username> and <password>");
    }

    const fields: Record<string, unknown> = { ...root };
    for (const field of INTEGER_FIELDS) {
        const value = fields[field];
        if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
            fields[field] = parseInt(value, 10);
        }
    }
    return fields;
}

export function loadCredentials(configPath: string, overrides: CredentialOverrides = {}): Credentials {
    let text: string;
    try {
        text = fs.readFileSync(configPath, "utf8");
    } catch (e) {
        throw new ConfigError(`Unable to read credentials file ${configPath}: ${toError(e).message}`, { cause: e });
    }

    let raw: unknown;
    try {
        raw = path.extname(configPath).toLowerCase() === ".xml"
            ? parseXmlCredentials(text)
            : JSON.parse(text);
    } catch (e) {
        throw new ConfigError(`Unable to parse credentials file ${configPath}: ${toError(e).message}`, { cause: e });
    }

    return parseCredentials(raw, configPath, overrides);
}

import yargs from "yargs";
import prompts from "prompts";
import { loadCredentials, type Credentials } from "./config";
import { DEFAULT_CONFIG_PATH } from "./constants";
import { ConfigError } from "./errors";
import * as logger from "./logger";
import { reportFailure, runReport } from "./run";
import { connectSsh } from "./session";

const yargObj = yargs(process.argv.slice(2))
    .scriptName("vmtier-stats")
    .usage("$0 [config]\n\nPrint per-VM memory tiering stats from an ESXi host, keyed by VM name.\n\nThe credentials file is JSON ({ host, username, password }) or, when it ends in .xml,\nthe <host>/<username>/<password> layout of esxi_credentials.xml.")
    .option("host", { type: "string", describe: "Host to connect to, overriding the credentials file" })
    .option("user", { type: "string", describe: "User to log in as, overriding the credentials file" })
    .option("ask-password", { type: "boolean", default: false, describe: "Prompt for the password instead of reading it from the file" })
    .option("verbose", { type: "boolean", default: false, describe: "Print debug output" })
    .strictOptions()
    .parseSync();

const configPath = String(yargObj._[0] ?? DEFAULT_CONFIG_PATH);

async function askPassword(credentials: Credentials): Promise<Credentials> {
    const response = await prompts({
        type: "password",
        name: "password",
        message: `Password for ${credentials.username}@${credentials.host}:`,
    });
    const password: unknown = response.password;
    if (typeof password !== "string" || !password) {
        throw new ConfigError("No password entered");
    }
    return { ...credentials, password };
}

async function main() {
    logger.setVerbose(yargObj.verbose);

    let credentials = loadCredentials(configPath, {
        host: yargObj.host,
        username: yargObj.user,
        passwordOptional: yargObj["ask-password"],
    });
    if (yargObj["ask-password"]) {
        credentials = await askPassword(credentials);
    }
    logger.debug(`Loaded credentials for ${credentials.username}@${credentials.host}:${credentials.port}`);

    await runReport(credentials, {
        connect: connectSsh,
        print: text => console.log(text),
    });
}

main()
    .catch((e: unknown) => {
        process.exitCode = reportFailure(e);
    })
    .finally(() => process.exit());

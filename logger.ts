const LOG_HEADER = "[vmtier-stats]";

let verbose = false;

export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function debug(msg: string): void {
    if (!verbose) return;
    console.log(`${LOG_HEADER} ${msg}`);
}

export function info(msg: string): void {
    console.log(`${LOG_HEADER} ${msg}`);
}

export function warn(msg: string): void {
    console.warn(`${LOG_HEADER} ${msg}`);
}

export function error(msg: string | Error): void {
    if (typeof msg === "string") {
        console.error(`${LOG_HEADER} ${msg}`);
    } else {
        console.error(`${LOG_HEADER} ${msg.name}: ${msg.message}`);
        if (verbose && msg.stack) {
            console.error(msg.stack);
        }
    }
}

import util from "util";

const ALLOW_STDOUT_LOGS = process.env.GRAPH_REFACTOR_ALLOW_STDOUT_LOGS === "true";
const DEBUG_LOGS_ENABLED = process.env.GRAPH_REFACTOR_DEBUG === "true";

/** Routes console output to stderr. stdout carries the JSON-RPC stream. */
export function installStdoutGuard(): void {
    if (ALLOW_STDOUT_LOGS) {
        return;
    }
    const redirect = (level: "info" | "debug") => (...args: unknown[]) => {
        if (level === "debug" && !DEBUG_LOGS_ENABLED) {
            return;
        }
        process.stderr.write(util.format(...args) + "\n");
    };

    console.log = redirect("info");
    console.info = redirect("info");
    console.debug = redirect("debug");
}

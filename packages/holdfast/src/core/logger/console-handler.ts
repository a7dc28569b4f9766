import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    return new Date(ts).toTimeString().slice(0, 8);
}

function formatValue(value: unknown): string {
    return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

/** `event` prints as `@name`, `error` in red; any other key as `key=value`. */
function formatDetails(details: Record<string, unknown>): string {
    const parts = Object.entries(details).map(([key, value]) => {
        if (key === "event") return `${cyan}@${formatValue(value)}${reset}`;
        if (key === "error") return `${red}${formatValue(value)}${reset}`;
        return `${dim}${key}=${reset}${formatValue(value)}`;
    });
    return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/** Prints `HH:MM:SS [tag] code → message @event error`; debug entries are tagged with `name`. */
export function createConsoleHandler(name = "holdfast"): LogHandler {
    return (entry: LogEntry) => {
        const tag = entry.level === "debug" ? name : entry.level;
        const details = entry.details ? formatDetails(entry.details) : "";
        const line = `${formatTime(entry.timestamp)} [${tag}] ${entry.code} → ${entry.message}${details}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}

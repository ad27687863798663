import { appendFileSync, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import pc from "picocolors";

export type OutputMode = "default" | "json" | "quiet";

const PREFIX = "[crashtrack]";

let logFilePath: string | null = null;
let outputMode: OutputMode = "default";

export function setOutputMode(mode: OutputMode): void {
	outputMode = mode;
}

export function initLogFile(path: string): void {
	const dir = dirname(path);
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true });
	}
	writeFileSync(path, `[${timestamp()}] Log started\n`);
	logFilePath = path;
}

export function closeLogFile(): void {
	logFilePath = null;
}

function timestamp(): string {
	return new Date().toLocaleTimeString("en-US", { hour12: false });
}

function writeToFile(level: string, message: string): void {
	if (logFilePath) {
		appendFileSync(logFilePath, `[${timestamp()}] [${level}] ${message}\n`);
	}
}

function emitJson(level: string, message: string): void {
	console.log(JSON.stringify({ time: timestamp(), level, message }));
}

export function log(message: string): void {
	if (outputMode === "json") {
		emitJson("info", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.log(`${pc.cyan(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
	writeToFile("info", message);
}

export function warn(message: string): void {
	if (outputMode === "json") {
		emitJson("warn", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.error(`${pc.yellow(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
	writeToFile("warn", message);
}

export function error(message: string): void {
	if (outputMode === "json") {
		emitJson("error", message);
		return;
	}
	console.error(`${pc.red(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	writeToFile("error", message);
}

export function ok(message: string): void {
	if (outputMode === "json") {
		emitJson("ok", message);
		return;
	}
	if (outputMode !== "quiet") {
		console.log(`${pc.green(PREFIX)} ${pc.dim(timestamp())} ${message}`);
	}
	writeToFile("ok", message);
}

/**
 * Logs `message` at error level followed by the full detail of `err`:
 * its stack when it is an Error, its string form otherwise.
 */
export function exception(message: string, err: unknown): void {
	error(`${message}\n${describeFailure(err)}`);
}

const MAX_CAUSE_DEPTH = 5;

function describeFailure(err: unknown, depth = 0): string {
	if (err instanceof Error) {
		const frames = (err.stack ?? "").split("\n").filter((line) => line.trimStart().startsWith("at "));
		const detail = [`${err.name}: ${err.message}`, ...frames].join("\n");
		if (err.cause === undefined || depth >= MAX_CAUSE_DEPTH) return detail;
		return `${detail}\nCaused by: ${describeFailure(err.cause, depth + 1)}`;
	}
	try {
		return String(err);
	} catch {
		return "<unprintable value>";
	}
}

import { FormattingError } from "./errors.js";

export const PROVENANCE_FOOTER = "(*This issue was automatically opened by crashtrack*)";

/**
 * Name of the error's type: the constructor name for Error subclasses, falling back to
 * `name` for errors rebuilt without their class (e.g. after crossing a worker boundary).
 */
export function errorTypeName(value: unknown): string {
	if (value instanceof Error) {
		const ctor = value.constructor.name;
		return ctor && ctor !== "Error" ? ctor : value.name;
	}
	if (value === null) return "null";
	if (typeof value === "object") {
		const ctor = value.constructor;
		return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
	}
	return typeof value;
}

function stringifyValue(value: unknown): string {
	if (value instanceof Error) return value.message;
	try {
		return String(value);
	} catch (err) {
		throw new FormattingError("Cannot convert the thrown value to a string", { cause: err });
	}
}

// Dedup key: must only ever depend on the type name and the message.
export function formatTitle(errorType: string, errorValue: unknown): string {
	return `${errorType}: ${stringifyValue(errorValue)}`;
}

export function formatTrace(value: unknown): string | null {
	if (!(value instanceof Error) || !value.stack) return null;

	const sections = [value.stack];
	const seen = new Set<unknown>([value]);
	let cause = value.cause;
	while (cause instanceof Error && !seen.has(cause)) {
		seen.add(cause);
		sections.push(`Caused by: ${cause.stack ?? `${cause.name}: ${cause.message}`}`);
		cause = cause.cause;
	}
	return sections.join("\n");
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

/** ISO-8601 in local time with the UTC offset, e.g. `2024-03-05T14:07:09.042+01:00`. */
export function localIsoTimestamp(date: Date): string {
	const offset = -date.getTimezoneOffset();
	const sign = offset >= 0 ? "+" : "-";
	const absOffset = Math.abs(offset);
	return (
		`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
		`T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
		`.${pad(date.getMilliseconds(), 3)}` +
		`${sign}${pad(Math.floor(absOffset / 60))}:${pad(absOffset % 60)}`
	);
}

export function formatDescription(
	errorType: string,
	errorValue: unknown,
	trace: string | null | undefined,
	now: Date = new Date(),
): string {
	const title = formatTitle(errorType, errorValue);
	const block = trace ? (trace.endsWith("\n") ? trace : `${trace}\n`) : "";

	return [
		`# Uncaught exception '${title}'`,
		"",
		"```js",
		`${block}\`\`\``,
		`The error lastly occurred at: **${localIsoTimestamp(now)}**`,
		"",
		"",
		"",
		PROVENANCE_FOOTER,
	].join("\n");
}

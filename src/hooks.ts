import type { Worker } from "node:worker_threads";
import { errorTypeName, formatTitle, formatTrace } from "./signature.js";
import type {
	HookSlot,
	HostHooks,
	ThreadErrorHandler,
	UncaughtErrorHandler,
} from "./types/index.js";

/** The parts of `process` the hooks attach to. */
export interface HostProcess {
	on(event: "uncaughtException", listener: NodeJS.UncaughtExceptionListener): unknown;
	on(event: "worker", listener: (worker: Worker) => void): unknown;
	off(event: "uncaughtException", listener: NodeJS.UncaughtExceptionListener): unknown;
	off(event: "worker", listener: (worker: Worker) => void): unknown;
	listeners(event: "uncaughtException"): unknown[];
}

export interface HandlerIo {
	write(text: string): void;
	exit(code: number): void;
}

function processIo(proc: NodeJS.Process): HandlerIo {
	return {
		write: (text) => {
			proc.stderr.write(text);
		},
		exit: (code) => proc.exit(code),
	};
}

function printable(errorType: string, errorValue: unknown, trace: string | null): string {
	if (trace) return trace;
	try {
		return formatTitle(errorType, errorValue);
	} catch {
		return `${errorType}: <unprintable value>`;
	}
}

// What Node does with an uncaught exception nobody listens for.
export function createDefaultUncaughtHandler(
	io: HandlerIo,
	nodeVersion = process.version,
): UncaughtErrorHandler {
	return (errorType, errorValue, trace) => {
		io.write(`${printable(errorType, errorValue, trace)}\n\nNode.js ${nodeVersion}\n`);
		io.exit(1);
	};
}

// Node >= 16.14 emits `worker` on process for every Worker it creates.
export function hasWorkerHook(version: string): boolean {
	const [major = 0, minor = 0] = version
		.replace(/^v/, "")
		.split(".")
		.map((part) => Number.parseInt(part, 10));
	return major > 16 || (major === 16 && minor >= 14);
}

function handlerFailed(err: unknown, io: HandlerIo): void {
	io.write(`Error in uncaught error handler:\n${printable(errorTypeName(err), err, formatTrace(err))}\n`);
	io.exit(1);
}

function runHandler(
	invoke: () => void | Promise<void>,
	io: HandlerIo,
	settled: () => void = () => {},
): void {
	let pending: Promise<void>;
	try {
		pending = Promise.resolve(invoke());
	} catch (err) {
		pending = Promise.reject(err);
	}
	void pending.catch((err: unknown) => handlerFailed(err, io)).finally(settled);
}

function isUncaughtListener(fn: unknown): fn is NodeJS.UncaughtExceptionListener {
	return typeof fn === "function";
}

/**
 * Single-handler view over `process.on("uncaughtException")`. The first `set` detaches the
 * listeners already registered and folds them into the original handler; setting that
 * original handler back re-attaches them.
 */
class UncaughtExceptionSlot implements HookSlot<UncaughtErrorHandler> {
	private current: UncaughtErrorHandler | null = null;
	private original: UncaughtErrorHandler | null = null;
	private previous: NodeJS.UncaughtExceptionListener[] = [];
	// Origin Node passed with each error still being handled, replayed to the folded listeners.
	private readonly origins = new Map<unknown, NodeJS.UncaughtExceptionOrigin>();

	private readonly bridge = (error: unknown, origin: NodeJS.UncaughtExceptionOrigin): void => {
		const handler = this.current;
		if (!handler) return;
		this.origins.set(error, origin);
		runHandler(
			() => handler(errorTypeName(error), error, formatTrace(error)),
			this.io,
			() => this.origins.delete(error),
		);
	};

	constructor(
		private readonly proc: HostProcess,
		private readonly io: HandlerIo,
	) {}

	get(): UncaughtErrorHandler {
		return this.current ?? this.originalHandler();
	}

	set(handler: UncaughtErrorHandler): void {
		const original = this.originalHandler();
		if (handler === original) {
			this.detach();
			return;
		}
		if (this.current === null) {
			for (const listener of this.previous) this.proc.off("uncaughtException", listener);
			this.proc.on("uncaughtException", this.bridge);
		}
		this.current = handler;
	}

	/** What an uncaught exception reaches when this slot's handler is left out. */
	fallback(): UncaughtErrorHandler {
		if (this.current !== null) return this.originalHandler();
		return this.handlerFor(this.registered());
	}

	private originalHandler(): UncaughtErrorHandler {
		if (this.original) return this.original;
		this.previous = this.registered();
		this.original = this.handlerFor(this.previous);
		return this.original;
	}

	private registered(): NodeJS.UncaughtExceptionListener[] {
		return this.proc.listeners("uncaughtException").filter(isUncaughtListener);
	}

	private handlerFor(listeners: NodeJS.UncaughtExceptionListener[]): UncaughtErrorHandler {
		if (listeners.length === 0) return createDefaultUncaughtHandler(this.io);
		return (_errorType, errorValue) => {
			const origin = this.origins.get(errorValue) ?? "uncaughtException";
			for (const listener of listeners) {
				Reflect.apply(listener, this.proc, [errorValue, origin]);
			}
		};
	}

	private detach(): void {
		if (this.current === null) return;
		this.proc.off("uncaughtException", this.bridge);
		for (const listener of this.previous) this.proc.on("uncaughtException", listener);
		this.current = null;
		this.original = null;
		this.previous = [];
	}
}

/**
 * Single-handler view over errors escaping worker threads. Only workers created after the
 * first `set` are observed.
 *
 * The original handler does what Node does without the slot: a worker error the application
 * listens for stays with its listeners, any other one is re-thrown as an uncaught exception
 * on the main thread.
 */
class WorkerErrorSlot implements HookSlot<ThreadErrorHandler> {
	private current: ThreadErrorHandler | null = null;
	private readonly attached = new WeakMap<Worker, (error: unknown) => void>();

	private readonly original: ThreadErrorHandler = async ({ errorType, errorValue, trace, thread }) => {
		if (thread && this.hasOtherListeners(thread)) return;
		await this.uncaught()(errorType, errorValue, trace);
	};

	private readonly onWorker = (worker: Worker): void => {
		const listener = (error: unknown): void => {
			const handler = this.current ?? this.original;
			runHandler(
				() =>
					handler({
						errorType: errorTypeName(error),
						errorValue: error,
						trace: formatTrace(error),
						thread: worker,
					}),
				this.io,
			);
		};
		this.attached.set(worker, listener);
		worker.on("error", listener);
	};

	constructor(
		private readonly proc: HostProcess,
		private readonly io: HandlerIo,
		private readonly uncaught: () => UncaughtErrorHandler,
	) {}

	get(): ThreadErrorHandler {
		return this.current ?? this.original;
	}

	set(handler: ThreadErrorHandler): void {
		if (handler === this.original) {
			if (this.current !== null) this.proc.off("worker", this.onWorker);
			this.current = null;
			return;
		}
		if (this.current === null) this.proc.on("worker", this.onWorker);
		this.current = handler;
	}

	private hasOtherListeners(worker: Worker): boolean {
		const own = this.attached.get(worker);
		return worker.listeners("error").some((listener) => listener !== own);
	}
}

export function createProcessHooks(
	proc: HostProcess = process,
	io: HandlerIo = processIo(process),
	nodeVersion: string = process.versions.node,
): HostHooks {
	const uncaught = new UncaughtExceptionSlot(proc, io);
	const thread = hasWorkerHook(nodeVersion)
		? new WorkerErrorSlot(proc, io, () => uncaught.fallback())
		: null;
	return { uncaught, thread };
}

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	applySettings,
	findConfigDir,
	getConfigPath,
	loadSettings,
	parseId,
	readConfigFile,
} from "./config.js";
import { ConfigurationError } from "./errors.js";
import * as logger from "./output/logger.js";
import { Reporter } from "./reporter.js";
import type { CrashtrackSettings, HostHooks, UncaughtErrorHandler } from "./types/index.js";

function writeConfig(dir: string, yaml: string): string {
	const configDir = join(dir, ".crashtrack");
	mkdirSync(configDir, { recursive: true });
	const path = join(configDir, "config.yaml");
	writeFileSync(path, yaml);
	return path;
}

function inertHooks(): HostHooks {
	let handler: UncaughtErrorHandler = () => {};
	return {
		uncaught: {
			get: () => handler,
			set: (next) => {
				handler = next;
			},
		},
		thread: null,
	};
}

describe("getConfigPath", () => {
	it("returns .crashtrack/config.yaml relative to cwd", () => {
		expect(getConfigPath("/some/dir")).toBe("/some/dir/.crashtrack/config.yaml");
	});
});

describe("parseId", () => {
	it("accepts positive integers and their string form", () => {
		expect(parseId(56789, "project_id")).toBe(56789);
		expect(parseId("42", "project_id")).toBe(42);
		expect(parseId(" 7 ", "project_id")).toBe(7);
	});

	it("treats missing values as unset", () => {
		expect(parseId(undefined, "project_id")).toBeNull();
		expect(parseId("", "project_id")).toBeNull();
	});

	it("rejects anything else", () => {
		expect(() => parseId("abc", "project_id")).toThrow("Invalid project_id: abc");
		expect(() => parseId(0, "project_id")).toThrow(ConfigurationError);
		expect(() => parseId(1.5, "assignee_id")).toThrow("Invalid assignee_id: 1.5");
		expect(() => parseId("0", "project_id")).toThrow(ConfigurationError);
	});
});

describe("config files", () => {
	let tmpDir: string;

	beforeEach(() => {
		tmpDir = mkdtempSync(join(tmpdir(), "crashtrack-test-"));
	});

	afterEach(() => {
		rmSync(tmpDir, { recursive: true, force: true });
	});

	describe("findConfigDir", () => {
		it("finds the config in a parent directory", () => {
			writeConfig(tmpDir, "project_id: 1\n");
			const nested = join(tmpDir, "a", "b");
			mkdirSync(nested, { recursive: true });

			expect(findConfigDir(nested)).toBe(tmpDir);
		});
	});

	describe("readConfigFile", () => {
		it("reads every known field", () => {
			const path = writeConfig(
				tmpDir,
				[
					"host: https://gitlab.example.com",
					"token: test-token",
					"project_id: 56789",
					'assignee_id: "9999"',
					"log_file: logs/crashtrack.log",
					"output: quiet",
				].join("\n"),
			);

			expect(readConfigFile(path)).toEqual({
				host: "https://gitlab.example.com",
				token: "test-token",
				project_id: 56789,
				assignee_id: "9999",
				log_file: "logs/crashtrack.log",
				output: "quiet",
			});
		});

		it("treats an empty file as no settings", () => {
			const path = writeConfig(tmpDir, "");
			expect(readConfigFile(path)).toEqual({
				host: undefined,
				token: undefined,
				project_id: undefined,
				assignee_id: undefined,
				log_file: undefined,
				output: undefined,
			});
		});

		it("rejects a list at the top level", () => {
			const path = writeConfig(tmpDir, "- a\n- b\n");
			expect(() => readConfigFile(path)).toThrow("must contain a mapping");
		});

		it("rejects an unknown output mode", () => {
			const path = writeConfig(tmpDir, "output: loud\n");
			expect(() => readConfigFile(path)).toThrow('output must be one of default, json, quiet, got "loud"');
		});

		it("rejects a non-string host", () => {
			const path = writeConfig(tmpDir, "host: 12\n");
			expect(() => readConfigFile(path)).toThrow("host must be a string");
		});
	});

	describe("loadSettings", () => {
		it("returns defaults without a file or environment", () => {
			expect(loadSettings(tmpDir, {})).toEqual({
				host: "https://gitlab.com",
				token: null,
				projectId: null,
				assigneeId: undefined,
				logFile: undefined,
				output: "default",
			});
		});

		it("reads the file and resolves the log file next to it", () => {
			writeConfig(tmpDir, "host: gitlab.example.com\nproject_id: 12\nassignee_id: 34\nlog_file: out.log\n");

			const settings = loadSettings(tmpDir, { GITLAB_TOKEN: "test-token" });

			expect(settings).toEqual({
				host: "gitlab.example.com",
				token: "test-token",
				projectId: 12,
				assigneeId: 34,
				logFile: join(tmpDir, ".crashtrack", "out.log"),
				output: "default",
			});
		});

		it("lets the environment override the file", () => {
			writeConfig(tmpDir, "host: gitlab.example.com\ntoken: file-token\nproject_id: 12\noutput: json\n");

			const settings = loadSettings(tmpDir, {
				GITLAB_BASE_URL: "https://git.internal.test",
				GITLAB_TOKEN: "env-token",
				CRASHTRACK_PROJECT_ID: "99",
				CRASHTRACK_OUTPUT: "quiet",
			});

			expect(settings.host).toBe("https://git.internal.test");
			expect(settings.token).toBe("env-token");
			expect(settings.projectId).toBe(99);
			expect(settings.output).toBe("quiet");
		});

		it("rejects a zero project id from the file", () => {
			writeConfig(tmpDir, "project_id: 0\n");

			expect(() => loadSettings(tmpDir, {})).toThrow("Invalid project_id: 0");
		});

		it("falls back to the file when the environment variable is empty", () => {
			writeConfig(tmpDir, "project_id: 12\n");

			expect(loadSettings(tmpDir, { CRASHTRACK_PROJECT_ID: "" }).projectId).toBe(12);
		});

		it("rejects a malformed project id from the environment", () => {
			expect(() => loadSettings(tmpDir, { CRASHTRACK_PROJECT_ID: "my-project" })).toThrow(
				ConfigurationError,
			);
		});
	});
});

describe("applySettings", () => {
	const base: CrashtrackSettings = {
		host: "https://gitlab.example.com",
		token: "test-token",
		projectId: 56789,
		assigneeId: 9999,
		output: "quiet",
	};

	afterEach(() => {
		logger.setOutputMode("default");
		vi.restoreAllMocks();
	});

	it("initializes the reporter when token and project are present", () => {
		const reporter = new Reporter({ hooks: inertHooks() });

		expect(applySettings(reporter, base)).toBe(true);

		expect(reporter.isConfigured()).toBe(true);
		expect(reporter.getConfig()?.projectId).toBe(56789);
		expect(reporter.getConfig()?.assigneeId).toBe(9999);

		const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		logger.log("not shown in quiet mode");
		expect(logSpy).not.toHaveBeenCalled();
	});

	it("warns and leaves the reporter unconfigured without a token", () => {
		const warnSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		const reporter = new Reporter({ hooks: inertHooks() });

		expect(applySettings(reporter, { ...base, token: null, output: "default" })).toBe(false);

		expect(reporter.isConfigured()).toBe(false);
		expect(reporter.isInstalled()).toBe(false);
		expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("GITLAB_TOKEN and CRASHTRACK_PROJECT_ID"));
	});

	it("leaves the reporter unconfigured without a project", () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		const reporter = new Reporter({ hooks: inertHooks() });

		expect(applySettings(reporter, { ...base, projectId: null })).toBe(false);
		expect(reporter.isConfigured()).toBe(false);
	});
});

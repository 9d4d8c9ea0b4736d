import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEFAULT_TOOL, resolveConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("resolveConfig", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "migrate-config-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("should fall back to defaults", () => {
		expect(DEFAULT_TOOL).toBe("uv run alembic");
		expect(resolveConfig({}, {}, dir)).toEqual({
			tool: ["uv", "run", "alembic"],
			cwd: dir,
			alembicConfig: undefined,
			env: {},
			dryRun: false,
			logLevel: "standard",
			logFile: undefined,
		});
	});

	it("should read settings and tool environment from .env", () => {
		fs.writeFileSync(
			path.join(dir, ".env"),
			"MIGRATE_TOOL=poetry run alembic\nDATABASE_URL=postgresql://localhost/test\n",
		);

		const config = resolveConfig({}, {}, dir);

		expect(config.tool).toEqual(["poetry", "run", "alembic"]);
		expect(config.env.DATABASE_URL).toBe("postgresql://localhost/test");
	});

	it("should let the process environment win over .env", () => {
		fs.writeFileSync(path.join(dir, ".env"), "MIGRATE_TOOL=poetry run alembic\n");
		const config = resolveConfig({}, { MIGRATE_TOOL: "alembic" }, dir);
		expect(config.tool).toEqual(["alembic"]);
	});

	it("should let CLI options win over the environment", () => {
		const config = resolveConfig(
			{ tool: "python -m alembic", config: "db/alembic.ini", logLevel: "verbose" },
			{ MIGRATE_TOOL: "alembic", ALEMBIC_CONFIG_FILE: "alembic.ini", MIGRATE_LOG_LEVEL: "minimal" },
			dir,
		);

		expect(config.tool).toEqual(["python", "-m", "alembic"]);
		expect(config.alembicConfig).toBe("db/alembic.ini");
		expect(config.logLevel).toBe("verbose");
	});

	it("should not write .env values into process.env", () => {
		fs.writeFileSync(path.join(dir, ".env"), "MIGRATE_CONFIG_TEST_ONLY=1\n");
		resolveConfig({}, {}, dir);
		expect(process.env.MIGRATE_CONFIG_TEST_ONLY).toBeUndefined();
	});

	it("should resolve --cwd against the base directory and look for .env there", () => {
		const apiDir = path.join(dir, "api");
		fs.mkdirSync(apiDir);
		fs.writeFileSync(path.join(apiDir, ".env"), "MIGRATE_LOG_FILE=logs/migrate.log\n");

		const config = resolveConfig({ cwd: "api" }, {}, dir);

		expect(config.cwd).toBe(apiDir);
		expect(config.logFile).toBe(path.join(apiDir, "logs", "migrate.log"));
	});

	it("should take the working directory from MIGRATE_CWD", () => {
		expect(resolveConfig({}, { MIGRATE_CWD: "/srv/api" }, dir).cwd).toBe("/srv/api");
	});

	it("should load a named env file", () => {
		fs.writeFileSync(path.join(dir, "staging.env"), "ALEMBIC_CONFIG_FILE=staging.ini\n");
		expect(resolveConfig({ envFile: "staging.env" }, {}, dir).alembicConfig).toBe("staging.ini");
	});

	it("should fail when a named env file is missing", () => {
		expect(() => resolveConfig({ envFile: "missing.env" }, {}, dir)).toThrow(
			new ConfigError(`Environment file not found: ${path.join(dir, "missing.env")}`),
		);
	});

	it("should enable dry run from the environment", () => {
		expect(resolveConfig({}, { MIGRATE_DRY_RUN: "true" }, dir).dryRun).toBe(true);
		expect(resolveConfig({}, { MIGRATE_DRY_RUN: "1" }, dir).dryRun).toBe(true);
		expect(resolveConfig({}, { MIGRATE_DRY_RUN: "no" }, dir).dryRun).toBe(false);
		expect(resolveConfig({ dryRun: true }, {}, dir).dryRun).toBe(true);
	});

	it("should reject an unknown log level", () => {
		expect(() => resolveConfig({ logLevel: "loud" }, {}, dir)).toThrow(
			"Invalid log level: loud (expected minimal, standard or verbose)",
		);
	});

	it("should reject a blank tool command", () => {
		expect(() => resolveConfig({}, { MIGRATE_TOOL: "   " }, dir)).toThrow(ConfigError);
	});
});

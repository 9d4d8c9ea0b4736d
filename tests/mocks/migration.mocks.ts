/**
 * In-memory stand-ins for the migration tool and the process output streams
 */
import type { OutputWriters } from "../../src/logger";
import type { MigrationTool } from "../../src/tool-runner";
import { quoteArg } from "../../src/tool-runner";

export class FakeMigrationTool implements MigrationTool {
	readonly calls: string[][] = [];
	private readonly prefix: string[];
	private readonly exitCode: number;

	constructor(exitCode = 0, prefix: string[] = ["uv", "run", "alembic"]) {
		this.exitCode = exitCode;
		this.prefix = prefix;
	}

	async run(args: string[]): Promise<number> {
		this.calls.push(args);
		return this.exitCode;
	}

	describe(args: string[]): string {
		return [...this.prefix, ...args].map(quoteArg).join(" ");
	}
}

export interface CapturedOutput {
	writers: OutputWriters;
	stdout(): string;
	stderr(): string;
}

export function createCapturedOutput(): CapturedOutput {
	const out: string[] = [];
	const err: string[] = [];
	return {
		writers: {
			writeOut: (text) => out.push(text),
			writeErr: (text) => err.push(text),
		},
		stdout: () => out.join(""),
		stderr: () => err.join(""),
	};
}

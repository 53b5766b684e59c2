/**
 * StateStore — JSON snapshot of the engine state on local disk.
 *
 * Each save writes a temporary file beside the target and renames it into
 * place, so a crash mid-write leaves the previous snapshot intact. Saves are
 * serialized through a write queue; credential-looking keys are stripped at
 * any depth before anything touches the disk.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError, validate } from "../lib/validation/index.js";
import { EngineStateSchema } from "./state-schema.js";
import type { EngineState } from "./state-schema.js";

/** Keys never written to a snapshot, compared case-insensitively. */
export const SECRET_KEYS: ReadonlySet<string> = new Set([
	"api_key",
	"api_secret",
	"apikey",
	"apisecret",
	"secret",
	"password",
	"passphrase",
	"token",
	"signature",
]);

export interface StateStoreConfig {
	readonly filePath: string;
	readonly logger?: Logger;
}

/**
 * Returns a deep copy of `value` without any key in {@link SECRET_KEYS}.
 * @example stripSecrets({ api_key: "k", nested: { price: "1" } }) // { nested: { price: "1" } }
 */
export function stripSecrets(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(stripSecrets);
	if (value !== null && typeof value === "object") {
		const out: Record<string, unknown> = {};
		for (const [key, inner] of Object.entries(value)) {
			if (SECRET_KEYS.has(key.toLowerCase())) continue;
			out[key] = stripSecrets(inner);
		}
		return out;
	}
	return value;
}

export class StateStore {
	private readonly filePath: string;
	private readonly logger: Logger;
	private writeQueue: Promise<void> = Promise.resolve();
	private sequence = 0;

	constructor(config: StateStoreConfig) {
		this.filePath = config.filePath;
		this.logger = config.logger ?? silentLogger();
	}

	get path(): string {
		return this.filePath;
	}

	/**
	 * Writes `state` atomically. Concurrent calls land in call order; the
	 * returned promise settles with this call's own write.
	 */
	async save(state: EngineState): Promise<void> {
		const body = `${JSON.stringify(stripSecrets(state), null, 2)}\n`;
		const prev = this.writeQueue;
		const next = prev.catch(() => undefined).then(() => this.writeAtomic(body));
		this.writeQueue = next;
		await next;
	}

	/**
	 * Reads the last snapshot.
	 * @returns null when no snapshot exists yet
	 * @throws ValidationError when the file is not a valid snapshot
	 */
	async load(): Promise<EngineState | null> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (err: unknown) {
			if (isNodeError(err) && err.code === "ENOENT") return null;
			throw err;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (err: unknown) {
			throw new ValidationError(`State file ${this.filePath} is not valid JSON`, { cause: err });
		}
		const result = validate(EngineStateSchema, raw, `State file ${this.filePath}`);
		if (!result.ok) throw result.error;
		return result.value;
	}

	/** Waits for queued saves; write failures were already reported to their callers. */
	async flush(): Promise<void> {
		await this.writeQueue.catch(() => undefined);
	}

	private async writeAtomic(body: string): Promise<void> {
		this.sequence++;
		const tmp = `${this.filePath}.tmp-${process.pid}-${this.sequence}`;
		try {
			await mkdir(dirname(this.filePath), { recursive: true });
			await writeFile(tmp, body, "utf-8");
			await rename(tmp, this.filePath);
		} catch (err: unknown) {
			await rm(tmp, { force: true });
			const code = isNodeError(err) ? err.code : "UNKNOWN";
			this.logger.error({ path: this.filePath, code }, "state snapshot write failed");
			throw new Error(`State write to ${this.filePath} failed: [${code}] ${errorMessage(err)}`, { cause: err });
		}
	}
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

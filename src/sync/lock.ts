import { closeSync, rmSync } from "node:fs";
import { type FileHandle, open, readFile, rm, stat } from "node:fs/promises";
import { LockError, errorMessage, hasErrorCode } from "../errors.js";
import { log } from "../ui/logger.js";

export class LockHandle {
	private released = false;

	constructor(
		readonly path: string,
		readonly pid: number,
		private readonly file: FileHandle,
	) {}

	get isReleased(): boolean {
		return this.released;
	}

	async release(): Promise<void> {
		if (this.released) return;
		this.released = true;
		process.removeListener("exit", this.releaseOnExit);
		await this.file.close();
		await rm(this.path, { force: true });
	}

	/** Registered on process "exit", where only synchronous calls run. */
	readonly releaseOnExit = (): void => {
		if (this.released) return;
		this.released = true;
		closeSync(this.file.fd);
		rmSync(this.path, { force: true });
	};
}

type Holder = number | "empty" | "missing" | "invalid";

/** An empty lock file or takeover guard older than this was abandoned. */
const EMPTY_LOCK_GRACE_MS = 60_000;

const TAKEOVER_SUFFIX = ".takeover";

export type LockManagerOptions = {
	pid?: number;
	isAlive?: (pid: number) => boolean;
};

function processIsAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: the process exists but belongs to someone else
		return hasErrorCode(error, "EPERM");
	}
}

/**
 * Run-wide mutual exclusion through an exclusively created lock file that
 * records the holder's pid. Acquisition never waits. A file left behind by a
 * process that no longer exists is not a held lock and is taken over.
 */
export class LockManager {
	private readonly pid: number;
	private readonly isAlive: (pid: number) => boolean;

	constructor(options: LockManagerOptions = {}) {
		this.pid = options.pid ?? process.pid;
		this.isAlive = options.isAlive ?? processIsAlive;
	}

	async acquire(lockPath: string): Promise<LockHandle> {
		const file = await this.create(lockPath);
		if (file) return this.hold(lockPath, file);

		this.assertStale(lockPath, await this.readHolder(lockPath));
		return this.takeOver(lockPath);
	}

	/**
	 * Replaces a stale lock file. Removing by path is only safe for whoever
	 * holds the takeover guard, and the holder is read again under it: another
	 * run may have replaced the file since it was first read.
	 */
	private async takeOver(lockPath: string): Promise<LockHandle> {
		const guardPath = `${lockPath}${TAKEOVER_SUFFIX}`;
		const guard = await this.create(guardPath);
		if (!guard) {
			await this.clearAbandonedGuard(guardPath);
			throw new LockError(lockPath, `Another instance is taking over the lock (${guardPath})`);
		}

		try {
			const holder = await this.readHolder(lockPath);
			this.assertStale(lockPath, holder);
			if (holder !== "missing") {
				log.warn(`Removing stale lock file ${lockPath}`, undefined, { pid: holder });
				await rm(lockPath, { force: true });
			}

			const file = await this.create(lockPath);
			if (!file) {
				throw new LockError(lockPath, `Another instance is running (lock: ${lockPath})`);
			}
			return await this.hold(lockPath, file);
		} finally {
			await guard.close();
			await rm(guardPath, { force: true });
		}
	}

	/** A live pid, or a file whose holder has not written its pid yet, is a held lock. */
	private assertStale(lockPath: string, holder: Holder): void {
		if (holder === "empty" || (typeof holder === "number" && this.isAlive(holder))) {
			const pid = typeof holder === "number" ? `pid ${holder}, ` : "";
			throw new LockError(lockPath, `Another instance is running (${pid}lock: ${lockPath})`);
		}
	}

	/**
	 * A guard outlives a takeover only when its run died mid-way. It is removed
	 * without retrying, so the next run, not this one, takes the lock over.
	 */
	private async clearAbandonedGuard(guardPath: string): Promise<void> {
		let modifiedAt: number;
		try {
			modifiedAt = (await stat(guardPath)).mtimeMs;
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) return;
			throw error;
		}
		if (Date.now() - modifiedAt >= EMPTY_LOCK_GRACE_MS) {
			log.warn(`Removing abandoned lock takeover guard ${guardPath}`);
			await rm(guardPath, { force: true });
		}
	}

	async release(handle: LockHandle): Promise<void> {
		await handle.release();
	}

	private async create(lockPath: string): Promise<FileHandle | null> {
		try {
			return await open(lockPath, "wx", 0o644);
		} catch (error) {
			if (hasErrorCode(error, "EEXIST")) return null;
			throw new LockError(
				lockPath,
				`Unable to acquire lock ${lockPath}: ${errorMessage(error)}`,
				error,
			);
		}
	}

	private async hold(lockPath: string, file: FileHandle): Promise<LockHandle> {
		const handle = new LockHandle(lockPath, this.pid, file);
		process.once("exit", handle.releaseOnExit);
		try {
			await file.writeFile(String(this.pid), "utf8");
		} catch (error) {
			await handle.release();
			throw new LockError(
				lockPath,
				`Unable to write lock ${lockPath}: ${errorMessage(error)}`,
				error,
			);
		}
		return handle;
	}

	private async readHolder(lockPath: string): Promise<Holder> {
		let raw: string;
		let modifiedAt: number;
		try {
			raw = await readFile(lockPath, "utf8");
			modifiedAt = (await stat(lockPath)).mtimeMs;
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) return "missing";
			throw error;
		}

		const trimmed = raw.trim();
		if (!trimmed) {
			return Date.now() - modifiedAt < EMPTY_LOCK_GRACE_MS ? "empty" : "invalid";
		}
		const pid = Number.parseInt(trimmed, 10);
		return Number.isInteger(pid) && pid > 0 ? pid : "invalid";
	}
}


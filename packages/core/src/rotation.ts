/**
 * Size-rotated log files.
 *
 * The active file keeps its configured name. When a write would push it past
 * the size limit it is renamed to `<name>-<timestamp><ext>`, gzipped if
 * configured, and a fresh file is opened. Backups beyond the count or age
 * limits are deleted after each rotation.
 */

import {
	closeSync,
	existsSync,
	fstatSync,
	fsyncSync,
	mkdirSync,
	openSync,
	readdirSync,
	readFileSync,
	renameSync,
	rmSync,
	writeFileSync,
	writeSync,
} from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { gzipSync } from 'node:zlib';
import type { WriteSyncer } from '@shiplog/sdk';
import type { RotationConfig } from './config.js';

const MEGABYTE = 1024 * 1024;
const DAY_MS = 86_400_000;

/** Applied when a rotation config leaves maxSize at 0 */
export const DEFAULT_MAX_SIZE_MB = 100;

export interface RotatingFileWriterOptions {
	filename: string;
	/** Rotate once the file would exceed this many bytes */
	maxBytes: number;
	/** Delete backups older than this (0 = keep) */
	maxAgeMs?: number;
	/** Keep at most this many backups (0 = all) */
	maxBackups?: number;
	localTime?: boolean;
	compress?: boolean;
	clock?: () => Date;
}

export interface BackupFile {
	name: string;
	path: string;
	/** Time encoded in the file name */
	time: Date;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** True when appending `incoming` bytes to a non-empty file would pass `maxBytes`. */
export function needsRotation(currentBytes: number, incomingBytes: number, maxBytes: number): boolean {
	return maxBytes > 0 && currentBytes > 0 && currentBytes + incomingBytes > maxBytes;
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

function formatStamp(time: Date, localTime: boolean): string {
	const parts = localTime
		? [
				time.getFullYear(),
				time.getMonth() + 1,
				time.getDate(),
				time.getHours(),
				time.getMinutes(),
				time.getSeconds(),
				time.getMilliseconds(),
			]
		: [
				time.getUTCFullYear(),
				time.getUTCMonth() + 1,
				time.getUTCDate(),
				time.getUTCHours(),
				time.getUTCMinutes(),
				time.getUTCSeconds(),
				time.getUTCMilliseconds(),
			];
	const [year, month, day, hour, minute, second, ms] = parts;
	return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}-${pad(minute)}-${pad(second)}.${pad(ms, 3)}`;
}

const STAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2})-(\d{2})-(\d{2})\.(\d{3})$/;

function parseStamp(stamp: string, localTime: boolean): Date | null {
	const match = STAMP.exec(stamp);
	if (!match) return null;
	const [year, month, day, hour, minute, second, ms] = match.slice(1).map(Number);
	return localTime
		? new Date(year, month - 1, day, hour, minute, second, ms)
		: new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
}

/** `app.log` rotated at `time` → `app-2024-03-01T10-15-30.250.log` */
export function backupName(filename: string, time: Date, localTime: boolean): string {
	const ext = extname(filename);
	const prefix = basename(filename, ext);
	return `${prefix}-${formatStamp(time, localTime)}${ext}`;
}

/**
 * Backups of `filename` in its directory, newest first. Compressed backups
 * (`.gz`) are included.
 */
export function listBackups(filename: string, localTime: boolean): BackupFile[] {
	const dir = dirname(filename);
	if (!existsSync(dir)) return [];

	const ext = extname(filename);
	const prefix = `${basename(filename, ext)}-`;
	const backups: BackupFile[] = [];

	for (const name of readdirSync(dir)) {
		if (!name.startsWith(prefix)) continue;
		const rest = name.slice(prefix.length);
		const stamp = rest.endsWith(`${ext}.gz`)
			? rest.slice(0, rest.length - ext.length - 3)
			: rest.endsWith(ext)
				? rest.slice(0, rest.length - ext.length)
				: null;
		if (stamp === null) continue;
		const time = parseStamp(stamp, localTime);
		if (time) backups.push({ name, path: join(dir, name), time });
	}

	return backups.sort((a, b) => b.time.getTime() - a.time.getTime());
}

/** Writer options for one file under a declarative rotation block. */
export function rotatingWriterOptions(
	filename: string,
	rotation: RotationConfig,
): RotatingFileWriterOptions {
	return {
		filename,
		maxBytes: (rotation.maxSize > 0 ? rotation.maxSize : DEFAULT_MAX_SIZE_MB) * MEGABYTE,
		maxAgeMs: rotation.maxAge * DAY_MS,
		maxBackups: rotation.maxBackups,
		localTime: rotation.localTime,
		compress: rotation.compress,
	};
}

// ─── RotatingFileWriter ───────────────────────────────────────────────────────

export class RotatingFileWriter implements WriteSyncer {
	readonly filename: string;
	private readonly maxBytes: number;
	private readonly maxAgeMs: number;
	private readonly maxBackups: number;
	private readonly localTime: boolean;
	private readonly compress: boolean;
	private readonly clock: () => Date;
	private fd: number | null = null;
	private size = 0;

	constructor(options: RotatingFileWriterOptions) {
		this.filename = options.filename;
		this.maxBytes = options.maxBytes;
		this.maxAgeMs = options.maxAgeMs ?? 0;
		this.maxBackups = options.maxBackups ?? 0;
		this.localTime = options.localTime ?? false;
		this.compress = options.compress ?? false;
		this.clock = options.clock ?? (() => new Date());
	}

	/** Bytes in the active file */
	get currentSize(): number {
		return this.size;
	}

	write(payload: string | Uint8Array): number {
		const data = typeof payload === 'string' ? Buffer.from(payload) : payload;
		const fd = this.fd ?? this.open();

		if (needsRotation(this.size, data.byteLength, this.maxBytes)) {
			this.rotate();
			return this.write(data);
		}

		writeSync(fd, data);
		this.size += data.byteLength;
		return data.byteLength;
	}

	sync(): void {
		if (this.fd !== null) fsyncSync(this.fd);
	}

	close(): void {
		if (this.fd === null) return;
		closeSync(this.fd);
		this.fd = null;
	}

	/** Move the active file to a backup now and start a fresh one. */
	rotate(): void {
		this.close();

		if (existsSync(this.filename)) {
			const backup = join(dirname(this.filename), backupName(this.filename, this.clock(), this.localTime));
			renameSync(this.filename, backup);
			if (this.compress) {
				writeFileSync(`${backup}.gz`, gzipSync(readFileSync(backup)));
				rmSync(backup, { force: true });
			}
		}

		this.open();
		this.prune();
	}

	private open(): number {
		mkdirSync(dirname(this.filename), { recursive: true });
		const fd = openSync(this.filename, 'a');
		this.fd = fd;
		this.size = fstatSync(fd).size;
		return fd;
	}

	private prune(): void {
		if (this.maxBackups <= 0 && this.maxAgeMs <= 0) return;

		const backups = listBackups(this.filename, this.localTime);
		const cutoff = this.clock().getTime() - this.maxAgeMs;
		backups.forEach((backup, index) => {
			const tooMany = this.maxBackups > 0 && index >= this.maxBackups;
			const tooOld = this.maxAgeMs > 0 && backup.time.getTime() < cutoff;
			if (tooMany || tooOld) {
				rmSync(backup.path, { force: true });
			}
		});
	}
}

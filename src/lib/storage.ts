/**
 * storage layer
 *
 * one json file per user, article and comment, plus single-file tables
 * for sessions and redeemed reset tokens. everything read back is checked
 * against its zod schema.
 */

import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { z } from "zod";
import {
	type Article,
	ArticleSchema,
	type Comment,
	CommentSchema,
	type SessionsTable,
	SessionsTableSchema,
	type UsedResetTokensTable,
	UsedResetTokensTableSchema,
	type User,
	UserSchema,
} from "./schemas.ts";

export interface StorageConfig {
	dataDir: string;
	userDir: string;
	articleDir: string;
	commentDir: string;
}

export function createStorageConfig(baseDir: string = "data"): StorageConfig {
	return {
		dataDir: baseDir,
		userDir: join(baseDir, "users"),
		articleDir: join(baseDir, "articles"),
		commentDir: join(baseDir, "comments"),
	};
}

export async function ensureStorageDirs(config: StorageConfig): Promise<void> {
	await mkdir(config.dataDir, { recursive: true });
	await mkdir(config.userDir, { recursive: true });
	await mkdir(config.articleDir, { recursive: true });
	await mkdir(config.commentDir, { recursive: true });
}

function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * generic json file loader with zod validation, null when the file is missing
 */
export async function loadJson<T>(
	path: string,
	schema: z.ZodType<T>,
): Promise<T | null> {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error) {
		if (isNotFound(error)) {
			return null;
		}
		throw error;
	}
	return schema.parse(JSON.parse(text));
}

/**
 * generic json file saver with zod validation
 */
export async function saveJson<T>(
	path: string,
	data: T,
	schema: z.ZodType<T>,
): Promise<void> {
	// validate before saving
	schema.parse(data);
	await mkdir(dirname(path), { recursive: true });
	const text = JSON.stringify(data, null, "\t");
	await writeFile(path, text, "utf8");
}

/**
 * remove a file, ignoring one that is already gone
 */
export async function removeFile(path: string): Promise<void> {
	await rm(path, { force: true });
}

/**
 * list the json files in a directory, without their extension
 */
export async function listDir(path: string): Promise<string[]> {
	let names: string[];
	try {
		names = await readdir(path);
	} catch (error) {
		if (isNotFound(error)) {
			return [];
		}
		throw error;
	}
	return names
		.filter((name) => name.endsWith(".json"))
		.map((name) => name.slice(0, -5));
}

/**
 * numeric record ids in a directory, ascending
 */
export async function listIds(dir: string): Promise<number[]> {
	const names = await listDir(dir);
	const ids = names.map((n) => parseInt(n, 10)).filter((n) => !isNaN(n));
	return ids.sort((a, b) => a - b);
}

function recordPath(dir: string, id: number): string {
	return join(dir, `${id}.json`);
}

// =============================================================================
// Users
// =============================================================================

export async function loadUser(
	config: StorageConfig,
	id: number,
): Promise<User | null> {
	return loadJson(recordPath(config.userDir, id), UserSchema);
}

export async function saveUser(
	config: StorageConfig,
	user: User,
): Promise<void> {
	await saveJson(recordPath(config.userDir, user.id), user, UserSchema);
}

// =============================================================================
// Articles
// =============================================================================

export async function loadArticle(
	config: StorageConfig,
	id: number,
): Promise<Article | null> {
	return loadJson(recordPath(config.articleDir, id), ArticleSchema);
}

export async function saveArticle(
	config: StorageConfig,
	article: Article,
): Promise<void> {
	await saveJson(
		recordPath(config.articleDir, article.id),
		article,
		ArticleSchema,
	);
}

export async function removeArticle(
	config: StorageConfig,
	id: number,
): Promise<void> {
	await removeFile(recordPath(config.articleDir, id));
}

// =============================================================================
// Comments
// =============================================================================

export async function loadComment(
	config: StorageConfig,
	id: number,
): Promise<Comment | null> {
	return loadJson(recordPath(config.commentDir, id), CommentSchema);
}

export async function saveComment(
	config: StorageConfig,
	comment: Comment,
): Promise<void> {
	await saveJson(
		recordPath(config.commentDir, comment.id),
		comment,
		CommentSchema,
	);
}

export async function removeComment(
	config: StorageConfig,
	id: number,
): Promise<void> {
	await removeFile(recordPath(config.commentDir, id));
}

// =============================================================================
// Tables
// =============================================================================

export async function loadSessions(
	config: StorageConfig,
): Promise<SessionsTable> {
	const path = join(config.dataDir, "sessions.json");
	return (await loadJson(path, SessionsTableSchema)) ?? {};
}

export async function saveSessions(
	config: StorageConfig,
	sessions: SessionsTable,
): Promise<void> {
	const path = join(config.dataDir, "sessions.json");
	await saveJson(path, sessions, SessionsTableSchema);
}

/**
 * usernames listed in the staff file, one or more per line
 */
export async function loadStaffList(config: StorageConfig): Promise<string[]> {
	let text: string;
	try {
		text = await readFile(join(config.dataDir, "staff"), "utf8");
	} catch (error) {
		if (isNotFound(error)) {
			return [];
		}
		throw error;
	}
	return text.split(/\s+/).filter((s) => s.length > 0);
}

export async function loadUsedResetTokens(
	config: StorageConfig,
): Promise<UsedResetTokensTable> {
	const path = join(config.dataDir, "used-reset-tokens.json");
	return (await loadJson(path, UsedResetTokensTableSchema)) ?? {};
}

export async function saveUsedResetTokens(
	config: StorageConfig,
	tokens: UsedResetTokensTable,
): Promise<void> {
	const path = join(config.dataDir, "used-reset-tokens.json");
	await saveJson(path, tokens, UsedResetTokensTableSchema);
}

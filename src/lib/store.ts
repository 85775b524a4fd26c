/**
 * in-memory tables backed by the storage layer
 *
 * everything is loaded once at startup. each mutation updates the tables
 * and is written through to disk before the promise resolves.
 */

import {
	ensureStorageDirs,
	listIds,
	loadArticle,
	loadComment,
	loadSessions,
	loadUsedResetTokens,
	loadUser,
	removeArticle,
	removeComment,
	saveArticle,
	saveComment,
	saveSessions,
	saveUsedResetTokens,
	saveUser,
	type StorageConfig,
} from "./storage.ts";
import type {
	Article,
	Comment,
	PasswordEntry,
	Session,
	SessionsTable,
	UsedResetTokensTable,
	User,
} from "./schemas.ts";

export interface NewUser {
	username: string;
	email: string;
	age: number | null;
	password: PasswordEntry;
	isStaff?: boolean;
}

export interface NewArticle {
	title: string;
	body: string;
	authorId: number;
}

export interface NewComment {
	comment: string;
	articleId: number;
	authorId: number;
}

async function loadAll<T>(
	ids: number[],
	load: (id: number) => Promise<T | null>,
): Promise<T[]> {
	const records: T[] = [];
	for (const id of ids) {
		const record = await load(id);
		if (record) records.push(record);
	}
	return records;
}

function maxId(ids: Iterable<number>): number {
	let max = 0;
	for (const id of ids) {
		if (id > max) max = id;
	}
	return max;
}

export class Store {
	private users = new Map<number, User>();
	private articles = new Map<number, Article>();
	private comments = new Map<number, Comment>();
	private sessions: SessionsTable = {};
	private usedResetTokens: UsedResetTokensTable = {};
	private lastUserId = 0;
	private lastArticleId = 0;
	private lastCommentId = 0;

	constructor(private readonly config: StorageConfig) {}

	/**
	 * create the data directories and load every table
	 */
	static async open(config: StorageConfig): Promise<Store> {
		const store = new Store(config);
		await store.load();
		return store;
	}

	private async load(): Promise<void> {
		const config = this.config;
		await ensureStorageDirs(config);

		const users = await loadAll(
			await listIds(config.userDir),
			(id) => loadUser(config, id),
		);
		for (const user of users) this.users.set(user.id, user);

		const articles = await loadAll(
			await listIds(config.articleDir),
			(id) => loadArticle(config, id),
		);
		for (const article of articles) this.articles.set(article.id, article);

		const comments = await loadAll(
			await listIds(config.commentDir),
			(id) => loadComment(config, id),
		);
		for (const comment of comments) this.comments.set(comment.id, comment);

		this.sessions = await loadSessions(config);
		this.usedResetTokens = await loadUsedResetTokens(config);

		this.lastUserId = maxId(this.users.keys());
		this.lastArticleId = maxId(this.articles.keys());
		this.lastCommentId = maxId(this.comments.keys());
	}

	// ===========================================================================
	// Users
	// ===========================================================================

	getUser(id: number): User | null {
		return this.users.get(id) ?? null;
	}

	/**
	 * usernames are unique without regard to case
	 */
	findUserByUsername(username: string): User | null {
		const wanted = username.toLowerCase();
		for (const user of this.users.values()) {
			if (user.username.toLowerCase() === wanted) return user;
		}
		return null;
	}

	findUsersByEmail(email: string): User[] {
		const wanted = email.toLowerCase();
		return [...this.users.values()].filter((user) =>
			user.email !== "" && user.email.toLowerCase() === wanted
		);
	}

	listUsers(): User[] {
		return [...this.users.values()];
	}

	async createUser(input: NewUser): Promise<User> {
		const user: User = {
			id: ++this.lastUserId,
			username: input.username,
			email: input.email,
			password: input.password,
			age: input.age,
			isStaff: input.isStaff ?? false,
			dateJoined: new Date().toISOString(),
		};
		await saveUser(this.config, user);
		this.users.set(user.id, user);
		return user;
	}

	async setPassword(userId: number, password: PasswordEntry): Promise<User> {
		const user = this.users.get(userId);
		if (!user) {
			throw new Error(`No user with id ${userId}`);
		}
		const updated = { ...user, password };
		await saveUser(this.config, updated);
		this.users.set(userId, updated);
		return updated;
	}

	async setStaff(userId: number, isStaff: boolean): Promise<User> {
		const user = this.users.get(userId);
		if (!user) {
			throw new Error(`No user with id ${userId}`);
		}
		const updated = { ...user, isStaff };
		await saveUser(this.config, updated);
		this.users.set(userId, updated);
		return updated;
	}

	// ===========================================================================
	// Articles
	// ===========================================================================

	getArticle(id: number): Article | null {
		return this.articles.get(id) ?? null;
	}

	/**
	 * all articles in the order they were written
	 */
	listArticles(): Article[] {
		return [...this.articles.values()].sort((a, b) => a.id - b.id);
	}

	async createArticle(input: NewArticle): Promise<Article> {
		const article: Article = {
			id: ++this.lastArticleId,
			title: input.title,
			body: input.body,
			date: new Date().toISOString(),
			authorId: input.authorId,
		};
		await saveArticle(this.config, article);
		this.articles.set(article.id, article);
		return article;
	}

	/**
	 * change title and body; owner and date stay as they were
	 */
	async updateArticle(
		id: number,
		changes: { title: string; body: string },
	): Promise<Article> {
		const article = this.articles.get(id);
		if (!article) {
			throw new Error(`No article with id ${id}`);
		}
		const updated = { ...article, title: changes.title, body: changes.body };
		await saveArticle(this.config, updated);
		this.articles.set(id, updated);
		return updated;
	}

	/**
	 * delete an article together with its comments
	 */
	async deleteArticle(id: number): Promise<boolean> {
		if (!this.articles.has(id)) return false;
		for (const comment of this.commentsFor(id)) {
			await removeComment(this.config, comment.id);
			this.comments.delete(comment.id);
		}
		await removeArticle(this.config, id);
		this.articles.delete(id);
		return true;
	}

	// ===========================================================================
	// Comments
	// ===========================================================================

	/**
	 * comments on an article, oldest first
	 */
	commentsFor(articleId: number): Comment[] {
		return [...this.comments.values()]
			.filter((comment) => comment.articleId === articleId)
			.sort((a, b) => a.id - b.id);
	}

	async createComment(input: NewComment): Promise<Comment> {
		if (!this.articles.has(input.articleId)) {
			throw new Error(`No article with id ${input.articleId}`);
		}
		if (!this.users.has(input.authorId)) {
			throw new Error(`No user with id ${input.authorId}`);
		}
		const comment: Comment = {
			id: ++this.lastCommentId,
			comment: input.comment,
			articleId: input.articleId,
			authorId: input.authorId,
		};
		await saveComment(this.config, comment);
		this.comments.set(comment.id, comment);
		return comment;
	}

	// ===========================================================================
	// Sessions
	// ===========================================================================

	getSession(token: string): Session | null {
		return this.sessions[token] ?? null;
	}

	/**
	 * store a session and drop the ones that expired by the time it was made
	 */
	async putSession(
		session: Session,
		now: number = session.created,
	): Promise<void> {
		for (const [token, existing] of Object.entries(this.sessions)) {
			if (existing.expires <= now) delete this.sessions[token];
		}
		this.sessions[session.token] = session;
		await saveSessions(this.config, this.sessions);
	}

	async deleteSession(token: string): Promise<void> {
		if (!(token in this.sessions)) return;
		delete this.sessions[token];
		await saveSessions(this.config, this.sessions);
	}

	/**
	 * end every session of a user, optionally sparing one
	 */
	async deleteSessionsFor(userId: number, keep?: string): Promise<number> {
		let removed = 0;
		for (const [token, session] of Object.entries(this.sessions)) {
			if (session.userId === userId && token !== keep) {
				delete this.sessions[token];
				removed++;
			}
		}
		if (removed > 0) {
			await saveSessions(this.config, this.sessions);
		}
		return removed;
	}

	// ===========================================================================
	// Password reset tokens
	// ===========================================================================

	isResetTokenUsed(jti: string): boolean {
		return jti in this.usedResetTokens;
	}

	/**
	 * record a redeemed token and drop records that have expired
	 */
	async markResetTokenUsed(
		jti: string,
		expires: number,
		now: number,
	): Promise<void> {
		for (const [id, exp] of Object.entries(this.usedResetTokens)) {
			if (exp < now) delete this.usedResetTokens[id];
		}
		this.usedResetTokens[jti] = expires;
		await saveUsedResetTokens(this.config, this.usedResetTokens);
	}
}

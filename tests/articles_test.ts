/**
 * tests for article and comment operations
 */

import assert from "node:assert/strict";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { articleAuthorizer } from "../src/lib/access.ts";
import {
	addComment,
	type ArticleContext,
	articleView,
	createArticle,
	deleteArticle,
	getArticleDetail,
	listArticles,
	updateArticle,
} from "../src/lib/articles.ts";
import { createStorageConfig } from "../src/lib/storage.ts";
import { Store } from "../src/lib/store.ts";
import type { Article, User } from "../src/lib/schemas.ts";

let testDir: string;
let store: Store;
let ctx: ArticleContext;
let alice: User;
let bob: User;

beforeEach(async () => {
	testDir = await mkdtemp(join(tmpdir(), "broadsheet_articles_test_"));
	store = await Store.open(createStorageConfig(testDir));
	ctx = { store, authorizer: articleAuthorizer };
	const password = {
		algorithm: "pbkdf2-sha256" as const,
		iterations: 1000,
		salt: "00",
		hash: "11",
	};
	alice = await store.createUser({ username: "alice", email: "", age: null, password });
	bob = await store.createUser({ username: "bob", email: "", age: null, password });
});

afterEach(async () => {
	await rm(testDir, { recursive: true, force: true });
});

function args(values: Record<string, string>): Map<string, string> {
	return new Map(Object.entries(values));
}

async function write(author: User, title: string = "Headline"): Promise<Article> {
	return store.createArticle({ title, body: "Body text.", authorId: author.id });
}

// =============================================================================
// Create
// =============================================================================

test("createArticle - the requester becomes the owner", async () => {
	const outcome = await createArticle(
		ctx,
		alice,
		args({ title: "Headline", body: "Body text.", authorId: String(bob.id) }),
	);
	assert.equal(outcome.success, true);
	if (!outcome.success) return;
	assert.equal(outcome.value.authorId, alice.id);
	assert.equal(store.listArticles().length, 1);
});

test("createArticle - anonymous requesters must log in", async () => {
	const outcome = await createArticle(
		ctx,
		null,
		args({ title: "Headline", body: "Body text." }),
	);
	assert.deepEqual(outcome, { success: false, error: "login" });
	assert.equal(store.listArticles().length, 0);
});

test("createArticle - an empty body persists nothing", async () => {
	const outcome = await createArticle(ctx, alice, args({ title: "Headline" }));
	assert.deepEqual(outcome, {
		success: false,
		error: "invalid",
		errors: { body: ["This field is required."] },
		values: { title: "Headline", body: "" },
	});
	assert.equal(store.listArticles().length, 0);
});

// =============================================================================
// Read
// =============================================================================

test("listArticles - every article with its author", async () => {
	await write(alice, "first");
	await write(bob, "second");
	const outcome = listArticles(ctx, bob);
	assert.equal(outcome.success, true);
	if (!outcome.success) return;
	assert.deepEqual(
		outcome.value.map((v) => [v.article.title, v.author]),
		[["first", "alice"], ["second", "bob"]],
	);
});

test("listArticles - anonymous requesters must log in", () => {
	assert.deepEqual(listArticles(ctx, null), { success: false, error: "login" });
});

test("getArticleDetail - login comes before the lookup", () => {
	assert.deepEqual(getArticleDetail(ctx, null, 99), {
		success: false,
		error: "login",
	});
	assert.deepEqual(getArticleDetail(ctx, alice, 99), {
		success: false,
		error: "not-found",
	});
});

test("articleView - names a missing author", async () => {
	const article = await store.createArticle({
		title: "orphan",
		body: "text",
		authorId: 77,
	});
	assert.equal(articleView(store, article).author, "[deleted]");
});

// =============================================================================
// Comments
// =============================================================================

test("addComment - any user may comment, authored by them", async () => {
	const article = await write(alice);
	const outcome = await addComment(ctx, bob, article.id, args({ comment: "Nice." }));
	assert.equal(outcome.success, true);

	const detail = getArticleDetail(ctx, alice, article.id);
	assert.equal(detail.success, true);
	if (!detail.success) return;
	assert.deepEqual(
		detail.value.comments.map((c) => [c.comment.comment, c.author]),
		[["Nice.", "bob"]],
	);
});

test("addComment - invalid comment persists nothing", async () => {
	const article = await write(alice);
	const outcome = await addComment(ctx, bob, article.id, args({ comment: " " }));
	assert.equal(outcome.success, false);
	if (outcome.success) return;
	assert.equal(outcome.error, "invalid");
	assert.deepEqual(store.commentsFor(article.id), []);
});

test("addComment - unknown article", async () => {
	const outcome = await addComment(ctx, bob, 99, args({ comment: "Nice." }));
	assert.deepEqual(outcome, { success: false, error: "not-found" });
});

// =============================================================================
// Update and delete
// =============================================================================

test("updateArticle - owner changes title and body", async () => {
	const article = await write(alice);
	const outcome = await updateArticle(
		ctx,
		alice,
		article.id,
		args({ title: "New", body: "New body." }),
	);
	assert.equal(outcome.success, true);
	assert.equal(store.getArticle(article.id)?.title, "New");
	assert.equal(store.getArticle(article.id)?.authorId, alice.id);
});

test("updateArticle - others are forbidden and nothing changes", async () => {
	const article = await write(alice);
	const outcome = await updateArticle(
		ctx,
		bob,
		article.id,
		args({ title: "Hijacked", body: "text" }),
	);
	assert.deepEqual(outcome, { success: false, error: "forbidden" });
	assert.equal(store.getArticle(article.id)?.title, "Headline");
});

test("updateArticle - ownership is checked before the form", async () => {
	const article = await write(alice);
	const outcome = await updateArticle(ctx, bob, article.id, args({}));
	assert.deepEqual(outcome, { success: false, error: "forbidden" });
});

test("deleteArticle - owner removes the article and its comments", async () => {
	const article = await write(alice);
	await addComment(ctx, bob, article.id, args({ comment: "one" }));
	await addComment(ctx, alice, article.id, args({ comment: "two" }));

	const outcome = await deleteArticle(ctx, alice, article.id);
	assert.equal(outcome.success, true);
	assert.equal(store.getArticle(article.id), null);
	assert.deepEqual(store.commentsFor(article.id), []);
});

test("deleteArticle - others are forbidden", async () => {
	const article = await write(alice);
	assert.deepEqual(await deleteArticle(ctx, bob, article.id), {
		success: false,
		error: "forbidden",
	});
	assert.deepEqual(await deleteArticle(ctx, null, article.id), {
		success: false,
		error: "login",
	});
	assert.notEqual(store.getArticle(article.id), null);
});

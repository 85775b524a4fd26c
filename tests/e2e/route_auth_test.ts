/**
 * e2e tests for route authentication requirements
 *
 * tests:
 * - public routes accessible without auth
 * - article routes send anonymous users to log in and back
 * - owner-only routes refuse other users
 * - csrf, unknown paths and methods
 */

import assert from "node:assert/strict";
import { after, before, test } from "node:test";
import {
	createUser,
	makeRequest,
	postArticle,
	startTestSite,
	type TestSite,
} from "./setup.ts";

let site: TestSite;
let ownerSession: string;
let otherSession: string;
let articleId: number;

before(async () => {
	site = await startTestSite();
	ownerSession = (await createUser(site, "owner")).session;
	otherSession = (await createUser(site, "reader")).session;
	articleId = await postArticle(site, ownerSession, "Owned");
});

after(async () => {
	await site.cleanup();
});

// =============================================================================
// Public routes
// =============================================================================

test("public - home page without auth", async () => {
	const response = await makeRequest(site, "/");
	assert.equal(response.status, 200);
	assert.ok(response.body.includes("<p>You are not logged in.</p>"));
});

test("public - home page greets a logged in user", async () => {
	const response = await makeRequest(site, "/", { session: ownerSession });
	assert.ok(response.body.includes("<h1>Hi owner!</h1>"));
});

for (const path of [
	"/accounts/login/",
	"/accounts/signup/",
	"/accounts/password_reset/",
	"/accounts/password_reset/done/",
	"/accounts/reset/done/",
]) {
	test(`public - ${path} accessible without auth`, async () => {
		const response = await makeRequest(site, path);
		assert.equal(response.status, 200);
	});
}

test("public - stylesheet", async () => {
	const response = await makeRequest(site, "/static/style.css");
	assert.equal(response.status, 200);
	assert.equal(response.headers.get("Content-Type"), "text/css; charset=utf-8");
});

// =============================================================================
// Login required
// =============================================================================

for (const path of [
	"/articles/",
	"/articles/new/",
	"/articles/details/1",
	"/articles/edit/1",
	"/articles/delete/1",
	"/accounts/password_change/",
]) {
	test(`login - GET ${path} redirects anonymous users`, async () => {
		const response = await makeRequest(site, path);
		assert.equal(response.status, 302);
		assert.equal(response.location, `/accounts/login/?next=${path}`);
	});
}

test("login - unknown ids still redirect anonymous users", async () => {
	const response = await makeRequest(site, "/articles/edit/999");
	assert.equal(response.location, "/accounts/login/?next=/articles/edit/999");
});

test("login - next keeps the query string", async () => {
	const response = await makeRequest(site, "/articles/?page=2");
	assert.equal(response.location, "/accounts/login/?next=/articles/%3Fpage%3D2");
});

test("login - anonymous posts create nothing", async () => {
	const before = site.app.store.listArticles().length;
	const response = await makeRequest(site, "/articles/new/", {
		form: { title: "Anonymous", body: "text" },
	});
	assert.equal(response.location, "/accounts/login/?next=/articles/new/");
	assert.equal(site.app.store.listArticles().length, before);
});

test("login - anonymous comments are refused", async () => {
	const response = await makeRequest(site, `/articles/details/${articleId}`, {
		form: { comment: "drive-by" },
	});
	assert.equal(response.status, 302);
	assert.deepEqual(site.app.store.commentsFor(articleId), []);
});

// =============================================================================
// Owner only
// =============================================================================

test("owner - others get 403 on edit and delete pages", async () => {
	for (const action of ["edit", "delete"]) {
		const response = await makeRequest(site, `/articles/${action}/${articleId}`, {
			session: otherSession,
		});
		assert.equal(response.status, 403, action);
		assert.ok(
			response.body.includes("<p>You don&#39;t have permission to do that.</p>"),
		);
	}
});

test("owner - the owner reaches edit and delete pages", async () => {
	for (const action of ["edit", "delete"]) {
		const response = await makeRequest(site, `/articles/${action}/${articleId}`, {
			session: ownerSession,
		});
		assert.equal(response.status, 200, action);
	}
});

test("owner - unknown ids are 404 for logged in users", async () => {
	const response = await makeRequest(site, "/articles/edit/999", {
		session: ownerSession,
	});
	assert.equal(response.status, 404);
});

test("signup - forbidden while logged in", async () => {
	const users = site.app.store.listUsers().length;
	const get = await makeRequest(site, "/accounts/signup/", { session: ownerSession });
	assert.equal(get.status, 403);
	const post = await makeRequest(site, "/accounts/signup/", {
		session: ownerSession,
		form: {
			username: "sneaky",
			password1: "test-password",
			password2: "test-password",
		},
	});
	assert.equal(post.status, 403);
	assert.equal(site.app.store.listUsers().length, users);
});

// =============================================================================
// Request checks
// =============================================================================

test("csrf - a post without the token is refused", async (t) => {
	t.mock.method(console, "error", () => {});
	const response = await makeRequest(site, "/articles/new/", {
		session: ownerSession,
		form: { title: "Forged", body: "text" },
		csrf: null,
	});
	assert.equal(response.status, 403);
	assert.equal(
		site.app.store.listArticles().some((a) => a.title === "Forged"),
		false,
	);
});

test("csrf - a first visit sets the cookie", async () => {
	const response = await makeRequest(site, "/accounts/login/", {
		cookies: { csrftoken: "" },
	});
	const token = response.cookies.get("csrftoken");
	assert.match(token ?? "", /^[0-9a-f]{64}$/);
	assert.ok(response.body.includes(`name="csrfmiddlewaretoken" value="${token}"`));
});

test("paths - non-numeric ids are 404", async () => {
	const response = await makeRequest(site, "/articles/details/abc");
	assert.equal(response.status, 404);
});

test("paths - unknown paths render the 404 page", async () => {
	const response = await makeRequest(site, "/nowhere/");
	assert.equal(response.status, 404);
	assert.ok(response.body.includes("<h1>404 Not Found</h1>"));
});

test("paths - unsupported methods are 405", async () => {
	const response = await makeRequest(site, "/articles/", { method: "DELETE" });
	assert.equal(response.status, 405);
	assert.equal(response.headers.get("Allow"), "GET");
});

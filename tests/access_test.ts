/**
 * tests for access decisions
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
	type Action,
	articleAuthorizer,
	authorize,
	isOwner,
} from "../src/lib/access.ts";
import type { Article, User } from "../src/lib/schemas.ts";

function user(id: number): User {
	return {
		id,
		username: `user${id}`,
		email: "",
		password: {
			algorithm: "pbkdf2-sha256",
			iterations: 1000,
			salt: "00",
			hash: "11",
		},
		age: null,
		isStaff: false,
		dateJoined: "2024-03-04T09:05:00.000Z",
	};
}

const owner = user(1);
const other = user(2);

const article: Article = {
	id: 10,
	title: "Headline",
	body: "Body text.",
	date: "2024-03-04T09:05:00.000Z",
	authorId: owner.id,
};

const ALLOW = { allow: true };
const LOGIN = { allow: false, reason: "login" };
const FORBIDDEN = { allow: false, reason: "forbidden" };

test("isOwner - only the author owns an article", () => {
	assert.equal(isOwner(owner, article), true);
	assert.equal(isOwner(other, article), false);
	assert.equal(isOwner(null, article), false);
});

test("authorize - create-account is for anonymous requesters only", () => {
	assert.deepEqual(authorize(null, null, "create-account"), ALLOW);
	assert.deepEqual(authorize(owner, null, "create-account"), FORBIDDEN);
});

test("authorize - reading and writing need a login", () => {
	const actions: Action[] = ["create", "read-list", "read-detail", "comment"];
	for (const action of actions) {
		assert.deepEqual(authorize(null, article, action), LOGIN, action);
		assert.deepEqual(authorize(other, article, action), ALLOW, action);
	}
});

test("authorize - update and delete are for the owner", () => {
	for (const action of ["update", "delete"] as const) {
		assert.deepEqual(authorize(null, article, action), LOGIN, action);
		assert.deepEqual(authorize(other, article, action), FORBIDDEN, action);
		assert.deepEqual(authorize(owner, article, action), ALLOW, action);
	}
});

test("authorize - update without an article is forbidden", () => {
	assert.deepEqual(authorize(owner, null, "update"), FORBIDDEN);
});

test("authorize - follows the article's current author", () => {
	const handedOver = { ...article, authorId: other.id };
	assert.deepEqual(authorize(owner, handedOver, "delete"), FORBIDDEN);
	assert.deepEqual(authorize(other, handedOver, "delete"), ALLOW);
});

test("authorize - admin is for staff only", () => {
	const staff = { ...user(3), isStaff: true };
	assert.deepEqual(authorize(null, null, "admin"), LOGIN);
	assert.deepEqual(authorize(owner, null, "admin"), FORBIDDEN);
	assert.deepEqual(authorize(staff, null, "admin"), ALLOW);
});

test("articleAuthorizer - delegates to authorize", () => {
	assert.deepEqual(articleAuthorizer.createAccount(null), ALLOW);
	assert.deepEqual(articleAuthorizer.createArticle(null), LOGIN);
	assert.deepEqual(articleAuthorizer.listArticles(other), ALLOW);
	assert.deepEqual(articleAuthorizer.readArticle(other, article), ALLOW);
	assert.deepEqual(articleAuthorizer.addComment(null, article), LOGIN);
	assert.deepEqual(articleAuthorizer.updateArticle(other, article), FORBIDDEN);
	assert.deepEqual(articleAuthorizer.deleteArticle(owner, article), ALLOW);
	assert.deepEqual(articleAuthorizer.viewAdmin(owner), FORBIDDEN);
});

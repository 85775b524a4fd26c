/**
 * access control for accounts and articles
 *
 * decisions are pure functions of the requester and the target; nothing is
 * cached, so ownership is checked against the article as stored right now.
 */

import type { Article, User } from "./schemas.ts";

/**
 * the logged-in user, or null for an anonymous request
 */
export type Requester = User | null;

export type Action =
	| "create-account"
	| "create"
	| "read-list"
	| "read-detail"
	| "comment"
	| "update"
	| "delete"
	| "admin";

/**
 * login: send the requester to the login page and back afterwards.
 * forbidden: refuse outright.
 */
export type DenyReason = "login" | "forbidden";

export type Decision =
	| { allow: true }
	| { allow: false; reason: DenyReason };

const ALLOW: Decision = { allow: true };

function deny(reason: DenyReason): Decision {
	return { allow: false, reason };
}

export function isOwner(requester: Requester, article: Article): boolean {
	return requester !== null && requester.id === article.authorId;
}

/**
 * decide whether a requester may perform an action on a resource
 */
export function authorize(
	requester: Requester,
	resource: Article | null,
	action: Action,
): Decision {
	switch (action) {
		case "create-account":
			return requester === null ? ALLOW : deny("forbidden");
		case "create":
		case "read-list":
		case "read-detail":
		case "comment":
			return requester === null ? deny("login") : ALLOW;
		case "update":
		case "delete":
			if (requester === null) return deny("login");
			if (resource === null || !isOwner(requester, resource)) {
				return deny("forbidden");
			}
			return ALLOW;
		case "admin":
			if (requester === null) return deny("login");
			return requester.isStaff ? ALLOW : deny("forbidden");
	}
}

/**
 * one check per operation the site exposes
 */
export interface Authorizer {
	createAccount(requester: Requester): Decision;
	createArticle(requester: Requester): Decision;
	listArticles(requester: Requester): Decision;
	readArticle(requester: Requester, article: Article): Decision;
	addComment(requester: Requester, article: Article): Decision;
	updateArticle(requester: Requester, article: Article): Decision;
	deleteArticle(requester: Requester, article: Article): Decision;
	viewAdmin(requester: Requester): Decision;
}

export const articleAuthorizer: Authorizer = {
	createAccount: (requester) => authorize(requester, null, "create-account"),
	createArticle: (requester) => authorize(requester, null, "create"),
	listArticles: (requester) => authorize(requester, null, "read-list"),
	readArticle: (requester, article) =>
		authorize(requester, article, "read-detail"),
	addComment: (requester, article) => authorize(requester, article, "comment"),
	updateArticle: (requester, article) =>
		authorize(requester, article, "update"),
	deleteArticle: (requester, article) =>
		authorize(requester, article, "delete"),
	viewAdmin: (requester) => authorize(requester, null, "admin"),
};

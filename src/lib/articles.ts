/**
 * article and comment operations
 *
 * these know nothing about http: they take the requester and submitted
 * fields and return an outcome for the routes to render.
 */

import type { Authorizer, Decision, Requester } from "./access.ts";
import {
	ArticleFields,
	ArticleFormSchema,
	CommentFields,
	CommentFormSchema,
	type FieldErrors,
	type FormValues,
	parseForm,
} from "./forms.ts";
import type { Article, Comment, User } from "./schemas.ts";
import type { Store } from "./store.ts";

export interface ArticleContext {
	store: Store;
	authorizer: Authorizer;
}

export type Refusal = { success: false; error: "login" | "forbidden" | "not-found" };

export type Invalid = {
	success: false;
	error: "invalid";
	errors: FieldErrors;
	values: FormValues;
};

export type Outcome<T> = { success: true; value: T } | Refusal;

export type FormOutcome<T> = Outcome<T> | Invalid;

export interface CommentView {
	comment: Comment;
	author: string;
}

export interface ArticleView {
	article: Article;
	author: string;
	comments: CommentView[];
}

type Check = (requester: User, article: Article) => Decision;

function refuse(error: Refusal["error"]): Refusal {
	return { success: false, error };
}

function username(store: Store, id: number): string {
	return store.getUser(id)?.username ?? "[deleted]";
}

export function articleView(store: Store, article: Article): ArticleView {
	return {
		article,
		author: username(store, article.authorId),
		comments: store.commentsFor(article.id).map((comment) => ({
			comment,
			author: username(store, comment.authorId),
		})),
	};
}

/**
 * load an article the requester may act on. anonymous requesters are sent
 * to log in before the id is looked up; missing articles come next, then
 * the action's own check.
 */
export function loadArticle(
	ctx: ArticleContext,
	requester: Requester,
	id: number,
	check: Check,
): Outcome<Article> {
	if (requester === null) return refuse("login");
	const article = ctx.store.getArticle(id);
	if (!article) return refuse("not-found");
	const decision = check(requester, article);
	if (!decision.allow) return refuse(decision.reason);
	return { success: true, value: article };
}

export function listArticles(
	ctx: ArticleContext,
	requester: Requester,
): Outcome<ArticleView[]> {
	const decision = ctx.authorizer.listArticles(requester);
	if (!decision.allow) return refuse(decision.reason);
	const views = ctx.store.listArticles().map((article) =>
		articleView(ctx.store, article)
	);
	return { success: true, value: views };
}

export function getArticleDetail(
	ctx: ArticleContext,
	requester: Requester,
	id: number,
): Outcome<ArticleView> {
	const loaded = loadArticle(
		ctx,
		requester,
		id,
		ctx.authorizer.readArticle,
	);
	if (!loaded.success) return loaded;
	return { success: true, value: articleView(ctx.store, loaded.value) };
}

/**
 * create an article owned by the requester
 */
export async function createArticle(
	ctx: ArticleContext,
	requester: Requester,
	args: Map<string, string>,
): Promise<FormOutcome<Article>> {
	const decision = ctx.authorizer.createArticle(requester);
	if (!decision.allow) return refuse(decision.reason);
	if (requester === null) return refuse("login");

	const form = parseForm(ArticleFormSchema, args, ArticleFields);
	if (!form.success) {
		return { ...form, success: false, error: "invalid" };
	}

	const article = await ctx.store.createArticle({
		title: form.data.title,
		body: form.data.body,
		authorId: requester.id,
	});
	return { success: true, value: article };
}

/**
 * add a comment by the requester to an article
 */
export async function addComment(
	ctx: ArticleContext,
	requester: Requester,
	articleId: number,
	args: Map<string, string>,
): Promise<FormOutcome<Comment>> {
	const loaded = loadArticle(
		ctx,
		requester,
		articleId,
		ctx.authorizer.addComment,
	);
	if (!loaded.success) return loaded;
	if (requester === null) return refuse("login");

	const form = parseForm(CommentFormSchema, args, CommentFields);
	if (!form.success) {
		return { ...form, success: false, error: "invalid" };
	}

	const comment = await ctx.store.createComment({
		comment: form.data.comment,
		articleId: loaded.value.id,
		authorId: requester.id,
	});
	return { success: true, value: comment };
}

/**
 * change an article's title and body; owner only
 */
export async function updateArticle(
	ctx: ArticleContext,
	requester: Requester,
	id: number,
	args: Map<string, string>,
): Promise<FormOutcome<Article>> {
	const loaded = loadArticle(
		ctx,
		requester,
		id,
		ctx.authorizer.updateArticle,
	);
	if (!loaded.success) return loaded;

	const form = parseForm(ArticleFormSchema, args, ArticleFields);
	if (!form.success) {
		return { ...form, success: false, error: "invalid" };
	}

	const article = await ctx.store.updateArticle(id, form.data);
	return { success: true, value: article };
}

/**
 * delete an article and its comments; owner only
 */
export async function deleteArticle(
	ctx: ArticleContext,
	requester: Requester,
	id: number,
): Promise<Outcome<Article>> {
	const loaded = loadArticle(
		ctx,
		requester,
		id,
		ctx.authorizer.deleteArticle,
	);
	if (!loaded.success) return loaded;

	await ctx.store.deleteArticle(id);
	return loaded;
}

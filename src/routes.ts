/**
 * url routes
 *
 * handlers translate between http and the account and article operations:
 * they read the session, call the operation and turn its outcome into a
 * page, a redirect or a refusal.
 */

import type { App } from "./app.ts";
import {
	addComment,
	articleView,
	createArticle,
	deleteArticle,
	getArticleDetail,
	listArticles,
	loadArticle,
	type Refusal,
	updateArticle,
} from "./lib/articles.ts";
import { SESSION_COOKIE } from "./lib/auth.ts";
import { csrfMiddleware } from "./lib/csrf.ts";
import {
	addError,
	type FieldErrors,
	FORM_ERRORS,
	LoginFields,
	LoginFormSchema,
	parseForm,
	PasswordChangeFields,
	PasswordChangeFormSchema,
	PasswordResetFields,
	PasswordResetFormSchema,
	SetPasswordFields,
	SetPasswordFormSchema,
	SignupFields,
	SignupFormSchema,
	similarityProblem,
} from "./lib/forms.ts";
import type { User } from "./lib/schemas.ts";
import {
	clearCookie,
	htmlResponse,
	redirectResponse,
	type Request,
	type Response,
	type Router,
	setCookie,
} from "./lib/server.ts";
import {
	adminPage,
	articleDeletePage,
	articleDetailPage,
	articleEditPage,
	articleListPage,
	articleNewPage,
	forbiddenPage,
	homePage,
	invalidResetLinkPage,
	loginPage,
	notFoundPage,
	type PageContext,
	passwordChangeDonePage,
	passwordChangePage,
	passwordResetCompletePage,
	passwordResetConfirmPage,
	passwordResetDonePage,
	passwordResetEmail,
	passwordResetPage,
	signupPage,
	siteCss,
} from "./pages.ts";

export const LOGIN_URL = "/accounts/login/";

const GET = ["GET"];
const GET_POST = ["GET", "POST"];

/** csrf cookie lifetime: one year */
const CSRF_MAX_AGE = 60 * 60 * 24 * 7 * 52;

/**
 * login page url that sends the user back to where they were
 */
export function loginRedirectUrl(next: string): string {
	const encoded = encodeURIComponent(next).replace(/%2F/g, "/");
	return `${LOGIN_URL}?next=${encoded}`;
}

/**
 * only same-site paths are followed after login
 */
export function safeNext(next: string | undefined): string {
	if (!next || !next.startsWith("/")) return "/";
	if (next.startsWith("//") || next.startsWith("/\\")) return "/";
	return next;
}

/**
 * article id from the path, null when it is not a positive integer
 */
function articleId(req: Request): number | null {
	const raw = req.params.get("id") ?? "";
	if (!/^\d+$/.test(raw)) return null;
	const id = Number(raw);
	return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function setupRoutes(router: Router, app: App): void {
	const { auth, config, store } = app;

	function currentUser(req: Request): User | null {
		return auth.getUserFromToken(req.cookies.get(SESSION_COOKIE));
	}

	function page(req: Request, user: User | null): PageContext {
		return { siteName: config.siteName, user, csrfToken: req.csrfToken };
	}

	function forbidden(req: Request, user: User | null): Response {
		return htmlResponse(forbiddenPage(page(req, user)), 403);
	}

	function notFound(req: Request, user: User | null): Response {
		return htmlResponse(notFoundPage(page(req, user)), 404);
	}

	function refused(req: Request, user: User | null, refusal: Refusal): Response {
		switch (refusal.error) {
			case "login":
				return redirectResponse(loginRedirectUrl(req.fullPath));
			case "forbidden":
				return forbidden(req, user);
			case "not-found":
				return notFound(req, user);
		}
	}

	function sessionCookie(token: string): string {
		return setCookie(SESSION_COOKIE, token, {
			path: "/",
			maxAge: config.sessionMaxAgeSeconds,
			httpOnly: true,
			secure: config.secureCookies,
			sameSite: "Lax",
		});
	}

	router.use(
		csrfMiddleware({
			secure: config.secureCookies,
			maxAge: CSRF_MAX_AGE,
			safeMethods: ["GET", "HEAD", "OPTIONS"],
			reject: (req) => forbidden(req, currentUser(req)),
		}),
	);

	router.notFound((req) => notFound(req, currentUser(req)));

	router.route("", (req) => {
		return htmlResponse(homePage(page(req, currentUser(req))));
	}, GET);

	router.route("static/style.css", () => {
		return {
			status: 200,
			headers: new Map([
				["Content-Type", "text/css; charset=utf-8"],
				["Cache-Control", "max-age=86400"],
			]),
			cookies: [],
			body: siteCss,
		};
	}, GET);

	// ===========================================================================
	// Accounts
	// ===========================================================================

	router.route("accounts/signup", async (req) => {
		const user = currentUser(req);
		const decision = app.articles.authorizer.createAccount(user);
		if (!decision.allow) return forbidden(req, user);

		if (req.method === "GET") {
			return htmlResponse(signupPage(page(req, user)));
		}

		const form = parseForm(SignupFormSchema, req.args, SignupFields);
		if (!form.success) {
			return htmlResponse(signupPage(page(req, user), form));
		}

		const result = await auth.createAccount(form.data);
		if (!result.success) {
			const values = { ...form.data, age: req.args.get("age") ?? "" };
			return htmlResponse(
				signupPage(page(req, user), { values, errors: result.errors }),
			);
		}
		return redirectResponse(LOGIN_URL);
	}, GET_POST);

	router.route("accounts/login", async (req) => {
		const user = currentUser(req);
		const next = req.args.get("next") ?? "";

		if (req.method === "GET") {
			return htmlResponse(loginPage(page(req, user), next));
		}

		const form = parseForm(LoginFormSchema, req.args, LoginFields);
		if (!form.success) {
			return htmlResponse(loginPage(page(req, user), next, form));
		}

		const result = await auth.login(form.data.username, form.data.password);
		if (!result.success) {
			const errors: FieldErrors = { [FORM_ERRORS]: [result.error] };
			return htmlResponse(
				loginPage(page(req, user), next, { values: form.values, errors }),
			);
		}

		await auth.logout(req.cookies.get(SESSION_COOKIE));
		const response = redirectResponse(safeNext(next));
		response.cookies.push(sessionCookie(result.token));
		return response;
	}, GET_POST);

	router.route("accounts/logout", async (req) => {
		await auth.logout(req.cookies.get(SESSION_COOKIE));
		const response = redirectResponse("/");
		response.cookies.push(clearCookie(SESSION_COOKIE));
		return response;
	}, GET_POST);

	router.route("accounts/password_change/done", (req) => {
		const user = currentUser(req);
		if (!user) return redirectResponse(loginRedirectUrl(req.fullPath));
		return htmlResponse(passwordChangeDonePage(page(req, user)));
	}, GET);

	router.route("accounts/password_change", async (req) => {
		const user = currentUser(req);
		if (!user) return redirectResponse(loginRedirectUrl(req.fullPath));

		if (req.method === "GET") {
			return htmlResponse(passwordChangePage(page(req, user)));
		}

		const form = parseForm(
			PasswordChangeFormSchema,
			req.args,
			PasswordChangeFields,
		);
		if (!form.success) {
			return htmlResponse(passwordChangePage(page(req, user), form));
		}

		const similar = similarityProblem(form.data.new_password1, user.username);
		if (similar) {
			const errors = addError({}, "new_password2", similar);
			return htmlResponse(passwordChangePage(page(req, user), { errors }));
		}

		const result = await auth.changePassword(
			user,
			form.data.old_password,
			form.data.new_password1,
			req.cookies.get(SESSION_COOKIE),
		);
		if (!result.success) {
			return htmlResponse(
				passwordChangePage(page(req, user), { errors: result.errors }),
			);
		}
		return redirectResponse("/accounts/password_change/done/");
	}, GET_POST);

	router.route("accounts/password_reset/done", (req) => {
		return htmlResponse(passwordResetDonePage(page(req, currentUser(req))));
	}, GET);

	router.route("accounts/password_reset", async (req) => {
		const user = currentUser(req);

		if (req.method === "GET") {
			return htmlResponse(passwordResetPage(page(req, user)));
		}

		const form = parseForm(
			PasswordResetFormSchema,
			req.args,
			PasswordResetFields,
		);
		if (!form.success) {
			return htmlResponse(passwordResetPage(page(req, user), form));
		}

		for (const recipient of store.findUsersByEmail(form.data.email)) {
			const token = auth.issueResetToken(recipient);
			const email = passwordResetEmail(
				config.siteName,
				config.siteUrl,
				recipient,
				token,
			);
			await app.mailer.send({
				to: recipient.email,
				from: config.fromEmail,
				subject: email.subject,
				body: email.body,
			});
		}
		return redirectResponse("/accounts/password_reset/done/");
	}, GET_POST);

	router.route("accounts/reset/done", (req) => {
		return htmlResponse(passwordResetCompletePage(page(req, currentUser(req))));
	}, GET);

	router.route("accounts/reset/:token", async (req) => {
		const user = currentUser(req);
		const token = req.params.get("token") ?? "";
		const target = auth.checkResetToken(token);
		if (!target) {
			return htmlResponse(invalidResetLinkPage(page(req, user)));
		}

		if (req.method === "GET") {
			return htmlResponse(passwordResetConfirmPage(page(req, user), token));
		}

		const form = parseForm(SetPasswordFormSchema, req.args, SetPasswordFields);
		if (!form.success) {
			return htmlResponse(
				passwordResetConfirmPage(page(req, user), token, form),
			);
		}

		const similar = similarityProblem(form.data.new_password1, target.username);
		if (similar) {
			const errors = addError({}, "new_password2", similar);
			return htmlResponse(
				passwordResetConfirmPage(page(req, user), token, { errors }),
			);
		}

		const result = await auth.resetPassword(token, form.data.new_password1);
		if (!result.success) {
			return htmlResponse(invalidResetLinkPage(page(req, user)));
		}

		// the reset ended every session, including this one if it was theirs
		const response = redirectResponse("/accounts/reset/done/");
		if (user && user.id === target.id) {
			response.cookies.push(clearCookie(SESSION_COOKIE));
		}
		return response;
	}, GET_POST);

	// ===========================================================================
	// Admin
	// ===========================================================================

	router.route("admin", (req) => {
		const user = currentUser(req);
		const decision = app.articles.authorizer.viewAdmin(user);
		if (!decision.allow) {
			return refused(req, user, { success: false, error: decision.reason });
		}
		const views = store.listArticles().map((article) =>
			articleView(store, article)
		);
		return htmlResponse(adminPage(page(req, user), store.listUsers(), views));
	}, GET);

	// ===========================================================================
	// Articles
	// ===========================================================================

	router.route("articles", (req) => {
		const user = currentUser(req);
		const outcome = listArticles(app.articles, user);
		if (!outcome.success) return refused(req, user, outcome);
		return htmlResponse(articleListPage(page(req, user), outcome.value));
	}, GET);

	router.route("articles/new", async (req) => {
		const user = currentUser(req);

		if (req.method === "GET") {
			const decision = app.articles.authorizer.createArticle(user);
			if (!decision.allow) {
				return refused(req, user, { success: false, error: decision.reason });
			}
			return htmlResponse(articleNewPage(page(req, user)));
		}

		const outcome = await createArticle(app.articles, user, req.args);
		if (outcome.success) {
			return redirectResponse(`/articles/details/${outcome.value.id}`);
		}
		if (outcome.error === "invalid") {
			return htmlResponse(articleNewPage(page(req, user), outcome));
		}
		return refused(req, user, outcome);
	}, GET_POST);

	router.route("articles/details/:id", async (req) => {
		const user = currentUser(req);
		const id = articleId(req);
		if (id === null) return notFound(req, user);

		if (req.method === "POST") {
			const outcome = await addComment(app.articles, user, id, req.args);
			if (outcome.success) {
				return redirectResponse(`/articles/details/${id}`);
			}
			if (outcome.error !== "invalid") return refused(req, user, outcome);

			const detail = getArticleDetail(app.articles, user, id);
			if (!detail.success) return refused(req, user, detail);
			return htmlResponse(articleDetailPage(page(req, user), detail.value, outcome));
		}

		const detail = getArticleDetail(app.articles, user, id);
		if (!detail.success) return refused(req, user, detail);
		return htmlResponse(articleDetailPage(page(req, user), detail.value));
	}, GET_POST);

	router.route("articles/edit/:id", async (req) => {
		const user = currentUser(req);
		const id = articleId(req);
		if (id === null) return notFound(req, user);

		if (req.method === "GET") {
			const loaded = loadArticle(
				app.articles,
				user,
				id,
				app.articles.authorizer.updateArticle,
			);
			if (!loaded.success) return refused(req, user, loaded);
			return htmlResponse(articleEditPage(page(req, user), loaded.value));
		}

		const outcome = await updateArticle(app.articles, user, id, req.args);
		if (outcome.success) {
			return redirectResponse(`/articles/details/${id}`);
		}
		if (outcome.error !== "invalid") return refused(req, user, outcome);

		const article = store.getArticle(id);
		if (!article) return notFound(req, user);
		return htmlResponse(articleEditPage(page(req, user), article, outcome));
	}, GET_POST);

	router.route("articles/delete/:id", async (req) => {
		const user = currentUser(req);
		const id = articleId(req);
		if (id === null) return notFound(req, user);

		if (req.method === "GET") {
			const loaded = loadArticle(
				app.articles,
				user,
				id,
				app.articles.authorizer.deleteArticle,
			);
			if (!loaded.success) return refused(req, user, loaded);
			return htmlResponse(articleDeletePage(page(req, user), loaded.value));
		}

		const outcome = await deleteArticle(app.articles, user, id);
		if (!outcome.success) return refused(req, user, outcome);
		return redirectResponse("/articles/");
	}, GET_POST);
}

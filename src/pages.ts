/**
 * page templates
 */

import {
	bar,
	divClass,
	escapeHtml,
	field,
	form,
	formatDate,
	formErrors,
	headerRow,
	heading,
	hiddenInput,
	input,
	link,
	para,
	paragraphs,
	passwordInput,
	plural,
	row,
	spanClass,
	submit,
	table,
	tag,
	textarea,
	valueOf,
} from "./lib/html.ts";
import type { FieldErrors, FormValues } from "./lib/forms.ts";
import { MIN_PASSWORD_LENGTH } from "./lib/forms.ts";
import type { ArticleView } from "./lib/articles.ts";
import type { Article, User } from "./lib/schemas.ts";

/**
 * what every page needs to know about the request it answers
 */
export interface PageContext {
	siteName: string;
	user: User | null;
	csrfToken: string;
}

/**
 * submitted values and errors when a form is shown again
 */
export interface FormState {
	values?: FormValues;
	errors?: FieldErrors;
}

export const FORBIDDEN_MESSAGE = "You don't have permission to do that.";

// =============================================================================
// Layout
// =============================================================================

function nav(ctx: PageContext): string {
	const links = ctx.user
		? [
			link("Articles", "/articles/"),
			link("New article", "/articles/new/"),
			link("Change password", "/accounts/password_change/"),
			...(ctx.user.isStaff ? [link("Admin", "/admin/")] : []),
			form("/accounts/logout/", ctx.csrfToken, submit("Log out")),
		]
		: [
			link("Log in", "/accounts/login/"),
			link("Sign up", "/accounts/signup/"),
		];
	return tag(
		"nav",
		{},
		link(ctx.siteName, "/") + bar + links.join(bar),
	);
}

export function layout(ctx: PageContext, title: string, body: string): string {
	return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<link rel="stylesheet" type="text/css" href="/static/style.css">
<title>${escapeHtml(title)} - ${escapeHtml(ctx.siteName)}</title>
</head>
<body>
${nav(ctx)}
<main>
${body}
</main>
</body>
</html>`;
}

const passwordHelp =
	`Your password must contain at least ${MIN_PASSWORD_LENGTH} characters, can't be entirely numeric and can't be too similar to your username.`;

// =============================================================================
// Home and errors
// =============================================================================

export function homePage(ctx: PageContext): string {
	const body = ctx.user
		? heading(1, `Hi ${ctx.user.username}!`) +
			para(link("Read the articles", "/articles/"))
		: heading(1, ctx.siteName) +
			para("You are not logged in.") +
			para(
				link("Log in", "/accounts/login/") + " or " +
					link("sign up", "/accounts/signup/") + ".",
			);
	return layout(ctx, "Home", body);
}

export function forbiddenPage(ctx: PageContext): string {
	return layout(
		ctx,
		"Forbidden",
		heading(1, "403 Forbidden") + para(escapeHtml(FORBIDDEN_MESSAGE)),
	);
}

export function notFoundPage(ctx: PageContext): string {
	return layout(
		ctx,
		"Not found",
		heading(1, "404 Not Found") +
			para("The page you asked for does not exist."),
	);
}

// =============================================================================
// Accounts
// =============================================================================

export function signupPage(ctx: PageContext, state: FormState = {}): string {
	const { values, errors } = state;
	const fields = formErrors(errors) +
		field(
			"username",
			"Username:",
			input("username", valueOf(values, "username"), "text", {
				maxlength: 150,
				required: true,
			}),
			errors,
			"Required. 150 characters or fewer. Letters, digits and @/./+/-/_ only.",
		) +
		field(
			"email",
			"Email address:",
			input("email", valueOf(values, "email"), "email"),
			errors,
		) +
		field(
			"age",
			"Age:",
			input("age", valueOf(values, "age"), "number", { min: 0 }),
			errors,
		) +
		field(
			"password1",
			"Password:",
			passwordInput("password1", { required: true }),
			errors,
			passwordHelp,
		) +
		field(
			"password2",
			"Password confirmation:",
			passwordInput("password2", { required: true }),
			errors,
			"Enter the same password as before, for verification.",
		) +
		submit("Sign Up");
	return layout(
		ctx,
		"Sign Up",
		heading(2, "Sign Up") + form("/accounts/signup/", ctx.csrfToken, fields),
	);
}

export function loginPage(
	ctx: PageContext,
	next: string,
	state: FormState = {},
): string {
	const { values, errors } = state;
	const fields = formErrors(errors) +
		field(
			"username",
			"Username:",
			input("username", valueOf(values, "username"), "text", {
				autofocus: true,
				required: true,
			}),
			errors,
		) +
		field(
			"password",
			"Password:",
			passwordInput("password", { required: true }),
			errors,
		) +
		hiddenInput("next", next) +
		submit("Log In");
	return layout(
		ctx,
		"Log In",
		heading(2, "Log In") +
			form("/accounts/login/", ctx.csrfToken, fields) +
			para(link("Forgot your password?", "/accounts/password_reset/")),
	);
}

export function passwordChangePage(
	ctx: PageContext,
	state: FormState = {},
): string {
	const { errors } = state;
	const fields = formErrors(errors) +
		field(
			"old_password",
			"Old password:",
			passwordInput("old_password", { required: true }),
			errors,
		) +
		field(
			"new_password1",
			"New password:",
			passwordInput("new_password1", { required: true }),
			errors,
			passwordHelp,
		) +
		field(
			"new_password2",
			"New password confirmation:",
			passwordInput("new_password2", { required: true }),
			errors,
		) +
		submit("Change my password");
	return layout(
		ctx,
		"Password change",
		heading(1, "Password change") +
			form("/accounts/password_change/", ctx.csrfToken, fields),
	);
}

export function passwordChangeDonePage(ctx: PageContext): string {
	return layout(
		ctx,
		"Password change successful",
		heading(1, "Password change successful") +
			para("Your password was changed."),
	);
}

export function passwordResetPage(
	ctx: PageContext,
	state: FormState = {},
): string {
	const { values, errors } = state;
	const fields = formErrors(errors) +
		field(
			"email",
			"Email address:",
			input("email", valueOf(values, "email"), "email", { required: true }),
			errors,
		) +
		submit("Send me instructions!");
	return layout(
		ctx,
		"Forgot your password?",
		heading(1, "Forgot your password?") +
			para(
				"Enter your email address below, and we'll email instructions for setting a new one.",
			) +
			form("/accounts/password_reset/", ctx.csrfToken, fields),
	);
}

export function passwordResetDonePage(ctx: PageContext): string {
	return layout(
		ctx,
		"Password reset sent",
		heading(1, "Check your inbox.") +
			para(
				"We've emailed you instructions for setting your password. You should receive the email shortly!",
			),
	);
}

export function passwordResetConfirmPage(
	ctx: PageContext,
	token: string,
	state: FormState = {},
): string {
	const { errors } = state;
	const fields = formErrors(errors) +
		field(
			"new_password1",
			"New password:",
			passwordInput("new_password1", { required: true }),
			errors,
			passwordHelp,
		) +
		field(
			"new_password2",
			"New password confirmation:",
			passwordInput("new_password2", { required: true }),
			errors,
		) +
		submit("Change my password");
	return layout(
		ctx,
		"Enter new password",
		heading(1, "Set a new password!") +
			form(`/accounts/reset/${encodeURIComponent(token)}/`, ctx.csrfToken, fields),
	);
}

export function invalidResetLinkPage(ctx: PageContext): string {
	return layout(
		ctx,
		"Password reset unsuccessful",
		heading(1, "Password reset unsuccessful") +
			para(
				"The password reset link was invalid, possibly because it has already been used. Please request a new password reset.",
			) +
			para(link("Request a new link", "/accounts/password_reset/")),
	);
}

export function passwordResetCompletePage(ctx: PageContext): string {
	return layout(
		ctx,
		"Password reset complete",
		heading(1, "Password reset complete") +
			para("Your new password has been set.") +
			para(link("Log in", "/accounts/login/")),
	);
}

export interface EmailContent {
	subject: string;
	body: string;
}

export function passwordResetEmail(
	siteName: string,
	siteUrl: string,
	user: User,
	token: string,
): EmailContent {
	const url = `${siteUrl.replace(/\/+$/, "")}/accounts/reset/${token}/`;
	return {
		subject: `Password reset on ${siteName}`,
		body: [
			`You're receiving this email because you requested a password reset for your user account at ${siteName}.`,
			"",
			"Please go to the following page and choose a new password:",
			url,
			"",
			`Your username, in case you've forgotten: ${user.username}`,
			"",
			"Thanks for using our site!",
			"",
			`The ${siteName} team`,
		].join("\n"),
	};
}

// =============================================================================
// Articles
// =============================================================================

function byline(view: ArticleView): string {
	return spanClass(
		"byline",
		`by ${escapeHtml(view.author)} | ${escapeHtml(formatDate(view.article.date))}`,
	);
}

function ownerLinks(ctx: PageContext, article: Article): string {
	if (!ctx.user || ctx.user.id !== article.authorId) return "";
	return para(
		link("Edit", `/articles/edit/${article.id}`) + bar +
			link("Delete", `/articles/delete/${article.id}`),
	);
}

function commentList(view: ArticleView): string {
	if (view.comments.length === 0) return "";
	return view.comments.map(({ comment, author }) =>
		para(
			tag("span", { class: "font-weight-bold" }, escapeHtml(author)) +
				bar + escapeHtml(comment.comment),
		)
	).join("\n");
}

export function articleListPage(
	ctx: PageContext,
	views: ArticleView[],
): string {
	const items = views.map((view) =>
		divClass(
			"card",
			tag(
				"h2",
				{},
				link(view.article.title, `/articles/details/${view.article.id}`),
			) +
				byline(view) +
				paragraphs(view.article.body) +
				ownerLinks(ctx, view.article) +
				divClass("comments", commentList(view)),
		)
	);
	const body = heading(1, "Articles") +
		para(spanClass("count", plural(views.length, "article"))) +
		(items.length > 0 ? items.join("\n") : para("No articles yet.")) +
		para(link("New article", "/articles/new/"));
	return layout(ctx, "Articles", body);
}

export function articleDetailPage(
	ctx: PageContext,
	view: ArticleView,
	state: FormState = {},
): string {
	const { values, errors } = state;
	const commentForm = form(
		`/articles/details/${view.article.id}`,
		ctx.csrfToken,
		formErrors(errors) +
			field(
				"comment",
				"Comment:",
				input("comment", valueOf(values, "comment"), "text", {
					maxlength: 150,
					required: true,
				}),
				errors,
			) +
			submit("Save"),
	);
	const body = heading(1, view.article.title) +
		byline(view) +
		paragraphs(view.article.body) +
		ownerLinks(ctx, view.article) +
		heading(3, "Comments") +
		(view.comments.length > 0 ? commentList(view) : para("No comments yet.")) +
		heading(3, "Add a comment") +
		commentForm +
		para(link("Back to all articles", "/articles/"));
	return layout(ctx, view.article.title, body);
}

function articleFields(values: FormValues | undefined, errors?: FieldErrors): string {
	return formErrors(errors) +
		field(
			"title",
			"Title:",
			input("title", valueOf(values, "title"), "text", {
				maxlength: 255,
				required: true,
			}),
			errors,
		) +
		field("body", "Body:", textarea("body", valueOf(values, "body")), errors);
}

export function articleNewPage(ctx: PageContext, state: FormState = {}): string {
	return layout(
		ctx,
		"New article",
		heading(1, "New article") +
			form(
				"/articles/new/",
				ctx.csrfToken,
				articleFields(state.values, state.errors) + submit("Save"),
			),
	);
}

export function articleEditPage(
	ctx: PageContext,
	article: Article,
	state: FormState = {},
): string {
	const values = state.values ?? { title: article.title, body: article.body };
	return layout(
		ctx,
		"Edit",
		heading(1, "Edit") +
			form(
				`/articles/edit/${article.id}`,
				ctx.csrfToken,
				articleFields(values, state.errors) + submit("Update"),
			),
	);
}

export function articleDeletePage(ctx: PageContext, article: Article): string {
	return layout(
		ctx,
		"Delete",
		heading(1, "Delete") +
			form(
				`/articles/delete/${article.id}`,
				ctx.csrfToken,
				para(
					`Are you sure you want to delete "${escapeHtml(article.title)}"?`,
				) + submit("Confirm"),
			),
	);
}

// =============================================================================
// Admin
// =============================================================================

function userRows(users: User[]): string {
	return users.map((user) =>
		row(
			escapeHtml(user.email),
			escapeHtml(user.username),
			user.age === null ? "" : String(user.age),
			user.isStaff ? "yes" : "no",
		)
	).join("");
}

function adminArticle(view: ArticleView): string {
	const comments = view.comments.map(({ comment, author }) =>
		row(String(comment.id), escapeHtml(author), escapeHtml(comment.comment))
	).join("");
	return divClass(
		"card",
		tag(
			"h3",
			{},
			link(view.article.title, `/articles/details/${view.article.id}`),
		) +
			byline(view) +
			(comments
				? table(headerRow("id", "author", "comment") + comments)
				: para("No comments.")),
	);
}

/**
 * staff overview of every user and every article with its comments
 */
export function adminPage(
	ctx: PageContext,
	users: User[],
	views: ArticleView[],
): string {
	const body = heading(1, "Site administration") +
		heading(2, `Users (${users.length})`) +
		table(headerRow("email", "username", "age", "staff") + userRows(users)) +
		heading(2, `Articles (${views.length})`) +
		(views.length > 0 ? views.map(adminArticle).join("\n") : para("No articles yet."));
	return layout(ctx, "Site administration", body);
}

// =============================================================================
// CSS
// =============================================================================

export const siteCss = `
body    { font-family: Georgia, serif; font-size: 12pt; color: #222222; margin: 0; }
nav     { background: #222222; color: #eeeeee; padding: 8px 16px; }
nav a   { color: #ffffff; text-decoration: none; }
nav form { display: inline; }
main    { max-width: 720px; margin: 0 auto; padding: 16px; }

input, textarea { font-family: Courier, monospace; font-size: 11pt; }
input[type="submit"] { font-family: Georgia, serif; }

.card     { border-bottom: 1px solid #dddddd; padding: 8px 0; }
.byline   { font-size: 9pt; color: #828282; }
.count    { font-size: 9pt; color: #828282; }
.comments { margin-left: 16px; font-size: 10pt; }
.helptext { display: block; font-size: 8pt; color: #828282; }
.errorlist { color: #b40000; margin: 0; padding-left: 16px; }
.font-weight-bold { font-weight: bold; }

table  { border-collapse: collapse; margin: 8px 0; }
th, td { border: 1px solid #dddddd; padding: 2px 6px; text-align: left; }
`;

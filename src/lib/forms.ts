/**
 * form validation
 *
 * each form is a zod schema over the submitted string fields. failures are
 * flattened into per-field message lists; messages that belong to the form
 * as a whole are kept under FORM_ERRORS.
 */

import { z } from "zod";

export const FORM_ERRORS = "__all__";

export type FieldErrors = Record<string, string[]>;

export type FormValues = Record<string, string>;

export type FormResult<T> =
	| { success: true; data: T }
	| { success: false; errors: FieldErrors; values: FormValues };

const REQUIRED = "This field is required.";

// an empty field stops further checks on the field and on the whole form
const filled = { error: REQUIRED, abort: true } as const;

function required(maxLength?: number) {
	const field = z.string().trim().min(1, filled);
	if (maxLength === undefined) return field;
	return field.max(
		maxLength,
		`Ensure this value has at most ${maxLength} characters.`,
	);
}

/**
 * collect the named fields from request args, missing ones as ""
 */
export function formValues(
	args: Map<string, string>,
	fields: readonly string[],
): FormValues {
	const values: FormValues = {};
	for (const field of fields) {
		values[field] = args.get(field) ?? "";
	}
	return values;
}

/**
 * turn zod issues into per-field messages
 */
export function fieldErrors(error: z.ZodError): FieldErrors {
	const errors: FieldErrors = {};
	for (const issue of error.issues) {
		const key = issue.path.length > 0 ? String(issue.path[0]) : FORM_ERRORS;
		(errors[key] ??= []).push(issue.message);
	}
	return errors;
}

/**
 * validate submitted fields against a form schema
 */
export function parseForm<S extends z.ZodType>(
	schema: S,
	args: Map<string, string>,
	fields: readonly string[],
): FormResult<z.output<S>> {
	const values = formValues(args, fields);
	const result = schema.safeParse(values);
	if (result.success) {
		return { success: true, data: result.data };
	}
	return { success: false, errors: fieldErrors(result.error), values };
}

/**
 * add an error to a field, for checks that need the store
 */
export function addError(
	errors: FieldErrors,
	field: string,
	message: string,
): FieldErrors {
	return { ...errors, [field]: [...(errors[field] ?? []), message] };
}

// =============================================================================
// Password rules
// =============================================================================

export const MIN_PASSWORD_LENGTH = 8;

/**
 * password strength problems, empty when the password is acceptable
 */
export function passwordProblems(
	password: string,
	username: string = "",
): string[] {
	const problems: string[] = [];
	if (password.length < MIN_PASSWORD_LENGTH) {
		problems.push(
			`This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`,
		);
	}
	if (/^\d+$/.test(password)) {
		problems.push("This password is entirely numeric.");
	}
	const similar = similarityProblem(password, username);
	if (similar) problems.push(similar);
	return problems;
}

/**
 * a password that contains the username is refused
 */
export function similarityProblem(
	password: string,
	username: string,
): string | null {
	const name = username.trim().toLowerCase();
	if (name.length >= 3 && password.toLowerCase().includes(name)) {
		return "The password is too similar to the username.";
	}
	return null;
}

/**
 * problems with a new password and its confirmation
 */
export function newPasswordProblems(
	password1: string,
	password2: string,
	username: string = "",
): string[] {
	if (password1 !== password2) {
		return ["The two password fields didn't match."];
	}
	return passwordProblems(password1, username);
}

// =============================================================================
// Account forms
// =============================================================================

export const USERNAME_PATTERN = /^[\w.@+-]+$/;

/** largest age a positive integer column holds */
export const MAX_AGE = 2147483647;

export const SignupFields = [
	"username",
	"email",
	"age",
	"password1",
	"password2",
] as const;

export const SignupFormSchema = z
	.object({
		username: required(150).regex(
			USERNAME_PATTERN,
			"Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.",
		),
		email: z
			.string()
			.trim()
			.refine(
				(email) => email === "" || z.email().safeParse(email).success,
				"Enter a valid email address.",
			),
		age: z
			.string()
			.trim()
			.regex(/^-?\d*$/, "Enter a whole number.")
			.refine(
				(age) => !age.startsWith("-"),
				"Ensure this value is greater than or equal to 0.",
			)
			.refine(
				(age) => !/^\d+$/.test(age) || Number(age) <= MAX_AGE,
				`Ensure this value is less than or equal to ${MAX_AGE}.`,
			)
			.transform((age) => (age === "" ? null : Number(age))),
		password1: z.string().min(1, filled),
		password2: z.string().min(1, filled),
	})
	.superRefine((value, ctx) => {
		const problems = newPasswordProblems(
			value.password1,
			value.password2,
			value.username,
		);
		for (const message of problems) {
			ctx.addIssue({ code: "custom", message, path: ["password2"] });
		}
	});

export type SignupForm = z.output<typeof SignupFormSchema>;

export const LoginFields = ["username", "password"] as const;

export const LoginFormSchema = z.object({
	username: required(150),
	password: z.string().min(1, filled),
});

export type LoginForm = z.output<typeof LoginFormSchema>;

export const PasswordChangeFields = [
	"old_password",
	"new_password1",
	"new_password2",
] as const;

export const PasswordChangeFormSchema = z
	.object({
		old_password: z.string().min(1, filled),
		new_password1: z.string().min(1, filled),
		new_password2: z.string().min(1, filled),
	})
	.superRefine((value, ctx) => {
		const problems = newPasswordProblems(
			value.new_password1,
			value.new_password2,
		);
		for (const message of problems) {
			ctx.addIssue({ code: "custom", message, path: ["new_password2"] });
		}
	});

export type PasswordChangeForm = z.output<typeof PasswordChangeFormSchema>;

export const SetPasswordFields = ["new_password1", "new_password2"] as const;

export const SetPasswordFormSchema = z
	.object({
		new_password1: z.string().min(1, filled),
		new_password2: z.string().min(1, filled),
	})
	.superRefine((value, ctx) => {
		const problems = newPasswordProblems(
			value.new_password1,
			value.new_password2,
		);
		for (const message of problems) {
			ctx.addIssue({ code: "custom", message, path: ["new_password2"] });
		}
	});

export type SetPasswordForm = z.output<typeof SetPasswordFormSchema>;

export const PasswordResetFields = ["email"] as const;

export const PasswordResetFormSchema = z.object({
	email: required(254).pipe(z.email("Enter a valid email address.")),
});

export type PasswordResetForm = z.output<typeof PasswordResetFormSchema>;

// =============================================================================
// Article forms
// =============================================================================

export const ArticleFields = ["title", "body"] as const;

export const ArticleFormSchema = z.object({
	title: required(255),
	body: required(),
});

export type ArticleForm = z.output<typeof ArticleFormSchema>;

export const CommentFields = ["comment"] as const;

export const CommentFormSchema = z.object({
	comment: required(150),
});

export type CommentForm = z.output<typeof CommentFormSchema>;

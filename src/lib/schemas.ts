/**
 * zod schemas for the stored data models and site configuration
 */

import { z } from "zod";

/**
 * pbkdf2 password hash entry
 *
 * the iteration count is stored per entry so it can be raised later
 * without invalidating existing hashes
 */
export const PasswordEntrySchema = z.object({
	algorithm: z.literal("pbkdf2-sha256"),
	iterations: z.number().int().positive(),
	salt: z.string(),
	hash: z.string(),
});

export type PasswordEntry = z.infer<typeof PasswordEntrySchema>;

export const UserSchema = z.object({
	id: z.number().int().positive(),
	username: z.string().min(1).max(150),
	email: z.string().default(""),
	password: PasswordEntrySchema,
	age: z.number().int().nonnegative().nullable().default(null),
	isStaff: z.boolean().default(false),
	dateJoined: z.string(),
});

export type User = z.infer<typeof UserSchema>;

export const ArticleSchema = z.object({
	id: z.number().int().positive(),
	title: z.string().min(1).max(255),
	body: z.string().min(1),
	date: z.string(),
	authorId: z.number().int().positive(),
});

export type Article = z.infer<typeof ArticleSchema>;

export const CommentSchema = z.object({
	id: z.number().int().positive(),
	comment: z.string().min(1).max(150),
	articleId: z.number().int().positive(),
	authorId: z.number().int().positive(),
});

export type Comment = z.infer<typeof CommentSchema>;

/**
 * login session, times in seconds since the epoch
 */
export const SessionSchema = z.object({
	token: z.string(),
	userId: z.number().int().positive(),
	created: z.number(),
	expires: z.number(),
});

export type Session = z.infer<typeof SessionSchema>;

/**
 * sessions table: maps session token to session
 */
export const SessionsTableSchema = z.record(z.string(), SessionSchema);

export type SessionsTable = z.infer<typeof SessionsTableSchema>;

/**
 * redeemed password reset tokens: maps token id to its expiry
 */
export const UsedResetTokensTableSchema = z.record(z.string(), z.number());

export type UsedResetTokensTable = z.infer<typeof UsedResetTokensTableSchema>;

/**
 * signed part of a password reset token
 */
export const ResetTokenPayloadSchema = z.object({
	uid: z.number().int().positive(),
	exp: z.number(),
	jti: z.string().min(1),
	/** fingerprint of the password the token was issued against */
	pwd: z.string().min(1),
});

export type ResetTokenPayload = z.infer<typeof ResetTokenPayloadSchema>;

/**
 * site configuration
 */
export const AppConfigSchema = z.object({
	port: z.number().int().min(0).max(65535).default(8000),
	dataDir: z.string().default("data"),
	siteName: z.string().default("Newspaper"),
	siteUrl: z.string().default("http://localhost:8000"),
	secretKey: z.string().min(1).default("insecure-development-key"),
	sessionMaxAgeSeconds: z.number().int().positive().default(1209600),
	passwordResetTimeoutSeconds: z.number().int().positive().default(259200),
	passwordIterations: z.number().int().positive().default(100000),
	secureCookies: z.boolean().default(false),
	fromEmail: z.string().default("webmaster@localhost"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * accounts, password hashing, sessions and password reset tokens
 */

import {
	createHmac,
	pbkdf2,
	randomBytes,
	timingSafeEqual,
} from "node:crypto";
import type { Store } from "./store.ts";
import {
	type PasswordEntry,
	type ResetTokenPayload,
	ResetTokenPayloadSchema,
	type Session,
	type User,
} from "./schemas.ts";
import type { FieldErrors, SignupForm } from "./forms.ts";

/**
 * current time in whole seconds since the epoch
 */
export function seconds(): number {
	return Math.floor(Date.now() / 1000);
}

/**
 * random hex string for session tokens and token ids
 */
export function generateToken(length: number = 32): string {
	return randomBytes(length).toString("hex");
}

/**
 * random hex salt for password hashing
 */
export function generateSalt(length: number = 16): string {
	return randomBytes(length).toString("hex");
}

/**
 * pbkdf2-sha256 of a password, hex encoded
 */
export function hashPassword(
	password: string,
	salt: string,
	iterations: number,
): Promise<string> {
	return new Promise((resolve, reject) => {
		pbkdf2(password, salt, iterations, 32, "sha256", (error, key) => {
			if (error) reject(error);
			else resolve(key.toString("hex"));
		});
	});
}

export async function createPasswordEntry(
	password: string,
	iterations: number,
): Promise<PasswordEntry> {
	const salt = generateSalt();
	const hash = await hashPassword(password, salt, iterations);
	return { algorithm: "pbkdf2-sha256", iterations, salt, hash };
}

function sameBytes(a: Buffer, b: Buffer): boolean {
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * verify a password against a stored entry
 */
export async function verifyPassword(
	password: string,
	entry: PasswordEntry,
): Promise<boolean> {
	const hash = await hashPassword(password, entry.salt, entry.iterations);
	return sameBytes(Buffer.from(hash, "hex"), Buffer.from(entry.hash, "hex"));
}

export function createSession(
	userId: number,
	maxAgeSeconds: number,
	now: number = seconds(),
): Session {
	return {
		token: generateToken(),
		userId,
		created: now,
		expires: now + maxAgeSeconds,
	};
}

// =============================================================================
// Password reset tokens
// =============================================================================

function sign(data: string, secret: string): string {
	return createHmac("sha256", secret).update(data).digest("base64url");
}

/**
 * fingerprint of a stored password entry; changes whenever the password does
 */
export function passwordFingerprint(
	entry: PasswordEntry,
	secret: string,
): string {
	return sign(`${entry.salt}:${entry.hash}`, secret);
}

/**
 * encode and sign a reset token: base64url(json payload) "." signature
 */
export function signResetToken(
	payload: ResetTokenPayload,
	secret: string,
): string {
	const data = Buffer.from(JSON.stringify(payload)).toString("base64url");
	return `${data}.${sign(data, secret)}`;
}

/**
 * check a reset token's signature and expiry; null when either fails.
 * single use is tracked separately by the store.
 */
export function readResetToken(
	token: string,
	secret: string,
	now: number = seconds(),
): ResetTokenPayload | null {
	const parts = token.split(".");
	if (parts.length !== 2) return null;
	const [data, signature] = parts;

	const expected = Buffer.from(sign(data, secret));
	if (!sameBytes(Buffer.from(signature), expected)) return null;

	let json: unknown;
	try {
		json = JSON.parse(Buffer.from(data, "base64url").toString("utf8"));
	} catch {
		return null;
	}
	const parsed = ResetTokenPayloadSchema.safeParse(json);
	if (!parsed.success) return null;
	if (parsed.data.exp <= now) return null;
	return parsed.data;
}

// =============================================================================
// Auth manager
// =============================================================================

export interface AuthOptions {
	secretKey: string;
	sessionMaxAgeSeconds: number;
	passwordResetTimeoutSeconds: number;
	passwordIterations: number;
}

export const BAD_LOGIN =
	"Please enter a correct username and password. Note that both fields may be case-sensitive.";

export const USERNAME_TAKEN = "A user with that username already exists.";

export const WRONG_OLD_PASSWORD =
	"Your old password was entered incorrectly. Please enter it again.";

export type LoginResult =
	| { success: true; token: string; user: User }
	| { success: false; error: string };

export type AccountResult =
	| { success: true; user: User }
	| { success: false; errors: FieldErrors };

export type ResetResult =
	| { success: true; user: User }
	| { success: false; error: string };

export class AuthManager {
	constructor(
		private readonly store: Store,
		private readonly options: AuthOptions,
	) {}

	/**
	 * user behind a session cookie, null for a missing or expired session
	 */
	getUserFromToken(
		token: string | undefined,
		now: number = seconds(),
	): User | null {
		if (!token) return null;
		const session = this.store.getSession(token);
		if (!session || session.expires <= now) return null;
		return this.store.getUser(session.userId);
	}

	/**
	 * username and password check, usernames compared exactly
	 */
	async authenticate(username: string, password: string): Promise<User | null> {
		const user = this.store.findUserByUsername(username);
		if (!user || user.username !== username) return null;
		const valid = await verifyPassword(password, user.password);
		return valid ? user : null;
	}

	async login(username: string, password: string): Promise<LoginResult> {
		const user = await this.authenticate(username, password);
		if (!user) {
			return { success: false, error: BAD_LOGIN };
		}
		const session = createSession(user.id, this.options.sessionMaxAgeSeconds);
		await this.store.putSession(session);
		return { success: true, token: session.token, user };
	}

	async logout(token: string | undefined): Promise<void> {
		if (token) {
			await this.store.deleteSession(token);
		}
	}

	/**
	 * create an account from a validated signup form; does not log in
	 */
	async createAccount(form: SignupForm): Promise<AccountResult> {
		if (this.store.findUserByUsername(form.username)) {
			return { success: false, errors: { username: [USERNAME_TAKEN] } };
		}
		const password = await createPasswordEntry(
			form.password1,
			this.options.passwordIterations,
		);
		const user = await this.store.createUser({
			username: form.username,
			email: form.email,
			age: form.age,
			password,
		});
		return { success: true, user };
	}

	async setPassword(user: User, password: string): Promise<User> {
		const entry = await createPasswordEntry(
			password,
			this.options.passwordIterations,
		);
		return this.store.setPassword(user.id, entry);
	}

	/**
	 * change a password after checking the old one. the session making the
	 * change stays logged in, every other session of the user ends.
	 */
	async changePassword(
		user: User,
		oldPassword: string,
		newPassword: string,
		currentToken: string | undefined,
	): Promise<AccountResult> {
		if (!(await verifyPassword(oldPassword, user.password))) {
			return { success: false, errors: { old_password: [WRONG_OLD_PASSWORD] } };
		}
		const updated = await this.setPassword(user, newPassword);
		await this.store.deleteSessionsFor(user.id, currentToken);
		return { success: true, user: updated };
	}

	/**
	 * signed, time-limited, single-use reset token for a user. it is bound
	 * to the current password, so any password change voids it.
	 */
	issueResetToken(user: User, now: number = seconds()): string {
		return signResetToken(
			{
				uid: user.id,
				exp: now + this.options.passwordResetTimeoutSeconds,
				jti: generateToken(16),
				pwd: passwordFingerprint(user.password, this.options.secretKey),
			},
			this.options.secretKey,
		);
	}

	private redeemable(
		token: string,
		now: number,
	): { payload: ResetTokenPayload; user: User } | null {
		const payload = readResetToken(token, this.options.secretKey, now);
		if (!payload || this.store.isResetTokenUsed(payload.jti)) return null;
		const user = this.store.getUser(payload.uid);
		if (!user) return null;
		const current = passwordFingerprint(user.password, this.options.secretKey);
		if (!sameBytes(Buffer.from(payload.pwd), Buffer.from(current))) return null;
		return { payload, user };
	}

	/**
	 * user a reset token was issued for, null if it is forged, expired,
	 * already redeemed or older than the user's password
	 */
	checkResetToken(token: string, now: number = seconds()): User | null {
		return this.redeemable(token, now)?.user ?? null;
	}

	/**
	 * redeem a reset token: set the password, record the token as used and
	 * end every session of the user
	 */
	async resetPassword(
		token: string,
		newPassword: string,
		now: number = seconds(),
	): Promise<ResetResult> {
		const found = this.redeemable(token, now);
		if (!found) {
			return { success: false, error: "invalid token" };
		}
		const { payload, user } = found;
		const updated = await this.setPassword(user, newPassword);
		await this.store.markResetTokenUsed(payload.jti, payload.exp, now);
		await this.store.deleteSessionsFor(user.id);
		return { success: true, user: updated };
	}
}

/**
 * cookie holding the session token
 */
export const SESSION_COOKIE = "sessionid";

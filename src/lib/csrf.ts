/**
 * cross-site request forgery protection
 *
 * double submit: a random token lives in a cookie and every unsafe request
 * must echo it back in a form field.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import {
	type Middleware,
	type Request,
	type Response,
	setCookie,
} from "./server.ts";

export const CSRF_COOKIE = "csrftoken";
export const CSRF_FIELD = "csrfmiddlewaretoken";

export interface CsrfOptions {
	secure: boolean;
	/** cookie lifetime, a year by default */
	maxAge: number;
	safeMethods: string[];
	/** response for a request that failed the check */
	reject: (req: Request) => Response | Promise<Response>;
}

const TOKEN_PATTERN = /^[0-9a-f]{64}$/;

export function generateCsrfToken(): string {
	return randomBytes(32).toString("hex");
}

export function tokensMatch(a: string, b: string): boolean {
	const left = Buffer.from(a);
	const right = Buffer.from(b);
	return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * make sure every request carries a token for its forms, and refuse unsafe
 * requests whose submitted token does not match the cookie
 */
export function csrfMiddleware(options: CsrfOptions): Middleware {
	return async (req, next) => {
		const cookieToken = req.cookies.get(CSRF_COOKIE);
		const known = cookieToken !== undefined && TOKEN_PATTERN.test(cookieToken);

		if (!options.safeMethods.includes(req.method)) {
			const submitted = req.args.get(CSRF_FIELD);
			if (!known || !submitted || !tokensMatch(cookieToken, submitted)) {
				console.error(`CSRF check failed: ${req.method} ${req.path} from ${req.ip}`);
				return options.reject(req);
			}
		}

		req.csrfToken = known ? cookieToken : generateCsrfToken();
		const response = await next();
		if (!known) {
			response.cookies.push(
				setCookie(CSRF_COOKIE, req.csrfToken, {
					path: "/",
					maxAge: options.maxAge,
					secure: options.secure,
					sameSite: "Lax",
				}),
			);
		}
		return response;
	};
}

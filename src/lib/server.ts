/**
 * http server
 *
 * node's built-in http server, no frameworks. requests are parsed into a
 * plain Request, routed by path pattern and answered with a plain Response.
 */

import http from "node:http";
import type { Readable } from "node:stream";

/**
 * incoming request as read off the socket, before parsing
 */
export interface RawRequest {
	method: string;
	url: string;
	headers: Record<string, string | string[] | undefined>;
	body: string;
	ip: string;
}

/**
 * parsed request from client
 */
export interface Request {
	method: string;
	/** pathname without query */
	path: string;
	/** pathname and query, as the client asked for it */
	fullPath: string;
	params: Map<string, string>;
	args: Map<string, string>;
	cookies: Map<string, string>;
	ip: string;
	body: string | null;
	/** filled in by the csrf middleware */
	csrfToken: string;
}

/**
 * response to send to client
 */
export interface Response {
	status: number;
	headers: Map<string, string>;
	cookies: string[];
	body: string;
}

export type RouteHandler = (req: Request) => Promise<Response> | Response;

export type Middleware = (
	req: Request,
	next: () => Promise<Response>,
) => Promise<Response>;

export interface ServerConfig {
	port: number;
	maxBodyBytes: number;
}

export function createServerConfig(
	overrides: Partial<ServerConfig> = {},
): ServerConfig {
	return {
		port: 8000,
		maxBodyBytes: 1024 * 1024,
		...overrides,
	};
}

function decode(s: string): string {
	// + is a space in application/x-www-form-urlencoded
	const spaced = s.replace(/\+/g, " ");
	try {
		return decodeURIComponent(spaced);
	} catch {
		return spaced;
	}
}

function decodeSegment(s: string): string {
	try {
		return decodeURIComponent(s);
	} catch {
		return s;
	}
}

/**
 * parse query string or urlencoded form args
 */
export function parseArgs(queryString: string): Map<string, string> {
	const args = new Map<string, string>();
	if (!queryString) return args;

	for (const pair of queryString.split("&")) {
		const eq = pair.indexOf("=");
		const key = eq === -1 ? pair : pair.slice(0, eq);
		const value = eq === -1 ? "" : pair.slice(eq + 1);
		if (key) {
			args.set(decode(key), decode(value));
		}
	}
	return args;
}

/**
 * parse cookies from cookie header
 */
export function parseCookies(cookieHeader: string | null): Map<string, string> {
	const cookies = new Map<string, string>();
	if (!cookieHeader) return cookies;

	const pairs = cookieHeader.split(";");
	for (const pair of pairs) {
		const [key, ...valueParts] = pair.trim().split("=");
		if (key) {
			cookies.set(key.trim(), valueParts.join("=").trim());
		}
	}
	return cookies;
}

/**
 * single header value; repeated headers are joined with commas
 */
export function header(raw: RawRequest, name: string): string | null {
	const value = raw.headers[name.toLowerCase()];
	if (value === undefined) return null;
	return Array.isArray(value) ? value.join(", ") : value;
}

/**
 * client ip, preferring proxy headers
 */
export function getClientIp(raw: RawRequest): string {
	const forwarded = header(raw, "x-forwarded-for");
	if (forwarded) {
		return forwarded.split(",")[0].trim();
	}

	const realIp = header(raw, "x-real-ip");
	if (realIp) return realIp;

	return raw.ip;
}

/**
 * split a path into its non-empty segments, so "/a/b/" and "/a/b" match alike
 */
export function pathSegments(path: string): string[] {
	return path.split("/").filter((segment) => segment.length > 0);
}

export function parseRequest(raw: RawRequest): Request {
	const url = new URL(raw.url, "http://localhost");
	const method = raw.method.toUpperCase();

	const args = parseArgs(url.search.slice(1));

	// form fields override query args of the same name
	let body: string | null = null;
	if (method === "POST") {
		body = raw.body;
		const contentType = header(raw, "content-type") ?? "";
		if (contentType.includes("application/x-www-form-urlencoded")) {
			for (const [key, value] of parseArgs(body)) {
				args.set(key, value);
			}
		}
	}

	return {
		method,
		path: url.pathname,
		fullPath: url.pathname + url.search,
		params: new Map(),
		args,
		cookies: parseCookies(header(raw, "cookie")),
		ip: getClientIp(raw),
		body,
		csrfToken: "",
	};
}

// =============================================================================
// Responses
// =============================================================================

export function htmlResponse(
	body: string,
	status: number = 200,
	headers: Record<string, string> = {},
): Response {
	const responseHeaders = new Map<string, string>();
	responseHeaders.set("Content-Type", "text/html; charset=utf-8");

	for (const [key, value] of Object.entries(headers)) {
		responseHeaders.set(key, value);
	}

	return { status, headers: responseHeaders, cookies: [], body };
}

export function redirectResponse(location: string): Response {
	const headers = new Map<string, string>();
	headers.set("Location", location);
	return { status: 302, headers, cookies: [], body: "" };
}

export function errorResponse(message: string, status: number = 500): Response {
	return htmlResponse(`<html><body>${message}</body></html>`, status);
}

export function notFoundResponse(): Response {
	return htmlResponse("<html><body>Not Found</body></html>", 404);
}

export function methodNotAllowedResponse(allowed: string[]): Response {
	return htmlResponse("<html><body>Method Not Allowed</body></html>", 405, {
		Allow: allowed.join(", "),
	});
}

// =============================================================================
// Routing
// =============================================================================

interface Route {
	pattern: string;
	segments: string[];
	methods: string[];
	handler: RouteHandler;
}

/**
 * match path segments against a pattern, where ":name" captures a segment
 */
export function matchPattern(
	patternSegments: string[],
	segments: string[],
): Map<string, string> | null {
	if (patternSegments.length !== segments.length) return null;
	const params = new Map<string, string>();
	for (let i = 0; i < segments.length; i++) {
		const expected = patternSegments[i];
		if (expected.startsWith(":")) {
			params.set(expected.slice(1), decodeSegment(segments[i]));
		} else if (expected !== segments[i]) {
			return null;
		}
	}
	return params;
}

export class Router {
	private routes: Route[] = [];
	private middleware: Middleware[] = [];
	private fallback: RouteHandler = () => notFoundResponse();

	/**
	 * register a handler for a path pattern such as "articles/edit/:id"
	 */
	route(
		pattern: string,
		handler: RouteHandler,
		methods: string[] = ["GET", "POST"],
	): void {
		this.routes.push({
			pattern,
			segments: pathSegments(pattern),
			methods,
			handler,
		});
	}

	/**
	 * handler for paths no route matches; middleware still applies
	 */
	notFound(handler: RouteHandler): void {
		this.fallback = handler;
	}

	/**
	 * wrap every matched route; middleware runs in registration order
	 */
	use(middleware: Middleware): void {
		this.middleware.push(middleware);
	}

	async handle(req: Request): Promise<Response> {
		const segments = pathSegments(req.path);

		for (const route of this.routes) {
			const params = matchPattern(route.segments, segments);
			if (!params) continue;

			if (!route.methods.includes(req.method)) {
				return methodNotAllowedResponse(route.methods);
			}

			req.params = params;
			return this.run(req, route.handler, 0);
		}

		return this.run(req, this.fallback, 0);
	}

	private async run(
		req: Request,
		handler: RouteHandler,
		index: number,
	): Promise<Response> {
		const middleware = this.middleware[index];
		if (!middleware) {
			return await handler(req);
		}
		return middleware(req, () => this.run(req, handler, index + 1));
	}
}

/**
 * route a request, turning anything a handler throws into a 500
 */
export async function dispatch(router: Router, req: Request): Promise<Response> {
	try {
		return await router.handle(req);
	} catch (error) {
		console.error(`${req.method} ${req.fullPath} from ${req.ip} failed:`, error);
		return errorResponse("Internal server error");
	}
}

// =============================================================================
// Node adapter
// =============================================================================

/**
 * requests are processed one at a time so each one sees and leaves the
 * tables in a consistent state
 */
export class RequestQueue {
	private tail: Promise<void> = Promise.resolve();

	enqueue<T>(fn: () => Promise<T>): Promise<T> {
		const run = this.tail.then(fn);
		// the caller sees the failure through run; the tail only keeps order
		this.tail = run.then(() => undefined, () => undefined);
		return run;
	}
}

export class BodyTooLargeError extends Error {}

/**
 * read a request body as text. past maxBytes the rest is drained unread,
 * leaving the connection open for the 413.
 */
export function readBody(
	incoming: Readable,
	maxBytes: number,
): Promise<string> {
	return new Promise((resolve, reject) => {
		let chunks: Buffer[] = [];
		let size = 0;
		let tooLarge = false;
		incoming.on("data", (chunk: Buffer) => {
			if (tooLarge) return;
			size += chunk.length;
			if (size > maxBytes) {
				tooLarge = true;
				chunks = [];
				reject(new BodyTooLargeError(`request body over ${maxBytes} bytes`));
				incoming.resume();
				return;
			}
			chunks.push(chunk);
		});
		incoming.on("end", () => {
			if (!tooLarge) resolve(Buffer.concat(chunks).toString("utf8"));
		});
		incoming.on("error", reject);
	});
}

function writeResponse(outgoing: http.ServerResponse, response: Response): void {
	outgoing.statusCode = response.status;
	for (const [key, value] of response.headers) {
		outgoing.setHeader(key, value);
	}
	if (response.cookies.length > 0) {
		outgoing.setHeader("Set-Cookie", response.cookies);
	}
	outgoing.end(response.body);
}

async function respond(
	config: ServerConfig,
	router: Router,
	queue: RequestQueue,
	incoming: http.IncomingMessage,
): Promise<Response> {
	let body: string;
	try {
		body = await readBody(incoming, config.maxBodyBytes);
	} catch (error) {
		if (error instanceof BodyTooLargeError) {
			return errorResponse("Request body too large", 413);
		}
		throw error;
	}

	const req = parseRequest({
		method: incoming.method ?? "GET",
		url: incoming.url ?? "/",
		headers: incoming.headers,
		body,
		ip: incoming.socket.remoteAddress ?? "",
	});

	return queue.enqueue(() => dispatch(router, req));
}

export function createServer(config: ServerConfig, router: Router): http.Server {
	const queue = new RequestQueue();

	return http.createServer((incoming, outgoing) => {
		respond(config, router, queue, incoming).then(
			(response) => writeResponse(outgoing, response),
			(error: unknown) => {
				console.error("Request error:", error);
				writeResponse(outgoing, errorResponse("Internal server error"));
			},
		);
	});
}

// =============================================================================
// Helpers
// =============================================================================

export interface CookieOptions {
	path?: string;
	maxAge?: number;
	httpOnly?: boolean;
	secure?: boolean;
	sameSite?: "Strict" | "Lax" | "None";
}

/**
 * create set-cookie header value
 */
export function setCookie(
	name: string,
	value: string,
	options: CookieOptions = {},
): string {
	let cookie = `${name}=${encodeURIComponent(value)}`;

	if (options.path) cookie += `; Path=${options.path}`;
	if (options.maxAge !== undefined) cookie += `; Max-Age=${options.maxAge}`;
	if (options.httpOnly) cookie += "; HttpOnly";
	if (options.secure) cookie += "; Secure";
	if (options.sameSite) cookie += `; SameSite=${options.sameSite}`;

	return cookie;
}

export function clearCookie(name: string, path: string = "/"): string {
	return `${name}=; Path=${path}; Max-Age=0`;
}

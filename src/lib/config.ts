/**
 * site configuration
 *
 * read from <dataDir>/config.json when present, with environment variables
 * taking precedence over the file.
 */

import { join } from "node:path";
import { z } from "zod";
import { type AppConfig, AppConfigSchema } from "./schemas.ts";
import { loadJson } from "./storage.ts";

export type Env = Record<string, string | undefined>;

const ConfigFileSchema = z.record(z.string(), z.unknown());

function parseBoolean(value: string): boolean {
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parsePort(value: string): number {
	const port = Number(value);
	if (!Number.isInteger(port)) {
		throw new Error(`PORT must be a whole number, got "${value}"`);
	}
	return port;
}

/**
 * settings given by environment variables, only those that are set
 */
export function envOverrides(env: Env): Record<string, unknown> {
	const overrides: Record<string, unknown> = {};
	if (env.PORT) overrides.port = parsePort(env.PORT);
	if (env.DATA_DIR) overrides.dataDir = env.DATA_DIR;
	if (env.SITE_NAME) overrides.siteName = env.SITE_NAME;
	if (env.SITE_URL) overrides.siteUrl = env.SITE_URL;
	if (env.SECRET_KEY) overrides.secretKey = env.SECRET_KEY;
	if (env.SECURE_COOKIES) {
		overrides.secureCookies = parseBoolean(env.SECURE_COOKIES);
	}
	return overrides;
}

export async function loadConfig(env: Env = process.env): Promise<AppConfig> {
	const dataDir = env.DATA_DIR || "data";
	const file = await loadJson(join(dataDir, "config.json"), ConfigFileSchema);

	const merged: Record<string, unknown> = { ...file, dataDir, ...envOverrides(env) };

	if (env.NODE_ENV === "production" && merged.secretKey === undefined) {
		throw new Error("SECRET_KEY must be set in production");
	}

	const parsed = AppConfigSchema.safeParse(merged);
	if (!parsed.success) {
		const problems = parsed.error.issues.map((issue) =>
			`${issue.path.join(".")}: ${issue.message}`
		);
		throw new Error(`Invalid configuration: ${problems.join("; ")}`);
	}
	return parsed.data;
}

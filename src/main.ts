/**
 * main entry point for the newspaper site
 */

import { createApp } from "./app.ts";
import { loadConfig } from "./lib/config.ts";
import { createServer, createServerConfig } from "./lib/server.ts";

async function main(): Promise<void> {
	console.log("starting newspaper...");

	const config = await loadConfig();
	const app = await createApp(config);

	const users = app.store.listUsers().length;
	const articles = app.store.listArticles().length;
	console.log(`data directory: ${config.dataDir}`);
	console.log(`loaded ${users} users and ${articles} articles`);

	const serverConfig = createServerConfig({ port: config.port });
	const server = createServer(serverConfig, app.router);
	server.listen(serverConfig.port, () => {
		console.log(`server running on http://localhost:${serverConfig.port}`);
	});
}

main().catch((error: unknown) => {
	console.error("failed to start:", error);
	process.exitCode = 1;
});

/**
 * application assembly: store, auth, mailer and routes for one config
 */

import { articleAuthorizer } from "./lib/access.ts";
import type { ArticleContext } from "./lib/articles.ts";
import { AuthManager } from "./lib/auth.ts";
import { ConsoleMailer, type Mailer } from "./lib/mail.ts";
import type { AppConfig } from "./lib/schemas.ts";
import { Router } from "./lib/server.ts";
import { createStorageConfig, loadStaffList } from "./lib/storage.ts";
import { Store } from "./lib/store.ts";
import { setupRoutes } from "./routes.ts";

export interface App {
	config: AppConfig;
	store: Store;
	auth: AuthManager;
	mailer: Mailer;
	articles: ArticleContext;
	router: Router;
}

export interface AppOptions {
	mailer?: Mailer;
}

export async function createApp(
	config: AppConfig,
	options: AppOptions = {},
): Promise<App> {
	const storage = createStorageConfig(config.dataDir);
	const store = await Store.open(storage);

	// users named in the staff file get the admin page
	for (const username of await loadStaffList(storage)) {
		const user = store.findUserByUsername(username);
		if (user && !user.isStaff) {
			await store.setStaff(user.id, true);
		}
	}

	const auth = new AuthManager(store, {
		secretKey: config.secretKey,
		sessionMaxAgeSeconds: config.sessionMaxAgeSeconds,
		passwordResetTimeoutSeconds: config.passwordResetTimeoutSeconds,
		passwordIterations: config.passwordIterations,
	});

	const app: App = {
		config,
		store,
		auth,
		mailer: options.mailer ?? new ConsoleMailer(),
		articles: { store, authorizer: articleAuthorizer },
		router: new Router(),
	};
	setupRoutes(app.router, app);
	return app;
}

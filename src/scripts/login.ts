/**
 * Login Script
 * Run with: npm run login
 *
 * 1. Reads CLIENT_ID (and optionally CLIENT_SECRET) from the environment
 * 2. Reuses a cached token, or opens the browser for consent
 * 3. Fetches the user profile to verify the token works
 */

import { isSpotifyError } from "../errors";
import {
	ApiClient,
	type AuthFlow,
	AuthorizationCodeFlow,
	AuthService,
	ConfigService,
	createOAuthConfig,
	createErrorHandler,
	DEFAULT_SCOPES,
	hasScopes,
	isTokenValid,
	PkceFlow,
	SpotifyApiService,
} from "../services";
import { configureLogger, getLogger, shutdownLogger } from "../utils";

const logger = getLogger("Login");

async function main(): Promise<void> {
	configureLogger();

	const configService = new ConfigService();
	const settings = configService.clientSettings();
	const cache = configService.createTokenCache();
	const credential = configService.createCredential();
	const oauth = createOAuthConfig(settings.redirectUri, DEFAULT_SCOPES);

	logger.info(`Token cache: ${cache.getDir()}`);

	const flow: AuthFlow = credential.clientSecret
		? await AuthorizationCodeFlow.setup(credential, oauth, { cache })
		: await PkceFlow.setup(credential, oauth, { cache });

	const token = flow.token();
	const usable = hasScopes(token, flow.scopes()) && (isTokenValid(token) || Boolean(token.refreshToken));
	if (usable) {
		logger.info("Found cached credentials");
	} else {
		logger.info("No usable credentials, starting browser login");
		await new AuthService({ redirectUri: settings.redirectUri, cache }).login(flow);
	}

	const api = new SpotifyApiService(new ApiClient(flow));
	const user = await api.getCurrentUser();

	logger.info(`Logged in as ${user.display_name ?? user.id}`, {
		country: user.country ?? "N/A",
		product: user.product ?? "N/A",
	});

	if (user.product !== "premium") {
		logger.warn("Spotify Premium is required for playback control");
	}
}

main()
	.catch(async (error: unknown) => {
		await createErrorHandler().handle(error, { operation: "login" });
		process.exitCode = isSpotifyError(error) && error.kind === "configuration" ? 2 : 1;
	})
	.finally(shutdownLogger);

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { APP_NAME, DEFAULT_REDIRECT_URI } from "../config/constants";
import { getLoggingConfig } from "../config/logging";
import { ConfigurationError } from "../errors";
import type { Credential } from "../types/spotify";
import { createPkceCredential, createSecretCredential } from "./Credential";
import { TokenCache } from "./TokenCache";

const ClientSettingsSchema = z.object({
	CLIENT_ID: z
		.string({ required_error: "CLIENT_ID is required" })
		.min(1, "CLIENT_ID is required"),
	CLIENT_SECRET: z
		.string()
		.optional()
		.transform((value) => (value ? value : undefined)),
	REDIRECT_URI: z.string().url("REDIRECT_URI must be an absolute URL").default(DEFAULT_REDIRECT_URI),
});

export interface ClientSettings {
	clientId: string;
	clientSecret?: string;
	redirectUri: string;
}

/**
 * Environment-driven configuration
 * Resolves `$XDG_CONFIG_HOME/spotwire/` (or `SPOTWIRE_CONFIG_DIR`) and
 * the app registration from `CLIENT_ID` / `CLIENT_SECRET` / `REDIRECT_URI`.
 */
export class ConfigService {
	private readonly configDir: string;

	constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
		// Use XDG_CONFIG_HOME if available, otherwise ~/.config
		const configHome = env.XDG_CONFIG_HOME || join(homedir(), ".config");
		this.configDir = env.SPOTWIRE_CONFIG_DIR || join(configHome, APP_NAME);
	}

	getConfigDir(): string {
		return this.configDir;
	}

	getTokenCacheDir(): string {
		return join(this.configDir, "tokens");
	}

	getLogDir(): string {
		return getLoggingConfig(this.env).logDir;
	}

	/**
	 * App registration read from the environment
	 * @throws ConfigurationError listing every invalid variable
	 */
	clientSettings(): ClientSettings {
		const result = ClientSettingsSchema.safeParse({
			CLIENT_ID: this.env.CLIENT_ID,
			CLIENT_SECRET: this.env.CLIENT_SECRET,
			REDIRECT_URI: this.env.REDIRECT_URI || undefined,
		});

		if (!result.success) {
			const problems = result.error.issues.map((issue) => issue.message).join("; ");
			throw new ConfigurationError(`Invalid configuration: ${problems}`, {
				cause: result.error,
			});
		}

		return {
			clientId: result.data.CLIENT_ID,
			clientSecret: result.data.CLIENT_SECRET,
			redirectUri: result.data.REDIRECT_URI,
		};
	}

	/**
	 * Secret credential when `CLIENT_SECRET` is set, PKCE otherwise
	 */
	createCredential(): Credential {
		const { clientId, clientSecret } = this.clientSettings();
		return clientSecret
			? createSecretCredential(clientId, clientSecret)
			: createPkceCredential(clientId);
	}

	createTokenCache(): TokenCache {
		return new TokenCache(this.getTokenCacheDir());
	}
}

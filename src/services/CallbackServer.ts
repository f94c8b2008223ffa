/**
 * Local HTTP listener for the OAuth redirect
 * Answers the browser with a small HTML page and hands the authorization
 * code back to the login flow.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { APP_NAME, AUTH_TIMEOUT_MS, DEFAULT_CALLBACK_PORT } from "../config/constants";
import { AuthorizationDeniedError, TransportError } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("CallbackServer");

export interface CallbackServerOptions {
	/** Redirect URI registered for the app; host, port and path are served */
	redirectUri: string;
	/** Throws when the echoed `state` is not the one that was sent */
	verifyState: (state: string | null) => void;
}

type Outcome = { code: string } | { error: unknown };

/**
 * Extract the authorization code from a redirect URL.
 * A provider `error` is reported first, then the state is verified.
 */
export function parseCallback(
	url: URL,
	verifyState: (state: string | null) => void,
): string {
	const error = url.searchParams.get("error");
	if (error) {
		throw new AuthorizationDeniedError(error);
	}

	verifyState(url.searchParams.get("state"));

	const code = url.searchParams.get("code");
	if (!code) {
		throw new AuthorizationDeniedError("no authorization code received");
	}
	return code;
}

export class CallbackServer {
	private server: Server | null = null;
	private readonly hostname: string;
	private readonly port: number;
	private readonly callbackPath: string;
	private outcome: Outcome | null = null;
	private waiter: ((outcome: Outcome) => void) | null = null;

	constructor(private readonly options: CallbackServerOptions) {
		const redirect = new URL(options.redirectUri);
		this.hostname = redirect.hostname;
		// ":0" asks the OS for a free port
		this.port = redirect.port === "" ? DEFAULT_CALLBACK_PORT : Number(redirect.port);
		this.callbackPath = redirect.pathname;
	}

	/**
	 * Start listening. Resolves with the bound port.
	 */
	listen(): Promise<number> {
		return new Promise((resolve, reject) => {
			const server = createServer((req, res) => this.handle(req, res));

			server.once("error", (err) => {
				reject(
					new TransportError(`Failed to start callback server: ${err.message}`, {
						cause: err,
					}),
				);
			});

			server.listen(this.port, this.hostname, () => {
				this.server = server;
				const address = server.address();
				const port = isAddressInfo(address) ? address.port : this.port;
				logger.debug(`Listening for redirect on ${this.hostname}:${port}${this.callbackPath}`);
				resolve(port);
			});
		});
	}

	/**
	 * Wait for the redirect, then stop the server
	 */
	async waitForCode(timeoutMs: number = AUTH_TIMEOUT_MS): Promise<string> {
		let timer: NodeJS.Timeout | undefined;

		try {
			return await new Promise<string>((resolve, reject) => {
				const deliver = (outcome: Outcome): void => {
					if ("code" in outcome) {
						resolve(outcome.code);
					} else {
						reject(outcome.error);
					}
				};

				if (this.outcome) {
					deliver(this.outcome);
					return;
				}

				this.waiter = deliver;
				timer = setTimeout(() => {
					this.settle({ error: new AuthorizationDeniedError("timed out waiting for authorization") });
				}, timeoutMs);
			});
		} finally {
			clearTimeout(timer);
			this.waiter = null;
			await this.close();
		}
	}

	close(): Promise<void> {
		const server = this.server;
		this.server = null;
		if (!server) return Promise.resolve();

		return new Promise((resolve, reject) => {
			server.close((err) => (err ? reject(err) : resolve()));
			server.closeAllConnections();
		});
	}

	private handle(req: IncomingMessage, res: ServerResponse): void {
		const url = new URL(req.url ?? "/", `http://${this.hostname}`);

		if (url.pathname !== this.callbackPath) {
			res.writeHead(404, { "Content-Type": "text/plain" });
			res.end("Not found");
			return;
		}

		let outcome: Outcome;
		let page: string;
		try {
			outcome = { code: parseCallback(url, this.options.verifyState) };
			page = successHtml();
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			logger.warn(`Authorization callback rejected: ${message}`);
			outcome = { error };
			page = errorHtml(message);
		}

		res.writeHead("code" in outcome ? 200 : 400, {
			"Content-Type": "text/html",
			Connection: "close",
		});
		// Settle once the page is flushed so closing the server cannot cut it off
		res.end(page, () => this.settle(outcome));
	}

	private settle(outcome: Outcome): void {
		if (this.outcome) return;
		this.outcome = outcome;
		this.waiter?.(outcome);
	}
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
	return typeof address === "object" && address !== null;
}

function escapeHtml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&#39;");
}

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      display: flex;
      justify-content: center;
      align-items: center;
      height: 100vh;
      margin: 0;
      background: #121212;
      color: #fff;
    }
    .container { text-align: center; padding: 40px; border-radius: 16px; }
    h1 { margin-bottom: 16px; }
    p { color: #b3b3b3; }
    .ok { color: #1DB954; }
    .failed { color: #e74c3c; }
    .error { color: #ff6b6b; font-family: monospace; margin-top: 16px; }`;

export function successHtml(): string {
	return `<!DOCTYPE html>
<html>
<head>
  <title>${APP_NAME} - Authorization complete</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="container">
    <h1 class="ok">Authorization complete</h1>
    <p>You can close this window and return to ${APP_NAME}.</p>
  </div>
</body>
</html>`;
}

export function errorHtml(error: string): string {
	return `<!DOCTYPE html>
<html>
<head>
  <title>${APP_NAME} - Authorization failed</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
  <div class="container">
    <h1 class="failed">Authorization failed</h1>
    <p class="error">${escapeHtml(error)}</p>
    <p>Please close this window and try again.</p>
  </div>
</body>
</html>`;
}

/**
 * Services re-exports
 */

export {
	ApiClient,
	type ApiClientOptions,
	type ApiRequest,
	type ApiResult,
	type HttpMethod,
	type ResponseSchema,
} from "./ApiClient";
export {
	AuthService,
	type AuthServiceOptions,
	DEFAULT_SCOPES,
	type LoginOptions,
} from "./AuthService";
export {
	CallbackServer,
	type CallbackServerOptions,
	parseCallback,
} from "./CallbackServer";
export { type ClientSettings, ConfigService } from "./ConfigService";
export {
	basicAuthorization,
	computeCodeChallenge,
	createOAuthConfig,
	createPkceCredential,
	createSecretCredential,
	generatePKCE,
	generateState,
} from "./Credential";
export type { ErrorContext, RecoveryStrategy } from "./ErrorHandler";
export {
	createErrorHandler,
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
} from "./ErrorHandler";
export {
	type AuthFlow,
	AuthorizationCodeFlow,
	ClientCredentialsFlow,
	type FlowConfig,
	PkceFlow,
} from "./flows";
export {
	cursorLinks,
	type LinkExtractor,
	offsetLinks,
	type PageCursors,
	Pager,
	type PagerOptions,
} from "./Pager";
export {
	type PlayOptions,
	type SearchType,
	SpotifyApiService,
} from "./SpotifyApiService";
export {
	createEmptyToken,
	hasScopes,
	isTokenValid,
	toAuthorizationHeader,
} from "./Token";
export { TokenCache } from "./TokenCache";
export { TokenEndpoint, type TokenRequest } from "./TokenEndpoint";
export { TokenSlot } from "./TokenSlot";

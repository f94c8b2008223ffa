/**
 * spotwire - Spotify Web API client
 *
 * Authentication flows with a cached, single-flight refreshed token, an
 * authenticated request layer that classifies every response, and a
 * bidirectional pager over paginated collections.
 */

export * from "./errors";
export * from "./events";
export * from "./services";
export type * from "./types/spotify";
export * from "./schemas/spotify";
export {
	configureLogger,
	getLogger,
	Logger,
	LogLevel,
	shutdownLogger,
	type ConfigureLoggerOptions,
	type LoggerConfig,
	expectSpotifyUri,
	formatSpotifyUri,
	parseSpotifyUri,
	spotifyUri,
	type SpotifyResource,
	type SpotifyUri,
	type UserCollection,
} from "./utils";

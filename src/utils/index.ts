export {
	Logger,
	getLogger,
	configureLogger,
	shutdownLogger,
	type ConfigureLoggerOptions,
	type LoggerConfig,
} from "./Logger";
export { LogLevel } from "../config/logging";
export { LogWriter, type LogWriterConfig } from "./LogWriter";
export {
	expectSpotifyUri,
	formatSpotifyUri,
	parseSpotifyUri,
	spotifyUri,
	type SpotifyResource,
	type SpotifyUri,
	type UserCollection,
} from "./spotifyUri";

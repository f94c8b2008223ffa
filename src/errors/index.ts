export {
	AuthorizationDeniedError,
	AuthProviderError,
	CacheWriteError,
	ConfigurationError,
	CsrfMismatchError,
	DecodeError,
	ForbiddenError,
	InvalidCredentialError,
	InvalidTokenError,
	InvalidUriError,
	isSpotifyError,
	MissingRefreshTokenError,
	NoActiveDeviceError,
	NotFoundError,
	PagerBusyError,
	ReAuthenticationRequiredError,
	RequestFailedError,
	ScopesNotGrantedError,
	SpotifyError,
	type SpotifyErrorKind,
	TransportError,
	UnknownResponseError,
} from "./SpotifyError";

/**
 * Spotify Web API Service
 * Endpoint builders for profile, library, playlists, search and playback.
 * Collections come back as pagers; every response is validated with Zod.
 */

import { API_LIMITS, DEFAULT_MARKET, HTTP_STATUS, SCOPES } from "../config/constants";
import { UnknownResponseError } from "../errors";
import {
	DevicesSchema,
	EmptyBodySchema,
	FollowedArtistsSchema,
	type FollowedArtists,
	type PaginatedPlaylistItems,
	PaginatedPlaylistItemsSchema,
	type PaginatedPlaylists,
	PaginatedPlaylistsSchema,
	type PaginatedSavedTracks,
	PaginatedSavedTracksSchema,
	PlaybackStateSchema,
	type RecentlyPlayed,
	RecentlyPlayedSchema,
	SearchResultsSchema,
	SpotifyUserSchema,
	type ValidatedDevices,
	type ValidatedPlaybackState,
	type ValidatedSearchResults,
	type ValidatedSpotifyUser,
} from "../schemas/spotify";
import type { PageLinks } from "../types/spotify";
import { expectSpotifyUri, type SpotifyResource, type SpotifyUri } from "../utils";
import type { ApiClient, ApiRequest, ResponseSchema } from "./ApiClient";
import { cursorLinks, offsetLinks, Pager } from "./Pager";

export type SearchType = "track" | "artist" | "playlist";

export interface PlayOptions {
	deviceId?: string;
	/** Track or episode URIs to play */
	uris?: readonly (string | SpotifyUri)[];
	/** Album, artist, playlist or show URI */
	contextUri?: string | SpotifyUri;
	/** Start position inside the context */
	offset?: number;
	positionMs?: number;
}

const NO_LINKS: PageLinks = { next: null, prev: null };

const PLAYABLE: readonly SpotifyResource[] = ["track", "episode"];
const CONTEXTS: readonly SpotifyResource[] = ["album", "artist", "playlist", "show"];

export class SpotifyApiService {
	constructor(private readonly client: ApiClient) {}

	// ─────────────────────────────────────────────────────────────
	// Profile
	// ─────────────────────────────────────────────────────────────

	async getCurrentUser(): Promise<ValidatedSpotifyUser> {
		return this.fetch({ path: "/me" }, SpotifyUserSchema);
	}

	// ─────────────────────────────────────────────────────────────
	// Library
	// ─────────────────────────────────────────────────────────────

	savedTracks(limit: number = API_LIMITS.SAVED_TRACKS): Pager<PaginatedSavedTracks> {
		return new Pager(this.client, {
			firstLink: "/me/tracks",
			query: { limit, market: DEFAULT_MARKET },
			scopes: [SCOPES.USER_LIBRARY_READ],
			schema: PaginatedSavedTracksSchema,
			extract: offsetLinks,
		});
	}

	/**
	 * Save tracks to the library, in batches the API accepts
	 */
	async saveTracks(trackIds: readonly string[]): Promise<void> {
		for (const ids of batches(trackIds, API_LIMITS.SAVE_TRACKS_BATCH)) {
			await this.client.send(
				{
					method: "PUT",
					path: "/me/tracks",
					body: { ids },
					scopes: [SCOPES.USER_LIBRARY_MODIFY],
				},
				EmptyBodySchema,
			);
		}
	}

	async removeSavedTracks(trackIds: readonly string[]): Promise<void> {
		for (const ids of batches(trackIds, API_LIMITS.SAVE_TRACKS_BATCH)) {
			await this.client.send(
				{
					method: "DELETE",
					path: "/me/tracks",
					body: { ids },
					scopes: [SCOPES.USER_LIBRARY_MODIFY],
				},
				EmptyBodySchema,
			);
		}
	}

	followedArtists(limit: number = API_LIMITS.FOLLOWED_ARTISTS): Pager<FollowedArtists> {
		return new Pager(this.client, {
			firstLink: "/me/following",
			query: { type: "artist", limit },
			scopes: [SCOPES.USER_FOLLOW_READ],
			schema: FollowedArtistsSchema,
			// The endpoint only pages forward
			extract: (page) => cursorLinks(page.artists, () => null),
		});
	}

	/**
	 * Play history, newest first. Moving back uses the `after` cursor.
	 */
	recentlyPlayed(limit: number = API_LIMITS.RECENTLY_PLAYED): Pager<RecentlyPlayed> {
		return new Pager(this.client, {
			firstLink: "/me/player/recently-played",
			query: { limit },
			scopes: [SCOPES.USER_READ_RECENTLY_PLAYED],
			schema: RecentlyPlayedSchema,
			extract: (page) =>
				cursorLinks(page, ({ after }) =>
					after
						? `/me/player/recently-played?${new URLSearchParams({
								limit: String(limit),
								after,
							}).toString()}`
						: null,
				),
		});
	}

	// ─────────────────────────────────────────────────────────────
	// Playlists
	// ─────────────────────────────────────────────────────────────

	playlists(limit: number = API_LIMITS.PLAYLISTS): Pager<PaginatedPlaylists> {
		return new Pager(this.client, {
			firstLink: "/me/playlists",
			query: { limit },
			scopes: [SCOPES.PLAYLIST_READ_PRIVATE],
			schema: PaginatedPlaylistsSchema,
			extract: offsetLinks,
		});
	}

	playlistItems(
		playlistId: string,
		limit: number = API_LIMITS.PLAYLIST_ITEMS,
	): Pager<PaginatedPlaylistItems> {
		return new Pager(this.client, {
			firstLink: `/playlists/${encodeURIComponent(playlistId)}/tracks`,
			query: { limit, market: DEFAULT_MARKET },
			schema: PaginatedPlaylistItemsSchema,
			extract: offsetLinks,
		});
	}

	// ─────────────────────────────────────────────────────────────
	// Search
	// ─────────────────────────────────────────────────────────────

	/**
	 * Search one item type. Each page holds only that type's envelope.
	 */
	search(
		query: string,
		type: SearchType = "track",
		limit: number = API_LIMITS.SEARCH_RESULTS,
	): Pager<ValidatedSearchResults> {
		return new Pager(this.client, {
			firstLink: "/search",
			query: { q: query, type, limit },
			schema: SearchResultsSchema,
			extract: (page) => {
				const paging = searchPage(page, type);
				return paging ? offsetLinks(paging) : NO_LINKS;
			},
		});
	}

	// ─────────────────────────────────────────────────────────────
	// Playback
	// ─────────────────────────────────────────────────────────────

	async getDevices(): Promise<ValidatedDevices> {
		return this.fetch(
			{ path: "/me/player/devices", scopes: [SCOPES.USER_READ_PLAYBACK_STATE] },
			DevicesSchema,
		);
	}

	/**
	 * Current playback, or null when nothing is playing
	 */
	async getPlaybackState(): Promise<ValidatedPlaybackState | null> {
		const result = await this.client.send(
			{
				path: "/me/player",
				query: { market: DEFAULT_MARKET },
				scopes: [SCOPES.USER_READ_PLAYBACK_STATE],
			},
			PlaybackStateSchema,
		);
		return result.kind === "content" ? result.data : null;
	}

	/**
	 * @throws InvalidUriError before sending when a URI is of the wrong kind
	 */
	async play(options: PlayOptions = {}): Promise<void> {
		const body: Record<string, unknown> = {};
		if (options.contextUri) {
			body.context_uri = expectSpotifyUri(options.contextUri, CONTEXTS);
		}
		if (options.uris) {
			body.uris = options.uris.map((uri) => expectSpotifyUri(uri, PLAYABLE));
		}
		if (options.offset !== undefined) {
			body.offset = { position: options.offset };
		}
		if (options.positionMs !== undefined) {
			body.position_ms = options.positionMs;
		}

		await this.command({
			method: "PUT",
			path: "/me/player/play",
			query: { device_id: options.deviceId },
			body: Object.keys(body).length > 0 ? body : undefined,
		});
	}

	async pause(deviceId?: string): Promise<void> {
		await this.command({
			method: "PUT",
			path: "/me/player/pause",
			query: { device_id: deviceId },
		});
	}

	async next(deviceId?: string): Promise<void> {
		await this.command({
			method: "POST",
			path: "/me/player/next",
			query: { device_id: deviceId },
		});
	}

	async previous(deviceId?: string): Promise<void> {
		await this.command({
			method: "POST",
			path: "/me/player/previous",
			query: { device_id: deviceId },
		});
	}

	async addToQueue(uri: string | SpotifyUri, deviceId?: string): Promise<void> {
		await this.command({
			method: "POST",
			path: "/me/player/queue",
			query: { uri: expectSpotifyUri(uri, PLAYABLE), device_id: deviceId },
		});
	}

	/**
	 * Move playback to another device
	 */
	async transferPlayback(deviceId: string, play = false): Promise<void> {
		await this.command({
			method: "PUT",
			path: "/me/player",
			body: { device_ids: [deviceId], play },
		});
	}

	// ─────────────────────────────────────────────────────────────
	// Helpers
	// ─────────────────────────────────────────────────────────────

	private async fetch<T>(request: ApiRequest, schema: ResponseSchema<T>): Promise<T> {
		const result = await this.client.send(request, schema);
		if (result.kind === "no-content") {
			throw new UnknownResponseError(HTTP_STATUS.NO_CONTENT, "");
		}
		return result.data;
	}

	/**
	 * Player commands answer 404 when no device is active
	 */
	private async command(request: ApiRequest): Promise<void> {
		await this.client.send(
			{ ...request, notFound: "device", scopes: [SCOPES.USER_MODIFY_PLAYBACK_STATE] },
			EmptyBodySchema,
		);
	}
}

function searchPage(results: ValidatedSearchResults, type: SearchType) {
	switch (type) {
		case "track":
			return results.tracks;
		case "artist":
			return results.artists;
		case "playlist":
			return results.playlists;
	}
}

function* batches<T>(items: readonly T[], size: number): Generator<T[]> {
	for (let i = 0; i < items.length; i += size) {
		yield items.slice(i, i + size);
	}
}

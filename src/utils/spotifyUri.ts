/**
 * Spotify URIs: `spotify:<resource>:<id>`, plus the user collection forms
 * `spotify:user:<id>:collection` and `spotify:user:<id>:collection:your-episodes`
 */

import { z } from "zod";
import { InvalidUriError } from "../errors";

const ResourceSchema = z.enum(["artist", "album", "track", "playlist", "user", "show", "episode"]);

export type SpotifyResource = z.infer<typeof ResourceSchema>;

export type UserCollection = "collection" | "collection:your-episodes";

export interface SpotifyUri {
	resource: SpotifyResource;
	id: string;
	/** Only on `user` URIs */
	collection?: UserCollection;
}

function isUserCollection(value: string): value is UserCollection {
	return value === "collection" || value === "collection:your-episodes";
}

/**
 * @throws InvalidUriError when `value` is not a Spotify URI
 */
export function parseSpotifyUri(value: string): SpotifyUri {
	const [scheme, kind, ...rest] = value.split(":");
	if (scheme !== "spotify" || kind === undefined) {
		throw new InvalidUriError(value, "expected spotify:<resource>:<id>");
	}

	const resource = ResourceSchema.safeParse(kind);
	if (!resource.success) {
		throw new InvalidUriError(value, `unknown resource "${kind}"`);
	}

	const [id, ...tail] = rest;
	if (!id || /\s/.test(id)) {
		throw new InvalidUriError(value, "missing or malformed id");
	}

	if (tail.length === 0) {
		return { resource: resource.data, id };
	}

	const collection = tail.join(":");
	if (resource.data !== "user" || !isUserCollection(collection)) {
		throw new InvalidUriError(value, `unexpected suffix "${collection}"`);
	}
	return { resource: "user", id, collection };
}

export function formatSpotifyUri(uri: SpotifyUri): string {
	const base = `spotify:${uri.resource}:${uri.id}`;
	return uri.collection ? `${base}:${uri.collection}` : base;
}

/**
 * Parse `value` and check it names one of `allowed`
 * @throws InvalidUriError
 */
export function expectSpotifyUri(
	value: string | SpotifyUri,
	allowed: readonly SpotifyResource[],
): string {
	const uri = typeof value === "string" ? parseSpotifyUri(value) : value;
	const formatted = formatSpotifyUri(uri);
	if (!allowed.includes(uri.resource) || uri.collection !== undefined) {
		throw new InvalidUriError(formatted, `expected one of ${allowed.join(", ")}`);
	}
	return formatted;
}

export const spotifyUri = {
	artist: (id: string): SpotifyUri => ({ resource: "artist", id }),
	album: (id: string): SpotifyUri => ({ resource: "album", id }),
	track: (id: string): SpotifyUri => ({ resource: "track", id }),
	playlist: (id: string): SpotifyUri => ({ resource: "playlist", id }),
	show: (id: string): SpotifyUri => ({ resource: "show", id }),
	episode: (id: string): SpotifyUri => ({ resource: "episode", id }),
	user: (id: string): SpotifyUri => ({ resource: "user", id }),
	collection: (userId: string): SpotifyUri => ({
		resource: "user",
		id: userId,
		collection: "collection",
	}),
	yourEpisodes: (userId: string): SpotifyUri => ({
		resource: "user",
		id: userId,
		collection: "collection:your-episodes",
	}),
};

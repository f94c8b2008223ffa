/**
 * Bidirectional pager over link-paginated Web API collections
 */

import { PagerBusyError } from "../errors";
import type { PageLinks } from "../types/spotify";
import type { ApiClient, ApiRequest, ResponseSchema } from "./ApiClient";

/**
 * Pulls the continuation links out of a decoded page
 */
export type LinkExtractor<P> = (page: P) => PageLinks;

export interface PagerOptions<P> {
	/** Path or absolute URL of the first page */
	firstLink: string;
	schema: ResponseSchema<P>;
	extract: LinkExtractor<P>;
	/** Query for the first request; later links already carry theirs */
	query?: ApiRequest["query"];
	notFound?: ApiRequest["notFound"];
	/** Scopes every page fetch needs */
	scopes?: ApiRequest["scopes"];
}

interface OffsetPaging {
	next: string | null;
	previous: string | null;
	total: number;
}

export interface PageCursors {
	before?: string | null;
	after?: string | null;
}

interface CursorPaging {
	next: string | null;
	cursors: PageCursors | null;
	total?: number;
}

/**
 * Links of an offset-paginated envelope (`next` / `previous` / `total`)
 */
export function offsetLinks(paging: OffsetPaging): PageLinks {
	return { next: paging.next, prev: paging.previous, total: paging.total };
}

/**
 * Links of a cursor-paginated envelope. The provider only returns a
 * forward link, so the backward one is built from the cursors by the
 * caller, which knows the endpoint's query parameters.
 */
export function cursorLinks(
	paging: CursorPaging,
	buildPrev: (cursors: PageCursors) => string | null,
): PageLinks {
	return {
		next: paging.next,
		prev: paging.cursors ? buildPrev(paging.cursors) : null,
		total: paging.total,
	};
}

/**
 * Walks a paginated collection forward and backward.
 *
 * One pager has one owner: an overlapping call fails with
 * `PagerBusyError`. A failed fetch leaves the position and links as they
 * were, so the same call can simply be repeated.
 */
export class Pager<P> {
	private currentLink: string | null = null;
	private links: PageLinks;
	private position = -1;
	private totalKnown: number | undefined;
	private busy = false;

	constructor(
		private readonly client: ApiClient,
		private readonly options: PagerOptions<P>,
	) {
		this.links = { next: options.firstLink, prev: null };
	}

	/**
	 * Fetch the following page, or null at the end
	 */
	async next(): Promise<P | null> {
		const link = this.links.next;
		if (link === null) return null;
		return this.move(link, 1);
	}

	/**
	 * Fetch the preceding page, or null at the start
	 */
	async prev(): Promise<P | null> {
		const link = this.links.prev;
		if (link === null) return null;
		return this.move(link, -1);
	}

	/**
	 * Re-fetch the current page without moving; null before the first page
	 */
	async current(): Promise<P | null> {
		const link = this.currentLink;
		if (link === null) return null;
		return this.move(link, 0);
	}

	/**
	 * Every remaining page, moving forward
	 */
	async *pages(): AsyncGenerator<P, void, undefined> {
		while (true) {
			const page = await this.next();
			if (page === null) return;
			yield page;
		}
	}

	/** Index of the current page; -1 before the first fetch */
	getPosition(): number {
		return this.position;
	}

	/** Collection size as last reported by the provider */
	getTotal(): number | undefined {
		return this.totalKnown;
	}

	getLinks(): PageLinks {
		return { ...this.links };
	}

	private async move(link: string, step: -1 | 0 | 1): Promise<P | null> {
		if (this.busy) {
			throw new PagerBusyError();
		}

		this.busy = true;
		try {
			const page = await this.fetch(link);
			if (page === null) return null;

			const links = this.options.extract(page);
			this.links = { next: links.next, prev: links.prev };
			this.totalKnown = links.total ?? this.totalKnown;
			this.currentLink = link;
			this.position += step;
			return page;
		} finally {
			this.busy = false;
		}
	}

	private async fetch(link: string): Promise<P | null> {
		const first = link === this.options.firstLink && this.options.query !== undefined;
		const result = await this.client.send(
			{
				path: link,
				query: first ? this.options.query : undefined,
				notFound: this.options.notFound,
				scopes: this.options.scopes,
			},
			this.options.schema,
		);

		return result.kind === "content" ? result.data : null;
	}
}

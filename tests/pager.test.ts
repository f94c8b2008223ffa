import { HttpResponse, http } from "msw";
import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { PagerBusyError, UnknownResponseError } from "../src/errors";
import { PaginatedResponseSchema } from "../src/schemas/spotify";
import { ApiClient } from "../src/services/ApiClient";
import { cursorLinks, offsetLinks, Pager } from "../src/services/Pager";
import { API_BASE, FakeFlow } from "./helpers";

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

const PageSchema = PaginatedResponseSchema(z.object({ id: z.string() }));
const COLLECTION = `${API_BASE}/me/tracks`;

/**
 * Offset-paginated collection of `total` items served like the Web API
 */
function serveCollection(total: number): { requests: string[] } {
	const requests: string[] = [];
	server.use(
		http.get(COLLECTION, ({ request }) => {
			requests.push(request.url);
			const url = new URL(request.url);
			const limit = Number(url.searchParams.get("limit") ?? "20");
			const offset = Number(url.searchParams.get("offset") ?? "0");
			const link = (at: number) => `${COLLECTION}?offset=${at}&limit=${limit}`;
			const count = Math.max(0, Math.min(limit, total - offset));

			return HttpResponse.json({
				href: link(offset),
				items: Array.from({ length: count }, (_, i) => ({ id: `t${offset + i}` })),
				limit,
				offset,
				total,
				next: offset + limit < total ? link(offset + limit) : null,
				previous: offset > 0 ? link(Math.max(0, offset - limit)) : null,
			});
		}),
	);
	return { requests };
}

describe("Pager", () => {
	let client: ApiClient;

	beforeEach(() => {
		client = new ApiClient(new FakeFlow(), { apiBaseUrl: API_BASE });
	});

	function pagerFor() {
		return new Pager(client, {
			firstLink: "/me/tracks",
			query: { limit: 100 },
			schema: PageSchema,
			extract: offsetLinks,
		});
	}

	it("walks 205 items in pages of 100, 100 and 5", async () => {
		const { requests } = serveCollection(205);
		const pager = pagerFor();

		const sizes: number[] = [];
		for await (const page of pager.pages()) {
			sizes.push(page.items.length);
		}

		expect(sizes).toEqual([100, 100, 5]);
		expect(pager.getPosition()).toBe(2);
		expect(pager.getTotal()).toBe(205);
		expect(requests).toEqual([
			`${COLLECTION}?limit=100`,
			`${COLLECTION}?offset=100&limit=100`,
			`${COLLECTION}?offset=200&limit=100`,
		]);

		expect(await pager.next()).toBeNull();
		expect(requests).toHaveLength(3);
	});

	it("moves back and re-fetches the current page", async () => {
		serveCollection(205);
		const pager = pagerFor();

		await pager.next();
		await pager.next();
		await pager.next();

		const previous = await pager.prev();
		expect(previous?.offset).toBe(100);
		expect(pager.getPosition()).toBe(1);

		const current = await pager.current();
		expect(current?.offset).toBe(100);
		expect(current?.items[0]?.id).toBe("t100");
		expect(pager.getPosition()).toBe(1);
	});

	it("returns null from prev and current before the first page", async () => {
		const { requests } = serveCollection(10);
		const pager = pagerFor();

		expect(await pager.prev()).toBeNull();
		expect(await pager.current()).toBeNull();
		expect(pager.getPosition()).toBe(-1);
		expect(requests).toHaveLength(0);
	});

	it("yields one empty page for an empty collection", async () => {
		serveCollection(0);
		const pager = pagerFor();

		const first = await pager.next();
		expect(first?.items).toEqual([]);
		expect(first?.total).toBe(0);
		expect(pager.getPosition()).toBe(0);
		expect(await pager.next()).toBeNull();
	});

	it("leaves its state unchanged when a fetch fails", async () => {
		serveCollection(205);
		const pager = pagerFor();
		await pager.next();
		const linksBefore = pager.getLinks();

		server.use(http.get(COLLECTION, () => new HttpResponse(null, { status: 500 }), { once: true }));
		await expect(pager.next()).rejects.toThrow(UnknownResponseError);

		expect(pager.getPosition()).toBe(0);
		expect(pager.getLinks()).toEqual(linksBefore);

		const retried = await pager.next();
		expect(retried?.offset).toBe(100);
		expect(pager.getPosition()).toBe(1);
	});

	it("rejects an overlapping call", async () => {
		serveCollection(205);
		const pager = pagerFor();

		const first = pager.next();
		await expect(pager.next()).rejects.toThrow(PagerBusyError);

		expect((await first)?.offset).toBe(0);
		expect(pager.getPosition()).toBe(0);
	});
});

describe("link extractors", () => {
	it("reads offset envelopes", () => {
		expect(offsetLinks({ next: "n", previous: null, total: 3 })).toEqual({
			next: "n",
			prev: null,
			total: 3,
		});
	});

	it("builds the backward link of cursor envelopes from the cursors", () => {
		const links = cursorLinks(
			{ next: "next-link", cursors: { before: "b1", after: "a1" } },
			({ after }) => (after ? `back?after=${after}` : null),
		);

		expect(links).toEqual({ next: "next-link", prev: "back?after=a1", total: undefined });
	});

	it("has no backward link without cursors", () => {
		expect(cursorLinks({ next: null, cursors: null }, () => "never")).toEqual({
			next: null,
			prev: null,
			total: undefined,
		});
	});
});

import { http, HttpResponse } from "msw";
import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { DEFAULT_USER_AGENT, HttpFetcher } from "../../pipeline/services/lightweight-fetcher.js";

const EVENT_URL = "https://events.test/event/42";

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});

describe("HttpFetcher", () => {
  it("returns the body of a successful response", async () => {
    let userAgent: string | null = null;
    server.use(
      http.get(EVENT_URL, ({ request }) => {
        userAgent = request.headers.get("user-agent");
        return HttpResponse.text("<html><body>Harbour Run</body></html>");
      })
    );

    const result = await new HttpFetcher().fetch(EVENT_URL, { "User-Agent": DEFAULT_USER_AGENT }, 5_000);

    expect(result).toEqual({
      ok: true,
      status: 200,
      body: "<html><body>Harbour Run</body></html>",
      finalUrl: EVENT_URL
    });
    expect(userAgent).toBe(DEFAULT_USER_AGENT);
  });

  it("treats HTTP errors as failures", async () => {
    server.use(http.get(EVENT_URL, () => new HttpResponse("gone", { status: 404 })));

    await expect(new HttpFetcher().fetch(EVENT_URL, {}, 5_000)).resolves.toEqual({
      ok: false,
      status: 404,
      error: "HTTP 404"
    });
  });

  it("reports transport errors without throwing", async () => {
    server.use(http.get(EVENT_URL, () => HttpResponse.error()));

    const result = await new HttpFetcher().fetch(EVENT_URL, {}, 5_000);

    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.status).toBeNull();
  });
});

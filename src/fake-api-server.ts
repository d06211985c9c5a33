import http from "http";
import { URL } from "url";

/**
 * Minimal fake paged API for local runs and tests.
 * - GET /items?after=<id>&limit=<n> -> { items: [{ id, name }] } with ids greater than `after`
 * - `failFirst` option answers the first N requests with 500
 * - `basicAuth` option answers 401 until the expected credentials are sent
 */
export type FakeApiOptions = {
  total?: number;
  failFirst?: number;
  basicAuth?: { username: string; password: string };
};

const makeItem = (id: number) => ({ id, name: `item ${id}` });

export const createFakeApiServer = (options: FakeApiOptions = {}) => {
  const total = options.total ?? 25;
  let failuresLeft = options.failFirst ?? 0;
  const expectedAuth = options.basicAuth
    ? `Basic ${Buffer.from(`${options.basicAuth.username}:${options.basicAuth.password}`).toString("base64")}`
    : undefined;

  return http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    if (url.pathname !== "/items") {
      res.writeHead(404);
      return res.end();
    }

    if (expectedAuth && req.headers.authorization !== expectedAuth) {
      res.writeHead(401, { "www-authenticate": 'Basic realm="fake"' });
      return res.end();
    }

    if (failuresLeft > 0) {
      failuresLeft -= 1;
      res.writeHead(500, { "content-type": "text/plain" });
      return res.end("temporary failure");
    }

    const after = Number(url.searchParams.get("after") ?? "0");
    const limit = Number(url.searchParams.get("limit") ?? "10");

    const items: Array<ReturnType<typeof makeItem>> = [];
    for (let id = after + 1; id <= Math.min(total, after + limit); id += 1) items.push(makeItem(id));

    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ items }));
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_API_PORT ?? 3999);
  createFakeApiServer({ total: Number(process.env.FAKE_API_TOTAL ?? 25) }).listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake API server on http://localhost:${port}`);
  });
}

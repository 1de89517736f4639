import http from "http";
import { URL } from "url";

/**
 * Minimal fake horoscope API for local runs and E2E.
 * - GET /horoscope/:sign?token=...
 * Unknown tokens get 401. Behaviour per sign can be scripted:
 * - `failWith`: respond with that status every time
 * - `rateLimitFirst`: answer the first N requests for the sign with 429
 * - `delayMs`: hold the response back (to trigger client timeouts)
 * - `malformed`: answer 200 with a body missing the horoscope text
 */
export type FakeSourceOptions = {
  token?: string;
  failWith?: Record<string, number>;
  rateLimitFirst?: Record<string, number>;
  delayMs?: Record<string, number>;
  malformed?: readonly string[];
};

export const createFakeSourceServer = (opts: FakeSourceOptions = {}) => {
  const token = opts.token ?? "test-token";
  const requestsBySign = new Map<string, number>();

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = /^\/horoscope\/([a-z]+)$/.exec(url.pathname);
    if (!match) {
      res.writeHead(404);
      return res.end();
    }

    if (url.searchParams.get("token") !== token) {
      res.writeHead(401, { "content-type": "application/json" });
      return res.end(JSON.stringify({ error: "unauthorized" }));
    }

    const sign = match[1];
    const seen = (requestsBySign.get(sign) ?? 0) + 1;
    requestsBySign.set(sign, seen);

    if (seen <= (opts.rateLimitFirst?.[sign] ?? 0)) {
      res.writeHead(429, { "content-type": "application/json", "Retry-After": "0" });
      return res.end(JSON.stringify({ error: "rate_limited" }));
    }

    const failStatus = opts.failWith?.[sign];
    if (failStatus != null) {
      res.writeHead(failStatus, { "content-type": "text/plain" });
      return res.end(`upstream failure for ${sign}`);
    }

    const respond = () => {
      if (res.destroyed) return;
      res.writeHead(200, { "content-type": "application/json" });
      const body = opts.malformed?.includes(sign)
        ? { sign, date: "2026-10-18" }
        : { sign, date: "2026-10-18", horoscope: `A steady day for ${sign}.` };
      res.end(JSON.stringify(body));
    };

    const delay = opts.delayMs?.[sign];
    if (delay != null) {
      setTimeout(respond, delay);
      return;
    }
    respond();
  });

  return {
    server,
    requestCount: (sign: string) => requestsBySign.get(sign) ?? 0
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_SOURCE_PORT ?? 3999);
  const { server } = createFakeSourceServer({ token: process.env.ROXY_API_KEY ?? "test-token" });
  server.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake horoscope API on http://localhost:${port}/horoscope`);
  });
}

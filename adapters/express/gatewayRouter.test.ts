import http from "http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadGatewayConfig } from "../../config/gatewayConfig.js";
import { JSONLD_CONTEXT } from "../../core/assets/assetManifest.js";
import { BackendUnavailableError } from "../../core/errors/gatewayErrors.js";
import type { LogEntry } from "../../core/logging/createLogger.js";
import { createGatewayApp, createTokenService } from "../../server/gatewayApp.js";
import { FakeBackendClient, TEST_FIELDS, makeAsset } from "../../test/fakeBackendClient.js";

const ID = `r${"a".repeat(26)}`;
const OTHER_ID = `k${"b".repeat(26)}`;
// sha256("hello")
const HELLO_HASH = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

const BASE_ENV = {
  NODE_ENV: "development",
  GATEWAY_LOGGER: "none",
  FOTOWARE_HOST: "https://dam.example.test",
  FOTOWARE_CLIENT_ID: "gateway",
  FOTOWARE_CLIENT_SECRET: "test-secret",
  JWT_SECRET: "test-secret",
};

const servers: http.Server[] = [];

async function startGateway(env: Record<string, string> = {}) {
  const config = loadGatewayConfig({ ...BASE_ENV, ...env });
  const backend = new FakeBackendClient();
  const logs: LogEntry[] = [];
  const app = createGatewayApp(config, backend, (entry) => logs.push(entry));

  const server = http.createServer(app);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  servers.push(server);

  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not listening");

  const baseUrl = `http://127.0.0.1:${address.port}`;
  return {
    backend,
    logs,
    tokens: createTokenService(config),
    get: (path: string, token?: string) =>
      fetch(`${baseUrl}${path}`, {
        headers: token ? { Authorization: `Bearer ${token}` } : {},
      }),
    /** Strings are sent as they are, anything else as JSON. */
    post: (path: string, body: unknown, token?: string) =>
      fetch(`${baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(token ? { Authorization: `Bearer ${token}` } : {}),
        },
        body: typeof body === "string" ? body : JSON.stringify(body),
      }),
  };
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve, reject) => {
          server.closeAllConnections();
          server.close((err) => (err ? reject(err) : resolve()));
        })
    )
  );
});

describe("GET /health", () => {
  it("answers ok", async () => {
    const gateway = await startGateway();
    const res = await gateway.get("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("GET /id/:identifier", () => {
  it("returns public metadata for a public asset", async () => {
    const gateway = await startGateway();
    gateway.backend.add(makeAsset("/fotoweb/archives/5000/a/one", { [TEST_FIELDS.identifier]: ID }));

    const res = await gateway.get(`/id/${ID}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      identifier: ID,
      filename: "one.jpg",
      contentType: "image/jpeg",
      size: 1024,
      createdAt: "2024-01-01T00:00:00.000Z",
      modifiedAt: "2024-01-02T00:00:00.000Z",
    });
  });

  it("rejects a malformed identifier without asking the backend", async () => {
    const gateway = await startGateway();
    const res = await gateway.get("/id/123-bad");

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Invalid identifier", code: "INVALID_IDENTIFIER" });
    expect(gateway.backend.calls.search).toBe(0);
  });

  it("answers not found for an unknown identifier", async () => {
    const gateway = await startGateway();
    const res = await gateway.get(`/id/${ID}`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found", code: "NOT_FOUND" });
  });

  it("answers not found when several assets share the identifier", async () => {
    const gateway = await startGateway();
    gateway.backend.add(
      makeAsset("/a", { [TEST_FIELDS.identifier]: ID }),
      makeAsset("/b", { [TEST_FIELDS.identifier]: ID })
    );

    const res = await gateway.get(`/id/${ID}`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found", code: "NOT_FOUND" });
    expect(gateway.logs.filter((l) => l.event === "RESOLVE_AMBIGUOUS")).toHaveLength(1);
  });

  it("answers 500 under the error ambiguity policy", async () => {
    const gateway = await startGateway({ AMBIGUOUS_POLICY: "error" });
    gateway.backend.add(
      makeAsset("/a", { [TEST_FIELDS.identifier]: ID }),
      makeAsset("/b", { [TEST_FIELDS.identifier]: ID })
    );

    const res = await gateway.get(`/id/${ID}`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "internal server error", code: "DATA_INTEGRITY" });
  });

  it("reports backend failures as 502", async () => {
    const gateway = await startGateway();
    gateway.backend.searchError = new BackendUnavailableError("connection reset");

    const res = await gateway.get(`/id/${ID}`);

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({ error: "Backend unavailable", code: "BACKEND_UNAVAILABLE" });
  });

  describe("private assets", () => {
    async function withPrivateAsset() {
      const gateway = await startGateway();
      gateway.backend.add(
        makeAsset("/a/one", { [TEST_FIELDS.identifier]: ID }, { visibility: "private" })
      );
      return gateway;
    }

    it("require a token", async () => {
      const gateway = await withPrivateAsset();
      const res = await gateway.get(`/id/${ID}`);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Unauthorized", code: "UNAUTHORIZED" });
      expect(gateway.logs.find((l) => l.event === "TOKEN_REJECTED")).toMatchObject({
        failure: "invalid",
        audience: "preview",
        subject: ID,
      });
    });

    it("return full metadata to a preview token bound to the asset", async () => {
      const gateway = await withPrivateAsset();
      const token = gateway.tokens.issue("preview", ID, 60);

      const res = await gateway.get(`/id/${ID}`, token);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        identifier: ID,
        archiveId: "5000",
        visibility: "private",
        metadata: { [TEST_FIELDS.identifier]: ID },
      });
    });

    it("accept the token as a query parameter", async () => {
      const gateway = await withPrivateAsset();
      const token = gateway.tokens.issue("preview", ID, 60);

      const res = await gateway.get(`/id/${ID}?token=${token}`);
      expect(res.status).toBe(200);
    });

    it("reject a token bound to another asset", async () => {
      const gateway = await withPrivateAsset();
      const token = gateway.tokens.issue("preview", OTHER_ID, 60);

      const res = await gateway.get(`/id/${ID}`, token);

      expect(res.status).toBe(401);
      expect(gateway.logs.find((l) => l.event === "TOKEN_REJECTED")).toMatchObject({
        failure: "wrong_subject",
      });
    });

    it("reject a token for another capability", async () => {
      const gateway = await withPrivateAsset();
      const token = gateway.tokens.issue("original", ID, 60);

      const res = await gateway.get(`/id/${ID}`, token);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: "Unauthorized", code: "UNAUTHORIZED" });
    });
  });
});

describe("GET /-/background-worker/assign-metadata", () => {
  const path = "/-/background-worker/assign-metadata";

  it("requires a metadata-update token", async () => {
    const gateway = await startGateway();
    const preview = gateway.tokens.issue("preview", ID, 60);

    expect((await gateway.get(path)).status).toBe(401);
    expect((await gateway.get(path, preview)).status).toBe(401);
    expect(gateway.backend.calls.findMissing).toBe(0);
  });

  it("runs a sweep and returns its summary", async () => {
    const gateway = await startGateway();
    gateway.backend.add(makeAsset("/a"), makeAsset("/b"), makeAsset("/c"));
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.get(`${path}?limit=2`, token);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      tasks: ["uuid4"],
      limit: 2,
      processed: 2,
      assigned: 2,
      skipped: 0,
      failed: 0,
      failures: [],
    });
    expect(gateway.backend.assets.get("/c")?.publicIdentifier).toBeUndefined();
  });

  it("accepts a comma separated task list", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.get(`${path}?tasks=uuid4,sha256`, token);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ tasks: ["uuid4", "sha256"], limit: 100 });
  });

  it.each([
    ["?limit=0", "limit must be a positive integer"],
    ["?limit=ten", "limit must be a positive integer"],
    ["?tasks=md5", "Unknown tasks: md5"],
  ])("rejects %s", async (query, message) => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.get(`${path}${query}`, token);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: message, code: "BAD_REQUEST" });
  });
});

describe("POST /-/webhooks/assign-metadata", () => {
  const path = "/-/webhooks/assign-metadata";

  it("assigns the asset the webhook names", async () => {
    const gateway = await startGateway();
    gateway.backend.add(makeAsset("/a"));
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.post(path, { data: { href: "/a" } }, token);

    expect(res.status).toBe(200);
    const assigned = gateway.backend.assets.get("/a")?.publicIdentifier;
    expect(assigned).toMatch(/^[rjkmtvyz][a-z2-7]{26}$/);
    expect(await res.json()).toMatchObject({ asset: { backendId: "/a", publicIdentifier: assigned } });
  });

  it("rejects a payload without an href", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.post(path, { data: {} }, token);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Webhook payload must contain data.href",
      code: "BAD_REQUEST",
    });
  });

  it("answers not found for an unknown asset", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.post(path, { data: { href: "/missing" } }, token);
    expect(res.status).toBe(404);
  });

  it("refuses an href on another host", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.post(path, { data: { href: "https://attacker.example/collect" } }, token);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Webhook href does not name an asset of the configured backend",
      code: "BAD_REQUEST",
    });
    expect(gateway.backend.calls.getAsset).toBe(0);
  });

  it("answers 400 to a body that is not JSON", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("metadata-update", undefined, 60);

    const res = await gateway.post(path, "{not json", token);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Bad request", code: "BAD_REQUEST" });
  });
});

describe("GET /doc/:identifier/:filename", () => {
  function withOriginal(gateway: Awaited<ReturnType<typeof startGateway>>, visibility: "public" | "private") {
    gateway.backend.add(makeAsset("/a/one", { [TEST_FIELDS.identifier]: ID }, { visibility }));
    gateway.backend.originals.set("/a/one", Buffer.from("hello"));
  }

  it("serves a public original under its own slugged name", async () => {
    const gateway = await startGateway();
    withOriginal(gateway, "public");

    const res = await gateway.get(`/doc/${ID}/getfile`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("image/jpeg");
    expect(res.headers.get("content-disposition")).toBe('inline; filename="one.jpg"');
    expect(await res.text()).toBe("hello");
  });

  it("uses the requested file name", async () => {
    const gateway = await startGateway();
    withOriginal(gateway, "public");

    const res = await gateway.get(`/doc/${ID}/Harbour%20View.jpg`);

    expect(res.headers.get("content-disposition")).toBe('inline; filename="Harbour%20View.jpg"');
  });

  it("stores the content hash of a downloaded original", async () => {
    const gateway = await startGateway();
    withOriginal(gateway, "public");

    expect((await gateway.get(`/doc/${ID}/getfile`)).status).toBe(200);

    await vi.waitFor(() => {
      expect(gateway.backend.assets.get("/a/one")?.contentHash).toBe(HELLO_HASH);
    });
    expect(gateway.backend.calls.fetchOriginal).toBe(1);
  });

  it("leaves an existing content hash alone", async () => {
    const gateway = await startGateway();
    gateway.backend.add(
      makeAsset("/a/one", { [TEST_FIELDS.identifier]: ID, [TEST_FIELDS.contentHash]: "abc" })
    );
    gateway.backend.originals.set("/a/one", Buffer.from("hello"));

    expect((await gateway.get(`/doc/${ID}/getfile`)).status).toBe(200);
    expect(gateway.backend.calls.updateMetadata).toBe(0);
  });

  it("still serves the file when the hash cannot be stored", async () => {
    const gateway = await startGateway();
    withOriginal(gateway, "public");
    gateway.backend.updateErrors.set("/a/one", new BackendUnavailableError("write refused"));

    const res = await gateway.get(`/doc/${ID}/getfile`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("hello");
    await vi.waitFor(() => {
      expect(gateway.logs.find((l) => l.event === "DOWNLOAD_HASH_FAIL")).toMatchObject({
        backendId: "/a/one",
        error: "write refused",
      });
    });
  });

  it("requires an original token bound to a private asset", async () => {
    const gateway = await startGateway();
    withOriginal(gateway, "private");
    const preview = gateway.tokens.issue("preview", ID, 60);
    const original = gateway.tokens.issue("original", ID, 60);

    expect((await gateway.get(`/doc/${ID}/getfile`)).status).toBe(401);
    expect((await gateway.get(`/doc/${ID}/getfile`, preview)).status).toBe(401);
    expect(gateway.backend.calls.fetchOriginal).toBe(0);

    const res = await gateway.get(`/doc/${ID}/getfile?token=${original}`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("hello");
  });

  it("answers not found for an unknown identifier", async () => {
    const gateway = await startGateway();
    expect((await gateway.get(`/doc/${ID}/getfile`)).status).toBe(404);
  });
});

describe("GET /-/data/jsonld-manifest", () => {
  const path = "/-/data/jsonld-manifest";

  function withIdentifiedAssets(gateway: Awaited<ReturnType<typeof startGateway>>) {
    gateway.backend.add(
      makeAsset(
        "/fotoweb/archives/5000/harbour.info",
        { [TEST_FIELDS.identifier]: ID },
        { filename: "Harbour View.jpg", title: "Harbour", modifiedAt: new Date("2024-01-03T00:00:00Z") }
      ),
      makeAsset(
        "/fotoweb/archives/5000/older.info",
        { [TEST_FIELDS.identifier]: OTHER_ID },
        { modifiedAt: new Date("2024-01-02T00:00:00Z") }
      ),
      makeAsset("/fotoweb/archives/5000/pending.info")
    );
  }

  it("requires a manifest token", async () => {
    const gateway = await startGateway();
    const update = gateway.tokens.issue("metadata-update", undefined, 60);

    expect((await gateway.get(path)).status).toBe(401);
    expect((await gateway.get(path, update)).status).toBe(401);
    expect(gateway.backend.calls.listAssigned).toBe(0);
  });

  it("pages identified assets oldest first through the Link header", async () => {
    const gateway = await startGateway();
    withIdentifiedAssets(gateway);
    const token = gateway.tokens.issue("manifest", undefined, 60);

    const first = await gateway.get(`${path}?limit=1`, token);

    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject([{ identifier: OTHER_ID }]);
    const link = first.headers.get("link");
    expect(link).toBe(
      `<${path}?limit=1&since=2024-01-02T00%3A00%3A00.000Z>; rel="next"`
    );

    const next = /^<([^>]+)>/.exec(link ?? "")?.[1] ?? "";
    const second = await gateway.get(next, token);

    expect(await second.json()).toEqual([
      {
        "@id": `http://localhost:3000/id/${ID}`,
        "@context": JSONLD_CONTEXT,
        identifier: ID,
        mainEntityOfPage: "https://dam.example.test/fotoweb/archives/5000/harbour.info",
        url: `http://localhost:3000/doc/${ID}/harbour-view.jpg`,
        name: "Harbour View",
        "dcterms:title": "Harbour",
        encodingFormat: "image/jpeg",
        fileSize: 1024,
        dateCreated: "2024-01-01T00:00:00.000Z",
        dateModified: "2024-01-03T00:00:00.000Z",
      },
    ]);
  });

  it("omits the Link header on the last page", async () => {
    const gateway = await startGateway();
    withIdentifiedAssets(gateway);
    const token = gateway.tokens.issue("manifest", undefined, 60);

    const res = await gateway.get(path, token);

    expect(await res.json()).toMatchObject([{ identifier: OTHER_ID }, { identifier: ID }]);
    expect(res.headers.get("link")).toBeNull();
  });

  it("rejects a since that is not a timestamp", async () => {
    const gateway = await startGateway();
    const token = gateway.tokens.issue("manifest", undefined, 60);

    const res = await gateway.get(`${path}?since=yesterday`, token);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "since must be an ISO 8601 timestamp",
      code: "BAD_REQUEST",
    });
  });
});

describe("GET /-/token/new", () => {
  it("issues one token per capability in development", async () => {
    const gateway = await startGateway();

    const res = await gateway.get(`/-/token/new?subject=${ID}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject([
      { audience: "preview" },
      { audience: "rendition" },
      { audience: "original" },
      { audience: "manifest" },
      { audience: "metadata-update" },
    ]);
  });

  it("is not mounted in production", async () => {
    const gateway = await startGateway({ NODE_ENV: "production" });
    expect((await gateway.get("/-/token/new")).status).toBe(404);
  });
});

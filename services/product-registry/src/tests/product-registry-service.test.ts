import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { createServer, type IncomingHttpHeaders } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { productFingerprint, type Product, type TraceEvent } from "@wildtrace/shared";
import { ManualLedgerClock } from "../clock.js";
import { StaticRoleRegistry } from "../roles.js";
import { buildServer, type BuildServerOptions } from "../server.js";
import { InMemoryProductStore } from "../storage/memory-product-store.js";
import { InMemoryTreasury } from "../treasury.js";

const SUPPLIER = "ST1SUPPLIER";
const ADMIN = "ST2ADMIN";
const CERTIFIER = "ST3CERT";

const roleRegistry = new StaticRoleRegistry([
  [SUPPLIER, "supplier"],
  [ADMIN, "admin"],
  [CERTIFIER, "certifier"],
]);

const createPayload = {
  species: "Elephant Ivory",
  origin: "Africa",
  harvestDate: 100,
  weight: 500,
  description: "Large tusk",
  location: "Savanna",
  currency: "USD",
  images: ["https://img.example/tusk.jpg"],
};

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "wildtrace-registry-service-"));
  return {
    dir,
    dbPath: join(dir, "registry.db"),
  };
}

function buildTestServer(overrides: BuildServerOptions = {}) {
  return buildServer({
    productStore: new InMemoryProductStore(),
    roleRegistry,
    treasury: new InMemoryTreasury(),
    ledgerClock: new ManualLedgerClock(100),
    traceLogUrl: "",
    logger: false,
    ...overrides,
  });
}

function callerHeaders(caller: string) {
  return { "x-caller-identity": caller };
}

test("creates and fetches a product", async () => {
  const app = await buildTestServer();
  try {
    const createRes = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(createRes.statusCode, 201);
    const created = createRes.json() as {
      productId: number;
      product: Product;
      fingerprint: string;
      eventWriteStatus: string;
    };
    assert.equal(created.productId, 1);
    assert.equal(created.product.status, true);
    assert.equal(created.product.certId, null);
    assert.equal(created.product.creator, SUPPLIER);
    assert.equal(created.product.createdAt, 100);
    assert.equal(created.eventWriteStatus, "SKIPPED");
    assert.equal(created.fingerprint, productFingerprint(1, created.product));

    const getRes = await app.inject({ method: "GET", url: "/products/1" });
    assert.equal(getRes.statusCode, 200);
    const fetched = getRes.json() as { productId: number; product: Product; fingerprint: string };
    assert.deepEqual(fetched.product, created.product);
    assert.equal(fetched.fingerprint, created.fingerprint);

    const listRes = await app.inject({ method: "GET", url: `/creators/${SUPPLIER}/products` });
    assert.deepEqual(listRes.json(), { creator: SUPPLIER, productIds: [1] });

    const countRes = await app.inject({ method: "GET", url: "/products/count" });
    assert.deepEqual(countRes.json(), { count: 2 });
  } finally {
    await app.close();
  }
});

test("requires a caller identity on mutating routes", async () => {
  const app = await buildTestServer();
  try {
    const res = await app.inject({ method: "POST", url: "/products", payload: createPayload });
    assert.equal(res.statusCode, 401);
    assert.equal((res.json() as { error: string }).error, "missing_caller_identity");
  } finally {
    await app.close();
  }
});

test("maps registry failures to status codes and numeric tags", async () => {
  const app = await buildTestServer();
  try {
    const wrongRole = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(CERTIFIER),
      payload: createPayload,
    });
    assert.equal(wrongRole.statusCode, 403);
    assert.deepEqual(wrongRole.json(), { error: "InvalidRole", code: 215 });

    const future = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: { ...createPayload, harvestDate: 101 },
    });
    assert.equal(future.statusCode, 400);
    assert.deepEqual(future.json(), { error: "InvalidHarvestDate", code: 203 });

    const update = await app.inject({
      method: "PUT",
      url: "/products/99",
      headers: callerHeaders(SUPPLIER),
      payload: {
        species: "Rhino Horn",
        origin: "Asia",
        weight: 300,
        description: "Small horn",
        location: "Jungle",
        currency: "BTC",
      },
    });
    assert.equal(update.statusCode, 404);
    assert.deepEqual(update.json(), { error: "NotFound", code: 208 });
  } finally {
    await app.close();
  }
});

test("rejects malformed bodies and product ids", async () => {
  const app = await buildTestServer();
  try {
    const badBody = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: { ...createPayload, weight: "500" },
    });
    assert.equal(badBody.statusCode, 400);
    assert.equal((badBody.json() as { error: string }).error, "invalid_request");

    const badId = await app.inject({ method: "GET", url: "/products/abc" });
    assert.equal(badId.statusCode, 400);
    assert.deepEqual(badId.json(), { error: "InvalidProductId", code: 219 });

    const zeroId = await app.inject({ method: "GET", url: "/products/0" });
    assert.equal(zeroId.statusCode, 400);

    const missing = await app.inject({ method: "GET", url: "/products/7" });
    assert.equal(missing.statusCode, 404);
    assert.deepEqual(missing.json(), { error: "product_not_found" });
  } finally {
    await app.close();
  }
});

test("updates, certifies and deactivates a product", async () => {
  const app = await buildTestServer();
  try {
    await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });

    const updateRes = await app.inject({
      method: "PUT",
      url: "/products/1",
      headers: callerHeaders(SUPPLIER),
      payload: {
        species: "Elephant Ivory",
        origin: "Kenya",
        weight: 480,
        description: "Re-weighed",
        location: "Mombasa",
        currency: "STX",
      },
    });
    assert.equal(updateRes.statusCode, 200);

    const updatesRes = await app.inject({ method: "GET", url: "/products/1/updates" });
    assert.equal(updatesRes.statusCode, 200);
    const updates = updatesRes.json() as { productId: number; update: { updatedWeight: number; updater: string } };
    assert.equal(updates.update.updatedWeight, 480);
    assert.equal(updates.update.updater, SUPPLIER);

    const linkRes = await app.inject({
      method: "POST",
      url: "/products/1/certification",
      headers: callerHeaders(CERTIFIER),
      payload: { certId: 42 },
    });
    assert.equal(linkRes.statusCode, 200);
    assert.equal((linkRes.json() as { product: Product }).product.certId, 42);

    const relinkRes = await app.inject({
      method: "POST",
      url: "/products/1/certification",
      headers: callerHeaders(CERTIFIER),
      payload: { certId: 43 },
    });
    assert.equal(relinkRes.statusCode, 409);
    assert.deepEqual(relinkRes.json(), { error: "AlreadyLinked", code: 216 });

    const strangerRes = await app.inject({
      method: "POST",
      url: "/products/1/deactivate",
      headers: callerHeaders(ADMIN),
    });
    assert.equal(strangerRes.statusCode, 403);
    assert.deepEqual(strangerRes.json(), { error: "NotAuthorized", code: 200 });

    const deactivateRes = await app.inject({
      method: "POST",
      url: "/products/1/deactivate",
      headers: callerHeaders(SUPPLIER),
    });
    assert.equal(deactivateRes.statusCode, 200);
    assert.equal((deactivateRes.json() as { product: Product }).product.status, false);

    const againRes = await app.inject({
      method: "POST",
      url: "/products/1/deactivate",
      headers: callerHeaders(SUPPLIER),
    });
    assert.equal(againRes.statusCode, 409);
    assert.deepEqual(againRes.json(), { error: "NotActive", code: 220 });
  } finally {
    await app.close();
  }
});

test("admin updates registry configuration", async () => {
  const app = await buildTestServer();
  try {
    const denied = await app.inject({
      method: "PUT",
      url: "/config/max-products",
      headers: callerHeaders(SUPPLIER),
      payload: { maxProducts: 10 },
    });
    assert.equal(denied.statusCode, 403);

    const invalid = await app.inject({
      method: "PUT",
      url: "/config/max-products",
      headers: callerHeaders(ADMIN),
      payload: { maxProducts: 0 },
    });
    assert.equal(invalid.statusCode, 400);
    assert.deepEqual(invalid.json(), { error: "InvalidUpdateParam", code: 213 });

    const maxRes = await app.inject({
      method: "PUT",
      url: "/config/max-products",
      headers: callerHeaders(ADMIN),
      payload: { maxProducts: 2 },
    });
    assert.equal(maxRes.statusCode, 200);

    const feeRes = await app.inject({
      method: "PUT",
      url: "/config/creation-fee",
      headers: callerHeaders(ADMIN),
      payload: { creationFee: 250 },
    });
    assert.equal(feeRes.statusCode, 200);
    assert.deepEqual(feeRes.json(), {
      config: { nextProductId: 1, maxProducts: 2, creationFee: 250 },
    });

    const first = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(first.statusCode, 201);
    const full = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(full.statusCode, 409);
    assert.deepEqual(full.json(), { error: "MaxProductsExceeded", code: 214 });
  } finally {
    await app.close();
  }
});

test("reports a failed fee transfer as payment required", async () => {
  const app = await buildTestServer({
    treasury: new InMemoryTreasury({ balances: { [SUPPLIER]: 10 } }),
  });
  try {
    const res = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(res.statusCode, 402);
    assert.deepEqual(res.json(), { error: "FeeTransferFailed", code: 221 });
  } finally {
    await app.close();
  }
});

test("publishes traceability events when a trace log is configured", async () => {
  const received: Array<{ event: TraceEvent; headers: IncomingHttpHeaders }> = [];
  const traceMock = createServer((req, res) => {
    if (req.method === "POST" && req.url === "/events/record") {
      let body = "";
      req.on("data", (chunk) => {
        body += String(chunk);
      });
      req.on("end", () => {
        const parsed = JSON.parse(body) as { event: TraceEvent };
        received.push({ event: parsed.event, headers: req.headers });
        res.statusCode = 201;
        res.setHeader("content-type", "application/json");
        res.end(JSON.stringify({ ok: true }));
      });
      return;
    }
    res.statusCode = 404;
    res.end();
  });

  await new Promise<void>((resolve) => traceMock.listen(0, "127.0.0.1", resolve));
  const address = traceMock.address();
  const port = typeof address === "object" && address ? address.port : 0;
  const app = await buildTestServer({
    traceLogUrl: `http://127.0.0.1:${port}/`,
    serviceAuthToken: "test-token",
  });

  try {
    const createRes = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(createRes.statusCode, 201);
    const created = createRes.json() as { eventWriteStatus: string; fingerprint: string };
    assert.equal(created.eventWriteStatus, "RECORDED");

    const linkRes = await app.inject({
      method: "POST",
      url: "/products/1/certification",
      headers: callerHeaders(CERTIFIER),
      payload: { certId: 7 },
    });
    assert.equal((linkRes.json() as { eventWriteStatus: string }).eventWriteStatus, "RECORDED");

    assert.equal(received.length, 2);
    const [createdEvent, linkedEvent] = received;
    assert.equal(createdEvent.event.type, "PRODUCT_CREATED");
    assert.equal(createdEvent.event.productId, 1);
    assert.equal(createdEvent.event.actor, SUPPLIER);
    assert.equal(createdEvent.event.ledgerHeight, 100);
    assert.equal(createdEvent.event.fingerprint, created.fingerprint);
    assert.equal(createdEvent.headers["x-service-token"], "test-token");
    assert.equal(linkedEvent.event.type, "CERTIFICATION_LINKED");
    assert.equal(linkedEvent.event.actor, CERTIFIER);
  } finally {
    await app.close();
    await new Promise<void>((resolve, reject) =>
      traceMock.close((err) => (err ? reject(err) : resolve())),
    );
  }
});

test("reports FAILED when the trace log rejects an event", async () => {
  const traceMock = createServer((_req, res) => {
    res.statusCode = 500;
    res.end();
  });
  await new Promise<void>((resolve) => traceMock.listen(0, "127.0.0.1", resolve));
  const address = traceMock.address();
  const port = typeof address === "object" && address ? address.port : 0;
  const app = await buildTestServer({ traceLogUrl: `http://127.0.0.1:${port}` });

  try {
    const res = await app.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(res.statusCode, 201);
    assert.equal((res.json() as { eventWriteStatus: string }).eventWriteStatus, "FAILED");

    const getRes = await app.inject({ method: "GET", url: "/products/1" });
    assert.equal(getRes.statusCode, 200);
  } finally {
    await app.close();
    await new Promise<void>((resolve, reject) =>
      traceMock.close((err) => (err ? reject(err) : resolve())),
    );
  }
});

test("persists products across server restart", async () => {
  const temp = createTempDbPath();
  const app1 = await buildTestServer({ productStore: undefined, dbPath: temp.dbPath });
  try {
    const res = await app1.inject({
      method: "POST",
      url: "/products",
      headers: callerHeaders(SUPPLIER),
      payload: createPayload,
    });
    assert.equal(res.statusCode, 201);
  } finally {
    await app1.close();
  }

  const app2 = await buildTestServer({ productStore: undefined, dbPath: temp.dbPath });
  try {
    const getRes = await app2.inject({ method: "GET", url: "/products/1" });
    assert.equal(getRes.statusCode, 200);
    const countRes = await app2.inject({ method: "GET", url: "/products/count" });
    assert.deepEqual(countRes.json(), { count: 2 });
  } finally {
    await app2.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("serves OpenAPI document", async () => {
  const app = await buildTestServer();
  try {
    const res = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { openapi: string; paths: Record<string, unknown> };
    assert.equal(body.openapi, "3.0.3");
    assert.equal(typeof body.paths["/products"], "object");
    assert.equal(typeof body.paths["/products/{productId}/certification"], "object");
  } finally {
    await app.close();
  }
});

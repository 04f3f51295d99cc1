import type { IncomingHttpHeaders } from "node:http";
import Fastify from "fastify";
import {
  CALLER_IDENTITY_HEADER,
  parseCallerIdentityHeader,
  productFingerprint,
  REGISTRY_ERROR_CODES,
  registryErrorCategory,
  type CreateProductRequest,
  type CreateProductResponse,
  type DeactivateProductResponse,
  type GetConfigResponse,
  type GetProductCountResponse,
  type GetProductResponse,
  type GetProductsByCreatorResponse,
  type GetProductUpdatesResponse,
  type LinkCertificationRequest,
  type LinkCertificationResponse,
  type RegistryFailure,
  type SetCreationFeeRequest,
  type SetMaxProductsRequest,
  type UpdateProductRequest,
  type UpdateProductResponse,
} from "@wildtrace/shared";
import { SystemLedgerClock, type LedgerClock } from "./clock.js";
import { buildOpenApiSpec } from "./openapi.js";
import { ProductRegistry } from "./registry.js";
import { buildRoleRegistryFromEnv, type RoleRegistry } from "./roles.js";
import { SqliteProductStore, type ProductStore } from "./storage/product-store.js";
import { HttpTraceLogPublisher, type TraceLogPublisher } from "./trace-log.js";
import { InMemoryTreasury, type FeeTreasury } from "./treasury.js";

const DEFAULT_DB_PATH = "data/product-registry.db";

interface ProductParams {
  productId: string;
}

interface CreatorParams {
  creator: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

// Shape checks only; field bounds are the registry's to report.
function parseCreateRequest(body: unknown): CreateProductRequest | null {
  if (!isObject(body)) return null;
  if (!isString(body.species) || !isString(body.origin)) return null;
  if (!isNumber(body.harvestDate) || !isNumber(body.weight)) return null;
  if (!isString(body.description) || !isString(body.location)) return null;
  if (!isString(body.currency)) return null;
  if (body.images !== undefined && !isStringArray(body.images)) return null;
  return {
    species: body.species,
    origin: body.origin,
    harvestDate: body.harvestDate,
    weight: body.weight,
    description: body.description,
    location: body.location,
    currency: body.currency,
    images: body.images ?? [],
  };
}

function parseUpdateRequest(body: unknown): UpdateProductRequest | null {
  if (!isObject(body)) return null;
  if (!isString(body.species) || !isString(body.origin)) return null;
  if (!isNumber(body.weight)) return null;
  if (!isString(body.description) || !isString(body.location)) return null;
  if (!isString(body.currency)) return null;
  return {
    species: body.species,
    origin: body.origin,
    weight: body.weight,
    description: body.description,
    location: body.location,
    currency: body.currency,
  };
}

function parseLinkRequest(body: unknown): LinkCertificationRequest | null {
  if (!isObject(body) || !isNumber(body.certId)) return null;
  return { certId: body.certId };
}

function parseMaxProductsRequest(body: unknown): SetMaxProductsRequest | null {
  if (!isObject(body) || !isNumber(body.maxProducts)) return null;
  return { maxProducts: body.maxProducts };
}

function parseCreationFeeRequest(body: unknown): SetCreationFeeRequest | null {
  if (!isObject(body) || !isNumber(body.creationFee)) return null;
  return { creationFee: body.creationFee };
}

function parseProductId(value: string): number | null {
  if (!/^\d+$/.test(value)) return null;
  const productId = Number(value);
  return Number.isSafeInteger(productId) && productId > 0 ? productId : null;
}

function parseSeedInteger(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function statusCodeForFailure(failure: RegistryFailure): number {
  if (failure.error === "NotFound") return 404;
  switch (registryErrorCategory(failure.error)) {
    case "authorization":
      return 403;
    case "capacity":
    case "state":
      return 409;
    case "fee":
      return 402;
    default:
      return 400;
  }
}

function failureBody(failure: RegistryFailure) {
  return { error: failure.error, code: failure.code };
}

export interface BuildServerOptions {
  productStore?: ProductStore;
  dbPath?: string;
  roleRegistry?: RoleRegistry;
  treasury?: FeeTreasury;
  ledgerClock?: LedgerClock;
  traceLogPublisher?: TraceLogPublisher;
  traceLogUrl?: string;
  serviceAuthToken?: string;
  serviceBaseUrl?: string;
  maxProducts?: number;
  creationFee?: number;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const app = Fastify({
    logger: options.logger === false ? false : { level: process.env.LOG_LEVEL || "info" },
  });
  const productStore =
    options.productStore ||
    new SqliteProductStore(options.dbPath || process.env.PRODUCT_DB_PATH || DEFAULT_DB_PATH, {
      maxProducts: options.maxProducts ?? parseSeedInteger(process.env.MAX_PRODUCTS),
      creationFee: options.creationFee ?? parseSeedInteger(process.env.CREATION_FEE),
    });
  const ownStore = !options.productStore;
  const clock = options.ledgerClock || new SystemLedgerClock();
  const registry = new ProductRegistry({
    store: productStore,
    roles: options.roleRegistry || buildRoleRegistryFromEnv(),
    treasury:
      options.treasury || new InMemoryTreasury({ account: process.env.TREASURY_ACCOUNT }),
    clock,
  });
  const traceLog =
    options.traceLogPublisher ||
    new HttpTraceLogPublisher(
      options.traceLogUrl ?? process.env.TRACE_LOG_URL,
      options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN,
    );
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4201}`;

  function requireCaller(
    req: { headers: IncomingHttpHeaders },
    reply: { code: (statusCode: number) => { send: (payload: unknown) => void } },
  ): string | null {
    const caller = parseCallerIdentityHeader(req.headers[CALLER_IDENTITY_HEADER]);
    if (caller) return caller;
    reply.code(401).send({
      error: "missing_caller_identity",
      message: `Missing '${CALLER_IDENTITY_HEADER}' header`,
    });
    return null;
  }

  function invalidProductId() {
    return { error: "InvalidProductId", code: REGISTRY_ERROR_CODES.InvalidProductId };
  }

  app.get("/health", async () => ({ ok: true, service: "product-registry" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.get("/config", async () => {
    const response: GetConfigResponse = { config: registry.getConfig() };
    return response;
  });

  app.put("/config/max-products", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseMaxProductsRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected numeric maxProducts",
      });
    }

    const result = registry.setMaxProducts(caller, parsed.maxProducts);
    if (!result.ok) {
      return reply.code(statusCodeForFailure(result)).send(failureBody(result));
    }
    req.log.info({ caller, maxProducts: parsed.maxProducts }, "max products updated");
    const response: GetConfigResponse = { config: registry.getConfig() };
    return response;
  });

  app.put("/config/creation-fee", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseCreationFeeRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected numeric creationFee",
      });
    }

    const result = registry.setCreationFee(caller, parsed.creationFee);
    if (!result.ok) {
      return reply.code(statusCodeForFailure(result)).send(failureBody(result));
    }
    req.log.info({ caller, creationFee: parsed.creationFee }, "creation fee updated");
    const response: GetConfigResponse = { config: registry.getConfig() };
    return response;
  });

  app.post("/products", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseCreateRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message:
          "Expected species, origin, harvestDate, weight, description, location, currency and optional images",
      });
    }

    const result = registry.createProduct(caller, parsed);
    if (!result.ok) {
      req.log.info({ caller, error: result.error }, "product creation rejected");
      return reply.code(statusCodeForFailure(result)).send(failureBody(result));
    }

    const { productId, product, feePaid } = result.value;
    const fingerprint = productFingerprint(productId, product);
    req.log.info({ caller, productId, feePaid }, "product created");

    const eventWriteStatus = await traceLog.publish({
      type: "PRODUCT_CREATED",
      productId,
      actor: caller,
      ledgerHeight: product.createdAt,
      occurredAt: new Date().toISOString(),
      fingerprint,
      species: product.species,
      origin: product.origin,
      weight: product.weight,
      feePaid,
    });

    const response: CreateProductResponse = {
      productId,
      product,
      fingerprint,
      eventWriteStatus,
    };
    return reply.code(201).send(response);
  });

  app.get("/products/count", async () => {
    const response: GetProductCountResponse = { count: registry.getProductCount() };
    return response;
  });

  app.get<{ Params: ProductParams }>("/products/:productId", async (req, reply) => {
    const productId = parseProductId(req.params.productId);
    if (productId === null) {
      return reply.code(400).send(invalidProductId());
    }
    const product = registry.getProduct(productId);
    if (!product) {
      return reply.code(404).send({ error: "product_not_found" });
    }
    const response: GetProductResponse = {
      productId,
      product,
      fingerprint: productFingerprint(productId, product),
    };
    return response;
  });

  app.put<{ Params: ProductParams }>("/products/:productId", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const productId = parseProductId(req.params.productId);
    if (productId === null) {
      return reply.code(400).send(invalidProductId());
    }
    const parsed = parseUpdateRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected species, origin, weight, description, location and currency",
      });
    }

    const result = registry.updateProduct(caller, productId, parsed);
    if (!result.ok) {
      return reply.code(statusCodeForFailure(result)).send(failureBody(result));
    }

    const { product, update } = result.value;
    req.log.info({ caller, productId }, "product updated");
    const eventWriteStatus = await traceLog.publish({
      type: "PRODUCT_UPDATED",
      productId,
      actor: caller,
      ledgerHeight: update.updatedAt,
      occurredAt: new Date().toISOString(),
      fingerprint: productFingerprint(productId, product),
      weight: product.weight,
      location: product.location,
      currency: product.currency,
    });

    const response: UpdateProductResponse = { product, update, eventWriteStatus };
    return response;
  });

  app.get<{ Params: ProductParams }>("/products/:productId/updates", async (req, reply) => {
    const productId = parseProductId(req.params.productId);
    if (productId === null) {
      return reply.code(400).send(invalidProductId());
    }
    const update = registry.getProductUpdates(productId);
    if (!update) {
      return reply.code(404).send({ error: "product_update_not_found" });
    }
    const response: GetProductUpdatesResponse = { productId, update };
    return response;
  });

  app.post<{ Params: ProductParams }>(
    "/products/:productId/certification",
    async (req, reply) => {
      const caller = requireCaller(req, reply);
      if (!caller) return;

      const productId = parseProductId(req.params.productId);
      if (productId === null) {
        return reply.code(400).send(invalidProductId());
      }
      const parsed = parseLinkRequest(req.body);
      if (!parsed) {
        return reply.code(400).send({
          error: "invalid_request",
          message: "Expected numeric certId",
        });
      }

      const result = registry.linkCertification(caller, productId, parsed.certId);
      if (!result.ok) {
        return reply.code(statusCodeForFailure(result)).send(failureBody(result));
      }

      const product = result.value;
      req.log.info({ caller, productId, certId: parsed.certId }, "certification linked");
      const eventWriteStatus = await traceLog.publish({
        type: "CERTIFICATION_LINKED",
        productId,
        actor: caller,
        ledgerHeight: clock.currentHeight(),
        occurredAt: new Date().toISOString(),
        fingerprint: productFingerprint(productId, product),
        certId: parsed.certId,
      });

      const response: LinkCertificationResponse = { product, eventWriteStatus };
      return response;
    },
  );

  app.post<{ Params: ProductParams }>("/products/:productId/deactivate", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const productId = parseProductId(req.params.productId);
    if (productId === null) {
      return reply.code(400).send(invalidProductId());
    }

    const result = registry.deactivateProduct(caller, productId);
    if (!result.ok) {
      return reply.code(statusCodeForFailure(result)).send(failureBody(result));
    }

    const product = result.value;
    req.log.info({ caller, productId }, "product deactivated");
    const eventWriteStatus = await traceLog.publish({
      type: "PRODUCT_DEACTIVATED",
      productId,
      actor: caller,
      ledgerHeight: clock.currentHeight(),
      occurredAt: new Date().toISOString(),
      fingerprint: productFingerprint(productId, product),
    });

    const response: DeactivateProductResponse = { product, eventWriteStatus };
    return response;
  });

  app.get<{ Params: CreatorParams }>("/creators/:creator/products", async (req, reply) => {
    if (!isNonEmptyString(req.params.creator)) {
      return reply.code(400).send({ error: "invalid_creator" });
    }
    const response: GetProductsByCreatorResponse = {
      creator: req.params.creator,
      productIds: registry.getProductsByCreator(req.params.creator),
    };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      productStore.close();
    }
  });

  return app;
}

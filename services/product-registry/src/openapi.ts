import { REGISTRY_ERROR_CODES } from "@wildtrace/shared";

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Wildtrace Product Registry API",
      version: "0.1.0",
      description:
        "Provenance records for regulated goods. Mutating routes read the caller from the x-caller-identity header.",
    },
    servers: [{ url: serviceBaseUrl }],
    "x-error-codes": REGISTRY_ERROR_CODES,
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/config": {
        get: {
          summary: "Read registry configuration",
          responses: {
            "200": { description: "Current configuration" },
          },
        },
      },
      "/config/max-products": {
        put: {
          summary: "Set the product capacity (admin)",
          responses: {
            "200": { description: "Capacity updated" },
            "400": { description: "Invalid parameter" },
            "401": { description: "Missing caller identity" },
            "403": { description: "Caller is not an admin" },
          },
        },
      },
      "/config/creation-fee": {
        put: {
          summary: "Set the creation fee (admin)",
          responses: {
            "200": { description: "Fee updated" },
            "400": { description: "Invalid parameter" },
            "401": { description: "Missing caller identity" },
            "403": { description: "Caller is not an admin" },
          },
        },
      },
      "/products": {
        post: {
          summary: "Create a product record (supplier)",
          responses: {
            "201": { description: "Product created" },
            "400": { description: "Invalid field" },
            "401": { description: "Missing caller identity" },
            "402": { description: "Creation fee transfer failed" },
            "403": { description: "Caller is not a supplier" },
            "409": { description: "Registry or creator index is full" },
          },
        },
      },
      "/products/count": {
        get: {
          summary: "Read the product id counter",
          responses: {
            "200": { description: "Counter value" },
          },
        },
      },
      "/products/{productId}": {
        get: {
          summary: "Get a product record",
          responses: {
            "200": { description: "Product record" },
            "400": { description: "Invalid product id" },
            "404": { description: "Product not found" },
          },
        },
        put: {
          summary: "Update mutable product fields (creator only)",
          responses: {
            "200": { description: "Product updated" },
            "400": { description: "Invalid field" },
            "401": { description: "Missing caller identity" },
            "403": { description: "Caller is not the creator" },
            "404": { description: "Product not found" },
            "409": { description: "Product is deactivated" },
          },
        },
      },
      "/products/{productId}/updates": {
        get: {
          summary: "Get the most recent update of a product",
          responses: {
            "200": { description: "Latest update record" },
            "404": { description: "No update recorded" },
          },
        },
      },
      "/products/{productId}/certification": {
        post: {
          summary: "Link a certification reference once (certifier)",
          responses: {
            "200": { description: "Certification linked" },
            "401": { description: "Missing caller identity" },
            "403": { description: "Caller is not a certifier" },
            "404": { description: "Product not found" },
            "409": { description: "Product deactivated or already certified" },
          },
        },
      },
      "/products/{productId}/deactivate": {
        post: {
          summary: "Deactivate a product permanently (creator only)",
          responses: {
            "200": { description: "Product deactivated" },
            "401": { description: "Missing caller identity" },
            "403": { description: "Caller is not the creator" },
            "404": { description: "Product not found" },
            "409": { description: "Product already deactivated" },
          },
        },
      },
      "/creators/{creator}/products": {
        get: {
          summary: "List product ids created by an identity, in creation order",
          responses: {
            "200": { description: "Product ids" },
          },
        },
      },
    },
  };
}

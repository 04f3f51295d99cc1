export * from "./crypto/fingerprint.js";
export * from "./auth/headers.js";
export * from "./types/product.js";
export * from "./types/errors.js";
export * from "./types/events.js";
export * from "./types/api.js";

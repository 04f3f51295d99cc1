/**
 * Numeric error tags returned by the product registry.
 * The values are stable across versions; new kinds are only appended.
 */
export const REGISTRY_ERROR_CODES = {
  NotAuthorized: 200,
  InvalidSpecies: 201,
  InvalidOrigin: 202,
  InvalidHarvestDate: 203,
  InvalidWeight: 204,
  InvalidDescription: 205,
  InvalidStatus: 206,
  AlreadyExists: 207,
  NotFound: 208,
  InvalidTimestamp: 209,
  InvalidLocation: 210,
  InvalidCurrency: 211,
  InvalidCertId: 212,
  InvalidUpdateParam: 213,
  MaxProductsExceeded: 214,
  InvalidRole: 215,
  AlreadyLinked: 216,
  InvalidImageCount: 217,
  InvalidImageUrl: 218,
  InvalidProductId: 219,
  NotActive: 220,
  FeeTransferFailed: 221,
} as const;

export type RegistryErrorKind = keyof typeof REGISTRY_ERROR_CODES;
export type RegistryErrorCode = (typeof REGISTRY_ERROR_CODES)[RegistryErrorKind];

export type RegistryErrorCategory =
  | "authorization"
  | "validation"
  | "capacity"
  | "state"
  | "config"
  | "fee";

const ERROR_CATEGORIES: Record<RegistryErrorKind, RegistryErrorCategory> = {
  NotAuthorized: "authorization",
  InvalidRole: "authorization",
  InvalidSpecies: "validation",
  InvalidOrigin: "validation",
  InvalidHarvestDate: "validation",
  InvalidWeight: "validation",
  InvalidDescription: "validation",
  InvalidStatus: "validation",
  InvalidTimestamp: "validation",
  InvalidLocation: "validation",
  InvalidCurrency: "validation",
  InvalidCertId: "validation",
  InvalidImageCount: "validation",
  InvalidImageUrl: "validation",
  InvalidProductId: "validation",
  MaxProductsExceeded: "capacity",
  AlreadyExists: "state",
  NotFound: "state",
  NotActive: "state",
  AlreadyLinked: "state",
  InvalidUpdateParam: "config",
  FeeTransferFailed: "fee",
};

export function registryErrorCategory(kind: RegistryErrorKind): RegistryErrorCategory {
  return ERROR_CATEGORIES[kind];
}

export interface RegistrySuccess<T> {
  ok: true;
  value: T;
}

export interface RegistryFailure {
  ok: false;
  error: RegistryErrorKind;
  code: RegistryErrorCode;
}

export type RegistryResult<T> = RegistrySuccess<T> | RegistryFailure;

export function succeed<T>(value: T): RegistrySuccess<T> {
  return { ok: true, value };
}

export function fail(error: RegistryErrorKind): RegistryFailure {
  return { ok: false, error, code: REGISTRY_ERROR_CODES[error] };
}

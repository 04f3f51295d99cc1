import {
  fail,
  PRODUCT_CURRENCIES,
  succeed,
  type ProductCurrency,
  type ProductFields,
  type ProductUpdateFields,
  type RegistryErrorKind,
  type RegistryResult,
} from "@wildtrace/shared";

export const MAX_SPECIES_LENGTH = 50;
export const MAX_ORIGIN_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_LOCATION_LENGTH = 100;
export const MAX_IMAGE_COUNT = 10;
export const MAX_IMAGE_URL_LENGTH = 200;

export interface ValidProductFields extends Omit<ProductFields, "currency"> {
  currency: ProductCurrency;
}

export interface ValidProductUpdateFields extends Omit<ProductUpdateFields, "currency"> {
  currency: ProductCurrency;
}

type Check = RegistryErrorKind | null;

// Code points, so "é" and an emoji each count once.
function textLength(value: string): number {
  return Array.from(value).length;
}

function lengthWithin(value: unknown, min: number, max: number): boolean {
  if (typeof value !== "string") return false;
  const length = textLength(value);
  return length >= min && length <= max;
}

export function isProductCurrency(value: unknown): value is ProductCurrency {
  return PRODUCT_CURRENCIES.some((currency) => currency === value);
}

export function validateSpecies(value: string): Check {
  return lengthWithin(value, 1, MAX_SPECIES_LENGTH) ? null : "InvalidSpecies";
}

export function validateOrigin(value: string): Check {
  return lengthWithin(value, 1, MAX_ORIGIN_LENGTH) ? null : "InvalidOrigin";
}

export function validateHarvestDate(value: number, currentHeight: number): Check {
  if (!Number.isSafeInteger(value) || value < 0) return "InvalidHarvestDate";
  return value <= currentHeight ? null : "InvalidHarvestDate";
}

export function validateWeight(value: number): Check {
  return Number.isSafeInteger(value) && value > 0 ? null : "InvalidWeight";
}

export function validateDescription(value: string): Check {
  return lengthWithin(value, 0, MAX_DESCRIPTION_LENGTH) ? null : "InvalidDescription";
}

export function validateLocation(value: string): Check {
  return lengthWithin(value, 1, MAX_LOCATION_LENGTH) ? null : "InvalidLocation";
}

export function validateCurrency(value: string): Check {
  return isProductCurrency(value) ? null : "InvalidCurrency";
}

export function validateImages(images: readonly string[]): Check {
  if (images.length > MAX_IMAGE_COUNT) return "InvalidImageCount";
  for (const url of images) {
    if (!lengthWithin(url, 1, MAX_IMAGE_URL_LENGTH)) return "InvalidImageUrl";
  }
  return null;
}

export function validateCertId(value: number): Check {
  return Number.isSafeInteger(value) && value >= 0 ? null : "InvalidCertId";
}

function firstFailure(checks: Array<() => Check>): Check {
  for (const check of checks) {
    const failure = check();
    if (failure) return failure;
  }
  return null;
}

/**
 * Runs the creation checks in their fixed order and stops at the first
 * failing rule.
 */
export function validateProductFields(
  fields: ProductFields,
  currentHeight: number,
): RegistryResult<ValidProductFields> {
  const failure = firstFailure([
    () => validateImages(fields.images),
    () => validateSpecies(fields.species),
    () => validateOrigin(fields.origin),
    () => validateHarvestDate(fields.harvestDate, currentHeight),
    () => validateWeight(fields.weight),
    () => validateDescription(fields.description),
    () => validateLocation(fields.location),
  ]);
  if (failure) return fail(failure);
  if (!isProductCurrency(fields.currency)) return fail("InvalidCurrency");
  return succeed({ ...fields, images: [...fields.images], currency: fields.currency });
}

export function validateProductUpdateFields(
  fields: ProductUpdateFields,
): RegistryResult<ValidProductUpdateFields> {
  const failure = firstFailure([
    () => validateSpecies(fields.species),
    () => validateOrigin(fields.origin),
    () => validateWeight(fields.weight),
    () => validateDescription(fields.description),
    () => validateLocation(fields.location),
  ]);
  if (failure) return fail(failure);
  if (!isProductCurrency(fields.currency)) return fail("InvalidCurrency");
  return succeed({ ...fields, currency: fields.currency });
}

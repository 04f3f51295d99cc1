import {
  fail,
  succeed,
  type Product,
  type ProductFields,
  type ProductUpdate,
  type ProductUpdateFields,
  type RegistryConfig,
  type RegistryResult,
  type RegistryRole,
} from "@wildtrace/shared";
import type { LedgerClock } from "./clock.js";
import { hasRole, type RoleRegistry } from "./roles.js";
import type { ProductStore } from "./storage/product-store.js";
import type { FeeTreasury } from "./treasury.js";
import {
  validateCertId,
  validateProductFields,
  validateProductUpdateFields,
} from "./validation.js";

export const MAX_PRODUCTS_PER_CREATOR = 100;

export interface ProductRegistryOptions {
  store: ProductStore;
  roles: RoleRegistry;
  treasury: FeeTreasury;
  clock: LedgerClock;
  maxProductsPerCreator?: number;
}

export interface CreatedProduct {
  productId: number;
  product: Product;
  feePaid: number;
}

export interface UpdatedProduct {
  product: Product;
  update: ProductUpdate;
}

/**
 * Product registry state machine.
 *
 * Every mutating call checks authorization first, then validates its
 * inputs, then applies exactly one store mutation. A failed check returns
 * a failure result and leaves the store untouched. Calls are expected to
 * be serialized by the caller; nothing here suspends.
 */
export class ProductRegistry {
  private readonly store: ProductStore;
  private readonly roles: RoleRegistry;
  private readonly treasury: FeeTreasury;
  private readonly clock: LedgerClock;
  private readonly maxProductsPerCreator: number;

  constructor(options: ProductRegistryOptions) {
    this.store = options.store;
    this.roles = options.roles;
    this.treasury = options.treasury;
    this.clock = options.clock;
    this.maxProductsPerCreator = options.maxProductsPerCreator ?? MAX_PRODUCTS_PER_CREATOR;
  }

  private requireRole(caller: string, role: RegistryRole): boolean {
    return hasRole(this.roles, caller, role);
  }

  setMaxProducts(caller: string, newMax: number): RegistryResult<true> {
    if (!this.requireRole(caller, "admin")) return fail("InvalidRole");
    if (!Number.isSafeInteger(newMax) || newMax <= 0) return fail("InvalidUpdateParam");
    this.store.setMaxProducts(newMax);
    return succeed(true);
  }

  setCreationFee(caller: string, newFee: number): RegistryResult<true> {
    if (!this.requireRole(caller, "admin")) return fail("InvalidRole");
    if (!Number.isSafeInteger(newFee) || newFee < 0) return fail("InvalidUpdateParam");
    this.store.setCreationFee(newFee);
    return succeed(true);
  }

  createProduct(caller: string, fields: ProductFields): RegistryResult<CreatedProduct> {
    if (!this.requireRole(caller, "supplier")) return fail("InvalidRole");

    const config = this.store.getConfig();
    if (config.nextProductId >= config.maxProducts) return fail("MaxProductsExceeded");
    // The creator index is bounded; a full index rejects rather than evicts.
    if (this.store.getProductsByCreator(caller).length >= this.maxProductsPerCreator) {
      return fail("MaxProductsExceeded");
    }

    const height = this.clock.currentHeight();
    const validated = validateProductFields(fields, height);
    if (!validated.ok) return validated;

    const productId = config.nextProductId;
    if (this.store.getProduct(productId)) return fail("AlreadyExists");

    if (config.creationFee > 0) {
      const transfer = this.treasury.transfer(caller, config.creationFee);
      if (!transfer.ok) return fail("FeeTransferFailed");
    }

    const product: Product = {
      species: validated.value.species,
      origin: validated.value.origin,
      harvestDate: validated.value.harvestDate,
      weight: validated.value.weight,
      description: validated.value.description,
      status: true,
      creator: caller,
      location: validated.value.location,
      currency: validated.value.currency,
      certId: null,
      images: validated.value.images,
      createdAt: height,
    };
    this.store.insertProduct(productId, product);
    return succeed({ productId, product, feePaid: config.creationFee });
  }

  updateProduct(
    caller: string,
    productId: number,
    fields: ProductUpdateFields,
  ): RegistryResult<UpdatedProduct> {
    const current = this.store.getProduct(productId);
    if (!current) return fail("NotFound");
    if (current.creator !== caller) return fail("NotAuthorized");
    if (!current.status) return fail("NotActive");

    const validated = validateProductUpdateFields(fields);
    if (!validated.ok) return validated;

    const product: Product = {
      ...current,
      species: validated.value.species,
      origin: validated.value.origin,
      weight: validated.value.weight,
      description: validated.value.description,
      location: validated.value.location,
      currency: validated.value.currency,
    };
    const update: ProductUpdate = {
      updatedSpecies: product.species,
      updatedOrigin: product.origin,
      updatedWeight: product.weight,
      updatedDescription: product.description,
      updatedLocation: product.location,
      updatedCurrency: product.currency,
      updatedAt: this.clock.currentHeight(),
      updater: caller,
    };
    this.store.saveProduct(productId, product, update);
    return succeed({ product, update });
  }

  /**
   * Attaches a certification reference once. The reference is not checked
   * against the certification service.
   */
  linkCertification(caller: string, productId: number, certId: number): RegistryResult<Product> {
    if (!this.requireRole(caller, "certifier")) return fail("InvalidRole");

    const current = this.store.getProduct(productId);
    if (!current) return fail("NotFound");
    if (!current.status) return fail("NotActive");
    if (current.certId !== null) return fail("AlreadyLinked");

    const invalid = validateCertId(certId);
    if (invalid) return fail(invalid);

    const product: Product = { ...current, certId };
    this.store.saveProduct(productId, product);
    return succeed(product);
  }

  deactivateProduct(caller: string, productId: number): RegistryResult<Product> {
    const current = this.store.getProduct(productId);
    if (!current) return fail("NotFound");
    if (current.creator !== caller) return fail("NotAuthorized");
    if (!current.status) return fail("NotActive");

    const product: Product = { ...current, status: false };
    this.store.saveProduct(productId, product);
    return succeed(product);
  }

  getProduct(productId: number): Product | null {
    return this.store.getProduct(productId);
  }

  getProductUpdates(productId: number): ProductUpdate | null {
    return this.store.getProductUpdate(productId);
  }

  getProductsByCreator(creator: string): number[] {
    return this.store.getProductsByCreator(creator);
  }

  /** Value of the id counter, i.e. the id the next product will receive. */
  getProductCount(): number {
    return this.store.getConfig().nextProductId;
  }

  getConfig(): RegistryConfig {
    return this.store.getConfig();
  }
}

import type { Product, ProductUpdate, RegistryConfig } from "@wildtrace/shared";
import {
  DEFAULT_CREATION_FEE,
  DEFAULT_MAX_PRODUCTS,
  type ConfigSeed,
  type ProductStore,
} from "./product-store.js";

function cloneProduct(product: Product): Product {
  return { ...product, images: [...product.images] };
}

export class InMemoryProductStore implements ProductStore {
  private readonly products = new Map<number, Product>();
  private readonly updates = new Map<number, ProductUpdate>();
  private readonly byCreator = new Map<string, number[]>();
  private config: RegistryConfig;

  constructor(seed: ConfigSeed = {}) {
    this.config = {
      nextProductId: 1,
      maxProducts: seed.maxProducts ?? DEFAULT_MAX_PRODUCTS,
      creationFee: seed.creationFee ?? DEFAULT_CREATION_FEE,
    };
  }

  // Copies out so callers cannot mutate stored records.
  getProduct(productId: number): Product | null {
    const product = this.products.get(productId);
    return product ? cloneProduct(product) : null;
  }

  getProductUpdate(productId: number): ProductUpdate | null {
    const update = this.updates.get(productId);
    return update ? { ...update } : null;
  }

  getProductsByCreator(creator: string): number[] {
    return [...(this.byCreator.get(creator) || [])];
  }

  getConfig(): RegistryConfig {
    return { ...this.config };
  }

  setMaxProducts(maxProducts: number): void {
    this.config = { ...this.config, maxProducts };
  }

  setCreationFee(creationFee: number): void {
    this.config = { ...this.config, creationFee };
  }

  insertProduct(productId: number, product: Product): void {
    if (this.products.has(productId)) {
      throw new Error(`Product ${productId} already exists`);
    }
    this.products.set(productId, cloneProduct(product));
    const ids = this.byCreator.get(product.creator) || [];
    ids.push(productId);
    this.byCreator.set(product.creator, ids);
    this.config = { ...this.config, nextProductId: productId + 1 };
  }

  saveProduct(productId: number, product: Product, update?: ProductUpdate): void {
    if (!this.products.has(productId)) {
      throw new Error(`Product ${productId} does not exist`);
    }
    this.products.set(productId, cloneProduct(product));
    if (update) {
      this.updates.set(productId, { ...update });
    }
  }

  close(): void {
    // Nothing to release.
  }
}

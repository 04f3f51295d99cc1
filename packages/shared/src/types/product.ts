export const PRODUCT_CURRENCIES = ["STX", "USD", "BTC"] as const;
export type ProductCurrency = (typeof PRODUCT_CURRENCIES)[number];

export const REGISTRY_ROLES = ["admin", "supplier", "certifier"] as const;
export type RegistryRole = (typeof REGISTRY_ROLES)[number];

export interface Product {
  species: string;
  origin: string;
  harvestDate: number;      // ledger height, <= createdAt
  weight: number;
  description: string;
  status: boolean;          // true = active; false is terminal
  creator: string;
  location: string;
  currency: ProductCurrency;
  certId: number | null;    // set once by a certifier
  images: string[];
  createdAt: number;        // ledger height
}

/**
 * Most recent edit of a product. Only one slot is kept per product:
 * each update replaces the previous record.
 */
export interface ProductUpdate {
  updatedSpecies: string;
  updatedOrigin: string;
  updatedWeight: number;
  updatedDescription: string;
  updatedLocation: string;
  updatedCurrency: ProductCurrency;
  updatedAt: number;
  updater: string;
}

export interface RegistryConfig {
  nextProductId: number;
  maxProducts: number;
  creationFee: number;
}

export interface ProductFields {
  species: string;
  origin: string;
  harvestDate: number;
  weight: number;
  description: string;
  location: string;
  currency: string;
  images: string[];
}

export type ProductUpdateFields = Omit<ProductFields, "harvestDate" | "images">;

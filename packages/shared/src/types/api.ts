import type { TraceEvent } from "./events.js";
import type {
  Product,
  ProductUpdate,
  RegistryConfig,
} from "./product.js";

export type EventWriteStatus = "RECORDED" | "SKIPPED" | "FAILED";

export interface CreateProductRequest {
  species: string;
  origin: string;
  harvestDate: number;
  weight: number;
  description: string;
  location: string;
  currency: string;
  images: string[];
}

export interface CreateProductResponse {
  productId: number;
  product: Product;
  fingerprint: string;
  eventWriteStatus: EventWriteStatus;
}

export interface UpdateProductRequest {
  species: string;
  origin: string;
  weight: number;
  description: string;
  location: string;
  currency: string;
}

export interface UpdateProductResponse {
  product: Product;
  update: ProductUpdate;
  eventWriteStatus: EventWriteStatus;
}

export interface LinkCertificationRequest {
  certId: number;
}

export interface LinkCertificationResponse {
  product: Product;
  eventWriteStatus: EventWriteStatus;
}

export interface DeactivateProductResponse {
  product: Product;
  eventWriteStatus: EventWriteStatus;
}

export interface SetMaxProductsRequest {
  maxProducts: number;
}

export interface SetCreationFeeRequest {
  creationFee: number;
}

export interface GetConfigResponse {
  config: RegistryConfig;
}

export interface GetProductResponse {
  productId: number;
  product: Product;
  fingerprint: string;
}

export interface GetProductUpdatesResponse {
  productId: number;
  update: ProductUpdate;
}

export interface GetProductsByCreatorResponse {
  creator: string;
  productIds: number[];
}

export interface GetProductCountResponse {
  count: number;
}

export interface RegistryErrorResponse {
  error: string;
  code?: number;
  message?: string;
}

export interface RecordTraceEventRequest {
  event: TraceEvent;
}

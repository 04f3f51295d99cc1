import type { ProductCurrency } from "./product.js";

export type TraceEventType =
  | "PRODUCT_CREATED"
  | "PRODUCT_UPDATED"
  | "CERTIFICATION_LINKED"
  | "PRODUCT_DEACTIVATED";

export interface TraceEventBase {
  type: TraceEventType;
  productId: number;
  actor: string;
  ledgerHeight: number;
  occurredAt: string;   // ISO date
  fingerprint?: string; // sha256 of the canonical product record
}

export interface ProductCreatedEvent extends TraceEventBase {
  type: "PRODUCT_CREATED";
  species: string;
  origin: string;
  weight: number;
  feePaid: number;
}

export interface ProductUpdatedEvent extends TraceEventBase {
  type: "PRODUCT_UPDATED";
  weight: number;
  location: string;
  currency: ProductCurrency;
}

export interface CertificationLinkedEvent extends TraceEventBase {
  type: "CERTIFICATION_LINKED";
  certId: number;
}

export interface ProductDeactivatedEvent extends TraceEventBase {
  type: "PRODUCT_DEACTIVATED";
}

export type TraceEvent =
  | ProductCreatedEvent
  | ProductUpdatedEvent
  | CertificationLinkedEvent
  | ProductDeactivatedEvent;

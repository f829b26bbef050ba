// Core business entities shared by the intake API and its callers

export enum CustomerStatus {
  ARRIVED = 'arrived',
  IN_SERVICE = 'in_service',
  DEPARTED = 'departed'
}

export enum OrderType {
  SERVICE = 'service',
  SALES = 'sales',
  INQUIRY = 'inquiry'
}

/** Entry points that submit candidate identities. */
export enum IntakeChannel {
  INVOICE_CAPTURE = 'invoice_capture',
  DOCUMENT_INGESTION = 'document_ingestion',
  ORDER_INTAKE = 'order_intake',
  REGISTRATION_WIZARD = 'registration_wizard',
  QUICK_CREATE = 'quick_create'
}

/**
 * The identity tuple in its stored (normalized) form.
 * Absent parts are empty strings so the uniqueness constraint covers them.
 */
export interface IdentityKey {
  branchId: number;
  fullName: string;
  phone: string;
  organizationName: string;
  taxNumber: string;
}

export interface ICustomer extends IdentityKey {
  id: number;
  arrivalTime: Date;
  currentStatus: CustomerStatus;
  lastVisit: Date;
  totalVisits: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface IVehicle {
  id: number;
  customerId: number;
  plate: string;
  make: string | null;
  model: string | null;
  year: number | null;
  vin: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface IOrder {
  id: number;
  customerId: number;
  vehicleId: number | null;
  type: OrderType;
  channel: IntakeChannel;
  description: string | null;
  externalRef: string | null;
  createdAt: Date;
}

// Caller-supplied attributes, before normalization

export interface CandidateIdentity {
  branchId: number;
  fullName?: string | null;
  phone?: string | null;
  organizationName?: string | null;
  taxNumber?: string | null;
}

export interface VehicleAttributes {
  plate?: string | null;
  make?: string | null;
  model?: string | null;
  year?: number | null;
  vin?: string | null;
}

/** Descriptive vehicle fields that may be filled in after creation. */
export type VehicleDetails = Pick<IVehicle, 'make' | 'model' | 'year' | 'vin'>;

export interface OrderAttributes {
  type: OrderType;
  description?: string | null;
  externalRef?: string | null;
}

/** Stable record a walk-in fallback identity is derived from. */
export interface FallbackReference {
  kind: 'job' | 'invoice' | 'document' | 'order';
  id: string | number;
}

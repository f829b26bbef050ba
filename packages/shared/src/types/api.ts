// API request/response types and interfaces

import type { ICustomer, IOrder, IVehicle } from './entities.js';

// Generic API response wrapper
export interface ApiResponse<T> {
  success: boolean;
  data: T;
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details: unknown;
  };
}

export interface ResolvedCustomer {
  customer: ICustomer;
  created: boolean;
}

export interface CompleteFlowResult {
  customer: ICustomer;
  vehicle: IVehicle | null;
  order: IOrder;
  createdCustomer: boolean;
}

export type ResolveCustomerResponse = ApiResponse<ResolvedCustomer>;
export type IntakeResponse = ApiResponse<CompleteFlowResult>;
export type CustomerOrdersResponse = ApiResponse<IOrder[]>;

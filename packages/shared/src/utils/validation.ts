// Validation schemas for intake payloads

import { z } from 'zod';
import { IntakeChannel, OrderType } from '../types/entities.js';
import {
  DESCRIPTION_MAX_LENGTH,
  EXTERNAL_REF_MAX_LENGTH,
  FULL_NAME_MAX_LENGTH,
  MAX_ROW_ID,
  ORGANIZATION_NAME_MAX_LENGTH,
  PHONE_MAX_LENGTH,
  PLATE_MAX_LENGTH,
  TAX_NUMBER_MAX_LENGTH,
  VEHICLE_YEAR_MIN,
  VIN_MAX_LENGTH
} from './constants.js';

export const branchIdSchema = z.coerce
  .number()
  .int('Branch id must be an integer')
  .positive('Branch id must be positive')
  .max(MAX_ROW_ID, 'Branch id is out of range');

export const candidateIdentitySchema = z.object({
  branchId: branchIdSchema,
  fullName: z.string().max(FULL_NAME_MAX_LENGTH).nullish(),
  phone: z.string().max(PHONE_MAX_LENGTH).nullish(),
  organizationName: z.string().max(ORGANIZATION_NAME_MAX_LENGTH).nullish(),
  taxNumber: z.string().max(TAX_NUMBER_MAX_LENGTH).nullish()
});

export const vehicleAttributesSchema = z.object({
  plate: z.string().max(PLATE_MAX_LENGTH).nullish(),
  make: z.string().max(50).nullish(),
  model: z.string().max(50).nullish(),
  year: z
    .number()
    .int()
    .min(VEHICLE_YEAR_MIN)
    .max(new Date().getFullYear() + 1)
    .nullish(),
  vin: z.string().max(VIN_MAX_LENGTH).nullish()
});

export const orderAttributesSchema = z.object({
  type: z.nativeEnum(OrderType, { errorMap: () => ({ message: 'Invalid order type' }) }),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).nullish(),
  externalRef: z.string().max(EXTERNAL_REF_MAX_LENGTH).nullish()
});

export const intakeRequestSchema = z.object({
  channel: z.nativeEnum(IntakeChannel, { errorMap: () => ({ message: 'Invalid intake channel' }) }),
  customer: candidateIdentitySchema,
  vehicle: vehicleAttributesSchema.optional(),
  order: orderAttributesSchema
});

export const customerIdParamSchema = z.object({
  id: z.coerce.number().int().positive().max(MAX_ROW_ID, 'Id is out of range')
});

export type IntakeRequest = z.infer<typeof intakeRequestSchema>;

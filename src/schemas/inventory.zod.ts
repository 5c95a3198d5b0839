import { z } from 'zod';
import { DEVICE_TYPES, HARDWARE_STATUSES, STORAGE_TYPES } from '../types/inventory.types';
import { isoDate, nonEmptyPatch, nullableText } from './common.zod';

/* ----------------------------------
   Licenses
----------------------------------- */
const licenseShape = {
  software: z.string().trim().min(1, 'Software is required').max(100),
  version: z.string().trim().min(1, 'Version is required').max(50),
  key: z.string().trim().min(1, 'License key is required').max(255),
  account: z.string().trim().min(1).max(100),
  password: z.string().min(1).max(100),
  expiryDate: isoDate.nullable().optional(),
  employeeId: z.number().int().positive(),
};

export const CreateLicenseSchema = z.object(licenseShape);
export const UpdateLicenseSchema = nonEmptyPatch(licenseShape);

/* ----------------------------------
   Hardware inventory
----------------------------------- */
const hardwareShape = {
  serialNumber: z.string().trim().min(1, 'Serial number is required').max(50),
  brand: z.string().trim().min(1, 'Brand is required').max(50),
  model: nullableText(100),
  deviceType: z.enum(DEVICE_TYPES).nullable().optional(),
  processor: nullableText(100),
  ramGb: z.number().int().nonnegative().nullable().optional(),
  storageType: z.enum(STORAGE_TYPES).nullable().optional(),
  storageSizeGb: z.number().int().nonnegative().nullable().optional(),
  gpu: nullableText(100),
  operatingSystem: nullableText(100),
  warrantyStartDate: isoDate.nullable().optional(),
  warrantyEndDate: isoDate.nullable().optional(),
  purchaseDate: isoDate.nullable().optional(),
  employeeId: z.number().int().positive().nullable().optional(),
  location: nullableText(100),
  status: z.enum(HARDWARE_STATUSES).optional(),
  notes: nullableText(255),
};

export const CreateHardwareSchema = z.object(hardwareShape);
export const UpdateHardwareSchema = nonEmptyPatch(hardwareShape);

export type CreateLicenseInput = z.infer<typeof CreateLicenseSchema>;
export type UpdateLicenseInput = z.infer<typeof UpdateLicenseSchema>;
export type CreateHardwareInput = z.infer<typeof CreateHardwareSchema>;
export type UpdateHardwareInput = z.infer<typeof UpdateHardwareSchema>;

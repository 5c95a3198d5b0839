export interface License {
  id: number;
  software: string;
  version: string;
  key: string;
  account: string;
  password: string;
  expiryDate: string | null;
  employeeId: number;
  createdAt: Date;
}

export const DEVICE_TYPES = ['Laptop', 'Desktop', 'Workstation', 'Server'] as const;
export const STORAGE_TYPES = ['HDD', 'SSD', 'NVMe', 'Hybrid'] as const;
export const HARDWARE_STATUSES = ['Active', 'In Repair', 'Retired', 'Spare'] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];
export type StorageType = (typeof STORAGE_TYPES)[number];
export type HardwareStatus = (typeof HARDWARE_STATUSES)[number];

export interface HardwareItem {
  id: number;
  serialNumber: string;
  brand: string;
  model: string | null;
  deviceType: DeviceType | null;
  processor: string | null;
  ramGb: number | null;
  storageType: StorageType | null;
  storageSizeGb: number | null;
  gpu: string | null;
  operatingSystem: string | null;
  warrantyStartDate: string | null;
  warrantyEndDate: string | null;
  purchaseDate: string | null;
  employeeId: number | null;
  location: string | null;
  status: HardwareStatus;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date | null;
}

import type { Queryable } from '../../lib/db';
import type { HardwareItem, License } from '../../types/inventory.types';
import type {
  CreateHardwareInput,
  CreateLicenseInput,
  UpdateHardwareInput,
  UpdateLicenseInput,
} from '../../schemas/inventory.zod';
import type { HardwareRepository, LicenseRepository } from '../types';
import { PgCrudRepository } from './table';

export class PgLicenseRepository
  extends PgCrudRepository<License, CreateLicenseInput, UpdateLicenseInput>
  implements LicenseRepository
{
  constructor(db: Queryable) {
    super(db, {
      name: 'licenses',
      columns: {
        id: 'id',
        software: 'software',
        version: 'version',
        key: 'license_key',
        account: 'account',
        password: 'password',
        expiryDate: 'expiry_date',
        employeeId: 'employee_id',
        createdAt: 'created_at',
      },
      dateOnly: ['expiryDate'],
    });
  }
}

export class PgHardwareRepository
  extends PgCrudRepository<HardwareItem, CreateHardwareInput, UpdateHardwareInput>
  implements HardwareRepository
{
  constructor(db: Queryable) {
    super(
      db,
      {
        name: 'hardware_inventory',
        columns: {
          id: 'id',
          serialNumber: 'serial_number',
          brand: 'brand',
          model: 'model',
          deviceType: 'device_type',
          processor: 'processor',
          ramGb: 'ram_gb',
          storageType: 'storage_type',
          storageSizeGb: 'storage_size_gb',
          gpu: 'gpu',
          operatingSystem: 'operating_system',
          warrantyStartDate: 'warranty_start_date',
          warrantyEndDate: 'warranty_end_date',
          purchaseDate: 'purchase_date',
          employeeId: 'employee_id',
          location: 'location',
          status: 'status',
          notes: 'notes',
          createdAt: 'created_at',
          updatedAt: 'updated_at',
        },
        dateOnly: ['warrantyStartDate', 'warrantyEndDate', 'purchaseDate'],
      },
      ['updated_at = now()']
    );
  }

  findBySerialNumber(serialNumber: string) {
    return this.table.findOne('serial_number = $1', [serialNumber]);
  }
}

import type { Repositories } from '../repositories/types';
import type { CreateLicenseInput, UpdateLicenseInput } from '../schemas/inventory.zod';
import { NotFoundError } from '../utils/errors';
import { assertEmployeeExists } from './employee.service';

export async function getLicenseOrThrow(db: Repositories, id: number) {
  const license = await db.licenses.findById(id);
  if (!license) throw new NotFoundError('License not found');
  return license;
}

export function listLicenses(db: Repositories) {
  return db.licenses.list();
}

export async function createLicense(db: Repositories, data: CreateLicenseInput) {
  await assertEmployeeExists(db, data.employeeId);
  return db.licenses.create(data);
}

export async function updateLicense(db: Repositories, id: number, data: UpdateLicenseInput) {
  await getLicenseOrThrow(db, id);
  await assertEmployeeExists(db, data.employeeId);

  const license = await db.licenses.update(id, data);
  if (!license) throw new NotFoundError('License not found');
  return license;
}

export async function deleteLicense(db: Repositories, id: number) {
  if (!(await db.licenses.delete(id))) {
    throw new NotFoundError('License not found');
  }
}

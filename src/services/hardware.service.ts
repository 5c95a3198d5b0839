import type { Repositories } from '../repositories/types';
import type { CreateHardwareInput, UpdateHardwareInput } from '../schemas/inventory.zod';
import { BadRequestError, NotFoundError } from '../utils/errors';
import { assertEmployeeExists } from './employee.service';

export async function getHardwareOrThrow(db: Repositories, id: number) {
  const item = await db.hardware.findById(id);
  if (!item) throw new NotFoundError('Hardware item not found');
  return item;
}

export function listHardware(db: Repositories) {
  return db.hardware.list();
}

async function assertSerialAvailable(db: Repositories, serialNumber: string, currentId?: number) {
  const owner = await db.hardware.findBySerialNumber(serialNumber);
  if (owner && owner.id !== currentId) {
    throw new BadRequestError(`Serial number "${serialNumber}" is already registered`);
  }
}

export async function createHardware(db: Repositories, data: CreateHardwareInput) {
  await assertSerialAvailable(db, data.serialNumber);
  await assertEmployeeExists(db, data.employeeId, 'Assigned employee');
  return db.hardware.create(data);
}

/** The repository stamps `updatedAt` on every update. */
export async function updateHardware(db: Repositories, id: number, data: UpdateHardwareInput) {
  await getHardwareOrThrow(db, id);
  if (data.serialNumber !== undefined) {
    await assertSerialAvailable(db, data.serialNumber, id);
  }
  await assertEmployeeExists(db, data.employeeId, 'Assigned employee');

  const item = await db.hardware.update(id, data);
  if (!item) throw new NotFoundError('Hardware item not found');
  return item;
}

export async function deleteHardware(db: Repositories, id: number) {
  if (!(await db.hardware.delete(id))) {
    throw new NotFoundError('Hardware item not found');
  }
}

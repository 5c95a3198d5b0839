import type { Repositories } from '../repositories/types';
import type { CreateJobInput, UpdateJobInput } from '../schemas/recruiting.zod';
import { BadRequestError, NotFoundError } from '../utils/errors';
import { assertEmployeeExists } from './employee.service';

export async function getJobOrThrow(db: Repositories, id: number) {
  const job = await db.jobs.findById(id);
  if (!job) throw new NotFoundError('Job not found');
  return job;
}

export function listJobs(db: Repositories) {
  return db.jobs.list();
}

export function listJobsByStatus(db: Repositories, status: string) {
  return db.jobs.listByStatus(status);
}

export async function createJob(db: Repositories, data: CreateJobInput) {
  await assertEmployeeExists(db, data.employeeId);
  return db.jobs.create(data);
}

export async function updateJob(db: Repositories, id: number, data: UpdateJobInput) {
  const job = await getJobOrThrow(db, id);
  await assertEmployeeExists(db, data.employeeId);

  const salaryMin = data.salaryMin !== undefined ? data.salaryMin : job.salaryMin;
  const salaryMax = data.salaryMax !== undefined ? data.salaryMax : job.salaryMax;
  if (salaryMin !== null && salaryMax !== null && salaryMin > salaryMax) {
    throw new BadRequestError('salaryMin cannot be greater than salaryMax');
  }

  const updated = await db.jobs.update(id, data);
  if (!updated) throw new NotFoundError('Job not found');
  return updated;
}

export async function deleteJob(db: Repositories, id: number) {
  if (!(await db.jobs.delete(id))) {
    throw new NotFoundError('Job not found');
  }
}

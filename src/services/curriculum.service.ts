import { randomUUID } from 'crypto';
import path from 'path';
import type { Repositories } from '../repositories/types';
import {
  ALLOWED_CURRICULUM_EXTENSIONS,
  type CreateCurriculumInput,
  type UpdateCurriculumInput,
} from '../schemas/recruiting.zod';
import type { Curriculum } from '../types/recruiting.types';
import { BadRequestError, NotFoundError } from '../utils/errors';
import type { UploadedFile } from '../utils/multipart';
import { assertEmployeeExists } from './employee.service';
import { getJobOrThrow } from './job.service';
import type { FileStorage } from './storage';

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.txt': 'text/plain',
};

export async function getCurriculumOrThrow(db: Repositories, id: number): Promise<Curriculum> {
  const curriculum = await db.curriculums.findById(id);
  if (!curriculum) throw new NotFoundError('Curriculum not found');
  return curriculum;
}

export function listCurriculums(db: Repositories) {
  return db.curriculums.list();
}

export async function listCurriculumsByJob(db: Repositories, jobId: number) {
  await getJobOrThrow(db, jobId);
  return db.curriculums.listByJob(jobId);
}

export function listCurriculumsByStatus(db: Repositories, status: string) {
  return db.curriculums.listByStatus(status);
}

export async function createCurriculum(db: Repositories, data: CreateCurriculumInput) {
  await getJobOrThrow(db, data.jobId);
  await assertEmployeeExists(db, data.employeeId);
  return db.curriculums.create(data);
}

/**
 * Stores the resume under `curriculums/<uuid><ext>` and records the
 * application. The stored file is removed again if the insert fails.
 */
export async function createCurriculumFromUpload(
  db: Repositories,
  storage: FileStorage,
  data: CreateCurriculumInput,
  file: UploadedFile
) {
  const extension = path.extname(file.fileName).toLowerCase();
  if (!ALLOWED_CURRICULUM_EXTENSIONS.includes(extension)) {
    throw new BadRequestError(`Invalid file type. Allowed: ${ALLOWED_CURRICULUM_EXTENSIONS.join(', ')}`);
  }

  await getJobOrThrow(db, data.jobId);
  await assertEmployeeExists(db, data.employeeId);

  const key = await storage.save(`curriculums/${randomUUID()}${extension}`, file.content, file.mimeType);
  try {
    return await db.curriculums.create({ ...data, curriculumPath: key });
  } catch (err) {
    await storage.remove(key);
    throw err;
  }
}

export async function updateCurriculum(db: Repositories, id: number, data: UpdateCurriculumInput) {
  const curriculum = await db.curriculums.update(id, data);
  if (!curriculum) throw new NotFoundError('Curriculum not found');
  return curriculum;
}

/** Download name is the applicant's name with spaces as underscores, e.g. `Ana_Diaz_Curriculum.pdf`. */
export function curriculumDownloadName(curriculum: Pick<Curriculum, 'name'>, storedPath: string) {
  return `${curriculum.name.replace(/ /g, '_')}_Curriculum${path.extname(storedPath)}`;
}

export async function downloadCurriculum(db: Repositories, storage: FileStorage, id: number) {
  const curriculum = await getCurriculumOrThrow(db, id);
  if (!curriculum.curriculumPath) {
    throw new NotFoundError('No curriculum file uploaded for this applicant');
  }
  if (!(await storage.exists(curriculum.curriculumPath))) {
    throw new NotFoundError('Curriculum file not found');
  }

  const extension = path.extname(curriculum.curriculumPath).toLowerCase();
  return {
    fileName: curriculumDownloadName(curriculum, curriculum.curriculumPath),
    contentType: CONTENT_TYPES[extension] ?? 'application/octet-stream',
    content: await storage.read(curriculum.curriculumPath),
  };
}

export async function deleteCurriculum(db: Repositories, storage: FileStorage, id: number) {
  const curriculum = await getCurriculumOrThrow(db, id);
  await db.curriculums.delete(id);

  if (curriculum.curriculumPath) {
    await storage.remove(curriculum.curriculumPath);
  }
}

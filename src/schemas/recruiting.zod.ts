import { z } from 'zod';
import { nonEmptyPatch, nullableText } from './common.zod';

/* ----------------------------------
   Jobs
----------------------------------- */
const jobShape = {
  title: z.string().trim().min(1, 'Title is required').max(100),
  description: nullableText(1000),
  requirements: nullableText(1000),
  location: nullableText(100),
  salaryMin: z.number().nonnegative().nullable().optional(),
  salaryMax: z.number().nonnegative().nullable().optional(),
  status: z.string().trim().min(1).max(20).optional(),
  employeeId: z.number().int().positive().nullable().optional(),
};

export const CreateJobSchema = z.object(jobShape).refine(
  (job) => job.salaryMin == null || job.salaryMax == null || job.salaryMin <= job.salaryMax,
  { message: 'salaryMin cannot be greater than salaryMax', path: ['salaryMin'] }
);

export const UpdateJobSchema = nonEmptyPatch(jobShape);

export const StatusParamsSchema = z.object({ status: z.string().min(1).max(20) });

/* ----------------------------------
   Curriculums
----------------------------------- */
const curriculumShape = {
  jobId: z.number().int().positive(),
  name: z.string().trim().min(1, 'Name is required').max(100),
  email: z.string().trim().email('Invalid email').max(100),
  phone: nullableText(20),
  coverLetter: nullableText(1000),
  status: z.string().trim().min(1).max(20).optional(),
  employeeId: z.number().int().positive().nullable().optional(),
};

export const CreateCurriculumSchema = z.object(curriculumShape);

export const UpdateCurriculumSchema = nonEmptyPatch({
  name: curriculumShape.name,
  email: curriculumShape.email,
  phone: curriculumShape.phone,
  curriculumPath: nullableText(255),
  coverLetter: curriculumShape.coverLetter,
  status: z.string().trim().min(1).max(20),
});

/** Multipart form fields arrive as strings. */
export const CurriculumUploadFieldsSchema = z.object({
  jobId: z.coerce.number().int().positive(),
  name: curriculumShape.name,
  email: curriculumShape.email,
  phone: curriculumShape.phone,
  coverLetter: curriculumShape.coverLetter,
  status: curriculumShape.status,
  employeeId: z.coerce.number().int().positive().optional(),
});

export const JobIdParamsSchema = z.object({ jobId: z.coerce.number().int().positive() });

export const ALLOWED_CURRICULUM_EXTENSIONS = ['.pdf', '.doc', '.docx', '.txt'];

export type CreateJobInput = z.infer<typeof CreateJobSchema>;
export type UpdateJobInput = z.infer<typeof UpdateJobSchema>;
export type CreateCurriculumInput = z.infer<typeof CreateCurriculumSchema> & { curriculumPath?: string | null };
export type UpdateCurriculumInput = z.infer<typeof UpdateCurriculumSchema>;

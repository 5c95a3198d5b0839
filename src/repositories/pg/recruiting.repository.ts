import type { Queryable } from '../../lib/db';
import type { Curriculum, Job } from '../../types/recruiting.types';
import type {
  CreateCurriculumInput,
  CreateJobInput,
  UpdateCurriculumInput,
  UpdateJobInput,
} from '../../schemas/recruiting.zod';
import type { CurriculumRepository, JobRepository } from '../types';
import { PgCrudRepository } from './table';

export class PgJobRepository extends PgCrudRepository<Job, CreateJobInput, UpdateJobInput> implements JobRepository {
  constructor(db: Queryable) {
    super(db, {
      name: 'jobs',
      columns: {
        id: 'id',
        title: 'title',
        description: 'description',
        requirements: 'requirements',
        location: 'location',
        salaryMin: 'salary_min',
        salaryMax: 'salary_max',
        status: 'status',
        postedAt: 'posted_at',
        employeeId: 'employee_id',
      },
      orderBy: 'posted_at DESC, id DESC',
    });
  }

  listByStatus(status: string) {
    return this.table.findAll('status = $1', [status]);
  }
}

export class PgCurriculumRepository
  extends PgCrudRepository<Curriculum, CreateCurriculumInput, UpdateCurriculumInput>
  implements CurriculumRepository
{
  constructor(db: Queryable) {
    super(db, {
      name: 'curriculums',
      columns: {
        id: 'id',
        jobId: 'job_id',
        name: 'name',
        email: 'email',
        phone: 'phone',
        curriculumPath: 'curriculum_path',
        coverLetter: 'cover_letter',
        status: 'status',
        submittedAt: 'submitted_at',
        employeeId: 'employee_id',
      },
      orderBy: 'submitted_at DESC, id DESC',
    });
  }

  listByJob(jobId: number) {
    return this.table.findAll('job_id = $1', [jobId]);
  }

  listByStatus(status: string) {
    return this.table.findAll('status = $1', [status]);
  }
}

import { FastifyInstance } from 'fastify';
import {
  createCurriculumHandler,
  deleteCurriculumHandler,
  downloadCurriculumHandler,
  getCurriculumHandler,
  listCurriculumsByJobHandler,
  listCurriculumsByStatusHandler,
  listCurriculumsHandler,
  updateCurriculumHandler,
  uploadCurriculumHandler,
} from '../controllers/curriculum.controller';
import {
  createJobHandler,
  deleteJobHandler,
  getJobHandler,
  listJobsByStatusHandler,
  listJobsHandler,
  updateJobHandler,
} from '../controllers/job.controller';
import { authGuard } from '../hooks/auth.guard';

export async function recruitingRoutes(app: FastifyInstance) {
  // Jobs
  app.get('/jobs', { preHandler: [authGuard] }, listJobsHandler);
  app.get('/jobs/status/:status', { preHandler: [authGuard] }, listJobsByStatusHandler);
  app.get('/jobs/:id', { preHandler: [authGuard] }, getJobHandler);
  app.post('/jobs', { preHandler: [authGuard] }, createJobHandler);
  app.put('/jobs/:id', { preHandler: [authGuard] }, updateJobHandler);
  app.delete('/jobs/:id', { preHandler: [authGuard] }, deleteJobHandler);

  // Curriculums
  app.get('/curriculums', { preHandler: [authGuard] }, listCurriculumsHandler);
  app.get('/curriculums/job/:jobId', { preHandler: [authGuard] }, listCurriculumsByJobHandler);
  app.get('/curriculums/status/:status', { preHandler: [authGuard] }, listCurriculumsByStatusHandler);
  app.get('/curriculums/:id', { preHandler: [authGuard] }, getCurriculumHandler);
  app.get('/curriculums/:id/download', { preHandler: [authGuard] }, downloadCurriculumHandler);
  app.post('/curriculums', { preHandler: [authGuard] }, createCurriculumHandler);
  app.post('/curriculums/upload', { preHandler: [authGuard] }, uploadCurriculumHandler);
  app.put('/curriculums/:id', { preHandler: [authGuard] }, updateCurriculumHandler);
  app.delete('/curriculums/:id', { preHandler: [authGuard] }, deleteCurriculumHandler);
}

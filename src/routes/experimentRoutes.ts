// src/routes/experimentRoutes.ts
import ExperimentRunsController from 'App/controllers/ExperimentRunsController';
import { Router } from 'express';

export const createExperimentRoutes = (controller = ExperimentRunsController) => {
  const experimentRoutes = Router();

  experimentRoutes.post('/api/experiments/run', controller.start);
  experimentRoutes.get('/api/experiments/run/:id', controller.status);
  experimentRoutes.get('/api/experiments/runs', controller.list);
  experimentRoutes.post('/api/experiments/compare', controller.compare);

  return experimentRoutes;
};

export default createExperimentRoutes();

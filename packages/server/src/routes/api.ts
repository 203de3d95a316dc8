import { Hono } from 'hono';
import { getJobQueues, isJobQueuesInitialized } from '../jobs/index.js';
import { jobs } from './jobs.js';

const api = new Hono()
  // API info
  .get('/', (c) => {
    return c.json({
      message: 'Durable Jobs API',
      labels: isJobQueuesInitialized() ? getJobQueues().labels : [],
    });
  })
  .route('/jobs', jobs);

export { api };

import express from 'express';
import morgan from 'morgan';
import { createSunburnRoutes } from '@/routes/sunburn.routes';
import { SunburnController } from '@/controllers/sunburn.controller';
import { SunburnService } from '@/services/sunburn.service';
import { IOzoneProvider } from '@/services/interfaces/ozone.provider.interface';
import { errorHandler } from '@/middleware/error.middleware';

export interface IAppOptions {
  requestLogging?: boolean; // default true
}

export const createApp = (ozoneProvider: IOzoneProvider, options: IAppOptions = {}) => {
  const app = express();

  // Middleware
  if (options.requestLogging !== false) {
    app.use(morgan('dev'));
  }
  app.use(express.json());

  // DI
  const sunburnService = new SunburnService(ozoneProvider);
  const sunburnController = new SunburnController(sunburnService);

  // Routes
  app.use(createSunburnRoutes(sunburnController));

  // Health check
  app.get('/health-check', (req, res) => {
    res.send('up and running!');
  });

  // Error handling
  app.use(errorHandler);

  return app;
};

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';

import { config } from './config';
import { connectDatabase } from './config/database';
import { errorHandler } from './middleware/errorHandler';
import apiRoutes from './routes';

export function createApp(): express.Express {
  const app = express();

  // Global middleware
  app.use(helmet());
  app.use(cors({
    origin: config.frontendUrl === '*' ? '*' : config.frontendUrl.split(',').map(s => s.trim()),
  }));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(morgan(config.env === 'production' ? 'combined' : 'short'));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', apiRoutes);

  // Error handler (must be last)
  app.use(errorHandler);
  return app;
}

async function bootstrap(): Promise<void> {
  await connectDatabase();

  const app = createApp();
  app.listen(config.port, () => {
    console.log(`[Server] Schedule notifier running on port ${config.port}`);
    console.log(`[Server] Environment: ${config.env}`);
  });
}

if (require.main === module) {
  bootstrap().catch((err) => {
    console.error('[Server] Failed to start:', err);
    process.exit(1);
  });
}

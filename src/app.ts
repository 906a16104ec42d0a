import express, { Express } from 'express';
import { AppConfig } from './config';
import { AnalyticsController } from './controllers/analytics/analytics.controller';
import { ProjectPOController } from './controllers/business/project-po.controller';
import { ProjectController } from './controllers/business/project.controller';
import { InvoiceController } from './controllers/financial/invoice.controller';
import { PaymentController } from './controllers/financial/payment.controller';
import { ActivityLogController } from './controllers/system/activity-log.controller';
import { createErrorHandler, notFoundHandler } from './middleware/error.middleware';
import { createUploadMiddleware } from './middleware/upload.middleware';
import { DataStore } from './repositories/types';
import { createProjectRouter } from './routes/business/project.routes';
import { createInvoiceRouter } from './routes/financial/invoice.routes';
import { createActivityLogRouter } from './routes/system/activity-log.routes';
import { AnalyticsService } from './services/analytics/analytics.service';
import { DocumentPolicy } from './services/business/po-binder';
import { ProjectPOService } from './services/business/project-po.service';
import { ProjectService } from './services/business/project.service';
import { InvoiceService } from './services/financial/invoice.service';
import { PaymentService } from './services/financial/payment.service';
import { DocumentStorage } from './services/storage/document-storage.service';
import { ActivityLogService } from './services/system/activity-log.service';

export interface AppServices {
  projects: ProjectService;
  pos: ProjectPOService;
  invoices: InvoiceService;
  payments: PaymentService;
  analytics: AnalyticsService;
  logs: ActivityLogService;
}

export const createServices = (store: DataStore, storage: DocumentStorage, config: AppConfig): AppServices => {
  const documents: DocumentPolicy = {
    maxDocuments: config.uploads.maxPoDocuments,
    maxFileSizeBytes: config.uploads.maxFileSizeBytes,
    allowedExtensions: config.uploads.allowedExtensions,
  };
  const options = { documents, hostUrl: config.hostUrl };

  return {
    projects: new ProjectService(store, storage, options),
    pos: new ProjectPOService(store, storage, options),
    invoices: new InvoiceService(store, storage, options),
    payments: new PaymentService(store),
    analytics: new AnalyticsService(store, config.timezone),
    logs: new ActivityLogService(store),
  };
};

/**
 * Builds the Express application. Stored documents are served read-only under `/uploads`.
 */
export const createApp = (services: AppServices, config: AppConfig): Express => {
  const app = express();
  const upload = createUploadMiddleware(config.uploads);

  app.use(express.json());
  app.use(`/${config.uploads.publicPrefix}`, express.static(config.uploads.rootDir, { dotfiles: 'ignore' }));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  app.use(
    '/projects',
    createProjectRouter(
      {
        projects: new ProjectController(services.projects, config.uploads),
        pos: new ProjectPOController(services.pos),
        analytics: new AnalyticsController(services.analytics),
      },
      upload
    )
  );
  app.use(
    '/invoices',
    createInvoiceRouter(
      {
        invoices: new InvoiceController(services.invoices),
        payments: new PaymentController(services.payments),
      },
      upload
    )
  );

  app.use('/logs', createActivityLogRouter(new ActivityLogController(services.logs)));

  app.use(notFoundHandler);
  app.use(createErrorHandler(config.uploads.maxFileSizeBytes));

  return app;
};

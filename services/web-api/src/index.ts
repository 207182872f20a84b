/**
 * Web API
 *
 * Upload page, document API and workflow API in front of the extraction
 * pipeline. Loads prompt templates and classifier keywords before listening;
 * a configuration error stops the process.
 */

import 'dotenv/config';
import {
  DefaultTextExtractor,
  DocumentProcessor,
  config,
  createDefaultRegistry,
  loadClassifierKeywords,
  loadPromptTemplates,
  logger,
} from '@docintake/shared';
import { createApp } from './app';
import { createPool, PgDocumentRepository } from './lib/db';
import { DocumentService } from './lib/documents';
import { FileSystemObjectStore } from './lib/object-store';
import { QueueWebhookDispatcher } from './lib/webhooks';
import { WorkflowService } from './lib/workflows';

function main(): void {
  const templates = loadPromptTemplates(config.promptsPath, config.backendOrder);
  const keywords = loadClassifierKeywords(config.classifierKeywordsPath);
  const backends = createDefaultRegistry(config).resolve(config.backendOrder);

  const processor = new DocumentProcessor({
    backends,
    templates,
    keywords,
    thresholds: config.confidence,
    classificationMinConfidence: config.classificationMinConfidence,
  });

  const pool = createPool(config.databaseUrl);
  const repository = new PgDocumentRepository(pool);
  const dispatcher = new QueueWebhookDispatcher();

  const documents = new DocumentService({
    processor,
    textExtractor: new DefaultTextExtractor({
      ocr: { language: config.ocrLanguage, langPath: config.ocrLangPath || undefined },
    }),
    objectStore: new FileSystemObjectStore(config.objectStorePath),
    repository,
    settings: {
      maxFileSizeBytes: config.maxFileSizeBytes,
      maxBatchFiles: config.maxBatchFiles,
      batchConcurrency: config.batchConcurrency,
      publicBaseUrl: config.publicBaseUrl,
    },
  });
  const workflows = new WorkflowService({ documents, repository, dispatcher });

  const app = createApp({
    documents,
    workflows,
    repository,
    dispatcher,
    allowedOrigins: config.allowedOrigins,
    title: config.appTitle,
    backendOrder: config.backendOrder,
    modelName: () => processor.primaryModelName,
  });

  const server = app.listen(config.port, () => {
    logger.info('Web API started', {
      port: config.port,
      backends: config.backendOrder,
      model: processor.primaryModelName,
    });
  });

  // Graceful shutdown
  async function shutdown(signal: string): Promise<void> {
    logger.info('Shutting down', { signal });

    server.close();
    await dispatcher.close();
    await pool.end();

    logger.info('Shutdown complete');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });
}

try {
  main();
} catch (error) {
  logger.error('Web API failed to start', error);
  process.exit(1);
}

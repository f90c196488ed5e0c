import type { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import * as express from 'express';
import type { ResolvedDwfMockConfig } from './dwf-mock.config';

/**
 * Apply the HTTP-level setup the module relies on. Call on an application
 * created with `bodyParser: false`, before `init()` or `listen()`.
 *
 * Every body is read as raw bytes regardless of content type, so the
 * webhooks decide for themselves what counts as malformed JSON.
 */
export function configureDwfMockApp(
  app: INestApplication,
  config: ResolvedDwfMockConfig,
): void {
  app.use(express.raw({ type: () => true, limit: config.api.bodyLimit }));

  if (config.api.enableSwagger) {
    const document = SwaggerModule.createDocument(
      app,
      new DocumentBuilder()
        .setTitle('DWF Webhook Mock')
        .setDescription(
          'Stand-in for the frappe_dwf IAN, MPPS and UPS webhooks. Stores every accepted payload for inspection.',
        )
        .setVersion('0.1.0')
        .addTag('Ingest', 'Receive IAN, MPPS and UPS payloads')
        .addTag('Records', 'Inspect stored payloads')
        .addTag('Health', 'Liveness and readiness')
        .build(),
    );
    SwaggerModule.setup(config.api.docsPath, app, document);
  }
}

import { Hono, Context } from 'hono';
import { logger } from 'hono/logger';
import {
  HealthResponse,
  WriteRequestSchema,
  WriteResponse,
  WriteSummary,
  formatDuration,
  formatError,
  formatIssues
} from '@bucketfan/shared';
import { WriteCoordinator } from '../jobs/WriteCoordinator';

export interface APIServerOptions {
  coordinator: WriteCoordinator;
  requestLogging?: boolean;
}

export function toWriteResponse(summary: WriteSummary): WriteResponse {
  const response: WriteResponse = {
    objects_written: summary.objectsWritten,
    time_taken: formatDuration(summary.elapsedNs)
  };
  if (summary.errors.length > 0) {
    response.errors = summary.errors;
  }
  return response;
}

export function createAPIServer({ coordinator, requestLogging = true }: APIServerOptions) {
  const app = new Hono();

  if (requestLogging) {
    app.use('*', logger());
  }

  app.get('/health', (c: Context) => {
    const health: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      bucket: coordinator.getBucketName()
    };
    return c.json(health);
  });

  // Every rejection below happens before any key, content or storage call
  app.all('/', async (c: Context) => {
    if (c.req.method !== 'POST') {
      return c.text('Only POST requests are accepted', 405);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      return c.text(`Invalid JSON payload: ${formatError(error)}`, 400);
    }

    const parsed = WriteRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.text(`Invalid JSON payload: ${formatIssues(parsed.error)}`, 400);
    }

    if (parsed.data.number <= 0) {
      return c.text("The 'number' value must be a positive integer", 400);
    }

    const summary = await coordinator.run(parsed.data.number);
    return c.json(toWriteResponse(summary), summary.errors.length > 0 ? 500 : 200);
  });

  app.notFound((c) => {
    return c.text('Not Found', 404);
  });

  app.onError((err, c) => {
    console.error('Request failed:', err);
    return c.text('Internal Server Error', 500);
  });

  return app;
}

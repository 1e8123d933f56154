import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import type {
  ApiError,
  CollectionLogEntry,
  Entity,
  HealthResponse,
  PaginatedResponse,
} from '@mrm/shared';
import { config, loadEngineConfig, type EngineConfig } from '../lib/config.js';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { AppError, NotFoundError, ValidationError } from '../lib/errors.js';
import { decodeCursor, encodeCursor } from '../lib/dynamodb.js';
import { DynamoRecordStore } from '../lib/dynamoStore.js';
import { MemoryRecordStore, type RecordStore } from '../lib/store.js';

// Services
import { ReconciliationEngine } from '../lib/services/reconciliation.js';
import { ResearchScheduler } from '../lib/services/scheduler.js';
import * as taskService from '../lib/services/tasks.js';
import { summarizeProfiles } from '../lib/services/stats.js';

// Validation schemas
import {
  entityQuerySchema,
  logQuerySchema,
  observationBatchSchema,
  researchQueueSchema,
  researchScanSchema,
  taskQuerySchema,
  taskTransitionSchema,
  type EntityQuery,
} from '../lib/validation.js';

// Route handler type
type RouteHandler = (
  event: APIGatewayProxyEventV2,
  context: HandlerContext
) => Promise<APIGatewayProxyStructuredResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
  params: Record<string, string>;
}

interface Services {
  store: RecordStore;
  engine: ReconciliationEngine;
  scheduler: ResearchScheduler;
  indexLoad?: Promise<number>;
}

let services: Services | undefined;

function buildServices(store: RecordStore, engineConfig: EngineConfig): Services {
  return {
    store,
    engine: new ReconciliationEngine({ store, config: engineConfig }),
    scheduler: new ResearchScheduler({ store, config: engineConfig }),
  };
}

function getServices(): Services {
  if (!services) {
    const store = config.store === 'memory' ? new MemoryRecordStore() : new DynamoRecordStore();
    services = buildServices(store, loadEngineConfig());
  }
  return services;
}

// Replace the service graph (tests, local runs)
export function useStore(store: RecordStore, engineConfig: EngineConfig = loadEngineConfig()): void {
  services = buildServices(store, engineConfig);
}

// The entity index is loaded once per container; a failed load is retried on the next request
async function loadedEngine(current: Services): Promise<ReconciliationEngine> {
  if (!current.indexLoad) {
    current.indexLoad = current.engine.load().catch((error: unknown) => {
      current.indexLoad = undefined;
      throw error;
    });
  }
  await current.indexLoad;
  return current.engine;
}

// Parse query parameters
function getQueryParams(event: APIGatewayProxyEventV2): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Parse JSON body
function parseBody(event: APIGatewayProxyEventV2, required = true): unknown {
  if (!event.body) {
    if (required) throw new ValidationError('Request body is required');
    return {};
  }
  try {
    return JSON.parse(
      event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body
    );
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyStructuredResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

// Offset pagination over an already filtered and sorted list
function paginate<T>(items: T[], limit: number, cursor?: string): PaginatedResponse<T> {
  const position = cursor ? decodeCursor(cursor) : undefined;
  if (cursor && !position) {
    throw new ValidationError('Invalid cursor');
  }
  const offset = typeof position?.offset === 'number' ? position.offset : 0;
  const page = items.slice(offset, offset + limit);
  const hasMore = offset + limit < items.length;
  return {
    items: page,
    hasMore,
    ...(hasMore && { cursor: encodeCursor({ offset: offset + limit }) }),
  };
}

function entityName(entity: Entity): string {
  const name = entity.attributes.name?.value;
  return typeof name === 'string' ? name : '';
}

// Bank-only filters leave persons out whenever one of them is given
function matchesEntityQuery(entity: Entity, query: EntityQuery): boolean {
  const needle = query.query?.toLowerCase();
  if (query.kind !== undefined && entity.kind !== query.kind) return false;
  if (
    needle !== undefined &&
    !entityName(entity).toLowerCase().includes(needle) &&
    !entity.identityKey.toLowerCase().includes(needle)
  ) {
    return false;
  }
  if (query.minCompleteness !== undefined && entity.completenessScore < query.minCompleteness) {
    return false;
  }
  if (query.state === undefined && query.sizeCategory === undefined && query.hasMrmData === undefined) {
    return true;
  }
  if (entity.kind !== 'bank') return false;

  const state = entity.attributes.headquartersState?.value;
  return (
    (query.state === undefined ||
      (typeof state === 'string' && state.toLowerCase() === query.state.toLowerCase())) &&
    (query.sizeCategory === undefined || entity.sizeCategory === query.sizeCategory) &&
    (query.hasMrmData === undefined || entity.departments.length > 0 === query.hasMrmData)
  );
}

// Route definitions
const routes: Record<string, { handler: RouteHandler }> = {
  'GET /health': {
    handler: async () => {
      const response: HealthResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        version: config.version,
      };
      return jsonResponse(200, response);
    },
  },

  // Entities
  'GET /entities': {
    handler: async (event) => {
      const query = entityQuerySchema.parse(getQueryParams(event));
      const entities = await getServices().store.queryEntities((entity) =>
        matchesEntityQuery(entity, query)
      );
      entities.sort((a, b) => a.identityKey.localeCompare(b.identityKey));
      return jsonResponse(200, paginate(entities, query.limit, query.cursor));
    },
  },
  'GET /entities/{entityKey}': {
    handler: async (_event, ctx) => {
      const entityKey = decodeURIComponent(ctx.params.entityKey ?? '');
      const entity = await getServices().store.getEntity(entityKey);
      if (!entity) {
        throw new NotFoundError('Entity', entityKey);
      }
      return jsonResponse(200, entity);
    },
  },

  // Observation intake
  'POST /observations': {
    handler: async (event, ctx) => {
      const { observations } = observationBatchSchema.parse(parseBody(event));
      const engine = await loadedEngine(getServices());
      const summary = await engine.reconcileMany(observations, { batchId: ctx.requestId });
      ctx.logger.info(
        {
          total: summary.total,
          created: summary.created,
          updated: summary.updated,
          failed: summary.failed,
        },
        'Observations reconciled'
      );
      return jsonResponse(200, summary);
    },
  },

  // Research tasks
  'GET /tasks': {
    handler: async (event) => {
      const query = taskQuerySchema.parse(getQueryParams(event));
      const tasks = await taskService.listTasks(getServices().store, query.status);
      return jsonResponse(200, paginate(tasks, query.limit, query.cursor));
    },
  },
  'POST /tasks/{taskId}/transition': {
    handler: async (event, ctx) => {
      const taskId = ctx.params.taskId ?? '';
      const input = taskTransitionSchema.parse(parseBody(event));
      const task = await taskService.transitionTask(getServices().store, taskId, input);
      return jsonResponse(200, task);
    },
  },
  'POST /research/scan': {
    handler: async (event, ctx) => {
      const input = researchScanSchema.parse(parseBody(event, false));
      const { store, scheduler } = getServices();
      const entities = await store.queryEntities((entity) => entity.kind === input.kind);
      const tasks = await scheduler.scan(entities);
      ctx.logger.info({ scanned: entities.length, created: tasks.length }, 'Research scan finished');
      return jsonResponse(200, { scanned: entities.length, tasksCreated: tasks.length, tasks });
    },
  },
  'GET /research/queue': {
    handler: async (event) => {
      const query = researchQueueSchema.parse(getQueryParams(event));
      const { store, scheduler } = getServices();
      const banks = await store.queryEntities((entity) => entity.kind === 'bank');
      return jsonResponse(200, { items: scheduler.selectForResearch(banks, query.limit) });
    },
  },

  // Collection log
  'GET /logs': {
    handler: async (event) => {
      const query = logQuerySchema.parse(getQueryParams(event));
      const entries = await getServices().store.queryLogs(
        (entry: CollectionLogEntry) =>
          (query.entityKey === undefined || entry.entityKey === query.entityKey) &&
          (query.status === undefined || entry.status === query.status)
      );
      // Newest first
      entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
      return jsonResponse(200, paginate(entries, query.limit, query.cursor));
    },
  },

  'GET /stats': {
    handler: async () => {
      const stats = await summarizeProfiles(getServices().store);
      return jsonResponse(200, stats);
    },
  },
};

// Match route to handler
function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  // Direct match
  const direct = routes[`${method} ${path}`];
  if (direct) {
    return { handler: direct.handler, params: {} };
  }

  // Pattern matching with path parameters
  const pathParts = path.split('/');
  for (const [pattern, route] of Object.entries(routes)) {
    const [patternMethod, patternPath = ''] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    const matches = patternParts.every((part, i) => {
      const actual = pathParts[i] ?? '';
      if (part.startsWith('{') && part.endsWith('}')) {
        params[part.slice(1, -1)] = actual;
        return actual !== '';
      }
      return part === actual;
    });

    if (matches) {
      return { handler: route.handler, params };
    }
  }

  return null;
}

// Main handler
export async function handler(
  event: APIGatewayProxyEventV2,
  _context: Context
): Promise<APIGatewayProxyStructuredResultV2> {
  const requestId = event.requestContext.requestId;
  const logger = createRunLogger(requestId);
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  logger.info({ method, path }, 'Request received');

  try {
    // Match route
    const match = matchRoute(method, path);

    if (!match) {
      return jsonResponse(404, {
        error: {
          code: 'NOT_FOUND',
          message: `Route not found: ${method} ${path}`,
          requestId,
        },
      });
    }

    const response = await match.handler(event, { requestId, logger, params: match.params });
    logger.info({ statusCode: response.statusCode }, 'Request completed');

    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, 'Validation error');
      const body: ApiError = {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          requestId,
          details: { issues: error.issues },
        },
      };
      return jsonResponse(400, body);
    }

    // Unknown errors
    logger.error({ error }, 'Unexpected error');
    return jsonResponse(500, {
      error: {
        code: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION ROUTES — Sessions, Engine Runs, Export and Snapshots
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /sessions?fileName=…          Upload a CSV/XLSX body, create a session
//   GET    /sessions                     List sessions
//   POST   /sessions/restore             Restore the saved work in progress
//   GET    /sessions/:id                 Session status
//   DELETE /sessions/:id                 Drop a session
//   GET    /sessions/:id/records         Mapped records (paged)
//   GET    /sessions/:id/progress        Active run and batch progress
//   PATCH  /sessions/:id/settings        Unit system, mappings, import template
//   POST   /sessions/:id/runs/:task      Run an engine (ai | local)
//   GET    /sessions/:id/export          Download the takeoff import file
//   POST   /sessions/:id/snapshot        Save the session as work in progress
//
// ═══════════════════════════════════════════════════════════════════════════════

import express, { Router, type Request, type Response } from 'express';
import { describeSession, type ConversionService } from '../../conversion/service.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler, NotFoundError, ValidationError } from '../middleware/error-handler.js';
import {
  ExportQuerySchema,
  IdParamSchema,
  RecordsQuerySchema,
  RunTaskSchema,
  TaskParamSchema,
  UpdateSettingsSchema,
  UploadQuerySchema,
  parseInput,
} from '../schemas/index.js';

const logger = getLogger({ component: 'conversion-routes' });

export interface ConversionRouterOptions {
  service: ConversionService;
  maxUploadBytes: number;
}

function sessionLinks(id: string): Record<string, string> {
  return {
    self: `/api/v1/sessions/${id}`,
    records: `/api/v1/sessions/${id}/records`,
    export: `/api/v1/sessions/${id}/export`,
  };
}

export function createConversionRouter(options: ConversionRouterOptions): Router {
  const { service } = options;
  const router = Router();

  // ═══════════════════════════════════════════════════════════════════════════════
  // UPLOAD
  // POST /sessions
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/',
    express.raw({ type: () => true, limit: options.maxUploadBytes }),
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseInput(UploadQuerySchema, req.query);
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        throw new ValidationError('Request body must contain the file bytes');
      }

      const session = await service.createSession(req.body, query.fileName, {
        unitSystem: query.unitSystem,
        importTemplateId: query.importTemplateId,
      });

      logger.info('Upload accepted', { sessionId: session.id, bytes: req.body.length, requestId: req.requestId });
      res.status(201).json({ session: describeSession(session), _links: sessionLinks(session.id) });
    })
  );

  router.get('/', (_req: Request, res: Response) => {
    res.json({ sessions: service.listSessions().map(describeSession) });
  });

  router.post(
    '/restore',
    asyncHandler(async (_req: Request, res: Response) => {
      const session = await service.restoreSnapshot();
      res.status(201).json({ session: describeSession(session), _links: sessionLinks(session.id) });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // SESSION
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      res.json({ session: describeSession(service.getSession(id)), _links: sessionLinks(id) });
    })
  );

  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      if (!service.deleteSession(id)) {
        throw new NotFoundError('Session', id);
      }
      res.status(204).end();
    })
  );

  router.get(
    '/:id/records',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      const { offset, limit } = parseInput(RecordsQuerySchema, req.query);
      const records = service.getSession(id).getRecords();

      res.json({
        records: records.slice(offset, offset + limit),
        total: records.length,
        offset,
        limit,
      });
    })
  );

  router.get(
    '/:id/progress',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      const session = service.getSession(id);
      res.json({ activeRun: session.activeRun, progress: session.progress });
    })
  );

  router.patch(
    '/:id/settings',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      const input = parseInput(UpdateSettingsSchema, req.body);
      const session = await service.updateSettings(id, input);
      res.json({ session: describeSession(session) });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // RUN ENGINE
  // POST /sessions/:id/runs/:task
  // ═══════════════════════════════════════════════════════════════════════════════

  router.post(
    '/:id/runs/:task',
    asyncHandler(async (req: Request, res: Response) => {
      const { id, task } = parseInput(TaskParamSchema, req.params);
      const input = parseInput(RunTaskSchema, req.body ?? {});

      logger.info('Engine run requested', { sessionId: id, task, mode: input.mode, requestId: req.requestId });
      const summary = await service.runTask(id, task, input);

      res.json({
        run: {
          task: summary.task,
          mode: summary.mode,
          chunks: summary.chunks,
          batchSize: summary.batchSize,
          durationMs: summary.durationMs,
          repairedCount: summary.repairedCount,
          historyUpdated: summary.historyUpdated,
        },
        values: summary.values,
      });
    })
  );

  // ═══════════════════════════════════════════════════════════════════════════════
  // EXPORT & SNAPSHOT
  // ═══════════════════════════════════════════════════════════════════════════════

  router.get(
    '/:id/export',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      const { format } = parseInput(ExportQuerySchema, req.query);
      const file = service.exportSession(id, format);

      res.attachment(file.filename);
      res.setHeader('Content-Type', file.mimeType);
      res.send(file.content);
    })
  );

  router.post(
    '/:id/snapshot',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      await service.saveSnapshot(id);
      res.status(204).end();
    })
  );

  return router;
}

import * as fs from 'fs';
import * as path from 'path';
import express, { Request, Response, Router, NextFunction, RequestHandler } from 'express';
import { isValidRunId, runPaths } from '../config/paths';
import { readJson } from '../core/artifact_writer';
import { Logger, defaultLogger } from '../core/logger';
import { isGateReport, listRunRecords, readRunRecord } from '../core/run_record';
import { GateName, RunRecord } from '../types';

export interface ApiOptions {
  artifactsDir: string;
  logger?: Logger;
}

const GATES: GateName[] = ['quality', 'monetization'];

function isGateName(value: string): value is GateName {
  return GATES.some((gate) => gate === value);
}

function summarize(record: RunRecord) {
  return {
    run_id: record.run_id,
    mode: record.mode,
    status: record.status,
    started_at: record.started_at,
    ended_at: record.ended_at,
    quality: record.decision.quality,
    monetization: record.decision.monetization,
    deployed: record.decision.deployed,
  };
}

/**
 * Create the read-only pipeline status router
 */
export function createApiRouter(options: ApiOptions): Router {
  const router = Router();
  const artifactsDir = path.resolve(options.artifactsDir);
  const logger = options.logger ?? defaultLogger;

  /**
   * GET /pipeline/status
   * Latest run and the last run that reached production
   */
  const statusHandler: RequestHandler = (_req: Request, res: Response, next: NextFunction): void => {
    try {
      const runs = listRunRecords(artifactsDir, logger);
      const lastDeployed = runs.find((r) => r.decision.deployed);
      res.json({
        latest: runs.length > 0 ? runs[0] : null,
        lastDeployed: lastDeployed ? summarize(lastDeployed) : null,
        runs: runs.length,
      });
    } catch (error) {
      next(error);
    }
  };
  router.get('/status', statusHandler);

  /**
   * GET /pipeline/runs
   * All runs, newest first
   */
  const runsHandler: RequestHandler = (_req: Request, res: Response, next: NextFunction): void => {
    try {
      const runs = listRunRecords(artifactsDir, logger).map(summarize);
      res.json({ runs, count: runs.length });
    } catch (error) {
      next(error);
    }
  };
  router.get('/runs', runsHandler);

  /**
   * GET /pipeline/runs/:runId
   * Full run record
   */
  const runHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    const { runId } = req.params;
    if (!isValidRunId(runId)) {
      res.status(400).json({ error: 'Invalid run id', message: `'${runId}' is not a valid run id` });
      return;
    }
    try {
      const record = readRunRecord(runPaths(artifactsDir, runId).meta);
      if (!record) {
        res.status(404).json({ error: 'Not found', message: `No run with id ${runId}` });
        return;
      }
      res.json(record);
    } catch (error) {
      next(error);
    }
  };
  router.get('/runs/:runId', runHandler);

  /**
   * GET /pipeline/runs/:runId/reports/:gate
   * Gate report of one run
   */
  const reportHandler: RequestHandler = (req: Request, res: Response, next: NextFunction): void => {
    const { runId, gate } = req.params;
    if (!isValidRunId(runId)) {
      res.status(400).json({ error: 'Invalid run id', message: `'${runId}' is not a valid run id` });
      return;
    }
    if (!isGateName(gate)) {
      res.status(400).json({ error: 'Invalid gate', message: `Gate must be one of: ${GATES.join(', ')}` });
      return;
    }
    try {
      const paths = runPaths(artifactsDir, runId);
      const reportPath = gate === 'quality' ? paths.qualityReport : paths.monetizationReport;
      if (!fs.existsSync(reportPath)) {
        res.status(404).json({ error: 'Not found', message: `Run ${runId} has no ${gate} report` });
        return;
      }
      const report = readJson(reportPath);
      if (!isGateReport(report)) {
        throw new Error(`Malformed ${gate} report for run ${runId}`);
      }
      res.json(report);
    } catch (error) {
      next(error);
    }
  };
  router.get('/runs/:runId/reports/:gate', reportHandler);

  return router;
}

/**
 * Create a full Express application with the status API
 */
export function createApp(options: ApiOptions): express.Application {
  const app = express();
  const logger = options.logger ?? defaultLogger;

  app.use('/pipeline', createApiRouter(options));

  // Health check endpoint
  const healthHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({ status: 'ok', service: 'policy-pipeline' });
  };
  app.get('/health', healthHandler);

  // Root endpoint with info
  const rootHandler: RequestHandler = (_req: Request, res: Response): void => {
    res.json({
      name: 'policy-pipeline',
      version: '1.0.0',
      description: 'Policy pages pipeline status',
      endpoints: {
        status: 'GET /pipeline/status',
        runs: 'GET /pipeline/runs',
        run: 'GET /pipeline/runs/:runId',
        report: 'GET /pipeline/runs/:runId/reports/:gate',
      },
    });
  };
  app.get('/', rootHandler);

  // Error handling middleware
  const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logger.error(`[api] Error: ${err.message}`);
    // In production, don't expose internal error details
    const isDevelopment = process.env.NODE_ENV !== 'production';
    res.status(500).json({
      error: 'Internal server error',
      message: isDevelopment ? err.message : 'An unexpected error occurred',
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the status server
 */
export function startServer(
  options: ApiOptions,
  port: number = 3000
): Promise<ReturnType<express.Application['listen']>> {
  const logger = options.logger ?? defaultLogger;
  return new Promise((resolve) => {
    const app = createApp(options);
    const server = app.listen(port, () => {
      logger.log(`[api] Server running at http://localhost:${port}`);
      logger.log(`[api] Status available at http://localhost:${port}/pipeline/status`);
      resolve(server);
    });
  });
}

import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { SafetyRejectionReason, SafetyViolation } from '@agri-telemetry/domain';
import type { TelemetryCore } from '../services/core/telemetry-core.js';

const connectBodySchema = z.object({
  type: z.enum(['SIMULATION', 'CAN_BUS', 'OBD_II']).default('SIMULATION'),
  name: z.string().max(120).optional(),
  port: z.string().max(120).optional(),
});

const commandBodySchema = z.object({
  name: z.string().trim().min(1).max(64),
  value: z.union([z.number(), z.string(), z.boolean()]).optional(),
});

const historyQuerySchema = z.object({
  count: z.coerce.number().int().min(1).max(10_000).default(100),
});

const safeModeBodySchema = z.object({
  enabled: z.boolean(),
});

const CONNECT_FAILURE_STATUS = {
  ALREADY_CONNECTED: 409,
  SESSION_FAULTED: 409,
  UNSUPPORTED_SOURCE: 400,
  COMMUNICATION_FAILED: 502,
} as const;

const VIOLATION_STATUS: Record<SafetyRejectionReason, number> = {
  NOT_CONNECTED: 409,
  EMERGENCY_ACTIVE: 423,
  UNSAFE_MODE: 403,
  OUT_OF_RANGE: 422,
  RATE_LIMITED: 429,
};

function sendViolation(res: Response, violation: SafetyViolation): Response {
  if (violation.retryAfterMs !== undefined) {
    res.setHeader('Retry-After', String(Math.ceil(violation.retryAfterMs / 1000)));
  }
  return res.status(VIOLATION_STATUS[violation.reason]).json({
    error: 'safety_violation',
    reason: violation.reason,
    message: violation.message,
    ...(violation.retryAfterMs !== undefined ? { retryAfterMs: violation.retryAfterMs } : {}),
  });
}

export function createTractorRouter(core: TelemetryCore): Router {
  const router = Router();

  /** GET /api/tractor/interfaces */
  router.get('/interfaces', (_req: Request, res: Response) => {
    res.json({ data: core.scanInterfaces() });
  });

  /** POST /api/tractor/connect */
  router.post('/connect', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = connectBodySchema.parse(req.body ?? {});
      const result = core.connect(body);
      if (!result.ok) {
        return res.status(CONNECT_FAILURE_STATUS[result.error.reason]).json({
          error: 'connection_error',
          reason: result.error.reason,
          message: result.error.message,
        });
      }
      return res.status(201).json({ status: core.state, tractorInfo: result.value });
    } catch (err) {
      return next(err);
    }
  });

  /** POST /api/tractor/disconnect */
  router.post('/disconnect', (_req: Request, res: Response) => {
    core.disconnect();
    res.json({ status: core.state });
  });

  /** GET /api/tractor/status */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(core.connectionInfo());
  });

  /** GET /api/tractor/snapshot */
  router.get('/snapshot', (_req: Request, res: Response) => {
    res.json({ status: core.state, data: core.snapshot() });
  });

  /** GET /api/tractor/parameters */
  router.get('/parameters', (_req: Request, res: Response) => {
    res.json({ data: core.parameters() });
  });

  /** GET /api/tractor/history/:channel */
  router.get('/history/:channel', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = historyQuerySchema.parse(req.query);
      const channel = req.params['channel'] ?? '';
      const data = core.history(channel, query.count);
      return res.json({ channel, data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** POST /api/tractor/commands */
  router.post('/commands', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = commandBodySchema.parse(req.body);
      const result = core.sendCommand(body);
      if (!result.ok) return sendViolation(res, result.error);
      return res.status(202).json({ status: core.state, receipt: result.value });
    } catch (err) {
      return next(err);
    }
  });

  /** POST /api/tractor/emergency-stop */
  router.post('/emergency-stop', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = core.sendCommand({ name: 'emergency_stop' });
      if (!result.ok) return sendViolation(res, result.error);
      return res.status(202).json({ status: core.state, emergencyStopActive: true });
    } catch (err) {
      return next(err);
    }
  });

  /** POST /api/tractor/emergency-stop/clear */
  router.post('/emergency-stop/clear', (_req: Request, res: Response) => {
    const cleared = core.clearEmergencyStop();
    res.json({ status: core.state, cleared });
  });

  /** PUT /api/tractor/safe-mode */
  router.put('/safe-mode', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = safeModeBodySchema.parse(req.body);
      core.setSafeMode(body.enabled);
      return res.json({ safeMode: core.connectionInfo().safeMode });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}

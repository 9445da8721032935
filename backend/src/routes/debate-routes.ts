/**
 * Debate Routes
 * Express routes for creating and driving debates
 */

import express, { type Request, type Response, type Router } from 'express';
import { z } from 'zod';
import type { DebateState } from '../types/debate.js';
import { isDebateError, type DebateErrorCode } from '../types/errors.js';
import {
  DebateBusyError,
  DebateNotFoundError,
  debateRegistry,
  type DebateRegistry,
  type RoundScheduler,
} from '../services/debate/index.js';
import { createLogger } from '../services/logging/index.js';

const logger = createLogger({ module: 'DebateRoutes' });

const CreateDebateSchema = z.object({
  topic: z.string({ required_error: 'topic is required' }),
  maxRounds: z.number().int().min(1).max(50).optional(),
});

const STATUS_BY_CODE: Record<DebateErrorCode, number> = {
  invalid_topic: 400,
  generation: 502,
  unavailable: 503,
  timeout: 504,
};

/**
 * Read copy of a debate for clients; persona prompts stay server-side
 */
export function toDebateView(state: DebateState) {
  return {
    debateId: state.id,
    topic: state.topic,
    stance: state.stance,
    history: state.history,
    currentSide: state.currentSide,
    roundCount: state.roundCount,
    maxRounds: state.maxRounds,
    active: state.active,
    phase: state.phase,
    finalSummary: state.finalSummary,
  };
}

export function statusForCode(code: string): number {
  switch (code) {
    case 'invalid_topic':
    case 'generation':
    case 'unavailable':
    case 'timeout':
      return STATUS_BY_CODE[code];
    default:
      return 500;
  }
}

/**
 * Send the error response for anything a handler threw
 */
function sendError(res: Response, error: unknown, context: Record<string, unknown>): void {
  if (error instanceof DebateNotFoundError) {
    res.status(404).json({ success: false, error: error.message, code: 'DEBATE_NOT_FOUND' });
    return;
  }

  if (error instanceof DebateBusyError) {
    res.status(409).json({ success: false, error: error.message, code: 'DEBATE_BUSY' });
    return;
  }

  if (isDebateError(error)) {
    const status = statusForCode(error.code);
    logger.warn({ ...context, code: error.code, error: error.message }, 'Debate request failed');
    res.status(status).json({
      success: false,
      error: error.message,
      code: error.code.toUpperCase(),
      retryable: error.retryable,
    });
    return;
  }

  logger.error({ ...context, error }, 'Unexpected error in debate route');
  res.status(500).json({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

export interface DebateRouteDeps {
  scheduler: RoundScheduler;
  registry?: DebateRegistry;
}

export function createDebateRoutes(deps: DebateRouteDeps): Router {
  const router = express.Router();
  const scheduler = deps.scheduler;
  const registry = deps.registry ?? debateRegistry;

  /**
   * POST /debates
   * Screen the topic and open a debate
   */
  router.post('/debates', async (req: Request, res: Response) => {
    const parseResult = CreateDebateSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({
        success: false,
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: parseResult.error.errors,
      });
      return;
    }

    const { topic, maxRounds } = parseResult.data;

    try {
      const state = await scheduler.startDebate(topic, { maxRounds });
      registry.save(state);

      logger.info({ debateId: state.id, topic: state.topic }, 'Debate created');

      res.status(201).json({
        success: true,
        data: {
          debateId: state.id,
          topic: state.topic,
          stance: state.stance,
        },
      });
    } catch (error) {
      sendError(res, error, { topic });
    }
  });

  /**
   * GET /debates/:debateId
   * Current state of a debate
   */
  router.get('/debates/:debateId', (req: Request, res: Response) => {
    const { debateId } = req.params;
    const state = debateId ? registry.get(debateId) : undefined;

    if (!state) {
      res.status(404).json({ success: false, error: `Debate not found: ${debateId}`, code: 'DEBATE_NOT_FOUND' });
      return;
    }

    res.json({ success: true, data: toDebateView(state) });
  });

  /**
   * POST /debates/:debateId/rounds
   * Advance the debate by one round
   */
  router.post('/debates/:debateId/rounds', async (req: Request, res: Response) => {
    const debateId = req.params.debateId ?? '';

    try {
      const data = await registry.runExclusive(debateId, async (state) => {
        const outcome = await scheduler.advanceRound(state);
        return {
          state: outcome.state,
          value: { result: outcome.result, debate: toDebateView(outcome.state) },
        };
      });

      res.json({ success: true, data });
    } catch (error) {
      sendError(res, error, { debateId });
    }
  });

  /**
   * POST /debates/:debateId/finalize
   * End the debate and return the closing summary
   */
  router.post('/debates/:debateId/finalize', async (req: Request, res: Response) => {
    const debateId = req.params.debateId ?? '';

    try {
      const outcome = await registry.runExclusive(debateId, async (state) => {
        const result = await scheduler.finalize(state);
        return { state: result.state, value: result };
      });

      if (outcome.status === 'error') {
        res.status(statusForCode(outcome.error.code)).json({
          success: false,
          error: outcome.error.message,
          code: outcome.error.code.toUpperCase(),
          retryable: true,
        });
        return;
      }

      res.json({
        success: true,
        data: { finalSummary: outcome.finalSummary, debate: toDebateView(outcome.state) },
      });
    } catch (error) {
      sendError(res, error, { debateId });
    }
  });

  /**
   * DELETE /debates/:debateId
   * Drop a debate from memory
   */
  router.delete('/debates/:debateId', (req: Request, res: Response) => {
    const debateId = req.params.debateId ?? '';

    try {
      const state = registry.delete(debateId);
      res.json({ success: true, data: { debateId, finalized: state.finalSummary !== null } });
    } catch (error) {
      sendError(res, error, { debateId });
    }
  });

  return router;
}

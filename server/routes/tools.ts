/**
 * Tool Routes
 *
 * GET  /api/tools                   tool definitions for the agent
 * POST /api/tools/:toolName/run     run one tool with a JSON body of parameters
 */

import { Router } from 'express';
import {
  AuthExpiredError,
  NotFoundError,
  RemoteError,
  SalesforceError,
} from '../connectors/salesforce/errors.js';
import {
  CRM_TOOLS,
  executeCrmTool,
  isRecord,
  ToolInputError,
  type ToolContext,
  type ToolParams,
} from '../tools/index.js';

export function errorStatus(error: unknown): number {
  if (error instanceof ToolInputError) return 400;
  if (error instanceof AuthExpiredError) return 401;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof RemoteError) return 502;
  return 500;
}

function errorCode(error: unknown): string {
  if (error instanceof RemoteError && error.errorCode) return error.errorCode;
  if (error instanceof SalesforceError || error instanceof ToolInputError) return error.name;
  return 'INTERNAL_ERROR';
}

export function createToolsRouter(context: ToolContext): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ tools: CRM_TOOLS });
  });

  // ─── POST /:toolName/run ────────────────────────────────────────────────────

  router.post('/:toolName/run', async (req, res) => {
    const { toolName } = req.params;
    const params: ToolParams = isRecord(req.body) ? req.body : {};

    const start = Date.now();
    try {
      const result = await executeCrmTool(context, toolName, params);
      return res.json({
        tool_name: toolName,
        duration_ms: Date.now() - start,
        result,
      });
    } catch (err) {
      return res.status(errorStatus(err)).json({
        tool_name: toolName,
        error: err instanceof Error ? err.message : String(err),
        error_code: errorCode(err),
        duration_ms: Date.now() - start,
      });
    }
  });

  return router;
}

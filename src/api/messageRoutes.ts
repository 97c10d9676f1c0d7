import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { MessageParser, ParseOutcome } from '../parser/MessageParser.js';
import { mapErrorToResponse, mapParsedJobToResponse } from './jobMapper.js';
import { parseMessageSchema } from './schemas.js';

function mapOutcome(outcome: ParseOutcome) {
  if (!outcome.ok) {
    return { ok: false, format: outcome.format, ...mapErrorToResponse(outcome.error) };
  }
  return {
    ok: true,
    format: outcome.format,
    job: mapParsedJobToResponse(outcome.job),
    missingFields: outcome.missingFields,
  };
}

/**
 * Message parsing. Nothing is stored here; the client reviews the parsed
 * job and posts it back to /api/jobs/confirm.
 */
export function createMessageRouter(parser: MessageParser): Router {
  const router = Router();

  /**
   * POST /api/messages/parse
   * Body: { text, batch? }
   */
  router.post('/parse', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { text, batch } = parseMessageSchema.parse(req.body);

      if (batch) {
        const blocks = parser.parseBatch(text);
        res.json({
          jobs: blocks.map(({ block, outcome }) => ({ block, ...mapOutcome(outcome) })),
        });
        return;
      }

      const outcome = parser.parse(text);
      if (!outcome.ok) {
        throw outcome.error;
      }
      res.json(mapOutcome(outcome));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

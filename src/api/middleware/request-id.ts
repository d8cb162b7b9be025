// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST ID — Correlation Id per Request
// ═══════════════════════════════════════════════════════════════════════════════

import type { RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'X-Request-Id';

const INCOMING_ID = /^[A-Za-z0-9_-]{1,64}$/;

/**
 * Reuse a well-formed incoming id, otherwise assign one; echo it on the response.
 */
export const requestId: RequestHandler = (req, res, next) => {
  const incoming = req.get(REQUEST_ID_HEADER);
  req.requestId = incoming && INCOMING_ID.test(incoming) ? incoming : `req_${uuidv4()}`;
  res.setHeader(REQUEST_ID_HEADER, req.requestId);
  next();
};

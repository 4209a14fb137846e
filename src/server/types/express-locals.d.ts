/**
 * express-locals.d.ts — Typed res.locals.
 *
 * See: src/server/envelope.ts (envelopeMiddleware sets _requestId, _startTime)
 */

declare global {
  namespace Express {
    interface Locals {
      // ── Envelope middleware (always set) ──
      _requestId: string;
      _startTime: number;
    }
  }
}

export {};  // Ensure this is treated as a module

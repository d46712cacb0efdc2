/**
 * Health module — Model (DTO schemas)
 */

import { t } from 'elysia';

export namespace HealthModel {
  export const response = t.Object({
    status: t.Literal('ok'),
    service: t.String(),
    uptime_seconds: t.Number(),
    sessions: t.Number(),
    stale: t.Object({
      stream: t.Boolean(),
      vector: t.Boolean(),
      vectors: t.Boolean(),
    }),
    ts: t.Number(),
  });
  export type response = typeof response.static;
}

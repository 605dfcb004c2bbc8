import { ok, type HandlerResult } from '../utils/handler-result';

export type CheckResponse = Record<string, never>;

export class HealthController {
  check(): HandlerResult<CheckResponse> {
    return ok({});
  }
}

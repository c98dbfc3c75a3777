import { HttpException } from '@nestjs/common';

export type JsonFailure = { success: false; error: string };

export type JsonResult<T extends object> = ({ success: true } & T) | JsonFailure;

/**
 * Folds an expected (HTTP-mapped) failure into the `{ success: false }`
 * envelope used by the booking JSON endpoints. Anything else is an
 * infrastructure fault and is re-thrown to Nest's exception layer.
 */
export function toJsonFailure(e: unknown): JsonFailure {
  if (e instanceof HttpException) {
    return { success: false, error: e.message };
  }
  throw e;
}

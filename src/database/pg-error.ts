import { QueryFailedError } from 'typeorm';

export const PG_UNIQUE_VIOLATION = '23505';

function readStringProp(source: unknown, key: string): string | null {
  if (typeof source !== 'object' || source === null) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : null;
}

// pg puts code/constraint on the driver error; TypeORM copies them onto QueryFailedError
function driverErrorOf(e: unknown): unknown {
  return e instanceof QueryFailedError ? e.driverError : e;
}

export function getPgErrorCode(e: unknown): string | null {
  return readStringProp(driverErrorOf(e), 'code') ?? readStringProp(e, 'code');
}

export function getPgConstraint(e: unknown): string | null {
  return (
    readStringProp(driverErrorOf(e), 'constraint') ??
    readStringProp(e, 'constraint')
  );
}

export function isUniqueViolation(e: unknown, constraint?: string): boolean {
  if (getPgErrorCode(e) !== PG_UNIQUE_VIOLATION) return false;
  if (!constraint) return true;
  return getPgConstraint(e) === constraint;
}

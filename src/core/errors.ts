import type { Failure, FailureCode, GraphIssue, Result } from './types.js';

type Extra = {
  hint?: string;
};

export function failure(code: FailureCode, message: string, extra: Extra = {}): Failure {
  return { code, message, ...extra };
}

export function notFound(id: number, role = 'Node', extra: Extra = {}): Failure {
  return failure('NOT_FOUND', `${role} ${id} not found`, extra);
}

export function invalidOperation(message: string, extra: Extra = {}): Failure {
  return failure('INVALID_OPERATION', message, extra);
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(f: Failure): Result<T> {
  return { ok: false, ...f };
}

export function issueAt(path: string | undefined, message: string, code: FailureCode = 'INVALID_INPUT'): GraphIssue {
  return { message, severity: 'error', code, ...(path ? { path } : {}) };
}

export function warningAt(path: string | undefined, message: string, code: FailureCode = 'INVALID_INPUT'): GraphIssue {
  return { message, severity: 'warning', code, ...(path ? { path } : {}) };
}

export function unreachable(startId: number, targetId: number): Failure {
  return failure('UNREACHABLE', `No path found between ${startId} and ${targetId}`, {
    hint: 'The two nodes lie in different connected components.',
  });
}

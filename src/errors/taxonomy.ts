import { EntityType, VersionRef } from '../types.js';

export enum ErrorCode {
  InvalidPayload = 'invalid_payload',
  MissingUserId = 'missing_user_id',
  NotFound = 'not_found',
  DuplicateRecord = 'duplicate_record',
  DataInsufficient = 'data_insufficient',
  ConcurrentModification = 'concurrent_modification',
  InvalidTransition = 'invalid_transition',
  InternalError = 'internal_error',
}

export interface EntityContext {
  type: EntityType;
  id: string;
  version?: number;
  timestamp?: string;
}

export type ErrorDetails = Record<string, unknown>;

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: ErrorDetails;
  };
}

export class DomainError extends Error {
  constructor(
    readonly code: ErrorCode,
    readonly statusCode: number,
    message: string,
    readonly details?: ErrorDetails,
  ) {
    super(message);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return false;
  }
}

const withEntity = (entity: EntityContext, details: ErrorDetails = {}): ErrorDetails => ({
  ...details,
  entity,
});

/** Market context lacks the history a backtest horizon needs. Retry once more data arrives. */
export class DataInsufficientError extends DomainError {
  constructor(message: string, entity: EntityContext, details: ErrorDetails = {}) {
    super(ErrorCode.DataInsufficient, 422, message, withEntity(entity, details));
  }

  override get retryable(): boolean {
    return true;
  }
}

/** A write targeted a stale version. The caller must re-read and retry. */
export class ConcurrentModificationError extends DomainError {
  constructor(entity: EntityContext, expectedVersion: number, actualVersion: number) {
    super(
      ErrorCode.ConcurrentModification,
      409,
      `Stale write on ${entity.type} '${entity.id}': expected head v${expectedVersion}, found v${actualVersion}.`,
      withEntity(entity, { expectedVersion, actualVersion }),
    );
  }

  override get retryable(): boolean {
    return true;
  }
}

export class InvalidTransitionError extends DomainError {
  constructor(message: string, entity: EntityContext, details: ErrorDetails = {}) {
    super(ErrorCode.InvalidTransition, 409, message, withEntity(entity, details));
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: EntityContext) {
    const label = entity.version !== undefined ? `${entity.id}@${entity.version}` : entity.id;
    super(ErrorCode.NotFound, 404, `${entity.type} '${label}' not found.`, withEntity(entity));
  }
}

export const entityOf = (type: EntityType, ref: VersionRef): EntityContext => ({
  type,
  id: ref.id,
  version: ref.version,
});

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: ErrorDetails,
): ErrorEnvelope => ({
  error: {
    code,
    message,
    ...(details ? { details } : {}),
  },
});

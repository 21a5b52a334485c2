export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    options: {
      statusCode?: number;
      code?: string;
      isOperational?: boolean;
      cause?: Error;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.statusCode = options.statusCode ?? 500;
    this.code = options.code ?? 'INTERNAL_ERROR';
    this.isOperational = options.isOperational ?? true;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
  }
}

/**
 * Invalid caller-supplied segmentation input: an unparseable reference date or
 * a recency window that is not a positive whole duration.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options: { cause?: Error } = {}) {
    super(message, {
      statusCode: 400,
      code: 'CONFIGURATION_ERROR',
      ...options,
    });
  }
}

export type IntegrityEntity = 'customer' | 'order' | 'order_item';

/**
 * Source records that contradict each other or the data model. Aborts the
 * whole segmentation run; `entity` and `entityId` name the offending record.
 */
export class DataIntegrityError extends AppError {
  public readonly entity: IntegrityEntity;
  public readonly entityId: string;

  constructor(
    message: string,
    options: { entity: IntegrityEntity; entityId: string; cause?: Error },
  ) {
    super(message, {
      statusCode: 422,
      code: 'DATA_INTEGRITY_ERROR',
      cause: options.cause,
    });
    this.entity = options.entity;
    this.entityId = options.entityId;
  }

  toJSON() {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        entity: this.entity,
        entityId: this.entityId,
      },
    };
  }
}

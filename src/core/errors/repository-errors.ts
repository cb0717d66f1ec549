import { ApplicationError } from './application-error.js';

/**
 * Argumento inválido detectado antes de cualquier acceso a la base de datos.
 */
export class ArgumentError extends ApplicationError {
  constructor(message: string, public readonly argumentName: string, code = 'INVALID_ARGUMENT') {
    super(message, { statusCode: 400, code, metadata: { argument: argumentName } });
    this.name = 'ArgumentError';
  }
}

export class ArgumentNullError extends ArgumentError {
  constructor(argumentName: string) {
    super(`El argumento "${argumentName}" es obligatorio`, argumentName, 'ARGUMENT_NULL');
    this.name = 'ArgumentNullError';
  }
}

export class ArgumentOutOfRangeError extends ArgumentError {
  constructor(argumentName: string, public readonly actualValue: unknown, detail: string) {
    super(`El argumento "${argumentName}" está fuera de rango: ${detail}`, argumentName, 'ARGUMENT_OUT_OF_RANGE');
    this.name = 'ArgumentOutOfRangeError';
  }
}

/**
 * La operación fue cancelada por quien la invocó (señal abortada). Se distingue del
 * resto de fallos para que la capa HTTP no la trate como un error del servidor.
 */
export class OperationCancelledError extends ApplicationError {
  constructor(reason?: unknown) {
    super('La operación fue cancelada', {
      statusCode: 499,
      code: 'OPERATION_CANCELLED',
      cause: reason
    });
    this.name = 'OperationCancelledError';
  }
}

/**
 * Un UPDATE o DELETE no afectó ninguna fila: la entidad ya no existe o fue modificada
 * por otra unidad de trabajo.
 */
export class ConcurrencyConflictError extends ApplicationError {
  constructor(entityName: string, id: string, operation: 'update' | 'delete') {
    super(`No se encontró la fila esperada de ${entityName} al ejecutar ${operation}`, {
      statusCode: 409,
      code: 'CONCURRENCY_CONFLICT',
      metadata: { entity: entityName, id, operation }
    });
    this.name = 'ConcurrencyConflictError';
  }
}

export class TransactionStateError extends ApplicationError {
  constructor(message: string) {
    super(message, { statusCode: 500, code: 'TRANSACTION_STATE' });
    this.name = 'TransactionStateError';
  }
}

/**
 * El propietario de la transacción terminó sin error, pero una llamada anidada falló
 * y marcó la transacción para rollback.
 */
export class TransactionRolledBackError extends ApplicationError {
  constructor(transactionId: string, cause?: unknown) {
    super('La transacción fue revertida porque una operación anidada falló', {
      statusCode: 500,
      code: 'TRANSACTION_ROLLED_BACK',
      metadata: { transactionId },
      cause
    });
    this.name = 'TransactionRolledBackError';
  }
}

export class SessionDisposedError extends ApplicationError {
  constructor() {
    super('La sesión de base de datos ya fue liberada', {
      statusCode: 500,
      code: 'SESSION_DISPOSED'
    });
    this.name = 'SessionDisposedError';
  }
}

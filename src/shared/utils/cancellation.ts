import { OperationCancelledError } from '@core/errors/repository-errors.js';

export interface CancellationOptions {
  signal?: AbortSignal;
}

export const ensureNotCancelled = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new OperationCancelledError(signal.reason);
  }
};

/**
 * Ejecuta un viaje a la base de datos comprobando la señal antes y después. TypeORM no
 * acepta señales de cancelación, así que un abort observado durante la consulta se
 * reporta al terminar ésta y el resultado se descarta.
 */
export const withCancellation = async <Result>(
  signal: AbortSignal | undefined,
  operation: () => Promise<Result>
): Promise<Result> => {
  ensureNotCancelled(signal);
  const result = await operation();
  ensureNotCancelled(signal);
  return result;
};

import { ArgumentNullError } from '@core/errors/repository-errors.js';

/**
 * Verifica en tiempo de ejecución que un argumento obligatorio fue provisto. Los tipos
 * no alcanzan cuando el valor llega desde JSON o desde código JavaScript.
 */
export function assertPresent<Value>(value: Value | null | undefined, argumentName: string): asserts value is Value {
  if (value === null || value === undefined) {
    throw new ArgumentNullError(argumentName);
  }
}

import { randomUUID } from 'node:crypto';

import type { QueryRunner } from 'typeorm';

import type { TransactionContext } from '@core/contracts/repository.js';
import { TransactionRolledBackError, TransactionStateError } from '@core/errors/repository-errors.js';
import type { AppLogger } from '@infra/logger/logger.js';

export type TransactionOutcome = 'committed' | 'rolledBack';

type TransactionState = 'active' | TransactionOutcome;

/**
 * Handle de una transacción abierta sobre el `QueryRunner` de una sesión. El handle se
 * libera exactamente una vez: al confirmar, al revertir o al llamar `dispose`.
 */
export class DbTransaction implements TransactionContext {
  public readonly id = randomUUID();

  private state: TransactionState = 'active';

  private rollbackOnly = false;

  private rollbackReason: unknown;

  constructor(
    public readonly sessionId: string,
    private readonly queryRunner: QueryRunner,
    private readonly onComplete: (transaction: DbTransaction, outcome: TransactionOutcome) => void,
    private readonly log: AppLogger
  ) {}

  public get isActive(): boolean {
    return this.state === 'active';
  }

  public get isRollbackOnly(): boolean {
    return this.rollbackOnly;
  }

  public get outcome(): TransactionOutcome | null {
    return this.state === 'active' ? null : this.state;
  }

  public markRollbackOnly(reason?: unknown): void {
    if (!this.rollbackOnly) {
      this.rollbackOnly = true;
      this.rollbackReason = reason;
      this.log.debug({ transactionId: this.id }, 'Transacción marcada para rollback');
    }
  }

  /**
   * Confirma la transacción. Si una llamada anidada la marcó para rollback, la revierte y
   * lanza `TransactionRolledBackError` con la causa original.
   */
  public async commit(): Promise<void> {
    this.assertActive();

    if (this.rollbackOnly) {
      await this.rollback();
      throw new TransactionRolledBackError(this.id, this.rollbackReason);
    }

    await this.queryRunner.commitTransaction();
    this.complete('committed');
  }

  public async rollback(): Promise<void> {
    if (!this.isActive) {
      return;
    }

    try {
      await this.queryRunner.rollbackTransaction();
    } finally {
      this.complete('rolledBack');
    }
  }

  /**
   * Revierte tras un fallo de quien la usaba. Un error del propio rollback sólo se
   * registra: el fallo que se propaga es el original.
   */
  public async rollbackAfterFailure(cause: unknown): Promise<void> {
    try {
      await this.rollback();
    } catch (rollbackError) {
      this.log.error({ err: rollbackError, cause, transactionId: this.id }, 'Error al revertir la transacción');
    }
  }

  public async dispose(): Promise<void> {
    await this.rollback();
  }

  private assertActive(): void {
    if (!this.isActive) {
      throw new TransactionStateError(`La transacción ${this.id} ya fue ${this.state === 'committed' ? 'confirmada' : 'revertida'}`);
    }
  }

  private complete(outcome: TransactionOutcome): void {
    this.state = outcome;
    this.log.debug({ transactionId: this.id, sessionId: this.sessionId, outcome }, 'Transacción finalizada');
    this.onComplete(this, outcome);
  }
}

import {
  concurrentModification,
  noConnection,
  notFound,
  storageFailure,
  type ParcelErrorDetails,
  type ParcelOperation,
} from '../errors/index.js';
import type {
  Logger,
  OperationContext,
  ParcelStore,
  ParcelStoreOptions,
  ParcelTable,
} from '../interfaces/index.js';
import { checkNewStatus, checkRegistered, checkStatusTransition } from '../status/index.js';
import type { NewParcel, Parcel } from '../types/index.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import { errorToLog } from '../utils/logging.js';
import { AddressSchema, ClientIdSchema, ParcelNumberSchema, parseNewParcel, parseOrThrow } from '../validation.js';

type StatementDetails = Omit<ParcelErrorDetails, 'operation'>;

/**
 * GuardedParcelStore
 * Stateless façade enforcing the parcel lifecycle over a ParcelTable.
 *
 * Every operation follows the same order: connection check, input
 * validation, then one statement at a time with a cancellation check before
 * each. Guarded writes repeat their guard in the write predicate; a write
 * that affects no row fails with ConcurrentModification.
 */
export class GuardedParcelStore implements ParcelStore {
  private readonly logger?: Logger;

  constructor(
    private readonly table?: ParcelTable,
    options: ParcelStoreOptions = {}
  ) {
    this.logger = options.logger;
  }

  async add(parcel: NewParcel, ctx?: OperationContext): Promise<number> {
    const table = this.connectedTable('add');
    const input = parseNewParcel(parcel);
    const status = this.guard(ctx, () => checkNewStatus(input.client, input.status));

    const number = await this.statement(ctx, 'add', { client: input.client }, () =>
      table.insert({
        client: input.client,
        status,
        address: input.address,
        createdAt: input.createdAt,
      })
    );

    this.log(ctx)?.debug('Parcel added', { number, client: input.client, status });
    return number;
  }

  async get(number: number, ctx?: OperationContext): Promise<Parcel> {
    const table = this.connectedTable('get');
    parseOrThrow(ParcelNumberSchema, number, 'get', { number });

    const parcel = await this.statement(ctx, 'get', { number }, () => table.findByNumber(number));
    if (!parcel) {
      throw notFound('get', number);
    }
    return parcel;
  }

  async getByClient(client: number, ctx?: OperationContext): Promise<Parcel[]> {
    const table = this.connectedTable('getByClient');
    parseOrThrow(ClientIdSchema, client, 'getByClient', { client });

    return this.statement(ctx, 'getByClient', { client }, () => table.findByClient(client));
  }

  async setStatus(number: number, status: string, ctx?: OperationContext): Promise<void> {
    const table = this.connectedTable('setStatus');
    parseOrThrow(ParcelNumberSchema, number, 'setStatus', { number, newStatus: status });

    const storedStatus = await this.readStatus(table, ctx, 'setStatus', number);
    const transition = this.guard(ctx, () => checkStatusTransition(number, storedStatus, status));

    const changed = await this.statement(ctx, 'setStatus', { number, storedStatus, newStatus: status }, () =>
      table.updateStatusIf(number, transition.from, transition.to)
    );
    if (changed === 0) {
      throw this.raced(ctx, 'setStatus', number, storedStatus);
    }

    this.log(ctx)?.debug('Parcel status updated', { number, from: transition.from, to: transition.to });
  }

  async setAddress(number: number, address: string, ctx?: OperationContext): Promise<void> {
    const table = this.connectedTable('setAddress');
    parseOrThrow(ParcelNumberSchema, number, 'setAddress', { number });
    parseOrThrow(AddressSchema, address, 'setAddress', { number });

    const storedStatus = await this.readStatus(table, ctx, 'setAddress', number);
    this.guard(ctx, () => checkRegistered('setAddress', number, storedStatus));

    const changed = await this.statement(ctx, 'setAddress', { number, storedStatus }, () =>
      table.updateAddressIf(number, storedStatus, address)
    );
    if (changed === 0) {
      throw this.raced(ctx, 'setAddress', number, storedStatus);
    }

    this.log(ctx)?.debug('Parcel address updated', { number });
  }

  async delete(number: number, ctx?: OperationContext): Promise<void> {
    const table = this.connectedTable('delete');
    parseOrThrow(ParcelNumberSchema, number, 'delete', { number });

    const storedStatus = await this.readStatus(table, ctx, 'delete', number);
    this.guard(ctx, () => checkRegistered('delete', number, storedStatus));

    const changed = await this.statement(ctx, 'delete', { number, storedStatus }, () =>
      table.deleteIf(number, storedStatus)
    );
    if (changed === 0) {
      throw this.raced(ctx, 'delete', number, storedStatus);
    }

    this.log(ctx)?.debug('Parcel deleted', { number });
  }

  private connectedTable(operation: ParcelOperation): ParcelTable {
    if (!this.table || !this.table.isOpen()) {
      throw noConnection(operation);
    }
    return this.table;
  }

  private async readStatus(
    table: ParcelTable,
    ctx: OperationContext | undefined,
    operation: ParcelOperation,
    number: number
  ): Promise<string> {
    const storedStatus = await this.statement(ctx, operation, { number }, () => table.findStatus(number));
    if (storedStatus === undefined) {
      throw notFound(operation, number);
    }
    return storedStatus;
  }

  /**
   * Run one statement: cancellation check first, driver failures wrapped
   */
  private async statement<T>(
    ctx: OperationContext | undefined,
    operation: ParcelOperation,
    details: StatementDetails,
    run: () => Promise<T>
  ): Promise<T> {
    throwIfCancelled(ctx, operation, details);
    try {
      return await run();
    } catch (error) {
      throw storageFailure(error, operation, details);
    }
  }

  /**
   * Evaluate a lifecycle rule, logging the rejection before rethrowing
   */
  private guard<T>(ctx: OperationContext | undefined, check: () => T): T {
    try {
      return check();
    } catch (error) {
      this.log(ctx)?.warn('Parcel operation rejected', errorToLog(error));
      throw error;
    }
  }

  private raced(
    ctx: OperationContext | undefined,
    operation: ParcelOperation,
    number: number,
    storedStatus: string
  ) {
    const error = concurrentModification(operation, number, storedStatus);
    this.log(ctx)?.warn('Parcel changed between check and write', errorToLog(error));
    return error;
  }

  private log(ctx: OperationContext | undefined): Logger | undefined {
    return ctx?.logger ?? this.logger;
  }
}

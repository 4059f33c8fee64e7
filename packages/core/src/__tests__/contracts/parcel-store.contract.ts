/**
 * ParcelStore contract suite.
 *
 * Shared by every ParcelStore implementation. The harness exposes the
 * backing table directly so tests can plant rows the store itself would
 * refuse (corrupt statuses, parcels created mid-lifecycle).
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { NewParcel, ParcelRow, ParcelStore } from '../../index.js';
import { PARCEL_STATUSES, statusRank, ParcelStoreError } from '../../index.js';

export interface ParcelStoreHarness {
  store: ParcelStore;
  /** Insert a row directly, bypassing the store's rules */
  insertRaw(row: ParcelRow): Promise<number>;
  countRows(): Promise<number>;
  /** Close the underlying handle; safe to call twice */
  close(): void;
}

export function testParcel(overrides: Partial<NewParcel> = {}): NewParcel {
  return {
    client: 1000,
    status: 'registered',
    address: 'test',
    createdAt: '2024-05-01T10:00:00Z',
    ...overrides,
  };
}

function rowOf(parcel: NewParcel): ParcelRow {
  return {
    client: parcel.client,
    status: parcel.status,
    address: parcel.address,
    createdAt: parcel.createdAt,
  };
}

export function parcelStoreContractTests(
  name: string,
  createHarness: () => ParcelStoreHarness
): void {
  describe(`ParcelStore contract: ${name}`, () => {
    let harness: ParcelStoreHarness;
    let store: ParcelStore;

    beforeEach(() => {
      harness = createHarness();
      store = harness.store;
    });

    afterEach(() => {
      harness.close();
    });

    describe('add / get', () => {
      it('returns the stored record with the generated number', async () => {
        const parcel = testParcel();

        const number = await store.add(parcel);

        expect(number).toBeGreaterThan(0);
        expect(await store.get(number)).toEqual({ ...parcel, number });
      });

      it('ignores a caller-supplied number', async () => {
        const number = await store.add(testParcel({ number: 999 }));

        expect(number).not.toBe(999);
        expect((await store.get(number)).number).toBe(number);
        await expect(store.get(999)).rejects.toMatchObject({ kind: 'NotFound' });
      });

      it('accepts every known status as a starting value', async () => {
        for (const status of PARCEL_STATUSES) {
          const number = await store.add(testParcel({ status }));
          expect((await store.get(number)).status).toBe(status);
        }
        expect(await harness.countRows()).toBe(3);
      });

      it('assigns distinct numbers', async () => {
        const first = await store.add(testParcel());
        const second = await store.add(testParcel());

        expect(second).not.toBe(first);
      });

      it('rejects an unrecognised status without inserting', async () => {
        await expect(store.add(testParcel({ status: 'unrecognised' }))).rejects.toMatchObject({
          kind: 'NewStatusUnrecognised',
          details: { operation: 'add', client: 1000, newStatus: 'unrecognised' },
        });
        expect(await harness.countRows()).toBe(0);
      });

      it('rejects a malformed parcel without inserting', async () => {
        await expect(store.add(testParcel({ client: 1.5 }))).rejects.toMatchObject({
          kind: 'InvalidParcel',
          details: { operation: 'add' },
        });
        await expect(store.add(testParcel({ createdAt: 'x'.repeat(65) }))).rejects.toMatchObject({
          kind: 'InvalidParcel',
        });
        expect(await harness.countRows()).toBe(0);
      });

      it('stores an empty creation timestamp as given', async () => {
        const number = await store.add(testParcel({ createdAt: '' }));

        expect((await store.get(number)).createdAt).toBe('');
      });

      it('reports a missing parcel as NotFound', async () => {
        await expect(store.get(42)).rejects.toMatchObject({
          kind: 'NotFound',
          details: { operation: 'get', number: 42 },
        });
      });
    });

    describe('getByClient', () => {
      it('returns exactly the parcels of the client', async () => {
        const inserted = [
          testParcel({ client: 2000, address: 'first' }),
          testParcel({ client: 2000, address: 'second', status: 'sent' }),
          testParcel({ client: 2000, address: 'third' }),
        ];
        const numbers: number[] = [];
        for (const parcel of inserted) {
          numbers.push(await store.add(parcel));
        }
        await store.add(testParcel({ client: 3000 }));

        const found = await store.getByClient(2000);

        expect(found).toHaveLength(3);
        const byNumber = new Map(found.map((parcel) => [parcel.number, parcel]));
        numbers.forEach((number, i) => {
          expect(byNumber.get(number)).toEqual({ ...inserted[i], number });
        });
      });

      it('returns an empty list for a client without parcels', async () => {
        await store.add(testParcel({ client: 2000 }));

        expect(await store.getByClient(4000)).toEqual([]);
      });
    });

    describe('setStatus', () => {
      for (const from of PARCEL_STATUSES) {
        for (const to of PARCEL_STATUSES) {
          const allowed = statusRank(to) - statusRank(from) === 1;

          it(`${allowed ? 'allows' : 'rejects'} ${from} → ${to}`, async () => {
            const number = await harness.insertRaw(rowOf(testParcel({ status: from })));

            if (allowed) {
              await store.setStatus(number, to);
              expect((await store.get(number)).status).toBe(to);
            } else {
              await expect(store.setStatus(number, to)).rejects.toMatchObject({
                kind: 'InvalidStatusTransition',
                details: { operation: 'setStatus', number, storedStatus: from, newStatus: to },
              });
              expect((await store.get(number)).status).toBe(from);
            }
          });
        }
      }

      it('walks the full lifecycle and refuses to go back', async () => {
        const number = await store.add(testParcel());

        await store.setStatus(number, 'sent');
        await store.setStatus(number, 'delivered');

        await expect(store.setStatus(number, 'sent')).rejects.toMatchObject({
          kind: 'InvalidStatusTransition',
        });
        expect((await store.get(number)).status).toBe('delivered');
      });

      it('rejects an unrecognised new status', async () => {
        const number = await store.add(testParcel());

        await expect(store.setStatus(number, 'lost')).rejects.toMatchObject({
          kind: 'NewStatusUnrecognised',
          details: { number, newStatus: 'lost' },
        });
      });

      it('refuses to move a parcel whose stored status is corrupt', async () => {
        const number = await harness.insertRaw(rowOf(testParcel({ status: 'unrecognised' })));

        await expect(store.setStatus(number, 'sent')).rejects.toMatchObject({
          kind: 'StoredStatusUnrecognised',
          details: { number, storedStatus: 'unrecognised' },
        });
        expect((await store.get(number)).status).toBe('unrecognised');
      });

      it('checks the new status before the stored one', async () => {
        const number = await harness.insertRaw(rowOf(testParcel({ status: 'unrecognised' })));

        await expect(store.setStatus(number, 'bogus')).rejects.toMatchObject({
          kind: 'NewStatusUnrecognised',
        });
      });

      it('reports a missing parcel before looking at the new status', async () => {
        await expect(store.setStatus(7, 'bogus')).rejects.toMatchObject({
          kind: 'NotFound',
          details: { operation: 'setStatus', number: 7 },
        });
      });

      it('does not treat inherited property names as statuses', async () => {
        const number = await store.add(testParcel());

        await expect(store.setStatus(number, 'toString')).rejects.toMatchObject({
          kind: 'NewStatusUnrecognised',
        });
      });
    });

    describe('setAddress', () => {
      it('updates the address of a registered parcel', async () => {
        const number = await store.add(testParcel());

        await store.setAddress(number, 'new address');

        expect((await store.get(number)).address).toBe('new address');
      });

      for (const status of ['sent', 'delivered', 'unrecognised']) {
        it(`leaves a ${status} parcel untouched`, async () => {
          const number = await harness.insertRaw(rowOf(testParcel({ status })));

          await expect(store.setAddress(number, 'new address')).rejects.toMatchObject({
            kind: 'RequireRegisteredStatus',
            details: { operation: 'setAddress', number, storedStatus: status },
          });
          expect((await store.get(number)).address).toBe('test');
        });
      }

      it('reports a missing parcel as NotFound', async () => {
        await expect(store.setAddress(5, 'anywhere')).rejects.toMatchObject({ kind: 'NotFound' });
      });

      it('rejects an address longer than the column', async () => {
        const number = await store.add(testParcel());

        await expect(store.setAddress(number, 'x'.repeat(513))).rejects.toMatchObject({
          kind: 'InvalidParcel',
          details: { operation: 'setAddress', number },
        });
        expect((await store.get(number)).address).toBe('test');
      });
    });

    describe('delete', () => {
      it('removes a registered parcel', async () => {
        const number = await store.add(testParcel());

        await store.delete(number);

        await expect(store.get(number)).rejects.toMatchObject({ kind: 'NotFound' });
        expect(await harness.countRows()).toBe(0);
      });

      it('keeps a delivered parcel', async () => {
        const parcel = testParcel({ status: 'delivered' });
        const number = await store.add(parcel);

        await expect(store.delete(number)).rejects.toMatchObject({
          kind: 'RequireRegisteredStatus',
          details: { operation: 'delete', number, storedStatus: 'delivered' },
        });
        expect(await store.get(number)).toEqual({ ...parcel, number });
      });

      it('reports a missing parcel as NotFound', async () => {
        await expect(store.delete(3)).rejects.toMatchObject({
          kind: 'NotFound',
          details: { operation: 'delete', number: 3 },
        });
      });
    });

    describe('concurrent callers', () => {
      it('lets exactly one of two identical advances win', async () => {
        const number = await store.add(testParcel());

        const results = await Promise.allSettled([
          store.setStatus(number, 'sent'),
          store.setStatus(number, 'sent'),
        ]);

        expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
        const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
        expect(rejected).toHaveLength(1);
        expect(rejected[0].reason).toMatchObject({
          kind: 'ConcurrentModification',
          details: { operation: 'setStatus', number, storedStatus: 'registered' },
        });
        expect((await store.get(number)).status).toBe('sent');
      });

      it('deletes a parcel only once', async () => {
        const number = await store.add(testParcel());

        const results = await Promise.allSettled([store.delete(number), store.delete(number)]);

        expect(results.map((r) => r.status).sort()).toEqual(['fulfilled', 'rejected']);
        expect(await harness.countRows()).toBe(0);
      });

      it('does not change the address of a parcel sent in between', async () => {
        const number = await store.add(testParcel());

        const results = await Promise.allSettled([
          store.setStatus(number, 'sent'),
          store.setAddress(number, 'too late'),
        ]);

        expect(results[0].status).toBe('fulfilled');
        expect(results[1]).toMatchObject({
          status: 'rejected',
          reason: { kind: 'ConcurrentModification' },
        });
        expect(await store.get(number)).toMatchObject({ status: 'sent', address: 'test' });
      });
    });

    describe('without a connection', () => {
      it('fails every operation with NoConnection before validating input', async () => {
        const number = await store.add(testParcel());
        harness.close();

        await expect(store.add(testParcel({ status: 'unrecognised' }))).rejects.toMatchObject({
          kind: 'NoConnection',
        });
        await expect(store.get(number)).rejects.toMatchObject({ kind: 'NoConnection' });
        await expect(store.getByClient(1000)).rejects.toMatchObject({ kind: 'NoConnection' });
        await expect(store.setStatus(number, 'bogus')).rejects.toMatchObject({ kind: 'NoConnection' });
        await expect(store.setAddress(number, 'x'.repeat(600))).rejects.toMatchObject({
          kind: 'NoConnection',
        });
        await expect(store.delete(number)).rejects.toMatchObject({ kind: 'NoConnection' });
      });
    });

    describe('cancellation', () => {
      it('does not insert once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort(new Error('caller gave up'));

        const error = await store.add(testParcel(), { signal: controller.signal }).catch((e: unknown) => e);

        if (!(error instanceof ParcelStoreError)) throw new Error('expected a ParcelStoreError');
        expect(error.kind).toBe('Cancelled');
        expect(error.details).toEqual({ operation: 'add', client: 1000 });
        expect(error.cause).toBe(controller.signal.reason);
        expect(await harness.countRows()).toBe(0);
      });

      it('does not update once the signal is aborted', async () => {
        const number = await store.add(testParcel());
        const controller = new AbortController();
        controller.abort();

        await expect(
          store.setStatus(number, 'sent', { signal: controller.signal })
        ).rejects.toMatchObject({ kind: 'Cancelled', details: { operation: 'setStatus', number } });
        expect((await store.get(number)).status).toBe('registered');
      });

      it('runs normally with a live signal', async () => {
        const controller = new AbortController();

        const number = await store.add(testParcel(), { signal: controller.signal });

        expect((await store.get(number, { signal: controller.signal })).number).toBe(number);
      });
    });
  });
}

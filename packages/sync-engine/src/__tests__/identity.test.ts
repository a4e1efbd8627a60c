/**
 * Identity Map Tests
 * Mapping upserts, archiving and at-most-one remote creation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ManualClock, apiError, err, ok, type Result } from '@commercesync/integrations';
import { IdentityMap, type CreateOrResolveResult, type RemoteCreation } from '../identity/IdentityMap.js';
import { MemoryIdentityStore } from '../stores/memory.js';

describe('IdentityMap', () => {
  let clock: ManualClock;
  let store: MemoryIdentityStore;
  let identity: IdentityMap;

  beforeEach(() => {
    clock = new ManualClock(1000);
    store = new MemoryIdentityStore();
    identity = new IdentityMap({ store, clock, createLockTtlMs: 90000 });
  });

  describe('upsert', () => {
    it('inserts, then refreshes the mapping of a local record', async () => {
      await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1', contentHash: 'h1' });
      clock.advance(500);
      const updated = await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1', contentHash: 'h2' });

      expect(updated.ok).toBe(true);
      expect(await identity.findByLocal('product', 'L1')).toEqual({
        entityType: 'product',
        localRef: 'L1',
        remoteRef: 'R1',
        contentHash: 'h2',
        lastSyncedAt: new Date(1500),
        archivedAt: null,
      });
      expect(await identity.list('product')).toHaveLength(1);
    });

    it('refuses a remote object that another record owns', async () => {
      await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1' });

      const result = await identity.upsert({ entityType: 'product', localRef: 'L2', remoteRef: 'R1' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('conflict');
      }
      expect(await identity.resolveLocal('product', 'R1')).toBe('L1');
    });

    it('scopes uniqueness by entity type', async () => {
      await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1' });

      expect((await identity.upsert({ entityType: 'variant', localRef: 'L1', remoteRef: 'R1' })).ok).toBe(true);
    });
  });

  describe('archive', () => {
    it('hides the mapping from resolution but keeps it findable', async () => {
      await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1' });
      clock.advance(10);

      expect(await identity.archive('product', 'L1')).toBe(true);
      expect(await identity.resolveRemote('product', 'L1')).toBeNull();
      expect(await identity.resolveLocal('product', 'R1')).toBeNull();
      expect((await identity.findByRemote('product', 'R1'))?.archivedAt).toEqual(new Date(1010));
      expect(await identity.archive('product', 'L1')).toBe(false);
    });

    it('frees both refs for a new mapping', async () => {
      await identity.upsert({ entityType: 'product', localRef: 'L1', remoteRef: 'R1' });
      await identity.archive('product', 'L1');

      expect((await identity.upsert({ entityType: 'product', localRef: 'L2', remoteRef: 'R1' })).ok).toBe(true);
      expect(await identity.resolveLocal('product', 'R1')).toBe('L2');
    });
  });

  describe('createOrResolve', () => {
    it('creates one remote object when several workers race for the same record', async () => {
      let creates = 0;
      let open: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      const create = async (): Promise<Result<RemoteCreation>> => {
        creates++;
        await gate;
        return ok({ remoteRef: `R-${creates}`, contentHash: 'h' });
      };

      const racers = ['w-1', 'w-2', 'w-3', 'w-4', 'w-5'].map((holder) =>
        identity.createOrResolve('product', 'L1', holder, create)
      );
      open();
      const results = await Promise.all(racers);

      const created = results.filter((result) => result.ok && result.value.created);
      const busy = results.filter((result) => !result.ok);
      expect(creates).toBe(1);
      expect(created).toHaveLength(1);
      expect(busy).toHaveLength(4);
      for (const result of busy) {
        expect(result).toEqual(
          err(apiError('transient', 'Create of product L1 already in progress', { retryAfterMs: 1000 }))
        );
      }

      const again = await identity.createOrResolve('product', 'L1', 'w-2', create);
      expect(again.ok && again.value.created).toBe(false);
      expect(again.ok && again.value.mapping.remoteRef).toBe('R-1');
      expect(creates).toBe(1);
      expect((await identity.list('product')).filter((mapping) => mapping.archivedAt === null)).toHaveLength(1);
    });

    it('releases the lease when the create fails', async () => {
      const failed = await identity.createOrResolve('product', 'L1', 'w-1', async () =>
        err(apiError('throttle', 'Throttled', { retryAfterMs: 2000 }))
      );
      expect(failed.ok).toBe(false);

      const retried: Result<CreateOrResolveResult> = await identity.createOrResolve('product', 'L1', 'w-2', async () =>
        ok({ remoteRef: 'R1', contentHash: null })
      );
      expect(retried.ok && retried.value.created).toBe(true);
    });

    it('takes over a lease whose holder never released it once it expired', async () => {
      await store.acquireCreateLock('product', 'L1', 'crashed', new Date(1000 + 90000), new Date(1000));
      const create = async (): Promise<Result<RemoteCreation>> => ok({ remoteRef: 'R1', contentHash: null });

      const blocked = await identity.createOrResolve('product', 'L1', 'w-1', create);
      expect(blocked.ok).toBe(false);

      clock.advance(90001);
      const taken = await identity.createOrResolve('product', 'L1', 'w-1', create);
      expect(taken.ok && taken.value.created).toBe(true);
    });
  });
});

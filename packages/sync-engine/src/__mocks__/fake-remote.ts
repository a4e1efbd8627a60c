/**
 * Fake Remote
 * In-memory stand-in for the platform behind the EntityHandler interface.
 * Engine tests use it where the wire format does not matter.
 */

import { apiError, err, ok, toGid, ENTITY_RESOURCE_TYPES, type ApiError, type EntityType, type Result } from '@commercesync/integrations';
import type { EntityHandler, EntityHandlers, HandlerContext, ListRemoteOptions, RemoteRecord } from '../entities/base.js';
import type { EntityFields } from '../types.js';

export type FakeMethod = 'fetch' | 'list' | 'create' | 'update' | 'delete';

export interface FakeCall {
  method: FakeMethod;
  entityType: EntityType;
  remoteRef: string | null;
  fields: EntityFields | null;
}

interface FakeObject {
  entityType: EntityType;
  fields: EntityFields;
  updatedAt: Date;
}

const INBOUND_ONLY: ReadonlySet<EntityType> = new Set(['order', 'customer']);

export class FakeRemote {
  readonly objects = new Map<string, FakeObject>();
  readonly calls: FakeCall[] = [];
  private readonly failures = new Map<FakeMethod, ApiError[]>();
  private readonly gates: Array<() => void> = [];
  private gated = false;
  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Fail the next `times` calls of `method` with `error` */
  failNext(method: FakeMethod, error: ApiError, times = 1): void {
    const queue = this.failures.get(method) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error);
    }
    this.failures.set(method, queue);
  }

  /** Hold every create until `release()` */
  holdCreates(): void {
    this.gated = true;
  }

  release(): void {
    this.gated = false;
    for (const open of this.gates.splice(0)) {
      open();
    }
  }

  seed(entityType: EntityType, fields: EntityFields, updatedAt: Date = this.now()): string {
    const remoteRef = this.nextRef(entityType);
    this.objects.set(remoteRef, { entityType, fields: { ...fields }, updatedAt });
    return remoteRef;
  }

  /** Change a remote object without going through the engine */
  edit(remoteRef: string, fields: EntityFields, updatedAt: Date = this.now()): void {
    const object = this.objects.get(remoteRef);
    if (object) {
      this.objects.set(remoteRef, { ...object, fields: { ...object.fields, ...fields }, updatedAt });
    }
  }

  ofType(entityType: EntityType): Array<{ remoteRef: string; fields: EntityFields }> {
    return [...this.objects.entries()]
      .filter(([, object]) => object.entityType === entityType)
      .map(([remoteRef, object]) => ({ remoteRef, fields: object.fields }));
  }

  count(method: FakeMethod): number {
    return this.calls.filter((call) => call.method === method).length;
  }

  handlers(): EntityHandlers {
    return {
      product: new FakeHandler(this, 'product'),
      variant: new FakeHandler(this, 'variant', ['productRef']),
      inventory_level: new FakeHandler(this, 'inventory_level'),
      order: new FakeHandler(this, 'order'),
      customer: new FakeHandler(this, 'customer'),
    };
  }

  /** @internal */
  takeFailure(method: FakeMethod): ApiError | undefined {
    return this.failures.get(method)?.shift();
  }

  /** @internal */
  async waitForGate(): Promise<void> {
    if (!this.gated) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.gates.push(resolve);
    });
  }

  /** @internal */
  record(call: FakeCall): void {
    this.calls.push(call);
  }

  /** @internal */
  create(entityType: EntityType, fields: EntityFields): string {
    return this.seed(entityType, fields);
  }

  private nextRef(entityType: EntityType): string {
    this.sequence++;
    return toGid(ENTITY_RESOURCE_TYPES[entityType], this.sequence);
  }
}

class FakeHandler implements EntityHandler {
  readonly outbound: boolean;

  constructor(
    private readonly remote: FakeRemote,
    readonly entityType: EntityType,
    readonly ignoredFields: readonly string[] = []
  ) {
    this.outbound = !INBOUND_ONLY.has(entityType);
  }

  async fetchRemote(remoteRef: string): Promise<Result<RemoteRecord | null>> {
    this.remote.record({ method: 'fetch', entityType: this.entityType, remoteRef, fields: null });
    const failure = this.remote.takeFailure('fetch');
    if (failure) {
      return err(failure);
    }
    const object = this.remote.objects.get(remoteRef);
    return ok(object ? { remoteRef, fields: { ...object.fields }, updatedAt: object.updatedAt } : null);
  }

  async listRemote(options: ListRemoteOptions = {}): Promise<Result<RemoteRecord[]>> {
    this.remote.record({ method: 'list', entityType: this.entityType, remoteRef: null, fields: null });
    const failure = this.remote.takeFailure('list');
    if (failure) {
      return err(failure);
    }
    const since = options.full ? undefined : options.since?.getTime();
    const records: RemoteRecord[] = [];
    for (const [remoteRef, object] of this.remote.objects) {
      if (object.entityType === this.entityType && (since === undefined || object.updatedAt.getTime() > since)) {
        records.push({ remoteRef, fields: { ...object.fields }, updatedAt: object.updatedAt });
      }
    }
    return ok(records);
  }

  async createRemote(fields: EntityFields, _ctx: HandlerContext): Promise<Result<string>> {
    this.remote.record({ method: 'create', entityType: this.entityType, remoteRef: null, fields: { ...fields } });
    await this.remote.waitForGate();
    const failure = this.remote.takeFailure('create');
    if (failure) {
      return err(failure);
    }
    return ok(this.remote.create(this.entityType, fields));
  }

  async updateRemote(remoteRef: string, fields: EntityFields, _ctx: HandlerContext): Promise<Result<void>> {
    this.remote.record({ method: 'update', entityType: this.entityType, remoteRef, fields: { ...fields } });
    const failure = this.remote.takeFailure('update');
    if (failure) {
      return err(failure);
    }
    if (!this.remote.objects.has(remoteRef)) {
      return err(apiError('validation', `${this.entityType} ${remoteRef} does not exist`));
    }
    this.remote.edit(remoteRef, fields);
    return ok(undefined);
  }

  async deleteRemote(remoteRef: string, fields: EntityFields | null, _ctx: HandlerContext): Promise<Result<void>> {
    this.remote.record({ method: 'delete', entityType: this.entityType, remoteRef, fields });
    const failure = this.remote.takeFailure('delete');
    if (failure) {
      return err(failure);
    }
    this.remote.objects.delete(remoteRef);
    return ok(undefined);
  }
}

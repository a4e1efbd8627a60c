/**
 * Variant handler
 *
 * Variants are written through the product-scoped bulk mutations, so every
 * write first resolves the owning product. A `productRef` field holds either
 * the product's global id (records imported from the platform) or its local
 * ref (records created locally).
 */

import {
  apiError,
  err,
  isGid,
  ok,
  queries,
  type CommerceGraphQLClient,
  type Connection,
  type MutationPayload,
  type Result,
} from '@commercesync/integrations';
import type { EntityFields, JsonValue } from '../types.js';
import {
  BaseEntityHandler,
  parseTimestamp,
  readConnection,
  readNestedId,
  readNumber,
  readString,
  toJsonValue,
  type HandlerContext,
  type RemoteRecord,
} from './base.js';

type VariantsCreatePayload = MutationPayload & { productVariants?: Array<{ id: string }> | null };

export class VariantHandler extends BaseEntityHandler {
  readonly entityType = 'variant' as const;
  readonly outbound = true;
  // Holds a local ref or a global id depending on where the variant came from
  readonly ignoredFields = ['productRef'];

  constructor(client: CommerceGraphQLClient) {
    super(client, {
      byId: queries.VARIANT_BY_ID_QUERY,
      page: queries.VARIANTS_PAGE_QUERY,
      bulk: queries.VARIANTS_BULK_QUERY,
    });
  }

  protected toRecord(node: Record<string, unknown>): RemoteRecord | null {
    const id = node.id;
    if (!this.ownsId(id)) {
      return null;
    }
    return {
      remoteRef: id,
      fields: {
        productRef: readNestedId(node.product),
        sku: toJsonValue(node.sku),
        title: toJsonValue(node.title),
        price: readNumber(node.price) ?? toJsonValue(node.price),
        barcode: toJsonValue(node.barcode),
      },
      updatedAt: parseTimestamp(node.updatedAt),
    };
  }

  protected connectionOf(data: Record<string, unknown>): Connection<Record<string, unknown>> {
    return readConnection(data.productVariants);
  }

  async createRemote(fields: EntityFields, ctx: HandlerContext): Promise<Result<string>> {
    const productId = await this.productIdFor(null, fields, ctx);
    if (!productId.ok) {
      return productId;
    }
    if (productId.value === null) {
      return err(apiError('validation', 'Variant has no product'));
    }

    const result = await this.client.mutate<VariantsCreatePayload>(
      queries.VARIANTS_BULK_CREATE_MUTATION,
      { productId: productId.value, variants: [variantInput(fields)] },
      'productVariantsBulkCreate'
    );
    if (!result.ok) {
      return result;
    }
    const id = readString(result.value.productVariants?.[0]?.id);
    return id ? ok(id) : err(apiError('validation', 'productVariantsBulkCreate returned no variant id'));
  }

  async updateRemote(remoteRef: string, fields: EntityFields, ctx: HandlerContext): Promise<Result<void>> {
    const productId = await this.productIdFor(remoteRef, fields, ctx);
    if (!productId.ok) {
      return productId;
    }
    if (productId.value === null) {
      return err(apiError('validation', `Variant ${remoteRef} no longer exists`));
    }

    const result = await this.client.mutate<MutationPayload>(
      queries.VARIANTS_BULK_UPDATE_MUTATION,
      { productId: productId.value, variants: [{ id: remoteRef, ...variantInput(fields) }] },
      'productVariantsBulkUpdate'
    );
    return result.ok ? ok(undefined) : result;
  }

  async deleteRemote(remoteRef: string, fields: EntityFields | null, ctx: HandlerContext): Promise<Result<void>> {
    const productId = await this.productIdFor(remoteRef, fields ?? {}, ctx);
    if (!productId.ok) {
      return productId;
    }
    if (productId.value === null) {
      // Already gone, e.g. removed together with its product
      return ok(undefined);
    }

    const result = await this.client.mutate<MutationPayload>(
      queries.VARIANTS_BULK_DELETE_MUTATION,
      { productId: productId.value, variantsIds: [remoteRef] },
      'productVariantsBulkDelete'
    );
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Global id of the owning product. Falls back to reading the variant itself
   * when the record's productRef cannot be resolved; null when that read finds
   * no variant.
   */
  private async productIdFor(
    remoteRef: string | null,
    fields: EntityFields,
    ctx: HandlerContext
  ): Promise<Result<string | null>> {
    const productRef = readString(fields.productRef);
    if (productRef && isGid(productRef)) {
      return ok(productRef);
    }
    if (productRef) {
      const resolved = await ctx.resolveRemote('product', productRef);
      if (resolved) {
        return ok(resolved);
      }
    }

    if (remoteRef) {
      const current = await this.fetchRemote(remoteRef);
      if (!current.ok) {
        return current;
      }
      if (!current.value) {
        return ok(null);
      }
      const remoteProduct = readString(current.value.fields.productRef);
      if (remoteProduct) {
        return ok(remoteProduct);
      }
    }

    // The product's own create job may still be queued
    return err(
      apiError('transient', `Product ${productRef ?? '(none)'} of variant is not synced yet`, { retryAfterMs: 5000 })
    );
  }
}

function variantInput(fields: EntityFields): Record<string, JsonValue> {
  const input: Record<string, JsonValue> = {};
  const price = fields.price;
  if (typeof price === 'number' || typeof price === 'string') {
    input.price = String(price);
  }
  if (fields.barcode !== undefined && fields.barcode !== null) {
    input.barcode = fields.barcode;
  }
  if (fields.sku !== undefined && fields.sku !== null) {
    input.inventoryItem = { sku: fields.sku };
  }
  const title = readString(fields.title);
  if (title) {
    input.optionValues = [{ optionName: 'Title', name: title }];
  }
  return input;
}

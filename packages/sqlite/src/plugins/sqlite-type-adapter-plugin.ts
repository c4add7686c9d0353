/* eslint-disable unicorn/no-null -- SQLite binds null, not undefined */

import {
  OperationNodeTransformer,
  type KyselyPlugin,
  type PluginTransformQueryArgs,
  type PluginTransformResultArgs,
  type PrimitiveValueListNode,
  type ValueNode,
} from 'kysely';

/**
 * Map a bound parameter to something better-sqlite3 accepts:
 * undefined -> null, boolean -> 0/1, bigint -> decimal string.
 * Arrays and plain objects are converted element by element.
 *
 * Amounts are stored as TEXT, so bigints are bound as strings rather than
 * as 64-bit integers (which would overflow for large sums).
 */
export function convertValueForSqlite(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  if (typeof value === 'bigint') {
    return value.toString();
  }

  if (Array.isArray(value)) {
    return value.map(convertValueForSqlite);
  }

  if (value !== null && typeof value === 'object' && value.constructor === Object) {
    return Object.fromEntries(Object.entries(value).map(([key, val]) => [key, convertValueForSqlite(val)]));
  }

  return value;
}

class SqliteTypeAdapterPlugin implements KyselyPlugin {
  readonly #transformer = new SqliteTypeAdapterTransformer();

  transformQuery(args: PluginTransformQueryArgs): PluginTransformQueryArgs['node'] {
    return this.#transformer.transformNode(args.node, args.queryId);
  }

  transformResult(args: PluginTransformResultArgs): Promise<PluginTransformResultArgs['result']> {
    return Promise.resolve(args.result);
  }
}

class SqliteTypeAdapterTransformer extends OperationNodeTransformer {
  protected override transformValue(node: ValueNode): ValueNode {
    const transformed = super.transformValue(node);
    return { ...transformed, value: convertValueForSqlite(transformed.value) };
  }

  protected override transformPrimitiveValueList(node: PrimitiveValueListNode): PrimitiveValueListNode {
    const transformed = super.transformPrimitiveValueList(node);
    return { ...transformed, values: transformed.values.map(convertValueForSqlite) };
  }
}

export const sqliteTypeAdapterPlugin = new SqliteTypeAdapterPlugin();

/**
 * Bulk-patch list adjustments
 *
 * When patching many records at once, a list field `F` is either left
 * alone, replaced wholesale (`F`), or edited incrementally
 * (`add_F` / `remove_F`). Setting and adjusting the same field in one
 * request is rejected.
 *
 * An adjust side left `undefined` is omitted from the request; an empty
 * list is sent as `[]`.
 */

import type { Codec, JsonObject, JsonValue } from "./codec.ts";
import { arrayCodec } from "./codec.ts";
import { ConflictingFieldAdjustmentError } from "./errors.ts";

export type BulkAdjustment<T> =
  | { readonly mode: "unset" }
  | { readonly mode: "set"; readonly items: readonly T[] }
  | { readonly mode: "adjust"; readonly add: readonly T[] | undefined; readonly remove: readonly T[] | undefined };

const UNSET: { readonly mode: "unset" } = Object.freeze({ mode: "unset" });

export const BulkAdjustment = {
  /** Leave the field untouched */
  unset<T>(): BulkAdjustment<T> {
    return UNSET;
  },

  /** Replace the whole list */
  set<T>(items: readonly T[]): BulkAdjustment<T> {
    return Object.freeze({ mode: "set", items: Object.freeze([...items]) });
  },

  /** Add and remove individual items */
  adjust<T>(add?: readonly T[], remove?: readonly T[]): BulkAdjustment<T> {
    return Object.freeze({
      mode: "adjust",
      add: add === undefined ? undefined : Object.freeze([...add]),
      remove: remove === undefined ? undefined : Object.freeze([...remove]),
    });
  },
} as const;

export function addKey(field: string): string {
  return `add_${field}`;
}

export function removeKey(field: string): string {
  return `remove_${field}`;
}

/**
 * Read the set/adjust keys for one list field
 *
 * @throws ConflictingFieldAdjustmentError if `field` is both set and adjusted
 * @throws MalformedFieldError if a list is malformed
 */
export function decodeBulkAdjustment<T>(
  object: JsonObject,
  field: string,
  item: Codec<T, JsonValue>,
  path = ""
): BulkAdjustment<T> {
  const hasSet = Object.hasOwn(object, field);
  const hasAdd = Object.hasOwn(object, addKey(field));
  const hasRemove = Object.hasOwn(object, removeKey(field));

  if (hasSet && (hasAdd || hasRemove)) {
    throw new ConflictingFieldAdjustmentError(field);
  }

  const list = arrayCodec(item);
  const at = (key: string): string => (path ? `${path}.${key}` : key);

  if (hasSet) {
    return BulkAdjustment.set(list.decode(object[field], at(field)));
  }
  if (hasAdd || hasRemove) {
    return BulkAdjustment.adjust(
      hasAdd ? list.decode(object[addKey(field)], at(addKey(field))) : undefined,
      hasRemove ? list.decode(object[removeKey(field)], at(removeKey(field))) : undefined
    );
  }
  return BulkAdjustment.unset();
}

/**
 * Write the keys for one list field; `unset` writes nothing
 */
export function encodeBulkAdjustment<T, J extends JsonValue>(
  target: JsonObject,
  field: string,
  adjustment: BulkAdjustment<T>,
  item: Codec<T, J>
): void {
  const encodeAll = (items: readonly T[]): J[] => items.map((entry) => item.encode(entry));

  switch (adjustment.mode) {
    case "unset":
      return;
    case "set":
      target[field] = encodeAll(adjustment.items);
      return;
    case "adjust":
      if (adjustment.add !== undefined) {
        target[addKey(field)] = encodeAll(adjustment.add);
      }
      if (adjustment.remove !== undefined) {
        target[removeKey(field)] = encodeAll(adjustment.remove);
      }
      return;
  }
}

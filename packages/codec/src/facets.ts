/**
 * Search facet algebra
 *
 * A facet is one typed predicate, `field operation value`, written on the
 * wire as the bare concatenation `"downloads>=1000"`. Facets combine into a
 * two-level tree:
 *
 * - AllFacets (AND) holds facets and AnyFacets
 * - AnyFacets (OR) holds AllFacets
 *
 * The search endpoint takes the tree as a JSON-encoded nested array:
 *
 *   allOf(facet("project_type", ":", "mod"),
 *         anyOf(facet("versions", ":", "1.20"), facet("versions", ":", "1.21")))
 *   => [["project_type:mod"],["versions:1.20","versions:1.21"]]
 *
 * Facets are validated when built, so an invalid tree cannot exist.
 */

import { type Color, colorToRgbInt } from "./color.ts";
import { InvalidFacetOperationError, InvalidFacetValueError } from "./errors.ts";

// ============================================================================
// Operations
// ============================================================================

export const FACET_OPERATIONS = [":", "=", "!=", ">=", ">", "<=", "<"] as const;
export type FacetOperation = (typeof FACET_OPERATIONS)[number];

/** Operations allowed on fields that are only compared for equality */
export const EQUALITY_OPERATIONS = [":", "=", "!="] as const;
export type EqualityOperation = (typeof EQUALITY_OPERATIONS)[number];

// ============================================================================
// Fields
// ============================================================================

type FacetValueKind = "string" | "boolean" | "number" | "color" | "timestamp";

interface FacetValueTypes {
  string: string;
  boolean: boolean;
  number: number;
  color: Color;
  timestamp: Date;
}

interface FacetFieldSpec {
  readonly value: FacetValueKind;
  readonly operations: readonly FacetOperation[];
}

export const FACET_FIELDS = {
  project_type: { value: "string", operations: EQUALITY_OPERATIONS },
  categories: { value: "string", operations: EQUALITY_OPERATIONS },
  versions: { value: "string", operations: FACET_OPERATIONS },
  client_side: { value: "string", operations: EQUALITY_OPERATIONS },
  server_side: { value: "string", operations: EQUALITY_OPERATIONS },
  open_source: { value: "boolean", operations: EQUALITY_OPERATIONS },
  title: { value: "string", operations: EQUALITY_OPERATIONS },
  author: { value: "string", operations: EQUALITY_OPERATIONS },
  follows: { value: "number", operations: FACET_OPERATIONS },
  project_id: { value: "string", operations: EQUALITY_OPERATIONS },
  license: { value: "string", operations: EQUALITY_OPERATIONS },
  downloads: { value: "number", operations: FACET_OPERATIONS },
  color: { value: "color", operations: FACET_OPERATIONS },
  created_timestamp: { value: "timestamp", operations: FACET_OPERATIONS },
  modified_timestamp: { value: "timestamp", operations: FACET_OPERATIONS },
} as const satisfies Record<string, FacetFieldSpec>;

export type FacetField = keyof typeof FACET_FIELDS;
export type FacetValue<F extends FacetField> = FacetValueTypes[(typeof FACET_FIELDS)[F]["value"]];
export type FacetOperationFor<F extends FacetField> = (typeof FACET_FIELDS)[F]["operations"][number];

export interface Facet<F extends FacetField> {
  readonly field: F;
  readonly operation: FacetOperationFor<F>;
  readonly value: FacetValue<F>;
}

/** A facet on any field */
export type AnyFacet = { [F in FacetField]: Facet<F> }[FacetField];

export function isFacetField(field: string): field is FacetField {
  return Object.hasOwn(FACET_FIELDS, field);
}

// ============================================================================
// Facet construction and formatting
// ============================================================================

function encodeFacetValue(field: string, kind: FacetValueKind, value: unknown): string {
  switch (kind) {
    case "string":
      if (typeof value !== "string") {
        throw new InvalidFacetValueError(field, `expected string, got ${typeof value}`);
      }
      return value;
    case "boolean":
      if (typeof value !== "boolean") {
        throw new InvalidFacetValueError(field, `expected boolean, got ${typeof value}`);
      }
      return value ? "true" : "false";
    case "number":
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new InvalidFacetValueError(field, `expected finite number, got ${String(value)}`);
      }
      return String(value);
    case "color":
      if (!isColor(value)) {
        throw new InvalidFacetValueError(field, "expected color");
      }
      return String(colorToRgbInt(value));
    case "timestamp":
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw new InvalidFacetValueError(field, "expected valid Date");
      }
      // Search indexes store Unix seconds
      return String(Math.floor(value.getTime() / 1000));
  }
}

function isColor(value: unknown): value is Color {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const channels = [Reflect.get(value, "red"), Reflect.get(value, "green"), Reflect.get(value, "blue")];
  return channels.every((c) => typeof c === "number" && Number.isInteger(c) && c >= 0 && c <= 0xff);
}

/**
 * Check a facet triple; also guards trees assembled by untyped callers
 */
function assertValidFacet(field: string, operation: string, value: unknown): void {
  if (!isFacetField(field)) {
    throw new InvalidFacetValueError(field, "unknown facet field");
  }
  const spec: FacetFieldSpec = FACET_FIELDS[field];
  const allowed: readonly string[] = spec.operations;
  if (!allowed.includes(operation)) {
    throw new InvalidFacetOperationError(field, operation, spec.operations);
  }
  encodeFacetValue(field, spec.value, value);
}

/**
 * Build a validated facet
 *
 * @throws InvalidFacetOperationError if `operation` is not allowed on `field`
 * @throws InvalidFacetValueError if `value` has the wrong type for `field`
 */
export function facet<F extends FacetField>(
  field: F,
  operation: FacetOperationFor<F>,
  value: FacetValue<F>
): Facet<F> {
  assertValidFacet(field, operation, value);
  return Object.freeze({ field, operation, value });
}

/** Untyped facet triple, e.g. from user input or configuration */
export interface FacetInput {
  field: string;
  operation: string;
  value: unknown;
}

function isValidFacet(input: FacetInput): input is AnyFacet {
  assertValidFacet(input.field, input.operation, input.value);
  return true;
}

/**
 * Build a validated facet from values only known at runtime
 *
 * @throws InvalidFacetOperationError if `operation` is not allowed on `field`
 * @throws InvalidFacetValueError if the field is unknown or `value` has the wrong type
 */
export function facetFrom(input: FacetInput): AnyFacet {
  const candidate = { field: input.field, operation: input.operation, value: input.value };
  if (!isValidFacet(candidate)) {
    throw new InvalidFacetValueError(input.field, "invalid facet");
  }
  return Object.freeze(candidate);
}

/**
 * Wire form of one facet: `field + operation + value`
 */
export function formatFacet(f: AnyFacet): string {
  const spec: FacetFieldSpec = FACET_FIELDS[f.field];
  return `${f.field}${f.operation}${encodeFacetValue(f.field, spec.value, f.value)}`;
}

// ============================================================================
// Tree
// ============================================================================

/** An OR-group on the wire: facet strings or nested AND-groups */
export type FacetOrJson = Array<string | FacetAndJson>;
/** An AND-group on the wire: one slot per member */
export type FacetAndJson = FacetOrJson[];

/**
 * Facets and OR-groups that must all match
 */
export class AllFacets {
  readonly kind = "all" as const;
  readonly items: readonly (AnyFacet | AnyFacets)[];

  constructor(items: Iterable<AnyFacet | AnyFacets>) {
    const list = [...items];
    for (const item of list) {
      if (!(item instanceof AnyFacets)) {
        assertValidFacet(item.field, item.operation, item.value);
      }
    }
    this.items = Object.freeze(list);
    Object.freeze(this);
  }

  /**
   * Each facet becomes a one-element group; each OR-group its own array
   */
  toJSON(): FacetAndJson {
    return this.items.map((item) => (item instanceof AnyFacets ? item.toJSON() : [formatFacet(item)]));
  }
}

/**
 * AND-groups of which at least one must match
 */
export class AnyFacets {
  readonly kind = "any" as const;
  readonly groups: readonly AllFacets[];

  constructor(groups: Iterable<AllFacets>) {
    this.groups = Object.freeze([...groups]);
    Object.freeze(this);
  }

  /**
   * A group holding a single facet is written as the bare facet string
   */
  toJSON(): FacetOrJson {
    return this.groups.map((group) => {
      const [only] = group.items;
      if (group.items.length === 1 && only !== undefined && !(only instanceof AnyFacets)) {
        return formatFacet(only);
      }
      return group.toJSON();
    });
  }
}

export function allOf(...items: (AnyFacet | AnyFacets)[]): AllFacets {
  return new AllFacets(items);
}

/**
 * OR together AND-groups; a bare facet counts as a one-facet group
 */
export function anyOf(...members: (AllFacets | AnyFacet)[]): AnyFacets {
  return new AnyFacets(members.map((member) => (member instanceof AllFacets ? member : new AllFacets([member]))));
}

/**
 * JSON text for the `facets` query parameter
 */
export function facetsToQueryParam(tree: AllFacets): string {
  return JSON.stringify(tree.toJSON());
}

import type { CanonicalField, FieldKind } from "./types.js";

export const FIELD_KINDS: Readonly<Record<CanonicalField, FieldKind>> = {
  from_address: "address",
  subject: "text",
  body_plain: "text",
  to_addresses: "address_list",
  cc_addresses: "address_list",
  bcc_addresses: "address_list",
  received_datetime: "timestamp",
};

const FIELD_ALIASES: Readonly<Record<string, CanonicalField>> = {
  message: "body_plain",
  from: "from_address",
  to: "to_addresses",
  cc: "cc_addresses",
  bcc: "bcc_addresses",
  "date received": "received_datetime",
  "received date/time": "received_datetime",
};

export interface ResolvedField {
  field: CanonicalField;
  kind: FieldKind;
}

function isCanonicalField(name: string): name is CanonicalField {
  return Object.hasOwn(FIELD_KINDS, name);
}

/**
 * Map a rule's field name (canonical or alias, any case) to its canonical
 * field. Returns `null` for names with no mapping.
 */
export function resolveField(name: string): ResolvedField | null {
  const key = name.trim().toLowerCase();
  const field = Object.hasOwn(FIELD_ALIASES, key) ? FIELD_ALIASES[key] : key;
  if (!isCanonicalField(field)) return null;
  return { field, kind: FIELD_KINDS[field] };
}

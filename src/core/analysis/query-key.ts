/**
 * Query keys: the (queried name, record type) pair that identifies one unit
 * of collected data. Text form is `"<name>/IN/<TYPE>"`.
 *
 * @module
 */

import { DomainName, InvalidNameError } from "../dns/domain-name.js";
import { parseRRType, rrTypeToText } from "../dns/rr-types.js";
import { SchemaError } from "../errors.js";

export interface QueryKey {
  readonly name: DomainName;
  readonly rrtype: number;
}

export function createQueryKey(name: DomainName, rrtype: number): QueryKey {
  return { name, rrtype };
}

export function formatQueryKey(key: QueryKey): string {
  return `${key.name.toString()}/IN/${rrTypeToText(key.rrtype)}`;
}

/**
 * Parse `"example.com./IN/A"`. The class segment may be omitted
 * (`"example.com./A"`).
 *
 * @throws SchemaError for any other shape
 */
export function parseQueryKey(text: string): QueryKey {
  const parts = text.split("/");
  let nameText: string | undefined;
  let typeText: string | undefined;

  if (parts.length === 3) {
    [nameText, , typeText] = parts;
    if (parts[1]?.toUpperCase() !== "IN") {
      throw new SchemaError(`Unsupported query class in "${text}"`, undefined, { path: text });
    }
  } else if (parts.length === 2) {
    [nameText, typeText] = parts;
  }

  if (nameText === undefined || typeText === undefined) {
    throw new SchemaError(`Malformed query key "${text}"`, undefined, { path: text });
  }

  const rrtype = parseRRType(typeText);
  if (rrtype === undefined) {
    throw new SchemaError(`Unknown record type in query key "${text}"`, undefined, { path: text });
  }

  try {
    return createQueryKey(DomainName.parse(nameText), rrtype);
  } catch (error) {
    if (error instanceof InvalidNameError) {
      throw new SchemaError(error.message, undefined, { path: text });
    }
    throw error;
  }
}

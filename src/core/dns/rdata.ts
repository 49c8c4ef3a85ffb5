/**
 * Presentation-format rdata to wire format.
 *
 * Covers the record types that show up in DNSSEC analysis dumps plus the
 * RFC 3597 generic form (`\# <length> <hex>`). Embedded domain names are
 * lowercased when canonical form is requested, for the types listed in
 * RFC 4034 section 6.2 as amended by RFC 6840 (NSEC excluded).
 *
 * @module
 */

import { DomainName } from "./domain-name.js";
import { RRType, parseRRType, rrTypeToText } from "./rr-types.js";

export class RdataError extends Error {
  constructor(rrtype: number, text: string, reason: string) {
    super(`Cannot encode ${rrTypeToText(rrtype)} rdata "${text}": ${reason}`);
    this.name = "RdataError";
  }
}

// =============================================================================
// Byte Writer
// =============================================================================

class WireWriter {
  private readonly bytes: number[] = [];

  u8(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  u16(value: number): this {
    return this.u8(value >>> 8).u8(value);
  }

  u32(value: number): this {
    return this.u16(Math.floor(value / 0x10000)).u16(value % 0x10000);
  }

  raw(data: Uint8Array): this {
    for (const b of data) this.bytes.push(b);
    return this;
  }

  /** Length-prefixed character string */
  string(data: Uint8Array): this {
    return this.u8(data.length).raw(data);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

// =============================================================================
// Tokenizing
// =============================================================================

interface Token {
  text: string;
}

/**
 * Split rdata text on whitespace, keeping quoted strings together.
 */
export function tokenizeRdata(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '"') {
      let value = "";
      i++;
      while (i < text.length && text.charAt(i) !== '"') {
        if (text.charAt(i) === "\\" && i + 1 < text.length) {
          value += text.slice(i, i + 2);
          i += 2;
          continue;
        }
        value += text.charAt(i);
        i++;
      }
      if (i >= text.length) {
        throw new Error("unterminated quoted string");
      }
      i++;
      tokens.push({ text: value });
      continue;
    }
    let value = "";
    while (i < text.length && !/\s/.test(text.charAt(i))) {
      if (text.charAt(i) === "\\" && i + 1 < text.length) {
        value += text.slice(i, i + 2);
        i += 2;
        continue;
      }
      value += text.charAt(i);
      i++;
    }
    tokens.push({ text: value });
  }
  return tokens;
}

/** Decode `\DDD` and `\X` escapes in a character-string */
function unescapeString(text: string): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      const digits = text.slice(i + 1, i + 4);
      if (/^\d{3}$/.test(digits)) {
        out.push(Number(digits) & 0xff);
        i += 3;
      } else if (i + 1 < text.length) {
        out.push(text.charCodeAt(i + 1) & 0xff);
        i += 1;
      }
      continue;
    }
    out.push(text.charCodeAt(i) & 0xff);
  }
  return Uint8Array.from(out);
}

// =============================================================================
// Field Parsers
// =============================================================================

function parseInteger(text: string, max: number): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`expected an integer, got "${text}"`);
  }
  const value = Number(text);
  if (value > max) {
    throw new Error(`${value} exceeds ${max}`);
  }
  return value;
}

function parseIPv4(text: string): Uint8Array {
  const parts = text.split(".");
  if (parts.length !== 4) {
    throw new Error(`invalid IPv4 address "${text}"`);
  }
  return Uint8Array.from(parts.map((p) => parseInteger(p, 255)));
}

function parseIPv6(text: string): Uint8Array {
  let tail: number[] = [];
  let body = text;
  const lastColon = body.lastIndexOf(":");
  if (body.includes(".")) {
    tail = [...parseIPv4(body.slice(lastColon + 1))];
    body = body.slice(0, lastColon + 1) + "0:0";
  }

  const halves = body.split("::");
  if (halves.length > 2) {
    throw new Error(`invalid IPv6 address "${text}"`);
  }
  const head = halves[0] ? halves[0].split(":") : [];
  const rest = halves.length === 2 && halves[1] ? halves[1].split(":") : [];
  const missing = 8 - head.length - rest.length;
  if ((halves.length === 1 && missing !== 0) || missing < 0) {
    throw new Error(`invalid IPv6 address "${text}"`);
  }

  const groups = [...head, ...Array<string>(halves.length === 2 ? missing : 0).fill("0"), ...rest];
  const writer = new WireWriter();
  for (const group of groups) {
    if (!/^[0-9a-fA-F]{1,4}$/.test(group)) {
      throw new Error(`invalid IPv6 group "${group}"`);
    }
    writer.u16(parseInt(group, 16));
  }
  const bytes = writer.toBytes();
  if (tail.length === 4) {
    bytes.set(tail, 12);
  }
  return bytes;
}

export function decodeHex(text: string): Uint8Array {
  const clean = text.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new Error("invalid hex string");
  }
  return Uint8Array.from(Buffer.from(clean, "hex"));
}

export function decodeBase64(text: string): Uint8Array {
  const clean = text.replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(clean) || clean.length % 4 !== 0) {
    throw new Error("invalid base64 string");
  }
  return Uint8Array.from(Buffer.from(clean, "base64"));
}

const BASE32HEX = "0123456789ABCDEFGHIJKLMNOPQRSTUV";

/** RFC 4648 base32hex without padding, as used by NSEC3 */
export function decodeBase32Hex(text: string): Uint8Array {
  const clean = text.replace(/=+$/, "").toUpperCase();
  const out: number[] = [];
  let buffer = 0;
  let bits = 0;
  for (const ch of clean) {
    const value = BASE32HEX.indexOf(ch);
    if (value < 0) {
      throw new Error(`invalid base32hex character "${ch}"`);
    }
    buffer = ((buffer << 5) | value) & 0x1fff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      out.push((buffer >>> bits) & 0xff);
    }
  }
  return Uint8Array.from(out);
}

function encodeName(text: string, canonical: boolean): Uint8Array {
  return DomainName.parse(text).toWire(canonical);
}

/** RFC 4034 section 4.1.2 type bit maps */
function encodeTypeBitmap(types: string[]): Uint8Array {
  const values = types.map((t) => {
    const value = parseRRType(t);
    if (value === undefined) throw new Error(`unknown type "${t}"`);
    return value;
  });
  const windows = new Map<number, Uint8Array>();
  for (const value of values) {
    const window = value >>> 8;
    const bitmap = windows.get(window) ?? new Uint8Array(32);
    const low = value & 0xff;
    bitmap[low >>> 3] = (bitmap[low >>> 3] ?? 0) | (0x80 >>> (low & 7));
    windows.set(window, bitmap);
  }

  const writer = new WireWriter();
  for (const window of [...windows.keys()].sort((a, b) => a - b)) {
    const bitmap = windows.get(window) ?? new Uint8Array(32);
    let length = bitmap.length;
    while (length > 0 && bitmap[length - 1] === 0) length--;
    writer.u8(window).u8(length).raw(bitmap.subarray(0, length));
  }
  return writer.toBytes();
}

// =============================================================================
// Service Bindings (SVCB, HTTPS)
// =============================================================================

const SVC_PARAM_KEYS: ReadonlyMap<string, number> = new Map([
  ["mandatory", 0],
  ["alpn", 1],
  ["no-default-alpn", 2],
  ["port", 3],
  ["ipv4hint", 4],
  ["ech", 5],
  ["ipv6hint", 6],
]);

function parseSvcParamKey(text: string): number {
  const known = SVC_PARAM_KEYS.get(text.toLowerCase());
  if (known !== undefined) return known;
  const generic = /^key(\d+)$/i.exec(text);
  if (!generic?.[1]) {
    throw new Error(`unknown SvcParamKey "${text}"`);
  }
  return parseInteger(generic[1], 0xffff);
}

/** Split a value list on commas that are not escaped */
function splitValueList(text: string): string[] {
  const items: string[] = [];
  let current = "";
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === "\\" && i + 1 < text.length) {
      current += text.slice(i, i + 2);
      i++;
    } else if (ch === ",") {
      items.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  items.push(current);
  return items;
}

function encodeSvcParamValue(key: number, value: string | undefined): Uint8Array {
  const w = new WireWriter();
  if (key === 2) {
    if (value !== undefined) throw new Error("no-default-alpn takes no value");
    return w.toBytes();
  }
  if (value === undefined) {
    if (key <= 6) throw new Error(`SvcParamKey ${key} needs a value`);
    return w.toBytes();
  }

  switch (key) {
    case 0: {
      const keys = value.split(",").map(parseSvcParamKey);
      for (const k of keys.sort((a, b) => a - b)) w.u16(k);
      return w.toBytes();
    }
    case 1:
      for (const id of splitValueList(value)) {
        const data = unescapeString(id);
        if (data.length === 0 || data.length > 255) throw new Error(`invalid ALPN id "${id}"`);
        w.string(data);
      }
      return w.toBytes();
    case 3:
      return w.u16(parseInteger(value, 0xffff)).toBytes();
    case 4:
      for (const address of value.split(",")) w.raw(parseIPv4(address));
      return w.toBytes();
    case 5:
      return decodeBase64(value);
    case 6:
      for (const address of value.split(",")) w.raw(parseIPv6(address));
      return w.toBytes();
    default:
      return unescapeString(value);
  }
}

/** RFC 9460 rdata: priority, target (never lowercased), sorted SvcParams */
function encodeServiceBinding(fields: string[]): Uint8Array {
  expectCount(fields, 2);
  const w = new WireWriter();
  w.u16(parseInteger(field(fields, 0), 0xffff)).raw(encodeName(field(fields, 1), false));

  const params = new Map<number, Uint8Array>();
  for (const param of fields.slice(2)) {
    const eq = param.indexOf("=");
    const key = parseSvcParamKey(eq < 0 ? param : param.slice(0, eq));
    let value = eq < 0 ? undefined : param.slice(eq + 1);
    if (value !== undefined && value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (params.has(key)) {
      throw new Error(`duplicate SvcParamKey ${key}`);
    }
    params.set(key, encodeSvcParamValue(key, value));
  }

  for (const key of [...params.keys()].sort((a, b) => a - b)) {
    const value = params.get(key) ?? new Uint8Array();
    w.u16(key).u16(value.length).raw(value);
  }
  return w.toBytes();
}

function expectCount(fields: string[], count: number): void {
  if (fields.length < count) {
    throw new Error(`expected ${count} fields, got ${fields.length}`);
  }
}

function field(fields: string[], index: number): string {
  const value = fields[index];
  if (value === undefined) {
    throw new Error(`missing field ${index + 1}`);
  }
  return value;
}

// =============================================================================
// Encoder
// =============================================================================

function encodeFields(rrtype: number, tokens: Token[], canonical: boolean): Uint8Array {
  const fields = tokens.map((t) => t.text);
  const w = new WireWriter();

  if (fields[0] === "\\#") {
    const length = parseInteger(field(fields, 1), 0xffff);
    const data = decodeHex(fields.slice(2).join(""));
    if (data.length !== length) {
      throw new Error(`generic rdata length ${length} does not match ${data.length} octets`);
    }
    return data;
  }

  switch (rrtype) {
    case RRType.A:
      return parseIPv4(field(fields, 0));

    case RRType.AAAA:
      return parseIPv6(field(fields, 0));

    case RRType.NS:
    case RRType.CNAME:
    case RRType.PTR:
    case RRType.DNAME:
      return encodeName(field(fields, 0), canonical);

    case RRType.MX:
      expectCount(fields, 2);
      return w.u16(parseInteger(field(fields, 0), 0xffff)).raw(encodeName(field(fields, 1), canonical)).toBytes();

    case RRType.SOA:
      expectCount(fields, 7);
      w.raw(encodeName(field(fields, 0), canonical)).raw(encodeName(field(fields, 1), canonical));
      for (let i = 2; i < 7; i++) {
        w.u32(parseInteger(field(fields, i), 0xffffffff));
      }
      return w.toBytes();

    case RRType.TXT:
      for (const token of tokens) {
        const data = unescapeString(token.text);
        if (data.length > 255) throw new Error("character-string longer than 255 octets");
        w.string(data);
      }
      return w.toBytes();

    case RRType.SRV:
      expectCount(fields, 4);
      return w
        .u16(parseInteger(field(fields, 0), 0xffff))
        .u16(parseInteger(field(fields, 1), 0xffff))
        .u16(parseInteger(field(fields, 2), 0xffff))
        .raw(encodeName(field(fields, 3), canonical))
        .toBytes();

    case RRType.NAPTR: {
      expectCount(fields, 6);
      w.u16(parseInteger(field(fields, 0), 0xffff)).u16(parseInteger(field(fields, 1), 0xffff));
      for (const token of tokens.slice(2, 5)) {
        w.string(unescapeString(token.text));
      }
      return w.raw(encodeName(field(fields, 5), canonical)).toBytes();
    }

    case RRType.DS:
    case RRType.CDS:
    case RRType.DLV:
      expectCount(fields, 4);
      return w
        .u16(parseInteger(field(fields, 0), 0xffff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .u8(parseInteger(field(fields, 2), 0xff))
        .raw(decodeHex(fields.slice(3).join("")))
        .toBytes();

    case RRType.DNSKEY:
    case RRType.CDNSKEY:
      expectCount(fields, 4);
      return w
        .u16(parseInteger(field(fields, 0), 0xffff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .u8(parseInteger(field(fields, 2), 0xff))
        .raw(decodeBase64(fields.slice(3).join("")))
        .toBytes();

    case RRType.NSEC:
      expectCount(fields, 1);
      return w.raw(encodeName(field(fields, 0), false)).raw(encodeTypeBitmap(fields.slice(1))).toBytes();

    case RRType.NSEC3: {
      expectCount(fields, 5);
      const salt = field(fields, 3) === "-" ? new Uint8Array() : decodeHex(field(fields, 3));
      return w
        .u8(parseInteger(field(fields, 0), 0xff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .u16(parseInteger(field(fields, 2), 0xffff))
        .string(salt)
        .string(decodeBase32Hex(field(fields, 4)))
        .raw(encodeTypeBitmap(fields.slice(5)))
        .toBytes();
    }

    case RRType.NSEC3PARAM: {
      expectCount(fields, 4);
      const salt = field(fields, 3) === "-" ? new Uint8Array() : decodeHex(field(fields, 3));
      return w
        .u8(parseInteger(field(fields, 0), 0xff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .u16(parseInteger(field(fields, 2), 0xffff))
        .string(salt)
        .toBytes();
    }

    case RRType.TLSA:
      expectCount(fields, 4);
      return w
        .u8(parseInteger(field(fields, 0), 0xff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .u8(parseInteger(field(fields, 2), 0xff))
        .raw(decodeHex(fields.slice(3).join("")))
        .toBytes();

    case RRType.SSHFP:
      expectCount(fields, 3);
      return w
        .u8(parseInteger(field(fields, 0), 0xff))
        .u8(parseInteger(field(fields, 1), 0xff))
        .raw(decodeHex(fields.slice(2).join("")))
        .toBytes();

    case RRType.CAA: {
      expectCount(fields, 3);
      const tag = unescapeString(field(fields, 1));
      const value = unescapeString(tokens.slice(2).map((t) => t.text).join(" "));
      return w.u8(parseInteger(field(fields, 0), 0xff)).string(tag).raw(value).toBytes();
    }

    case RRType.SVCB:
    case RRType.HTTPS:
      return encodeServiceBinding(fields);

    default:
      throw new Error("no presentation format known; use the generic \\# form");
  }
}

/**
 * Encode presentation-format rdata into wire format.
 *
 * @throws RdataError when the text does not match the type's syntax
 */
export function encodeRdata(rrtype: number, text: string, canonical = true): Uint8Array {
  try {
    return encodeFields(rrtype, tokenizeRdata(text), canonical);
  } catch (error) {
    if (error instanceof RdataError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new RdataError(rrtype, text, reason);
  }
}

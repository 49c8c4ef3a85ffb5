/**
 * Domain Names
 *
 * Immutable, absolute DNS names compared case-insensitively. Labels keep the
 * case they were written in; the canonical form lowercases ASCII letters.
 *
 * @module
 */

const MAX_LABEL_LENGTH = 63;
const MAX_NAME_LENGTH = 255;

/**
 * Thrown by {@link DomainName.parse} for text that is not a valid name.
 */
export class InvalidNameError extends Error {
  constructor(text: string, reason: string) {
    super(`Invalid domain name "${text}": ${reason}`);
    this.name = "InvalidNameError";
  }
}

function lowerAscii(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i] ?? 0;
    out[i] = b >= 0x41 && b <= 0x5a ? b + 0x20 : b;
  }
  return out;
}

function isPrintable(b: number): boolean {
  return b > 0x20 && b < 0x7f;
}

/**
 * Split presentation text into raw label bytes, honouring `\DDD` and `\X`.
 */
function splitLabels(text: string): Uint8Array[] {
  const labels: Uint8Array[] = [];
  let current: number[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      const digits = text.slice(i + 1, i + 4);
      if (/^\d{3}$/.test(digits)) {
        const value = Number(digits);
        if (value > 255) {
          throw new InvalidNameError(text, `escape \\${digits} out of range`);
        }
        current.push(value);
        i += 4;
        continue;
      }
      if (i + 1 >= text.length) {
        throw new InvalidNameError(text, "dangling escape");
      }
      current.push(text.charCodeAt(i + 1));
      i += 2;
      continue;
    }
    if (ch === ".") {
      if (current.length === 0) {
        throw new InvalidNameError(text, "empty label");
      }
      labels.push(Uint8Array.from(current));
      current = [];
      i++;
      continue;
    }
    const code = text.charCodeAt(i);
    if (code > 0xff) {
      throw new InvalidNameError(text, "non-ASCII character");
    }
    current.push(code);
    i++;
  }

  if (current.length > 0) {
    labels.push(Uint8Array.from(current));
  }
  return labels;
}

function labelToText(label: Uint8Array): string {
  let out = "";
  for (const b of label) {
    if (b === 0x2e || b === 0x5c || b === 0x22 || b === 0x28 || b === 0x29 || b === 0x3b || b === 0x40 || b === 0x24) {
      out += `\\${String.fromCharCode(b)}`;
    } else if (isPrintable(b)) {
      out += String.fromCharCode(b);
    } else {
      out += `\\${b.toString().padStart(3, "0")}`;
    }
  }
  return out;
}

export class DomainName {
  /** Labels from leftmost to rightmost, root label excluded */
  private readonly labels: readonly Uint8Array[];
  private readonly key: string;

  static readonly ROOT = new DomainName([]);

  private constructor(labels: readonly Uint8Array[]) {
    this.labels = labels;
    this.key = labels.length === 0 ? "." : labels.map((l) => labelToText(lowerAscii(l))).join(".") + ".";
  }

  /**
   * Parse a name in presentation format. Relative names are made absolute,
   * or resolved against `origin` when one is given.
   */
  static parse(text: string, origin?: DomainName): DomainName {
    const trimmed = text.trim();
    if (trimmed === "") {
      throw new InvalidNameError(text, "empty name");
    }
    if (trimmed === ".") {
      return DomainName.ROOT;
    }
    if (trimmed === "@") {
      return origin ?? DomainName.ROOT;
    }

    const absolute = trimmed.endsWith(".") && !trimmed.endsWith("\\.");
    const body = absolute ? trimmed.slice(0, -1) : trimmed;
    let labels = splitLabels(body);
    if (!absolute && origin) {
      labels = [...labels, ...origin.labels];
    }

    let wireLength = 1;
    for (const label of labels) {
      if (label.length > MAX_LABEL_LENGTH) {
        throw new InvalidNameError(text, `label longer than ${MAX_LABEL_LENGTH} octets`);
      }
      wireLength += label.length + 1;
    }
    if (wireLength > MAX_NAME_LENGTH) {
      throw new InvalidNameError(text, `name longer than ${MAX_NAME_LENGTH} octets`);
    }

    return new DomainName(labels);
  }

  /** Canonical text: lowercase, absolute */
  toString(): string {
    return this.key;
  }

  /** Presentation text preserving the original case */
  toText(): string {
    if (this.labels.length === 0) return ".";
    return this.labels.map(labelToText).join(".") + ".";
  }

  equals(other: DomainName): boolean {
    return this.key === other.key;
  }

  isRoot(): boolean {
    return this.labels.length === 0;
  }

  isWildcard(): boolean {
    const first = this.labels[0];
    return first !== undefined && first.length === 1 && first[0] === 0x2a;
  }

  /** Number of labels, root excluded */
  get depth(): number {
    return this.labels.length;
  }

  /** Label count as carried in an RRSIG: root and a leading wildcard excluded */
  get signatureLabels(): number {
    return this.isWildcard() ? this.labels.length - 1 : this.labels.length;
  }

  parent(): DomainName | undefined {
    if (this.labels.length === 0) return undefined;
    return new DomainName(this.labels.slice(1));
  }

  /** The rightmost `count` labels of this name */
  suffix(count: number): DomainName {
    return new DomainName(this.labels.slice(Math.max(0, this.labels.length - count)));
  }

  /** Prepend a single label */
  child(label: string): DomainName {
    return new DomainName([...splitLabels(label), ...this.labels]);
  }

  /** Append another name below this one, e.g. `example.com.` under `dlv.example.` */
  concat(other: DomainName): DomainName {
    return new DomainName([...this.labels, ...other.labels]);
  }

  isSubdomainOf(other: DomainName): boolean {
    if (other.labels.length > this.labels.length) return false;
    return this.suffix(other.labels.length).equals(other);
  }

  /** Uncompressed wire form; lowercased when `canonical` is set */
  toWire(canonical = true): Uint8Array {
    const parts: number[] = [];
    for (const label of this.labels) {
      parts.push(label.length);
      for (const b of canonical ? lowerAscii(label) : label) {
        parts.push(b);
      }
    }
    parts.push(0);
    return Uint8Array.from(parts);
  }

  /**
   * Canonical DNS name order (RFC 4034 section 6.1): compare label by label from
   * the right, each label as lowercase octets.
   */
  compare(other: DomainName): number {
    const a = this.labels.map(lowerAscii).reverse();
    const b = other.labels.map(lowerAscii).reverse();
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const cmp = Buffer.compare(a[i] ?? new Uint8Array(), b[i] ?? new Uint8Array());
      if (cmp !== 0) return cmp;
    }
    return a.length - b.length;
  }
}

/**
 * File-name stem for per-name output: the name without its trailing dot, or
 * "root" for the root.
 */
export function nameToFileStem(name: DomainName): string {
  return name.isRoot() ? "root" : name.toString().slice(0, -1);
}

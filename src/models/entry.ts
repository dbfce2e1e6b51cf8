import { fromUtf8, PartialAttribute, SearchResultEntry } from "../protocol/ldap.ts";
import { NoCurrentEntryError } from "./errors.ts";

/**
 * Values of one attribute on one entry, copied out for the caller.
 * The caller owns the set and calls `release()` when done; releasing twice is harmless.
 */
export class AttributeValueSet implements Iterable<Uint8Array> {
  private vals: Uint8Array[];
  private isReleased = false;

  constructor(readonly name: string, values: readonly Uint8Array[]) {
    this.vals = values.map((v) => v.slice());
  }

  get values(): readonly Uint8Array[] {
    return this.vals;
  }

  get length(): number {
    return this.vals.length;
  }

  get released(): boolean {
    return this.isReleased;
  }

  /** Values decoded as UTF-8, in server order. */
  toStrings(): string[] {
    return this.vals.map((v) => fromUtf8(v));
  }

  first(): string | undefined {
    return this.vals.length > 0 ? fromUtf8(this.vals[0]) : undefined;
  }

  release(): void {
    if (this.isReleased) return;
    for (const v of this.vals) v.fill(0);
    this.vals = [];
    this.isReleased = true;
  }

  [Symbol.iterator](): Iterator<Uint8Array> {
    return this.vals[Symbol.iterator]();
  }
}

/**
 * One directory object from a page of results. Valid until its page is replaced.
 */
export class Entry {
  readonly dn: string;
  private readonly attributes: readonly PartialAttribute[];
  private isValid = true;

  constructor(source: SearchResultEntry) {
    this.dn = source.objectName;
    this.attributes = source.attributes;
  }

  get valid(): boolean {
    return this.isValid;
  }

  get attributeNames(): string[] {
    return this.attributes.map((a) => a.type);
  }

  /** Attribute names match case-insensitively; a missing attribute yields an empty set. */
  getAttribute(name: string): AttributeValueSet {
    if (!this.isValid) {
      throw new NoCurrentEntryError(`Entry ${this.dn} is no longer valid: its page of results was replaced`);
    }
    const wanted = name.toLowerCase();
    const found = this.attributes.find((a) => a.type.toLowerCase() === wanted);
    return new AttributeValueSet(name, found ? found.vals : []);
  }

  invalidate(): void {
    this.isValid = false;
  }
}

/**
 * Entries of a single page, in server order.
 */
export class ResultSet {
  constructor(readonly entries: readonly Entry[], readonly pageNumber: number) {}

  get size(): number {
    return this.entries.length;
  }

  invalidate(): void {
    for (const entry of this.entries) entry.invalidate();
  }
}

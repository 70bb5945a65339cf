/**
 * Typed reads over an untyped request-state snapshot.
 */

import { isPresent, isRecord } from "../utils/is-present.js";

export class StateView {
  constructor(readonly raw: Record<string, unknown>) {}

  /** String value, or `fallback` when the key is absent or not a string. */
  string(key: string, fallback = ""): string {
    const value = this.raw[key];
    return typeof value === "string" ? value : fallback;
  }

  optionalString(key: string): string | undefined {
    const value = this.raw[key];
    return typeof value === "string" ? value : undefined;
  }

  number(key: string, fallback = 0): number {
    const value = this.raw[key];
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
  }

  flag(key: string): boolean {
    return isPresent(this.raw[key]);
  }

  record(key: string): Record<string, unknown> {
    const value = this.raw[key];
    return isRecord(value) ? value : {};
  }

  list(key: string): unknown[] {
    const value = this.raw[key];
    return Array.isArray(value) ? value : [];
  }

  has(key: string): boolean {
    return isPresent(this.raw[key]);
  }

  /** The customer's email: normalized when available, else lower-cased input. */
  customerEmail(): string {
    const normalized = this.record("normalized").email;
    if (typeof normalized === "string" && normalized.length > 0) {
      return normalized;
    }
    return this.string("email").trim().toLowerCase();
  }
}

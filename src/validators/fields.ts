// src/validators/fields.ts
import { ValidationError, type FieldErrors } from "../lib/errors";

export type Body = Record<string, unknown>;

export const asBody = (raw: unknown): Body =>
  typeof raw === "object" && raw !== null && !Array.isArray(raw)
    ? Object.fromEntries(Object.entries(raw))
    : {};

const INVALID_DATE = "Must be an ISO-8601 date";

/**
 * Reads typed fields out of an untrusted JSON body, collecting one message
 * per bad field so the client sees every problem at once.
 *
 * `req*` readers always return a value of the right type (a placeholder when
 * the field is bad) and record the error; call `assertValid()` before using
 * what they returned.
 */
export class FieldReader {
  readonly errors: FieldErrors = {};
  private readonly body: Body;

  constructor(raw: unknown) {
    this.body = asBody(raw);
  }

  has(field: string): boolean {
    return this.body[field] !== undefined;
  }

  fail(field: string, message: string): void {
    if (!this.errors[field]) this.errors[field] = message;
  }

  private absent(field: string): boolean {
    const value = this.body[field];
    return value === undefined || value === null || value === "";
  }

  optString(field: string, maxLength?: number): string | undefined {
    if (this.absent(field)) return undefined;
    const value = this.body[field];
    if (typeof value !== "string") {
      this.fail(field, "Must be a string");
      return undefined;
    }
    const trimmed = value.trim();
    if (maxLength !== undefined && trimmed.length > maxLength) {
      this.fail(field, `Must be at most ${maxLength} characters`);
      return undefined;
    }
    return trimmed;
  }

  reqString(field: string, maxLength?: number): string {
    const value = this.optString(field, maxLength);
    if (value === undefined || value === "") {
      this.fail(field, "This field is required");
      return "";
    }
    return value;
  }

  optNumber(field: string, range: { min?: number; max?: number } = {}): number | undefined {
    if (this.absent(field)) return undefined;
    const raw = this.body[field];
    const value = typeof raw === "string" ? Number(raw) : raw;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      this.fail(field, "Must be a number");
      return undefined;
    }
    if (range.min !== undefined && value < range.min) {
      this.fail(field, `Must be at least ${range.min}`);
      return undefined;
    }
    if (range.max !== undefined && value > range.max) {
      this.fail(field, `Must be at most ${range.max}`);
      return undefined;
    }
    return value;
  }

  reqNumber(field: string, range: { min?: number; max?: number } = {}): number {
    if (this.absent(field)) {
      this.fail(field, "This field is required");
      return 0;
    }
    return this.optNumber(field, range) ?? 0;
  }

  optBoolean(field: string): boolean | undefined {
    if (this.absent(field)) return undefined;
    const value = this.body[field];
    if (typeof value !== "boolean") {
      this.fail(field, "Must be true or false");
      return undefined;
    }
    return value;
  }

  /** `null` means the client explicitly cleared the field. */
  optDate(field: string): Date | null | undefined {
    if (this.body[field] === null) return null;
    if (this.absent(field)) return undefined;
    const value = this.body[field];
    if (typeof value !== "string" && typeof value !== "number") {
      this.fail(field, INVALID_DATE);
      return undefined;
    }
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      this.fail(field, INVALID_DATE);
      return undefined;
    }
    return date;
  }

  reqDate(field: string): Date {
    const value = this.optDate(field);
    if (!value) {
      this.fail(field, "This field is required");
      return new Date(0);
    }
    return value;
  }

  optOneOf<T extends string>(field: string, values: readonly T[]): T | undefined {
    if (this.absent(field)) return undefined;
    const match = values.find((v) => v === this.body[field]);
    if (match === undefined) this.fail(field, `Must be one of: ${values.join(", ")}`);
    return match;
  }

  assertValid(): void {
    if (Object.keys(this.errors).length > 0) {
      throw new ValidationError({ ...this.errors });
    }
  }
}

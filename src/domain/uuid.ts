import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DispatchError } from './errors.js';

const SIMPLE_FORM = /^[0-9a-f]{32}$/i;

/** Inserts the hyphens into the 32-digit simple form; other input passes through. */
function hyphenate(text: string): string {
  if (!SIMPLE_FORM.test(text)) return text;
  return [
    text.slice(0, 8),
    text.slice(8, 12),
    text.slice(12, 16),
    text.slice(16, 20),
    text.slice(20),
  ].join('-');
}

const uuidSchema = z.string().trim().transform(hyphenate).pipe(z.string().uuid());

/**
 * Correlation identifier.
 *
 * Parsed from the hyphenated or the 32-digit simple form in any letter
 * case; always held (and serialized) in lowercase hyphenated form.
 */
export class Uuid {
  private constructor(private readonly value: string) {}

  /** Throws a `parse-uuid` DispatchError when `text` is not a UUID. */
  static parse(text: string): Uuid {
    const parsed = uuidSchema.safeParse(text);
    if (!parsed.success) {
      throw new DispatchError('parse-uuid', JSON.stringify(text), { cause: parsed.error });
    }
    return new Uuid(parsed.data.toLowerCase());
  }

  static random(): Uuid {
    return new Uuid(randomUUID());
  }

  equals(other: Uuid): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/**
 * Letter-Value Mapper
 *
 * Maps single characters to integer weights and sums them over text.
 * The default table is the Abjad numbering, read from
 * `data/letter-values.json`.
 */

import { z } from "zod";
import type { LetterTable } from "@lattice/contracts";
import { ValidationError } from "@lattice/contracts";
import { parseOrThrow } from "../validation/parse";
import abjadValues from "../../data/letter-values.json";

const LetterEntrySchema = z.tuple([
  z
    .string()
    .refine((key) => [...key].length === 1, "must be a single character"),
  z.number().int().positive(),
]);

export type LetterEntries = Iterable<readonly [string, number]>;

export class LetterValueMapper {
  private readonly table: LetterTable;

  /**
   * @param entries - Character/value pairs; a repeated character is rejected
   */
  constructor(entries: LetterEntries) {
    const table = new Map<string, number>();
    for (const entry of entries) {
      const [key, value] = parseOrThrow(LetterEntrySchema, entry, "entry");
      if (table.has(key)) {
        throw new ValidationError([
          { field: key, reason: "duplicate letter", hint: "each key once" },
        ]);
      }
      table.set(key, value);
    }
    this.table = table;
  }

  static fromRecord(record: Readonly<Record<string, number>>): LetterValueMapper {
    return new LetterValueMapper(Object.entries(record));
  }

  get size(): number {
    return this.table.size;
  }

  letterValue(character: string): number | undefined {
    return this.table.get(character);
  }

  /**
   * Sums the values of each character in `text`, skipping `excluded`
   * characters. Characters missing from the table contribute 0.
   */
  sum(text: string, excluded: Iterable<string> = []): number {
    const skip = new Set(excluded);
    let total = 0;
    for (const character of text) {
      if (skip.has(character)) continue;
      total += this.table.get(character) ?? 0;
    }
    return total;
  }
}

/**
 * Shared Abjad mapper, built once at module load.
 */
export const ABJAD = LetterValueMapper.fromRecord(abjadValues);

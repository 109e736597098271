/**
 * @fileoverview Composite stock identifier parsing
 *
 * Legacy stock ledgers without a `code` column store a slash-delimited
 * identifier instead, e.g. `SCN/KIT/MODULE/CODE/...`. Only the item code is
 * recovered from it.
 *
 * @module domain/shared/unique-id
 */

const NONE_FIELD = 'None';

/**
 * Recover the item code from a composite identifier
 *
 * Field precedence: the 4th field, else the 3rd, else the 2nd (each only
 * when present and not the literal `None`), else the whole input verbatim.
 *
 * @example
 * ```typescript
 * extractCodeFromUniqueId('S1/KIT01/MOD02/ABCDTABL1/2025-01-31'); // 'ABCDTABL1'
 * extractCodeFromUniqueId('S1/KIT01/ABCDTABL1/None');             // 'ABCDTABL1'
 * extractCodeFromUniqueId('ABCDTABL1');                           // 'ABCDTABL1'
 * ```
 */
export function extractCodeFromUniqueId(uniqueId: string): string {
  const fields = uniqueId.split('/');

  for (const index of [3, 2, 1]) {
    const field = fields[index];
    if (field !== undefined && field !== NONE_FIELD) {
      return field;
    }
  }

  return uniqueId;
}

/**
 * Parameterised WHERE clause builder
 *
 * Values are always bound as `$n` parameters; only column names chosen by
 * the adapters (never user input) are interpolated.
 *
 * @module infrastructure/database/where-clause
 */

export class WhereClause {
  private readonly conditions: string[] = [];
  private readonly values: unknown[] = [];

  /**
   * Bind a value and return its placeholder
   */
  param(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }

  /**
   * Conjoin a condition built with placeholders from {@link param}
   */
  and(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  /**
   * `column = $n`
   */
  equals(column: string, value: unknown): this {
    return this.and(`${column} = ${this.param(value)}`);
  }

  get params(): unknown[] {
    return [...this.values];
  }

  toSql(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

/**
 * Field and record model for INSERT data
 *
 * A record exposes its fields in declared order. The builder reads names
 * from the first record of a request and values from every record, so all
 * records in one request must share field count and order.
 */

export type Field = {
  readonly name: string;
  // 1-based position within the record
  readonly ordinal: number;
  readonly value: unknown;
};

/**
 * One row of insert data. `tagKey` selects which annotation supplies the
 * column name for records built from a shape; other records may ignore it.
 */
export interface InsertRecord {
  fields(tagKey: string): readonly Field[];
}

export type FieldSpec<T> = {
  readonly key: keyof T & string;
  readonly tags?: Readonly<Record<string, string>>;
};

export type RecordShape<T> = {
  readonly specs: readonly FieldSpec<T>[];
  names(tagKey: string): readonly string[];
  fields(row: T, tagKey: string): readonly Field[];
  record(row: T): InsertRecord;
};

/**
 * Declare the ordered fields of a row type along with their annotations.
 * The column name of a field is `tags[tagKey]`; a field without that tag
 * gets the empty name.
 *
 * @example
 * ```typescript
 * const candyShape = defineShape<Candy>([
 *   { key: "id", tags: { col: "id" } },
 *   { key: "name", tags: { col: "candy_name" } },
 * ]);
 * const rec = candyShape.record({ id: "c1", name: "Nougat" });
 * ```
 */
export function defineShape<T>(
  specs: readonly FieldSpec<T>[],
): RecordShape<T> {
  const frozen = Object.freeze(
    specs.map((spec) =>
      Object.freeze({ key: spec.key, tags: Object.freeze({ ...spec.tags }) }),
    ),
  );
  const namesByTag = new Map<string, readonly string[]>();

  const names = (tagKey: string): readonly string[] => {
    let cached = namesByTag.get(tagKey);
    if (!cached) {
      cached = Object.freeze(frozen.map((spec) => spec.tags[tagKey] ?? ""));
      namesByTag.set(tagKey, cached);
    }
    return cached;
  };

  const fields = (row: T, tagKey: string): readonly Field[] => {
    const columnNames = names(tagKey);
    return frozen.map((spec, index) => ({
      name: columnNames[index] ?? "",
      ordinal: index + 1,
      value: row[spec.key],
    }));
  };

  return Object.freeze({
    specs: frozen,
    names,
    fields,
    record: (row: T): InsertRecord => ({
      fields: (tagKey: string) => fields(row, tagKey),
    }),
  });
}

/**
 * Build a record from ordered (name, value) pairs
 */
export function recordOf(
  entries: ReadonlyArray<readonly [string, unknown]>,
): InsertRecord {
  const fields = Object.freeze(
    entries.map(([name, value], index) => ({
      name,
      ordinal: index + 1,
      value,
    })),
  );
  return { fields: () => fields };
}

/**
 * Build a record from a plain object, using its own keys in insertion order
 * as column names
 */
export function objectRecord(row: Record<string, unknown>): InsertRecord {
  return recordOf(Object.entries(row));
}

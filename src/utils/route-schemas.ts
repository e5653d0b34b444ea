/**
 * JSON schema fragments shared by route definitions.
 */

export function idParams<K extends string>(...names: K[]) {
  return {
    type: 'object',
    required: names,
    properties: Object.fromEntries(names.map(name => [name, { type: 'integer', minimum: 1 }])),
  };
}

/** Percentages land in numeric(5,2) columns. */
export const percentageProperty = { type: 'number', minimum: 0, maximum: 999.99 } as const;

/** Amounts and measurements land in numeric(10,2) columns. */
export const amountProperty = { type: 'number', minimum: 0, maximum: 99999999.99 } as const;

export const measurementProperty = { type: 'number', minimum: -99999999.99, maximum: 99999999.99 } as const;

/**
 * Candy rows shared across test suites
 */

import { defineShape } from "sqlinsert";

export type Candy = {
  id: string;
  name: string;
  formFactor: string;
  description: string;
  manufacturer: string;
  weight: number;
  timestamp: string;
};

export const candyShape = defineShape<Candy>([
  { key: "id", tags: { col: "id" } },
  { key: "name", tags: { col: "candy_name" } },
  { key: "formFactor", tags: { col: "form_factor" } },
  { key: "description", tags: { col: "description" } },
  { key: "manufacturer", tags: { col: "manufacturer" } },
  { key: "weight", tags: { col: "weight_grams" } },
  { key: "timestamp", tags: { col: "ts" } },
]);

export const CANDY_TABLE = "candy";

export const CANDY_COLUMNS =
  "(id, candy_name, form_factor, description, manufacturer, weight_grams, ts)";

export const nougat: Candy = {
  id: "c0600afd-0001",
  name: "Nougat",
  formFactor: "Bar",
  description: "chewy and sweet",
  manufacturer: "Test Confections",
  weight: 1.5,
  timestamp: "2024-01-01T00:00:00.000Z",
};

export function candyBatch(count: number): Candy[] {
  return Array.from({ length: count }, (_, i) => {
    const letter = String.fromCharCode(97 + i);
    return {
      id: letter,
      name: letter,
      formFactor: letter,
      description: letter,
      manufacturer: letter,
      weight: i + 1,
      timestamp: "2024-01-01T00:00:00.000Z",
    };
  });
}

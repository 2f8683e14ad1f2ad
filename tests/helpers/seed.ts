import { faker } from "@faker-js/faker";
import type { Database, Row } from "../../lib/sql";

const STATUSES = ["active", "inactive", "pending"];

/**
 * Create a `people` table filled with deterministic fake rows.
 * Returns the rows as the engine stores them (quotes kept, numbers as text).
 */
export function seedPeople(db: Database, count: number = 40): Row[] {
  // Use seed for deterministic results
  faker.seed(12345);

  db.createTable("people", ["id", "name", "age", "status"]);

  const inserted: Row[] = [];
  for (let i = 0; i < count; i++) {
    const name = faker.person.firstName().replace(/[^A-Za-z]/g, "") || "Anon";
    const age = String(faker.number.int({ min: 18, max: 67 }));
    const status = faker.helpers.arrayElement(STATUSES);

    db.execute(
      `INSERT INTO people (id, name, age, status) VALUES (${i}, '${name}', ${age}, '${status}')`,
    );
    inserted.push({ id: String(i), name: `'${name}'`, age, status: `'${status}'` });
  }

  return inserted;
}
